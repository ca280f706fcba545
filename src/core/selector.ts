import { truncateAtLineBoundary } from './tokens.js';
import type { BundleFile, ContextBudget, ScoredFile } from '../types/context.js';

/**
 * A candidate that does not fit is still cut down and included when the
 * remaining budget covers at least this share of its cost.
 */
export const MIN_PARTIAL_FRACTION = 0.5;

export interface SelectOptions {
  /** The prompt produced at least one keyword */
  keywordsPresent: boolean;
}

export interface Selection {
  files: BundleFile[];
  totalTokensEstimated: number;
  filesConsideredCount: number;
}

/**
 * Files the selector may pick. With keywords and at least one relevant file,
 * irrelevant files are dropped; otherwise priors alone decide.
 */
export function eligibleFiles(scored: readonly ScoredFile[], options: SelectOptions): readonly ScoredFile[] {
  if (options.keywordsPresent && scored.some(s => s.relevance > 0)) {
    return scored.filter(s => s.relevance > 0);
  }
  return scored;
}

function toBundleFile(candidate: ScoredFile, content: string, tokens: number, truncated: boolean): BundleFile {
  return Object.freeze({
    path: candidate.record.path,
    language: candidate.record.language,
    content,
    score: candidate.score,
    estimatedTokens: tokens,
    truncated,
  });
}

/**
 * Greedily fill the budget from ranked candidates, in rank order.
 * Never exceeds `maxTokens`, `maxFiles` or `maxCharsPerFile`.
 */
export function selectFiles(scored: readonly ScoredFile[], budget: ContextBudget, options: SelectOptions): Selection {
  const candidates = eligibleFiles(scored, options);
  const files: BundleFile[] = [];
  let remaining = budget.maxTokens;
  let considered = 0;

  for (const candidate of candidates) {
    if (remaining <= 0 || files.length >= budget.maxFiles) {
      break;
    }
    considered++;

    const content = candidate.record.content;
    if (!content) {
      continue;
    }

    const capped = truncateAtLineBoundary(content, { maxChars: budget.maxCharsPerFile, maxTokens: Infinity });
    if (capped.content === '') {
      continue;
    }
    if (capped.tokens <= remaining) {
      files.push(toBundleFile(candidate, capped.content, capped.tokens, capped.truncated));
      remaining -= capped.tokens;
      continue;
    }

    // The best candidate with content is always cut down to fit
    const topRanked = files.length === 0;
    if (!topRanked && remaining < capped.tokens * MIN_PARTIAL_FRACTION) {
      continue;
    }
    const fragment = truncateAtLineBoundary(capped.content, { maxChars: budget.maxCharsPerFile, maxTokens: remaining });
    if (fragment.content === '') {
      continue;
    }
    files.push(toBundleFile(candidate, fragment.content, fragment.tokens, true));
    remaining -= fragment.tokens;
  }

  return {
    files,
    totalTokensEstimated: budget.maxTokens - remaining,
    filesConsideredCount: considered,
  };
}
