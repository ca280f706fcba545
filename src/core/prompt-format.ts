import type { ContextBundle } from '../types/context.js';

/** Files listed in the structure overview */
export const STRUCTURE_LISTING_LIMIT = 15;

/**
 * Render a bundle as plain text for a model prompt.
 */
export function formatContextForPrompt(bundle: ContextBundle): string {
  const parts: string[] = [];

  parts.push(`Repository Analysis (${bundle.files.length} relevant files, ~${bundle.totalTokensEstimated} tokens):`);
  parts.push('');

  if (bundle.files.length > 0) {
    parts.push('Repository structure:');
    for (const file of bundle.files.slice(0, STRUCTURE_LISTING_LIMIT)) {
      parts.push(`  ${file.path} (score ${file.score.toFixed(2)})`);
    }
    if (bundle.files.length > STRUCTURE_LISTING_LIMIT) {
      parts.push(`  ... and ${bundle.files.length - STRUCTURE_LISTING_LIMIT} more`);
    }
    parts.push('');
  }

  if (bundle.configFiles.length > 0) {
    parts.push('Configuration Files:');
    for (const excerpt of bundle.configFiles) {
      parts.push(`${excerpt.path}:`);
      parts.push(excerpt.content);
      if (excerpt.truncated) {
        parts.push(`[${excerpt.path} shortened]`);
      }
      parts.push('');
    }
  }

  if (bundle.files.length > 0) {
    parts.push('Relevant Source Files:');
    parts.push('');
    for (const file of bundle.files) {
      parts.push(`--- ${file.path} (${file.language}) ---`);
      parts.push(file.content);
      if (file.truncated) {
        parts.push(`[${file.path} truncated to fit the token budget]`);
      }
      parts.push('');
    }
  }

  if (bundle.filesConsideredCount < bundle.filesDiscoveredCount || bundle.files.some(f => f.truncated)) {
    parts.push('Note: Some files were excluded due to token/size limits.');
  }
  if (bundle.partial) {
    parts.push('Note: Context collection stopped early; results are partial.');
  }

  return parts.join('\n');
}
