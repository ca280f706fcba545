import { posix } from 'node:path';
import type { DependencyGraph } from './deps/dependency-graph.js';
import { comparePaths } from './walker.js';
import type { FileRecord, Keyword, KeywordSet, MatchReason, ScoredFile } from '../types/context.js';

export const W_PATH = 2.0;
export const W_NAME = 1.5;
export const W_CONTENT = 1.0;
export const LANGUAGE_BONUS = 2.0;
export const DEPTH_PRIOR = 0.5;
export const ENTRY_POINT_PRIOR = 0.25;
export const MANIFEST_PRIOR = 0.25;
export const SEED_THRESHOLD = 1.0;
export const PROPAGATION_FACTOR = 0.5;
export const PROPAGATION_DECAY = 0.5;
export const PROPAGATION_CAP_RATIO = 0.9;

export const DEFAULT_PROPAGATION_HOPS = 1;

/** Terms shorter than this must match a whole path word instead of a substring */
const SUBSTRING_MIN_LENGTH = 4;

const ENTRY_POINT = /^(?:main|index|app|server)\.[a-z0-9]+$/;
const ENTRY_POINT_NAMES = new Set(['__init__.py', '__main__.py', 'lib.rs', 'mod.rs']);

const MANIFESTS = new Set([
  'package.json',
  'pyproject.toml',
  'setup.py',
  'requirements.txt',
  'go.mod',
  'cargo.toml',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'gemfile',
  'composer.json',
  'cmakelists.txt',
  'makefile',
]);

const WORD_SPLIT = /[^\p{L}\p{N}]+/u;

export interface ScoreOptions {
  /** Graph distance a seed's relevance travels */
  hops?: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countOccurrences(haystack: string, term: string): number {
  if (term.length < SUBSTRING_MIN_LENGTH) {
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(term)}(?![\\p{L}\\p{N}_])`, 'gu');
    return Array.from(haystack.matchAll(pattern)).length;
  }
  let count = 0;
  let index = haystack.indexOf(term);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(term, index + term.length);
  }
  return count;
}

function textMatches(text: string, words: ReadonlySet<string>, term: string): boolean {
  return term.length < SUBSTRING_MIN_LENGTH ? words.has(term) : text.includes(term);
}

interface PathView {
  lowerPath: string;
  pathWords: Set<string>;
  baseName: string;
  stem: string;
  stemWords: Set<string>;
}

function viewPath(path: string): PathView {
  const lowerPath = path.toLowerCase();
  const baseName = posix.basename(lowerPath);
  const ext = posix.extname(baseName);
  const stem = ext ? baseName.slice(0, -ext.length) : baseName;
  return {
    lowerPath,
    pathWords: new Set(lowerPath.split(WORD_SPLIT).filter(Boolean)),
    baseName,
    stem,
    stemWords: new Set(stem.split(WORD_SPLIT).filter(Boolean)),
  };
}

/**
 * Keyword and language contributions for one file.
 */
function directSignals(record: FileRecord, keywords: KeywordSet, lowerContent: string | undefined): MatchReason[] {
  const view = viewPath(record.path);
  const reasons: MatchReason[] = [];

  for (const keyword of keywords.keywords) {
    if (keyword.kind === 'language') {
      continue;
    }
    reasons.push(...keywordSignals(view, keyword, lowerContent));
  }

  if (keywords.languages.includes(record.language)) {
    reasons.push({ signal: 'language', source: record.language, contribution: LANGUAGE_BONUS });
  }
  return reasons;
}

function keywordSignals(view: PathView, keyword: Keyword, lowerContent: string | undefined): MatchReason[] {
  const { term, weight } = keyword;
  const reasons: MatchReason[] = [];

  if (textMatches(view.lowerPath, view.pathWords, term)) {
    reasons.push({ signal: 'path', source: term, contribution: W_PATH * weight });
  }
  const nameHit = keyword.kind === 'filename' ? view.baseName === term : textMatches(view.stem, view.stemWords, term);
  if (nameHit) {
    reasons.push({ signal: 'filename', source: term, contribution: W_NAME * weight });
  }
  if (lowerContent) {
    const occurrences = countOccurrences(lowerContent, term);
    if (occurrences > 0) {
      reasons.push({ signal: 'content', source: term, contribution: W_CONTENT * weight * Math.log2(1 + occurrences) });
    }
  }
  return reasons;
}

/**
 * Whether a path names a project manifest (package.json, go.mod, ...).
 */
export function isManifest(path: string): boolean {
  return MANIFESTS.has(posix.basename(path).toLowerCase());
}

function priorSignals(record: FileRecord): MatchReason[] {
  const baseName = posix.basename(record.path).toLowerCase();
  const reasons: MatchReason[] = [
    { signal: 'depth', contribution: DEPTH_PRIOR / Math.max(1, record.depth) },
  ];
  if (ENTRY_POINT.test(baseName) || ENTRY_POINT_NAMES.has(baseName)) {
    reasons.push({ signal: 'entry-point', contribution: ENTRY_POINT_PRIOR });
  }
  if (isManifest(record.path)) {
    reasons.push({ signal: 'manifest', contribution: MANIFEST_PRIOR });
  }
  return reasons;
}

function sum(reasons: readonly MatchReason[]): number {
  return reasons.reduce((total, r) => total + r.contribution, 0);
}

/**
 * Spread relevance from seeds to their graph neighborhood.
 * Returns, per receiving path, the boost and the seed that contributed most.
 */
function propagate(
  relevance: ReadonlyMap<string, number>,
  graph: DependencyGraph,
  hops: number
): Map<string, { boost: number; source: string; best: number }> {
  const received = new Map<string, { boost: number; source: string; best: number }>();
  const seeds = Array.from(relevance.entries())
    .filter(([, value]) => value >= SEED_THRESHOLD)
    .sort(([a], [b]) => comparePaths(a, b));

  for (const [seed, seedRelevance] of seeds) {
    const visited = new Set<string>([seed]);
    let frontier = [seed];
    for (let hop = 1; hop <= hops && frontier.length > 0; hop++) {
      const amount = seedRelevance * PROPAGATION_FACTOR * PROPAGATION_DECAY ** (hop - 1);
      const next: string[] = [];
      for (const node of frontier) {
        for (const neighbor of graph.neighbors(node)) {
          if (visited.has(neighbor) || !relevance.has(neighbor)) {
            continue;
          }
          visited.add(neighbor);
          next.push(neighbor);
          const entry = received.get(neighbor) ?? { boost: 0, source: seed, best: 0 };
          entry.boost += amount;
          if (amount > entry.best) {
            entry.best = amount;
            entry.source = seed;
          }
          received.set(neighbor, entry);
        }
      }
      frontier = next;
    }
  }
  return received;
}

/**
 * Score every record against the keywords, apply structural priors and
 * graph propagation, and rank by score descending then path ascending.
 */
export function scoreFiles(
  records: readonly FileRecord[],
  keywords: KeywordSet,
  graph: DependencyGraph,
  options: ScoreOptions = {}
): ScoredFile[] {
  const hops = Math.max(0, Math.floor(options.hops ?? DEFAULT_PROPAGATION_HOPS));

  const direct = new Map<string, MatchReason[]>();
  const relevance = new Map<string, number>();
  for (const record of records) {
    const reasons = directSignals(record, keywords, record.content?.toLowerCase());
    direct.set(record.path, reasons);
    relevance.set(record.path, sum(reasons));
  }

  const priors = new Map(records.map(r => [r.path, priorSignals(r)] as const));
  const received = propagate(relevance, graph, hops);

  // Files reached only through the graph must rank below every direct match
  let lowestDirect = Infinity;
  for (const record of records) {
    const value = relevance.get(record.path) ?? 0;
    if (value > 0) {
      lowestDirect = Math.min(lowestDirect, value + sum(priors.get(record.path) ?? []));
    }
  }

  const scored = records.map((record): ScoredFile => {
    const ownRelevance = relevance.get(record.path) ?? 0;
    const priorReasons = priors.get(record.path) ?? [];
    const priorScore = sum(priorReasons);
    const reasons = [...(direct.get(record.path) ?? []), ...priorReasons];

    let boost = received.get(record.path)?.boost ?? 0;
    if (boost > 0 && ownRelevance === 0 && Number.isFinite(lowestDirect)) {
      boost = Math.min(boost, Math.max(0, PROPAGATION_CAP_RATIO * lowestDirect - priorScore));
    }
    const propagation = received.get(record.path);
    if (boost > 0 && propagation) {
      reasons.push({ signal: 'propagation', source: propagation.source, contribution: boost });
    }

    return {
      record,
      score: ownRelevance + priorScore + boost,
      relevance: ownRelevance + boost,
      matchReasons: reasons,
    };
  });

  return scored.sort((a, b) => b.score - a.score || comparePaths(a.record.path, b.record.path));
}
