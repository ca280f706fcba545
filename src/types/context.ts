import type { Language } from '../core/languages.js';

/**
 * A file discovered by the tree scanner.
 */
export interface FileRecord {
  /** Path relative to the scan root, POSIX separators, never contains `..` */
  path: string;
  /** Absolute path on disk */
  absolutePath: string;
  language: Language;
  sizeBytes: number;
  /** Number of path segments (files directly under root have depth 1) */
  depth: number;
  /** Last modification time in epoch milliseconds */
  modifiedAt: number;
  /** Loaded lazily; cleared once the bundle has been assembled */
  content?: string;
}

/**
 * Why a file was left out of a scan.
 */
export type SkipReason = 'too-large' | 'binary' | 'unreadable' | 'outside-root';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

/**
 * How a keyword was derived from the prompt.
 */
export type KeywordKind = 'term' | 'identifier' | 'subtoken' | 'language' | 'filename' | 'phrase';

export interface Keyword {
  /** Lower-cased term */
  term: string;
  weight: number;
  kind: KeywordKind;
}

/**
 * Weighted terms derived from a task prompt.
 * Ordered by descending weight, then ascending term.
 */
export interface KeywordSet {
  readonly keywords: readonly Keyword[];
  /** Languages the prompt named explicitly */
  readonly languages: readonly Language[];
}

/**
 * A scoring signal that contributed to a file's score.
 */
export type MatchSignal =
  | 'path'
  | 'filename'
  | 'content'
  | 'language'
  | 'depth'
  | 'entry-point'
  | 'manifest'
  | 'propagation';

export interface MatchReason {
  signal: MatchSignal;
  /** Keyword or neighbor path responsible, when there is one */
  source?: string;
  contribution: number;
}

export interface ScoredFile {
  record: FileRecord;
  score: number;
  /** Keyword, language and propagated contributions (priors excluded) */
  relevance: number;
  matchReasons: MatchReason[];
}

/**
 * Hard ceilings for one context request.
 */
export interface ContextBudget {
  readonly maxTokens: number;
  readonly maxFiles: number;
  readonly maxCharsPerFile: number;
  readonly maxDepth: number;
}

export interface BundleFile {
  readonly path: string;
  readonly language: Language;
  readonly content: string;
  readonly score: number;
  readonly estimatedTokens: number;
  /** Content was cut at a line boundary to fit the budget */
  readonly truncated: boolean;
}

/**
 * Head of a root-level project file (manifest, README, Dockerfile, ...) included
 * for orientation whether or not the file ranked.
 */
export interface ConfigExcerpt {
  readonly path: string;
  readonly content: string;
  readonly estimatedTokens: number;
  readonly truncated: boolean;
}

/**
 * The engine's output: selected files in selection order.
 */
export interface ContextBundle {
  readonly files: readonly BundleFile[];
  /** Root project files not among `files`, filled from the budget the files left over */
  readonly configFiles: readonly ConfigExcerpt[];
  /** Files and config excerpts together */
  readonly totalTokensEstimated: number;
  /** Ranked candidates the selector examined before stopping */
  readonly filesConsideredCount: number;
  /** Files the scanner accepted before any deadline cut the scan short */
  readonly filesDiscoveredCount: number;
  /** Set when a timeout or read failure degraded the result */
  readonly partial: boolean;
  readonly skipped: readonly SkippedFile[];
  readonly treeVersion: string;
  readonly createdAt: string;
}
