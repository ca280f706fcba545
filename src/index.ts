// Core exports
export { buildContext, requestSignature, type ContextRequest, type ContextBuilderDeps } from './core/context-builder.js';
export { scanTree, loadContents, shouldExclude, isBinaryFile, DEFAULT_EXCLUDES, DEFAULT_SECRET_EXCLUDES, type ScanOptions, type ScanResult, type LoadResult } from './core/walker.js';
export { extractKeywords, keywordSignature, normalizePrompt, KEYWORD_WEIGHTS, MAX_KEYWORDS } from './core/keywords.js';
export { DependencyGraph, buildDependencyGraph, type DependencyGraphOptions, type DependencyGraphResult } from './core/deps/dependency-graph.js';
export { ImportRuleRegistry, IMPORT_RULES, type ImportRule, type ImportGroup, type ResolveContext } from './core/deps/import-rules.js';
export { FileIndex } from './core/deps/file-index.js';
export { scoreFiles, type ScoreOptions } from './core/scorer.js';
export { selectFiles, MIN_PARTIAL_FRACTION, type Selection, type SelectOptions } from './core/selector.js';
export { estimateTokens, truncateAtLineBoundary } from './core/tokens.js';
export { formatContextForPrompt } from './core/prompt-format.js';
export { collectConfigExcerpts, CONFIG_FILE_NAMES, DEFAULT_CONFIG_EXCERPT_CHARS, type ExcerptOptions, type Excerpts } from './core/config-excerpts.js';
export { createDeadline, runPool, NO_DEADLINE, type Deadline } from './core/concurrency.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './core/logger.js';
export { ScanError, type ScanErrorCode } from './core/errors.js';
export { hashContent, hashPrompt, createCacheKey, fingerprintTree } from './core/hash.js';
export { LANGUAGES, languageForExtension, type Language } from './core/languages.js';

// Storage exports
export { loadConfig, saveConfig, getConfigValue, setConfigValue, parseConfig, withConfigValue, DEFAULT_CONFIG, RepoctxConfigSchema, type RepoctxConfig } from './storage/config.js';
export { ContextCache, type CacheKey, type CacheEntry, type CacheSnapshot, type CacheStats, type ContextCacheOptions } from './storage/cache.js';
export { loadCacheSnapshot, saveCacheSnapshot, parseCacheSnapshot, CacheSnapshotSchema } from './storage/cache-store.js';

// CLI utilities
export { getRepoctxHome, getConfigPath, getCachePath } from './cli/utils/paths.js';

export type * from './types/context.js';
