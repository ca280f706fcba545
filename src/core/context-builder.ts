import { realpath } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ContextBudget, ContextBundle, FileRecord, KeywordSet } from '../types/context.js';
import type { ContextCache, CacheKey } from '../storage/cache.js';
import { createDeadline, type Deadline } from './concurrency.js';
import { collectConfigExcerpts, DEFAULT_CONFIG_EXCERPT_CHARS } from './config-excerpts.js';
import { buildDependencyGraph, type DependencyGraph } from './deps/dependency-graph.js';
import type { ImportRuleRegistry } from './deps/import-rules.js';
import { fingerprintTree, hashPrompt } from './hash.js';
import { extractKeywords, keywordSignature } from './keywords.js';
import { silentLogger, type Logger } from './logger.js';
import { scoreFiles } from './scorer.js';
import { selectFiles } from './selector.js';
import { loadContents, scanTree, type ScanResult } from './walker.js';

/**
 * One context request.
 */
export interface ContextRequest {
  rootPath: string;
  prompt: string;
  budget: ContextBudget;
  /** Caller-supplied version of the tree; derived from file metadata when absent */
  treeVersion?: string;
  /** Cache identity of the repository; the root's real path when absent */
  repositoryIdentity?: string;
  timeoutMs?: number;
  concurrency?: number;
  excludes?: string[];
  /** Use only `excludes`, without the built-in exclusion lists */
  noDefaultExcludes?: boolean;
  maxFileSize?: number;
  propagationHops?: number;
  /** Characters kept from each root project file; 0 leaves them out */
  configExcerptChars?: number;
}

export interface ContextBuilderDeps {
  cache?: ContextCache;
  logger?: Logger;
  registry?: ImportRuleRegistry;
  /** Overrides the deadline derived from `timeoutMs` */
  deadline?: Deadline;
  now?: () => number;
}

async function resolveIdentity(request: ContextRequest): Promise<string> {
  if (request.repositoryIdentity) {
    return request.repositoryIdentity;
  }
  try {
    return await realpath(request.rootPath);
  } catch {
    // scanTree raises the ScanError for a root that cannot be resolved
    return resolve(request.rootPath);
  }
}

/**
 * Everything besides the prompt and the tree that shapes a bundle, in a fixed order.
 * Requests that differ here must not share a cache slot.
 */
export function requestSignature(request: ContextRequest): string {
  const { budget } = request;
  return JSON.stringify([
    budget.maxTokens,
    budget.maxFiles,
    budget.maxCharsPerFile,
    budget.maxDepth,
    request.maxFileSize ?? null,
    request.propagationHops ?? null,
    request.configExcerptChars ?? null,
    request.noDefaultExcludes ?? false,
    request.excludes ?? [],
  ]);
}

/**
 * Assemble a budgeted, relevance-ranked context bundle for a prompt.
 * Only ScanError escapes; timeouts and read failures yield a partial bundle.
 */
export async function buildContext(request: ContextRequest, deps: ContextBuilderDeps = {}): Promise<ContextBundle> {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? Date.now;
  const deadline = deps.deadline ?? createDeadline(request.timeoutMs, now);

  // Extraction is independent of the tree and runs while the tree is read
  const keywordsTask = Promise.resolve().then(() => extractKeywords(request.prompt));

  const scanTask = (): Promise<ScanResult> => {
    logger.debug(`Scanning ${request.rootPath}`);
    return scanTree(request.rootPath, {
      maxDepth: request.budget.maxDepth,
      maxFileSize: request.maxFileSize,
      excludes: request.excludes,
      noDefaultExcludes: request.noDefaultExcludes,
      concurrency: request.concurrency,
      deadline,
    });
  };

  const compute = async (scan: ScanResult, treeVersion: string): Promise<ContextBundle> => {
    logger.debug(`Scanned ${scan.records.length} files (${scan.skipped.length} skipped)`);
    const [keywords, mapped] = await Promise.all([keywordsTask, loadAndMap(scan.records, request, deps, deadline)]);
    logger.debug(
      `Extracted ${keywords.keywords.length} keywords; loaded ${mapped.loaded.length} files, ${mapped.edgeCount} import edges`
    );

    const bundle = assemble(scan, mapped, keywords, request, treeVersion, now);
    for (const record of scan.records) {
      delete record.content;
    }

    if (bundle.partial) {
      logger.warn(
        `Partial context: ${bundle.filesConsideredCount} of ${bundle.filesDiscoveredCount} files considered`
      );
    }
    return bundle;
  };

  if (!deps.cache) {
    const scan = await scanTask();
    return compute(scan, request.treeVersion ?? fingerprintTree(scan.records));
  }

  const cache = deps.cache;
  const identity = await resolveIdentity(request);
  const keywords = await keywordsTask;
  const promptHash = hashPrompt(request.prompt, keywordSignature(keywords), requestSignature(request));

  let scan: ScanResult | undefined;
  let treeVersion = request.treeVersion;
  if (treeVersion === undefined) {
    scan = await scanTask();
    treeVersion = fingerprintTree(scan.records);
  }

  const key: CacheKey = { repositoryIdentity: identity, treeVersion, promptHash };
  const version = treeVersion;
  const { bundle, hit } = await cache.getOrCompute(key, async () => compute(scan ?? (await scanTask()), version));
  if (hit) {
    logger.info(`Context cache hit for ${identity} at ${treeVersion}`);
  } else if (bundle.partial) {
    logger.debug('Partial context not cached');
  }
  return bundle;
}

interface Mapped {
  loaded: FileRecord[];
  graph: DependencyGraph;
  edgeCount: number;
  partial: boolean;
}

async function loadAndMap(
  records: readonly FileRecord[],
  request: ContextRequest,
  deps: ContextBuilderDeps,
  deadline: Deadline
): Promise<Mapped> {
  const load = await loadContents(records, { concurrency: request.concurrency, deadline });
  const { graph, partial } = buildDependencyGraph(load.loaded, { registry: deps.registry, deadline });
  return {
    loaded: load.loaded,
    graph,
    edgeCount: graph.edgeCount,
    partial: load.partial || partial,
  };
}

function assemble(
  scan: ScanResult,
  mapped: Mapped,
  keywords: KeywordSet,
  request: ContextRequest,
  treeVersion: string,
  now: () => number
): ContextBundle {
  const scored = scoreFiles(mapped.loaded, keywords, mapped.graph, { hops: request.propagationHops });
  const selection = selectFiles(scored, request.budget, { keywordsPresent: keywords.keywords.length > 0 });
  const config = collectConfigExcerpts(mapped.loaded, {
    selected: new Set(selection.files.map(f => f.path)),
    remainingTokens: request.budget.maxTokens - selection.totalTokensEstimated,
    maxChars: Math.min(request.configExcerptChars ?? DEFAULT_CONFIG_EXCERPT_CHARS, request.budget.maxCharsPerFile),
  });

  return Object.freeze({
    files: Object.freeze(selection.files),
    configFiles: Object.freeze(config.excerpts),
    totalTokensEstimated: selection.totalTokensEstimated + config.tokens,
    filesConsideredCount: selection.filesConsideredCount,
    filesDiscoveredCount: scan.records.length,
    partial: scan.partial || mapped.partial,
    skipped: Object.freeze([...scan.skipped]),
    treeVersion,
    createdAt: new Date(now()).toISOString(),
  });
}
