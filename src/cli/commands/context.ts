import { resolve } from 'node:path';
import { buildContext } from '../../core/context-builder.js';
import type { Logger } from '../../core/logger.js';
import { formatContextForPrompt } from '../../core/prompt-format.js';
import { ContextCache } from '../../storage/cache.js';
import { loadCacheSnapshot, saveCacheSnapshot } from '../../storage/cache-store.js';
import { loadConfig } from '../../storage/config.js';
import { getCachePath } from '../utils/paths.js';
import { formatContextMarkdown } from './json-formatter.js';
import type { ContextBundle } from '../../types/context.js';

export type ContextFormat = 'json' | 'markdown' | 'prompt';

/**
 * Options for the context command. Unset values come from the config file.
 */
export interface ContextCommandOptions {
  path?: string;
  maxTokens?: number;
  maxFiles?: number;
  maxChars?: number;
  maxDepth?: number;
  timeoutMs?: number;
  treeVersion?: string;
  hops?: number;
  /** Skip the persisted context cache */
  noCache?: boolean;
  logger?: Logger;
}

export interface ContextCommandResult {
  bundle: ContextBundle;
  /** Served from the persisted cache */
  cached: boolean;
}

function positive(name: string, value: number | undefined): number | undefined {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new Error(`Invalid value for ${name}: ${value}`);
  }
  return value;
}

/**
 * Run the context command to build LLM context for a task.
 */
export async function runContextCommand(task: string, options: ContextCommandOptions = {}): Promise<ContextCommandResult> {
  const config = await loadConfig();
  const rootPath = resolve(options.path ?? process.cwd());

  const request = {
    rootPath,
    prompt: task,
    budget: {
      maxTokens: positive('--max-tokens', options.maxTokens) ?? config.maxTokens,
      maxFiles: positive('--max-files', options.maxFiles) ?? config.maxFiles,
      maxCharsPerFile: positive('--max-chars', options.maxChars) ?? config.maxCharsPerFile,
      maxDepth: positive('--max-depth', options.maxDepth) ?? config.maxDepth,
    },
    treeVersion: options.treeVersion,
    timeoutMs: positive('--timeout', options.timeoutMs) ?? config.timeoutMs,
    concurrency: config.concurrency,
    excludes: [...config.excludes, ...config.secretExcludes],
    noDefaultExcludes: true,
    maxFileSize: config.maxFileSize,
    propagationHops: options.hops ?? config.propagationHops,
    configExcerptChars: config.configExcerptChars,
  };

  if (options.noCache) {
    const bundle = await buildContext(request, { logger: options.logger });
    return { bundle, cached: false };
  }

  const cachePath = getCachePath();
  const cache = ContextCache.fromSnapshot(await loadCacheSnapshot(cachePath), {
    capacity: config.cacheCapacity,
    ttlMs: config.cacheTtlMs,
  });
  const bundle = await buildContext(request, { cache, logger: options.logger });
  const cached = cache.stats().hits > 0;
  await saveCacheSnapshot(cachePath, cache.toSnapshot());
  return { bundle, cached };
}

/**
 * Render a bundle in the requested output format.
 */
export function renderContext(bundle: ContextBundle, format: ContextFormat, task: string): string {
  switch (format) {
    case 'markdown':
      return formatContextMarkdown(bundle, task);
    case 'prompt':
      return formatContextForPrompt(bundle);
    case 'json':
      return JSON.stringify(bundle, null, 2);
  }
}

export function parseContextFormat(value: string | undefined): ContextFormat {
  if (value === undefined || value === 'json' || value === 'markdown' || value === 'prompt') {
    return value ?? 'json';
  }
  throw new Error(`Unknown format: ${value}. Valid formats: json, markdown, prompt`);
}
