import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getConfigPath } from '../cli/utils/paths.js';
import { DEFAULT_CONFIG_EXCERPT_CHARS } from '../core/config-excerpts.js';
import { isNodeError } from '../core/errors.js';
import {
  DEFAULT_EXCLUDES,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_SCAN_CONCURRENCY,
  DEFAULT_SECRET_EXCLUDES,
} from '../core/walker.js';
import { DEFAULT_PROPAGATION_HOPS } from '../core/scorer.js';
import { DEFAULT_CACHE_CAPACITY, DEFAULT_CACHE_TTL_MS } from './cache.js';

const count = z.number().int().positive();
const allowZero = z.number().int().nonnegative();
const patterns = z.array(z.string());

/**
 * Configuration schema for repoctx. Every field has a default, so `{}` parses.
 */
export const RepoctxConfigSchema = z.object({
  /** Token budget of one context bundle */
  maxTokens: count.default(15000),
  /** Maximum number of files in one bundle */
  maxFiles: count.default(20),
  /** Per-file character cap, applied on a line boundary */
  maxCharsPerFile: count.default(10000),
  /** Directories deeper than this are not scanned */
  maxDepth: count.default(DEFAULT_MAX_DEPTH),
  /** Files larger than this (bytes) are skipped */
  maxFileSize: count.default(DEFAULT_MAX_FILE_SIZE),
  /** Files probed or read in parallel */
  concurrency: count.default(DEFAULT_SCAN_CONCURRENCY),
  /** Bundles kept in the context cache */
  cacheCapacity: count.default(DEFAULT_CACHE_CAPACITY),
  /** Lifetime of a cached bundle in milliseconds */
  cacheTtlMs: allowZero.default(DEFAULT_CACHE_TTL_MS),
  /** Wall-clock limit for one request in milliseconds */
  timeoutMs: count.default(30000),
  /** Import-graph hops relevance spreads across */
  propagationHops: allowZero.default(DEFAULT_PROPAGATION_HOPS),
  /** Characters kept from each root project file; 0 leaves them out */
  configExcerptChars: allowZero.default(DEFAULT_CONFIG_EXCERPT_CHARS),
  /** Patterns to exclude from scanning */
  excludes: patterns.default(() => [...DEFAULT_EXCLUDES]),
  /** Patterns for secret files to exclude */
  secretExcludes: patterns.default(() => [...DEFAULT_SECRET_EXCLUDES]),
});

export type RepoctxConfig = z.infer<typeof RepoctxConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RepoctxConfig = RepoctxConfigSchema.parse({});

export type ConfigKey = keyof RepoctxConfig;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(RepoctxConfigSchema.shape, key);
}

export function isNumericKey(key: ConfigKey): boolean {
  return typeof DEFAULT_CONFIG[key] === 'number';
}

const StoredObject = z.record(z.unknown());

/**
 * Validate parsed JSON against the schema. Fields that fail validation fall
 * back to their defaults; the rest are kept. Anything but an object yields the defaults.
 */
export function parseConfig(parsed: unknown): RepoctxConfig {
  const result = RepoctxConfigSchema.safeParse(parsed);
  if (result.success) {
    return result.data;
  }

  const stored = StoredObject.safeParse(parsed);
  if (!stored.success) {
    return RepoctxConfigSchema.parse({});
  }
  const invalid = new Set(result.error.issues.map(issue => String(issue.path[0])));
  const valid = Object.fromEntries(Object.entries(stored.data).filter(([key]) => !invalid.has(key)));
  return RepoctxConfigSchema.parse(valid);
}

/**
 * Apply one changed field to a config, rejecting a value the schema does not accept.
 */
export function withConfigValue(config: RepoctxConfig, key: ConfigKey, value: unknown): RepoctxConfig | undefined {
  const result = RepoctxConfigSchema.safeParse({ ...config, [key]: value });
  return result.success ? result.data : undefined;
}

/**
 * Load configuration from file, merging with defaults.
 */
export async function loadConfig(): Promise<RepoctxConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return parseConfig({});
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    // A corrupt file behaves like an empty one
    parsed = undefined;
  }
  return parseConfig(parsed);
}

/**
 * Save configuration to file.
 */
export async function saveConfig(config: RepoctxConfig): Promise<void> {
  const configPath = getConfigPath();
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2), 'utf-8');
}

/**
 * Get a specific configuration value.
 */
export async function getConfigValue<K extends ConfigKey>(key: K): Promise<RepoctxConfig[K]> {
  const config = await loadConfig();
  return config[key];
}

/**
 * Set a specific configuration value.
 */
export async function setConfigValue<K extends ConfigKey>(key: K, value: RepoctxConfig[K]): Promise<void> {
  const config = await loadConfig();
  config[key] = value;
  await saveConfig(config);
}
