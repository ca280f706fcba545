import { readFile, writeFile, mkdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { isNodeError } from '../core/errors.js';
import { LANGUAGES, type Language } from '../core/languages.js';
import type { CacheEntry, CacheSnapshot } from './cache.js';
import type { ContextBundle } from '../types/context.js';

const LANGUAGE_IDS: ReadonlySet<string> = new Set<string>([...LANGUAGES.map(l => l.id), 'unknown']);

const LanguageSchema = z.string().refine((value): value is Language => LANGUAGE_IDS.has(value), {
  message: 'Unknown language',
});

const BundleFileSchema = z.object({
  path: z.string(),
  language: LanguageSchema,
  content: z.string(),
  score: z.number(),
  estimatedTokens: z.number(),
  truncated: z.boolean(),
});

const ConfigExcerptSchema = z.object({
  path: z.string(),
  content: z.string(),
  estimatedTokens: z.number(),
  truncated: z.boolean(),
});

const ContextBundleSchema = z.object({
  files: z.array(BundleFileSchema),
  configFiles: z.array(ConfigExcerptSchema),
  totalTokensEstimated: z.number(),
  filesConsideredCount: z.number(),
  filesDiscoveredCount: z.number(),
  partial: z.boolean(),
  skipped: z.array(
    z.object({
      path: z.string(),
      reason: z.enum(['too-large', 'binary', 'unreadable', 'outside-root']),
    })
  ),
  treeVersion: z.string(),
  createdAt: z.string(),
});

export const CacheEntrySchema = z.object({
  key: z.object({
    repositoryIdentity: z.string(),
    treeVersion: z.string(),
    promptHash: z.string(),
  }),
  bundle: ContextBundleSchema,
  createdAt: z.number(),
  lastAccessedAt: z.number(),
});

/** Entries are checked one by one so a single bad entry does not discard the rest */
export const CacheSnapshotSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.unknown()),
});

function freezeBundle(bundle: z.infer<typeof ContextBundleSchema>): ContextBundle {
  return Object.freeze({
    ...bundle,
    files: Object.freeze(bundle.files.map(file => Object.freeze(file))),
    configFiles: Object.freeze(bundle.configFiles.map(excerpt => Object.freeze(excerpt))),
    skipped: Object.freeze(bundle.skipped),
  });
}

/**
 * Validate parsed JSON as a cache snapshot. Malformed entries are dropped.
 */
export function parseCacheSnapshot(value: unknown): CacheSnapshot {
  const snapshot = CacheSnapshotSchema.safeParse(value);
  if (!snapshot.success) {
    return { version: 1, entries: [] };
  }

  const entries: CacheEntry[] = [];
  for (const raw of snapshot.data.entries) {
    const entry = CacheEntrySchema.safeParse(raw);
    if (entry.success) {
      entries.push({ ...entry.data, bundle: freezeBundle(entry.data.bundle) });
    }
  }
  return { version: 1, entries };
}

/**
 * Load a persisted snapshot. A missing or corrupt file yields an empty snapshot.
 */
export async function loadCacheSnapshot(filePath: string): Promise<CacheSnapshot> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return { version: 1, entries: [] };
    }
    throw error;
  }

  try {
    return parseCacheSnapshot(JSON.parse(content));
  } catch {
    return { version: 1, entries: [] };
  }
}

export async function saveCacheSnapshot(filePath: string, snapshot: CacheSnapshot): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(snapshot), 'utf-8');
}

export async function deleteCacheSnapshot(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}
