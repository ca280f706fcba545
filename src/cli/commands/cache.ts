import { ContextCache, type CacheStats } from '../../storage/cache.js';
import { deleteCacheSnapshot, loadCacheSnapshot } from '../../storage/cache-store.js';
import { loadConfig } from '../../storage/config.js';
import { getCachePath } from '../utils/paths.js';

export type CacheAction = 'clear' | 'stats';

export interface CacheCommandResult {
  action: CacheAction;
  path: string;
  /** Live entries (stats) or entries removed (clear) */
  count: number;
  capacity: number;
  repositories: string[];
}

export function isCacheAction(value: string): value is CacheAction {
  return value === 'clear' || value === 'stats';
}

/**
 * Inspect or clear the persisted context cache.
 */
export async function runCacheCommand(action: string): Promise<CacheCommandResult> {
  if (!isCacheAction(action)) {
    throw new Error(`Unknown cache action: ${action}. Valid actions: clear, stats`);
  }

  const config = await loadConfig();
  const path = getCachePath();
  const cache = ContextCache.fromSnapshot(await loadCacheSnapshot(path), {
    capacity: config.cacheCapacity,
    ttlMs: config.cacheTtlMs,
  });
  const stats: CacheStats = cache.stats();
  const repositories = Array.from(new Set(cache.toSnapshot().entries.map(e => e.key.repositoryIdentity))).sort();

  if (action === 'clear') {
    await deleteCacheSnapshot(path);
  }
  return { action, path, count: stats.count, capacity: stats.capacity, repositories };
}

export function formatCacheResult(result: CacheCommandResult): string {
  if (result.action === 'clear') {
    return `Cleared ${result.count} cached context${result.count === 1 ? '' : 's'}`;
  }
  const lines = [`Cache: ${result.path}`, `Entries: ${result.count} / ${result.capacity}`];
  for (const repo of result.repositories) {
    lines.push(`  ${repo}`);
  }
  return lines.join('\n');
}
