import { createCacheKey } from '../core/hash.js';
import type { ContextBundle } from '../types/context.js';

export const DEFAULT_CACHE_CAPACITY = 10;
export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

/**
 * Identifies one computed bundle.
 */
export interface CacheKey {
  /** Canonical identity of the repository, normally its real path */
  repositoryIdentity: string;
  treeVersion: string;
  promptHash: string;
}

export interface CacheEntry {
  key: CacheKey;
  bundle: ContextBundle;
  /** Epoch milliseconds */
  createdAt: number;
  lastAccessedAt: number;
}

/**
 * Cache statistics.
 */
export interface CacheStats {
  count: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface CacheSnapshot {
  version: 1;
  /** Least recently used first */
  entries: CacheEntry[];
}

export interface ContextCacheOptions {
  capacity?: number;
  ttlMs?: number;
  now?: () => number;
}

export interface CacheLookup {
  bundle: ContextBundle;
  hit: boolean;
}

/**
 * Bounded LRU of context bundles.
 *
 * One slot per (repository, prompt). A slot holding a bundle for an older
 * tree version is dropped on lookup. All map updates run synchronously, so
 * concurrent requests on the event loop never observe a half-applied change;
 * `getOrCompute` additionally shares one in-flight computation per key.
 */
export class ContextCache {
  readonly capacity: number;
  readonly ttlMs: number;
  private readonly now: () => number;
  // Map iteration order is the LRU order: oldest first
  private readonly slots = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<ContextBundle>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ContextCacheOptions = {}) {
    this.capacity = Math.max(1, Math.floor(options.capacity ?? DEFAULT_CACHE_CAPACITY));
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  static fromSnapshot(snapshot: CacheSnapshot, options: ContextCacheOptions = {}): ContextCache {
    const cache = new ContextCache(options);
    for (const entry of snapshot.entries) {
      if (!cache.isExpired(entry)) {
        cache.slots.set(slotKey(entry.key), { ...entry, key: { ...entry.key } });
      }
    }
    cache.evict();
    return cache;
  }

  get size(): number {
    return this.slots.size;
  }

  /**
   * Return the bundle stored for `key`, or undefined.
   * An entry for a different tree version, or past its TTL, is removed.
   */
  get(key: CacheKey): ContextBundle | undefined {
    const slot = slotKey(key);
    const entry = this.slots.get(slot);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (entry.key.treeVersion !== key.treeVersion || this.isExpired(entry)) {
      this.slots.delete(slot);
      this.misses++;
      return undefined;
    }

    entry.lastAccessedAt = this.now();
    this.slots.delete(slot);
    this.slots.set(slot, entry);
    this.hits++;
    return entry.bundle;
  }

  put(key: CacheKey, bundle: ContextBundle): void {
    const slot = slotKey(key);
    const timestamp = this.now();
    this.slots.delete(slot);
    this.slots.set(slot, { key: { ...key }, bundle, createdAt: timestamp, lastAccessedAt: timestamp });
    this.evict();
  }

  /**
   * Return the cached bundle or compute, store and return a new one.
   * Concurrent callers with the same key share a single computation.
   * A failed computation is not stored and the error reaches every waiter;
   * a partial bundle reaches them too but is not stored either.
   */
  async getOrCompute(key: CacheKey, compute: () => Promise<ContextBundle>): Promise<CacheLookup> {
    const cached = this.get(key);
    if (cached) {
      return { bundle: cached, hit: true };
    }

    const flightKey = createCacheKey(key.repositoryIdentity, key.treeVersion, key.promptHash);
    const pending = this.inFlight.get(flightKey);
    if (pending) {
      return { bundle: await pending, hit: true };
    }

    const promise = compute()
      .then(bundle => {
        if (!bundle.partial) {
          this.put(key, bundle);
        }
        return bundle;
      })
      .finally(() => {
        this.inFlight.delete(flightKey);
      });
    this.inFlight.set(flightKey, promise);
    return { bundle: await promise, hit: false };
  }

  /**
   * Remove every entry of a repository that was computed for another tree version.
   */
  invalidate(repositoryIdentity: string, currentTreeVersion: string): number {
    let removed = 0;
    for (const [slot, entry] of this.slots) {
      if (entry.key.repositoryIdentity === repositoryIdentity && entry.key.treeVersion !== currentTreeVersion) {
        this.slots.delete(slot);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Remove entries past their TTL.
   */
  prune(): number {
    let removed = 0;
    for (const [slot, entry] of this.slots) {
      if (this.isExpired(entry)) {
        this.slots.delete(slot);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.slots.clear();
  }

  stats(): CacheStats {
    return {
      count: this.slots.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  toSnapshot(): CacheSnapshot {
    return {
      version: 1,
      entries: Array.from(this.slots.values(), entry => ({ ...entry, key: { ...entry.key } })),
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt >= this.ttlMs;
  }

  private evict(): void {
    for (const slot of this.slots.keys()) {
      if (this.slots.size <= this.capacity) {
        break;
      }
      this.slots.delete(slot);
      this.evictions++;
    }
  }
}

function slotKey(key: CacheKey): string {
  return `${key.repositoryIdentity}\u0000${key.promptHash}`;
}
