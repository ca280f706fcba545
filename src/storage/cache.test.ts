import { describe, it, expect } from 'vitest';
import { ContextCache, type CacheKey } from './cache.js';
import type { ContextBundle } from '../types/context.js';

function bundle(treeVersion: string, marker = 'a.ts'): ContextBundle {
  return {
    files: [{ path: marker, language: 'typescript', content: 'x', score: 1, estimatedTokens: 1, truncated: false }],
    configFiles: [],
    totalTokensEstimated: 1,
    filesConsideredCount: 1,
    filesDiscoveredCount: 1,
    partial: false,
    skipped: [],
    treeVersion,
    createdAt: '2024-01-01T00:00:00.000Z',
  };
}

function key(promptHash: string, treeVersion = 'v1', repositoryIdentity = '/repo'): CacheKey {
  return { repositoryIdentity, treeVersion, promptHash };
}

describe('ContextCache', () => {
  it('should return what was stored under the same key', () => {
    const cache = new ContextCache();
    const stored = bundle('v1');
    cache.put(key('p1'), stored);

    expect(cache.get(key('p1'))).toBe(stored);
    expect(cache.get(key('p2'))).toBeUndefined();
    expect(cache.stats()).toMatchObject({ count: 1, hits: 1, misses: 1 });
  });

  it('should keep repositories apart', () => {
    const cache = new ContextCache();
    cache.put(key('p1', 'v1', '/one'), bundle('v1', 'one.ts'));
    cache.put(key('p1', 'v1', '/two'), bundle('v1', 'two.ts'));

    expect(cache.get(key('p1', 'v1', '/one'))?.files[0]?.path).toBe('one.ts');
    expect(cache.get(key('p1', 'v1', '/two'))?.files[0]?.path).toBe('two.ts');
  });

  it('should drop a slot computed for another tree version', () => {
    const cache = new ContextCache();
    cache.put(key('p1', 'v1'), bundle('v1'));

    expect(cache.get(key('p1', 'v2'))).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should replace the slot when the same prompt is stored for a newer tree', () => {
    const cache = new ContextCache();
    cache.put(key('p1', 'v1'), bundle('v1'));
    cache.put(key('p1', 'v2'), bundle('v2'));

    expect(cache.size).toBe(1);
    expect(cache.get(key('p1', 'v2'))?.treeVersion).toBe('v2');
  });

  it('should evict the least recently used entry beyond capacity', () => {
    const cache = new ContextCache({ capacity: 2 });
    cache.put(key('p1'), bundle('v1'));
    cache.put(key('p2'), bundle('v1'));
    cache.get(key('p1'));
    cache.put(key('p3'), bundle('v1'));

    expect(cache.get(key('p2'))).toBeUndefined();
    expect(cache.get(key('p1'))).toBeDefined();
    expect(cache.get(key('p3'))).toBeDefined();
    expect(cache.stats().evictions).toBe(1);
  });

  it('should expire entries after the TTL', () => {
    let now = 0;
    const cache = new ContextCache({ ttlMs: 1000, now: () => now });
    cache.put(key('p1'), bundle('v1'));

    now = 999;
    expect(cache.get(key('p1'))).toBeDefined();
    now = 1000;
    expect(cache.get(key('p1'))).toBeUndefined();
  });

  it('should prune expired entries', () => {
    let now = 0;
    const cache = new ContextCache({ ttlMs: 100, now: () => now });
    cache.put(key('p1'), bundle('v1'));
    now = 50;
    cache.put(key('p2'), bundle('v1'));
    now = 120;

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
  });

  it('should invalidate stale versions of one repository only', () => {
    const cache = new ContextCache();
    cache.put(key('p1', 'v1', '/one'), bundle('v1'));
    cache.put(key('p2', 'v2', '/one'), bundle('v2'));
    cache.put(key('p1', 'v1', '/two'), bundle('v1'));

    expect(cache.invalidate('/one', 'v2')).toBe(1);
    expect(cache.size).toBe(2);
  });

  describe('getOrCompute', () => {
    it('should compute on a miss and serve the stored bundle afterwards', async () => {
      const cache = new ContextCache();
      let calls = 0;
      const compute = async (): Promise<ContextBundle> => {
        calls++;
        return bundle('v1');
      };

      const first = await cache.getOrCompute(key('p1'), compute);
      const second = await cache.getOrCompute(key('p1'), compute);

      expect(first.hit).toBe(false);
      expect(second.hit).toBe(true);
      expect(second.bundle).toBe(first.bundle);
      expect(calls).toBe(1);
    });

    it('should share one computation between concurrent callers', async () => {
      const cache = new ContextCache();
      let calls = 0;
      let release: (value: ContextBundle) => void = () => undefined;
      const compute = (): Promise<ContextBundle> => {
        calls++;
        return new Promise(resolve => {
          release = resolve;
        });
      };

      const first = cache.getOrCompute(key('p1'), compute);
      const second = cache.getOrCompute(key('p1'), compute);
      release(bundle('v1'));
      const [a, b] = await Promise.all([first, second]);

      expect(calls).toBe(1);
      expect(a.bundle).toBe(b.bundle);
      expect(a.hit).toBe(false);
      expect(b.hit).toBe(true);
      expect(cache.size).toBe(1);
    });

    it('should not store a failed computation', async () => {
      const cache = new ContextCache();

      await expect(
        cache.getOrCompute(key('p1'), async () => {
          throw new Error('scan failed');
        })
      ).rejects.toThrow('scan failed');
      expect(cache.size).toBe(0);

      const retry = await cache.getOrCompute(key('p1'), async () => bundle('v1'));
      expect(retry.hit).toBe(false);
    });

    it('should hand out a partial bundle without storing it', async () => {
      const cache = new ContextCache();
      const partial: ContextBundle = { ...bundle('v1'), partial: true };

      const first = await cache.getOrCompute(key('p1'), async () => partial);
      const second = await cache.getOrCompute(key('p1'), async () => bundle('v1', 'b.ts'));

      expect(first).toEqual({ bundle: partial, hit: false });
      expect(cache.size).toBe(1);
      expect(second.hit).toBe(false);
      expect(second.bundle.files[0]?.path).toBe('b.ts');
    });
  });

  describe('snapshots', () => {
    it('should restore entries in LRU order', () => {
      const cache = new ContextCache({ capacity: 2 });
      cache.put(key('p1'), bundle('v1'));
      cache.put(key('p2'), bundle('v1'));
      cache.get(key('p1'));

      const restored = ContextCache.fromSnapshot(cache.toSnapshot(), { capacity: 2 });
      restored.put(key('p3'), bundle('v1'));

      expect(restored.get(key('p2'))).toBeUndefined();
      expect(restored.get(key('p1'))?.treeVersion).toBe('v1');
    });

    it('should skip expired entries and apply the new capacity', () => {
      let now = 0;
      const cache = new ContextCache({ now: () => now });
      cache.put(key('p1'), bundle('v1'));
      now = 10;
      cache.put(key('p2'), bundle('v1'));
      cache.put(key('p3'), bundle('v1'));

      const restored = ContextCache.fromSnapshot(cache.toSnapshot(), { ttlMs: 100, capacity: 1, now: () => 105 });

      expect(restored.size).toBe(1);
      expect(restored.get(key('p3'))).toBeDefined();
    });
  });
});
