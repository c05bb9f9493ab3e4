import { describe, it, expect, vi } from 'vitest';
import { QueryCache } from '../db/query-cache';

function clock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('QueryCache', () => {
  it('should return stored values until they expire', () => {
    const time = clock();
    const cache = new QueryCache<string>(60, time.now);

    cache.set('a', 'value');
    time.advance(59_999);
    expect(cache.get('a')).toBe('value');
    time.advance(1);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should not store anything with a zero TTL', () => {
    const cache = new QueryCache<number>(0);
    cache.set('a', 1);
    expect(cache.get('a')).toBeUndefined();
  });

  describe('getOrLoad', () => {
    it('should load once and serve later calls from the cache', async () => {
      const cache = new QueryCache<number>(60, clock().now);
      const load = vi.fn().mockResolvedValue(42);

      expect(await cache.getOrLoad('k', load)).toBe(42);
      expect(await cache.getOrLoad('k', load)).toBe(42);
      expect(load).toHaveBeenCalledTimes(1);
    });

    it('should share one pending load between concurrent callers', async () => {
      const cache = new QueryCache<number>(60, clock().now);
      const load = vi.fn().mockResolvedValue(7);

      const results = await Promise.all([cache.getOrLoad('k', load), cache.getOrLoad('k', load)]);
      expect(results).toEqual([7, 7]);
      expect(load).toHaveBeenCalledTimes(1);
    });

    it('should reload after expiry', async () => {
      const time = clock();
      const cache = new QueryCache<number>(1, time.now);
      const load = vi.fn().mockResolvedValueOnce(1).mockResolvedValueOnce(2);

      expect(await cache.getOrLoad('k', load)).toBe(1);
      time.advance(1000);
      expect(await cache.getOrLoad('k', load)).toBe(2);
    });

    it('should not cache failures', async () => {
      const cache = new QueryCache<number>(60, clock().now);
      const load = vi.fn().mockRejectedValueOnce(new Error('offline')).mockResolvedValueOnce(3);

      await expect(cache.getOrLoad('k', load)).rejects.toThrow('offline');
      expect(await cache.getOrLoad('k', load)).toBe(3);
    });
  });

  describe('invalidation', () => {
    it('should drop single keys, prefixes or everything', () => {
      const cache = new QueryCache<number>(60, clock().now);
      cache.set('sessions:p1', 1);
      cache.set('sessions:p2', 2);
      cache.set('points:s1', 3);

      cache.invalidate('sessions:p1');
      expect(cache.get('sessions:p1')).toBeUndefined();
      expect(cache.get('sessions:p2')).toBe(2);

      cache.invalidatePrefix('sessions:');
      expect(cache.get('sessions:p2')).toBeUndefined();
      expect(cache.get('points:s1')).toBe(3);

      cache.clear();
      expect(cache.size).toBe(0);
    });

    it('should not store a load that was running when the key was invalidated', async () => {
      const cache = new QueryCache<string>(60, clock().now);
      let finish: (value: string) => void = () => undefined;
      const slow = cache.getOrLoad('k', () => new Promise<string>((resolve) => (finish = resolve)));

      cache.invalidate('k');
      const fresh = cache.getOrLoad('k', async () => 'fresh');
      finish('stale');

      expect(await slow).toBe('stale');
      expect(await fresh).toBe('fresh');
      expect(cache.get('k')).toBe('fresh');
    });

    it('should detach running loads on clear', async () => {
      const cache = new QueryCache<string>(60, clock().now);
      let finish: (value: string) => void = () => undefined;
      const slow = cache.getOrLoad('sessions:p1', () => new Promise<string>((resolve) => (finish = resolve)));

      cache.clear();
      finish('stale');
      await slow;

      expect(cache.get('sessions:p1')).toBeUndefined();
      expect(await cache.getOrLoad('sessions:p1', async () => 'fresh')).toBe('fresh');
    });
  });
});
