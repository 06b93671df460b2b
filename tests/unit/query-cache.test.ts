import { QueryCache } from '../../src/cache/query-cache';
import { TtlCache } from '../../src/cache/ttl-cache';
import { InMemoryKeyValueStore } from '../../src/storage/kv-store';
import { CollectionQuery } from '../../src/storage/types';

// Mock logger
jest.mock('../../src/observability/logger', () => {
  const log = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn(), fatal: jest.fn() };
  const child = () => log;
  return { logger: { ...log, child }, componentLogger: child };
});

const MINUTE = 60_000;
const T0 = Date.parse('2024-03-01T08:00:00.000Z');

describe('QueryCache', () => {
  let now: number;
  let ttlCache: TtlCache;
  let queryCache: QueryCache;

  const activeMeds: CollectionQuery = {
    collection: 'medications',
    filters: [{ field: 'active', op: 'eq', value: true }],
    orderBy: [{ field: 'name' }],
  };

  beforeEach(() => {
    now = T0;
    ttlCache = new TtlCache(new InMemoryKeyValueStore(), {
      keyPrefix: 'app_cache',
      defaultTtlMs: null,
      clock: () => now,
    });
    queryCache = new QueryCache(ttlCache, { maxAttempts: 2, initialDelayMs: 0 });
  });

  describe('signature', () => {
    it('should be scoped by collection and stable across key order', () => {
      const reordered: CollectionQuery = {
        orderBy: [{ field: 'name' }],
        filters: [{ value: true, op: 'eq', field: 'active' }],
        collection: 'medications',
      };

      const signature = queryCache.signature(activeMeds);
      expect(signature).toMatch(/^query:medications:[0-9a-f]{64}$/);
      expect(queryCache.signature(reordered)).toBe(signature);
    });

    it('should differ when paging or filters differ', () => {
      const base = queryCache.signature(activeMeds);
      expect(queryCache.signature({ ...activeMeds, limit: 10 })).not.toBe(base);
      expect(
        queryCache.signature({ ...activeMeds, filters: [{ field: 'active', op: 'eq', value: false }] }),
      ).not.toBe(base);
    });
  });

  describe('cachedQuery', () => {
    it('should reuse a result within its TTL and refetch after it', async () => {
      const fetch = jest.fn().mockResolvedValueOnce(['first']).mockResolvedValueOnce(['second']);

      expect(await queryCache.cachedQuery(activeMeds, 5 * MINUTE, fetch)).toEqual(['first']);

      now = T0 + MINUTE;
      expect(await queryCache.cachedQuery(activeMeds, 5 * MINUTE, fetch)).toEqual(['first']);
      expect(fetch).toHaveBeenCalledTimes(1);

      now = T0 + 6 * MINUTE;
      expect(await queryCache.cachedQuery(activeMeds, 5 * MINUTE, fetch)).toEqual(['second']);
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('should serve an expired result when every fetch attempt fails', async () => {
      await queryCache.cachedQuery(activeMeds, MINUTE, async () => ['cached']);
      now = T0 + 2 * MINUTE;
      const failing = jest.fn().mockRejectedValue(new Error('offline'));

      expect(await queryCache.cachedQuery(activeMeds, MINUTE, failing)).toEqual(['cached']);
      expect(failing).toHaveBeenCalledTimes(2);
    });

    it('should rethrow when nothing was ever cached', async () => {
      const failing = jest.fn().mockRejectedValue(new Error('offline'));

      await expect(queryCache.cachedQuery(activeMeds, MINUTE, failing)).rejects.toThrow('offline');
    });

    it('should fetch again under forceRefresh and cache the new result', async () => {
      await queryCache.cachedQuery(activeMeds, null, async () => ['first']);

      expect(await queryCache.cachedQuery(activeMeds, null, async () => ['second'], { forceRefresh: true })).toEqual([
        'second',
      ]);
      expect(await queryCache.cachedQuery(activeMeds, null, async () => ['third'])).toEqual(['second']);
    });

    it('should stop retrying when the retry predicate refuses', async () => {
      const failing = jest.fn().mockRejectedValue(new Error('offline'));

      await expect(
        queryCache.cachedQuery(activeMeds, MINUTE, failing, { shouldRetry: () => false }),
      ).rejects.toThrow('offline');
      expect(failing).toHaveBeenCalledTimes(1);
    });

    it('should recover after a transient failure', async () => {
      const flaky = jest.fn().mockRejectedValueOnce(new Error('timeout')).mockResolvedValueOnce(['ok']);

      expect(await queryCache.cachedQuery(activeMeds, MINUTE, flaky)).toEqual(['ok']);
      expect(flaky).toHaveBeenCalledTimes(2);
    });
  });

  describe('invalidate', () => {
    it('should drop every result of one collection only', async () => {
      const doses: CollectionQuery = { collection: 'doses' };
      await queryCache.cachedQuery(activeMeds, null, async () => ['m1']);
      await queryCache.cachedQuery({ ...activeMeds, limit: 1 }, null, async () => ['m2']);
      await queryCache.cachedQuery(doses, null, async () => ['d1']);

      expect(await queryCache.invalidate('medications')).toBe(2);

      const refetch = jest.fn().mockResolvedValue(['fresh']);
      expect(await queryCache.cachedQuery(activeMeds, null, refetch)).toEqual(['fresh']);
      expect(await queryCache.cachedQuery(doses, null, refetch)).toEqual(['d1']);
      expect(refetch).toHaveBeenCalledTimes(1);
    });

    it('should not cache a result whose fetch overlapped an invalidation', async () => {
      let release: (docs: string[]) => void = () => undefined;
      const slow = new Promise<string[]>((resolve) => {
        release = resolve;
      });

      const pending = queryCache.cachedQuery(activeMeds, null, () => slow);
      await queryCache.invalidate('medications');
      release(['old']);
      expect(await pending).toEqual(['old']);

      const refetch = jest.fn().mockResolvedValue(['new']);
      expect(await queryCache.cachedQuery(activeMeds, null, refetch)).toEqual(['new']);
      expect(refetch).toHaveBeenCalledTimes(1);
    });
  });
});
