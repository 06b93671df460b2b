import { createKeyValueStore } from '../../src/storage/kv-store';
import { createRemoteStore } from '../../src/storage/remote-store';
import { KvRedisClient, RemoteDocument, RemoteRedisClient } from '../../src/storage/types';
import { TtlCache } from '../../src/cache/ttl-cache';
import { CacheIOError, PreconditionFailedError, RemoteUnavailableError } from '../../src/core/errors';

// Mock logger
jest.mock('../../src/observability/logger', () => {
  const log = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn(), fatal: jest.fn() };
  const child = () => log;
  return { logger: { ...log, child }, componentLogger: child };
});

/** String-only key space, the way Redis stores every value */
class FakeRedis implements KvRedisClient, RemoteRedisClient {
  readonly data = new Map<string, string>();
  readonly sets = new Map<string, Set<string>>();
  readonly evalCalls: Array<(string | number)[]> = [];
  evalReply: string | null = null;
  failing = false;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.check();
    this.data.set(key, value);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.check();
    let removed = 0;
    for (const key of keys) {
      if (this.data.delete(key) || this.sets.delete(key)) removed++;
    }
    return removed;
  }

  async exists(key: string): Promise<number> {
    this.check();
    return this.data.has(key) ? 1 : 0;
  }

  async scan(
    cursor: string,
    _matchToken: 'MATCH',
    pattern: string,
    _countToken: 'COUNT',
    count: number,
  ): Promise<[cursor: string, elements: string[]]> {
    this.check();
    const prefix = pattern.replace(/\*$/, '');
    const keys = [...this.data.keys()].filter((k) => k.startsWith(prefix));
    const start = Number(cursor);
    const next = start + count >= keys.length ? '0' : String(start + count);
    return [next, keys.slice(start, start + count)];
  }

  async smembers(key: string): Promise<string[]> {
    this.check();
    return [...(this.sets.get(key) ?? [])];
  }

  async mget(...keys: string[]): Promise<(string | null)[]> {
    this.check();
    return keys.map((k) => this.data.get(k) ?? null);
  }

  async eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown> {
    this.check();
    this.evalCalls.push([numKeys, ...args]);
    return this.evalReply;
  }

  addDocument(prefix: string, collection: string, id: string, raw: string): void {
    this.data.set(`${prefix}doc:${collection}:${id}`, raw);
    const members = this.sets.get(`${prefix}col:${collection}`) ?? new Set<string>();
    members.add(id);
    this.sets.set(`${prefix}col:${collection}`, members);
  }

  private check(): void {
    if (this.failing) throw new Error('connection reset');
  }
}

async function collect(stream: AsyncIterable<RemoteDocument>): Promise<RemoteDocument[]> {
  const docs: RemoteDocument[] = [];
  for await (const doc of stream) docs.push(doc);
  return docs;
}

describe('Redis-backed key-value store', () => {
  let redis: FakeRedis;

  beforeEach(() => {
    redis = new FakeRedis();
  });

  it('should store typed values as text and parse them back by type', async () => {
    const kv = createKeyValueStore(redis, 'tierstore:');
    await kv.setInt('count', 42.7);
    await kv.setDouble('ratio', 0.25);
    await kv.setBool('enabled', false);
    await kv.setString('label', 'abc');

    expect(redis.data.get('tierstore:count')).toBe('42');
    expect(redis.data.get('tierstore:enabled')).toBe('false');
    expect(await kv.getInt('count')).toBe(42);
    expect(await kv.getDouble('count')).toBe(42);
    expect(await kv.getDouble('ratio')).toBe(0.25);
    expect(await kv.getInt('ratio')).toBeNull();
    expect(await kv.getBool('enabled')).toBe(false);
    expect(await kv.getInt('label')).toBeNull();
    expect(await kv.getBool('label')).toBeNull();
    expect(await kv.getString('count')).toBe('42');
  });

  it('should list, check and remove keys inside its namespace only', async () => {
    const kv = createKeyValueStore(redis, 'tierstore:');
    await kv.setString('a', '1');
    await kv.setString('b', '2');
    redis.data.set('other:c', '3');

    expect([...(await kv.getAllKeys())].sort()).toEqual(['a', 'b']);
    expect(await kv.has('a')).toBe(true);
    expect(await kv.remove('a')).toBe(true);
    expect(await kv.has('a')).toBe(false);
  });

  it('should wrap client failures in CacheIOError', async () => {
    const kv = createKeyValueStore(redis, 'tierstore:');
    redis.failing = true;

    await expect(kv.getString('a')).rejects.toBeInstanceOf(CacheIOError);
    await expect(kv.setString('a', '1')).rejects.toBeInstanceOf(CacheIOError);
    await expect(kv.getAllKeys()).rejects.toBeInstanceOf(CacheIOError);
  });

  describe('under the TTL cache', () => {
    const createCache = () =>
      new TtlCache(createKeyValueStore(redis, 'tierstore:'), { keyPrefix: 'app_cache', defaultTtlMs: null });

    it('should return values with the type they were stored as after a restart', async () => {
      const cache = createCache();
      await cache.set('num', '123');
      await cache.set('word', 'null');
      await cache.set('flag', 'true');
      await cache.set('count', 7);
      await cache.set('ratio', 0.5);
      await cache.set('enabled', false);
      await cache.set('doc', { a: 1 });

      const restarted = createCache();
      expect(await restarted.get('num')).toBe('123');
      expect(await restarted.get('word')).toBe('null');
      expect(await restarted.get('flag')).toBe('true');
      expect(await restarted.get('count')).toBe(7);
      expect(await restarted.get('ratio')).toBe(0.5);
      expect(await restarted.get('enabled')).toBe(false);
      expect(await restarted.get('doc')).toEqual({ a: 1 });
    });

    it('should agree between get and containsKey for text that looks like JSON', async () => {
      await createCache().set('word', 'null');

      const restarted = createCache();
      expect(await restarted.containsKey('word')).toBe(true);
      expect(await restarted.get('word')).not.toBeNull();
    });

    it('should decode entries stored without a recorded kind by their content', async () => {
      redis.data.set('tierstore:app_cache_expiry_times', JSON.stringify({ legacy: null }));
      redis.data.set('tierstore:app_cache_legacy', '{"a":1}');

      expect(await createCache().get('legacy')).toEqual({ a: 1 });
    });
  });
});

describe('Redis-backed remote store', () => {
  const prefix = 'docs:';
  const v1 = '2024-03-01T08:00:00.000Z';
  const v2 = '2024-03-01T09:00:00.000Z';
  let redis: FakeRedis;

  beforeEach(() => {
    redis = new FakeRedis();
  });

  it('should read one document and skip malformed ones when streaming', async () => {
    const remote = createRemoteStore(redis, prefix);
    redis.addDocument(prefix, 'medications', 'med-1', JSON.stringify({ name: 'Aspirin', lastUpdate: v1 }));
    redis.addDocument(prefix, 'medications', 'med-2', '[1,2]');

    expect(await remote.getById('medications', 'med-1')).toEqual({
      id: 'med-1',
      fields: { name: 'Aspirin', lastUpdate: v1 },
    });
    expect(await remote.getById('medications', 'missing')).toBeNull();
    expect(await collect(remote.streamCollection({ collection: 'medications' }))).toEqual([
      { id: 'med-1', fields: { name: 'Aspirin', lastUpdate: v1 } },
    ]);
  });

  it('should send the version guard of a conditional write to the script', async () => {
    const remote = createRemoteStore(redis, prefix);

    await remote.setDocument('medications', 'med-1', { name: 'Aspirin' }, { expectedVersion: v1 });
    await remote.setDocument('medications', 'med-1', { name: 'Aspirin' }, { expectedVersion: null });
    await remote.setDocument('medications', 'med-1', { name: 'Aspirin' });

    expect(redis.evalCalls).toEqual([
      [2, 'docs:doc:medications:med-1', 'docs:col:medications', '{"name":"Aspirin"}', 'version', v1, 'med-1'],
      [2, 'docs:doc:medications:med-1', 'docs:col:medications', '{"name":"Aspirin"}', 'absent', '', 'med-1'],
      [2, 'docs:doc:medications:med-1', 'docs:col:medications', '{"name":"Aspirin"}', 'any', '', 'med-1'],
    ]);
  });

  it('should raise the current document when the script rejects a write', async () => {
    const remote = createRemoteStore(redis, prefix);
    redis.evalReply = JSON.stringify({ name: 'Ibuprofen', lastUpdate: v2 });

    let error: unknown;
    try {
      await remote.setDocument('medications', 'med-1', { name: 'Aspirin' }, { expectedVersion: v1 });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(PreconditionFailedError);
    expect(error instanceof PreconditionFailedError && error.current).toEqual({
      id: 'med-1',
      fields: { name: 'Ibuprofen', lastUpdate: v2 },
    });
  });

  it('should report a vanished document as no current copy', async () => {
    const remote = createRemoteStore(redis, prefix);
    redis.evalReply = '';

    await expect(
      remote.setDocument('medications', 'med-1', { name: 'Aspirin' }, { expectedVersion: v1 }),
    ).rejects.toMatchObject({ current: null });
  });

  it('should guard deletes with the expected version', async () => {
    const remote = createRemoteStore(redis, prefix);

    await remote.deleteDocument('medications', 'med-1', { expectedVersion: v1 });
    await remote.deleteDocument('medications', 'med-2');
    expect(redis.evalCalls).toEqual([
      [2, 'docs:doc:medications:med-1', 'docs:col:medications', 'version', v1, 'med-1'],
      [2, 'docs:doc:medications:med-2', 'docs:col:medications', 'any', '', 'med-2'],
    ]);

    redis.evalReply = JSON.stringify({ name: 'Ibuprofen', lastUpdate: v2 });
    await expect(remote.deleteDocument('medications', 'med-1', { expectedVersion: v1 })).rejects.toBeInstanceOf(
      PreconditionFailedError,
    );
  });

  it('should clear every document of a collection', async () => {
    const remote = createRemoteStore(redis, prefix);
    redis.addDocument(prefix, 'doses', 'd1', '{"amount":1}');
    redis.addDocument(prefix, 'doses', 'd2', '{"amount":2}');
    redis.addDocument(prefix, 'medications', 'm1', '{"name":"Aspirin"}');

    expect(await remote.clearCollection('doses')).toBe(2);
    expect(await collect(remote.streamCollection({ collection: 'doses' }))).toEqual([]);
    expect(await remote.getById('medications', 'm1')).not.toBeNull();
  });

  it('should turn client failures into RemoteUnavailableError', async () => {
    const remote = createRemoteStore(redis, prefix);
    redis.failing = true;

    await expect(remote.getById('medications', 'med-1')).rejects.toBeInstanceOf(RemoteUnavailableError);
    await expect(remote.deleteDocument('medications', 'med-1')).rejects.toBeInstanceOf(RemoteUnavailableError);
  });
});
