/**
 * Remote Document Store
 *
 * The authoritative copy of every record, shared by all clients.
 * Redis-backed (one JSON document per key plus a per-collection id set)
 * with an in-process implementation for single-node runs and tests.
 *
 * Conditional writes compare the stored `lastUpdate` with the caller's
 * expected version atomically (Lua on Redis).
 */

import { FieldMap, TIMESTAMP_FIELD } from '../core/types';
import { getTimestamp, parseFieldMap } from '../core/field-map';
import { PreconditionFailedError, RemoteUnavailableError, StoreError } from '../core/errors';
import { logger } from '../observability/logger';
import { applyQuery } from './query-filter';
import { CollectionQuery, RemoteDocument, RemoteRedisClient, RemoteStore, RemoteWriteOptions } from './types';

// Returns nil on success; otherwise the current document JSON ('' when absent)
const CONDITIONAL_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
local mode = ARGV[2]
if mode == 'absent' then
  if current then return current end
elseif mode == 'version' then
  if not current then return '' end
  local doc = cjson.decode(current)
  if doc['${TIMESTAMP_FIELD}'] ~= ARGV[3] then return current end
end
redis.call('SET', KEYS[1], ARGV[1])
redis.call('SADD', KEYS[2], ARGV[4])
return false
`;

// A missing document counts as deleted. Returns nil on success, else the current JSON
const CONDITIONAL_DELETE_SCRIPT = `
local current = redis.call('GET', KEYS[1])
local mode = ARGV[1]
if current and mode == 'absent' then return current end
if current and mode == 'version' then
  local doc = cjson.decode(current)
  if doc['${TIMESTAMP_FIELD}'] ~= ARGV[2] then return current end
end
redis.call('DEL', KEYS[1])
redis.call('SREM', KEYS[2], ARGV[3])
return false
`;

const FETCH_BATCH = 200;

type WriteMode = 'any' | 'absent' | 'version';

function writeMode(options?: RemoteWriteOptions): WriteMode {
  if (options?.expectedVersion === undefined) return 'any';
  return options.expectedVersion === null ? 'absent' : 'version';
}

function violates(mode: WriteMode, current: FieldMap | undefined, expected: string | null | undefined): boolean {
  if (mode === 'absent') return current !== undefined;
  if (mode === 'version') return current === undefined || getTimestamp(current) !== expected;
  return false;
}

// ───── Redis Implementation ─────────────────────────────────────

class RedisRemoteStore implements RemoteStore {
  private readonly log = logger.child({ component: 'remote-redis' });

  constructor(
    private readonly redis: RemoteRedisClient,
    private readonly prefix: string,
  ) {}

  async getById(collection: string, id: string): Promise<RemoteDocument | null> {
    const raw = await this.call('get', () => this.redis.get(this.docKey(collection, id)));
    if (raw === null) return null;
    return this.decode(collection, id, raw);
  }

  async *streamCollection(query: CollectionQuery): AsyncIterable<RemoteDocument> {
    const { collection } = query;
    const ids = await this.call('members', () => this.redis.smembers(this.collectionKey(collection)));
    const documents: RemoteDocument[] = [];

    for (let i = 0; i < ids.length; i += FETCH_BATCH) {
      const batch = ids.slice(i, i + FETCH_BATCH);
      const values = await this.call('mget', () => this.redis.mget(...batch.map((id) => this.docKey(collection, id))));
      values.forEach((raw, index) => {
        if (raw === null) return;
        const doc = this.decode(collection, batch[index], raw);
        if (doc) documents.push(doc);
      });
    }

    for (const doc of applyQuery(documents, query)) {
      yield doc;
    }
  }

  async setDocument(collection: string, id: string, fields: FieldMap, options?: RemoteWriteOptions): Promise<void> {
    const result: unknown = await this.call('set', () =>
      this.redis.eval(
        CONDITIONAL_SET_SCRIPT,
        2,
        this.docKey(collection, id),
        this.collectionKey(collection),
        JSON.stringify(fields),
        writeMode(options),
        options?.expectedVersion ?? '',
        id,
      ),
    );

    this.rejectOnConflict(collection, id, result);
  }

  async deleteDocument(collection: string, id: string, options?: RemoteWriteOptions): Promise<void> {
    const result: unknown = await this.call('delete', () =>
      this.redis.eval(
        CONDITIONAL_DELETE_SCRIPT,
        2,
        this.docKey(collection, id),
        this.collectionKey(collection),
        writeMode(options),
        options?.expectedVersion ?? '',
        id,
      ),
    );
    this.rejectOnConflict(collection, id, result);
  }

  async clearCollection(collection: string): Promise<number> {
    const ids = await this.call('members', () => this.redis.smembers(this.collectionKey(collection)));
    for (let i = 0; i < ids.length; i += FETCH_BATCH) {
      const keys = ids.slice(i, i + FETCH_BATCH).map((id) => this.docKey(collection, id));
      await this.call('clear', () => this.redis.del(...keys));
    }
    await this.call('clear', () => this.redis.del(this.collectionKey(collection)));
    return ids.length;
  }

  private rejectOnConflict(collection: string, id: string, result: unknown): void {
    if (typeof result !== 'string') return;
    const current = result === '' ? null : this.decode(collection, id, result);
    throw new PreconditionFailedError(collection, id, current);
  }

  private decode(collection: string, id: string, raw: string): RemoteDocument | null {
    const fields = parseFieldMap(raw);
    if (!fields) {
      this.log.warn({ collection, id }, 'Skipping malformed remote document');
      return null;
    }
    return { id, fields };
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new RemoteUnavailableError(`Remote ${operation} failed`, { cause: err });
    }
  }

  private docKey(collection: string, id: string): string {
    return `${this.prefix}doc:${collection}:${id}`;
  }

  private collectionKey(collection: string): string {
    return `${this.prefix}col:${collection}`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryRemoteStore implements RemoteStore {
  private readonly collections = new Map<string, Map<string, FieldMap>>();
  private available = true;

  /** Simulate an outage: every call rejects with RemoteUnavailableError while false */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  async getById(collection: string, id: string): Promise<RemoteDocument | null> {
    this.assertAvailable();
    const fields = this.collections.get(collection)?.get(id);
    return fields ? { id, fields: structuredClone(fields) } : null;
  }

  async *streamCollection(query: CollectionQuery): AsyncIterable<RemoteDocument> {
    this.assertAvailable();
    const docs = [...(this.collections.get(query.collection) ?? new Map<string, FieldMap>()).entries()].map(
      ([id, fields]) => ({ id, fields: structuredClone(fields) }),
    );
    for (const doc of applyQuery(docs, query)) {
      yield doc;
    }
  }

  async setDocument(collection: string, id: string, fields: FieldMap, options?: RemoteWriteOptions): Promise<void> {
    this.assertAvailable();
    const docs = this.collection(collection);
    const current = docs.get(id);

    if (violates(writeMode(options), current, options?.expectedVersion)) {
      throw new PreconditionFailedError(
        collection,
        id,
        current ? { id, fields: structuredClone(current) } : null,
      );
    }
    docs.set(id, structuredClone(fields));
  }

  async deleteDocument(collection: string, id: string, options?: RemoteWriteOptions): Promise<void> {
    this.assertAvailable();
    const docs = this.collections.get(collection);
    const current = docs?.get(id);
    if (current === undefined) return;
    if (violates(writeMode(options), current, options?.expectedVersion)) {
      throw new PreconditionFailedError(collection, id, { id, fields: structuredClone(current) });
    }
    docs?.delete(id);
  }

  async clearCollection(collection: string): Promise<number> {
    this.assertAvailable();
    const count = this.collections.get(collection)?.size ?? 0;
    this.collections.delete(collection);
    return count;
  }

  private collection(name: string): Map<string, FieldMap> {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = new Map();
      this.collections.set(name, docs);
    }
    return docs;
  }

  private assertAvailable(): void {
    if (!this.available) throw new RemoteUnavailableError('Remote store is offline');
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createRemoteStore(redis: RemoteRedisClient | undefined, prefix: string): RemoteStore {
  if (redis) {
    logger.info({ prefix }, 'Remote store: Redis-backed');
    return new RedisRemoteStore(redis, prefix);
  }
  logger.info('Remote store: In-memory');
  return new InMemoryRemoteStore();
}
