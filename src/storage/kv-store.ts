/**
 * Local Key-Value Store
 *
 * Redis-backed with in-memory fallback. Redis keeps every value as a
 * string, so the typed getters parse on the way out and return null when
 * the stored text is not of the requested type.
 */

import { KeyValueStore, KvRedisClient } from './types';
import { CacheIOError } from '../core/errors';
import { logger } from '../observability/logger';

// ───── Redis Implementation ─────────────────────────────────────

class RedisKeyValueStore implements KeyValueStore {
  private readonly log = logger.child({ component: 'kv-redis' });

  constructor(
    private readonly redis: KvRedisClient,
    private readonly namespace: string,
  ) {}

  async getString(key: string): Promise<string | null> {
    return this.read(key);
  }

  async getInt(key: string): Promise<number | null> {
    const raw = await this.read(key);
    if (raw === null || !/^-?\d+$/.test(raw)) return null;
    return parseInt(raw, 10);
  }

  async getDouble(key: string): Promise<number | null> {
    const raw = await this.read(key);
    if (raw === null || raw.trim() === '') return null;
    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
  }

  async getBool(key: string): Promise<boolean | null> {
    const raw = await this.read(key);
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    return null;
  }

  async setString(key: string, value: string): Promise<boolean> {
    return this.write(key, value);
  }

  async setInt(key: string, value: number): Promise<boolean> {
    return this.write(key, String(Math.trunc(value)));
  }

  async setDouble(key: string, value: number): Promise<boolean> {
    return this.write(key, String(value));
  }

  async setBool(key: string, value: boolean): Promise<boolean> {
    return this.write(key, value ? 'true' : 'false');
  }

  async remove(key: string): Promise<boolean> {
    try {
      await this.redis.del(this.prefixKey(key));
      return true;
    } catch (err) {
      throw new CacheIOError(`Failed to remove ${key}`, { cause: err });
    }
  }

  async has(key: string): Promise<boolean> {
    try {
      return (await this.redis.exists(this.prefixKey(key))) === 1;
    } catch (err) {
      throw new CacheIOError(`Failed to check ${key}`, { cause: err });
    }
  }

  async getAllKeys(): Promise<Set<string>> {
    const keys = new Set<string>();
    let cursor = '0';
    try {
      do {
        const [next, batch] = await this.redis.scan(cursor, 'MATCH', `${this.namespace}*`, 'COUNT', 500);
        cursor = next;
        for (const full of batch) keys.add(full.slice(this.namespace.length));
      } while (cursor !== '0');
    } catch (err) {
      throw new CacheIOError('Failed to list keys', { cause: err });
    }
    return keys;
  }

  private async read(key: string): Promise<string | null> {
    try {
      return await this.redis.get(this.prefixKey(key));
    } catch (err) {
      throw new CacheIOError(`Failed to read ${key}`, { cause: err });
    }
  }

  private async write(key: string, value: string): Promise<boolean> {
    try {
      await this.redis.set(this.prefixKey(key), value);
      return true;
    } catch (err) {
      this.log.warn({ err, key }, 'KV write error');
      throw new CacheIOError(`Failed to write ${key}`, { cause: err });
    }
  }

  private prefixKey(key: string): string {
    return `${this.namespace}${key}`;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

type MemoryValue =
  | { type: 'string'; value: string }
  | { type: 'int'; value: number }
  | { type: 'double'; value: number }
  | { type: 'bool'; value: boolean };

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly store = new Map<string, MemoryValue>();

  async getString(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    return entry?.type === 'string' ? entry.value : null;
  }

  async getInt(key: string): Promise<number | null> {
    const entry = this.store.get(key);
    return entry?.type === 'int' ? entry.value : null;
  }

  async getDouble(key: string): Promise<number | null> {
    const entry = this.store.get(key);
    if (entry?.type === 'double' || entry?.type === 'int') return entry.value;
    return null;
  }

  async getBool(key: string): Promise<boolean | null> {
    const entry = this.store.get(key);
    return entry?.type === 'bool' ? entry.value : null;
  }

  async setString(key: string, value: string): Promise<boolean> {
    this.store.set(key, { type: 'string', value });
    return true;
  }

  async setInt(key: string, value: number): Promise<boolean> {
    this.store.set(key, { type: 'int', value: Math.trunc(value) });
    return true;
  }

  async setDouble(key: string, value: number): Promise<boolean> {
    this.store.set(key, { type: 'double', value });
    return true;
  }

  async setBool(key: string, value: boolean): Promise<boolean> {
    this.store.set(key, { type: 'bool', value });
    return true;
  }

  async remove(key: string): Promise<boolean> {
    this.store.delete(key);
    return true;
  }

  async has(key: string): Promise<boolean> {
    return this.store.has(key);
  }

  async getAllKeys(): Promise<Set<string>> {
    return new Set(this.store.keys());
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createKeyValueStore(redis: KvRedisClient | undefined, namespace: string): KeyValueStore {
  if (redis) {
    logger.info({ namespace }, 'Key-value store: Redis-backed');
    return new RedisKeyValueStore(redis, namespace);
  }
  logger.info('Key-value store: In-memory');
  return new InMemoryKeyValueStore();
}
