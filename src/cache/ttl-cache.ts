/**
 * TTL Cache
 *
 * Key-value cache over the persistent KV with per-entry expiry.
 * Reads never mutate: expired entries stay in storage until
 * `cleanExpiredEntries()` or an overwrite removes them.
 *
 * A key that has a stored value but no index entry counts as expired.
 * Each value's kind is persisted in a second side table so reads decode
 * it the way it was written, whatever the backend keeps.
 */

import type { Logger } from 'pino';
import { systemClock, Clock } from '../core/types';
import { KeyValueStore } from '../storage/types';
import { CacheIOError } from '../core/errors';
import { componentLogger } from '../observability/logger';
import { cacheHitsTotal, cacheMissesTotal, cacheWriteFailuresTotal } from '../observability/metrics';
import { CacheConfig, CacheGetOptions, CacheValueKind, ExpiryIndex, KindIndex } from './types';

const DEFAULT_MAX_MEMORY_ENTRIES = 1000;
const INDEX_SUFFIX = 'expiry_times';
const KINDS_SUFFIX = 'value_kinds';
/** Logical keys that would land on a side table */
export const RESERVED_CACHE_KEYS: readonly string[] = [INDEX_SUFFIX, KINDS_SUFFIX];

const VALUE_KINDS: readonly CacheValueKind[] = ['string', 'int', 'double', 'bool', 'json'];

function isValueKind(value: unknown): value is CacheValueKind {
  return typeof value === 'string' && (VALUE_KINDS as readonly string[]).includes(value);
}

function kindOf(value: unknown): CacheValueKind {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'double';
  return 'json';
}

export class TtlCache {
  private readonly index: ExpiryIndex = new Map();
  private readonly kinds: KindIndex = new Map();
  private readonly memory = new Map<string, unknown>();
  private readonly clock: Clock;
  private readonly name: string;
  private readonly maxMemoryEntries: number;
  private readonly log: Logger;
  private loading: Promise<void> | null = null;
  private indexWrites: Promise<void> = Promise.resolve();

  constructor(
    private readonly kv: KeyValueStore,
    private readonly config: CacheConfig,
  ) {
    this.clock = config.clock ?? systemClock;
    this.name = config.name ?? config.keyPrefix;
    this.maxMemoryEntries = config.maxMemoryEntries ?? DEFAULT_MAX_MEMORY_ENTRIES;
    this.log = componentLogger('ttl-cache', { cache: this.name });
  }

  /** Load the expiry index, then drop entries that expired while offline. */
  async initialize(): Promise<void> {
    await this.ensureLoaded();
    const removed = await this.cleanExpiredEntries();
    if (removed > 0) this.log.info({ removed }, 'Removed expired cache entries on startup');
  }

  /**
   * Store a value. `ttlMs` undefined uses the configured default,
   * null never expires. Returns false when storage fails.
   */
  async set<T>(key: string, value: T, ttlMs?: number | null): Promise<boolean> {
    if (this.isReserved(key)) {
      this.log.warn({ key }, 'Cache key is reserved');
      return false;
    }
    const fullKey = this.fullKey(key);
    const ttl = ttlMs === undefined ? this.config.defaultTtlMs : ttlMs;
    const expiresAt = ttl === null ? null : new Date(this.clock() + ttl).toISOString();

    try {
      await this.ensureLoaded();
      const kind = kindOf(value);
      await this.writeValue(fullKey, value, kind);
      this.remember(fullKey, value);
      await this.updateIndex((index, kinds) => {
        index.set(key, expiresAt);
        kinds.set(key, kind);
      });
      return true;
    } catch (err) {
      this.memory.delete(fullKey);
      cacheWriteFailuresTotal.inc({ cache: this.name });
      this.log.warn({ err, key }, 'Cache set failed');
      return false;
    }
  }

  async get<T>(key: string, options: CacheGetOptions = {}): Promise<T | null> {
    if (this.isReserved(key)) return null;
    try {
      await this.ensureLoaded();
      if (!options.ignoreExpiry && !this.isFresh(key)) {
        cacheMissesTotal.inc({ cache: this.name });
        return null;
      }

      const value = await this.readValue(this.fullKey(key), options.kind ?? this.kinds.get(key));
      if (value === null || value === undefined) {
        cacheMissesTotal.inc({ cache: this.name });
        return null;
      }
      cacheHitsTotal.inc({ cache: this.name });
      return value as T;
    } catch (err) {
      this.log.warn({ err, key }, 'Cache get failed');
      cacheMissesTotal.inc({ cache: this.name });
      return null;
    }
  }

  async containsKey(key: string, checkExpiry = true): Promise<boolean> {
    if (this.isReserved(key)) return false;
    try {
      await this.ensureLoaded();
      if (checkExpiry && !this.isFresh(key)) return false;
      const fullKey = this.fullKey(key);
      return this.memory.has(fullKey) || (await this.kv.has(fullKey));
    } catch (err) {
      this.log.warn({ err, key }, 'Cache containsKey failed');
      return false;
    }
  }

  async remove(key: string): Promise<boolean> {
    if (this.isReserved(key)) return false;
    const fullKey = this.fullKey(key);
    this.memory.delete(fullKey);
    try {
      await this.ensureLoaded();
      await this.kv.remove(fullKey);
      await this.updateIndex((index, kinds) => {
        index.delete(key);
        kinds.delete(key);
      });
      return true;
    } catch (err) {
      this.log.warn({ err, key }, 'Cache remove failed');
      return false;
    }
  }

  /** Remove every key under this cache's prefix; the side tables are reset to empty. */
  async clear(): Promise<boolean> {
    this.memory.clear();
    try {
      await this.ensureLoaded();
      const namespace = `${this.config.keyPrefix}_`;
      const keys = [...(await this.kv.getAllKeys())].filter((k) => k.startsWith(namespace));
      await Promise.all(keys.map((k) => this.kv.remove(k)));
      await this.updateIndex((index, kinds) => {
        index.clear();
        kinds.clear();
      });
      return true;
    } catch (err) {
      this.log.warn({ err }, 'Cache clear failed');
      return false;
    }
  }

  /** Remove every entry with `expiresAt <= now`. Returns the count, 0 on failure. */
  async cleanExpiredEntries(): Promise<number> {
    try {
      await this.ensureLoaded();
      const now = this.clock();
      const expired = [...this.index.entries()]
        .filter(([, expiresAt]) => expiresAt !== null && Date.parse(expiresAt) <= now)
        .map(([key]) => key);
      if (expired.length === 0) return 0;

      for (const key of expired) {
        const fullKey = this.fullKey(key);
        this.memory.delete(fullKey);
        await this.kv.remove(fullKey);
      }
      await this.updateIndex((index, kinds) => {
        for (const key of expired) {
          index.delete(key);
          kinds.delete(key);
        }
      });
      return expired.length;
    } catch (err) {
      this.log.warn({ err }, 'Expired entry cleanup failed');
      return 0;
    }
  }

  /** Logical keys with a stored value under this prefix (fresh or not). */
  async keys(): Promise<string[]> {
    const namespace = `${this.config.keyPrefix}_`;
    try {
      const all = await this.kv.getAllKeys();
      return [...all]
        .filter((k) => k.startsWith(namespace))
        .map((k) => k.slice(namespace.length))
        .filter((k) => !this.isReserved(k));
    } catch (err) {
      this.log.warn({ err }, 'Cache key listing failed');
      return [];
    }
  }

  /** ISO expiry of a key; undefined when the index has no entry */
  expiryOf(key: string): string | null | undefined {
    return this.index.get(key);
  }

  // ───── internals ──────────────────────────────────────────────

  private isFresh(key: string): boolean {
    const expiresAt = this.index.get(key);
    if (expiresAt === undefined) return false;
    if (expiresAt === null) return true;
    const instant = Date.parse(expiresAt);
    return Number.isFinite(instant) && this.clock() < instant;
  }

  private async writeValue(fullKey: string, value: unknown, kind: CacheValueKind): Promise<void> {
    let ok: boolean;
    if (typeof value === 'string') {
      ok = await this.kv.setString(fullKey, value);
    } else if (typeof value === 'boolean') {
      ok = await this.kv.setBool(fullKey, value);
    } else if (typeof value === 'number') {
      ok = kind === 'int' ? await this.kv.setInt(fullKey, value) : await this.kv.setDouble(fullKey, value);
    } else {
      // null reads back as a miss, so it is never stored
      const encoded: string | undefined = value === null ? undefined : JSON.stringify(value);
      if (encoded === undefined) throw new CacheIOError(`Value for ${fullKey} is not serializable`);
      ok = await this.kv.setString(fullKey, encoded);
    }
    if (!ok) throw new CacheIOError(`Store rejected write of ${fullKey}`);
  }

  private async readValue(fullKey: string, kind: CacheValueKind | undefined): Promise<unknown> {
    if (this.memory.has(fullKey)) return structuredClone(this.memory.get(fullKey));

    switch (kind) {
      case 'string':
        return this.kv.getString(fullKey);
      case 'int':
        return this.kv.getInt(fullKey);
      case 'double':
        return this.kv.getDouble(fullKey);
      case 'bool':
        return this.kv.getBool(fullKey);
      case 'json': {
        const raw = await this.kv.getString(fullKey);
        return raw === null ? null : JSON.parse(raw);
      }
      default: {
        // Entry written before kinds were recorded: structured values first, then scalars
        const raw = await this.kv.getString(fullKey);
        if (raw !== null) {
          try {
            return JSON.parse(raw);
          } catch {
            return raw;
          }
        }
        return (await this.kv.getInt(fullKey)) ?? (await this.kv.getDouble(fullKey)) ?? (await this.kv.getBool(fullKey));
      }
    }
  }

  private remember(fullKey: string, value: unknown): void {
    this.memory.delete(fullKey);
    if (this.memory.size >= this.maxMemoryEntries) {
      const oldest = this.memory.keys().next();
      if (!oldest.done) this.memory.delete(oldest.value);
    }
    this.memory.set(fullKey, structuredClone(value));
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) this.loading = this.loadIndex();
    return this.loading;
  }

  private async loadIndex(): Promise<void> {
    let rawIndex: string | null;
    let rawKinds: string | null;
    try {
      rawIndex = await this.kv.getString(this.indexKey());
      rawKinds = await this.kv.getString(this.fullKey(KINDS_SUFFIX));
    } catch (err) {
      // Retry the load on the next call rather than caching the failure
      this.loading = null;
      throw err;
    }

    try {
      for (const [key, value] of this.parseTable(rawIndex)) {
        if (value === null || typeof value === 'string') this.index.set(key, value);
      }
    } catch (err) {
      this.index.clear();
      this.log.warn({ err }, 'Corrupt expiry index; starting empty');
    }

    try {
      for (const [key, value] of this.parseTable(rawKinds)) {
        if (isValueKind(value)) this.kinds.set(key, value);
      }
    } catch (err) {
      this.kinds.clear();
      this.log.warn({ err }, 'Corrupt value kind table; decoding by content');
    }
  }

  private parseTable(raw: string | null): [string, unknown][] {
    if (raw === null) return [];
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('side table is not an object');
    }
    return Object.entries(parsed);
  }

  /** Side table writes run one at a time, each persisting both whole tables */
  private updateIndex(mutate: (index: ExpiryIndex, kinds: KindIndex) => void): Promise<void> {
    const run = this.indexWrites.then(async () => {
      mutate(this.index, this.kinds);
      const ok =
        (await this.kv.setString(this.indexKey(), JSON.stringify(Object.fromEntries(this.index)))) &&
        (await this.kv.setString(this.fullKey(KINDS_SUFFIX), JSON.stringify(Object.fromEntries(this.kinds))));
      if (!ok) throw new CacheIOError('Store rejected expiry index write');
    });
    this.indexWrites = run.catch((err: unknown) => {
      this.log.warn({ err }, 'Expiry index write failed');
    });
    return run;
  }

  private fullKey(key: string): string {
    return `${this.config.keyPrefix}_${key}`;
  }

  private isReserved(key: string): boolean {
    return RESERVED_CACHE_KEYS.includes(key);
  }

  private indexKey(): string {
    return this.fullKey(INDEX_SUFFIX);
  }
}
