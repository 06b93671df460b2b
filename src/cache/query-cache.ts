/**
 * Query Result Cache
 *
 * Caches collection query results under a deterministic signature.
 * Fetches are retried; when every attempt fails, an expired cached result
 * is served if one exists. A result whose fetch overlapped an invalidation
 * of its collection is returned but not cached.
 */

import { createHash } from 'crypto';
import { canonicalJson } from '../core/field-map';
import { CollectionQuery } from '../storage/types';
import { componentLogger } from '../observability/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../resilience/retry';
import { TtlCache } from './ttl-cache';

const SIGNATURE_PREFIX = 'query';

export interface CachedQueryOptions {
  /** Fetch even when a fresh result is cached */
  forceRefresh?: boolean;
  /** Overrides the policy's retry predicate for this fetch */
  shouldRetry?: (err: unknown) => boolean;
}

export class QueryCache {
  private readonly log = componentLogger('query-cache');
  private readonly generations = new Map<string, number>();

  constructor(
    private readonly cache: TtlCache,
    private readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
  ) {}

  /** `query:<collection>:<sha256 of filters, sort and paging>` */
  signature(query: CollectionQuery): string {
    const shape = {
      filters: query.filters ?? [],
      orderBy: query.orderBy ?? [],
      limit: query.limit ?? null,
      offset: query.offset ?? null,
    };
    const digest = createHash('sha256').update(canonicalJson(shape)).digest('hex');
    return `${SIGNATURE_PREFIX}:${query.collection}:${digest}`;
  }

  async cachedQuery<T>(
    query: CollectionQuery,
    ttlMs: number | null,
    fetch: () => Promise<T>,
    options: CachedQueryOptions = {},
  ): Promise<T> {
    const key = this.signature(query);

    if (!options.forceRefresh) {
      const cached = await this.cache.get<T>(key, { kind: 'json' });
      if (cached !== null) return cached;
    }

    const generation = this.generation(query.collection);
    const policy: RetryPolicy = options.shouldRetry
      ? { ...this.retryPolicy, shouldRetry: options.shouldRetry }
      : this.retryPolicy;
    let result: T;
    try {
      result = await withRetry(fetch, policy, `query:${query.collection}`);
    } catch (err) {
      const stale = await this.cache.get<T>(key, { kind: 'json', ignoreExpiry: true });
      if (stale !== null) {
        this.log.warn({ err, collection: query.collection }, 'Query fetch failed; serving stale result');
        return stale;
      }
      throw err;
    }

    if (this.generation(query.collection) !== generation) {
      this.log.debug({ collection: query.collection }, 'Collection changed during fetch; result not cached');
      return result;
    }
    await this.cache.set(key, result, ttlMs);
    return result;
  }

  /** Drop every cached result for a collection. Returns how many were removed. */
  async invalidate(collection: string): Promise<number> {
    this.generations.set(collection, this.generation(collection) + 1);
    const prefix = `${SIGNATURE_PREFIX}:${collection}:`;
    const keys = (await this.cache.keys()).filter((k) => k.startsWith(prefix));
    const removed = await Promise.all(keys.map((k) => this.cache.remove(k)));
    return removed.filter(Boolean).length;
  }

  private generation(collection: string): number {
    return this.generations.get(collection) ?? 0;
  }
}
