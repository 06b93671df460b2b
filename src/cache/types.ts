/**
 * TTL cache types.
 *
 * Values live in the persistent KV under `<prefix>_<key>`; expiry instants
 * live in one JSON side table under `<prefix>_expiry_times`, and the kind
 * each value was written as in another under `<prefix>_value_kinds`.
 */

import { Clock } from '../core/types';

/** Which typed KV getter reads a value back */
export type CacheValueKind = 'string' | 'int' | 'double' | 'bool' | 'json';

export interface CacheConfig {
  keyPrefix: string;
  /** Applied when `set` gets no TTL. null = entries never expire */
  defaultTtlMs: number | null;
  /** Label for metrics and logs */
  name?: string;
  /** Size of the in-process value layer in front of the KV */
  maxMemoryEntries?: number;
  clock?: Clock;
}

export interface CacheGetOptions {
  /** Return the stored value even when its entry has expired */
  ignoreExpiry?: boolean;
  kind?: CacheValueKind;
}

/** Logical key → ISO-8601 expiry, or null for no expiry */
export type ExpiryIndex = Map<string, string | null>;

/** Logical key → kind the value was written as */
export type KindIndex = Map<string, CacheValueKind>;
