/**
 * Storage backend contracts.
 *
 * KeyValueStore: device-local persistent store (typed scalars).
 * SecureStore: OS-keystore style slot storage for key material.
 * RemoteStore: authoritative document store shared by every client.
 */

import { FieldMap } from '../core/types';

export interface KeyValueStore {
  getString(key: string): Promise<string | null>;
  getInt(key: string): Promise<number | null>;
  getDouble(key: string): Promise<number | null>;
  getBool(key: string): Promise<boolean | null>;

  setString(key: string, value: string): Promise<boolean>;
  setInt(key: string, value: number): Promise<boolean>;
  setDouble(key: string, value: number): Promise<boolean>;
  setBool(key: string, value: boolean): Promise<boolean>;

  remove(key: string): Promise<boolean>;
  has(key: string): Promise<boolean>;
  getAllKeys(): Promise<Set<string>>;
}

/** The ioredis commands the Redis-backed KV issues; an ioredis client satisfies it */
export interface KvRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<number>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number,
  ): Promise<[cursor: string, elements: string[]]>;
}

/** The ioredis commands the Redis-backed remote store issues */
export interface RemoteRedisClient {
  get(key: string): Promise<string | null>;
  smembers(key: string): Promise<string[]>;
  mget(...keys: string[]): Promise<(string | null)[]>;
  del(...keys: string[]): Promise<number>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}

export interface SecureStore {
  read(slot: string): Promise<Buffer | null>;
  write(slot: string, value: Buffer): Promise<void>;
  delete(slot: string): Promise<void>;
}

export interface RemoteDocument {
  id: string;
  fields: FieldMap;
}

export type FilterOp = 'eq' | 'neq' | 'lt' | 'lte' | 'gt' | 'gte';

export interface QueryFilter {
  field: string;
  op: FilterOp;
  value: string | number | boolean | null;
}

export interface QueryOrder {
  field: string;
  direction?: 'asc' | 'desc';
}

export interface CollectionQuery {
  collection: string;
  filters?: QueryFilter[];
  orderBy?: QueryOrder[];
  limit?: number;
  offset?: number;
}

export interface RemoteWriteOptions {
  /**
   * Optimistic concurrency guard on the `lastUpdate` field.
   * undefined: unconditional. null: document must not exist.
   * string: current version must equal it.
   */
  expectedVersion?: string | null;
}

export interface RemoteStore {
  getById(collection: string, id: string): Promise<RemoteDocument | null>;
  streamCollection(query: CollectionQuery): AsyncIterable<RemoteDocument>;
  setDocument(collection: string, id: string, fields: FieldMap, options?: RemoteWriteOptions): Promise<void>;
  /** Succeeds when the document is already gone; the version guard applies only while it exists */
  deleteDocument(collection: string, id: string, options?: RemoteWriteOptions): Promise<void>;
  /** Remove every document of a collection. Returns the count removed. */
  clearCollection(collection: string): Promise<number>;
}
