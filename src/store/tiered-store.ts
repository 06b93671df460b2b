/**
 * Tiered Store
 *
 * One collection's records across the cache, the remote store, the
 * encrypted local tier and the unencrypted local tier.
 *
 * Reads: fresh cache → remote → encrypted local → unencrypted local. The
 * local tiers stand in only when the remote fails; a record the remote no
 * longer has is dropped locally unless a local change is still pending.
 * Writes: conditional remote write against the last version this client
 * saw, then both local tiers. Every tier is attempted independently and
 * reported on; nothing is rolled back.
 */

import type { Logger } from 'pino';
import { Clock, FieldMap, systemClock, TIMESTAMP_FIELD } from '../core/types';
import { getTimestamp, isFieldMap } from '../core/field-map';
import {
  ConflictNotFoundError,
  DecryptionError,
  PreconditionFailedError,
  RecordUnavailableError,
  RemoteUnavailableError,
  StoreError,
} from '../core/errors';
import { componentLogger } from '../observability/logger';
import {
  conflictsDetectedTotal,
  conflictsResolvedTotal,
  decryptionFailuresTotal,
  remoteOperationDuration,
  syncOperationsTotal,
  tierFallbacksTotal,
  tierReadsTotal,
} from '../observability/metrics';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../resilience/retry';
import { RemoteHealthMonitor } from '../resilience/remote-health';
import { TtlCache } from '../cache/ttl-cache';
import { QueryCache } from '../cache/query-cache';
import { FieldEncryptor } from '../security/field-encryptor';
import { applyQuery } from '../storage/query-filter';
import { CollectionQuery, RemoteDocument, RemoteStore } from '../storage/types';
import { ConflictResolver } from '../sync/conflict-resolver';
import { ConflictQueue } from '../sync/conflict-queue';
import { SyncQueue } from '../sync/sync-queue';
import {
  CollectionSyncStatus,
  ConflictResolutionItem,
  FieldChoice,
  ResolutionStrategy,
  SyncOperation,
  SyncResult,
} from '../sync/types';
import { LocalRecordStore } from './local-record-store';
import { VersionTracker } from './version-tracker';
import {
  ClearOutcome,
  ClearTier,
  CollectionSettings,
  ConflictResolutionOutcome,
  DeleteOutcome,
  QueryOptions,
  ReadOptions,
  ReadResult,
  ReadSource,
  RemoteWriteStatus,
  TierResult,
  TierStatus,
  WriteOutcome,
} from './types';

export interface TieredStoreDeps {
  remote: RemoteStore;
  health: RemoteHealthMonitor;
  cache: TtlCache;
  queryCache: QueryCache;
  encryptor: FieldEncryptor;
  encryptedLocal: LocalRecordStore;
  plainLocal: LocalRecordStore;
  versions: VersionTracker;
  syncQueue: SyncQueue;
  conflicts: ConflictQueue;
  resolver: ConflictResolver;
  retryPolicy?: RetryPolicy;
  /** Default record cache TTL when the collection sets none */
  recordTtlMs?: number | null;
  queryTtlMs?: number | null;
  /** Replays of one queued operation before it is dropped */
  maxSyncAttempts?: number;
  clock?: Clock;
}

const DEFAULT_MAX_SYNC_ATTEMPTS = 5;

interface RemotePush {
  status: Extract<RemoteWriteStatus, 'written' | 'unchanged' | 'conflict'>;
  record: FieldMap;
  conflict?: ConflictResolutionItem;
}

type RemoteDelete = { status: 'deleted' } | { status: 'conflict'; record: FieldMap };

export class TieredStore {
  readonly collection: string;
  private readonly sensitiveNames: string[];
  private readonly retryPolicy: RetryPolicy;
  private readonly recordTtlMs: number | null;
  private readonly queryTtlMs: number | null;
  private readonly maxSyncAttempts: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private syncRun: Promise<SyncResult> | null = null;
  private lastSyncAt: string | null = null;
  private lastSyncResult: SyncResult | null = null;

  constructor(
    private readonly settings: CollectionSettings,
    private readonly deps: TieredStoreDeps,
  ) {
    this.collection = settings.name;
    this.sensitiveNames = Object.keys(settings.sensitiveFields);
    this.retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.recordTtlMs = settings.cacheTtlMs !== undefined ? settings.cacheTtlMs : (deps.recordTtlMs ?? null);
    this.queryTtlMs = deps.queryTtlMs ?? null;
    this.maxSyncAttempts = Math.max(1, deps.maxSyncAttempts ?? DEFAULT_MAX_SYNC_ATTEMPTS);
    this.clock = deps.clock ?? systemClock;
    this.log = componentLogger('tiered-store', { collection: this.collection });
  }

  // ───── Reads ──────────────────────────────────────────────────

  async read(id: string, options: ReadOptions = {}): Promise<FieldMap> {
    return (await this.readWithSource(id, options)).record;
  }

  async readWithSource(id: string, options: ReadOptions = {}): Promise<ReadResult> {
    if (!options.forceRefresh) {
      const cached = await this.deps.cache.get<unknown>(this.recordKey(id), { kind: 'json' });
      if (isFieldMap(cached)) return this.served(cached, 'cache');
    }

    // Local edits not yet on the remote win over the remote copy
    if (await this.hasLocalPending(id)) {
      this.fallback('remote', 'pending_local_changes');
    } else if (!this.deps.health.isAvailable()) {
      this.fallback('remote', 'unavailable');
    } else {
      try {
        const doc = await this.remoteCall('get', () => this.deps.remote.getById(this.collection, id));
        if (doc) {
          await this.writeThrough(id, doc.fields);
          return this.served(doc.fields, 'remote');
        }
      } catch (err) {
        this.log.warn({ err, recordId: id }, 'Remote read failed; falling back to local tiers');
        this.fallback('remote', 'error');
        return this.readLocal(id);
      }
      await this.purgeLocal(id);
      throw new RecordUnavailableError(this.collection, id);
    }

    return this.readLocal(id);
  }

  private async readLocal(id: string): Promise<ReadResult> {
    try {
      const stored = await this.deps.encryptedLocal.get(this.collection, id);
      if (stored) {
        const record = this.deps.encryptor.decryptRecord(stored, this.sensitiveNames, this.settings.sensitiveFields);
        return this.served(record, 'encryptedLocal');
      }
      this.fallback('encryptedLocal', 'not_found');
    } catch (err) {
      if (err instanceof DecryptionError) {
        decryptionFailuresTotal.inc({ collection: this.collection });
        this.log.error(
          { err, event: 'security.decryption_failure', recordId: id },
          'Encrypted local record failed integrity check',
        );
      } else {
        this.log.warn({ err, recordId: id }, 'Encrypted local read failed');
      }
      this.fallback('encryptedLocal', err instanceof StoreError ? err.code.toLowerCase() : 'error');
    }

    try {
      const plain = await this.deps.plainLocal.get(this.collection, id);
      if (plain) return this.served(plain, 'unencryptedLocal');
      this.fallback('unencryptedLocal', 'not_found');
    } catch (err) {
      this.log.warn({ err, recordId: id }, 'Unencrypted local read failed');
      this.fallback('unencryptedLocal', 'error');
    }

    throw new RecordUnavailableError(this.collection, id);
  }

  /** Cached collection query; served from the unencrypted local tier when the remote is unreachable */
  async query(query: Omit<CollectionQuery, 'collection'>, options: QueryOptions = {}): Promise<RemoteDocument[]> {
    const scoped: CollectionQuery = { ...query, collection: this.collection };
    const ttlMs = options.ttlMs === undefined ? this.queryTtlMs : options.ttlMs;
    try {
      return await this.deps.queryCache.cachedQuery(scoped, ttlMs, () => this.fetchQuery(scoped), {
        forceRefresh: options.forceRefresh,
        // Retrying cannot help while the remote is flagged down
        shouldRetry: () => this.deps.health.isAvailable(),
      });
    } catch (err) {
      if (!(err instanceof RemoteUnavailableError)) throw err;
      this.log.warn({ err }, 'Query falling back to local records');
      return applyQuery(await this.deps.plainLocal.list(this.collection), scoped);
    }
  }

  // ───── Writes ─────────────────────────────────────────────────

  async write(id: string, record: FieldMap): Promise<WriteOutcome> {
    const stamped: FieldMap = { ...record, [TIMESTAMP_FIELD]: this.now() };
    await this.deps.cache.remove(this.recordKey(id));

    const expected = await this.lastSeenVersion(id);
    let remote: RemoteWriteStatus;
    let finalRecord = stamped;
    let conflict: ConflictResolutionItem | undefined;

    if (this.deps.health.isAvailable()) {
      try {
        const pushed = await this.pushToRemote(id, stamped, expected);
        remote = pushed.status;
        finalRecord = pushed.record;
        conflict = pushed.conflict;
        await this.dropQueuedOperation(id);
      } catch (err) {
        this.log.warn({ err, recordId: id }, 'Remote write failed; queueing for sync');
        remote = await this.enqueue(id, 'set', stamped, expected);
      }
    } else {
      remote = await this.enqueue(id, 'set', stamped, expected);
    }

    const local = await this.writeLocalTiers(id, finalRecord);
    const cache = await this.refreshCache(id, finalRecord, remote === 'written' || remote === 'unchanged');
    await this.invalidateQueries();

    return { record: finalRecord, remote, ...local, cache, ...(conflict ? { conflict } : {}) };
  }

  async delete(id: string): Promise<DeleteOutcome> {
    const cacheRemoved = await this.deps.cache.remove(this.recordKey(id));
    const expected = await this.lastSeenVersion(id);

    let remote: DeleteOutcome['remote'];
    if (this.deps.health.isAvailable()) {
      try {
        const removed = await this.deleteFromRemote(id, expected);
        await this.dropQueuedOperation(id);
        if (removed.status === 'conflict') return this.keepRemote(id, removed.record);
        remote = 'deleted';
      } catch (err) {
        this.log.warn({ err, recordId: id }, 'Remote delete failed; queueing for sync');
        remote = await this.enqueueDelete(id, expected);
      }
    } else {
      remote = await this.enqueueDelete(id, expected);
    }

    const encryptedLocal = await this.attempt(() => this.deps.encryptedLocal.delete(this.collection, id), 'encryptedLocal', id);
    const unencryptedLocal = await this.attempt(() => this.deps.plainLocal.delete(this.collection, id), 'unencryptedLocal', id);
    await this.invalidateQueries();

    return { remote, encryptedLocal, unencryptedLocal, cache: cacheRemoved ? 'ok' : 'failed' };
  }

  /**
   * Wipe the collection from every tier. Each tier is attempted even when
   * an earlier one fails.
   */
  async clearAll(): Promise<ClearOutcome> {
    const steps: Array<[ClearTier, () => Promise<number>]> = [
      ['remote', () => this.clearRemote()],
      ['encryptedLocal', () => this.deps.encryptedLocal.clear(this.collection)],
      ['unencryptedLocal', () => this.deps.plainLocal.clear(this.collection)],
      ['cache', () => this.clearCache()],
      ['versions', () => this.deps.versions.clear(this.collection)],
      ['syncQueue', () => this.deps.syncQueue.clear(this.collection)],
      ['conflicts', () => this.deps.conflicts.clear(this.collection)],
    ];

    const outcome: Partial<ClearOutcome> = {};
    for (const [tier, run] of steps) {
      outcome[tier] = await this.clearStep(tier, run);
    }
    this.log.info({ outcome }, 'Collection cleared');
    return {
      remote: outcome.remote ?? { status: 'skipped' },
      encryptedLocal: outcome.encryptedLocal ?? { status: 'skipped' },
      unencryptedLocal: outcome.unencryptedLocal ?? { status: 'skipped' },
      cache: outcome.cache ?? { status: 'skipped' },
      versions: outcome.versions ?? { status: 'skipped' },
      syncQueue: outcome.syncQueue ?? { status: 'skipped' },
      conflicts: outcome.conflicts ?? { status: 'skipped' },
    };
  }

  // ───── Conflicts & sync ───────────────────────────────────────

  /**
   * Apply a decision to a presented conflict. `useRemote` adopts the remote
   * copy locally; otherwise the resolved record is written to the remote
   * against the version recorded when the conflict was detected.
   */
  async resolveConflict(
    conflictId: string,
    strategy: ResolutionStrategy,
    fieldChoices?: Record<string, FieldChoice>,
    actor = 'user',
  ): Promise<ConflictResolutionOutcome> {
    const item = await this.deps.conflicts.get(conflictId);
    if (!item || item.collection !== this.collection) throw new ConflictNotFoundError(conflictId);

    const resolved = this.deps.resolver.resolve(item, strategy, fieldChoices, actor);
    const { recordId } = resolved;
    let write: WriteOutcome;

    if (strategy === 'useRemote') {
      write = await this.adoptRemote(recordId, resolved.resolution.record);
    } else {
      write = await this.pushResolved(recordId, resolved.resolution.record, item.conflictData.remoteTimestamp);
    }

    await this.deps.conflicts.remove(item.id);
    conflictsResolvedTotal.inc({ strategy });
    this.log.info({ conflictId, recordId, strategy, remote: write.remote }, 'Conflict resolved');
    return { item: resolved, write };
  }

  /** Replay queued operations for this collection. Concurrent calls share one pass. */
  syncPending(): Promise<SyncResult> {
    if (!this.syncRun) {
      this.syncRun = this.replayQueue().finally(() => {
        this.syncRun = null;
      });
    }
    return this.syncRun;
  }

  async syncStatus(): Promise<CollectionSyncStatus> {
    return {
      collection: this.collection,
      syncing: this.syncRun !== null,
      lastSyncAt: this.lastSyncAt,
      lastResult: this.lastSyncResult ? { ...this.lastSyncResult } : null,
      pendingOperations: (await this.deps.syncQueue.pending(this.collection)).length,
      pendingConflicts: (await this.deps.conflicts.pending(this.collection)).length,
    };
  }

  private async replayQueue(): Promise<SyncResult> {
    const result: SyncResult = { synced: 0, conflicts: 0, failed: 0, dropped: 0, remaining: 0 };

    for (const op of await this.deps.syncQueue.pending(this.collection)) {
      if (!this.deps.health.isAvailable()) break;
      await this.deps.syncQueue.recordAttempt(op.id);

      try {
        const outcome = await this.replay(op);
        result[outcome === 'conflict' ? 'conflicts' : 'synced']++;
        syncOperationsTotal.inc({ outcome });
        await this.deps.cache.remove(this.recordKey(op.recordId));
      } catch (err) {
        const attempts = op.attempts + 1;
        if (attempts < this.maxSyncAttempts) {
          result.failed++;
          syncOperationsTotal.inc({ outcome: 'failed' });
          this.log.warn({ err, recordId: op.recordId, attempts }, 'Sync replay failed');
        } else {
          await this.dropExhausted(op, attempts, err);
          result.dropped++;
        }
      }
    }

    if (result.synced + result.conflicts > 0) await this.invalidateQueries();
    result.remaining = (await this.deps.syncQueue.pending(this.collection)).length;
    this.lastSyncAt = this.now();
    this.lastSyncResult = { ...result };
    this.log.info({ ...result }, 'Sync pass finished');
    return result;
  }

  /**
   * Push one queued operation. When a newer operation for the record was
   * queued during the push, the local tiers already hold that newer state
   * and are left alone.
   */
  private async replay(op: SyncOperation): Promise<'synced' | 'conflict'> {
    if (op.kind === 'delete' || op.data === null) {
      const removed = await this.deleteFromRemote(op.recordId, op.baseVersion);
      const current = await this.deps.syncQueue.settle(op, removed.status === 'deleted' ? null : undefined);
      if (removed.status === 'deleted') return 'synced';
      if (current) await this.writeLocalTiers(op.recordId, removed.record);
      return 'conflict';
    }

    const pushed = await this.pushToRemote(op.recordId, op.data, op.baseVersion);
    if (pushed.status === 'conflict') {
      await this.deps.syncQueue.settle(op);
      return 'conflict';
    }
    if (await this.deps.syncQueue.settle(op, getTimestamp(pushed.record))) {
      await this.writeLocalTiers(op.recordId, pushed.record);
    }
    return 'synced';
  }

  private async dropExhausted(op: SyncOperation, attempts: number, err: unknown): Promise<void> {
    syncOperationsTotal.inc({ outcome: 'dropped' });
    this.log.error(
      { err, recordId: op.recordId, operation: op.kind, attempts },
      'Sync operation dropped after final attempt',
    );
    try {
      await this.deps.syncQueue.remove(op.id);
    } catch (removeErr) {
      this.log.error({ err: removeErr, recordId: op.recordId }, 'Could not drop exhausted sync operation');
    }
  }

  // ───── Remote helpers ─────────────────────────────────────────

  /**
   * Conditional remote write. A version mismatch is reconciled: identical
   * content adopts the remote version, diverging content becomes a queued
   * conflict, a vanished document is recreated.
   */
  private async pushToRemote(id: string, record: FieldMap, expected: string | null): Promise<RemotePush> {
    try {
      await this.remoteCall('set', () =>
        this.deps.remote.setDocument(this.collection, id, record, { expectedVersion: expected }),
      );
      await this.trackVersion(id, getTimestamp(record));
      return { status: 'written', record };
    } catch (err) {
      if (!(err instanceof PreconditionFailedError)) throw err;
      if (err.current === null) {
        this.log.info({ recordId: id }, 'Remote copy no longer exists; recreating');
        return this.pushToRemote(id, record, null);
      }
      return this.reconcile(id, record, err.current.fields);
    }
  }

  /**
   * Conditional remote delete against the last version this client saw
   * (unconditional when it never saw one). A document changed since then
   * survives, unless only its version moved.
   */
  private async deleteFromRemote(id: string, expected: string | null): Promise<RemoteDelete> {
    try {
      await this.remoteCall('delete', () =>
        this.deps.remote.deleteDocument(this.collection, id, expected === null ? undefined : { expectedVersion: expected }),
      );
      await this.trackVersion(id, null);
      return { status: 'deleted' };
    } catch (err) {
      if (!(err instanceof PreconditionFailedError) || err.current === null) throw err;
      const remote = err.current.fields;
      const local = await this.localCopy(id);
      if (local && !this.deps.resolver.detectConflict(local, remote)) {
        return this.deleteFromRemote(id, getTimestamp(remote));
      }
      await this.trackVersion(id, getTimestamp(remote));
      conflictsDetectedTotal.inc({ collection: this.collection });
      this.log.warn({ recordId: id }, 'Remote record changed since last seen; delete not applied');
      return { status: 'conflict', record: remote };
    }
  }

  private async reconcile(id: string, local: FieldMap, remote: FieldMap): Promise<RemotePush> {
    const conflictData = this.deps.resolver.detectConflict(local, remote);
    if (!conflictData) {
      await this.trackVersion(id, getTimestamp(remote));
      return { status: 'unchanged', record: remote };
    }

    const item = this.deps.resolver.createItem(this.collection, id, conflictData);
    await this.deps.conflicts.add(item);
    conflictsDetectedTotal.inc({ collection: this.collection });
    this.log.warn(
      { recordId: id, conflictId: item.id, fields: conflictData.conflictingFields },
      'Remote record diverged; conflict queued',
    );
    return { status: 'conflict', record: local, conflict: item };
  }

  private async remoteCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const end = remoteOperationDuration.startTimer({ operation });
    const policy: RetryPolicy = {
      ...this.retryPolicy,
      shouldRetry: (err) => !(err instanceof PreconditionFailedError),
    };
    try {
      const result = await withRetry(fn, policy, `${operation}:${this.collection}`);
      this.deps.health.recordSuccess();
      end({ outcome: 'ok' });
      return result;
    } catch (err) {
      if (err instanceof PreconditionFailedError) {
        this.deps.health.recordSuccess();
        end({ outcome: 'precondition_failed' });
        throw err;
      }
      this.deps.health.recordFailure(err);
      end({ outcome: 'error' });
      if (err instanceof StoreError) throw err;
      throw new RemoteUnavailableError(`Remote ${operation} failed`, { cause: err });
    }
  }

  private async fetchQuery(query: CollectionQuery): Promise<RemoteDocument[]> {
    if (!this.deps.health.isAvailable()) throw new RemoteUnavailableError('Remote store marked unavailable');
    // QueryCache already retries the fetch as a whole
    const end = remoteOperationDuration.startTimer({ operation: 'query' });
    try {
      const documents: RemoteDocument[] = [];
      for await (const doc of this.deps.remote.streamCollection(query)) documents.push(doc);
      this.deps.health.recordSuccess();
      end({ outcome: 'ok' });
      return documents;
    } catch (err) {
      this.deps.health.recordFailure(err);
      end({ outcome: 'error' });
      if (err instanceof StoreError) throw err;
      throw new RemoteUnavailableError('Remote query failed', { cause: err });
    }
  }

  private async clearRemote(): Promise<number> {
    if (!this.deps.health.isAvailable()) throw new RemoteUnavailableError('Remote store marked unavailable');
    return this.remoteCall('clear', () => this.deps.remote.clearCollection(this.collection));
  }

  // ───── Local helpers ──────────────────────────────────────────

  private async keepRemote(id: string, record: FieldMap): Promise<DeleteOutcome> {
    const local = await this.writeLocalTiers(id, record);
    const cache = await this.refreshCache(id, record, true);
    await this.invalidateQueries();
    return { remote: 'conflict', record, ...local, cache };
  }

  private async purgeLocal(id: string): Promise<void> {
    await this.attempt(() => this.deps.encryptedLocal.delete(this.collection, id), 'encryptedLocal', id);
    await this.attempt(() => this.deps.plainLocal.delete(this.collection, id), 'unencryptedLocal', id);
    await this.trackVersion(id, null);
    this.log.info({ recordId: id }, 'Record gone from remote; local copies dropped');
  }

  private async localCopy(id: string): Promise<FieldMap | null> {
    try {
      return await this.deps.plainLocal.get(this.collection, id);
    } catch (err) {
      this.log.warn({ err, recordId: id }, 'Local copy lookup failed');
      return null;
    }
  }

  private async adoptRemote(id: string, remote: FieldMap): Promise<WriteOutcome> {
    await this.trackVersion(id, getTimestamp(remote));
    await this.dropQueuedOperation(id);
    const local = await this.writeLocalTiers(id, remote);
    const cache = await this.refreshCache(id, remote, true);
    await this.invalidateQueries();
    return { record: remote, remote: 'unchanged', ...local, cache };
  }

  private async pushResolved(id: string, resolved: FieldMap, remoteVersion: string | null): Promise<WriteOutcome> {
    const stamped: FieldMap = { ...resolved, [TIMESTAMP_FIELD]: this.now() };
    await this.deps.cache.remove(this.recordKey(id));

    let remote: RemoteWriteStatus;
    let finalRecord = stamped;
    let conflict: ConflictResolutionItem | undefined;
    try {
      if (!this.deps.health.isAvailable()) throw new RemoteUnavailableError('Remote store marked unavailable');
      const pushed = await this.pushToRemote(id, stamped, remoteVersion);
      remote = pushed.status;
      finalRecord = pushed.record;
      conflict = pushed.conflict;
      await this.dropQueuedOperation(id);
    } catch (err) {
      this.log.warn({ err, recordId: id }, 'Resolved record not pushed; queueing for sync');
      remote = await this.enqueue(id, 'set', stamped, remoteVersion);
    }

    const local = await this.writeLocalTiers(id, finalRecord);
    const cache = await this.refreshCache(id, finalRecord, remote === 'written' || remote === 'unchanged');
    await this.invalidateQueries();
    return { record: finalRecord, remote, ...local, cache, ...(conflict ? { conflict } : {}) };
  }

  private async writeThrough(id: string, record: FieldMap): Promise<void> {
    await this.deps.cache.set(this.recordKey(id), record, this.recordTtlMs);
    await this.attempt(
      async () => this.deps.encryptedLocal.put(this.collection, id, this.encryptRecord(record)),
      'encryptedLocal',
      id,
    );
    await this.trackVersion(id, getTimestamp(record));
  }

  private async writeLocalTiers(
    id: string,
    record: FieldMap,
  ): Promise<{ encryptedLocal: TierStatus; unencryptedLocal: TierStatus }> {
    const encryptedLocal = await this.attempt(
      async () => this.deps.encryptedLocal.put(this.collection, id, this.encryptRecord(record)),
      'encryptedLocal',
      id,
    );
    const unencryptedLocal = await this.attempt(
      () => this.deps.plainLocal.put(this.collection, id, record),
      'unencryptedLocal',
      id,
    );
    return { encryptedLocal, unencryptedLocal };
  }

  private encryptRecord(record: FieldMap): FieldMap {
    return this.deps.encryptor.encryptRecord(record, this.sensitiveNames);
  }

  private async refreshCache(id: string, record: FieldMap, remoteCurrent: boolean): Promise<TierStatus> {
    if (!remoteCurrent) return 'skipped';
    return (await this.deps.cache.set(this.recordKey(id), record, this.recordTtlMs)) ? 'ok' : 'failed';
  }

  private async clearCache(): Promise<number> {
    const prefix = this.recordKey('');
    const keys = (await this.deps.cache.keys()).filter((k) => k.startsWith(prefix));
    await Promise.all(keys.map((k) => this.deps.cache.remove(k)));
    return keys.length + (await this.deps.queryCache.invalidate(this.collection));
  }

  private async invalidateQueries(): Promise<void> {
    try {
      await this.deps.queryCache.invalidate(this.collection);
    } catch (err) {
      this.log.warn({ err }, 'Query cache invalidation failed');
    }
  }

  private async enqueue(id: string, kind: 'set', data: FieldMap, baseVersion: string | null): Promise<RemoteWriteStatus> {
    try {
      await this.deps.syncQueue.enqueue({ collection: this.collection, recordId: id, kind, data, baseVersion });
      return 'queued';
    } catch (err) {
      this.log.error({ err, recordId: id }, 'Could not queue operation for sync');
      return 'failed';
    }
  }

  private async enqueueDelete(id: string, baseVersion: string | null): Promise<DeleteOutcome['remote']> {
    try {
      await this.deps.syncQueue.enqueue({ collection: this.collection, recordId: id, kind: 'delete', data: null, baseVersion });
      return 'queued';
    } catch (err) {
      this.log.error({ err, recordId: id }, 'Could not queue delete for sync');
      return 'failed';
    }
  }

  private async dropQueuedOperation(id: string): Promise<void> {
    try {
      await this.deps.syncQueue.removeFor(this.collection, id);
    } catch (err) {
      this.log.warn({ err, recordId: id }, 'Could not drop superseded sync operation');
    }
  }

  private async hasLocalPending(id: string): Promise<boolean> {
    try {
      return (
        (await this.deps.syncQueue.hasPending(this.collection, id)) ||
        (await this.deps.conflicts.hasPending(this.collection, id))
      );
    } catch (err) {
      this.log.warn({ err, recordId: id }, 'Pending-change lookup failed');
      return false;
    }
  }

  private async lastSeenVersion(id: string): Promise<string | null> {
    try {
      return await this.deps.versions.get(this.collection, id);
    } catch (err) {
      this.log.warn({ err, recordId: id }, 'Version lookup failed; writing as new record');
      return null;
    }
  }

  private async trackVersion(id: string, version: string | null): Promise<void> {
    try {
      await this.deps.versions.set(this.collection, id, version);
    } catch (err) {
      this.log.warn({ err, recordId: id }, 'Version tracking failed');
    }
  }

  private async attempt(fn: () => Promise<void>, tier: string, id: string): Promise<TierStatus> {
    try {
      await fn();
      return 'ok';
    } catch (err) {
      this.log.warn({ err, tier, recordId: id }, 'Tier write failed');
      return 'failed';
    }
  }

  private async clearStep(tier: ClearTier, run: () => Promise<number>): Promise<TierResult> {
    try {
      return { status: 'ok', removed: await run() };
    } catch (err) {
      this.log.warn({ err, tier }, 'Tier clear failed');
      return { status: 'failed', error: err instanceof Error ? err.message : String(err) };
    }
  }

  private served(record: FieldMap, source: ReadSource): ReadResult {
    tierReadsTotal.inc({ collection: this.collection, source });
    return { record, source };
  }

  private fallback(tier: ReadSource, reason: string): void {
    tierFallbacksTotal.inc({ collection: this.collection, tier, reason });
  }

  private recordKey(id: string): string {
    return `record:${this.collection}:${id}`;
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}
