/**
 * Pending Sync Queue
 *
 * Writes and deletes that could not reach the remote store. One entry per
 * record: a newer operation replaces the queued one but keeps the version
 * the first one was based on, so replay still detects remote changes made
 * since this client last synced. The replacement gets a fresh id, so a
 * replay of the older snapshot can tell it was superseded.
 */

import { v4 as uuid } from 'uuid';
import { Clock, FieldMap, systemClock } from '../core/types';
import { KeyValueStore } from '../storage/types';
import { CacheIOError } from '../core/errors';
import { componentLogger } from '../observability/logger';
import { pendingSyncOperations } from '../observability/metrics';
import { validateSyncOperation } from './schemas';
import { SyncOperation, SyncOperationKind } from './types';

export const SYNC_QUEUE_KEY = 'pending_sync_operations';
const DEFAULT_MAX_SIZE = 1000;

export interface EnqueueRequest {
  collection: string;
  recordId: string;
  kind: SyncOperationKind;
  data: FieldMap | null;
  baseVersion: string | null;
}

export interface SyncQueueOptions {
  maxSize?: number;
  clock?: Clock;
  storageKey?: string;
}

export class SyncQueue {
  private operations: SyncOperation[] = [];
  private readonly maxSize: number;
  private readonly clock: Clock;
  private readonly storageKey: string;
  private readonly log = componentLogger('sync-queue');
  private loading: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly kv: KeyValueStore,
    options: SyncQueueOptions = {},
  ) {
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.clock = options.clock ?? systemClock;
    this.storageKey = options.storageKey ?? SYNC_QUEUE_KEY;
  }

  initialize(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  async enqueue(request: EnqueueRequest): Promise<SyncOperation> {
    await this.initialize();
    const queuedAt = new Date(this.clock()).toISOString();
    const existing = this.operations.find(
      (op) => op.collection === request.collection && op.recordId === request.recordId,
    );

    let operation: SyncOperation;
    if (existing) {
      operation = { ...existing, id: uuid(), kind: request.kind, data: request.data, queuedAt, attempts: 0 };
      this.operations = this.operations.map((op) => (op.id === existing.id ? operation : op));
    } else {
      operation = { id: uuid(), ...request, queuedAt, attempts: 0 };
      this.operations.push(operation);
      if (this.operations.length > this.maxSize) {
        const dropped = this.operations.shift();
        this.log.warn(
          { collection: dropped?.collection, recordId: dropped?.recordId },
          'Sync queue full; dropped oldest operation',
        );
      }
    }

    await this.commit();
    return structuredClone(operation);
  }

  /** Operations in queue order, optionally for one collection */
  async pending(collection?: string): Promise<SyncOperation[]> {
    await this.initialize();
    return this.operations
      .filter((op) => collection === undefined || op.collection === collection)
      .map((op) => structuredClone(op));
  }

  async hasPending(collection: string, recordId: string): Promise<boolean> {
    await this.initialize();
    return this.operations.some((op) => op.collection === collection && op.recordId === recordId);
  }

  async recordAttempt(id: string): Promise<void> {
    await this.initialize();
    this.operations = this.operations.map((op) => (op.id === id ? { ...op, attempts: op.attempts + 1 } : op));
    await this.commit();
  }

  async remove(id: string): Promise<boolean> {
    await this.initialize();
    const before = this.operations.length;
    this.operations = this.operations.filter((op) => op.id !== id);
    if (this.operations.length === before) return false;
    await this.commit();
    return true;
  }

  /**
   * Finish a replayed operation. Removes it and returns true when it is
   * still the queued one. When a newer operation replaced it meanwhile,
   * that one stays queued and returns false; with `rebaseTo` given it is
   * rebased onto the version the replay left on the remote.
   */
  async settle(replayed: SyncOperation, rebaseTo?: string | null): Promise<boolean> {
    if (await this.remove(replayed.id)) return true;
    const newer = this.operations.find(
      (op) => op.collection === replayed.collection && op.recordId === replayed.recordId,
    );
    if (newer && rebaseTo !== undefined) {
      this.operations = this.operations.map((op) => (op.id === newer.id ? { ...op, baseVersion: rebaseTo } : op));
      await this.commit();
    }
    return false;
  }

  /** Drop the queued operation of one record, if any */
  async removeFor(collection: string, recordId: string): Promise<boolean> {
    await this.initialize();
    const op = this.operations.find((o) => o.collection === collection && o.recordId === recordId);
    return op ? this.remove(op.id) : false;
  }

  async clear(collection?: string): Promise<number> {
    await this.initialize();
    const before = this.operations.length;
    this.operations = this.operations.filter((op) => collection !== undefined && op.collection !== collection);
    const removed = before - this.operations.length;
    if (removed > 0) await this.commit();
    return removed;
  }

  size(): number {
    return this.operations.length;
  }

  private async load(): Promise<void> {
    const raw = await this.kv.getString(this.storageKey);
    if (raw !== null) {
      let parsed: unknown = [];
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        this.log.warn({ err }, 'Corrupt sync queue; starting empty');
      }
      if (Array.isArray(parsed)) {
        this.operations = parsed.filter((entry: unknown): entry is SyncOperation => validateSyncOperation(entry));
      }
    }
    pendingSyncOperations.set(this.operations.length);
  }

  private async commit(): Promise<void> {
    const payload = JSON.stringify(this.operations);
    pendingSyncOperations.set(this.operations.length);
    const run = this.writes.then(async () => {
      if (!(await this.kv.setString(this.storageKey, payload))) {
        throw new CacheIOError('Store rejected sync queue write');
      }
    });
    this.writes = run.catch((err: unknown) => {
      this.log.error({ err }, 'Sync queue persist failed');
    });
    await run;
  }
}
