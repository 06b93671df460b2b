/**
 * Conflict Queue
 *
 * Pending (unresolved) conflict items, persisted as one JSON array so they
 * survive restarts. Subscribers receive the full pending list immediately
 * and after every change.
 */

import { KeyValueStore } from '../storage/types';
import { CacheIOError, ConflictNotFoundError } from '../core/errors';
import { componentLogger } from '../observability/logger';
import { validateConflictItem } from './schemas';
import { ConflictResolutionItem } from './types';

export const CONFLICT_QUEUE_KEY = 'conflict_resolution_queue';

export type ConflictListener = (pending: ConflictResolutionItem[]) => void;

export class ConflictQueue {
  private readonly items = new Map<string, ConflictResolutionItem>();
  private readonly listeners = new Set<ConflictListener>();
  private readonly log = componentLogger('conflict-queue');
  private loading: Promise<void> | null = null;
  private loaded = false;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly kv: KeyValueStore,
    private readonly storageKey = CONFLICT_QUEUE_KEY,
  ) {}

  initialize(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  async pending(collection?: string): Promise<ConflictResolutionItem[]> {
    await this.initialize();
    return this.snapshot(collection);
  }

  async get(id: string): Promise<ConflictResolutionItem | null> {
    await this.initialize();
    const item = this.items.get(id);
    return item ? structuredClone(item) : null;
  }

  async hasPending(collection: string, recordId: string): Promise<boolean> {
    await this.initialize();
    return [...this.items.values()].some((i) => i.collection === collection && i.recordId === recordId);
  }

  async add(item: ConflictResolutionItem): Promise<void> {
    await this.initialize();
    this.items.set(item.id, structuredClone(item));
    await this.commit();
  }

  async update(item: ConflictResolutionItem): Promise<void> {
    await this.initialize();
    if (!this.items.has(item.id)) throw new ConflictNotFoundError(item.id);
    this.items.set(item.id, structuredClone(item));
    await this.commit();
  }

  async remove(id: string): Promise<boolean> {
    await this.initialize();
    if (!this.items.delete(id)) return false;
    await this.commit();
    return true;
  }

  /** Drop every pending item, or only those of one collection */
  async clear(collection?: string): Promise<number> {
    await this.initialize();
    const doomed = [...this.items.values()].filter((i) => collection === undefined || i.collection === collection);
    if (doomed.length === 0) return 0;
    for (const item of doomed) this.items.delete(item.id);
    await this.commit();
    return doomed.length;
  }

  /** Returns an unsubscribe function */
  subscribe(listener: ConflictListener): () => void {
    this.listeners.add(listener);
    if (this.loaded) {
      this.deliver(listener);
      return () => {
        this.listeners.delete(listener);
      };
    }
    void this.initialize().then(
      () => this.deliver(listener),
      (err: unknown) => this.log.warn({ err }, 'Conflict queue unavailable for subscriber'),
    );
    return () => {
      this.listeners.delete(listener);
    };
  }

  private snapshot(collection?: string): ConflictResolutionItem[] {
    return [...this.items.values()]
      .filter((i) => collection === undefined || i.collection === collection)
      .sort((a, b) => a.detectedAt.localeCompare(b.detectedAt))
      .map((i) => structuredClone(i));
  }

  private async load(): Promise<void> {
    const raw = await this.kv.getString(this.storageKey);
    this.loaded = true;
    if (raw === null) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.log.warn({ err }, 'Corrupt conflict queue; starting empty');
      return;
    }
    if (!Array.isArray(parsed)) return;

    for (const entry of parsed) {
      if (validateConflictItem(entry)) {
        this.items.set(entry.id, entry);
      } else {
        this.log.warn('Dropping malformed conflict item');
      }
    }
    this.log.info({ pending: this.items.size }, 'Conflict queue loaded');
  }

  private async commit(): Promise<void> {
    const payload = JSON.stringify([...this.items.values()]);
    const run = this.writes.then(async () => {
      if (!(await this.kv.setString(this.storageKey, payload))) {
        throw new CacheIOError('Store rejected conflict queue write');
      }
    });
    this.writes = run.catch((err: unknown) => {
      this.log.error({ err }, 'Conflict queue persist failed');
    });
    await run;
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) this.deliver(listener);
  }

  private deliver(listener: ConflictListener): void {
    if (!this.listeners.has(listener)) return;
    try {
      listener(this.snapshot());
    } catch (err) {
      this.log.warn({ err }, 'Conflict listener threw');
    }
  }
}
