/**
 * One TieredStore per configured collection, plus the conflict operations
 * that span collections (listing and presenting pending conflicts).
 */

import { ConflictNotFoundError } from '../core/errors';
import { ConflictQueue } from '../sync/conflict-queue';
import { ConflictResolver } from '../sync/conflict-resolver';
import {
  ConflictResolutionItem,
  FieldChoice,
  ResolutionStrategy,
  SyncResult,
  SyncStatistics,
} from '../sync/types';
import { ConflictResolutionOutcome } from './types';
import { TieredStore } from './tiered-store';

export class StoreRegistry {
  private readonly stores = new Map<string, TieredStore>();

  constructor(
    stores: TieredStore[],
    private readonly conflicts: ConflictQueue,
    private readonly resolver: ConflictResolver,
  ) {
    for (const store of stores) this.stores.set(store.collection, store);
  }

  get(collection: string): TieredStore | undefined {
    return this.stores.get(collection);
  }

  collections(): string[] {
    return [...this.stores.keys()];
  }

  /**
   * Pending conflicts, oldest first. Items still in `detected` are moved to
   * `presented`, since the caller is about to show them.
   */
  async listConflicts(collection?: string, actor = 'user'): Promise<ConflictResolutionItem[]> {
    const pending = await this.conflicts.pending(collection);
    const listed: ConflictResolutionItem[] = [];
    for (const item of pending) {
      if (item.state === 'detected') {
        const presented = this.resolver.present(item, actor);
        await this.conflicts.update(presented);
        listed.push(presented);
      } else {
        listed.push(item);
      }
    }
    return listed;
  }

  async resolveConflict(
    conflictId: string,
    strategy: ResolutionStrategy,
    fieldChoices?: Record<string, FieldChoice>,
    actor = 'user',
  ): Promise<ConflictResolutionOutcome> {
    const item = await this.conflicts.get(conflictId);
    const store = item ? this.stores.get(item.collection) : undefined;
    if (!store) throw new ConflictNotFoundError(conflictId);
    return store.resolveConflict(conflictId, strategy, fieldChoices, actor);
  }

  /** Sync pass over every collection */
  async syncAll(): Promise<Record<string, SyncResult>> {
    const results: Record<string, SyncResult> = {};
    for (const [name, store] of this.stores) {
      results[name] = await store.syncPending();
    }
    return results;
  }

  async syncStatistics(): Promise<SyncStatistics> {
    const collections = await Promise.all([...this.stores.values()].map((store) => store.syncStatus()));
    const finished = collections.map((c) => c.lastSyncAt).filter((at): at is string => at !== null).sort();
    return {
      syncing: collections.some((c) => c.syncing),
      lastSyncAt: finished.length > 0 ? finished[finished.length - 1] : null,
      pendingOperations: collections.reduce((sum, c) => sum + c.pendingOperations, 0),
      pendingConflicts: collections.reduce((sum, c) => sum + c.pendingConflicts, 0),
      collections,
    };
  }
}
