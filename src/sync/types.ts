import { FieldMap } from '../core/types';

export type ConflictState = 'detected' | 'presented' | 'resolved';

export type ResolutionStrategy = 'useLocal' | 'useRemote' | 'merge';

export type FieldChoice = 'local' | 'remote';

export interface ConflictData {
  localData: FieldMap;
  remoteData: FieldMap;
  localTimestamp: string | null;
  remoteTimestamp: string | null;
  /** Fields whose values differ, including fields present on one side only */
  conflictingFields: string[];
}

export interface ConflictHistoryEntry {
  state: ConflictState;
  at: string;
  actor: string;
  strategy?: ResolutionStrategy;
}

export interface ConflictResolution {
  strategy: ResolutionStrategy;
  fieldChoices?: Record<string, FieldChoice>;
  record: FieldMap;
}

export interface ConflictResolutionItem {
  id: string;
  collection: string;
  recordId: string;
  conflictData: ConflictData;
  detectedAt: string;
  state: ConflictState;
  history: ConflictHistoryEntry[];
  resolution?: ConflictResolution;
}

export type ResolvedConflictItem = ConflictResolutionItem & { resolution: ConflictResolution };

/** Automatic resolution rule applied without a user decision */
export interface ConflictPolicy {
  name: string;
  decide(data: ConflictData): { strategy: ResolutionStrategy; fieldChoices?: Record<string, FieldChoice> };
}

export type SyncOperationKind = 'set' | 'delete';

export interface SyncOperation {
  id: string;
  collection: string;
  recordId: string;
  kind: SyncOperationKind;
  /** Full record for `set`; null for `delete` */
  data: FieldMap | null;
  /** Remote `lastUpdate` this client last saw, or null if it never saw one */
  baseVersion: string | null;
  queuedAt: string;
  attempts: number;
}

export interface SyncResult {
  synced: number;
  conflicts: number;
  failed: number;
  /** Operations removed after their final allowed attempt */
  dropped: number;
  remaining: number;
}

export interface CollectionSyncStatus {
  collection: string;
  syncing: boolean;
  lastSyncAt: string | null;
  lastResult: SyncResult | null;
  pendingOperations: number;
  pendingConflicts: number;
}

export interface SyncStatistics {
  syncing: boolean;
  /** Most recent finished pass over any collection */
  lastSyncAt: string | null;
  pendingOperations: number;
  pendingConflicts: number;
  collections: CollectionSyncStatus[];
}
