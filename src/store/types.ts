import { FieldMap } from '../core/types';
import { SensitiveFieldKind } from '../security/field-encryptor';
import { ConflictResolutionItem } from '../sync/types';

export interface CollectionSettings {
  name: string;
  /** Sensitive field → kind it is restored to after decryption */
  sensitiveFields: Record<string, SensitiveFieldKind>;
  /** Record cache TTL override; null = no expiry */
  cacheTtlMs?: number | null;
}

export type ReadSource = 'cache' | 'remote' | 'encryptedLocal' | 'unencryptedLocal';

export interface ReadOptions {
  /** Skip the record cache and go to the remote first */
  forceRefresh?: boolean;
}

export interface QueryOptions {
  /** Result cache TTL; null = no expiry, undefined = store default */
  ttlMs?: number | null;
  /** Skip a fresh cached result and fetch again */
  forceRefresh?: boolean;
}

export interface ReadResult {
  record: FieldMap;
  source: ReadSource;
}

export type TierStatus = 'ok' | 'failed' | 'skipped';

/**
 * written: remote accepted the record.
 * unchanged: remote already held identical content; its version was adopted.
 * conflict: remote diverged; a conflict item was queued and remote left as is.
 * queued: remote unreachable; the operation waits in the sync queue.
 * failed: remote unreachable and the operation could not be queued.
 */
export type RemoteWriteStatus = 'written' | 'unchanged' | 'conflict' | 'queued' | 'failed';

export interface WriteOutcome {
  record: FieldMap;
  remote: RemoteWriteStatus;
  encryptedLocal: TierStatus;
  unencryptedLocal: TierStatus;
  cache: TierStatus;
  conflict?: ConflictResolutionItem;
}

/**
 * conflict: the remote copy changed since this client last saw it, so it was
 * kept and written back to the local tiers as `record`.
 */
export interface DeleteOutcome {
  remote: 'deleted' | 'conflict' | 'queued' | 'failed';
  encryptedLocal: TierStatus;
  unencryptedLocal: TierStatus;
  cache: TierStatus;
  record?: FieldMap;
}

export type ClearTier =
  | 'remote'
  | 'encryptedLocal'
  | 'unencryptedLocal'
  | 'cache'
  | 'versions'
  | 'syncQueue'
  | 'conflicts';

export interface TierResult {
  status: TierStatus;
  removed?: number;
  error?: string;
}

export type ClearOutcome = Record<ClearTier, TierResult>;

export interface ConflictResolutionOutcome {
  item: ConflictResolutionItem;
  write: WriteOutcome;
}
