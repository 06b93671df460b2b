/**
 * Error kinds raised by the storage layers.
 *
 * Conflicts are not errors: they travel as ConflictResolutionItem values.
 */

import { RemoteDocument } from '../storage/types';

export type StoreErrorCode =
  | 'KEY_STORAGE'
  | 'DECRYPTION'
  | 'CACHE_IO'
  | 'REMOTE_UNAVAILABLE'
  | 'PRECONDITION_FAILED'
  | 'MISSING_FIELD_CHOICE'
  | 'INVALID_CONFLICT_STATE'
  | 'CONFLICT_NOT_FOUND'
  | 'RECORD_UNAVAILABLE';

export class StoreError extends Error {
  constructor(
    readonly code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Secure key storage unreadable/unwritable, or the key was never initialized. */
export class KeyStorageError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('KEY_STORAGE', message, options);
  }
}

/** Malformed ciphertext, bad encoding, or failed integrity check. */
export class DecryptionError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECRYPTION', message, options);
  }
}

export class CacheIOError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CACHE_IO', message, options);
  }
}

export class RemoteUnavailableError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REMOTE_UNAVAILABLE', message, options);
  }
}

/** The remote version differs from the one the write was based on. */
export class PreconditionFailedError extends StoreError {
  constructor(
    readonly collection: string,
    readonly id: string,
    readonly current: RemoteDocument | null,
  ) {
    super('PRECONDITION_FAILED', `Remote version of ${collection}/${id} changed`);
  }
}

export class MissingFieldChoiceError extends StoreError {
  constructor(readonly missingFields: string[]) {
    super('MISSING_FIELD_CHOICE', `Merge requires a choice for: ${missingFields.join(', ')}`);
  }
}

export class InvalidConflictStateError extends StoreError {
  constructor(conflictId: string, from: string, to: string) {
    super('INVALID_CONFLICT_STATE', `Conflict ${conflictId} cannot move from ${from} to ${to}`);
  }
}

export class ConflictNotFoundError extends StoreError {
  constructor(conflictId: string) {
    super('CONFLICT_NOT_FOUND', `Conflict not found: ${conflictId}`);
  }
}

/** Every tier failed for this record. */
export class RecordUnavailableError extends StoreError {
  constructor(
    readonly collection: string,
    readonly id: string,
  ) {
    super('RECORD_UNAVAILABLE', `Record ${collection}/${id} is unavailable in every tier`);
  }
}
