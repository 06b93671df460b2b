/**
 * Encryption Key Manager
 *
 * Owns the single AES-256 key used for local-tier encryption. The key lives
 * in secure storage; a rotation keeps the outgoing key in a backup slot so
 * data written under it stays readable.
 */

import { randomBytes } from 'crypto';
import { KeyStorageError } from '../core/errors';
import { SecureStore } from '../storage/types';
import { componentLogger } from '../observability/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../resilience/retry';

export const KEY_SLOT = 'encryption_key';
export const PREVIOUS_KEY_SLOT = 'encryption_key_previous';
export const KEY_LENGTH = 32;

export class KeyManager {
  private current: Buffer | null = null;
  private previous: Buffer | null = null;
  private readonly log = componentLogger('key-manager');

  constructor(
    private readonly secureStore: SecureStore,
    private readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY,
  ) {}

  /**
   * Load the key, generating and persisting one on first run.
   * Throws KeyStorageError and stays uninitialized when storage fails.
   */
  async initialize(): Promise<void> {
    try {
      const { current, previous } = await withRetry(() => this.loadOrCreate(), this.retryPolicy, 'key-init');
      this.current = current;
      this.previous = previous;
      this.log.info({ hasPrevious: previous !== null }, 'Encryption key loaded');
    } catch (err) {
      this.current = null;
      this.previous = null;
      this.log.error({ err }, 'Encryption key unavailable; encryption disabled');
      if (err instanceof KeyStorageError) throw err;
      throw new KeyStorageError('Failed to initialize encryption key', { cause: err });
    }
  }

  isInitialized(): boolean {
    return this.current !== null;
  }

  getKey(): Buffer {
    if (!this.current) throw new KeyStorageError('Encryption key not initialized');
    return this.current;
  }

  getPreviousKey(): Buffer | null {
    return this.previous;
  }

  /**
   * Install a fresh key. The outgoing key is persisted to the backup slot
   * before the new key overwrites the primary slot. Existing ciphertext is
   * not re-encrypted.
   */
  async rotate(): Promise<void> {
    const outgoing = this.getKey();
    const next = randomBytes(KEY_LENGTH);

    await this.secureStore.write(PREVIOUS_KEY_SLOT, outgoing);
    await this.secureStore.write(KEY_SLOT, next);

    this.previous = outgoing;
    this.current = next;
    this.log.info('Encryption key rotated');
  }

  /** End the migration window once old ciphertext has been rewritten */
  async discardPreviousKey(): Promise<void> {
    await this.secureStore.delete(PREVIOUS_KEY_SLOT);
    this.previous = null;
  }

  private async loadOrCreate(): Promise<{ current: Buffer; previous: Buffer | null }> {
    let current = await this.secureStore.read(KEY_SLOT);
    if (current === null) {
      current = randomBytes(KEY_LENGTH);
      await this.secureStore.write(KEY_SLOT, current);
      this.log.info('Generated new encryption key');
    } else if (current.length !== KEY_LENGTH) {
      throw new KeyStorageError(`Stored key has ${current.length} bytes, expected ${KEY_LENGTH}`);
    }

    const previous = await this.secureStore.read(PREVIOUS_KEY_SLOT);
    return { current, previous: previous?.length === KEY_LENGTH ? previous : null };
  }
}
