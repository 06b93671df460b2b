/**
 * Secure slot storage for key material.
 *
 * File-backed: one owner-only file per slot, base64 content.
 * In-memory variant for tests and ephemeral deployments.
 */

import fs from 'fs/promises';
import path from 'path';
import { SecureStore } from './types';
import { KeyStorageError } from '../core/errors';
import { logger } from '../observability/logger';

const SLOT_PATTERN = /^[A-Za-z0-9_-]+$/;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function assertSlot(slot: string): void {
  if (!SLOT_PATTERN.test(slot)) {
    throw new KeyStorageError(`Invalid key slot name: ${slot}`);
  }
}

export class FileSecureStore implements SecureStore {
  constructor(private readonly dir: string) {}

  async read(slot: string): Promise<Buffer | null> {
    assertSlot(slot);
    try {
      const content = await fs.readFile(this.slotPath(slot), 'utf8');
      return Buffer.from(content.trim(), 'base64');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new KeyStorageError(`Cannot read key slot ${slot}`, { cause: err });
    }
  }

  async write(slot: string, value: Buffer): Promise<void> {
    assertSlot(slot);
    try {
      await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });
      await fs.writeFile(this.slotPath(slot), value.toString('base64'), { mode: 0o600 });
    } catch (err) {
      throw new KeyStorageError(`Cannot write key slot ${slot}`, { cause: err });
    }
  }

  async delete(slot: string): Promise<void> {
    assertSlot(slot);
    try {
      await fs.unlink(this.slotPath(slot));
    } catch (err) {
      if (isMissingFile(err)) return;
      throw new KeyStorageError(`Cannot delete key slot ${slot}`, { cause: err });
    }
  }

  private slotPath(slot: string): string {
    return path.join(this.dir, `${slot}.key`);
  }
}

export class InMemorySecureStore implements SecureStore {
  private readonly slots = new Map<string, Buffer>();

  async read(slot: string): Promise<Buffer | null> {
    const value = this.slots.get(slot);
    return value ? Buffer.from(value) : null;
  }

  async write(slot: string, value: Buffer): Promise<void> {
    this.slots.set(slot, Buffer.from(value));
  }

  async delete(slot: string): Promise<void> {
    this.slots.delete(slot);
  }
}

export function createSecureStore(dir: string | undefined): SecureStore {
  if (dir) {
    logger.info({ dir }, 'Secure store: file-backed');
    return new FileSecureStore(dir);
  }
  logger.info('Secure store: In-memory');
  return new InMemorySecureStore();
}
