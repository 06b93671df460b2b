/**
 * Field Encryptor
 *
 * AES-256-GCM over single strings, and over the sensitive fields of a
 * record. Payload: base64(iv[12] || authTag[16] || ciphertext).
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import { FieldMap, FieldValue } from '../core/types';
import { parseFieldMap } from '../core/field-map';
import { DecryptionError } from '../core/errors';
import { KeyManager } from './key-manager';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/** How a decrypted sensitive field is turned back into a value */
export type SensitiveFieldKind = 'string' | 'number' | 'boolean' | 'map';

function decryptWith(key: Buffer, bytes: Buffer): string {
  const iv = bytes.subarray(0, IV_LENGTH);
  const tag = bytes.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
  const ciphertext = bytes.subarray(IV_LENGTH + TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, iv);
  decipher.setAuthTag(tag);
  const plain = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  return new TextDecoder('utf-8', { fatal: true }).decode(plain);
}

function encodeForEncryption(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function restore(plaintext: string, kind: SensitiveFieldKind | undefined): FieldValue {
  // Empty plaintext stays "" whatever the kind; null and "" are not distinguished
  if (plaintext === '' || kind === undefined || kind === 'string') return plaintext;
  switch (kind) {
    case 'number': {
      const n = Number(plaintext);
      return Number.isFinite(n) ? n : plaintext;
    }
    case 'boolean':
      return plaintext === 'true' ? true : plaintext === 'false' ? false : plaintext;
    case 'map':
      return parseFieldMap(plaintext) ?? plaintext;
  }
}

export class FieldEncryptor {
  constructor(private readonly keys: KeyManager) {}

  isAvailable(): boolean {
    return this.keys.isInitialized();
  }

  encryptString(plaintext: string): string {
    const key = this.keys.getKey();
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]).toString('base64');
  }

  decryptString(payload: string): string {
    const bytes = this.decodePayload(payload);
    const candidates = [this.keys.getKey()];
    const previous = this.keys.getPreviousKey();
    if (previous) candidates.push(previous);

    let lastError: unknown;
    for (const key of candidates) {
      try {
        return decryptWith(key, bytes);
      } catch (err) {
        lastError = err;
      }
    }
    throw new DecryptionError('Integrity check failed', { cause: lastError });
  }

  /**
   * Encrypt the named fields. Listed fields that are absent or null are
   * written as an encrypted empty string.
   */
  encryptRecord(fields: FieldMap, sensitiveFields: Iterable<string>): FieldMap {
    const out: FieldMap = { ...fields };
    for (const name of sensitiveFields) {
      out[name] = this.encryptString(encodeForEncryption(fields[name]));
    }
    return out;
  }

  decryptRecord(
    fields: FieldMap,
    sensitiveFields: Iterable<string>,
    kinds: Readonly<Record<string, SensitiveFieldKind>> = {},
  ): FieldMap {
    const out: FieldMap = { ...fields };
    for (const name of sensitiveFields) {
      const value = fields[name];
      if (value === undefined) continue;
      if (typeof value !== 'string') {
        throw new DecryptionError(`Field ${name} is not an encrypted payload`);
      }
      out[name] = restore(this.decryptString(value), kinds[name]);
    }
    return out;
  }

  hashValue(value: string): string {
    return createHash('sha256').update(value, 'utf8').digest('hex');
  }

  private decodePayload(payload: string): Buffer {
    if (!BASE64_PATTERN.test(payload) || payload.length % 4 !== 0) {
      throw new DecryptionError('Payload is not valid base64');
    }
    const bytes = Buffer.from(payload, 'base64');
    // Non-canonical trailing bits decode silently; reject them so every edit is caught
    if (bytes.toString('base64') !== payload) {
      throw new DecryptionError('Payload is not canonical base64');
    }
    if (bytes.length < IV_LENGTH + TAG_LENGTH) {
      throw new DecryptionError('Payload too short');
    }
    return bytes;
  }
}
