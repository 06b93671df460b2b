/**
 * Collection configuration: which record collections exist and which of
 * their fields are encrypted in the local tier.
 *
 * Read from config/collections.json; the built-in default is used when the
 * file is missing or fails validation.
 */

import fs from 'fs';
import { ajv, formatErrors } from '../core/validation';
import { logger } from '../observability/logger';
import { CollectionSettings } from '../store/types';

export interface CollectionsFile {
  collections: CollectionSettings[];
}

export const COLLECTION_NAME_PATTERN = '^[A-Za-z0-9_-]+$';

const validateCollectionsFile = ajv.compile<CollectionsFile>({
  type: 'object',
  required: ['collections'],
  additionalProperties: false,
  properties: {
    collections: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['name', 'sensitiveFields'],
        additionalProperties: false,
        properties: {
          name: { type: 'string', pattern: COLLECTION_NAME_PATTERN },
          sensitiveFields: {
            type: 'object',
            additionalProperties: { enum: ['string', 'number', 'boolean', 'map'] },
          },
          cacheTtlMs: { type: ['integer', 'null'], minimum: 0 },
        },
      },
    },
  },
});

export const DEFAULT_COLLECTIONS: CollectionSettings[] = [
  { name: 'medications', sensitiveFields: { name: 'string', dosage: 'string', notes: 'string' } },
  { name: 'doses', sensitiveFields: { notes: 'string' } },
  { name: 'schedules', sensitiveFields: {} },
];

export function parseCollectionsConfig(raw: unknown): CollectionSettings[] {
  if (!validateCollectionsFile(raw)) {
    throw new Error(`Invalid collections config: ${formatErrors(validateCollectionsFile.errors)}`);
  }
  const names = raw.collections.map((c) => c.name);
  const duplicate = names.find((n, i) => names.indexOf(n) !== i);
  if (duplicate) throw new Error(`Invalid collections config: duplicate collection ${duplicate}`);
  return raw.collections;
}

export function loadCollectionsConfig(filePath: string): CollectionSettings[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    logger.warn({ err, filePath }, 'Collections config not found; using defaults');
    return DEFAULT_COLLECTIONS;
  }

  try {
    const collections = parseCollectionsConfig(JSON.parse(content));
    logger.info({ filePath, collections: collections.map((c) => c.name) }, 'Collections config loaded');
    return collections;
  } catch (err) {
    logger.error({ err, filePath }, 'Collections config rejected; using defaults');
    return DEFAULT_COLLECTIONS;
  }
}
