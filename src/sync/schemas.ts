import { ajv } from '../core/validation';
import { ConflictResolutionItem, SyncOperation } from './types';

const timestampOrNull = { type: ['string', 'null'] };

export const validateConflictItem = ajv.compile<ConflictResolutionItem>({
  type: 'object',
  required: ['id', 'collection', 'recordId', 'conflictData', 'detectedAt', 'state', 'history'],
  properties: {
    id: { type: 'string' },
    collection: { type: 'string' },
    recordId: { type: 'string' },
    detectedAt: { type: 'string' },
    state: { enum: ['detected', 'presented', 'resolved'] },
    conflictData: {
      type: 'object',
      required: ['localData', 'remoteData', 'localTimestamp', 'remoteTimestamp', 'conflictingFields'],
      properties: {
        localData: { $ref: 'fieldMap' },
        remoteData: { $ref: 'fieldMap' },
        localTimestamp: timestampOrNull,
        remoteTimestamp: timestampOrNull,
        conflictingFields: { type: 'array', items: { type: 'string' } },
      },
    },
    history: {
      type: 'array',
      items: {
        type: 'object',
        required: ['state', 'at', 'actor'],
        properties: {
          state: { enum: ['detected', 'presented', 'resolved'] },
          at: { type: 'string' },
          actor: { type: 'string' },
          strategy: { enum: ['useLocal', 'useRemote', 'merge'] },
        },
      },
    },
  },
});

export const validateSyncOperation = ajv.compile<SyncOperation>({
  type: 'object',
  required: ['id', 'collection', 'recordId', 'kind', 'data', 'baseVersion', 'queuedAt', 'attempts'],
  properties: {
    id: { type: 'string' },
    collection: { type: 'string' },
    recordId: { type: 'string' },
    kind: { enum: ['set', 'delete'] },
    data: { anyOf: [{ type: 'null' }, { $ref: 'fieldMap' }] },
    baseVersion: timestampOrNull,
    queuedAt: { type: 'string' },
    attempts: { type: 'integer', minimum: 0 },
  },
});
