import { ajv } from '../core/validation';
import { FieldMap } from '../core/types';
import { QueryFilter, QueryOrder } from '../storage/types';
import { FieldChoice, ResolutionStrategy } from '../sync/types';

export interface WriteRecordBody {
  fields: FieldMap;
}

export interface QueryBody {
  filters?: QueryFilter[];
  orderBy?: QueryOrder[];
  limit?: number;
  offset?: number;
  /** Cache lifetime for this result; null caches until invalidated */
  ttlMs?: number | null;
  forceRefresh?: boolean;
}

export interface ReadRecordQuery {
  forceRefresh?: 'true' | 'false';
}

export interface ResolveConflictBody {
  strategy: ResolutionStrategy;
  fieldChoices?: Record<string, FieldChoice>;
}

export interface RemoteAvailabilityBody {
  available: boolean;
  reason?: string;
}

export const validateWriteRecordBody = ajv.compile<WriteRecordBody>({
  type: 'object',
  required: ['fields'],
  additionalProperties: false,
  properties: {
    fields: { $ref: 'fieldMap' },
  },
});

export const validateQueryBody = ajv.compile<QueryBody>({
  type: 'object',
  additionalProperties: false,
  properties: {
    filters: {
      type: 'array',
      items: {
        type: 'object',
        required: ['field', 'op', 'value'],
        additionalProperties: false,
        properties: {
          field: { type: 'string', minLength: 1 },
          op: { enum: ['eq', 'neq', 'lt', 'lte', 'gt', 'gte'] },
          value: { type: ['string', 'number', 'boolean', 'null'] },
        },
      },
    },
    orderBy: {
      type: 'array',
      items: {
        type: 'object',
        required: ['field'],
        additionalProperties: false,
        properties: {
          field: { type: 'string', minLength: 1 },
          direction: { enum: ['asc', 'desc'] },
        },
      },
    },
    limit: { type: 'integer', minimum: 0 },
    offset: { type: 'integer', minimum: 0 },
    ttlMs: { type: ['integer', 'null'], minimum: 0 },
    forceRefresh: { type: 'boolean' },
  },
});

export const validateReadRecordQuery = ajv.compile<ReadRecordQuery>({
  type: 'object',
  additionalProperties: false,
  properties: {
    forceRefresh: { enum: ['true', 'false'] },
  },
});

export const validateResolveConflictBody = ajv.compile<ResolveConflictBody>({
  type: 'object',
  required: ['strategy'],
  additionalProperties: false,
  properties: {
    strategy: { enum: ['useLocal', 'useRemote', 'merge'] },
    fieldChoices: {
      type: 'object',
      additionalProperties: { enum: ['local', 'remote'] },
    },
  },
});

export const validateRemoteAvailabilityBody = ajv.compile<RemoteAvailabilityBody>({
  type: 'object',
  required: ['available'],
  additionalProperties: false,
  properties: {
    available: { type: 'boolean' },
    reason: { type: 'string' },
  },
});
