import { FieldMap, FieldValue } from '../core/types';
import { fieldValuesEqual } from '../core/field-map';
import { CollectionQuery, QueryFilter, QueryOrder, RemoteDocument } from './types';

type Comparable = string | number;

function comparable(a: FieldValue | undefined, b: FieldValue | undefined): [Comparable, Comparable] | null {
  if (typeof a === 'number' && typeof b === 'number') return [a, b];
  if (typeof a === 'string' && typeof b === 'string') return [a, b];
  return null;
}

export function matchesFilter(fields: FieldMap, filter: QueryFilter): boolean {
  const actual = fields[filter.field];
  switch (filter.op) {
    case 'eq':
      return fieldValuesEqual(actual ?? null, filter.value);
    case 'neq':
      return !fieldValuesEqual(actual ?? null, filter.value);
    default: {
      // Ordering operators only apply between two numbers or two strings
      const pair = comparable(actual, filter.value);
      if (!pair) return false;
      const [a, b] = pair;
      if (filter.op === 'lt') return a < b;
      if (filter.op === 'lte') return a <= b;
      if (filter.op === 'gt') return a > b;
      return a >= b;
    }
  }
}

function compareValues(a: FieldValue | undefined, b: FieldValue | undefined): number {
  // Absent and null sort first
  const aMissing = a === undefined || a === null;
  const bMissing = b === undefined || b === null;
  if (aMissing || bMissing) return aMissing === bMissing ? 0 : aMissing ? -1 : 1;
  const pair = comparable(a, b);
  if (pair) return pair[0] < pair[1] ? -1 : pair[0] > pair[1] ? 1 : 0;
  return String(a).localeCompare(String(b));
}

function compareDocuments(order: QueryOrder[]) {
  return (left: RemoteDocument, right: RemoteDocument): number => {
    for (const { field, direction } of order) {
      const result = compareValues(left.fields[field], right.fields[field]);
      if (result !== 0) return direction === 'desc' ? -result : result;
    }
    return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
  };
}

/** Filter, order and page a set of documents the way a remote query would. */
export function applyQuery(documents: RemoteDocument[], query: CollectionQuery): RemoteDocument[] {
  const filters = query.filters ?? [];
  const matched = documents.filter((doc) => filters.every((f) => matchesFilter(doc.fields, f)));
  matched.sort(compareDocuments(query.orderBy ?? []));

  const offset = query.offset ?? 0;
  const end = query.limit !== undefined ? offset + query.limit : undefined;
  return matched.slice(offset, end);
}
