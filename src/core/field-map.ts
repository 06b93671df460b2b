import { FieldMap, FieldValue, TIMESTAMP_FIELD } from './types';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isFieldValue(value: unknown): value is FieldValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return isFieldMap(value);
  }
}

export function isFieldMap(value: unknown): value is FieldMap {
  if (!isPlainObject(value)) return false;
  return Object.values(value).every(isFieldValue);
}

/** Deep value equality. `undefined` stands for an absent field. */
export function fieldValuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (!fieldValuesEqual(a[key], b[key])) return false;
  }
  return true;
}

/** Parse JSON and accept it only if it is a field map. */
export function parseFieldMap(raw: string): FieldMap | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isFieldMap(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function getTimestamp(fields: FieldMap): string | null {
  const value = fields[TIMESTAMP_FIELD];
  return typeof value === 'string' ? value : null;
}

/**
 * Stable JSON encoding with object keys sorted at every depth, so that two
 * structurally equal values always produce the same string.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v === undefined ? null : v)).join(',')}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .filter((key) => value[key] !== undefined)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
