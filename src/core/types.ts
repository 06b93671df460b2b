/**
 * Record payload types shared by every tier.
 *
 * Records are flat field maps so the cache, encryption and sync layers stay
 * generic across entity types (medications, doses, schedules, ...).
 */

export type FieldValue = string | number | boolean | null | FieldMap;

export interface FieldMap {
  [field: string]: FieldValue;
}

/** Field carrying the record's modification instant (ISO-8601). Doubles as the record version. */
export const TIMESTAMP_FIELD = 'lastUpdate';

/** Millisecond wall clock, injectable for tests */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
