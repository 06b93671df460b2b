/**
 * Sync Conflict Resolver
 *
 * Field-level divergence detection between a local and a remote copy of a
 * record, and the detected → presented → resolved lifecycle of the
 * resulting conflict items. Items are treated as immutable: every
 * transition returns a new item.
 */

import { v4 as uuid } from 'uuid';
import { Clock, FieldMap, FieldValue, systemClock, TIMESTAMP_FIELD } from '../core/types';
import { fieldValuesEqual, getTimestamp } from '../core/field-map';
import { InvalidConflictStateError, MissingFieldChoiceError } from '../core/errors';
import {
  ConflictData,
  ConflictPolicy,
  ConflictResolutionItem,
  ConflictState,
  FieldChoice,
  ResolutionStrategy,
  ResolvedConflictItem,
} from './types';

export const SYSTEM_ACTOR = 'system';

// Field names are data: only own properties count, never inherited ones
function ownValue(map: FieldMap, field: string): FieldValue | undefined {
  return Object.hasOwn(map, field) ? map[field] : undefined;
}

export class ConflictResolver {
  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Null when every field other than the timestamp agrees, whatever the
   * timestamps say.
   */
  detectConflict(local: FieldMap, remote: FieldMap): ConflictData | null {
    const fields = new Set([...Object.keys(local), ...Object.keys(remote)]);
    fields.delete(TIMESTAMP_FIELD);

    const conflictingFields = [...fields]
      .filter((f) => !fieldValuesEqual(ownValue(local, f), ownValue(remote, f)))
      .sort();
    if (conflictingFields.length === 0) return null;

    return {
      localData: structuredClone(local),
      remoteData: structuredClone(remote),
      localTimestamp: getTimestamp(local),
      remoteTimestamp: getTimestamp(remote),
      conflictingFields,
    };
  }

  createItem(collection: string, recordId: string, conflictData: ConflictData): ConflictResolutionItem {
    const now = this.now();
    return {
      id: uuid(),
      collection,
      recordId,
      conflictData: structuredClone(conflictData),
      detectedAt: now,
      state: 'detected',
      history: [{ state: 'detected', at: now, actor: SYSTEM_ACTOR }],
    };
  }

  present(item: ConflictResolutionItem, actor = SYSTEM_ACTOR): ConflictResolutionItem {
    if (item.state === 'presented') return item;
    this.assertState(item, 'detected', 'presented');
    return this.transition(item, 'presented', actor);
  }

  resolve(
    item: ConflictResolutionItem,
    strategy: ResolutionStrategy,
    fieldChoices?: Record<string, FieldChoice>,
    actor = SYSTEM_ACTOR,
  ): ResolvedConflictItem {
    this.assertState(item, 'presented', 'resolved');
    const record = this.buildRecord(item.conflictData, strategy, fieldChoices);
    return {
      ...this.transition(item, 'resolved', actor, strategy),
      resolution: {
        strategy,
        ...(strategy === 'merge' && fieldChoices ? { fieldChoices: { ...fieldChoices } } : {}),
        record,
      },
    };
  }

  /** Present (if needed) and resolve in one step under an automatic policy */
  applyPolicy(item: ConflictResolutionItem, policy: ConflictPolicy): ResolvedConflictItem {
    const actor = `policy:${policy.name}`;
    const presented = this.present(item, actor);
    const decision = policy.decide(presented.conflictData);
    return this.resolve(presented, decision.strategy, decision.fieldChoices, actor);
  }

  private buildRecord(
    data: ConflictData,
    strategy: ResolutionStrategy,
    fieldChoices: Record<string, FieldChoice> | undefined,
  ): FieldMap {
    if (strategy === 'useLocal') return structuredClone(data.localData);
    if (strategy === 'useRemote') return structuredClone(data.remoteData);

    const choices = fieldChoices ?? {};
    const choiceFor = (field: string): FieldChoice | undefined =>
      Object.hasOwn(choices, field) ? choices[field] : undefined;

    const missing = data.conflictingFields.filter((f) => choiceFor(f) !== 'local' && choiceFor(f) !== 'remote');
    if (missing.length > 0) throw new MissingFieldChoiceError(missing);

    const conflicting = new Set(data.conflictingFields);
    const merged: FieldMap = {};
    const fields = new Set([...Object.keys(data.localData), ...Object.keys(data.remoteData)]);

    for (const field of fields) {
      let value: FieldValue | undefined;
      if (conflicting.has(field)) {
        value = ownValue(choiceFor(field) === 'remote' ? data.remoteData : data.localData, field);
      } else {
        value = Object.hasOwn(data.localData, field) ? data.localData[field] : ownValue(data.remoteData, field);
      }
      if (value !== undefined) merged[field] = structuredClone(value);
    }
    return merged;
  }

  private assertState(item: ConflictResolutionItem, expected: ConflictState, target: ConflictState): void {
    if (item.state !== expected) throw new InvalidConflictStateError(item.id, item.state, target);
  }

  private transition(
    item: ConflictResolutionItem,
    state: ConflictState,
    actor: string,
    strategy?: ResolutionStrategy,
  ): ConflictResolutionItem {
    const copy = structuredClone(item);
    copy.state = state;
    copy.history.push({ state, at: this.now(), actor, ...(strategy ? { strategy } : {}) });
    return copy;
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}

// ───── Built-in policies ────────────────────────────────────────

export const conflictPolicies = {
  preferLocal: { name: 'preferLocal', decide: () => ({ strategy: 'useLocal' }) },
  preferRemote: { name: 'preferRemote', decide: () => ({ strategy: 'useRemote' }) },
  /** Whole-record last-writer-wins on `lastUpdate`; ties and unknowns keep remote */
  newestWins: {
    name: 'newestWins',
    decide: (data) => {
      const local = data.localTimestamp ? Date.parse(data.localTimestamp) : NaN;
      const remote = data.remoteTimestamp ? Date.parse(data.remoteTimestamp) : NaN;
      return { strategy: local > remote ? 'useLocal' : 'useRemote' };
    },
  },
} satisfies Record<string, ConflictPolicy>;
