import { ConflictResolver, conflictPolicies, SYSTEM_ACTOR } from '../../src/sync/conflict-resolver';
import { ConflictData, FieldChoice } from '../../src/sync/types';
import { InvalidConflictStateError, MissingFieldChoiceError } from '../../src/core/errors';
import { FieldMap } from '../../src/core/types';

const T0 = Date.parse('2024-03-01T08:00:00.000Z');

describe('ConflictResolver', () => {
  let now: number;
  let resolver: ConflictResolver;

  const local: FieldMap = {
    name: 'Aspirin',
    dosage: '100mg',
    notes: 'after food',
    lastUpdate: '2024-03-01T07:00:00.000Z',
  };
  const remote: FieldMap = {
    name: 'Aspirin',
    dosage: '200mg',
    frequency: 'daily',
    lastUpdate: '2024-03-01T07:30:00.000Z',
  };

  beforeEach(() => {
    now = T0;
    resolver = new ConflictResolver(() => now);
  });

  function detected(): ConflictData {
    const data = resolver.detectConflict(local, remote);
    if (!data) throw new Error('expected a conflict');
    return data;
  }

  describe('detectConflict', () => {
    it('should list differing fields, including one-sided ones, in sorted order', () => {
      const data = detected();

      expect(data.conflictingFields).toEqual(['dosage', 'frequency', 'notes']);
      expect(data.localTimestamp).toBe('2024-03-01T07:00:00.000Z');
      expect(data.remoteTimestamp).toBe('2024-03-01T07:30:00.000Z');
    });

    it('should be symmetric in the fields it reports', () => {
      expect(resolver.detectConflict(remote, local)?.conflictingFields).toEqual(detected().conflictingFields);
    });

    it('should ignore the timestamp field', () => {
      const a = { name: 'Aspirin', lastUpdate: '2024-01-01T00:00:00.000Z' };
      const b = { name: 'Aspirin', lastUpdate: '2024-02-01T00:00:00.000Z' };

      expect(resolver.detectConflict(a, b)).toBeNull();
    });

    it('should compare nested maps by value', () => {
      expect(resolver.detectConflict({ meta: { a: 1, b: 2 } }, { meta: { b: 2, a: 1 } })).toBeNull();
      expect(resolver.detectConflict({ meta: { a: 1 } }, { meta: { a: 2 } })?.conflictingFields).toEqual(['meta']);
    });

    it('should treat null and absent as different', () => {
      expect(resolver.detectConflict({ notes: null }, {})?.conflictingFields).toEqual(['notes']);
    });

    it('should copy the inputs', () => {
      const input: FieldMap = { name: 'a' };
      const data = resolver.detectConflict(input, { name: 'b' });
      input.name = 'changed';

      expect(data?.localData).toEqual({ name: 'a' });
    });
  });

  describe('lifecycle', () => {
    it('should record each transition in the history', () => {
      const item = resolver.createItem('medications', 'med-1', detected());
      now = T0 + 1000;
      const presented = resolver.present(item, 'user');
      now = T0 + 2000;
      const resolved = resolver.resolve(presented, 'useLocal', undefined, 'user');

      expect(item.state).toBe('detected');
      expect(presented.state).toBe('presented');
      expect(resolved.state).toBe('resolved');
      expect(resolved.history).toEqual([
        { state: 'detected', at: '2024-03-01T08:00:00.000Z', actor: SYSTEM_ACTOR },
        { state: 'presented', at: '2024-03-01T08:00:01.000Z', actor: 'user' },
        { state: 'resolved', at: '2024-03-01T08:00:02.000Z', actor: 'user', strategy: 'useLocal' },
      ]);
    });

    it('should give every item its own id', () => {
      const a = resolver.createItem('medications', 'med-1', detected());
      const b = resolver.createItem('medications', 'med-1', detected());
      expect(a.id).not.toBe(b.id);
    });

    it('should treat presenting twice as a no-op', () => {
      const presented = resolver.present(resolver.createItem('medications', 'med-1', detected()));
      expect(resolver.present(presented)).toBe(presented);
    });

    it('should refuse to resolve an item that was never presented', () => {
      const item = resolver.createItem('medications', 'med-1', detected());
      expect(() => resolver.resolve(item, 'useLocal')).toThrow(InvalidConflictStateError);
    });

    it('should refuse to resolve or present a resolved item', () => {
      const presented = resolver.present(resolver.createItem('medications', 'med-1', detected()));
      const resolved = resolver.resolve(presented, 'useRemote');

      expect(() => resolver.resolve(resolved, 'useLocal')).toThrow(InvalidConflictStateError);
      expect(() => resolver.present(resolved)).toThrow(InvalidConflictStateError);
    });
  });

  describe('resolve', () => {
    function presented() {
      return resolver.present(resolver.createItem('medications', 'med-1', detected()));
    }

    it('should take the whole local record for useLocal', () => {
      expect(resolver.resolve(presented(), 'useLocal').resolution.record).toEqual(local);
    });

    it('should take the whole remote record for useRemote', () => {
      expect(resolver.resolve(presented(), 'useRemote').resolution.record).toEqual(remote);
    });

    it('should merge per-field choices', () => {
      const resolved = resolver.resolve(presented(), 'merge', {
        dosage: 'remote',
        frequency: 'remote',
        notes: 'local',
      });

      expect(resolved.resolution.record).toEqual({
        name: 'Aspirin',
        dosage: '200mg',
        frequency: 'daily',
        notes: 'after food',
        lastUpdate: '2024-03-01T07:00:00.000Z',
      });
      expect(resolved.resolution.fieldChoices).toEqual({ dosage: 'remote', frequency: 'remote', notes: 'local' });
    });

    it('should omit a chosen field that is absent on the chosen side', () => {
      const resolved = resolver.resolve(presented(), 'merge', {
        dosage: 'local',
        frequency: 'local',
        notes: 'remote',
      });

      expect(resolved.resolution.record).toEqual({
        name: 'Aspirin',
        dosage: '100mg',
        lastUpdate: '2024-03-01T07:00:00.000Z',
      });
    });

    it('should treat field names that shadow object builtins as plain data', () => {
      const data = resolver.detectConflict({ constructor: 'x', name: 'Aspirin' }, { name: 'Aspirin Forte' });
      if (!data) throw new Error('expected a conflict');
      const item = resolver.present(resolver.createItem('medications', 'med-1', data));

      const constructorChoice: FieldChoice = 'remote';
      const resolved = resolver.resolve(item, 'merge', { constructor: constructorChoice, name: 'local' });

      expect(resolved.resolution.record).toEqual({ name: 'Aspirin' });
    });

    it('should not take an inherited property as a field choice', () => {
      const data = resolver.detectConflict({ toString: 'a' }, { toString: 'b' });
      if (!data) throw new Error('expected a conflict');
      const item = resolver.present(resolver.createItem('medications', 'med-1', data));

      expect(() => resolver.resolve(item, 'merge', {})).toThrow(MissingFieldChoiceError);
    });

    it('should name every conflicting field without a choice', () => {
      const item = presented();
      let error: unknown;
      try {
        resolver.resolve(item, 'merge', { dosage: 'local' });
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(MissingFieldChoiceError);
      expect(error instanceof MissingFieldChoiceError && error.missingFields).toEqual(['frequency', 'notes']);
    });

    it('should not mutate the item it resolves', () => {
      const item = presented();
      resolver.resolve(item, 'useLocal');

      expect(item.state).toBe('presented');
      expect(item.resolution).toBeUndefined();
      expect(item.history).toHaveLength(2);
    });
  });

  describe('policies', () => {
    it('should resolve a detected item in one step under a policy', () => {
      const item = resolver.createItem('medications', 'med-1', detected());
      const resolved = resolver.applyPolicy(item, conflictPolicies.preferLocal);

      expect(resolved.resolution.record).toEqual(local);
      expect(resolved.history.map((h) => h.actor)).toEqual([
        SYSTEM_ACTOR,
        'policy:preferLocal',
        'policy:preferLocal',
      ]);
    });

    it('should pick the newer side under newestWins', () => {
      const item = resolver.createItem('medications', 'med-1', detected());
      expect(resolver.applyPolicy(item, conflictPolicies.newestWins).resolution.strategy).toBe('useRemote');

      const flipped = resolver.detectConflict(remote, local);
      if (!flipped) throw new Error('expected a conflict');
      const other = resolver.createItem('medications', 'med-1', flipped);
      expect(resolver.applyPolicy(other, conflictPolicies.newestWins).resolution.strategy).toBe('useLocal');
    });

    it('should keep remote under newestWins when a timestamp is missing', () => {
      const data = resolver.detectConflict({ name: 'a', lastUpdate: '2024-03-01T00:00:00.000Z' }, { name: 'b' });
      if (!data) throw new Error('expected a conflict');

      expect(conflictPolicies.newestWins.decide(data)).toEqual({ strategy: 'useRemote' });
    });
  });
});
