import { InMemoryRemoteStore } from '../../src/storage/remote-store';
import { applyQuery, matchesFilter } from '../../src/storage/query-filter';
import { CollectionQuery, RemoteDocument } from '../../src/storage/types';
import { PreconditionFailedError, RemoteUnavailableError } from '../../src/core/errors';

// Mock logger
jest.mock('../../src/observability/logger', () => {
  const log = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn(), fatal: jest.fn() };
  const child = () => log;
  return { logger: { ...log, child }, componentLogger: child };
});

async function collect(stream: AsyncIterable<RemoteDocument>): Promise<RemoteDocument[]> {
  const docs: RemoteDocument[] = [];
  for await (const doc of stream) docs.push(doc);
  return docs;
}

describe('InMemoryRemoteStore', () => {
  let remote: InMemoryRemoteStore;
  const v1 = '2024-03-01T08:00:00.000Z';
  const v2 = '2024-03-01T09:00:00.000Z';

  beforeEach(() => {
    remote = new InMemoryRemoteStore();
  });

  it('should write unconditionally without an expected version', async () => {
    await remote.setDocument('medications', 'med-1', { name: 'Aspirin', lastUpdate: v1 });
    await remote.setDocument('medications', 'med-1', { name: 'Ibuprofen', lastUpdate: v2 });

    expect(await remote.getById('medications', 'med-1')).toEqual({
      id: 'med-1',
      fields: { name: 'Ibuprofen', lastUpdate: v2 },
    });
  });

  it('should create only when the document is absent under a null expected version', async () => {
    await remote.setDocument('medications', 'med-1', { name: 'Aspirin', lastUpdate: v1 }, { expectedVersion: null });

    const attempt = remote.setDocument('medications', 'med-1', { name: 'Other' }, { expectedVersion: null });
    await expect(attempt).rejects.toBeInstanceOf(PreconditionFailedError);
  });

  it('should compare versions and report the current document on mismatch', async () => {
    await remote.setDocument('medications', 'med-1', { name: 'Aspirin', lastUpdate: v1 });
    await remote.setDocument('medications', 'med-1', { name: 'B', lastUpdate: v2 }, { expectedVersion: v1 });

    let error: unknown;
    try {
      await remote.setDocument('medications', 'med-1', { name: 'C' }, { expectedVersion: v1 });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(PreconditionFailedError);
    expect(error instanceof PreconditionFailedError && error.current).toEqual({
      id: 'med-1',
      fields: { name: 'B', lastUpdate: v2 },
    });
  });

  it('should fail a versioned write to a missing document with no current copy', async () => {
    const attempt = remote.setDocument('medications', 'gone', { name: 'x' }, { expectedVersion: v1 });
    await expect(attempt).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', current: null });
  });

  it('should stream a filtered query', async () => {
    await remote.setDocument('doses', 'd1', { amount: 2, taken: true });
    await remote.setDocument('doses', 'd2', { amount: 1, taken: false });
    await remote.setDocument('doses', 'd3', { amount: 3, taken: true });

    const docs = await collect(
      remote.streamCollection({
        collection: 'doses',
        filters: [{ field: 'taken', op: 'eq', value: true }],
        orderBy: [{ field: 'amount', direction: 'desc' }],
      }),
    );

    expect(docs.map((d) => d.id)).toEqual(['d3', 'd1']);
  });

  it('should delete and clear documents', async () => {
    await remote.setDocument('doses', 'd1', { amount: 1 });
    await remote.setDocument('doses', 'd2', { amount: 2 });

    await remote.deleteDocument('doses', 'd1');
    expect(await remote.getById('doses', 'd1')).toBeNull();
    expect(await remote.clearCollection('doses')).toBe(1);
    expect(await collect(remote.streamCollection({ collection: 'doses' }))).toEqual([]);
  });

  it('should delete only the expected version', async () => {
    await remote.setDocument('medications', 'med-1', { name: 'Aspirin', lastUpdate: v2 });

    let error: unknown;
    try {
      await remote.deleteDocument('medications', 'med-1', { expectedVersion: v1 });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(PreconditionFailedError);
    expect(error instanceof PreconditionFailedError && error.current).toEqual({
      id: 'med-1',
      fields: { name: 'Aspirin', lastUpdate: v2 },
    });

    await remote.deleteDocument('medications', 'med-1', { expectedVersion: v2 });
    expect(await remote.getById('medications', 'med-1')).toBeNull();
  });

  it('should treat deleting a missing document as done', async () => {
    await expect(remote.deleteDocument('medications', 'gone', { expectedVersion: v1 })).resolves.toBeUndefined();
  });

  it('should refuse a delete expecting absence when a document exists', async () => {
    await remote.setDocument('medications', 'med-1', { name: 'Aspirin', lastUpdate: v1 });

    await expect(remote.deleteDocument('medications', 'med-1', { expectedVersion: null })).rejects.toBeInstanceOf(
      PreconditionFailedError,
    );
  });

  it('should reject every call while offline', async () => {
    remote.setAvailable(false);

    await expect(remote.getById('doses', 'd1')).rejects.toBeInstanceOf(RemoteUnavailableError);
    await expect(remote.setDocument('doses', 'd1', {})).rejects.toBeInstanceOf(RemoteUnavailableError);
    await expect(collect(remote.streamCollection({ collection: 'doses' }))).rejects.toBeInstanceOf(
      RemoteUnavailableError,
    );
  });

  it('should keep stored documents isolated from callers', async () => {
    const fields = { meta: { count: 1 } };
    await remote.setDocument('doses', 'd1', fields);
    fields.meta.count = 2;

    expect((await remote.getById('doses', 'd1'))?.fields).toEqual({ meta: { count: 1 } });
  });
});

describe('applyQuery', () => {
  const docs: RemoteDocument[] = [
    { id: 'c', fields: { name: 'Cetirizine', amount: 10 } },
    { id: 'a', fields: { name: 'Aspirin', amount: 100 } },
    { id: 'b', fields: { name: 'Aspirin', amount: null } },
    { id: 'd', fields: { name: 'Doxycycline' } },
  ];

  function ids(query: Omit<CollectionQuery, 'collection'>): string[] {
    return applyQuery(docs, { collection: 'medications', ...query }).map((d) => d.id);
  }

  it('should sort missing values first and break ties by id', () => {
    expect(ids({ orderBy: [{ field: 'amount' }] })).toEqual(['b', 'd', 'c', 'a']);
    expect(ids({ orderBy: [{ field: 'name' }] })).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should page after sorting', () => {
    expect(ids({ orderBy: [{ field: 'name', direction: 'desc' }], offset: 1, limit: 2 })).toEqual(['c', 'a']);
  });

  it('should apply range filters only between comparable values', () => {
    expect(ids({ filters: [{ field: 'amount', op: 'gte', value: 10 }] })).toEqual(['a', 'c']);
    expect(ids({ filters: [{ field: 'amount', op: 'lt', value: '50' }] })).toEqual([]);
  });

  it('should treat an absent field as null for equality', () => {
    expect(matchesFilter({}, { field: 'amount', op: 'eq', value: null })).toBe(true);
    expect(matchesFilter({ amount: 1 }, { field: 'amount', op: 'neq', value: null })).toBe(true);
  });
});
