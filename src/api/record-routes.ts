/**
 * Record Routes
 *
 * HTTP surface over the tiered stores: record CRUD, cached queries,
 * collection clear, on-demand sync and sync statistics.
 */

import { FastifyInstance, FastifyReply } from 'fastify';
import { formatErrors } from '../core/validation';
import { logger } from '../observability/logger';
import { StoreRegistry } from '../store/store-registry';
import { TieredStore } from '../store/tiered-store';
import { validateQueryBody, validateReadRecordQuery, validateWriteRecordBody } from './schemas';

interface CollectionParams {
  collection: string;
}

interface RecordParams extends CollectionParams {
  id: string;
}

function storeFor(registry: StoreRegistry, collection: string, reply: FastifyReply): TieredStore | undefined {
  const store = registry.get(collection);
  if (!store) {
    reply.status(404).send({ error: `Unknown collection: ${collection}` });
  }
  return store;
}

export function registerRecordRoutes(app: FastifyInstance, registry: StoreRegistry): void {
  app.get<{ Params: RecordParams }>('/collections/:collection/records/:id', async (req, reply) => {
    const store = storeFor(registry, req.params.collection, reply);
    if (!store) return;
    const query: unknown = req.query ?? {};
    if (!validateReadRecordQuery(query)) {
      return reply.status(400).send({ error: `Invalid query string: ${formatErrors(validateReadRecordQuery.errors)}` });
    }
    const data = await store.readWithSource(req.params.id, { forceRefresh: query.forceRefresh === 'true' });
    return reply.send({ status: 'ok', data });
  });

  app.put<{ Params: RecordParams }>('/collections/:collection/records/:id', async (req, reply) => {
    const store = storeFor(registry, req.params.collection, reply);
    if (!store) return;
    const body: unknown = req.body;
    if (!validateWriteRecordBody(body)) {
      return reply.status(400).send({ error: `Invalid body: ${formatErrors(validateWriteRecordBody.errors)}` });
    }

    const outcome = await store.write(req.params.id, body.fields);
    if (outcome.remote === 'conflict') {
      return reply.status(409).send({ status: 'conflict', data: outcome });
    }
    return reply.send({ status: 'ok', data: outcome });
  });

  app.delete<{ Params: RecordParams }>('/collections/:collection/records/:id', async (req, reply) => {
    const store = storeFor(registry, req.params.collection, reply);
    if (!store) return;
    const data = await store.delete(req.params.id);
    if (data.remote === 'conflict') {
      return reply.status(409).send({ status: 'conflict', data });
    }
    return reply.send({ status: 'ok', data });
  });

  app.post<{ Params: CollectionParams }>('/collections/:collection/query', async (req, reply) => {
    const store = storeFor(registry, req.params.collection, reply);
    if (!store) return;
    const body: unknown = req.body ?? {};
    if (!validateQueryBody(body)) {
      return reply.status(400).send({ error: `Invalid query: ${formatErrors(validateQueryBody.errors)}` });
    }

    const { ttlMs, forceRefresh, ...query } = body;
    const documents = await store.query(query, { ttlMs, forceRefresh });
    return reply.send({ status: 'ok', data: { documents } });
  });

  app.delete<{ Params: CollectionParams }>('/collections/:collection', async (req, reply) => {
    const store = storeFor(registry, req.params.collection, reply);
    if (!store) return;
    const data = await store.clearAll();
    return reply.send({ status: 'ok', data });
  });

  app.post<{ Params: CollectionParams }>('/collections/:collection/sync', async (req, reply) => {
    const store = storeFor(registry, req.params.collection, reply);
    if (!store) return;
    const data = await store.syncPending();
    return reply.send({ status: 'ok', data });
  });

  app.get<{ Params: CollectionParams }>('/collections/:collection/sync', async (req, reply) => {
    const store = storeFor(registry, req.params.collection, reply);
    if (!store) return;
    const data = await store.syncStatus();
    return reply.send({ status: 'ok', data });
  });

  app.get('/sync/status', async (_req, reply) => {
    const data = await registry.syncStatistics();
    return reply.send({ status: 'ok', data });
  });

  logger.info({ collections: registry.collections() }, 'Record routes registered');
}
