import { FastifyInstance } from 'fastify';
import { formatErrors } from '../core/validation';
import { logger } from '../observability/logger';
import { StoreRegistry } from '../store/store-registry';
import { validateResolveConflictBody } from './schemas';

export function registerConflictRoutes(app: FastifyInstance, registry: StoreRegistry): void {
  /** Pending conflicts; listing them marks them presented */
  app.get<{ Querystring: { collection?: string } }>('/conflicts', async (req, reply) => {
    const conflicts = await registry.listConflicts(req.query.collection);
    return reply.send({ status: 'ok', data: { conflicts } });
  });

  app.post<{ Params: { id: string } }>('/conflicts/:id/resolve', async (req, reply) => {
    const body: unknown = req.body;
    if (!validateResolveConflictBody(body)) {
      return reply.status(400).send({ error: `Invalid body: ${formatErrors(validateResolveConflictBody.errors)}` });
    }
    const data = await registry.resolveConflict(req.params.id, body.strategy, body.fieldChoices);
    return reply.send({ status: 'ok', data });
  });

  logger.info('Conflict routes registered');
}
