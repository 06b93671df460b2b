import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from '../config/env';
import { formatErrors } from '../core/validation';
import { getMetrics, getContentType } from '../observability/metrics';
import { RemoteHealthMonitor } from '../resilience/remote-health';
import { FieldEncryptor } from '../security/field-encryptor';
import { validateRemoteAvailabilityBody } from '../api/schemas';

export interface HealthDeps {
  redis?: Redis;
  remoteHealth: RemoteHealthMonitor;
  encryptor: FieldEncryptor;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  /** Liveness check: always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness check: local KV, encryption key and remote store */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number; detail?: string }> = {};

    if (deps.redis) {
      const start = Date.now();
      try {
        await deps.redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    checks.encryption = { status: deps.encryptor.isAvailable() ? 'ok' : 'error' };

    // A down remote degrades the service but does not make it unready
    const remote = deps.remoteHealth.snapshot();
    checks.remote = { status: remote.status === 'healthy' ? 'ok' : 'degraded', detail: remote.lastError };

    const allOk = Object.values(checks).every((c) => c.status !== 'error');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Flag the remote store as (un)available, e.g. during planned maintenance */
  app.post('/remote/availability', async (req, reply) => {
    const body: unknown = req.body;
    if (!validateRemoteAvailabilityBody(body)) {
      return reply.status(400).send({ error: `Invalid body: ${formatErrors(validateRemoteAvailabilityBody.errors)}` });
    }
    if (body.available) {
      await deps.remoteHealth.reset();
    } else {
      await deps.remoteHealth.markUnavailable(body.reason ?? 'marked unavailable by operator');
    }
    return reply.send({ status: 'ok', data: deps.remoteHealth.snapshot() });
  });

  /** Prometheus metrics endpoint */
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
