import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { loadCollectionsConfig } from './config/collection-config';
import { Clock, systemClock } from './core/types';
import { KeyStorageError } from './core/errors';
import { logger } from './observability/logger';
import { enableDefaultMetrics, httpRequestDuration } from './observability/metrics';
import { RetryPolicy } from './resilience/retry';
import { RemoteHealthMonitor } from './resilience/remote-health';
import { createKeyValueStore } from './storage/kv-store';
import { createRemoteStore } from './storage/remote-store';
import { createSecureStore } from './storage/secure-store';
import { KeyValueStore, RemoteStore, SecureStore } from './storage/types';
import { KeyManager } from './security/key-manager';
import { FieldEncryptor } from './security/field-encryptor';
import { TtlCache } from './cache/ttl-cache';
import { QueryCache } from './cache/query-cache';
import { ConflictResolver } from './sync/conflict-resolver';
import { ConflictQueue } from './sync/conflict-queue';
import { SyncQueue } from './sync/sync-queue';
import { SyncScheduler } from './sync/sync-scheduler';
import { ENCRYPTED_NAMESPACE, LocalRecordStore, PLAIN_NAMESPACE } from './store/local-record-store';
import { VersionTracker } from './store/version-tracker';
import { TieredStore } from './store/tiered-store';
import { StoreRegistry } from './store/store-registry';
import { CollectionSettings } from './store/types';
import { registerErrorHandler } from './api/http-errors';
import { registerRecordRoutes } from './api/record-routes';
import { registerConflictRoutes } from './api/conflict-routes';
import { registerHealthRoutes } from './health/health-routes';

/** Replacements for the environment-derived backends (tests, embedding) */
export interface AppOverrides {
  /** null skips connecting to Redis and uses in-memory stores */
  redis?: Redis | null;
  remote?: RemoteStore;
  kv?: KeyValueStore;
  secureStore?: SecureStore;
  collections?: CollectionSettings[];
  retryPolicy?: RetryPolicy;
  clock?: Clock;
  startScheduler?: boolean;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  remoteRedis?: Redis;
  scheduler?: SyncScheduler;
  registry: StoreRegistry;
  remoteHealth: RemoteHealthMonitor;
  keyManager: KeyManager;
}

async function connectRedis(url: string, label: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message, label }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info({ label }, 'Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err, label }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });
  registerErrorHandler(app);
  if (env.observability.enableMetrics) enableDefaultMetrics();

  // ───── Backends ─────
  const redis =
    overrides.redis === null ? undefined : (overrides.redis ?? (await connectRedis(env.redis.url, 'local')));
  const remoteRedis =
    overrides.remote || overrides.redis === null || !env.redis.remoteUrl
      ? undefined
      : await connectRedis(env.redis.remoteUrl, 'remote');

  const clock = overrides.clock ?? systemClock;
  const retryPolicy: RetryPolicy = overrides.retryPolicy ?? {
    maxAttempts: env.retry.maxAttempts,
    initialDelayMs: env.retry.initialDelayMs,
    backoffFactor: 2,
  };
  const kv = overrides.kv ?? createKeyValueStore(redis, env.redis.keyPrefix);
  const remote = overrides.remote ?? createRemoteStore(remoteRedis, env.redis.remoteKeyPrefix);
  const secureStore = overrides.secureStore ?? createSecureStore(env.encryption.keyDir);

  // ───── Encryption ─────
  const keyManager = new KeyManager(secureStore, retryPolicy);
  try {
    await keyManager.initialize();
  } catch (err) {
    if (!(err instanceof KeyStorageError)) throw err;
    // Encrypted tier fails closed; the other tiers keep serving
    logger.error({ err }, 'Starting without an encryption key');
  }
  const encryptor = new FieldEncryptor(keyManager);

  // ───── Cache, health, queues ─────
  const remoteHealth = new RemoteHealthMonitor({
    failureThreshold: env.remote.failureThreshold,
    circuitResetMs: env.remote.circuitResetMs,
    clock,
    kv,
  });
  await remoteHealth.initialize();

  const cache = new TtlCache(kv, {
    keyPrefix: env.cache.keyPrefix,
    defaultTtlMs: env.cache.defaultTtlMs,
    maxMemoryEntries: env.cache.maxMemoryEntries,
    name: 'records',
    clock,
  });
  await cache.initialize();
  const queryCache = new QueryCache(cache, retryPolicy);

  const syncQueue = new SyncQueue(kv, { maxSize: env.sync.maxQueueSize, clock });
  const conflicts = new ConflictQueue(kv);
  await Promise.all([syncQueue.initialize(), conflicts.initialize()]);
  const resolver = new ConflictResolver(clock);

  // ───── Stores ─────
  const collections = overrides.collections ?? loadCollectionsConfig(env.collections.configPath);
  const shared = {
    remote,
    health: remoteHealth,
    cache,
    queryCache,
    encryptor,
    encryptedLocal: new LocalRecordStore(kv, ENCRYPTED_NAMESPACE),
    plainLocal: new LocalRecordStore(kv, PLAIN_NAMESPACE),
    versions: new VersionTracker(kv),
    syncQueue,
    conflicts,
    resolver,
    retryPolicy,
    recordTtlMs: env.cache.recordTtlMs,
    queryTtlMs: env.cache.queryTtlMs,
    maxSyncAttempts: env.sync.maxAttempts,
    clock,
  };
  const registry = new StoreRegistry(
    collections.map((settings) => new TieredStore(settings, shared)),
    conflicts,
    resolver,
  );

  // ───── Routes ─────
  registerHealthRoutes(app, { redis, remoteHealth, encryptor });
  registerRecordRoutes(app, registry);
  registerConflictRoutes(app, registry);

  let scheduler: SyncScheduler | undefined;
  if (env.sync.enabled && overrides.startScheduler !== false) {
    scheduler = new SyncScheduler(registry, remoteHealth, cache, env.sync.intervalMs);
    scheduler.start();
  }

  logger.info({ collections: registry.collections() }, 'Application built');
  return { app, redis, remoteRedis, scheduler, registry, remoteHealth, keyManager };
}
