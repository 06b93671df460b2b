import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

// Walk up to the directory holding package.json (works from src/ and dist/src/)
function findProjectRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

export const projectRoot = findProjectRoot(__dirname);
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Storage backends ─────
  redis: {
    // Local persistent KV (cache, local tiers, queues)
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'tierstore:'),
    // Authoritative document store; empty = in-process store
    remoteUrl: optional('REMOTE_REDIS_URL', ''),
    remoteKeyPrefix: optional('REMOTE_REDIS_KEY_PREFIX', 'docs:'),
  },

  cache: {
    keyPrefix: optional('CACHE_KEY_PREFIX', 'app_cache'),
    defaultTtlMs: optionalInt('CACHE_DEFAULT_TTL_MS', 60 * 60 * 1000),
    recordTtlMs: optionalInt('CACHE_RECORD_TTL_MS', 5 * 60 * 1000),
    queryTtlMs: optionalInt('QUERY_CACHE_TTL_MS', 30 * 60 * 1000),
    maxMemoryEntries: optionalInt('CACHE_MAX_MEMORY_ENTRIES', 5_000),
  },

  encryption: {
    keyDir: optional('KEY_STORAGE_DIR', path.join(projectRoot, '.keys')),
  },

  retry: {
    maxAttempts: optionalInt('RETRY_MAX_ATTEMPTS', 3),
    initialDelayMs: optionalInt('RETRY_INITIAL_DELAY_MS', 1000),
  },

  remote: {
    failureThreshold: optionalInt('REMOTE_FAILURE_THRESHOLD', 3),
    circuitResetMs: optionalInt('REMOTE_CIRCUIT_RESET_MS', 30_000),
  },

  sync: {
    enabled: optionalBool('SYNC_ENABLED', true),
    intervalMs: optionalInt('SYNC_INTERVAL_MS', 5 * 60 * 1000),
    maxQueueSize: optionalInt('SYNC_MAX_QUEUE_SIZE', 1000),
    // Replays of one operation before it is dropped
    maxAttempts: optionalInt('SYNC_MAX_ATTEMPTS', 5),
  },

  collections: {
    configPath: optional('COLLECTIONS_CONFIG', path.join(projectRoot, 'config', 'collections.json')),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;
