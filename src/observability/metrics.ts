import client from 'prom-client';

export const register = new client.Registry();

let defaultsEnabled = false;

/** Process-level metrics (CPU, heap, event loop); enabled once at startup */
export function enableDefaultMetrics(): void {
  if (defaultsEnabled) return;
  client.collectDefaultMetrics({ register });
  defaultsEnabled = true;
}

// ───── Cache ────────────────────────────────────────────────────

export const cacheHitsTotal = new client.Counter({
  name: 'tierstore_cache_hits_total',
  help: 'Cache reads served from a fresh entry',
  labelNames: ['cache'] as const,
  registers: [register],
});

export const cacheMissesTotal = new client.Counter({
  name: 'tierstore_cache_misses_total',
  help: 'Cache reads that found nothing fresh',
  labelNames: ['cache'] as const,
  registers: [register],
});

export const cacheWriteFailuresTotal = new client.Counter({
  name: 'tierstore_cache_write_failures_total',
  help: 'Cache writes that failed and degraded to a no-op',
  labelNames: ['cache'] as const,
  registers: [register],
});

// ───── Tiers ────────────────────────────────────────────────────

export const tierReadsTotal = new client.Counter({
  name: 'tierstore_tier_reads_total',
  help: 'Record reads by the tier that served them',
  labelNames: ['collection', 'source'] as const,
  registers: [register],
});

export const tierFallbacksTotal = new client.Counter({
  name: 'tierstore_tier_fallbacks_total',
  help: 'Tier attempts that failed and fell through to the next tier',
  labelNames: ['collection', 'tier', 'reason'] as const,
  registers: [register],
});

export const decryptionFailuresTotal = new client.Counter({
  name: 'tierstore_decryption_failures_total',
  help: 'Integrity or format failures while decrypting local data',
  labelNames: ['collection'] as const,
  registers: [register],
});

export const remoteOperationDuration = new client.Histogram({
  name: 'tierstore_remote_operation_duration_seconds',
  help: 'Remote store call latency',
  labelNames: ['operation', 'outcome'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

// ───── Sync ─────────────────────────────────────────────────────

export const conflictsDetectedTotal = new client.Counter({
  name: 'tierstore_conflicts_detected_total',
  help: 'Divergences between local and remote copies',
  labelNames: ['collection'] as const,
  registers: [register],
});

export const conflictsResolvedTotal = new client.Counter({
  name: 'tierstore_conflicts_resolved_total',
  help: 'Conflicts resolved, by strategy',
  labelNames: ['strategy'] as const,
  registers: [register],
});

export const syncOperationsTotal = new client.Counter({
  name: 'tierstore_sync_operations_total',
  help: 'Queued operations replayed against the remote store',
  labelNames: ['outcome'] as const,
  registers: [register],
});

export const pendingSyncOperations = new client.Gauge({
  name: 'tierstore_pending_sync_operations',
  help: 'Operations waiting for the remote store',
  registers: [register],
});

// ───── HTTP ─────────────────────────────────────────────────────

export const httpRequestDuration = new client.Histogram({
  name: 'tierstore_http_request_duration_seconds',
  help: 'HTTP request latency',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
