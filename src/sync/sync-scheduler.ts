import { StoreRegistry } from '../store/store-registry';
import { RemoteHealthMonitor } from '../resilience/remote-health';
import { TtlCache } from '../cache/ttl-cache';
import { logger } from '../observability/logger';

/**
 * SyncScheduler replays queued writes and sweeps expired cache entries
 * on a fixed interval.
 *
 * Uses simple setInterval; a pass that is still running when the next tick
 * fires is not overlapped.
 */
export class SyncScheduler {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private log = logger.child({ component: 'sync-scheduler' });

  constructor(
    private readonly registry: StoreRegistry,
    private readonly health: RemoteHealthMonitor,
    private readonly cache: TtlCache,
    private readonly intervalMs: number = 5 * 60 * 1000,
  ) {}

  start(): void {
    this.log.info({ intervalMs: this.intervalMs }, 'Sync scheduler started');
    this.intervalHandle = setInterval(() => {
      this.runPass().catch((err) => this.log.error({ err }, 'Scheduled sync pass failed'));
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Sync scheduler stopped');
    }
  }

  /** Ad-hoc pass (e.g. after connectivity returns) */
  async triggerRun(): Promise<void> {
    return this.runPass();
  }

  isRunning(): boolean {
    return this.running;
  }

  private async runPass(): Promise<void> {
    if (this.running) {
      this.log.warn('Sync pass already running, skipping');
      return;
    }

    this.running = true;
    try {
      const removed = await this.cache.cleanExpiredEntries();
      if (!this.health.isAvailable()) {
        this.log.debug({ removed }, 'Remote unavailable; sync pass skipped');
        return;
      }
      const results = await this.registry.syncAll();
      this.log.info({ results, expiredCacheEntries: removed }, 'Sync pass complete');
    } finally {
      this.running = false;
    }
  }
}
