/**
 * Remote Health Monitor
 *
 * Consecutive-failure circuit breaker for the remote store, plus a
 * persisted "remote known unavailable" flag that survives restarts.
 */

import { Clock, systemClock } from '../core/types';
import { KeyValueStore } from '../storage/types';
import { componentLogger } from '../observability/logger';
import { RemoteHealth, RemoteStatus } from './types';

const DEFAULT_FAILURE_THRESHOLD = 3;
const DEFAULT_CIRCUIT_RESET_MS = 30_000;
const AVAILABILITY_KEY = 'remote_available';

export interface RemoteHealthOptions {
  failureThreshold?: number;
  circuitResetMs?: number;
  clock?: Clock;
  /** Where the availability flag is persisted; omitted = memory only */
  kv?: KeyValueStore;
}

export class RemoteHealthMonitor {
  private readonly state: RemoteHealth;
  private readonly failureThreshold: number;
  private readonly circuitResetMs: number;
  private readonly clock: Clock;
  private readonly kv?: KeyValueStore;
  private readonly log = componentLogger('remote-health');

  constructor(options: RemoteHealthOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.circuitResetMs = options.circuitResetMs ?? DEFAULT_CIRCUIT_RESET_MS;
    this.clock = options.clock ?? systemClock;
    this.kv = options.kv;
    this.state = {
      status: 'healthy',
      lastCheck: this.clock(),
      consecutiveFailures: 0,
      circuitOpen: false,
      markedUnavailable: false,
    };
  }

  /** Restore the persisted availability flag */
  async initialize(): Promise<void> {
    if (!this.kv) return;
    try {
      const available = await this.kv.getBool(AVAILABILITY_KEY);
      if (available === false) {
        this.state.markedUnavailable = true;
        this.state.status = 'down';
        this.log.info('Remote was previously marked unavailable; skipping remote calls until reset');
      }
    } catch (err) {
      this.log.warn({ err }, 'Could not read persisted remote availability');
    }
  }

  recordSuccess(): void {
    this.state.consecutiveFailures = 0;
    this.state.status = this.state.markedUnavailable ? 'down' : 'healthy';
    this.state.lastCheck = this.clock();
    this.state.circuitOpen = false;
    this.state.circuitOpenUntil = undefined;
    this.state.lastError = undefined;
  }

  recordFailure(err: unknown): void {
    this.state.consecutiveFailures++;
    this.state.lastCheck = this.clock();
    this.state.lastError = err instanceof Error ? err.message : String(err);

    if (this.state.consecutiveFailures >= this.failureThreshold) {
      this.state.status = 'down';
      this.state.circuitOpen = true;
      this.state.circuitOpenUntil = this.clock() + this.circuitResetMs;
      this.log.warn({ failures: this.state.consecutiveFailures }, 'Remote circuit opened');
    } else if (this.state.consecutiveFailures >= Math.floor(this.failureThreshold / 2)) {
      this.state.status = 'degraded';
    }
  }

  /** Whether a remote call should be attempted (circuit closed or half-open) */
  isAvailable(): boolean {
    if (this.state.markedUnavailable) return false;
    if (!this.state.circuitOpen) return true;

    if (this.state.circuitOpenUntil !== undefined && this.clock() > this.state.circuitOpenUntil) {
      this.state.circuitOpen = false;
      this.state.status = 'degraded';
      return true; // one trial call
    }
    return false;
  }

  async markUnavailable(reason: string): Promise<void> {
    this.state.markedUnavailable = true;
    this.state.status = 'down';
    this.state.lastError = reason;
    this.log.warn({ reason }, 'Remote marked unavailable');
    await this.persist(false);
  }

  async reset(): Promise<void> {
    this.state.markedUnavailable = false;
    this.recordSuccess();
    this.log.info('Remote availability reset');
    await this.persist(true);
  }

  getStatus(): RemoteStatus {
    return this.state.status;
  }

  snapshot(): RemoteHealth {
    return { ...this.state };
  }

  private async persist(available: boolean): Promise<void> {
    if (!this.kv) return;
    try {
      await this.kv.setBool(AVAILABILITY_KEY, available);
    } catch (err) {
      this.log.warn({ err }, 'Could not persist remote availability');
    }
  }
}
