export type RemoteStatus = 'healthy' | 'degraded' | 'down';

export interface RemoteHealth {
  status: RemoteStatus;
  lastCheck: number;
  consecutiveFailures: number;
  lastError?: string;
  /** Circuit breaker: open = remote calls skipped */
  circuitOpen: boolean;
  circuitOpenUntil?: number;
  /** Set explicitly (and persisted) when the remote is known to be unreachable */
  markedUnavailable: boolean;
}
