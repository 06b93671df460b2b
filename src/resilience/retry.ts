/**
 * Retry with exponential backoff.
 *
 * Defaults: 3 attempts, 1s initial delay, doubling after each failure.
 */

import { componentLogger } from '../observability/logger';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  /** Multiplier applied to the delay after each failed attempt */
  backoffFactor?: number;
  /** Return false to fail immediately without further attempts */
  shouldRetry?: (err: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
};

const log = componentLogger('retry');

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  label: string,
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const factor = policy.backoffFactor ?? 2;
  let delay = policy.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      const retryable = policy.shouldRetry ? policy.shouldRetry(err) : true;
      if (!retryable || attempt >= maxAttempts) {
        if (retryable) log.warn({ err, label, attempts: attempt }, 'Operation failed after final attempt');
        throw err;
      }
      log.debug({ label, attempt, delayMs: delay }, 'Operation failed, retrying');
      if (delay > 0) await sleep(delay);
      delay *= factor;
    }
  }
}
