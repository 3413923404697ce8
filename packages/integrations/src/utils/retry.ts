/**
 * Retries for transient request failures, with exponential backoff and jitter
 */

import pRetry from 'p-retry';

export interface RetryPolicy {
  /** Attempts after the first one */
  retries: number;
  /** Delay before the first retry in milliseconds */
  baseDelayMs: number;
  /** Upper bound on any single delay */
  maxDelayMs: number;
}

export interface RetryHooks {
  /** Errors this rejects surface at once, unretried */
  isTransient: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
  /** Stops further attempts once aborted */
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

export function retryTransient<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks
): Promise<T> {
  return pRetry(fn, {
    retries: policy.retries,
    minTimeout: policy.baseDelayMs,
    maxTimeout: policy.maxDelayMs,
    factor: 2,
    randomize: true,
    shouldRetry: hooks.isTransient,
    signal: hooks.signal,
    onFailedAttempt: (error) => {
      // p-retry calls this before consulting shouldRetry
      if (error.retriesLeft > 0 && hooks.isTransient(error)) {
        hooks.onRetry?.(error, error.attemptNumber);
      }
    },
  });
}
