/**
 * Request Limiter
 * Caps in-flight and per-minute requests to the POS marketplace API
 */

import PQueue from 'p-queue';

const MINUTE_MS = 60000;

// ============================================================================
// Types
// ============================================================================

export interface RequestLimits {
  /** Requests allowed in flight at once */
  concurrency: number;
  /** Requests started per rolling minute */
  requestsPerMinute: number;
}

export interface RequestLimiterSnapshot {
  inFlight: number;
  queued: number;
  /** Requests started in the current minute window */
  startedThisMinute: number;
}

export const POS_REQUEST_LIMITS: RequestLimits = {
  concurrency: 5,
  requestsPerMinute: 60,
};

// ============================================================================
// Limiter
// ============================================================================

export class RequestLimiter {
  private readonly queue: PQueue;
  private windowStart = Number.NEGATIVE_INFINITY;
  private startedInWindow = 0;

  constructor(
    readonly limits: RequestLimits,
    private readonly clock: () => number = Date.now
  ) {
    this.queue = new PQueue({
      concurrency: limits.concurrency,
      interval: MINUTE_MS,
      intervalCap: limits.requestsPerMinute,
    });
  }

  /**
   * Runs the task once a slot is free under both limits.
   * An aborted signal drops the task if it is still queued.
   */
  schedule<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.queue.add(
      () => {
        this.countStart();
        return task();
      },
      { throwOnTimeout: true, signal }
    );
  }

  snapshot(): RequestLimiterSnapshot {
    return {
      inFlight: this.queue.pending,
      queued: this.queue.size,
      startedThisMinute: this.clock() - this.windowStart < MINUTE_MS ? this.startedInWindow : 0,
    };
  }

  /** Resolves once nothing is queued or running */
  drained(): Promise<void> {
    return this.queue.onIdle();
  }

  private countStart(): void {
    const now = this.clock();
    if (now - this.windowStart >= MINUTE_MS) {
      this.windowStart = now;
      this.startedInWindow = 0;
    }
    this.startedInWindow++;
  }
}

export function createRequestLimiter(limits: Partial<RequestLimits> = {}): RequestLimiter {
  return new RequestLimiter({ ...POS_REQUEST_LIMITS, ...limits });
}
