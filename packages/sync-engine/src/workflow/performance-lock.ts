/**
 * Per-performance mutual exclusion.
 * Two passes over one performance could allocate the same pack id or
 * reconcile against a stale snapshot, so every workflow entry point runs
 * under this lock.
 */

import { randomUUID } from 'crypto';
import type { Redis } from 'ioredis';
import pRetry from 'p-retry';
import { LockLostError, LockUnavailableError, errorMessage } from '../errors.js';
import type { PerformanceLockConfig } from '../types.js';
import { DEFAULT_LOCK_CONFIG } from '../types.js';

export interface PerformanceLock {
  withLock<T>(performanceId: string, fn: () => Promise<T>): Promise<T>;
}

// ============================================================================
// Lock Store
// ============================================================================

export interface LockStore {
  /** Resolves true when the key was free and is now held with this token */
  acquire(key: string, token: string, ttlMs: number): Promise<boolean>;
  /** Resolves false when the key expired or is held by another token */
  release(key: string, token: string): Promise<boolean>;
  /** Resets the TTL; resolves false once the key no longer carries this token */
  extend(key: string, token: string, ttlMs: number): Promise<boolean>;
}

// Delete only if the lock still carries our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

const EXTEND_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
else
  return 0
end
`;

export function createRedisLockStore(redis: Redis): LockStore {
  return {
    async acquire(key, token, ttlMs) {
      const reply = await redis.set(key, token, 'PX', ttlMs, 'NX');
      return reply === 'OK';
    },
    async release(key, token) {
      const reply = await redis.eval(RELEASE_SCRIPT, 1, key, token);
      return reply === 1;
    },
    async extend(key, token, ttlMs) {
      const reply = await redis.eval(EXTEND_SCRIPT, 1, key, token, ttlMs);
      return reply === 1;
    },
  };
}

// ============================================================================
// Distributed Lock
// ============================================================================

const KEY_PREFIX = 'packsync:lock:performance:';

export class DistributedPerformanceLock implements PerformanceLock {
  private readonly store: LockStore;
  private readonly config: PerformanceLockConfig;

  constructor(store: LockStore, config: Partial<PerformanceLockConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_LOCK_CONFIG, ...config };
  }

  /**
   * Run fn while holding the lock. Throws LockUnavailableError when the
   * lock stays taken through every retry, and LockLostError when a renewal
   * finds the key gone or owned by someone else.
   */
  async withLock<T>(performanceId: string, fn: () => Promise<T>): Promise<T> {
    const key = `${KEY_PREFIX}${performanceId}`;
    const token = randomUUID();

    await pRetry(
      async () => {
        const acquired = await this.store.acquire(key, token, this.config.ttlMs);
        if (!acquired) {
          throw new LockUnavailableError(performanceId);
        }
      },
      {
        retries: this.config.retries,
        minTimeout: this.config.minRetryDelayMs,
        maxTimeout: this.config.maxRetryDelayMs,
        factor: 2,
        randomize: true,
      }
    );

    let lost = false;
    const renewal = setInterval(() => {
      void this.store.extend(key, token, this.config.ttlMs).then(
        (extended) => {
          if (!extended && !lost) {
            lost = true;
            this.warn(`lock for ${performanceId} lost before the pass finished`);
          }
        },
        (error: unknown) => {
          this.warn(`renewing lock for ${performanceId} failed: ${errorMessage(error)}`);
        }
      );
    }, Math.max(1, Math.floor(this.config.ttlMs / 3)));

    let result: T;
    try {
      result = await fn();
    } finally {
      clearInterval(renewal);
      const released = await this.store.release(key, token);
      if (!released && !lost) {
        this.warn(`lock for ${performanceId} expired before release`);
      }
    }

    if (lost) {
      throw new LockLostError(performanceId);
    }
    return result;
  }

  private warn(message: string): void {
    console.warn(`${new Date().toISOString()} [PerformanceLock] WARN: ${message}`);
  }
}

// ============================================================================
// In-Process Lock
// ============================================================================

/**
 * Serializes passes per performance within one process.
 */
export class InProcessPerformanceLock implements PerformanceLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(performanceId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(performanceId) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(performanceId, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(performanceId) === tail) {
        this.tails.delete(performanceId);
      }
    }
  }
}

export function createRedisPerformanceLock(
  redis: Redis,
  config: Partial<PerformanceLockConfig> = {}
): PerformanceLock {
  return new DistributedPerformanceLock(createRedisLockStore(redis), config);
}
