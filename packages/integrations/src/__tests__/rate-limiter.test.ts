/**
 * Request Limiter Tests
 */

import { describe, it, expect } from 'vitest';
import { RequestLimiter, createRequestLimiter } from '../utils/rate-limiter.js';

function gate(): { wait: Promise<void>; open: () => void } {
  let open = () => {};
  const wait = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  return { wait, open };
}

describe('RequestLimiter', () => {
  it('holds requests beyond the concurrency limit in the queue', async () => {
    const limiter = new RequestLimiter({ concurrency: 1, requestsPerMinute: 60 });
    const first = gate();

    const a = limiter.schedule(async () => {
      await first.wait;
      return 'a';
    });
    const b = limiter.schedule(async () => 'b');

    expect(limiter.snapshot()).toEqual({ inFlight: 1, queued: 1, startedThisMinute: 1 });

    first.open();
    await expect(Promise.all([a, b])).resolves.toEqual(['a', 'b']);
    await limiter.drained();

    expect(limiter.snapshot()).toEqual({ inFlight: 0, queued: 0, startedThisMinute: 2 });
  });

  it('restarts the per-minute count once the minute has passed', async () => {
    let now = 1_000_000;
    const limiter = new RequestLimiter({ concurrency: 2, requestsPerMinute: 60 }, () => now);

    await limiter.schedule(async () => undefined);
    expect(limiter.snapshot().startedThisMinute).toBe(1);

    now += 60000;
    expect(limiter.snapshot().startedThisMinute).toBe(0);

    await limiter.schedule(async () => undefined);
    expect(limiter.snapshot().startedThisMinute).toBe(1);
  });

  it('passes task failures through', async () => {
    const limiter = createRequestLimiter();

    await expect(limiter.schedule(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
  });

  it('fills unset limits from the marketplace defaults', () => {
    expect(createRequestLimiter({ requestsPerMinute: 10 }).limits).toEqual({
      concurrency: 5,
      requestsPerMinute: 10,
    });
  });
});
