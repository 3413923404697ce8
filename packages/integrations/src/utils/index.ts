/**
 * Utility Functions
 * Request limiting and retry logic
 */

export {
  RequestLimiter,
  createRequestLimiter,
  POS_REQUEST_LIMITS,
  type RequestLimits,
  type RequestLimiterSnapshot,
} from './rate-limiter.js';

export { retryTransient, DEFAULT_RETRY_POLICY, type RetryPolicy, type RetryHooks } from './retry.js';
