/**
 * PackSync - Integrations Package
 * POS marketplace connector for seat-pack listings
 *
 * @packageDocumentation
 */

// ============================================================================
// POS Marketplace
// ============================================================================

export * from './pos/index.js';

// ============================================================================
// Utilities
// ============================================================================

export {
  RequestLimiter,
  createRequestLimiter,
  POS_REQUEST_LIMITS,
  retryTransient,
  DEFAULT_RETRY_POLICY,
  type RequestLimits,
  type RequestLimiterSnapshot,
  type RetryPolicy,
  type RetryHooks,
} from './utils/index.js';
