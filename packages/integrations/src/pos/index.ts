/**
 * POS Marketplace Integration
 * Inventory listing client for the resale marketplace
 */

export * from './types.js';

export {
  PosApiClient,
  createPosApiClient,
  type PosApiClientOptions,
  type PosRequestOptions,
} from './client.js';

export {
  PosApiError,
  PosNotFoundError,
  PosAuthError,
  PosRateLimitError,
  PosServerError,
  PosValidationError,
  isRetryablePosError,
} from './errors.js';

export { buildInventoryPayload, broadcastWarnings, formatLocalDateTime } from './transformer.js';
