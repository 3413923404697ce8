/**
 * POS Marketplace API Client
 * Creates and deletes inventory listings with bearer-token auth,
 * client-side rate limiting and retries for transient failures
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { createRequestLimiter, type RequestLimiter } from '../utils/rate-limiter.js';
import { retryTransient, type RetryPolicy } from '../utils/retry.js';
import {
  PosApiError,
  PosAuthError,
  PosNotFoundError,
  PosRateLimitError,
  PosServerError,
  isRetryablePosError,
} from './errors.js';
import { broadcastWarnings } from './transformer.js';
import type { PosClientConfig, PosInventoryPayload } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_RETRY_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;

export interface PosRequestOptions {
  /** Cancels the request, its retries and its place in the queue */
  signal?: AbortSignal;
}

export interface PosApiClientOptions extends PosClientConfig {
  /** Minimum delay before a retry */
  retryDelayMs?: number;
  /** Replaces axios' HTTP transport */
  adapter?: AxiosAdapter;
}

export class PosApiClient {
  private readonly httpClient: AxiosInstance;
  private readonly limiter: RequestLimiter;
  private readonly retryPolicy: RetryPolicy;
  private readonly debug: boolean;

  constructor(options: PosApiClientOptions) {
    const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.retryPolicy = {
      retries: options.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS,
      baseDelayMs: retryDelayMs,
      maxDelayMs: retryDelayMs * 30,
    };
    this.debug = options.debug ?? false;

    this.httpClient = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      adapter: options.adapter,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
    });

    this.httpClient.interceptors.request.use((config) => {
      config.headers.Authorization = `Bearer ${options.apiToken}`;
      return config;
    });

    this.httpClient.interceptors.response.use(
      (response) => response,
      (error: unknown) => this.handleApiError(error)
    );

    this.limiter = createRequestLimiter({
      ...(options.concurrency !== undefined && { concurrency: options.concurrency }),
      ...(options.requestsPerMinute !== undefined && { requestsPerMinute: options.requestsPerMinute }),
    });
  }

  // ============================================================================
  // Inventory Operations
  // ============================================================================

  /**
   * Creates a listing and returns the vendor's inventory id
   */
  async createInventory(payload: PosInventoryPayload, options: PosRequestOptions = {}): Promise<string> {
    for (const warning of broadcastWarnings(payload)) {
      this.log(`${payload.externalId}: ${warning}`, 'warn');
    }

    const { signal } = options;
    const response = await this.request(
      () => this.httpClient.post<unknown>('/inventory/', payload, { signal }),
      signal
    );
    const id = readInventoryId(response.data);
    if (id === null) {
      throw new PosApiError('Inventory response carried no id', 'INVALID_RESPONSE', response.status);
    }

    this.log(`Created inventory ${id} for ${payload.externalId}`);
    return id;
  }

  /**
   * Deletes a listing. Resolves false when the vendor no longer had it.
   */
  async deleteInventory(inventoryId: string, options: PosRequestOptions = {}): Promise<boolean> {
    const { signal } = options;
    try {
      await this.request(
        () => this.httpClient.delete(`/inventory/${encodeURIComponent(inventoryId)}`, { signal }),
        signal
      );
    } catch (error) {
      if (error instanceof PosNotFoundError) {
        this.log(`Inventory ${inventoryId} was already gone`);
        return false;
      }
      throw error;
    }

    this.log(`Deleted inventory ${inventoryId}`);
    return true;
  }

  // ============================================================================
  // Request Plumbing
  // ============================================================================

  private request<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.limiter.schedule(
      () =>
        retryTransient(fn, this.retryPolicy, {
          isTransient: isRetryablePosError,
          signal,
          onRetry: (error, attempt) => {
            this.log(`Request failed, retrying (attempt ${attempt}): ${error.message}`, 'warn');
          },
        }),
      signal
    );
  }

  private handleApiError(error: unknown): never {
    if (axios.isCancel(error)) {
      throw new PosApiError('Request cancelled', 'ABORTED');
    }

    if (!axios.isAxiosError(error)) {
      throw error;
    }

    const status = error.response?.status;
    const message = readErrorMessage(error.response?.data);

    if (status === 404) {
      throw new PosNotFoundError(message ?? 'Resource not found');
    }

    if (status === 401 || status === 403) {
      throw new PosAuthError(message ?? 'Authentication failed', status);
    }

    if (status === 429) {
      throw new PosRateLimitError(message ?? 'Rate limit exceeded');
    }

    if (status !== undefined && status >= 500) {
      throw new PosServerError(message ?? 'Server error', status);
    }

    if (status === undefined) {
      const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
      throw new PosApiError(
        error.message || 'Network error',
        timedOut ? 'TIMEOUT' : 'NETWORK_ERROR'
      );
    }

    throw new PosApiError(message ?? error.message ?? 'Unknown API error', 'REQUEST_FAILED', status);
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const timestamp = new Date().toISOString();
    const prefix = `${timestamp} [PosApiClient]`;

    switch (level) {
      case 'error':
        console.error(`${prefix} ERROR: ${message}`);
        break;
      case 'warn':
        console.warn(`${prefix} WARN: ${message}`);
        break;
      default:
        if (this.debug) {
          console.log(`${prefix} INFO: ${message}`);
        }
    }
  }
}

// ============================================================================
// Response Parsing
// ============================================================================

function readInventoryId(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('id' in data)) {
    return null;
  }
  const { id } = data;
  if (typeof id === 'string' && id.length > 0) {
    return id;
  }
  if (typeof id === 'number') {
    return String(id);
  }
  return null;
}

function readErrorMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.length > 0) {
    return data;
  }
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }
  for (const key of ['message', 'detail', 'error'] as const) {
    if (key in data) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  return undefined;
}

export function createPosApiClient(options: PosApiClientOptions): PosApiClient {
  return new PosApiClient(options);
}
