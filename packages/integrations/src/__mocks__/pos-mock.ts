/**
 * Mock POS Marketplace API
 * In-process axios adapter simulating the inventory endpoints for tests
 */

import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  authorization: string | null;
  body: unknown;
}

interface QueuedFailure {
  status: number;
  body: unknown;
}

export class MockPosServer {
  /** Listing bodies by vendor inventory id */
  readonly inventories = new Map<string, unknown>();
  readonly requests: RecordedRequest[] = [];
  private readonly failures: QueuedFailure[] = [];
  private nextId = 1000;
  private dropConnections = 0;

  /** Fails the next request with the given status */
  failNext(status: number, body: unknown = { message: `Mock failure ${status}` }): void {
    this.failures.push({ status, body });
  }

  /** Makes the next request fail without any response */
  disconnectNext(): void {
    this.dropConnections++;
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    const authorization = config.headers.get('Authorization');

    this.requests.push({
      method,
      url,
      authorization: typeof authorization === 'string' ? authorization : null,
      body,
    });

    if (this.dropConnections > 0) {
      this.dropConnections--;
      throw new AxiosError('socket hang up', 'ECONNRESET', config);
    }

    const failure = this.failures.shift();
    if (failure) {
      return this.respond(config, failure.status, failure.body);
    }

    if (method === 'POST' && url === '/inventory/') {
      const id = String(this.nextId++);
      this.inventories.set(id, body);
      return this.respond(config, 201, { id: Number(id) });
    }

    const deletion = /^\/inventory\/([^/]+)$/.exec(url);
    if (method === 'DELETE' && deletion) {
      const id = decodeURIComponent(deletion[1]);
      if (!this.inventories.delete(id)) {
        return this.respond(config, 404, { detail: 'Not found.' });
      }
      return this.respond(config, 204, '');
    }

    return this.respond(config, 404, { detail: 'Not found.' });
  };

  private respond(
    config: InternalAxiosRequestConfig,
    status: number,
    data: unknown
  ): AxiosResponse<unknown> {
    const response: AxiosResponse<unknown> = {
      data,
      status,
      statusText: String(status),
      headers: new AxiosHeaders(),
      config,
    };

    if (status >= 200 && status < 300) {
      return response;
    }

    throw new AxiosError(
      `Request failed with status code ${status}`,
      status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      null,
      response
    );
  }
}
