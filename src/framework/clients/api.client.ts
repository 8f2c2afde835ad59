// ============================================================
// Bookstore API Tests — Base API Client
// Playwright APIRequestContext wrapper with the suite's request defaults
// ============================================================

import type { APIRequest, APIRequestContext, APIResponse } from '@playwright/test';
import { TransportError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../helpers/log.helper.js';
import { ApiResponse } from './api-response.js';
import type { BookstoreConfig } from '../../types/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Path parameter passed through untouched, so malformed ids reach the service as-is. */
export type ResourceId = number | string;

export type RequestContextOptions = NonNullable<Parameters<APIRequest['newContext']>[0]>;

export type RequestFactory = (options: RequestContextOptions) => Promise<APIRequestContext>;

export interface SendOptions {
  /** Serialised as JSON unless already a string */
  data?: unknown;
  headers?: Record<string, string>;
  params?: Record<string, string | number | boolean>;
  /** Overrides the configured request timeout for this call */
  timeout?: number;
}

export const USER_AGENT = 'Bookstore-API-Tests/1.0';

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json',
  'User-Agent': USER_AGENT,
};

export function requestContextOptions(config: BookstoreConfig): RequestContextOptions {
  return {
    baseURL: config.baseUrl,
    extraHTTPHeaders: { ...DEFAULT_HEADERS },
    timeout: config.requestTimeout,
  };
}

export function bearerAuthHeaders(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

export abstract class BaseApiClient {
  protected readonly logger: Logger;

  constructor(
    protected readonly request: APIRequestContext,
    protected readonly config: BookstoreConfig,
  ) {
    this.logger = createLogger(this.constructor.name, { debug: config.debugMode });
    this.logger.debug(`Initialized ${this.constructor.name} API client`);
  }

  /** Collection URL this client works against */
  abstract get endpoint(): string;

  protected itemUrl(id: ResourceId): string {
    return `${this.endpoint}/${id}`;
  }

  /**
   * Sends any request through the client's defaults. Relative paths resolve
   * against the configured base URL.
   */
  async raw(method: HttpMethod, pathOrUrl: string, options: SendOptions = {}): Promise<ApiResponse> {
    return await this.send(method, pathOrUrl, options);
  }

  /**
   * GET on the Books collection. True only on a 200; every failure,
   * transport errors included, comes back as false.
   */
  async isReachable(): Promise<boolean> {
    try {
      const response = await this.send('GET', this.config.booksEndpoint, {
        timeout: this.config.connectionTimeout,
      });
      if (response.status !== 200) {
        this.logger.error(`API is not reachable: GET ${this.config.booksEndpoint} returned ${response.status}`);
        return false;
      }
      return true;
    } catch (err) {
      this.logger.error(`API is not reachable: ${errorMessage(err)}`);
      return false;
    }
  }

  async dispose(): Promise<void> {
    await this.request.dispose();
  }

  protected async send(method: HttpMethod, url: string, options: SendOptions = {}): Promise<ApiResponse> {
    const headers: Record<string, string> = { ...options.headers };
    let body: string | undefined;
    if (options.data !== undefined) {
      body = typeof options.data === 'string' ? options.data : JSON.stringify(options.data);
      headers['Content-Type'] = 'application/json';
    }

    if (this.config.loggingEnabled) {
      this.logger.detail(`→ ${method} ${url}`);
      this.logger.detail(`  headers: ${JSON.stringify({ ...DEFAULT_HEADERS, ...headers })}`);
      if (body !== undefined) this.logger.detail(`  body: ${body}`);
    }

    const started = performance.now();
    let raw: APIResponse;
    try {
      raw = await this.request.fetch(url, {
        method,
        headers,
        data: body,
        params: options.params,
        timeout: options.timeout ?? this.config.requestTimeout,
        failOnStatusCode: false,
        maxRetries: 0,
      });
    } catch (err) {
      const error = new TransportError(method, url, { cause: err });
      this.logger.error(error.message);
      throw error;
    }
    const response = await ApiResponse.from(method, raw, Math.round(performance.now() - started));

    if (this.config.loggingEnabled) {
      this.logger.detail(`← ${response.status} ${response.statusText} (${response.elapsedMs}ms)`);
      this.logger.detail(`  headers: ${JSON.stringify(response.headers)}`);
      this.logger.detail(`  body: ${response.body}`);
    }

    return response;
  }
}
