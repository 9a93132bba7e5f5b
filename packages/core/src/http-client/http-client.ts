import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import type { z } from 'zod';
import {
  HttpClientConfigSchema,
  resolveHttpClientConfig,
  type HttpClientConfig,
} from '../config/index.js';
import {
  encodeForm,
  encodeMultipart,
  FORM_CONTENT_TYPE,
  type MultipartFields,
} from '../encoding/index.js';
import { HttpClientError, defaultErrorMessage } from '../errors/index.js';
import { createRequestGate, type RequestGate } from '../gate/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { createCacheKey, type CacheStore } from '../stores/index.js';
import type {
  HttpClientContract,
  RequestBody,
  RequestOptions,
} from '../types/index.js';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD';

interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers?: Headers;
  body?: string | Uint8Array;
  signal?: AbortSignal;
  /** Set only for cacheable requests when a cache store is configured. */
  cacheKey?: string;
}

interface PreparedBody {
  body: string | Uint8Array;
  headers: Headers;
}

export interface HttpClientStores {
  cache?: CacheStore;
}

export type HttpClientOptions = z.input<typeof HttpClientConfigSchema> & {
  /**
   * Logger used instead of the one built from `logLevel`.
   */
  logger?: Logger;
  /**
   * Optional error handler to convert errors into domain-specific error types.
   * If not provided, a generic HttpClientError is thrown.
   */
  errorHandler?: (error: unknown) => Error;
};

export class HttpClient implements HttpClientContract {
  private readonly stores: HttpClientStores;
  private readonly config: HttpClientConfig;
  private readonly gate: RequestGate;
  private readonly logger: Logger;
  private readonly errorHandler?: (error: unknown) => Error;

  constructor(stores: HttpClientStores = {}, options: HttpClientOptions = {}) {
    const { logger, errorHandler, ...configOptions } = options;

    this.stores = stores;
    this.config = resolveHttpClientConfig(configOptions);
    this.gate = createRequestGate(this.config.minRequestInterval);
    this.logger = logger ?? createLogger(this.config.logLevel);
    this.errorHandler = errorHandler;
  }

  async get(
    url: string,
    options: RequestOptions = {},
  ): Promise<string | undefined> {
    const { headers, signal } = options;

    return this.execute({
      method: 'GET',
      url,
      headers: new Headers(headers),
      signal,
      cacheKey: this.stores.cache ? createCacheKey(url, headers) : undefined,
    });
  }

  async post(
    url: string,
    body: RequestBody,
    options: RequestOptions = {},
  ): Promise<string | undefined> {
    const prepared = await this.prepareBody(body, options.headers);
    return this.execute({
      method: 'POST',
      url,
      signal: options.signal,
      ...prepared,
    });
  }

  async postMultipart(
    url: string,
    fields: MultipartFields,
    options: RequestOptions = {},
  ): Promise<string | undefined> {
    const encoded = encodeMultipart(fields);
    // The boundary must match the body, whatever the caller sent
    const headers = new Headers(options.headers);
    headers.set('Content-Type', encoded.contentType);

    return this.execute({
      method: 'POST',
      url,
      headers,
      body: encoded.body,
      signal: options.signal,
    });
  }

  async put(
    url: string,
    body: RequestBody,
    options: RequestOptions = {},
  ): Promise<string | undefined> {
    const prepared = await this.prepareBody(body, options.headers);
    return this.execute({
      method: 'PUT',
      url,
      signal: options.signal,
      ...prepared,
    });
  }

  async delete(
    url: string,
    options: RequestOptions = {},
  ): Promise<string | undefined> {
    return this.execute({
      method: 'DELETE',
      url,
      headers: new Headers(options.headers),
      signal: options.signal,
    });
  }

  async head(
    url: string,
    options: RequestOptions = {},
  ): Promise<string | undefined> {
    return this.execute({
      method: 'HEAD',
      url,
      headers: new Headers(options.headers),
      signal: options.signal,
    });
  }

  async clearCache(): Promise<void> {
    if (this.stores.cache) {
      await this.stores.cache.clear();
    }
  }

  private async prepareBody(
    body: RequestBody,
    init?: Record<string, string>,
  ): Promise<PreparedBody> {
    const headers = new Headers(init);

    if (typeof body === 'string' || body instanceof Uint8Array) {
      return { body, headers };
    }

    if (body instanceof Readable) {
      const bytes = await buffer(body);
      return { body: bytes.toString('base64'), headers };
    }

    if (!headers.has('Content-Type')) {
      headers.set('Content-Type', FORM_CONTENT_TYPE);
    }
    return { body: encodeForm(body), headers };
  }

  private async execute(
    request: PreparedRequest,
  ): Promise<string | undefined> {
    const { method, url, signal, cacheKey } = request;
    const cache = cacheKey !== undefined ? this.stores.cache : undefined;

    // 1. Cache: a hit never waits for the gate
    if (cache && cacheKey !== undefined) {
      let cached: string | undefined;
      try {
        cached = await cache.get(cacheKey);
      } catch (error) {
        throw this.mapError(error, signal);
      }
      if (cached !== undefined) {
        this.logger.debug({ method, url }, 'Served from cache');
        return cached;
      }
    }

    // 2. Gate: cancellation while waiting produces no result
    if (!(await this.gate.acquire(signal))) {
      this.logger.debug(
        { method, url },
        'Cancelled while waiting for the gate',
      );
      return undefined;
    }

    try {
      // A request queued behind an identical one may find its result cached
      if (cache && cacheKey !== undefined) {
        const cached = await cache.get(cacheKey);
        if (cached !== undefined) {
          this.logger.debug({ method, url }, 'Served from cache');
          return cached;
        }
      }

      // 3. Transport and status classification
      const body = await this.perform(request);

      // 4. Cache the result
      if (cache && cacheKey !== undefined) {
        await cache.set(cacheKey, body);
        this.logger.debug({ method, url }, 'Stored response in cache');
      }

      return body;
    } catch (error) {
      throw this.mapError(error, signal);
    } finally {
      this.gate.release();
    }
  }

  private mapError(error: unknown, signal?: AbortSignal): unknown {
    // Allow callers to detect their own aborts distinctly.
    if (signal?.aborted || !this.errorHandler) {
      return error;
    }
    return this.errorHandler(error);
  }

  private async perform(request: PreparedRequest): Promise<string> {
    const { method, url } = request;
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: request.headers,
        body: request.body,
        signal: this.requestSignal(request.signal),
      });
    } catch (error) {
      throw this.transportError(request, error);
    }

    const { status } = response;

    if (status >= 400) {
      const errorBody = await this.readErrorBody(request, response);
      this.logger.warn(
        { method, url, status, durationMs: Date.now() - startedAt },
        'Request failed',
      );
      throw new HttpClientError(
        errorBody ?? defaultErrorMessage(status),
        status,
        { data: errorBody, headers: response.headers },
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw this.transportError(request, error);
    }

    this.logger.debug(
      { method, url, status, durationMs: Date.now() - startedAt },
      'Request completed',
    );
    return body;
  }

  /**
   * Combine the caller's signal with the configured read timeout.
   */
  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.config.readTimeout);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  /**
   * Read the body of a failure response. A body that cannot be read, or an
   * empty one, yields `undefined` so the default message is used instead.
   */
  private async readErrorBody(
    request: PreparedRequest,
    response: Response,
  ): Promise<string | undefined> {
    try {
      const text = await response.text();
      return text === '' ? undefined : text;
    } catch (error) {
      this.logger.debug(
        { method: request.method, url: request.url, err: error },
        'Could not read error body',
      );
      return undefined;
    }
  }

  private transportError(request: PreparedRequest, error: unknown): unknown {
    if (request.signal?.aborted) {
      return error;
    }

    const reason = error instanceof Error ? error.message : String(error);
    this.logger.error(
      { method: request.method, url: request.url, err: error },
      'Request failed before a response was received',
    );
    return new HttpClientError(
      `Request to ${request.url} failed: ${reason}`,
      undefined,
      { cause: error },
    );
  }
}
