import type { Readable } from 'stream';
import type { FormFields, MultipartFields } from '../encoding/index.js';

export interface RequestOptions {
  /**
   * Extra request headers. For GET requests they are also part of the cache
   * key, so the same URL with different headers is cached separately.
   */
  headers?: Record<string, string>;
  /**
   * AbortSignal that cancels the request. Aborting while the request is still
   * waiting for its turn makes the call resolve `undefined`; aborting during
   * the transfer rejects with the `AbortError` raised by `fetch`.
   */
  signal?: AbortSignal;
}

/**
 * Body accepted by `post` and `put`:
 * - `string` is sent as is
 * - `Uint8Array` (including `Buffer`) is sent as raw bytes
 * - `Readable` is read to the end and sent as base64 text
 * - a plain object is sent as `application/x-www-form-urlencoded`
 */
export type RequestBody = string | Uint8Array | Readable | FormFields;

/**
 * Every method resolves with the response body text, or `undefined` when the
 * call was cancelled before its turn came.
 */
export interface HttpClientContract {
  get(url: string, options?: RequestOptions): Promise<string | undefined>;
  post(
    url: string,
    body: RequestBody,
    options?: RequestOptions,
  ): Promise<string | undefined>;
  postMultipart(
    url: string,
    fields: MultipartFields,
    options?: RequestOptions,
  ): Promise<string | undefined>;
  put(
    url: string,
    body: RequestBody,
    options?: RequestOptions,
  ): Promise<string | undefined>;
  delete(url: string, options?: RequestOptions): Promise<string | undefined>;
  head(url: string, options?: RequestOptions): Promise<string | undefined>;
  /** Drop every cached response. Does nothing without a cache store. */
  clearCache(): Promise<void>;
}
