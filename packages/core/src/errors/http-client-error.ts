export const DEFAULT_ERROR_MESSAGE =
  'There was a connection error.  The server responded with status code ';

export interface HttpClientErrorOptions {
  /** Raw error body returned by the server, if it could be read. */
  data?: string;
  /** Response headers, if a response was received. */
  headers?: Headers;
  /** Underlying failure, e.g. the `TypeError` thrown by `fetch`. */
  cause?: unknown;
}

/**
 * Raised for failure statuses (`statusCode >= 400`) and for transport
 * failures, which carry no `statusCode`.
 * Consumers can extend this for domain-specific error handling.
 */
export class HttpClientError extends Error {
  public readonly statusCode?: number;
  public readonly data?: string;
  public readonly headers?: Headers;

  constructor(
    message: string,
    statusCode?: number,
    options?: HttpClientErrorOptions,
  ) {
    super(message, { cause: options?.cause });
    this.name = 'HttpClientError';
    this.statusCode = statusCode;
    this.data = options?.data;
    this.headers = options?.headers;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** True when the server answered with a failure status. */
  get isStatusError(): boolean {
    return this.statusCode !== undefined;
  }
}

/**
 * Message used when a failure response has no readable body.
 */
export function defaultErrorMessage(status: number): string {
  return `${DEFAULT_ERROR_MESSAGE}${status}.`;
}
