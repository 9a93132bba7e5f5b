import { encodeForm } from '../encoding/form-encoder.js';

/**
 * Build the cache key for a GET request: the URL itself, or the URL followed
 * by the form encoding of `headers` sorted by name, so the same headers given
 * in a different order share one entry.
 */
export function createCacheKey(
  url: string,
  headers?: Record<string, string>,
): string {
  if (!headers) {
    return url;
  }

  const names = Object.keys(headers).sort();
  if (names.length === 0) {
    return url;
  }

  const canonical: Record<string, string> = {};
  for (const name of names) {
    canonical[name] = headers[name] ?? '';
  }

  return `${url}${encodeForm(canonical)}`;
}
