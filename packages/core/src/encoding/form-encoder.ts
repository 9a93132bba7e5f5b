export type FormFields = Record<string, string>;

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Encode `fields` as `application/x-www-form-urlencoded` text in insertion
 * order. An empty map encodes to an empty string.
 */
export function encodeForm(fields: FormFields): string {
  return Object.entries(fields)
    .map(
      ([key, value]) =>
        `${encodeURIComponent(key)}=${encodeURIComponent(value)}`,
    )
    .join('&');
}
