import { randomInt } from 'crypto';

const LINE_ENDING = '\r\n';
const BOUNDARY_PREFIX = '---------------------------';
const BOUNDARY_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const BOUNDARY_RANDOM_LENGTH = 15;

/**
 * An uploadable file part of a multipart body.
 */
export interface FormFile {
  readonly filename: string;
  readonly contentType: string;
  readonly data: Uint8Array;
}

export type MultipartValue = string | FormFile;

export type MultipartFields = Record<string, MultipartValue | undefined>;

export interface EncodedMultipart {
  body: Buffer;
  boundary: string;
  /** Value for the request's `Content-Type` header. */
  contentType: string;
}

export function isFormFile(value: unknown): value is FormFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof (value as Record<string, unknown>).filename === 'string' &&
    typeof (value as Record<string, unknown>).contentType === 'string' &&
    (value as Record<string, unknown>).data instanceof Uint8Array
  );
}

export function createMultipartBoundary(): string {
  let suffix = '';
  for (let i = 0; i < BOUNDARY_RANDOM_LENGTH; i++) {
    suffix += BOUNDARY_ALPHABET.charAt(randomInt(BOUNDARY_ALPHABET.length));
  }
  return `${BOUNDARY_PREFIX}${suffix}`;
}

function partHeader(boundary: string, name: string, file?: FormFile): string {
  let header = `--${boundary}${LINE_ENDING}Content-Disposition: form-data; name="${name}"`;
  if (file) {
    header += `; filename="${file.filename}"${LINE_ENDING}Content-Type: ${file.contentType}`;
  }
  return `${header}${LINE_ENDING}${LINE_ENDING}`;
}

/**
 * Encode `fields` as a `multipart/form-data` body. Text values are written as
 * UTF-8, file parts as their raw bytes. `undefined` values are skipped.
 */
export function encodeMultipart(
  fields: MultipartFields,
  boundary: string = createMultipartBoundary(),
): EncodedMultipart {
  const chunks: Array<Buffer> = [];

  for (const [name, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }

    if (isFormFile(value)) {
      chunks.push(Buffer.from(partHeader(boundary, name, value)));
      chunks.push(Buffer.from(value.data));
    } else {
      chunks.push(Buffer.from(partHeader(boundary, name) + value));
    }
    chunks.push(Buffer.from(LINE_ENDING));
  }

  chunks.push(Buffer.from(`--${boundary}--${LINE_ENDING}`));

  return {
    body: Buffer.concat(chunks),
    boundary,
    contentType: `multipart/form-data; boundary=${boundary}`,
  };
}
