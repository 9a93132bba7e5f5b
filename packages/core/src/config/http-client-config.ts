import { z } from 'zod';

/** Read timeout applied to every request, in milliseconds. */
export const DEFAULT_READ_TIMEOUT = 16_834;

export const LogLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const HttpClientConfigSchema = z.object({
  /**
   * Minimum spacing between the start of consecutive requests in
   * milliseconds. `0` lets requests run concurrently.
   */
  minRequestInterval: z.number().int().nonnegative().default(0),
  /**
   * Time allowed for a request to complete, in milliseconds.
   */
  readTimeout: z.number().int().positive().default(DEFAULT_READ_TIMEOUT),
  /**
   * Level of the logger created when none is supplied.
   */
  logLevel: LogLevelSchema.default('silent'),
});

export type HttpClientConfig = z.infer<typeof HttpClientConfigSchema>;

/**
 * Validate user-facing options and fill in defaults. Throws a `ZodError` for
 * invalid values.
 */
export function resolveHttpClientConfig(
  options: z.input<typeof HttpClientConfigSchema> = {},
): HttpClientConfig {
  return HttpClientConfigSchema.parse(options);
}
