import { ZodError } from 'zod';
import {
  DEFAULT_READ_TIMEOUT,
  resolveHttpClientConfig,
} from './http-client-config.js';

describe('resolveHttpClientConfig', () => {
  test('applies defaults when options are omitted', () => {
    expect(resolveHttpClientConfig()).toEqual({
      minRequestInterval: 0,
      readTimeout: DEFAULT_READ_TIMEOUT,
      logLevel: 'silent',
    });
  });

  test('keeps provided values', () => {
    expect(
      resolveHttpClientConfig({
        minRequestInterval: 250,
        readTimeout: 5_000,
        logLevel: 'debug',
      }),
    ).toEqual({ minRequestInterval: 250, readTimeout: 5_000, logLevel: 'debug' });
  });

  test('rejects a negative request interval', () => {
    expect(() => resolveHttpClientConfig({ minRequestInterval: -1 })).toThrow(
      ZodError,
    );
  });

  test('rejects a fractional request interval', () => {
    expect(() => resolveHttpClientConfig({ minRequestInterval: 1.5 })).toThrow(
      /integer/,
    );
  });

  test('rejects a zero read timeout', () => {
    expect(() => resolveHttpClientConfig({ readTimeout: 0 })).toThrow(
      ZodError,
    );
  });
});
