export {
  HttpClientConfigSchema,
  LogLevelSchema,
  DEFAULT_READ_TIMEOUT,
  resolveHttpClientConfig,
} from './http-client-config.js';
export type { HttpClientConfig, LogLevel } from './http-client-config.js';
