export {
  HttpClientError,
  DEFAULT_ERROR_MESSAGE,
  defaultErrorMessage,
} from './http-client-error.js';
export type { HttpClientErrorOptions } from './http-client-error.js';
