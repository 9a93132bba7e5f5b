export type {
  HttpClientContract,
  RequestBody,
  RequestOptions,
} from './http-client.js';
