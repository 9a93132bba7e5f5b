export { HttpClient } from './http-client.js';
export type { HttpClientStores, HttpClientOptions } from './http-client.js';
