export { DynamoDBCacheStore } from './dynamodb-cache-store.js';
export type { DynamoDBCacheStoreOptions } from './dynamodb-cache-store.js';
export { CacheTableMissingError } from './table-missing-error.js';
export { DEFAULT_TABLE_NAME, CACHE_KEY_PREFIX, TABLE_SCHEMA } from './table.js';

export type { CacheStore } from '@restgate/core';
