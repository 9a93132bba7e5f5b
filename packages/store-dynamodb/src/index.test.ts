import * as dynamodb from './index.js';

describe('store-dynamodb index exports', () => {
  it('re-exports the cache store and table schema constants', () => {
    expect(dynamodb.DynamoDBCacheStore).toBeTypeOf('function');
    expect(dynamodb.CacheTableMissingError).toBeTypeOf('function');
    expect(dynamodb.DEFAULT_TABLE_NAME).toBe('restgate-cache');
    expect(dynamodb.TABLE_SCHEMA).toBeDefined();
  });
});
