import { ResourceNotFoundException } from '@aws-sdk/client-dynamodb';

export class CacheTableMissingError extends Error {
  constructor(public readonly tableName: string) {
    super(
      `DynamoDB table "${tableName}" was not found. Create it before using DynamoDBCacheStore.`,
    );
    this.name = 'CacheTableMissingError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Translate DynamoDB's "resource not found" failure into a
 * `CacheTableMissingError`; any other error is returned unchanged.
 */
export function toTableError(error: unknown, tableName: string): unknown {
  const isMissingTable =
    error instanceof ResourceNotFoundException ||
    (typeof error === 'object' &&
      error !== null &&
      'name' in error &&
      error.name === 'ResourceNotFoundException');

  return isMissingTable ? new CacheTableMissingError(tableName) : error;
}
