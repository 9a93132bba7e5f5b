import { createHash } from 'crypto';
import {
  DynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import type { CacheStore } from '@restgate/core';
import { batchDeleteWithRetries } from './dynamodb-utils.js';
import { toTableError } from './table-missing-error.js';
import { CACHE_KEY_PREFIX, DEFAULT_TABLE_NAME } from './table.js';

export interface DynamoDBCacheStoreOptions {
  client?: DynamoDBDocumentClient | DynamoDBClient;
  region?: string;
  tableName?: string;
  /** Bodies larger than this are not cached. DynamoDB items cap at 400 KB. */
  maxEntrySizeBytes?: number;
}

/**
 * Cache store that keeps response bodies in a DynamoDB table so several
 * processes can share one cache.
 *
 * Cache keys embed full URLs and headers, which can exceed DynamoDB's key size
 * limit, so items are addressed by the SHA-256 of the key.
 */
export class DynamoDBCacheStore implements CacheStore {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly rawClient: DynamoDBClient | undefined;
  private readonly tableName: string;
  private readonly maxEntrySizeBytes: number;
  private isClosed = false;

  constructor({
    client,
    region,
    tableName = DEFAULT_TABLE_NAME,
    maxEntrySizeBytes = 390 * 1024,
  }: DynamoDBCacheStoreOptions = {}) {
    this.tableName = tableName;
    this.maxEntrySizeBytes = maxEntrySizeBytes;

    if (client instanceof DynamoDBDocumentClient) {
      this.docClient = client;
    } else if (client instanceof DynamoDBClient) {
      this.docClient = DynamoDBDocumentClient.from(client);
    } else {
      const config: DynamoDBClientConfig = {};
      if (region) config.region = region;
      this.rawClient = new DynamoDBClient(config);
      this.docClient = DynamoDBDocumentClient.from(this.rawClient);
    }
  }

  async get(key: string): Promise<string | undefined> {
    this.assertOpen();

    const pk = this.itemKey(key);

    let result;
    try {
      result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { pk, sk: pk },
        }),
      );
    } catch (error: unknown) {
      throw toTableError(error, this.tableName);
    }

    const value = result.Item?.['value'];
    return typeof value === 'string' ? value : undefined;
  }

  async set(key: string, value: string): Promise<void> {
    this.assertOpen();

    if (Buffer.byteLength(value, 'utf8') > this.maxEntrySizeBytes) {
      return;
    }

    const pk = this.itemKey(key);

    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk,
            sk: pk,
            key,
            value,
            createdAt: Date.now(),
          },
        }),
      );
    } catch (error: unknown) {
      throw toTableError(error, this.tableName);
    }
  }

  async clear(): Promise<void> {
    this.assertOpen();

    let lastEvaluatedKey: Record<string, unknown> | undefined;

    do {
      try {
        const scanResult = await this.docClient.send(
          new ScanCommand({
            TableName: this.tableName,
            FilterExpression: 'begins_with(pk, :prefix)',
            ExpressionAttributeValues: { ':prefix': CACHE_KEY_PREFIX },
            ProjectionExpression: 'pk, sk',
            ExclusiveStartKey: lastEvaluatedKey,
          }),
        );

        const items = scanResult.Items ?? [];
        if (items.length > 0) {
          await batchDeleteWithRetries(
            this.docClient,
            this.tableName,
            items.map((item) => ({ pk: item['pk'], sk: item['sk'] })),
          );
        }

        lastEvaluatedKey = scanResult.LastEvaluatedKey;
      } catch (error: unknown) {
        throw toTableError(error, this.tableName);
      }
    } while (lastEvaluatedKey);
  }

  /**
   * Stop using the store. A DynamoDB client created by the store is destroyed;
   * a client passed in by the caller is left open.
   */
  async close(): Promise<void> {
    this.isClosed = true;
    this.rawClient?.destroy();
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new Error('Cache store has been closed');
    }
  }

  private itemKey(key: string): string {
    return `${CACHE_KEY_PREFIX}${createHash('sha256').update(key).digest('hex')}`;
  }
}
