import {
  BatchWriteCommand,
  type DynamoDBDocumentClient,
} from '@aws-sdk/lib-dynamodb';

type DynamoKey = Record<string, unknown>;

const BATCH_SIZE = 25;
const MAX_BATCH_WRITE_RETRIES = 8;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getRetryDelayMs(attempt: number): number {
  const backoff = Math.min(1000, 50 * 2 ** attempt);
  const jitter = Math.floor(Math.random() * 25);
  return backoff + jitter;
}

/**
 * Delete `keys` in batches of 25, resubmitting unprocessed items with
 * exponential backoff.
 */
export async function batchDeleteWithRetries(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keys: Array<DynamoKey>,
): Promise<void> {
  for (let i = 0; i < keys.length; i += BATCH_SIZE) {
    let pending = keys.slice(i, i + BATCH_SIZE);

    for (let attempt = 0; pending.length > 0; attempt++) {
      const response = await docClient.send(
        new BatchWriteCommand({
          RequestItems: {
            [tableName]: pending.map((key) => ({ DeleteRequest: { Key: key } })),
          },
        }),
      );

      const unprocessed = response.UnprocessedItems?.[tableName] ?? [];
      if (unprocessed.length === 0) {
        break;
      }

      if (attempt >= MAX_BATCH_WRITE_RETRIES) {
        throw new Error(
          `Failed to delete all items from table "${tableName}" after ${MAX_BATCH_WRITE_RETRIES + 1} attempts`,
        );
      }

      pending = unprocessed
        .map((request) => request.DeleteRequest?.Key)
        .filter((key): key is DynamoKey => Boolean(key));
      await sleep(getRetryDelayMs(attempt));
    }
  }
}
