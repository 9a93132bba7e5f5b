import type {
  KeySchemaElement,
  AttributeDefinition,
} from '@aws-sdk/client-dynamodb';

export const DEFAULT_TABLE_NAME = 'restgate-cache';

/** Prefix of the partition and sort keys of cached responses. */
export const CACHE_KEY_PREFIX = 'CACHE#';

export const TABLE_SCHEMA: {
  KeySchema: Array<KeySchemaElement>;
  AttributeDefinitions: Array<AttributeDefinition>;
} = {
  KeySchema: [
    { AttributeName: 'pk', KeyType: 'HASH' },
    { AttributeName: 'sk', KeyType: 'RANGE' },
  ],
  AttributeDefinitions: [
    { AttributeName: 'pk', AttributeType: 'S' },
    { AttributeName: 'sk', AttributeType: 'S' },
  ],
};
