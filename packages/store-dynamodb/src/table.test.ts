import { describe, it, expect } from 'vitest';
import { CACHE_KEY_PREFIX, DEFAULT_TABLE_NAME, TABLE_SCHEMA } from './table.js';

describe('table schema constants', () => {
  it('exports default table name and key prefix', () => {
    expect(DEFAULT_TABLE_NAME).toBe('restgate-cache');
    expect(CACHE_KEY_PREFIX).toBe('CACHE#');
  });

  it('exports table schema with pk/sk', () => {
    expect(TABLE_SCHEMA.KeySchema).toEqual([
      { AttributeName: 'pk', KeyType: 'HASH' },
      { AttributeName: 'sk', KeyType: 'RANGE' },
    ]);
    expect(TABLE_SCHEMA.AttributeDefinitions).toEqual([
      { AttributeName: 'pk', AttributeType: 'S' },
      { AttributeName: 'sk', AttributeType: 'S' },
    ]);
  });
});
