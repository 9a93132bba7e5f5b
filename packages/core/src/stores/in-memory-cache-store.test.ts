import { InMemoryCacheStore } from './in-memory-cache-store.js';

describe('InMemoryCacheStore', () => {
  let store: InMemoryCacheStore;

  beforeEach(() => {
    store = new InMemoryCacheStore();
  });

  test('returns a stored value', async () => {
    await store.set('https://api.example.com/items', 'body');
    await expect(store.get('https://api.example.com/items')).resolves.toBe(
      'body',
    );
  });

  test('returns undefined for unknown keys', async () => {
    await expect(store.get('missing')).resolves.toBeUndefined();
  });

  test('overwrites existing values', async () => {
    await store.set('key', 'first');
    await store.set('key', 'second');

    await expect(store.get('key')).resolves.toBe('second');
    expect(store.size).toBe(1);
  });

  test('keeps empty bodies distinct from misses', async () => {
    await store.set('key', '');
    await expect(store.get('key')).resolves.toBe('');
  });

  test('clear removes every entry', async () => {
    await store.set('a', '1');
    await store.set('b', '2');

    await store.clear();

    await expect(store.get('a')).resolves.toBeUndefined();
    await expect(store.get('b')).resolves.toBeUndefined();
    expect(store.size).toBe(0);
  });
});
