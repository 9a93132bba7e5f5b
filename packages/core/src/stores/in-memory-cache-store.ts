import type { CacheStore } from './cache-store.js';

export class InMemoryCacheStore<T = string> implements CacheStore<T> {
  private readonly entries = new Map<string, T>();

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<T | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, value: T): Promise<void> {
    this.entries.set(key, value);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}
