/**
 * Interface for storing response bodies by cache key
 */
export interface CacheStore<T = string> {
  /**
   * Look up a cached value
   * @param key The cache key of the request
   * @returns The cached value, or undefined when absent
   */
  get(key: string): Promise<T | undefined>;

  /**
   * Store a value, replacing any previous value for the key
   * @param key The cache key of the request
   * @param value The value to cache
   */
  set(key: string, value: T): Promise<void>;

  /**
   * Remove every cached value
   */
  clear(): Promise<void>;
}
