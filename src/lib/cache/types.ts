/**
 * Cache Types
 *
 * Type definitions for the fetch-result cache.
 */

/**
 * A cached value and when it was stored (epoch ms).
 */
export interface CacheEntry<T> {
  value: T;
  insertedAt: number;
}

/**
 * Key-value store for fetch results. Implementations may lose entries at
 * any time; callers must treat a miss as "fetch again".
 */
export interface ResultCache<T> {
  get(key: string): Promise<CacheEntry<T> | null>;
  set(key: string, value: T): Promise<void>;
  delete(key: string): Promise<void>;
  /** Release connections; the cache is unusable afterwards */
  close(): Promise<void>;
}

/**
 * The subset of ioredis used by the Redis-backed cache.
 */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}
