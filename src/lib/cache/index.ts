/**
 * Result cache for WFS fetches
 *
 * Two interchangeable stores behind the ResultCache interface:
 * - MemoryCache: in-process, TTL + bounded size
 * - RedisCache: ioredis, shared between processes
 *
 * The fetch core never depends on a cache. Cache errors are logged and
 * read as misses, so a broken Redis only costs a refetch.
 */

import Redis, { type RedisOptions } from 'ioredis';
import { cacheLogger } from '@/lib/logger';
import type { CacheEntry, RedisLike, ResultCache } from './types';

const DEFAULT_MAX_ENTRIES = 200;

// =============================================================================
// Memory cache
// =============================================================================

export interface MemoryCacheOptions {
  ttlSeconds: number;
  maxEntries?: number;
  /** Clock override for tests */
  now?: () => number;
}

/**
 * In-memory cache with TTL and oldest-first eviction.
 */
export class MemoryCache<T> implements ResultCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry<T> | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async set(key: string, value: T): Promise<void> {
    this.entries.delete(key);

    // Map iteration order is insertion order, so the first key is the oldest
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, insertedAt: this.now() });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// =============================================================================
// Redis cache
// =============================================================================

/**
 * Converts values to and from a JSON-safe form.
 * `decode` returns null for anything it does not recognise.
 */
export interface CacheCodec<T> {
  encode(value: T): unknown;
  decode(raw: unknown): T | null;
}

export interface RedisCacheOptions<T> {
  ttlSeconds: number;
  codec: CacheCodec<T>;
  prefix?: string;
  now?: () => number;
}

/**
 * Redis-backed cache. Entries expire server-side via SETEX.
 */
export class RedisCache<T> implements ResultCache<T> {
  private readonly prefix: string;
  private readonly now: () => number;

  constructor(
    private readonly client: RedisLike,
    private readonly options: RedisCacheOptions<T>,
  ) {
    this.prefix = options.prefix ?? 'cwe';
    this.now = options.now ?? Date.now;
  }

  private key(key: string): string {
    return `${this.prefix}:${key}`;
  }

  async get(key: string): Promise<CacheEntry<T> | null> {
    try {
      const raw = await this.client.get(this.key(key));
      if (!raw) return null;

      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed !== 'object' || parsed === null) return null;
      if (!('insertedAt' in parsed) || typeof parsed.insertedAt !== 'number') return null;
      if (!('value' in parsed)) return null;

      const value = this.options.codec.decode(parsed.value);
      if (value === null) {
        cacheLogger.warn({ key }, 'Discarding unreadable cache entry');
        return null;
      }
      return { value, insertedAt: parsed.insertedAt };
    } catch (error) {
      cacheLogger.warn({ err: error, key }, 'Cache get error');
      return null;
    }
  }

  async set(key: string, value: T): Promise<void> {
    try {
      const serialized = JSON.stringify({
        value: this.options.codec.encode(value),
        insertedAt: this.now(),
      });
      await this.client.setex(this.key(key), this.options.ttlSeconds, serialized);
    } catch (error) {
      cacheLogger.warn({ err: error, key }, 'Cache set error');
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.del(this.key(key));
    } catch (error) {
      cacheLogger.warn({ err: error, key }, 'Cache delete error');
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      cacheLogger.warn({ err: error }, 'Redis quit error');
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * ioredis options from a redis:// or rediss:// URL
 */
export function getRedisOptions(redisUrl: string): RedisOptions {
  const url = new URL(redisUrl);

  const options: RedisOptions = {
    host: url.hostname,
    port: parseInt(url.port) || 6379,
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    retryStrategy: (times: number) => {
      if (times > 3) {
        cacheLogger.warn('Max Redis retry attempts reached, giving up');
        return null;
      }
      return Math.min(times * 100, 2000);
    },
    lazyConnect: true, // Don't connect until first command
    connectTimeout: 5000,
  };

  if (url.password) {
    options.password = decodeURIComponent(url.password);
  }

  if (url.username && url.username !== 'default') {
    options.username = url.username;
  }

  if (url.protocol === 'rediss:') {
    options.tls = {
      rejectUnauthorized: process.env.NODE_ENV === 'production',
    };
  }

  return options;
}

/**
 * Redis cache when a URL is configured, memory cache otherwise.
 */
export function createResultCache<T>(options: {
  redisUrl?: string;
  ttlSeconds: number;
  codec: CacheCodec<T>;
  prefix?: string;
}): ResultCache<T> {
  if (options.redisUrl) {
    const client = new Redis(getRedisOptions(options.redisUrl));
    client.on('error', (err: Error) => {
      cacheLogger.error({ err }, 'Redis connection error');
    });
    cacheLogger.info({ prefix: options.prefix }, 'Using Redis result cache');
    return new RedisCache<T>(client, options);
  }

  return new MemoryCache<T>({ ttlSeconds: options.ttlSeconds });
}

export * from './types';
