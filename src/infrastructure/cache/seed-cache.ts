import { Redis } from 'ioredis';
import type { CacheConfig } from '../../config/index.js';
import type { Logger } from '../../common/logger.js';
import { systemClock, type Clock } from '../../common/types.js';

export interface SetOptions {
  /** Only write when the key does not exist yet. */
  onlyIfAbsent?: boolean;
}

/**
 * Short-lived key/value storage for per-attempt randomization seeds.
 * `set` resolves to false when `onlyIfAbsent` is given and the key already exists.
 */
export interface SeedCache {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds: number, options?: SetOptions): Promise<boolean>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  delete(key: string): Promise<void>;
  dispose?(): Promise<void>;
}

interface Entry {
  value: string;
  expiresAt: number;
}

export function createInMemorySeedCache(clock: Clock = systemClock): SeedCache {
  const store = new Map<string, Entry>();

  const live = (key: string): Entry | undefined => {
    const entry = store.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= clock.now().getTime()) {
      store.delete(key);
      return undefined;
    }
    return entry;
  };

  return {
    async get(key) {
      return live(key)?.value;
    },
    async set(key, value, ttlSeconds, options = {}) {
      if (options.onlyIfAbsent && live(key)) {
        return false;
      }
      store.set(key, { value, expiresAt: clock.now().getTime() + ttlSeconds * 1000 });
      return true;
    },
    async expire(key, ttlSeconds) {
      const entry = live(key);
      if (!entry) return false;
      entry.expiresAt = clock.now().getTime() + ttlSeconds * 1000;
      return true;
    },
    async delete(key) {
      store.delete(key);
    },
  };
}

/** The subset of the ioredis client the seed cache relies on. */
export interface SeedRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<'OK' | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>;
  expire(key: string, seconds: number): Promise<number>;
  del(key: string): Promise<number>;
  quit(): Promise<'OK'>;
}

export function createRedisSeedCache(client: SeedRedisClient): SeedCache {
  return {
    async get(key) {
      const value = await client.get(key);
      return value ?? undefined;
    },
    async set(key, value, ttlSeconds, options = {}) {
      const seconds = Math.max(1, Math.ceil(ttlSeconds));
      const result = options.onlyIfAbsent
        ? await client.set(key, value, 'EX', seconds, 'NX')
        : await client.set(key, value, 'EX', seconds);
      return result === 'OK';
    },
    async expire(key, ttlSeconds) {
      const updated = await client.expire(key, Math.max(1, Math.ceil(ttlSeconds)));
      return updated === 1;
    },
    async delete(key) {
      await client.del(key);
    },
    async dispose() {
      await client.quit();
    },
  };
}

export function createSeedCacheFromConfig(config: CacheConfig, logger: Logger): SeedCache {
  if (config.provider !== 'redis') {
    return createInMemorySeedCache();
  }
  const redis = new Redis(config.redisUrl, {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: times => (times > 10 ? null : Math.min(times * 200, 3000)),
  });
  redis.on('error', (err: Error) => {
    logger.error({ err }, 'Redis connection error');
  });
  redis.on('connect', () => {
    logger.info('Redis connected');
  });
  return createRedisSeedCache(redis);
}
