// node/src/services/cache-store.ts — key/value stores behind the tiered cache.
// In-memory LRU per tier by default; Redis when REDIS_URL is set.
import Redis from 'ioredis';
import { LRUCache } from 'lru-cache';
import type { ZodType } from 'zod';
import type { CacheTier } from '@/config/app.config';
import { logger } from './logger';

export interface CacheEntry<V> {
  key: string;
  value: V;
  tier: CacheTier;
  /** Epoch ms. */
  expiresAt: number;
}

/** Store operations may throw; the cache manager treats any throw as a backend failure. */
export interface CacheStore<V> {
  get(key: string, tier: CacheTier): Promise<CacheEntry<V> | undefined>;
  /** `ttlMs` is the lifetime the manager gave `entry.expiresAt`, on its own clock. */
  set(entry: CacheEntry<V>, ttlMs: number): Promise<void>;
  delete(key: string, tier: CacheTier): Promise<boolean>;
  clear(): Promise<void>;
  sizes(): Promise<Partial<Record<CacheTier, number>>>;
}

export const TIER_MAX_ENTRIES: Record<CacheTier, number> = {
  DYNAMIC: 500,
  STANDARD: 1000,
  STABLE: 2000,
};

export class MemoryCacheStore<V> implements CacheStore<V> {
  private readonly tiers: Record<CacheTier, LRUCache<string, CacheEntry<V>>>;

  constructor(maxEntries: Record<CacheTier, number> = TIER_MAX_ENTRIES) {
    this.tiers = {
      DYNAMIC: new LRUCache<string, CacheEntry<V>>({ max: maxEntries.DYNAMIC }),
      STANDARD: new LRUCache<string, CacheEntry<V>>({ max: maxEntries.STANDARD }),
      STABLE: new LRUCache<string, CacheEntry<V>>({ max: maxEntries.STABLE }),
    };
  }

  async get(key: string, tier: CacheTier): Promise<CacheEntry<V> | undefined> {
    return this.tiers[tier].get(key);
  }

  async set(entry: CacheEntry<V>, _ttlMs?: number): Promise<void> {
    this.tiers[entry.tier].set(entry.key, entry);
  }

  async delete(key: string, tier: CacheTier): Promise<boolean> {
    return this.tiers[tier].delete(key);
  }

  async clear(): Promise<void> {
    for (const cache of Object.values(this.tiers)) cache.clear();
  }

  async sizes(): Promise<Partial<Record<CacheTier, number>>> {
    return {
      DYNAMIC: this.tiers.DYNAMIC.size,
      STANDARD: this.tiers.STANDARD.size,
      STABLE: this.tiers.STABLE.size,
    };
  }
}

const REDIS_PREFIX = 'pse:';

/** The Redis commands the store issues; an ioredis client satisfies it. */
export interface RedisCommands {
  readonly status: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(
    cursor: string,
    patternToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number,
  ): Promise<[cursor: string, elements: string[]]>;
}

function redisError(err: Error): string {
  return err?.message ?? err?.toString?.() ?? 'Connection failed';
}

/**
 * Redis-backed store. Entries are JSON with a Redis expiry matching the tier TTL;
 * values are validated on read so a foreign or stale payload reads as a miss.
 */
export class RedisCacheStore<V> implements CacheStore<V> {
  constructor(
    private readonly client: RedisCommands,
    private readonly valueSchema: ZodType<V>,
  ) {}

  private redisKey(tier: CacheTier, key: string): string {
    return `${REDIS_PREFIX}${tier}:${key}`;
  }

  private ensureReady(): void {
    if (this.client.status !== 'ready') {
      throw new Error(`redis not ready (status: ${this.client.status})`);
    }
  }

  async get(key: string, tier: CacheTier): Promise<CacheEntry<V> | undefined> {
    this.ensureReady();
    const raw = await this.client.get(this.redisKey(tier, key));
    if (!raw) return undefined;
    const stored: unknown = JSON.parse(raw);
    if (typeof stored !== 'object' || stored === null || !('expiresAt' in stored) || !('value' in stored)) {
      return undefined;
    }
    const value = this.valueSchema.safeParse(stored.value);
    if (!value.success || typeof stored.expiresAt !== 'number') return undefined;
    return { key, tier, value: value.data, expiresAt: stored.expiresAt };
  }

  async set(entry: CacheEntry<V>, ttlMs: number): Promise<void> {
    this.ensureReady();
    const ttlSeconds = Math.max(1, Math.ceil(ttlMs / 1000));
    await this.client.set(
      this.redisKey(entry.tier, entry.key),
      JSON.stringify({ value: entry.value, expiresAt: entry.expiresAt }),
      'EX',
      ttlSeconds,
    );
  }

  async delete(key: string, tier: CacheTier): Promise<boolean> {
    this.ensureReady();
    return (await this.client.del(this.redisKey(tier, key))) > 0;
  }

  async clear(): Promise<void> {
    this.ensureReady();
    let cursor = '0';
    do {
      const [next, keys] = await this.client.scan(cursor, 'MATCH', `${REDIS_PREFIX}*`, 'COUNT', 200);
      if (keys.length > 0) await this.client.del(...keys);
      cursor = next;
    } while (cursor !== '0');
  }

  async sizes(): Promise<Partial<Record<CacheTier, number>>> {
    return {};
  }
}

/** Connect to Redis; null when REDIS_URL is unset or the server is unreachable. */
export async function connectRedis(redisUrl: string | undefined): Promise<Redis | null> {
  if (!redisUrl || !redisUrl.trim()) {
    logger.info('redis:skipped', { reason: 'REDIS_URL not set' });
    return null;
  }

  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 3) return null; // stop after 3 retries
      return Math.min(times * 200, 2000);
    },
  });

  client.on('error', (err: Error) => {
    logger.warn('redis:error', { error: redisError(err) });
  });

  try {
    await client.ping();
    logger.info('redis:connected');
    return client;
  } catch (err) {
    logger.warn('redis:connect_failed', {
      error: err instanceof Error ? redisError(err) : String(err),
    });
    client.disconnect();
    return null;
  }
}
