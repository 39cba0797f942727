// node/src/services/cache.ts — tiered TTL cache in front of every search and fetch call.
//
// - Tier (DYNAMIC / STANDARD / STABLE) is a static property of the tool name; TTLs come from config.
// - One fetch per key at a time: concurrent callers attach to the in-flight promise (single-flight).
//   A fetch keeps running and fills the cache even when every caller has stopped waiting.
// - Store failures bypass the cache for that call; they are logged and counted, never thrown.
import crypto from 'crypto';
import { DEFAULT_CACHE_TTL_SECONDS, type CacheTier, type CacheTtlConfig } from '@/config/app.config';
import { CacheBackendError, errorMessage } from '@/stability/errors';
import { MemoryCacheStore, type CacheEntry, type CacheStore } from './cache-store';
import { EngineMetrics } from './engine-metrics';
import { logger } from './logger';

/** Tools not listed here use STANDARD; `null` means never cached. */
export const TOOL_CACHE_TIERS: Readonly<Record<string, CacheTier | null>> = {
  // current status of a person may change
  find_person_by_name: 'DYNAMIC',
  get_person_details: 'DYNAMIC',
  get_person_complete_profile: 'DYNAMIC',
  get_person_job_descriptions: 'DYNAMIC',
  natural_language_search: 'DYNAMIC',

  find_people_by_skill: 'STANDARD',
  find_people_by_company: 'STANDARD',
  get_person_skills: 'STANDARD',
  find_colleagues_at_company: 'STANDARD',
  get_person_colleagues: 'STANDARD',
  find_people_by_experience_level: 'STANDARD',
  get_company_employees: 'STANDARD',
  search_job_descriptions_by_keywords: 'STANDARD',
  find_technical_skills_in_descriptions: 'STANDARD',
  analyze_career_progression: 'STANDARD',

  // institutional and location data rarely change
  find_people_by_institution: 'STABLE',
  find_people_by_location: 'STABLE',
  find_people_with_multiple_skills: 'STABLE',
  get_skill_popularity: 'STABLE',
  find_leadership_indicators: 'STABLE',
  find_achievement_patterns: 'STABLE',
  find_domain_experts: 'STABLE',
  find_similar_career_paths: 'STABLE',
  find_role_transition_patterns: 'STABLE',

  health_check: null,
};

export function tierForTool(toolName: string): CacheTier | null {
  const tier = TOOL_CACHE_TIERS[toolName];
  return tier === undefined ? 'STANDARD' : tier;
}

/** Recursively sorts object keys so that param order never changes the serialized form. */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) out[key] = canonicalize(v);
    }
    return out;
  }
  return value;
}

/** Deterministic key for (toolName, params). Throws on params that cannot be serialized. */
export function cacheKey(toolName: string, params: Readonly<Record<string, unknown>>): string {
  const payload = JSON.stringify([toolName, canonicalize(params)]);
  const digest = crypto.createHash('sha256').update(payload).digest('hex');
  return `${toolName}:${digest}`;
}

export interface TieredCacheOptions<V> {
  store?: CacheStore<V>;
  ttlSeconds?: CacheTtlConfig;
  metrics?: EngineMetrics;
  /** Epoch ms clock; injectable for expiry tests. */
  now?: () => number;
}

export interface GetOrFetchOptions<V> {
  /** Only values passing this are stored. Defaults to storing everything. */
  shouldCache?: (value: V) => boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: number;
  invocationsByTool: Record<string, number>;
  inFlight: number;
  tierSizes: Partial<Record<CacheTier, number>>;
}

export class TieredCacheManager<V> {
  private readonly store: CacheStore<V>;
  private readonly ttlSeconds: CacheTtlConfig;
  private readonly metrics: EngineMetrics;
  private readonly now: () => number;
  private readonly inflight = new Map<string, Promise<V>>();

  constructor(options: TieredCacheOptions<V> = {}) {
    this.store = options.store ?? new MemoryCacheStore<V>();
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.metrics = options.metrics ?? new EngineMetrics();
    this.now = options.now ?? Date.now;
  }

  async getOrFetch(
    toolName: string,
    params: Readonly<Record<string, unknown>>,
    fetchFn: () => Promise<V>,
    options: GetOrFetchOptions<V> = {},
  ): Promise<V> {
    this.metrics.recordInvocation(toolName);
    const tier = tierForTool(toolName);
    if (tier === null) return fetchFn();

    const key = cacheKey(toolName, params);
    const pending = this.inflight.get(key);
    if (pending) {
      this.metrics.recordHit();
      logger.debug('cache:coalesced', { toolName });
      return pending;
    }

    const task = this.lookupOrFetch(key, tier, toolName, fetchFn, options.shouldCache).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, task);
    return task;
  }

  private async lookupOrFetch(
    key: string,
    tier: CacheTier,
    toolName: string,
    fetchFn: () => Promise<V>,
    shouldCache: ((value: V) => boolean) | undefined,
  ): Promise<V> {
    let bypass = false;
    let entry: CacheEntry<V> | undefined;
    try {
      entry = await this.store.get(key, tier);
    } catch (err) {
      this.backendFailure('get', toolName, err);
      bypass = true;
    }

    if (entry && this.now() < entry.expiresAt) {
      this.metrics.recordHit();
      return entry.value;
    }
    this.metrics.recordMiss();

    if (entry) {
      try {
        await this.store.delete(key, tier);
      } catch (err) {
        this.backendFailure('delete', toolName, err);
      }
    }

    const value = await fetchFn();
    if (!bypass && (shouldCache?.(value) ?? true)) {
      try {
        const ttlMs = this.ttlSeconds[tier] * 1000;
        await this.store.set({ key, value, tier, expiresAt: this.now() + ttlMs }, ttlMs);
      } catch (err) {
        this.backendFailure('set', toolName, err);
      }
    }
    return value;
  }

  private backendFailure(operation: CacheBackendError['operation'], toolName: string, err: unknown): void {
    const failure = new CacheBackendError(errorMessage(err), operation);
    this.metrics.recordError(failure.kind);
    logger.warn('cache:backend_error', { operation, toolName, error: failure.message });
  }

  async invalidate(toolName: string, params: Readonly<Record<string, unknown>>): Promise<boolean> {
    const tier = tierForTool(toolName);
    if (tier === null) return false;
    try {
      return await this.store.delete(cacheKey(toolName, params), tier);
    } catch (err) {
      this.backendFailure('delete', toolName, err);
      return false;
    }
  }

  async clear(): Promise<void> {
    try {
      await this.store.clear();
      logger.info('cache:cleared');
    } catch (err) {
      this.backendFailure('clear', '*', err);
    }
  }

  async stats(): Promise<CacheStats> {
    const { hits, misses, hitRate, invocationsByTool } = this.metrics.snapshot();
    let tierSizes: Partial<Record<CacheTier, number>> = {};
    try {
      tierSizes = await this.store.sizes();
    } catch (err) {
      this.backendFailure('sizes', '*', err);
    }
    return { hits, misses, hitRate, invocationsByTool, inFlight: this.inflight.size, tierSizes };
  }
}
