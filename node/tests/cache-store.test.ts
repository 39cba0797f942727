import { describe, it, expect, vi } from 'vitest';
import { toolEnvelopeSchema, type ToolEnvelope } from '@/mcp/envelope';
import { TieredCacheManager } from '@/services/cache';
import { MemoryCacheStore, RedisCacheStore, type RedisCommands } from '@/services/cache-store';
import { EngineMetrics } from '@/services/engine-metrics';

/** In-process stand-in for the Redis commands the store uses. SCAN pages two keys at a time. */
class FakeRedis implements RedisCommands {
  status = 'ready';
  readonly data = new Map<string, string>();
  readonly setCalls: Array<[string, string, 'EX', number]> = [];
  readonly scanCursors: string[] = [];
  private snapshot: string[] = [];

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown> {
    this.setCalls.push([key, value, secondsToken, seconds]);
    this.data.set(key, value);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    return keys.filter((key) => this.data.delete(key)).length;
  }

  async scan(
    cursor: string,
    _patternToken: 'MATCH',
    pattern: string,
    _countToken: 'COUNT',
    _count: number,
  ): Promise<[cursor: string, elements: string[]]> {
    this.scanCursors.push(cursor);
    if (cursor === '0') this.snapshot = [...this.data.keys()];
    const start = Number(cursor);
    const prefix = pattern.replace(/\*$/, '');
    const page = this.snapshot.slice(start, start + 2).filter((key) => key.startsWith(prefix));
    const next = start + 2 >= this.snapshot.length ? '0' : String(start + 2);
    return [next, page];
  }
}

const OK_ENVELOPE: ToolEnvelope = { ok: true, data: { entityIds: [1, 2] } };

function setup() {
  const redis = new FakeRedis();
  const store = new RedisCacheStore<ToolEnvelope>(redis, toolEnvelopeSchema);
  return { redis, store };
}

describe('RedisCacheStore', () => {
  it('stores entries under the tier prefix with an expiry from the given lifetime', async () => {
    const { redis, store } = setup();

    await store.set({ key: 'k1', tier: 'STANDARD', value: OK_ENVELOPE, expiresAt: 305_000 }, 300_000);

    expect(redis.setCalls).toEqual([
      ['pse:STANDARD:k1', JSON.stringify({ value: OK_ENVELOPE, expiresAt: 305_000 }), 'EX', 300],
    ]);
    expect(await store.get('k1', 'STANDARD')).toEqual({
      key: 'k1',
      tier: 'STANDARD',
      value: OK_ENVELOPE,
      expiresAt: 305_000,
    });
    expect(await store.get('k1', 'STABLE')).toBeUndefined();
  });

  it('rounds the expiry up to whole seconds, at least one', async () => {
    const { redis, store } = setup();

    await store.set({ key: 'a', tier: 'DYNAMIC', value: OK_ENVELOPE, expiresAt: 1 }, 1_500);
    await store.set({ key: 'b', tier: 'DYNAMIC', value: OK_ENVELOPE, expiresAt: 1 }, 0);

    expect(redis.setCalls.map(([, , , seconds]) => seconds)).toEqual([2, 1]);
  });

  it('reads foreign or invalid payloads as a miss', async () => {
    const { redis, store } = setup();
    redis.data.set('pse:STANDARD:wrong-value', JSON.stringify({ value: { ok: 'yes' }, expiresAt: 10 }));
    redis.data.set('pse:STANDARD:no-expiry', JSON.stringify({ value: OK_ENVELOPE }));
    redis.data.set('pse:STANDARD:string-expiry', JSON.stringify({ value: OK_ENVELOPE, expiresAt: 'soon' }));
    redis.data.set('pse:STANDARD:scalar', '42');

    expect(await store.get('wrong-value', 'STANDARD')).toBeUndefined();
    expect(await store.get('no-expiry', 'STANDARD')).toBeUndefined();
    expect(await store.get('string-expiry', 'STANDARD')).toBeUndefined();
    expect(await store.get('scalar', 'STANDARD')).toBeUndefined();
  });

  it('throws on a value that is not JSON', async () => {
    const { redis, store } = setup();
    redis.data.set('pse:STANDARD:k', '<<not json');

    await expect(store.get('k', 'STANDARD')).rejects.toBeInstanceOf(SyntaxError);
  });

  it('refuses to run while the client is not ready', async () => {
    const { redis, store } = setup();
    redis.status = 'connecting';

    await expect(store.get('k', 'STANDARD')).rejects.toThrow('redis not ready (status: connecting)');
  });

  it('deletes one entry and reports whether it existed', async () => {
    const { store } = setup();
    await store.set({ key: 'k', tier: 'STABLE', value: OK_ENVELOPE, expiresAt: 10 }, 1_000);

    expect(await store.delete('k', 'STABLE')).toBe(true);
    expect(await store.delete('k', 'STABLE')).toBe(false);
  });

  it('clears every prefixed key across SCAN pages and leaves other keys alone', async () => {
    const { redis, store } = setup();
    redis.data.set('pse:DYNAMIC:a', '{}');
    redis.data.set('session:1', '{}');
    redis.data.set('pse:STANDARD:b', '{}');
    redis.data.set('pse:STABLE:c', '{}');

    await store.clear();

    expect([...redis.data.keys()]).toEqual(['session:1']);
    expect(redis.scanCursors).toEqual(['0', '2']);
  });
});

describe('TieredCacheManager over Redis', () => {
  it('bypasses a corrupt entry and fetches fresh', async () => {
    const { redis, store } = setup();
    const metrics = new EngineMetrics();
    const cache = new TieredCacheManager<ToolEnvelope>({ store, metrics });
    const fetchFn = vi.fn(async (): Promise<ToolEnvelope> => OK_ENVELOPE);
    await cache.getOrFetch('find_people_by_skill', { skill: 'Go' }, fetchFn);
    const [[key]] = redis.setCalls;
    redis.data.set(key, '<<not json');
    redis.setCalls.length = 0;

    expect(await cache.getOrFetch('find_people_by_skill', { skill: 'Go' }, fetchFn)).toEqual(OK_ENVELOPE);

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(redis.setCalls).toEqual([]);
    expect(metrics.snapshot().errorsByKind).toEqual({ CacheBackendError: 1 });
  });

  it('writes the tier TTL to Redis regardless of the manager clock', async () => {
    const { redis, store } = setup();
    const cache = new TieredCacheManager<ToolEnvelope>({ store, now: () => 0 });

    await cache.getOrFetch('find_person_by_name', { name: 'Ana' }, async () => OK_ENVELOPE);

    expect(redis.setCalls.map(([, , , seconds]) => seconds)).toEqual([60]);
  });
});

describe('MemoryCacheStore', () => {
  it('evicts the least recently used entry of a full tier', async () => {
    const store = new MemoryCacheStore<string>({ DYNAMIC: 1, STANDARD: 2, STABLE: 2 });
    await store.set({ key: 'a', tier: 'DYNAMIC', value: 'A', expiresAt: 10 }, 10);
    await store.set({ key: 'b', tier: 'DYNAMIC', value: 'B', expiresAt: 10 }, 10);

    expect(await store.get('a', 'DYNAMIC')).toBeUndefined();
    expect((await store.get('b', 'DYNAMIC'))?.value).toBe('B');
    expect(await store.sizes()).toEqual({ DYNAMIC: 1, STANDARD: 0, STABLE: 0 });
  });
});
