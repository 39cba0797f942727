// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type Redis from 'ioredis';
import { loadConfig, type EngineConfig } from '@/config/app.config';
import { ToolInvocationFacade } from '@/mcp/capability-client';
import { toolEnvelopeSchema, type ToolEnvelope } from '@/mcp/envelope';
import { connectMcpClient, McpSearchBackend, type SearchBackend } from '@/mcp/search-backend';
import { TieredCacheManager } from '@/services/cache';
import { MemoryCacheStore, RedisCacheStore, connectRedis, type CacheStore } from '@/services/cache-store';
import { EngineMetrics } from '@/services/engine-metrics';
import { OpenAiLlmClient, type LlmClient } from '@/services/llm-client';
import { LlmSemanticPlanner } from '@/services/llm-planner';
import { LlmNarrativeSynthesizer } from '@/services/llm-synthesizer';
import { logger, setLogLevel } from '@/services/logger';
import { QueryOrchestrator } from '@/services/orchestrator';
import { PlanExecutor } from '@/services/plan-executor';
import { ProfileFetcher } from '@/services/profile-fetcher';

export interface CreateEngineOptions {
  /** Used instead of connecting to MCP_SERVER_URL. */
  backend?: SearchBackend;
  /** Used instead of an OpenAI client built from OPENAI_API_KEY. */
  llm?: LlmClient;
}

export interface Engine {
  config: EngineConfig;
  metrics: EngineMetrics;
  cache: TieredCacheManager<ToolEnvelope>;
  facade: ToolInvocationFacade;
  executor: PlanExecutor;
  profiles: ProfileFetcher;
  /** Present when an LLM client is available. */
  orchestrator: QueryOrchestrator | null;
  close(): Promise<void>;
}

/** Wire the engine from config: cache store, search backend, executor and, when possible, the LLM oracles. */
export async function createEngine(
  config: EngineConfig = loadConfig(),
  options: CreateEngineOptions = {},
): Promise<Engine> {
  setLogLevel(config.logLevel);
  const metrics = new EngineMetrics();

  const redis: Redis | null = await connectRedis(config.redisUrl);
  const store: CacheStore<ToolEnvelope> = redis
    ? new RedisCacheStore<ToolEnvelope>(redis, toolEnvelopeSchema)
    : new MemoryCacheStore<ToolEnvelope>();
  const cache = new TieredCacheManager<ToolEnvelope>({ store, ttlSeconds: config.cacheTtlSeconds, metrics });

  let mcp: Client | null = null;
  let backend = options.backend;
  if (!backend) {
    if (!config.mcpServerUrl) {
      redis?.disconnect();
      throw new Error('No search backend: set MCP_SERVER_URL or pass a backend.');
    }
    mcp = await connectMcpClient(config.mcpServerUrl);
    backend = new McpSearchBackend(mcp);
  }

  const facade = new ToolInvocationFacade(backend, cache, { maxRetries: config.toolMaxRetries });
  const executor = new PlanExecutor(facade, {
    metrics,
    invocationTimeoutMs: config.invocationTimeoutMs,
    deadlineMs: config.planDeadlineMs,
  });
  const profiles = new ProfileFetcher(facade, executor, { timeoutMs: config.invocationTimeoutMs, metrics });

  const llm = options.llm ?? (config.openaiApiKey ? new OpenAiLlmClient(config.openaiApiKey, config.openaiModel) : null);
  if (!llm) logger.warn('engine:no_llm', { reason: 'OPENAI_API_KEY not set; answer() unavailable' });
  const orchestrator = llm
    ? new QueryOrchestrator(
        {
          planner: new LlmSemanticPlanner(llm),
          synthesizer: new LlmNarrativeSynthesizer(llm),
          executor,
          profiles,
          metrics,
        },
        { profileLimit: config.profileLimit },
      )
    : null;

  logger.info('engine:ready', { cache: redis ? 'redis' : 'memory', backend: mcp ? 'mcp' : 'custom', llm: Boolean(llm) });

  return {
    config,
    metrics,
    cache,
    facade,
    executor,
    profiles,
    orchestrator,
    async close() {
      await mcp?.close();
      if (redis) await redis.quit();
    },
  };
}

export { loadConfig, ConfigError, DEFAULT_CACHE_TTL_SECONDS } from '@/config/app.config';
export type { CacheTier, CacheTtlConfig, EngineConfig } from '@/config/app.config';
export { ToolInvocationFacade, FETCH_TOOL_NAME } from '@/mcp/capability-client';
export type { ToolEnvelope } from '@/mcp/envelope';
export { McpSearchBackend, connectMcpClient } from '@/mcp/search-backend';
export type { SearchBackend, ToolCaller } from '@/mcp/search-backend';
export { TieredCacheManager, cacheKey, tierForTool, TOOL_CACHE_TIERS } from '@/services/cache';
export { MemoryCacheStore, RedisCacheStore } from '@/services/cache-store';
export type { CacheEntry, CacheStore, RedisCommands } from '@/services/cache-store';
export { EngineMetrics } from '@/services/engine-metrics';
export type { ObservabilitySnapshot, QueryMetrics } from '@/services/engine-metrics';
export { OpenAiLlmClient } from '@/services/llm-client';
export type { LlmClient, LlmRequest } from '@/services/llm-client';
export { LlmSemanticPlanner } from '@/services/llm-planner';
export { LlmNarrativeSynthesizer } from '@/services/llm-synthesizer';
export { QueryOrchestrator } from '@/services/orchestrator';
export type { QueryAnswer } from '@/services/orchestrator';
export { PlanExecutor, groupByPriority } from '@/services/plan-executor';
export { ProfileFetcher } from '@/services/profile-fetcher';
export { aggregate, unionOf, intersectionOf, sequentialOf } from '@/services/result-aggregator';
export { parseLiteral, parseProfile, NON_LITERAL_PLACEHOLDER } from '@/services/safe-parse-json';
export { validatePlan } from '@/services/plan-validator';
export * from '@/stability/errors';
export type * from '@/types/orchestration';
export type * from '@/types/oracles';
