/** Engine configuration, parsed from the environment. */
import { z } from 'zod';

const optionalUrl = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined))
  .pipe(z.string().url().optional());

// setTimeout limit
const MAX_DELAY_MS = 2_147_483_647;

const envSchema = z.object({
  CACHE_TTL_DYNAMIC_SECONDS: z.coerce.number().positive().default(60),
  CACHE_TTL_STANDARD_SECONDS: z.coerce.number().positive().default(300),
  CACHE_TTL_STABLE_SECONDS: z.coerce.number().positive().default(1800),
  INVOCATION_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_DELAY_MS).default(10_000),
  PLAN_DEADLINE_MS: z.coerce.number().int().positive().max(MAX_DELAY_MS).optional(),
  PROFILE_LIMIT: z.coerce.number().int().positive().default(10),
  TOOL_MAX_RETRIES: z.coerce.number().int().min(0).default(1),
  MCP_SERVER_URL: optionalUrl,
  REDIS_URL: optionalUrl,
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type CacheTier = 'DYNAMIC' | 'STANDARD' | 'STABLE';

/** Tier → TTL in seconds. */
export type CacheTtlConfig = Record<CacheTier, number>;

export interface EngineConfig {
  cacheTtlSeconds: CacheTtlConfig;
  invocationTimeoutMs: number;
  planDeadlineMs?: number;
  profileLimit: number;
  toolMaxRetries: number;
  mcpServerUrl?: string;
  redisUrl?: string;
  openaiApiKey?: string;
  openaiModel: string;
  logLevel: string;
}

export const DEFAULT_CACHE_TTL_SECONDS: CacheTtlConfig = {
  DYNAMIC: 60,
  STANDARD: 300,
  STABLE: 1800,
};

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: Array<{ path: string; message: string }>) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors.map((e) => ({
      path: e.path.join('.') || 'root',
      message: e.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
      issues,
    );
  }
  const e = result.data;
  return {
    cacheTtlSeconds: {
      DYNAMIC: e.CACHE_TTL_DYNAMIC_SECONDS,
      STANDARD: e.CACHE_TTL_STANDARD_SECONDS,
      STABLE: e.CACHE_TTL_STABLE_SECONDS,
    },
    invocationTimeoutMs: e.INVOCATION_TIMEOUT_MS,
    planDeadlineMs: e.PLAN_DEADLINE_MS,
    profileLimit: e.PROFILE_LIMIT,
    toolMaxRetries: e.TOOL_MAX_RETRIES,
    mcpServerUrl: e.MCP_SERVER_URL,
    redisUrl: e.REDIS_URL,
    openaiApiKey: e.OPENAI_API_KEY?.trim() || undefined,
    openaiModel: e.OPENAI_MODEL,
    logLevel: e.LOG_LEVEL,
  };
}
