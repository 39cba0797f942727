import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '@/config/app.config';

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('config was accepted');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      cacheTtlSeconds: { DYNAMIC: 60, STANDARD: 300, STABLE: 1800 },
      invocationTimeoutMs: 10_000,
      planDeadlineMs: undefined,
      profileLimit: 10,
      toolMaxRetries: 1,
      mcpServerUrl: undefined,
      redisUrl: undefined,
      openaiApiKey: undefined,
      openaiModel: 'gpt-4o',
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      CACHE_TTL_DYNAMIC_SECONDS: '30',
      PLAN_DEADLINE_MS: '2500',
      PROFILE_LIMIT: '5',
      TOOL_MAX_RETRIES: '0',
      MCP_SERVER_URL: 'http://localhost:8000/mcp',
      REDIS_URL: '',
      OPENAI_API_KEY: ' test-key ',
    });

    expect(config.cacheTtlSeconds).toEqual({ DYNAMIC: 30, STANDARD: 300, STABLE: 1800 });
    expect(config.planDeadlineMs).toBe(2500);
    expect(config.profileLimit).toBe(5);
    expect(config.toolMaxRetries).toBe(0);
    expect(config.mcpServerUrl).toBe('http://localhost:8000/mcp');
    expect(config.redisUrl).toBeUndefined();
    expect(config.openaiApiKey).toBe('test-key');
  });

  it('rejects delays longer than a timer can wait', () => {
    const err = configError({ PLAN_DEADLINE_MS: '3000000000', INVOCATION_TIMEOUT_MS: '2147483648' });
    expect(err.issues.map((i) => i.path)).toEqual(['INVOCATION_TIMEOUT_MS', 'PLAN_DEADLINE_MS']);
  });

  it('names every invalid variable', () => {
    const err = configError({ PROFILE_LIMIT: '0', MCP_SERVER_URL: 'not a url', LOG_LEVEL: 'loud' });
    expect(err.issues.map((i) => i.path)).toEqual(['PROFILE_LIMIT', 'MCP_SERVER_URL', 'LOG_LEVEL']);
  });
});
