import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadEnv } from './env';

describe('loadEnv', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fills in defaults around the API key', () => {
    const env = loadEnv({ LLM_API_KEY: 'test-secret' });

    expect(env).toMatchObject({
      LLM_API_KEY: 'test-secret',
      LLM_MODEL: 'glm-4-flash',
      NOTE_SEARCH_MCP_URL: 'http://localhost:18060/mcp',
      ANALYSIS_CONCURRENCY: 5,
      PROGRESS_INTERVAL: 5,
      SUBSCRIPTION_GRACE_MS: 30000,
      TASK_TTL_MS: 3600000,
      LOG_LEVEL: 'info'
    });
  });

  it('reads numbers from strings', () => {
    const env = loadEnv({ LLM_API_KEY: 'test-secret', ANALYSIS_CONCURRENCY: '12', SUBSCRIPTION_GRACE_MS: '0' });

    expect(env.ANALYSIS_CONCURRENCY).toBe(12);
    expect(env.SUBSCRIPTION_GRACE_MS).toBe(0);
  });

  it('rejects a missing key and out of range settings', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => loadEnv({})).toThrow('Invalid environment configuration');
    expect(() => loadEnv({ LLM_API_KEY: 'test-secret', ANALYSIS_CONCURRENCY: '0' })).toThrow(
      'Invalid environment configuration'
    );
    expect(errors).toHaveBeenCalledWith(expect.stringContaining('ANALYSIS_CONCURRENCY'));
  });
});
