import { describe, it, expect } from 'vitest';
import { validateEnv } from '../env.config';

describe('validateEnv', () => {
  it('applies defaults', () => {
    const env = validateEnv({});
    expect(env.AI_MODEL).toBe('gpt-4o-mini');
    expect(env.AI_TIMEOUT_MS).toBe(60_000);
    expect(env.AI_MAX_RETRIES).toBe(2);
    expect(env.CHECK_CONCURRENCY).toBe(1);
    expect(env.PORT).toBe(4000);
    expect(env.AI_API_KEY).toBeUndefined();
  });

  it('coerces numeric strings', () => {
    const env = validateEnv({ CHECK_CONCURRENCY: '4', ORACLE_PREVIEW_ROWS: '5', AI_API_KEY: 'test-secret' });
    expect(env.CHECK_CONCURRENCY).toBe(4);
    expect(env.ORACLE_PREVIEW_ROWS).toBe(5);
    expect(env.AI_API_KEY).toBe('test-secret');
  });

  it('reports every invalid variable', () => {
    expect(() => validateEnv({ CHECK_CONCURRENCY: '0', AI_BASE_URL: 'not a url' })).toThrow(
      /Environment validation failed:\n {2}AI_BASE_URL: Invalid url\n {2}CHECK_CONCURRENCY: /,
    );
  });
});
