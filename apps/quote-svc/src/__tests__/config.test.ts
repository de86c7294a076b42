import { describe, it, expect } from '@jest/globals';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8012,
      corsOrigin: '*',
      redisUrl: undefined,
      extraction: {
        apiKey: undefined,
        model: 'gpt-4',
        baseUrl: 'https://api.openai.com/v1',
        timeoutMs: 10000,
        cacheTtlSeconds: 3600
      }
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      CORS_ORIGIN: 'https://charter.example',
      REDIS_URL: 'redis://cache:6379',
      OPENAI_API_KEY: ' test-key ',
      OPENAI_MODEL: 'gpt-4o-mini',
      OPENAI_BASE_URL: 'http://llm.internal/v1/',
      EXTRACTION_TIMEOUT_MS: '2500',
      EXTRACTION_CACHE_TTL_SECONDS: '120'
    });

    expect(config.port).toBe(9000);
    expect(config.corsOrigin).toBe('https://charter.example');
    expect(config.redisUrl).toBe('redis://cache:6379');
    expect(config.extraction).toEqual({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      baseUrl: 'http://llm.internal/v1',
      timeoutMs: 2500,
      cacheTtlSeconds: 120
    });
  });

  it('should fall back on invalid numbers and blank secrets', () => {
    const config = loadConfig({ PORT: 'eighty', EXTRACTION_TIMEOUT_MS: '-5', OPENAI_API_KEY: '   ' });

    expect(config.port).toBe(8012);
    expect(config.extraction.timeoutMs).toBe(10000);
    expect(config.extraction.apiKey).toBeUndefined();
  });
});
