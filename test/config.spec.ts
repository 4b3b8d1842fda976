import { describe, it, expect } from 'vitest';
import { loadConfig, loadDatabaseConfig, loadLoggingConfig } from '../src/config/index.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults around the credential', () => {
    const config = loadConfig({ GEMINI_API_KEY: 'test-secret' });

    expect(config).toEqual({
      llm: { provider: 'gemini', apiKey: 'test-secret', model: 'gemini-2.5-flash' },
      database: { path: 'health_insurance.db', seedSize: 50 },
      server: { port: 3000, rateLimitWindowMs: 900_000, rateLimitRequests: 100 },
      logging: { level: 'info', dir: undefined },
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ GEMINI_API_KEY: 'test-secret', SEED_SIZE: '', PORT: '  ' });

    expect(config.database.seedSize).toBe(50);
    expect(config.server.port).toBe(3000);
  });

  it('requires the key of the selected provider', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);

    try {
      loadConfig({ LLM_PROVIDER: 'openai', GEMINI_API_KEY: 'test-secret' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues).toEqual(['OPENAI_API_KEY: OPENAI_API_KEY is required when LLM_PROVIDER is openai']);
    }
  });

  it('normalises the OpenAI base URL', () => {
    const config = loadConfig({
      LLM_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://localhost:8080/v1/',
    });

    expect(config.llm).toEqual({
      provider: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      baseUrl: 'http://localhost:8080/v1',
    });
  });

  it('rejects a seed size below five', () => {
    expect(() => loadConfig({ GEMINI_API_KEY: 'test-secret', SEED_SIZE: '3' })).toThrow(/SEED_SIZE/);
  });
});

describe('partial loaders', () => {
  it('reads store settings without a credential', () => {
    expect(loadDatabaseConfig({ DATABASE_PATH: 'data/test.db', SEED_SIZE: '20' })).toEqual({
      path: 'data/test.db',
      seedSize: 20,
    });
  });

  it('reads logging settings', () => {
    expect(loadLoggingConfig({ LOG_LEVEL: 'debug', LOG_DIR: 'logs' })).toEqual({ level: 'debug', dir: 'logs' });
    expect(() => loadLoggingConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });
});
