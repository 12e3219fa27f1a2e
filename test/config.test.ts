import { describe, expect, test } from 'vitest';
import { InMemoryConfigStore, loadConfigFromEnv, parseEngineConfig } from '../src/config/config.js';
import { ConfigurationError } from '../src/errors/errors.js';

describe('Engine configuration', () => {
  test('that missing settings fall back to their defaults', () => {
    expect(parseEngineConfig({})).toEqual({
      appDebug: false,
      debug: 3,
      errorHandlers: ['extensions', 'report'],
      cache: {
        enable: false,
        key: 'strata-schema',
        store: 'memory',
        redis: { host: 'localhost', port: 6379 },
      },
      security: { maxQueryDepth: 0, maxQueryComplexity: 0, disableIntrospection: false },
    });
  });

  test('that partial nested settings are completed', () => {
    const config = parseEngineConfig({ cache: { enable: true }, security: { maxQueryDepth: 5 } });

    expect(config.cache).toEqual({
      enable: true,
      key: 'strata-schema',
      store: 'memory',
      redis: { host: 'localhost', port: 6379 },
    });
    expect(config.security).toEqual({ maxQueryDepth: 5, maxQueryComplexity: 0, disableIntrospection: false });
  });

  test('that invalid settings are configuration errors', () => {
    expect(() => parseEngineConfig({ debug: 16 })).toThrow(
      new ConfigurationError('The engine configuration is invalid: debug: Number must be less than or equal to 15'),
    );
    expect(() => parseEngineConfig({ security: { maxQueryDepth: -1 } })).toThrow(
      'The engine configuration is invalid: security.maxQueryDepth: Number must be greater than or equal to 0',
    );
  });
});

describe('InMemoryConfigStore', () => {
  test('that values are read by key', () => {
    const store = new InMemoryConfigStore({ appDebug: true });

    expect(store.get('appDebug')).toBe(true);
    expect(store.get('errorHandlers')).toEqual(['extensions', 'report']);
  });

  test('that changed values are visible on the next read', () => {
    const store = new InMemoryConfigStore();

    store.set('security', { maxQueryComplexity: 100 });
    store.set('debug', 1);

    expect(store.get('security')).toEqual({ maxQueryDepth: 0, maxQueryComplexity: 100, disableIntrospection: false });
    expect(store.get('debug')).toBe(1);
    expect(store.all().debug).toBe(1);
  });

  test('that an invalid change is rejected and the previous value is kept', () => {
    const store = new InMemoryConfigStore({ debug: 2 });

    expect(() => store.set('debug', 99)).toThrow(ConfigurationError);
    expect(store.get('debug')).toBe(2);
  });
});

describe('loadConfigFromEnv', () => {
  test('that an empty environment yields the defaults', () => {
    const { logLevel, engine } = loadConfigFromEnv({});

    expect(logLevel).toBe('info');
    expect(engine).toEqual(parseEngineConfig({}));
  });

  test('that environment variables are mapped to the engine configuration', () => {
    const { logLevel, engine } = loadConfigFromEnv({
      LOG_LEVEL: 'debug',
      APP_DEBUG: 'true',
      GRAPHQL_DEBUG: '7',
      GRAPHQL_ERROR_HANDLERS: 'report, validation,',
      GRAPHQL_CACHE_ENABLE: 'true',
      GRAPHQL_CACHE_KEY: 'schema-v2',
      GRAPHQL_CACHE_STORE: 'redis',
      REDIS_HOST: 'cache.internal',
      REDIS_PORT: '6380',
      REDIS_PASSWORD: 'test-secret',
      GRAPHQL_MAX_QUERY_DEPTH: '10',
      GRAPHQL_MAX_QUERY_COMPLEXITY: '250',
      GRAPHQL_DISABLE_INTROSPECTION: 'true',
    });

    expect(logLevel).toBe('debug');
    expect(engine).toEqual({
      appDebug: true,
      debug: 7,
      errorHandlers: ['report', 'validation'],
      cache: {
        enable: true,
        key: 'schema-v2',
        store: 'redis',
        redis: { host: 'cache.internal', port: 6380, password: 'test-secret' },
      },
      security: { maxQueryDepth: 10, maxQueryComplexity: 250, disableIntrospection: true },
    });
  });

  test('that boolean variables are only enabled by "true"', () => {
    expect(loadConfigFromEnv({ APP_DEBUG: '1' }).engine.appDebug).toBe(false);
  });

  test('that malformed variables are configuration errors', () => {
    expect(() => loadConfigFromEnv({ GRAPHQL_MAX_QUERY_DEPTH: 'ten' })).toThrow(
      new ConfigurationError('The engine configuration is invalid: GRAPHQL_MAX_QUERY_DEPTH: Expected a non-negative integer'),
    );
    expect(() => loadConfigFromEnv({ GRAPHQL_DEBUG: '32' })).toThrow(
      'The engine configuration is invalid: debug: Number must be less than or equal to 15',
    );
  });
});
