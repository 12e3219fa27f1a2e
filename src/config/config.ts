import {
  EngineConfig,
  EngineConfigInput,
  engineConfigSchema,
  envVariables,
} from './config.schema.js';
import { invalidConfigurationError } from '../errors/errors.js';

/**
 * Read-only view on the live engine configuration. Values are looked up on every access,
 * so callers observe configuration changes without restarting the engine.
 */
export interface ConfigStore {
  get<K extends keyof EngineConfig>(key: K): EngineConfig[K];
}

export function parseEngineConfig(input: EngineConfigInput): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    throw invalidConfigurationError(result.error);
  }
  return result.data;
}

export class InMemoryConfigStore implements ConfigStore {
  #config: EngineConfig;

  constructor(input: EngineConfigInput = {}) {
    this.#config = parseEngineConfig(input);
  }

  get<K extends keyof EngineConfig>(key: K): EngineConfig[K] {
    return this.#config[key];
  }

  set<K extends keyof EngineConfig>(key: K, value: EngineConfigInput[K]): void {
    const next: EngineConfigInput = { ...this.#config };
    next[key] = value;
    this.#config = parseEngineConfig(next);
  }

  all(): EngineConfig {
    return this.#config;
  }
}

export interface EnvConfig {
  logLevel: string;
  engine: EngineConfig;
}

/**
 * Builds the engine configuration from environment variables. Variables that are not set
 * fall back to the defaults of the engine configuration schema.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envVariables.safeParse(env);
  if (!result.success) {
    throw invalidConfigurationError(result.error);
  }
  const {
    LOG_LEVEL,
    APP_DEBUG,
    GRAPHQL_DEBUG,
    GRAPHQL_ERROR_HANDLERS,
    GRAPHQL_CACHE_ENABLE,
    GRAPHQL_CACHE_KEY,
    GRAPHQL_CACHE_STORE,
    REDIS_HOST,
    REDIS_PORT,
    REDIS_PASSWORD,
    GRAPHQL_MAX_QUERY_DEPTH,
    GRAPHQL_MAX_QUERY_COMPLEXITY,
    GRAPHQL_DISABLE_INTROSPECTION,
  } = result.data;

  const engine = parseEngineConfig({
    appDebug: APP_DEBUG,
    debug: GRAPHQL_DEBUG,
    errorHandlers: GRAPHQL_ERROR_HANDLERS,
    cache: {
      enable: GRAPHQL_CACHE_ENABLE,
      key: GRAPHQL_CACHE_KEY,
      store: GRAPHQL_CACHE_STORE,
      redis: {
        host: REDIS_HOST,
        port: REDIS_PORT,
        password: REDIS_PASSWORD,
      },
    },
    security: {
      maxQueryDepth: GRAPHQL_MAX_QUERY_DEPTH,
      maxQueryComplexity: GRAPHQL_MAX_QUERY_COMPLEXITY,
      disableIntrospection: GRAPHQL_DISABLE_INTROSPECTION,
    },
  });

  return { logLevel: LOG_LEVEL, engine };
}
