import { ValidationRule } from 'graphql';
import { Logger } from 'pino';
import { ConfigStore, InMemoryConfigStore } from './config/config.js';
import { EngineConfigInput } from './config/config.schema.js';
import { GraphQLEngine } from './engine.js';
import { createDefaultErrorHandlerRegistry, ErrorHandlerRegistry } from './errors/handlers.js';
import { HookDispatcher } from './events/dispatcher.js';
import { DocumentASTCache } from './schema/cache/document-cache.js';
import { MemoryDocumentCache } from './schema/cache/memory-document-cache.js';
import {
  createRedisConnection,
  createRedisKeyValueStore,
  RedisDocumentCache,
} from './schema/cache/redis-document-cache.js';
import { EngineResolvers } from './schema/schema-compiler.js';
import { SchemaSourceProvider, StaticSchemaSourceProvider } from './schema/source/schema-source-provider.js';
import { createLogger } from './utils/logger.js';

export interface CreateEngineOptions<TContext> {
  /**
   * The schema as SDL or a provider of it.
   */
  schema: string | SchemaSourceProvider;
  resolvers?: EngineResolvers<TContext>;
  /**
   * A config store or the configuration to create an in-memory store from.
   */
  config?: ConfigStore | EngineConfigInput;
  logger?: Logger;
  dispatcher?: HookDispatcher;
  errorHandlers?: ErrorHandlerRegistry;
  /**
   * Overrides the document cache created from the `cache.store` configuration.
   */
  cache?: DocumentASTCache;
  validationRules?: Readonly<Record<string, ValidationRule>>;
}

function isConfigStore(config: ConfigStore | EngineConfigInput): config is ConfigStore {
  return 'get' in config && typeof config.get === 'function';
}

export function createDocumentCache(config: ConfigStore): DocumentASTCache {
  const { store, redis } = config.get('cache');
  if (store === 'redis') {
    return new RedisDocumentCache(createRedisKeyValueStore(createRedisConnection(redis), { ownsConnection: true }));
  }
  return new MemoryDocumentCache();
}

/**
 * Wires an engine with the default collaborators for everything not passed in.
 */
export function createEngine<TContext = unknown>(opts: CreateEngineOptions<TContext>): GraphQLEngine<TContext> {
  const config = opts.config && isConfigStore(opts.config) ? opts.config : new InMemoryConfigStore(opts.config);
  const cache = opts.cache ?? (config.get('cache').enable ? createDocumentCache(config) : undefined);

  return new GraphQLEngine<TContext>({
    schemaSource: typeof opts.schema === 'string' ? new StaticSchemaSourceProvider(opts.schema) : opts.schema,
    resolvers: opts.resolvers,
    config,
    logger: opts.logger ?? createLogger(),
    dispatcher: opts.dispatcher ?? new HookDispatcher(),
    errorHandlers: opts.errorHandlers ?? createDefaultErrorHandlerRegistry(),
    cache,
    validationRules: opts.validationRules,
  });
}
