// Engine
export { GraphQLEngine } from './engine.js';
export type { GraphQLEngineOptions } from './engine.js';
export { createEngine, createDocumentCache } from './create-engine.js';
export type { CreateEngineOptions } from './create-engine.js';

// Configuration
export { InMemoryConfigStore, loadConfigFromEnv, parseEngineConfig } from './config/config.js';
export type { ConfigStore, EnvConfig } from './config/config.js';
export { engineConfigSchema, envVariables } from './config/config.schema.js';
export type {
  CacheConfig,
  EngineConfig,
  EngineConfigInput,
  RedisConfig,
  SecurityConfig,
} from './config/config.schema.js';

// Hooks
export { HookDispatcher } from './events/dispatcher.js';
export type {
  BuildingASTEvent,
  EngineEventName,
  EngineEvents,
  EventListener,
  ExtensionEntry,
  GatheringExtensionsEvent,
  ManipulatingASTEvent,
  StartExecutionEvent,
} from './events/types.js';

// Schema
export { ASTBuilder } from './schema/ast-builder.js';
export { DocumentAST } from './schema/document-ast.js';
export { SchemaAssembler } from './schema/schema-assembler.js';
export type { SchemaAssemblerOptions } from './schema/schema-assembler.js';
export { SchemaCompiler, compileSchema } from './schema/schema-compiler.js';
export type { EngineResolvers } from './schema/schema-compiler.js';
export { StaticSchemaSourceProvider } from './schema/source/schema-source-provider.js';
export type { SchemaSourceProvider } from './schema/source/schema-source-provider.js';
export { SchemaStitcher } from './schema/source/schema-stitcher.js';
export type { DocumentASTCache, DocumentBuilder } from './schema/cache/document-cache.js';
export { MemoryDocumentCache } from './schema/cache/memory-document-cache.js';
export {
  RedisDocumentCache,
  createRedisConnection,
  createRedisKeyValueStore,
} from './schema/cache/redis-document-cache.js';
export type { KeyValueStore } from './schema/cache/redis-document-cache.js';

// Validation
export {
  buildValidationRules,
  buildValidationRuleMap,
  defaultValidationRules,
  createDisableIntrospectionRule,
  QUERY_COMPLEXITY_RULE,
  QUERY_DEPTH_RULE,
  DISABLE_INTROSPECTION_RULE,
} from './validation/rules.js';
export type { BuildValidationRulesOptions, ValidationRuleMap } from './validation/rules.js';
export { createQueryDepthRule, maxQueryDepthErrorMessage } from './validation/query-depth.js';
export { createQueryComplexityRule, maxQueryComplexityErrorMessage } from './validation/query-complexity.js';

// Execution
export { EngineExecutionResult } from './execution/result.js';
export type { ErrorsHandler, ExecutionResponse } from './execution/result.js';
export { parseGraphQLRequest } from './execution/request.js';
export type { GraphQLRequest, VariableMap } from './execution/request.js';
export { DebugFlag, ALL_DEBUG_FLAGS, hasDebugFlag, resolveDebugFlags } from './execution/debug.js';
export type { DebugFlags } from './execution/debug.js';
export { gatherExtensions } from './execution/extensions.js';

// Errors
export {
  EngineError,
  SchemaBuildError,
  SchemaSourceError,
  DocumentCacheError,
  ConfigurationError,
  ErrorHandlerConfigurationError,
  ErrorHandlerError,
  ErrorFormatterError,
  PublicError,
  InvalidRequestError,
  isClientAware,
} from './errors/errors.js';
export type { ClientAware, RendersErrorExtensions } from './errors/errors.js';
export {
  formatError,
  createDebugFormatter,
  isClientSafe,
  isInternalError,
  getErrorCategory,
  INTERNAL_SERVER_ERROR_MESSAGE,
} from './errors/formatter.js';
export type { ErrorFormatter } from './errors/formatter.js';
export { ErrorPipeline } from './errors/pipeline.js';
export type { ErrorHandler, ErrorHandlerNext } from './errors/pipeline.js';
export {
  ErrorHandlerRegistry,
  ExtensionErrorHandler,
  ReportingErrorHandler,
  ValidationErrorHandler,
  createDefaultErrorHandlerRegistry,
  rebuildError,
  EXTENSIONS_ERROR_HANDLER,
  REPORTING_ERROR_HANDLER,
  VALIDATION_ERROR_HANDLER,
} from './errors/handlers.js';
export type { ErrorHandlerDependencies, ErrorHandlerFactory } from './errors/handlers.js';

// Logging
export { createLogger } from './utils/logger.js';
export type { Logger, LoggerConfig } from './utils/logger.js';
