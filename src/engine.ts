import {
  DocumentNode,
  execute,
  GraphQLError,
  GraphQLSchema,
  parse,
  validate,
  ValidationRule,
} from 'graphql';
import { Logger } from 'pino';
import { ConfigStore } from './config/config.js';
import { ErrorHandlerRegistry } from './errors/handlers.js';
import { ErrorPipeline } from './errors/pipeline.js';
import { HookDispatcher } from './events/dispatcher.js';
import { resolveDebugFlags } from './execution/debug.js';
import { gatherExtensions } from './execution/extensions.js';
import { GraphQLRequest, VariableMap } from './execution/request.js';
import { EngineExecutionResult, ExecutionResponse } from './execution/result.js';
import { ASTBuilder } from './schema/ast-builder.js';
import { DocumentASTCache } from './schema/cache/document-cache.js';
import { SchemaAssembler } from './schema/schema-assembler.js';
import { EngineResolvers, SchemaCompiler } from './schema/schema-compiler.js';
import { SchemaSourceProvider } from './schema/source/schema-source-provider.js';
import { buildValidationRules } from './validation/rules.js';

export interface GraphQLEngineOptions<TContext> {
  schemaSource: SchemaSourceProvider;
  config: ConfigStore;
  dispatcher: HookDispatcher;
  errorHandlers: ErrorHandlerRegistry;
  logger: Logger;
  resolvers?: EngineResolvers<TContext>;
  cache?: DocumentASTCache;
  astBuilder?: ASTBuilder;
  /**
   * Validation rules keyed by name, added to the baseline and configured rules. A rule with the name
   * of an existing rule replaces it.
   */
  validationRules?: Readonly<Record<string, ValidationRule>>;
}

/**
 * Executes GraphQL operations against the lazily assembled schema.
 */
export class GraphQLEngine<TContext = unknown> {
  readonly dispatcher: HookDispatcher;

  private readonly config: ConfigStore;
  private readonly logger: Logger;
  private readonly errorHandlers: ErrorHandlerRegistry;
  private readonly validationRules?: Readonly<Record<string, ValidationRule>>;
  private readonly assembler: SchemaAssembler;
  private readonly compiler: SchemaCompiler<TContext>;
  private readonly cache?: DocumentASTCache;

  #currentBatchIndex: number | undefined;

  constructor(opts: GraphQLEngineOptions<TContext>) {
    this.dispatcher = opts.dispatcher;
    this.config = opts.config;
    this.logger = opts.logger;
    this.errorHandlers = opts.errorHandlers;
    this.validationRules = opts.validationRules;
    this.cache = opts.cache;
    this.assembler = new SchemaAssembler({
      schemaSource: opts.schemaSource,
      config: opts.config,
      dispatcher: opts.dispatcher,
      logger: opts.logger,
      astBuilder: opts.astBuilder,
      cache: opts.cache,
    });
    this.compiler = new SchemaCompiler(this.assembler, opts.resolvers);
  }

  /**
   * Index of the request currently executed by `executeBatch`, undefined outside of a batch.
   */
  get currentBatchIndex(): number | undefined {
    return this.#currentBatchIndex;
  }

  async executeRequest(request: GraphQLRequest<TContext>): Promise<ExecutionResponse> {
    const result = await this.executeQuery(
      request.query,
      request.context,
      request.variables,
      request.rootValue,
      request.operationName,
    );
    return this.applyDebugSettings(result);
  }

  /**
   * Executes the requests one after another, in order.
   */
  async executeBatch(requests: ReadonlyArray<GraphQLRequest<TContext>>): Promise<ExecutionResponse[]> {
    const responses: ExecutionResponse[] = [];
    try {
      for (const [index, request] of requests.entries()) {
        this.#currentBatchIndex = index;
        responses.push(await this.executeRequest(request));
      }
    } finally {
      this.#currentBatchIndex = undefined;
    }
    return responses;
  }

  /**
   * Renders the result with the configured debug flags. The flags only apply while the application
   * wide debug switch is on.
   */
  applyDebugSettings(result: EngineExecutionResult): ExecutionResponse {
    return result.toResponse(resolveDebugFlags(this.config.get('appDebug'), this.config.get('debug')));
  }

  /**
   * Executes an operation and returns the result before formatting. GraphQL errors of any phase are
   * collected in the result; only schema build failures reject.
   */
  async executeQuery(
    query: string | DocumentNode,
    context: TContext,
    variables?: VariableMap | null,
    rootValue?: unknown,
    operationName?: string | null,
  ): Promise<EngineExecutionResult> {
    this.dispatcher.dispatch('startExecution', { operationName: operationName ?? undefined });

    const schema = await this.getExecutableSchema();
    const result = await this.run(schema, query, context, variables ?? undefined, rootValue, operationName ?? undefined);

    gatherExtensions(this.dispatcher, result, this.logger, operationName ?? undefined);

    // Do report: errors that are not client safe, schema definition errors.
    // Do not report: validation errors and errors that are meant for the end user.
    result.setErrorsHandler((errors, formatter) => {
      const handlers = this.errorHandlers.resolve(this.config.get('errorHandlers'), { logger: this.logger });
      return new ErrorPipeline(handlers).process(errors, formatter);
    });

    return result;
  }

  getExecutableSchema(): Promise<GraphQLSchema> {
    return this.compiler.getExecutableSchema();
  }

  getDocumentAST(): Promise<DocumentNode> {
    return this.assembler.getDocumentAST();
  }

  /**
   * Forgets the document and schema held in memory. The next execution builds them again.
   */
  reset(): void {
    this.compiler.reset();
    this.assembler.reset();
  }

  /**
   * Resets the engine and removes the schema document from the persistent cache.
   */
  async clearCache(): Promise<boolean> {
    this.compiler.reset();
    return this.assembler.clearCache();
  }

  /**
   * Closes the connections held by the document cache.
   */
  async close(): Promise<void> {
    await this.cache?.close?.();
  }

  private async run(
    schema: GraphQLSchema,
    query: string | DocumentNode,
    context: TContext,
    variables: VariableMap | undefined,
    rootValue: unknown,
    operationName: string | undefined,
  ): Promise<EngineExecutionResult> {
    let document: DocumentNode;
    if (typeof query === 'string') {
      try {
        document = parse(query);
      } catch (e) {
        if (e instanceof GraphQLError) {
          return EngineExecutionResult.fromErrors([e]);
        }
        throw e;
      }
    } else {
      document = query;
    }

    const rules = buildValidationRules(this.config.get('security'), {
      variables,
      customRules: this.validationRules,
    });
    const validationErrors = validate(schema, document, rules);
    if (validationErrors.length > 0) {
      return EngineExecutionResult.fromErrors(validationErrors);
    }

    const result = await execute({
      schema,
      document,
      rootValue,
      contextValue: context,
      variableValues: variables,
      operationName,
    });
    return EngineExecutionResult.fromExecutionResult(result);
  }
}
