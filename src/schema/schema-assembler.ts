import { DocumentNode, Kind } from 'graphql';
import { Logger } from 'pino';
import { ConfigStore } from '../config/config.js';
import { astManipulationError, cacheNotConfiguredError } from '../errors/errors.js';
import { HookDispatcher } from '../events/dispatcher.js';
import { SingleFlight, SingleFlightState } from '../utils/single-flight.js';
import { ASTBuilder } from './ast-builder.js';
import { DocumentASTCache } from './cache/document-cache.js';
import { DocumentAST } from './document-ast.js';
import { SchemaSourceProvider } from './source/schema-source-provider.js';

export interface SchemaAssemblerOptions {
  schemaSource: SchemaSourceProvider;
  config: ConfigStore;
  dispatcher: HookDispatcher;
  logger: Logger;
  astBuilder?: ASTBuilder;
  cache?: DocumentASTCache;
}

/**
 * Owns the schema document of the engine: gathers the schema source and the fragments contributed
 * by `buildingAST` listeners, lets `manipulatingAST` listeners change the result and keeps it for
 * the lifetime of the engine, optionally in a persistent cache as well.
 */
export class SchemaAssembler {
  private readonly schemaSource: SchemaSourceProvider;
  private readonly config: ConfigStore;
  private readonly dispatcher: HookDispatcher;
  private readonly logger: Logger;
  private readonly astBuilder: ASTBuilder;
  private readonly cache?: DocumentASTCache;

  #document = new SingleFlight<DocumentNode>();

  constructor(opts: SchemaAssemblerOptions) {
    this.schemaSource = opts.schemaSource;
    this.config = opts.config;
    this.dispatcher = opts.dispatcher;
    this.logger = opts.logger.child({ component: 'schema-assembler' });
    this.astBuilder = opts.astBuilder ?? new ASTBuilder();
    this.cache = opts.cache;
  }

  get state(): SingleFlightState {
    return this.#document.state;
  }

  getDocumentAST(): Promise<DocumentNode> {
    return this.#document.get(() => this.resolveDocument());
  }

  /**
   * Drops the document held in memory. The persistent cache is left untouched.
   */
  reset(): void {
    this.#document.reset();
  }

  /**
   * Drops the document held in memory and removes it from the persistent cache.
   */
  async clearCache(): Promise<boolean> {
    this.reset();
    if (!this.cache) {
      return false;
    }
    return this.cache.forget(this.config.get('cache').key);
  }

  private async resolveDocument(): Promise<DocumentNode> {
    const { enable, key } = this.config.get('cache');
    if (!enable) {
      return this.buildAST();
    }
    if (!this.cache) {
      throw cacheNotConfiguredError();
    }
    return this.cache.rememberForever(key, () => this.buildAST());
  }

  private async buildAST(): Promise<DocumentNode> {
    const schemaString = await this.schemaSource.getSchemaString();

    // Plugins hook into the schema building through this event while users keep writing their
    // schema as usual.
    const additionalSchemas = this.dispatcher.dispatch('buildingAST', { userSchema: schemaString });

    const document = this.astBuilder.build([schemaString, ...additionalSchemas].join('\n'));

    const documentAST = DocumentAST.fromDocument(document);
    try {
      this.dispatcher.dispatch('manipulatingAST', { documentAST });
    } catch (e) {
      throw astManipulationError(e);
    }
    const result = documentAST.toDocument();

    this.logger.debug(
      {
        fragments: additionalSchemas.length,
        types: result.definitions.filter((definition) => definition.kind !== Kind.DIRECTIVE_DEFINITION).length,
      },
      'Schema document built',
    );

    return result;
  }
}
