import { assertValidSchema, DocumentNode, GraphQLSchema } from 'graphql';
import { makeExecutableSchema } from '@graphql-tools/schema';
import { IResolvers } from '@graphql-tools/utils';
import { schemaCompilationError } from '../errors/errors.js';
import { SingleFlight, SingleFlightState } from '../utils/single-flight.js';
import { SchemaAssembler } from './schema-assembler.js';

export type EngineResolvers<TContext = unknown> = IResolvers<unknown, TContext> | Array<IResolvers<unknown, TContext>>;

export function compileSchema<TContext>(document: DocumentNode, resolvers?: EngineResolvers<TContext>): GraphQLSchema {
  try {
    const schema = makeExecutableSchema<TContext>({
      typeDefs: document,
      resolvers,
    });
    assertValidSchema(schema);
    return schema;
  } catch (e) {
    throw schemaCompilationError(e);
  }
}

/**
 * Compiles the document of the assembler into an executable schema once. The schema is kept until
 * the compiler is reset, even if the cached document is invalidated in the meantime.
 */
export class SchemaCompiler<TContext = unknown> {
  #schema = new SingleFlight<GraphQLSchema>();

  constructor(
    private readonly assembler: SchemaAssembler,
    private readonly resolvers?: EngineResolvers<TContext>,
  ) {}

  get state(): SingleFlightState {
    return this.#schema.state;
  }

  getExecutableSchema(): Promise<GraphQLSchema> {
    return this.#schema.get(async () => compileSchema(await this.assembler.getDocumentAST(), this.resolvers));
  }

  reset(): void {
    this.#schema.reset();
  }
}
