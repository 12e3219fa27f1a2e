import { vi } from 'vitest';
import { IResolvers } from '@graphql-tools/utils';
import { GraphQLEngine } from '../src/engine.js';
import { InMemoryConfigStore } from '../src/config/config.js';
import { EngineConfigInput } from '../src/config/config.schema.js';
import { createDefaultErrorHandlerRegistry, ErrorHandlerRegistry } from '../src/errors/handlers.js';
import { PublicError } from '../src/errors/errors.js';
import { HookDispatcher } from '../src/events/dispatcher.js';
import { DocumentASTCache } from '../src/schema/cache/document-cache.js';
import { StaticSchemaSourceProvider } from '../src/schema/source/schema-source-provider.js';
import { createLogger } from '../src/utils/logger.js';

export interface TestContext {
  userName: string;
}

export const testContext: TestContext = { userName: 'ada' };

export const userSchema = /* GraphQL */ `
  type Query {
    hello(name: String): String!
    me: User!
    viewer: String
    version: String
    failing: String
    forbidden: String
  }

  type User {
    id: ID!
    name: String!
    friends: [User!]!
  }
`;

export const alice = { id: '1', name: 'Alice' };
export const bob = { id: '2', name: 'Bob' };

export function createResolvers() {
  const me = vi.fn(() => alice);
  const resolvers: IResolvers<unknown, TestContext> = {
    Query: {
      hello: (_source: unknown, args: { name?: string | null }) => `Hello ${args.name ?? 'world'}!`,
      me,
      viewer: (_source: unknown, _args: unknown, context: TestContext) => context.userName,
      failing: () => {
        throw new Error('field failing failed');
      },
      forbidden: () => {
        throw new PublicError('You are not allowed to see this.', 'authorization');
      },
    },
    User: {
      friends: () => [bob],
    },
  };
  return { resolvers, me };
}

export function createTestLogger() {
  return createLogger({ level: 'silent' });
}

export interface TestEngineOptions {
  schema?: string;
  config?: EngineConfigInput;
  cache?: DocumentASTCache;
  errorHandlers?: ErrorHandlerRegistry;
}

export function createTestEngine(opts: TestEngineOptions = {}) {
  const source = new StaticSchemaSourceProvider(opts.schema ?? userSchema);
  const getSchemaString = vi.spyOn(source, 'getSchemaString');
  const config = new InMemoryConfigStore(opts.config);
  const dispatcher = new HookDispatcher();
  const logger = createTestLogger();
  const { resolvers, me } = createResolvers();

  const engine = new GraphQLEngine<TestContext>({
    schemaSource: source,
    config,
    dispatcher,
    logger,
    resolvers,
    cache: opts.cache,
    errorHandlers: opts.errorHandlers ?? createDefaultErrorHandlerRegistry(),
  });

  return { engine, config, dispatcher, logger, getSchemaString, me };
}
