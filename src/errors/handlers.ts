import { GraphQLError, GraphQLErrorExtensions, GraphQLFormattedError } from 'graphql';
import { Logger } from 'pino';
import { ZodError } from 'zod';
import { PublicError, rendersErrorExtensions, unknownErrorHandlerError } from './errors.js';
import { getErrorCategory, isClientSafe } from './formatter.js';
import { ErrorHandler, ErrorHandlerNext } from './pipeline.js';

export const EXTENSIONS_ERROR_HANDLER = 'extensions';
export const REPORTING_ERROR_HANDLER = 'report';
export const VALIDATION_ERROR_HANDLER = 'validation';

export const VALIDATION_FAILED_MESSAGE = 'Validation failed.';

export interface ErrorHandlerDependencies {
  logger: Logger;
}

export type ErrorHandlerFactory = (deps: ErrorHandlerDependencies) => ErrorHandler;

/**
 * Copies an error with a different message, extensions or original error. Location and path are kept.
 */
export function rebuildError(
  error: GraphQLError,
  changes: { message?: string; extensions?: GraphQLErrorExtensions; originalError?: Error },
): GraphQLError {
  return new GraphQLError(changes.message ?? error.message, {
    nodes: error.nodes,
    source: error.source,
    positions: error.positions,
    path: error.path,
    originalError: changes.originalError ?? error.originalError,
    extensions: changes.extensions ?? error.extensions,
  });
}

export class ExtensionErrorHandler implements ErrorHandler {
  readonly name = EXTENSIONS_ERROR_HANDLER;

  handle(error: GraphQLError, next: ErrorHandlerNext): GraphQLFormattedError {
    const original = error.originalError;
    if (!rendersErrorExtensions(original)) {
      return next(error);
    }
    return next(rebuildError(error, { extensions: { ...error.extensions, ...original.extensionsContent() } }));
  }
}

/**
 * Reports errors that are not safe to show a client. Validation errors and errors meant for the
 * end user are not reported. The error continues unchanged.
 */
export class ReportingErrorHandler implements ErrorHandler {
  readonly name = REPORTING_ERROR_HANDLER;

  constructor(private readonly logger: Logger) {}

  handle(error: GraphQLError, next: ErrorHandlerNext): GraphQLFormattedError {
    if (!isClientSafe(error)) {
      this.logger.error(
        { err: error.originalError ?? error, path: error.path, category: getErrorCategory(error) },
        error.message,
      );
    }
    return next(error);
  }
}

/**
 * Turns zod validation failures thrown by resolvers into client safe errors listing the invalid fields.
 */
export class ValidationErrorHandler implements ErrorHandler {
  readonly name = VALIDATION_ERROR_HANDLER;

  handle(error: GraphQLError, next: ErrorHandlerNext): GraphQLFormattedError {
    const original = error.originalError;
    if (!(original instanceof ZodError)) {
      return next(error);
    }
    return next(
      rebuildError(error, {
        message: VALIDATION_FAILED_MESSAGE,
        originalError: new PublicError(VALIDATION_FAILED_MESSAGE, 'validation', original),
        extensions: { ...error.extensions, validation: original.flatten().fieldErrors },
      }),
    );
  }
}

/**
 * Error handler factories keyed by the names used in the `errorHandlers` configuration.
 */
export class ErrorHandlerRegistry {
  #factories = new Map<string, ErrorHandlerFactory>();

  register(name: string, factory: ErrorHandlerFactory): this {
    this.#factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.#factories.has(name);
  }

  names(): string[] {
    return [...this.#factories.keys()];
  }

  resolve(names: readonly string[], deps: ErrorHandlerDependencies): ErrorHandler[] {
    return names.map((name) => {
      const factory = this.#factories.get(name);
      if (!factory) {
        throw unknownErrorHandlerError(name, this.names());
      }
      return factory(deps);
    });
  }
}

export function createDefaultErrorHandlerRegistry(): ErrorHandlerRegistry {
  return new ErrorHandlerRegistry()
    .register(EXTENSIONS_ERROR_HANDLER, () => new ExtensionErrorHandler())
    .register(REPORTING_ERROR_HANDLER, ({ logger }) => new ReportingErrorHandler(logger))
    .register(VALIDATION_ERROR_HANDLER, () => new ValidationErrorHandler());
}
