import { GraphQLError, GraphQLFormattedError } from 'graphql';
import { ErrorFormatterError, ErrorHandlerError } from './errors.js';
import { ErrorFormatter } from './formatter.js';

export type ErrorHandlerNext = (error: GraphQLError) => GraphQLFormattedError;

/**
 * One stage of the error pipeline. A handler passes the error on by calling `next`, either unchanged
 * or as a new error. It may also return a formatted error itself, which skips the remaining stages.
 */
export interface ErrorHandler {
  readonly name: string;
  handle(error: GraphQLError, next: ErrorHandlerNext): GraphQLFormattedError;
}

/**
 * Sends every error separately through the ordered handlers and finally through the formatter.
 * The output has one formatted error per input error, in the same order.
 */
export class ErrorPipeline {
  constructor(private readonly handlers: readonly ErrorHandler[]) {}

  process(errors: readonly GraphQLError[], formatter: ErrorFormatter): GraphQLFormattedError[] {
    const chain = this.handlers.reduceRight<ErrorHandlerNext>(
      (next, handler) => (error) => runHandler(handler, error, next),
      (error) => runFormatter(formatter, error),
    );
    return errors.map((error) => chain(error));
  }
}

function runHandler(handler: ErrorHandler, error: GraphQLError, next: ErrorHandlerNext): GraphQLFormattedError {
  try {
    return handler.handle(error, next);
  } catch (e) {
    // Failures of later stages are already wrapped.
    if (e instanceof ErrorHandlerError || e instanceof ErrorFormatterError) {
      throw e;
    }
    throw new ErrorHandlerError(handler.name, e);
  }
}

function runFormatter(formatter: ErrorFormatter, error: GraphQLError): GraphQLFormattedError {
  try {
    return formatter(error);
  } catch (e) {
    throw new ErrorFormatterError(e);
  }
}
