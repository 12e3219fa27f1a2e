import { GraphQLError, GraphQLFormattedError } from 'graphql';
import { DebugFlag, DebugFlags, hasDebugFlag } from '../execution/debug.js';
import { isClientAware } from './errors.js';

export const INTERNAL_SERVER_ERROR_MESSAGE = 'Internal server error';

export const CATEGORY_GRAPHQL = 'graphql';
export const CATEGORY_INTERNAL = 'internal';

export type ErrorFormatter = (error: GraphQLError) => GraphQLFormattedError;

/**
 * Errors without an original error come from parsing or validation and are meant for the client.
 * Errors thrown by resolvers are only shown when they are GraphQL errors or decide so themselves.
 */
export function isClientSafe(error: GraphQLError): boolean {
  const original = error.originalError;
  if (!original || original instanceof GraphQLError) {
    return true;
  }
  if (isClientAware(original)) {
    return original.isClientSafe();
  }
  return false;
}

/**
 * Resolver errors that know nothing about the client, e.g. a failing database call.
 */
export function isInternalError(error: GraphQLError): boolean {
  const original = error.originalError;
  return original !== undefined && !(original instanceof GraphQLError) && !isClientAware(original);
}

export function getErrorCategory(error: GraphQLError): string {
  const original = error.originalError;
  if (original && isClientAware(original)) {
    return original.getCategory();
  }
  return isInternalError(error) ? CATEGORY_INTERNAL : CATEGORY_GRAPHQL;
}

/**
 * The baseline client facing shape of an error. Messages of errors that are not client safe are masked.
 */
export function formatError(error: GraphQLError): GraphQLFormattedError {
  const formatted = error.toJSON();
  return {
    ...formatted,
    message: isClientSafe(error) ? error.message : INTERNAL_SERVER_ERROR_MESSAGE,
    extensions: {
      ...formatted.extensions,
      category: getErrorCategory(error),
    },
  };
}

export function stackTrace(error: Error): string[] {
  return (error.stack ?? '')
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Decorates a formatter with the diagnostic fields selected by the debug flags.
 */
export function createDebugFormatter(debug: DebugFlags, formatter: ErrorFormatter = formatError): ErrorFormatter {
  if (debug === DebugFlag.None) {
    return formatter;
  }

  return (error) => {
    const formatted = formatter(error);
    const source = error.originalError ?? error;
    const extensions: Record<string, unknown> = { ...formatted.extensions };

    if (hasDebugFlag(debug, DebugFlag.IncludeDebugMessage) && !isClientSafe(error)) {
      extensions.debugMessage = source.message;
    }
    if (hasDebugFlag(debug, DebugFlag.IncludeTrace)) {
      extensions.trace = stackTrace(source);
    }

    return { ...formatted, extensions };
  };
}
