import { ExecutionResult, GraphQLError, GraphQLFormattedError } from 'graphql';
import { createDebugFormatter, ErrorFormatter, formatError, isClientSafe, isInternalError } from '../errors/formatter.js';
import { DebugFlag, DebugFlags, hasDebugFlag } from './debug.js';

export type ErrorsHandler = (errors: readonly GraphQLError[], formatter: ErrorFormatter) => GraphQLFormattedError[];

export interface ExecutionResponse {
  errors?: GraphQLFormattedError[];
  data?: Record<string, unknown> | null;
  extensions?: Record<string, unknown>;
}

const formatEachError: ErrorsHandler = (errors, formatter) => errors.map((error) => formatter(error));

/**
 * Result of one execution before it is serialized. Errors stay raw until the response is rendered;
 * the installed errors handler then runs once per debug level.
 */
export class EngineExecutionResult {
  data: Record<string, unknown> | null | undefined;
  readonly errors: GraphQLError[];
  extensions: Record<string, unknown>;

  #errorsHandler: ErrorsHandler = formatEachError;
  #errorFormatter: ErrorFormatter = formatError;
  #formattedErrors = new Map<DebugFlags, GraphQLFormattedError[]>();

  constructor(
    data?: Record<string, unknown> | null,
    errors: readonly GraphQLError[] = [],
    extensions: Record<string, unknown> = {},
  ) {
    this.data = data;
    this.errors = [...errors];
    this.extensions = { ...extensions };
  }

  static fromExecutionResult(result: ExecutionResult): EngineExecutionResult {
    return new EngineExecutionResult(result.data, result.errors, result.extensions);
  }

  static fromErrors(errors: readonly GraphQLError[]): EngineExecutionResult {
    return new EngineExecutionResult(undefined, errors);
  }

  setErrorsHandler(handler: ErrorsHandler): this {
    this.#errorsHandler = handler;
    this.#formattedErrors.clear();
    return this;
  }

  setErrorFormatter(formatter: ErrorFormatter): this {
    this.#errorFormatter = formatter;
    this.#formattedErrors.clear();
    return this;
  }

  formatErrors(debug: DebugFlags = DebugFlag.None): GraphQLFormattedError[] {
    const cached = this.#formattedErrors.get(debug);
    if (cached) {
      return cached;
    }
    const formatted = this.#errorsHandler(this.errors, createDebugFormatter(debug, this.#errorFormatter));
    this.#formattedErrors.set(debug, formatted);
    return formatted;
  }

  toResponse(debug: DebugFlags = DebugFlag.None): ExecutionResponse {
    this.rethrowErrors(debug);

    const response: ExecutionResponse = {};
    if (this.errors.length > 0) {
      response.errors = this.formatErrors(debug);
    }
    if (this.data !== undefined) {
      response.data = this.data;
    }
    if (Object.keys(this.extensions).length > 0) {
      response.extensions = this.extensions;
    }
    return response;
  }

  toJSON(): ExecutionResponse {
    return this.toResponse();
  }

  private rethrowErrors(debug: DebugFlags): void {
    if (hasDebugFlag(debug, DebugFlag.RethrowInternalExceptions)) {
      const internal = this.errors.find((error) => isInternalError(error));
      if (internal?.originalError) {
        throw internal.originalError;
      }
    }
    if (hasDebugFlag(debug, DebugFlag.RethrowUnsafeExceptions)) {
      const unsafe = this.errors.find((error) => !isClientSafe(error));
      if (unsafe) {
        throw unsafe.originalError ?? unsafe;
      }
    }
  }
}
