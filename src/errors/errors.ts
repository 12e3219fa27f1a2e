import { ZodError } from 'zod';

export class EngineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

/**
 * The schema could not be parsed, manipulated or compiled. Raised before a schema exists,
 * so it never passes through the error pipeline and aborts the request.
 */
export class SchemaBuildError extends EngineError {}

export class SchemaSourceError extends EngineError {}

export class DocumentCacheError extends EngineError {}

export class ConfigurationError extends EngineError {}

export class ErrorHandlerConfigurationError extends ConfigurationError {}

export class ErrorHandlerError extends EngineError {
  constructor(
    public handlerName: string,
    cause: unknown,
  ) {
    super(`The error handler "${handlerName}" failed while handling an error.`, cause);
  }
}

export class ErrorFormatterError extends EngineError {
  constructor(cause: unknown) {
    super('The error formatter failed while formatting an error.', cause);
  }
}

/**
 * Errors implementing this interface decide themselves whether their message may reach the client.
 */
export interface ClientAware {
  isClientSafe(): boolean;
  getCategory(): string;
}

/**
 * Errors implementing this interface contribute extra entries to the `extensions` of the formatted error
 * when the `extensions` error handler is configured.
 */
export interface RendersErrorExtensions {
  extensionsContent(): Record<string, unknown>;
}

export class PublicError extends Error implements ClientAware {
  constructor(
    message: string,
    public category = 'user',
    cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }

  isClientSafe(): boolean {
    return true;
  }

  getCategory(): string {
    return this.category;
  }
}

export class InvalidRequestError extends PublicError {
  constructor(message: string, cause?: unknown) {
    super(message, 'request', cause);
  }
}

export function isClientAware(e: unknown): e is ClientAware {
  return (
    typeof e === 'object' &&
    e !== null &&
    'isClientSafe' in e &&
    typeof e.isClientSafe === 'function' &&
    'getCategory' in e &&
    typeof e.getCategory === 'function'
  );
}

export function rendersErrorExtensions(e: unknown): e is RendersErrorExtensions {
  return typeof e === 'object' && e !== null && 'extensionsContent' in e && typeof e.extensionsContent === 'function';
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function invalidConfigurationError(error: ZodError): ConfigurationError {
  return new ConfigurationError(`The engine configuration is invalid: ${formatZodIssues(error)}`, error);
}

export function unknownErrorHandlerError(name: string, registered: string[]): ErrorHandlerConfigurationError {
  return new ErrorHandlerConfigurationError(
    `The error handler "${name}" is not registered.` +
      ` Registered error handlers: ${registered.length > 0 ? registered.map((n) => `"${n}"`).join(', ') : 'none'}.`,
  );
}

export function schemaSyntaxError(cause: unknown): SchemaBuildError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new SchemaBuildError(
    `The schema has syntax errors and could not be parsed.\n The reason provided was: ${reason}`,
    cause,
  );
}

export function schemaMergeError(cause: unknown): SchemaBuildError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new SchemaBuildError(`The type extensions of the schema could not be merged: ${reason}`, cause);
}

export function astManipulationError(cause: unknown): SchemaBuildError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new SchemaBuildError(`A listener failed while manipulating the schema document: ${reason}`, cause);
}

export function schemaCompilationError(cause: unknown): SchemaBuildError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new SchemaBuildError(`The schema document could not be compiled into an executable schema: ${reason}`, cause);
}

export function cacheNotConfiguredError(): ConfigurationError {
  return new ConfigurationError('The schema cache is enabled but no document cache was provided to the engine.');
}
