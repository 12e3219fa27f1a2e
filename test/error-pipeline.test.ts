import { describe, expect, test, vi } from 'vitest';
import { GraphQLError, GraphQLFormattedError } from 'graphql';
import { z } from 'zod';
import {
  ErrorFormatterError,
  ErrorHandlerConfigurationError,
  ErrorHandlerError,
  PublicError,
} from '../src/errors/errors.js';
import { formatError } from '../src/errors/formatter.js';
import {
  createDefaultErrorHandlerRegistry,
  ErrorHandlerRegistry,
  ExtensionErrorHandler,
  rebuildError,
  ReportingErrorHandler,
  ValidationErrorHandler,
} from '../src/errors/handlers.js';
import { ErrorHandler, ErrorHandlerNext, ErrorPipeline } from '../src/errors/pipeline.js';
import { createTestLogger } from './utils.js';

function recordingHandler(name: string, calls: string[]): ErrorHandler {
  return {
    name,
    handle(error, next) {
      calls.push(name);
      return next(error);
    },
  };
}

class RateLimitError extends PublicError {
  constructor(private readonly retryAfter: number) {
    super('Too many requests.', 'rate-limit');
  }

  extensionsContent(): Record<string, unknown> {
    return { retryAfter: this.retryAfter };
  }
}

describe('ErrorPipeline', () => {
  test('that an empty pipeline only applies the formatter', () => {
    const errors = [new GraphQLError('First'), new GraphQLError('Second')];

    const formatted = new ErrorPipeline([]).process(errors, formatError);

    expect(formatted).toEqual([
      { message: 'First', extensions: { category: 'graphql' } },
      { message: 'Second', extensions: { category: 'graphql' } },
    ]);
  });

  test('that every error passes the handlers in order before the formatter', () => {
    const calls: string[] = [];
    const formatter = vi.fn((error: GraphQLError): GraphQLFormattedError => {
      calls.push(`format ${error.message}`);
      return { message: error.message };
    });
    const pipeline = new ErrorPipeline([recordingHandler('a', calls), recordingHandler('b', calls)]);

    const formatted = pipeline.process([new GraphQLError('one'), new GraphQLError('two')], formatter);

    expect(formatted).toEqual([{ message: 'one' }, { message: 'two' }]);
    expect(calls).toEqual(['a', 'b', 'format one', 'a', 'b', 'format two']);
  });

  test('that a handler can replace the error passed on', () => {
    const renaming: ErrorHandler = {
      name: 'rename',
      handle: (error, next) => next(rebuildError(error, { message: `${error.message}!` })),
    };

    const formatted = new ErrorPipeline([renaming]).process([new GraphQLError('Boom')], formatError);

    expect(formatted).toEqual([{ message: 'Boom!', extensions: { category: 'graphql' } }]);
  });

  test('that a handler returning without calling next skips the remaining stages', () => {
    const calls: string[] = [];
    const shortCircuit: ErrorHandler = {
      name: 'short-circuit',
      handle: () => ({ message: 'Handled early' }),
    };
    const formatter = vi.fn(formatError);

    const formatted = new ErrorPipeline([shortCircuit, recordingHandler('later', calls)]).process(
      [new GraphQLError('Boom')],
      formatter,
    );

    expect(formatted).toEqual([{ message: 'Handled early' }]);
    expect(calls).toEqual([]);
    expect(formatter).not.toHaveBeenCalled();
  });

  test('that a failing handler is reported with its name', () => {
    const cause = new Error('handler bug');
    const failing: ErrorHandler = {
      name: 'failing',
      handle: () => {
        throw cause;
      },
    };
    const pipeline = new ErrorPipeline([recordingHandler('first', []), failing]);

    let thrown: unknown;
    try {
      pipeline.process([new GraphQLError('Boom')], formatError);
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(ErrorHandlerError);
    if (thrown instanceof ErrorHandlerError) {
      expect(thrown.message).toBe('The error handler "failing" failed while handling an error.');
      expect(thrown.handlerName).toBe('failing');
      expect(thrown.cause).toBe(cause);
    }
  });

  test('that a failing formatter is not blamed on the last handler', () => {
    const cause = new Error('formatter bug');
    const pipeline = new ErrorPipeline([recordingHandler('last', [])]);

    let thrown: unknown;
    try {
      pipeline.process([new GraphQLError('Boom')], () => {
        throw cause;
      });
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(ErrorFormatterError);
    if (thrown instanceof ErrorFormatterError) {
      expect(thrown.message).toBe('The error formatter failed while formatting an error.');
      expect(thrown.cause).toBe(cause);
    }
  });
});

describe('ExtensionErrorHandler', () => {
  test('that extension content of the original error is added to the extensions', () => {
    const error = new GraphQLError('Too many requests.', {
      path: ['search'],
      originalError: new RateLimitError(30),
      extensions: { code: 'RATE_LIMITED' },
    });

    const [formatted] = new ErrorPipeline([new ExtensionErrorHandler()]).process([error], formatError);

    expect(formatted).toEqual({
      message: 'Too many requests.',
      path: ['search'],
      extensions: { code: 'RATE_LIMITED', retryAfter: 30, category: 'rate-limit' },
    });
  });

  test('that errors without extension content pass unchanged', () => {
    const error = new GraphQLError('Boom');
    const next: ErrorHandlerNext = vi.fn(formatError);

    new ExtensionErrorHandler().handle(error, next);

    expect(next).toHaveBeenCalledWith(error);
  });
});

describe('ReportingErrorHandler', () => {
  test('that errors which are not client safe are logged', () => {
    const logger = createTestLogger();
    const errorLog = vi.spyOn(logger, 'error');
    const original = new Error('connection refused');
    const error = new GraphQLError(original.message, { path: ['users'], originalError: original });

    const [formatted] = new ErrorPipeline([new ReportingErrorHandler(logger)]).process([error], formatError);

    expect(formatted.message).toBe('Internal server error');
    expect(errorLog).toHaveBeenCalledWith(
      { err: original, path: ['users'], category: 'internal' },
      'connection refused',
    );
  });

  test('that client safe errors are not logged', () => {
    const logger = createTestLogger();
    const errorLog = vi.spyOn(logger, 'error');

    new ErrorPipeline([new ReportingErrorHandler(logger)]).process(
      [
        new GraphQLError('Syntax Error: Unexpected <EOF>.'),
        new GraphQLError('Not allowed.', { originalError: new PublicError('Not allowed.') }),
      ],
      formatError,
    );

    expect(errorLog).not.toHaveBeenCalled();
  });
});

describe('ValidationErrorHandler', () => {
  test('that zod errors become client safe validation errors', () => {
    const input = z.object({ email: z.string().email('Invalid email') });
    const parsed = input.safeParse({ email: 'not-an-email' });
    expect(parsed.success).toBe(false);
    if (parsed.success) {
      return;
    }
    const error = new GraphQLError(parsed.error.message, { path: ['register'], originalError: parsed.error });

    const [formatted] = new ErrorPipeline([new ValidationErrorHandler()]).process([error], formatError);

    expect(formatted).toEqual({
      message: 'Validation failed.',
      path: ['register'],
      extensions: { validation: { email: ['Invalid email'] }, category: 'validation' },
    });
  });

  test('that other errors pass unchanged', () => {
    const error = new GraphQLError('Boom', { originalError: new Error('Boom') });
    const next: ErrorHandlerNext = vi.fn(formatError);

    new ValidationErrorHandler().handle(error, next);

    expect(next).toHaveBeenCalledWith(error);
  });
});

describe('ErrorHandlerRegistry', () => {
  test('that the default registry knows the built-in handlers', () => {
    const registry = createDefaultErrorHandlerRegistry();

    expect(registry.names()).toEqual(['extensions', 'report', 'validation']);
  });

  test('that handlers are resolved in the configured order', () => {
    const registry = createDefaultErrorHandlerRegistry();

    const handlers = registry.resolve(['validation', 'extensions'], { logger: createTestLogger() });

    expect(handlers.map((handler) => handler.name)).toEqual(['validation', 'extensions']);
  });

  test('that registering an existing name replaces the factory', () => {
    const replacement: ErrorHandler = { name: 'report', handle: (error, next) => next(error) };
    const registry = createDefaultErrorHandlerRegistry().register('report', () => replacement);

    const [handler] = registry.resolve(['report'], { logger: createTestLogger() });

    expect(handler).toBe(replacement);
  });

  test('that an unknown handler name is a configuration error', () => {
    const registry = new ErrorHandlerRegistry().register('report', ({ logger }) => new ReportingErrorHandler(logger));

    expect(() => registry.resolve(['report', 'sentry'], { logger: createTestLogger() })).toThrow(
      new ErrorHandlerConfigurationError(
        'The error handler "sentry" is not registered. Registered error handlers: "report".',
      ),
    );
  });

  test('that an empty registry lists no handlers in the error', () => {
    expect(() => new ErrorHandlerRegistry().resolve(['report'], { logger: createTestLogger() })).toThrow(
      'The error handler "report" is not registered. Registered error handlers: none.',
    );
  });
});
