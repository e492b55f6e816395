/**
 * TidesyncError - Error class with structured error information
 */

import { type ErrorCategory, type ErrorCode, getErrorCategory, getErrorInfo } from './error-codes.js';

/**
 * Options for creating a TidesyncError
 */
export interface TidesyncErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Base error for every Tidesync package.
 *
 * `code` is stable and drives `category` and the default message and
 * suggestion; `context` holds whatever identifies the failing operation.
 *
 * @example
 * ```typescript
 * const result = await engine.sync();
 * if (result.uploadError?.category === 'connection') {
 *   console.warn(result.uploadError.format());
 * }
 * ```
 */
export class TidesyncError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly suggestion: string | undefined;
  readonly context: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(options: TidesyncErrorOptions) {
    const info = getErrorInfo(options.code);
    super(options.message ?? info.message, { cause: options.cause });

    this.name = 'TidesyncError';
    this.code = options.code;
    this.category = getErrorCategory(options.code);
    this.suggestion = options.suggestion ?? info.suggestion;
    this.context = options.context ?? {};
    this.cause = options.cause;
  }

  /**
   * Re-throw a foreign error under a Tidesync code, keeping it as `cause`
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): TidesyncError {
    return new TidesyncError({ code, message: error.message, context, cause: error });
  }

  static isTidesyncError(error: unknown): error is TidesyncError {
    return error instanceof TidesyncError;
  }

  /**
   * Multi-line description for log output: code and message, then context
   * and suggestion when present, then the cause chain.
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];
    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }
    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    if (this.cause) {
      const cause = TidesyncError.isTidesyncError(this.cause)
        ? `[${this.cause.code}] ${this.cause.message}`
        : `${this.cause.name}: ${this.cause.message}`;
      lines.push(`Caused by: ${cause}`);
    }
    return lines.join('\n');
  }
}

/**
 * Validation-specific error with field-level details
 */
export class ValidationError extends TidesyncError {
  /** Field-level validation errors */
  readonly errors: FieldValidationError[];

  constructor(
    errors: FieldValidationError[],
    context?: Record<string, unknown>,
    code: ErrorCode = 'TIDE_V100'
  ) {
    const message = errors.map((e) => `${e.path}: ${e.message}`).join('; ');

    super({
      code,
      message: `Validation failed: ${message}`,
      context: {
        ...context,
        fieldErrors: errors,
      },
    });

    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * Field validation error detail
 */
export interface FieldValidationError {
  /** Field path (e.g., 'payload.title' or 'records[0].version') */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Storage error
 */
export class StorageError extends TidesyncError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * Connection error
 */
export class ConnectionError extends TidesyncError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'ConnectionError';
  }
}

/**
 * A batch upload was rejected or could not reach the remote authority.
 * Every record in the batch stays pending.
 */
export class UploadError extends TidesyncError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'TIDE_C510', message, context, cause });
    this.name = 'UploadError';
  }
}

/**
 * Remote deltas could not be fetched.
 */
export class DownloadError extends TidesyncError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'TIDE_C520', message, context, cause });
    this.name = 'DownloadError';
  }
}

/**
 * Helper function to ensure errors are TidesyncErrors
 */
export function ensureTidesyncError(
  error: unknown,
  defaultCode: ErrorCode = 'TIDE_X900'
): TidesyncError {
  if (TidesyncError.isTidesyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return TidesyncError.wrap(error, defaultCode);
  }

  return new TidesyncError({
    code: defaultCode,
    message: String(error),
  });
}
