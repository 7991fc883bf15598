/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error classes for the driftguard reconciler.
 * Provides a hierarchical error structure with proper serialization
 * and error cause chaining.
 */

import { ErrorCode, HttpErrorCodes, getHttpStatusForCode, isRetryableError } from './codes.js';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Application the error is attached to */
  application?: string;
  /** Resource identity key the error is attached to */
  resource?: string;
  /** Operation being performed */
  operation?: string;
}

/**
 * Serialized error format for API responses and sync results
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  statusCode: number;
  timestamp: string;
  retryable: boolean;
  application?: string;
  resource?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all application errors.
 * Provides consistent error handling, serialization, and cause chaining.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** HTTP status code */
  public readonly statusCode: number;
  /** Timestamp when the error occurred */
  public readonly timestamp: Date;
  /** Error context with additional information */
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors are expected (unreachable source, rejected apply);
   * non-operational errors are bugs.
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isOperational = true
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = getHttpStatusForCode(code);
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  /**
   * Whether the operation that raised this error may be retried
   */
  get retryable(): boolean {
    return isRetryableError(this.code);
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      retryable: this.retryable,
      application: this.context.application,
      resource: this.context.resource,
      details: this.context.details,
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Get the root cause of the error chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this];
    let current: Error = this;
    while (current.cause instanceof Error) {
      chain.push(current.cause);
      current = current.cause;
    }
    return chain;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a BaseError
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Check if an error is operational (expected error)
 */
export function isOperationalError(error: unknown): boolean {
  return isBaseError(error) && error.isOperational;
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBaseError(error) && error.code === code;
}

// ============================================================================
// Error Factory Utilities
// ============================================================================

/**
 * Internal error for wrapping unknown errors
 */
export class WrappedError extends BaseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext) {
    super(message, code, context, false);
    this.name = 'WrappedError';
  }
}

/**
 * Wrap an unknown thrown value into a BaseError
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = HttpErrorCodes.INTERNAL_ERROR
): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new WrappedError(message ?? error.message, code, { cause: error });
  }

  return new WrappedError(message ?? String(error), code, {
    details: { originalValue: String(error) },
  });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
