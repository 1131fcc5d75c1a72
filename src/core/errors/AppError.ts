/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In a service
 * throw new LocationIndexError(7, 4);
 *
 * // When parsing input
 * throw ValidationError.fromZodError(result.error);
 * ```
 *
 * Operational errors (bad input, missing file) are reported and the process
 * exits; non-operational ones (an index out of range) are programmer errors.
 * =============================================================================
 */

import { ErrorCode } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to a serializable form (used by the logger)
   */
  toJSON(): ErrorPayload {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      ...(process.env.NODE_ENV === 'development' && { stack: this.stack })
    };
  }
}

/**
 * Serialized error
 */
export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  stack?: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, code, true, { errors });
    this.errors = errors;
  }

  static fromZodError(
    zodError: { errors: Array<{ path: (string | number)[]; message: string }> },
    message: string = 'Validation failed',
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError(message, errors, code);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * A location index outside [0, N) reached the path finder.
 * Callers validate indices against the built graph, so this is a bug.
 */
export class LocationIndexError extends AppError {
  public readonly index: number;
  public readonly nodeCount: number;

  constructor(index: number, nodeCount: number) {
    super(
      `Location index ${index} is out of range [0, ${nodeCount})`,
      ErrorCode.INDEX_OUT_OF_RANGE,
      false,
      { index, nodeCount }
    );
    this.index = index;
    this.nodeCount = nodeCount;
  }
}

/**
 * The ride log could not be read
 */
export class DataSourceError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.DATA_SOURCE_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, code, true, details);
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}
