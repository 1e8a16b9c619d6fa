import {
  ErrorCode,
  ValidationErrorCode,
  ConflictErrorCode,
  StorageErrorCode,
  InfrastructureErrorCode,
} from './codes.js';

/**
 * Additional context for errors
 */
export interface ErrorDetails {
  /** Field that caused the error */
  field?: string;
  /** The invalid value */
  value?: unknown;
  /** Expected format or value */
  expected?: unknown;
  /** Actual value received */
  actual?: unknown;
  /** Session the error relates to */
  sessionId?: string;
  /** Task the error relates to */
  taskId?: string;
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Base error class for all Outpost errors.
 * Provides structured error information with code, message, and details.
 */
export class OutpostError extends Error {
  /** Machine-readable error code */
  readonly code: ErrorCode;
  /** Additional context about the error */
  readonly details: ErrorDetails;

  constructor(
    message: string,
    code: ErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = 'OutpostError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OutpostError);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): {
    name: string;
    message: string;
    code: ErrorCode;
    details: ErrorDetails;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Error for configuration and input validation failures
 */
export class ValidationError extends OutpostError {
  constructor(
    message: string,
    code: ValidationErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error for operations that conflict with the current state
 * (already running, not running, illegal transitions)
 */
export class ConflictError extends OutpostError {
  constructor(
    message: string,
    code: ConflictErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConflictError';
  }
}

/**
 * Error for state file operations
 */
export class StorageError extends OutpostError {
  constructor(
    message: string,
    code: StorageErrorCode = ErrorCode.STORAGE_ERROR,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'StorageError';
  }
}

/**
 * Error for critical collaborator failures (terminal sessions, work ledger)
 */
export class InfrastructureError extends OutpostError {
  constructor(
    message: string,
    code: InfrastructureErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'InfrastructureError';
  }
}

/**
 * Type guard to check if an error is an OutpostError
 */
export function isOutpostError(error: unknown): error is OutpostError {
  return error instanceof OutpostError;
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard to check if an error is a ConflictError
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/**
 * Type guard to check if an error is a StorageError
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard to check if an error is an InfrastructureError
 */
export function isInfrastructureError(error: unknown): error is InfrastructureError {
  return error instanceof InfrastructureError;
}

/**
 * Type guard to check if an error has a specific error code
 */
export function hasErrorCode(
  error: unknown,
  code: ErrorCode
): error is OutpostError {
  return isOutpostError(error) && error.code === code;
}

/**
 * Renders any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps any thrown value as an Error so it can be attached as a cause
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
