import { ErrorCode } from './codes.js';
import {
  ValidationError,
  ConflictError,
  StorageError,
  InfrastructureError,
  type ErrorDetails,
} from './error.js';

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid ${field}: expected ${expected}`,
    ErrorCode.INVALID_INPUT,
    { field, value, expected, ...details }
  );
}

/**
 * Creates a ValidationError for a malformed duration string
 */
export function invalidDuration(value: unknown, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(
    `Invalid duration format: '${String(value)}'. Expected format: <number><unit> (e.g., '500ms', '5m', '24h', '30d')`,
    ErrorCode.INVALID_DURATION,
    { field: 'duration', value, expected: '<number><unit> where unit is ms, s, m, h, or d', ...details }
  );
}

/**
 * Creates a ValidationError for a malformed cron expression
 */
export function invalidCron(schedule: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(
    `Invalid cron expression: '${schedule}'`,
    ErrorCode.INVALID_CRON,
    { field: 'schedule', value: schedule, expected: 'minute hour day-of-month month day-of-week', ...details }
  );
}

/**
 * Creates a ValidationError for an address outside the address grammar
 */
export function invalidAddress(address: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(
    `Invalid agent address: '${address}'`,
    ErrorCode.INVALID_ADDRESS,
    { field: 'address', value: address, ...details }
  );
}

// =============================================================================
// Conflict Factories
// =============================================================================

/**
 * Creates a ConflictError for a start on a healthy running session
 */
export function alreadyRunning(sessionId: string, details: ErrorDetails = {}): ConflictError {
  return new ConflictError(`Session already running: ${sessionId}`, ErrorCode.ALREADY_RUNNING, {
    sessionId,
    ...details,
  });
}

/**
 * Creates a ConflictError for a stop on a session with no container
 */
export function notRunning(sessionId: string, details: ErrorDetails = {}): ConflictError {
  return new ConflictError(`Session not running: ${sessionId}`, ErrorCode.NOT_RUNNING, {
    sessionId,
    ...details,
  });
}

/**
 * Creates a ConflictError for a state machine edge that does not exist
 */
export function invalidTransition(
  sessionId: string,
  from: string,
  to: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `Invalid session transition for ${sessionId}: ${from} -> ${to}`,
    ErrorCode.INVALID_TRANSITION,
    { sessionId, expected: to, actual: from, ...details }
  );
}

/**
 * Creates a ConflictError for work offered to a paused session
 */
export function sessionPaused(sessionId: string, details: ErrorDetails = {}): ConflictError {
  return new ConflictError(`Session is paused: ${sessionId}`, ErrorCode.SESSION_PAUSED, {
    sessionId,
    ...details,
  });
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for a failed read or write
 */
export function storageFailed(
  operation: 'read' | 'write',
  filePath: string,
  cause?: Error
): StorageError {
  return new StorageError(
    `Failed to ${operation} state record ${filePath}${cause ? `: ${cause.message}` : ''}`,
    ErrorCode.STORAGE_ERROR,
    { operation, filePath },
    cause
  );
}

/**
 * Creates a StorageError for a record that cannot be decoded
 */
export function corruptRecord(filePath: string, cause?: Error): StorageError {
  return new StorageError(
    `Corrupt state record ${filePath}`,
    ErrorCode.CORRUPT_RECORD,
    { filePath },
    cause
  );
}

// =============================================================================
// Infrastructure Factories
// =============================================================================

/**
 * Creates an InfrastructureError for a worker that never became ready
 */
export function readyTimeout(sessionId: string, timeoutMs: number): InfrastructureError {
  return new InfrastructureError(
    `Worker in session ${sessionId} did not become ready within ${timeoutMs}ms`,
    ErrorCode.READY_TIMEOUT,
    { sessionId, timeoutMs }
  );
}

/**
 * Creates an InfrastructureError for a session that could not be created
 */
export function sessionCreateFailed(sessionId: string, cause?: Error): InfrastructureError {
  return new InfrastructureError(
    `Failed to create session ${sessionId}${cause ? `: ${cause.message}` : ''}`,
    ErrorCode.SESSION_CREATE_FAILED,
    { sessionId },
    cause
  );
}

/**
 * Creates an InfrastructureError for a session that could not be killed
 */
export function sessionKillFailed(sessionId: string, cause?: Error): InfrastructureError {
  return new InfrastructureError(
    `Failed to kill session ${sessionId}${cause ? `: ${cause.message}` : ''}`,
    ErrorCode.SESSION_KILL_FAILED,
    { sessionId },
    cause
  );
}

/**
 * Creates an InfrastructureError for a ledger write that failed
 */
export function ledgerWriteFailed(recipient: string, cause?: Error): InfrastructureError {
  return new InfrastructureError(
    `Failed to persist message to ${recipient}${cause ? `: ${cause.message}` : ''}`,
    ErrorCode.LEDGER_WRITE_FAILED,
    { recipient },
    cause
  );
}
