/**
 * Error codes for the Outpost supervisor.
 * Categorized by error type for consistent handling.
 */

/**
 * Validation error codes - configuration and input failures
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** Duration string could not be parsed */
  INVALID_DURATION: 'INVALID_DURATION',
  /** Cron expression could not be parsed */
  INVALID_CRON: 'INVALID_CRON',
  /** Mail or actor address does not match the address grammar */
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  /** Timestamp format invalid */
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Conflict error codes - the requested operation does not fit the current state
 */
export const ConflictErrorCode = {
  /** Start requested for a session whose worker is alive */
  ALREADY_RUNNING: 'ALREADY_RUNNING',
  /** Stop requested for a session with no container */
  NOT_RUNNING: 'NOT_RUNNING',
  /** State machine edge does not exist */
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  /** Work offered to a paused session */
  SESSION_PAUSED: 'SESSION_PAUSED',
} as const;

export type ConflictErrorCode = typeof ConflictErrorCode[keyof typeof ConflictErrorCode];

/**
 * Storage error codes - state file operations
 */
export const StorageErrorCode = {
  /** Reading or writing a state record failed */
  STORAGE_ERROR: 'STORAGE_ERROR',
  /** A state record exists but cannot be decoded */
  CORRUPT_RECORD: 'CORRUPT_RECORD',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * Infrastructure error codes - critical collaborator failures
 */
export const InfrastructureErrorCode = {
  /** Worker never reached the ready state */
  READY_TIMEOUT: 'READY_TIMEOUT',
  /** The terminal session could not be created */
  SESSION_CREATE_FAILED: 'SESSION_CREATE_FAILED',
  /** The terminal session could not be killed */
  SESSION_KILL_FAILED: 'SESSION_KILL_FAILED',
  /** The work ledger rejected a record */
  LEDGER_WRITE_FAILED: 'LEDGER_WRITE_FAILED',
} as const;

export type InfrastructureErrorCode = typeof InfrastructureErrorCode[keyof typeof InfrastructureErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...ConflictErrorCode,
  ...StorageErrorCode,
  ...InfrastructureErrorCode,
} as const;

export type ErrorCode =
  | ValidationErrorCode
  | ConflictErrorCode
  | StorageErrorCode
  | InfrastructureErrorCode;
