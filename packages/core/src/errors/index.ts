/**
 * Error handling module for Outpost
 *
 * Provides structured errors with codes, messages, and details
 * for consistent error handling across the supervisor services.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  ConflictErrorCode,
  StorageErrorCode,
  InfrastructureErrorCode,
} from './codes.js';

// Error classes
export {
  OutpostError,
  ValidationError,
  ConflictError,
  StorageError,
  InfrastructureError,
  isOutpostError,
  isValidationError,
  isConflictError,
  isStorageError,
  isInfrastructureError,
  hasErrorCode,
  errorMessage,
  toError,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Validation
  invalidInput,
  invalidDuration,
  invalidCron,
  invalidAddress,
  // Conflict
  alreadyRunning,
  notRunning,
  invalidTransition,
  sessionPaused,
  // Storage
  storageFailed,
  corruptRecord,
  // Infrastructure
  readyTimeout,
  sessionCreateFailed,
  sessionKillFailed,
  ledgerWriteFailed,
} from './factories.js';
