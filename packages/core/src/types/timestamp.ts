/**
 * Timestamp helpers
 *
 * All persisted timestamps are ISO 8601 strings in UTC
 * (YYYY-MM-DDTHH:mm:ss.sssZ). Records that arrive from outside the
 * supervisor (event log lines) may carry any RFC 3339 offset; use
 * `parseRfc3339` for those.
 */

import { ValidationError, ErrorCode } from '../errors/index.js';

/**
 * Timestamp type - ISO 8601 formatted string
 */
export type Timestamp = string;

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;

const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Validates a timestamp string is in ISO 8601 UTC format
 */
export function isValidTimestamp(value: unknown): value is Timestamp {
  if (typeof value !== 'string') {
    return false;
  }
  if (!TIMESTAMP_PATTERN.test(value)) {
    return false;
  }
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    return false;
  }
  // Rejects dates JS rolls over (Feb 30 becomes Mar 2)
  const normalizedInput = value.includes('.') ? value : value.replace('Z', '.000Z');
  return date.toISOString() === normalizedInput;
}

/**
 * Validates a timestamp and throws if invalid
 */
export function validateTimestamp(value: unknown, field: string): Timestamp {
  if (!isValidTimestamp(value)) {
    throw new ValidationError(
      `Invalid timestamp format for ${field}. Expected ISO 8601 format (YYYY-MM-DDTHH:mm:ss.sssZ)`,
      ErrorCode.INVALID_TIMESTAMP,
      { field, value, expected: 'YYYY-MM-DDTHH:mm:ss.sssZ' }
    );
  }
  return value;
}

/**
 * Creates a timestamp in ISO 8601 format (UTC)
 */
export function createTimestamp(date: Date = new Date()): Timestamp {
  return date.toISOString();
}

/**
 * Parses a timestamp string to a Date object
 */
export function parseTimestamp(timestamp: Timestamp): Date {
  return new Date(timestamp);
}

/**
 * Parses an RFC 3339 string (any offset) to epoch milliseconds.
 * Returns undefined for anything that is not RFC 3339.
 */
export function parseRfc3339(value: string): number | undefined {
  if (!RFC3339_PATTERN.test(value)) {
    return undefined;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}
