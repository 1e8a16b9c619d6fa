/**
 * Duration Parsing and Formatting
 *
 * Handles conversion between duration strings (e.g., '5m', '500ms', '24h')
 * and millisecond values.
 */

import { invalidDuration } from '@outpost/core';
import type { Duration, DurationString } from './types.js';

// ============================================================================
// Duration Units
// ============================================================================

/**
 * Duration unit multipliers (to milliseconds)
 */
export const DURATION_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

type DurationUnit = keyof typeof DURATION_UNITS;

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/;

function isDurationUnit(value: string): value is DurationUnit {
  return value in DURATION_UNITS;
}

// ============================================================================
// Parsing Functions
// ============================================================================

/**
 * Checks if a value is a valid duration string
 */
export function isDurationString(value: unknown): value is DurationString {
  return typeof value === 'string' && DURATION_PATTERN.test(value.trim());
}

/**
 * Parses a duration string to milliseconds
 *
 * @throws ValidationError if the format is invalid
 *
 * @example
 * parseDuration('500ms') // 500
 * parseDuration('30m')   // 1800000
 * parseDuration('24h')   // 86400000
 */
export function parseDuration(value: string): Duration {
  const match = value.trim().match(DURATION_PATTERN);
  if (!match || !isDurationUnit(match[2])) {
    throw invalidDuration(value);
  }

  const result = parseFloat(match[1]) * DURATION_UNITS[match[2]];
  if (!Number.isFinite(result)) {
    throw invalidDuration(value, { reason: 'non-finite value' });
  }
  return Math.round(result);
}

/**
 * Parses a duration that may already be a number of milliseconds
 */
export function parseDurationValue(value: unknown): Duration {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw invalidDuration(value);
    }
    return Math.round(value);
  }
  if (typeof value === 'string') {
    return parseDuration(value);
  }
  throw invalidDuration(value);
}

/**
 * Safely parses a duration, returning undefined on failure
 */
export function tryParseDuration(value: unknown): Duration | undefined {
  try {
    return parseDurationValue(value);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Formats milliseconds using the largest unit that divides evenly
 *
 * @example
 * formatDuration(500)      // '500ms'
 * formatDuration(300000)   // '5m'
 * formatDuration(86400000) // '1d'
 */
export function formatDuration(ms: Duration): string {
  if (ms < 0) {
    throw invalidDuration(ms);
  }
  for (const unit of ['d', 'h', 'm', 's'] as const) {
    const size = DURATION_UNITS[unit];
    if (ms >= size && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }
  return `${ms}ms`;
}
