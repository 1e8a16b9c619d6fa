/**
 * Run State
 *
 * Per-task bookkeeping persisted after every dispatch attempt.
 * `runCount` never decreases and `nextEligible` only moves forward.
 */

import { isValidTimestamp, type Timestamp } from '@outpost/core';
import type { StateCodec } from '../storage/index.js';

export type RunResult = 'success' | 'failure';

export interface RunState {
  /** Last successful run */
  readonly lastRun?: Timestamp;
  readonly lastResult?: RunResult;
  readonly runCount: number;
  /** The gate stays closed until this time */
  readonly nextEligible?: Timestamp;
}

/**
 * Run state of a task that has never run
 */
export function defaultRunState(): RunState {
  return { runCount: 0 };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalTimestamp(value: unknown): Timestamp | undefined | null {
  if (value === undefined || value === null) {
    return undefined;
  }
  return isValidTimestamp(value) ? value : null;
}

export function isRunResult(value: unknown): value is RunResult {
  return value === 'success' || value === 'failure';
}

/**
 * Validates a parsed record; undefined when any field is malformed
 */
export function decodeRunState(raw: unknown): RunState | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { runCount } = raw;
  if (typeof runCount !== 'number' || !Number.isInteger(runCount) || runCount < 0) {
    return undefined;
  }
  const lastRun = optionalTimestamp(raw.lastRun);
  const nextEligible = optionalTimestamp(raw.nextEligible);
  if (lastRun === null || nextEligible === null) {
    return undefined;
  }
  if (raw.lastResult !== undefined && !isRunResult(raw.lastResult)) {
    return undefined;
  }
  const lastResult = isRunResult(raw.lastResult) ? raw.lastResult : undefined;

  return {
    runCount,
    ...(lastRun !== undefined ? { lastRun } : {}),
    ...(lastResult !== undefined ? { lastResult } : {}),
    ...(nextEligible !== undefined ? { nextEligible } : {}),
  };
}

export const runStateCodec: StateCodec<RunState> = {
  defaults: defaultRunState,
  decode: decodeRunState,
};
