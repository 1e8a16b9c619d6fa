/**
 * Gate Evaluator
 *
 * Pure function of (gate, run state, context) to an open/closed decision
 * with a reason. Configuration and probe errors close the gate and are
 * reported in `error`; nothing here throws.
 */

import { parseRfc3339 } from '@outpost/core';
import { formatDuration } from '../config/index.js';
import type {
  ConditionGate,
  ConditionOperator,
  CronGate,
  Gate,
  GateContext,
  GateDecision,
  RunState,
} from '../types/index.js';
import { nextCronTime, previousCronTime } from './cron-schedule.js';

// ============================================================================
// Helpers
// ============================================================================

function open(reason: string): GateDecision {
  return { open: true, reason };
}

function closed(reason: string, error?: string): GateDecision {
  return error === undefined ? { open: false, reason } : { open: false, reason, error };
}

function since(nowMs: number, timestamp: string | undefined): number | undefined {
  if (timestamp === undefined) {
    return undefined;
  }
  const ms = parseRfc3339(timestamp);
  return ms === undefined ? undefined : nowMs - ms;
}

/**
 * Parses a probe's stdout as a number. Empty or non-numeric output is
 * rejected rather than read as zero.
 */
export function parseProbeValue(output: string): number | undefined {
  const trimmed = output.trim();
  if (trimmed === '') {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Applies a condition operator
 */
export function compare(value: number, operator: ConditionOperator, threshold: number): boolean {
  switch (operator) {
    case 'gt':
      return value > threshold;
    case 'lt':
      return value < threshold;
    case 'eq':
      return value === threshold;
    case 'ge':
      return value >= threshold;
    case 'le':
      return value <= threshold;
  }
}

// ============================================================================
// Per-type Evaluation
// ============================================================================

function evaluateCooldown(intervalMs: number, runState: RunState, nowMs: number): GateDecision {
  const elapsed = since(nowMs, runState.lastRun);
  if (elapsed === undefined) {
    return open('never run');
  }
  if (elapsed >= intervalMs) {
    return open(`cooldown elapsed (${formatDuration(Math.max(0, elapsed))} since last run)`);
  }
  return closed(`cooldown: ${formatDuration(intervalMs - elapsed)} remaining`);
}

function evaluateCron(gate: CronGate, runState: RunState, now: Date): GateDecision {
  const slot = previousCronTime(gate.expression, now);
  if (!slot) {
    const next = nextCronTime(gate.expression, now);
    return closed(`no slot of '${gate.schedule}' has started${next ? `; next at ${next.toISOString()}` : ''}`);
  }

  const lastRunMs = runState.lastRun === undefined ? undefined : parseRfc3339(runState.lastRun);
  if (lastRunMs === undefined || lastRunMs < slot.getTime()) {
    return open(`slot ${slot.toISOString()} not yet run`);
  }

  const next = nextCronTime(gate.expression, now);
  return closed(`already ran for slot ${slot.toISOString()}${next ? `; next at ${next.toISOString()}` : ''}`);
}

function evaluateCondition(gate: ConditionGate, runState: RunState, context: GateContext): GateDecision {
  if (context.probeError !== undefined) {
    return closed('condition probe failed', context.probeError);
  }
  if (context.probeOutput === undefined) {
    return closed('condition probe was not run', 'no probe output');
  }

  const value = parseProbeValue(context.probeOutput);
  if (value === undefined) {
    return closed('condition probe output is not a number', `non-numeric probe output '${context.probeOutput.trim()}'`);
  }

  const expression = `${value} ${gate.operator} ${gate.threshold}`;
  if (!compare(value, gate.operator, gate.threshold)) {
    return closed(`condition not met (${expression})`);
  }

  if (gate.cooldownMs !== undefined) {
    const elapsed = since(context.now.getTime(), runState.lastRun);
    if (elapsed !== undefined && elapsed < gate.cooldownMs) {
      return closed(`condition met (${expression}) but cooldown has ${formatDuration(gate.cooldownMs - elapsed)} remaining`);
    }
  }

  return open(`condition met (${expression})`);
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Whether the last run failed and its `nextEligible` lies in the future.
 * A hold recorded after a success is informational only: the gate rule
 * decides from `lastRun` with the current parameters.
 */
export function isHeld(runState: RunState, now: Date): boolean {
  if (runState.lastResult !== 'failure' || runState.nextEligible === undefined) {
    return false;
  }
  const eligibleMs = parseRfc3339(runState.nextEligible);
  return eligibleMs !== undefined && now.getTime() < eligibleMs;
}

/**
 * Decides whether a gate is open
 *
 * Under `holdFailures`, a failed run's future `nextEligible` closes any
 * gate. An `invalid` gate is always closed with its configuration error.
 */
export function evaluateGate(gate: Gate, runState: RunState, context: GateContext): GateDecision {
  if (gate.type === 'invalid') {
    return closed('invalid gate configuration', gate.error);
  }

  const nowMs = context.now.getTime();
  if (context.holdFailures === true && isHeld(runState, context.now)) {
    return closed(`held until ${runState.nextEligible}`);
  }

  switch (gate.type) {
    case 'cooldown':
      return evaluateCooldown(gate.intervalMs, runState, nowMs);
    case 'cron':
      return evaluateCron(gate, runState, context.now);
    case 'condition':
      return evaluateCondition(gate, runState, context);
    case 'event':
      return context.pendingTriggers?.has(gate.trigger)
        ? open(`trigger '${gate.trigger}' pending`)
        : closed(`trigger '${gate.trigger}' not pending`);
  }
}

/**
 * Computes the eligibility hold recorded after a run of this gate.
 * Returns undefined for gates with no natural interval.
 */
export function nextEligibleAfterRun(gate: Gate, now: Date): Date | undefined {
  switch (gate.type) {
    case 'cooldown':
      return new Date(now.getTime() + gate.intervalMs);
    case 'condition':
      return gate.cooldownMs === undefined ? undefined : new Date(now.getTime() + gate.cooldownMs);
    case 'cron':
      return nextCronTime(gate.expression, now);
    default:
      return undefined;
  }
}
