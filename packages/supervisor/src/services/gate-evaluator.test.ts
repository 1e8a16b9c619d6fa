/**
 * Gate Evaluator Tests
 */

import { describe, it, expect } from 'vitest';
import type { Gate, RunState } from '../types/index.js';
import { evaluateGate, isHeld, nextEligibleAfterRun, parseProbeValue } from './gate-evaluator.js';
import { parseGate } from './gate-parser.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function minutesAgo(minutes: number): string {
  return new Date(NOW.getTime() - minutes * 60_000).toISOString();
}

function state(partial: Partial<RunState> = {}): RunState {
  return { runCount: 1, ...partial };
}

const cooldown: Gate = parseGate({ gate: 'cooldown', interval: '24h' });
const daily: Gate = parseGate({ gate: 'cron', schedule: '0 9 * * *' });
const queueDepth: Gate = parseGate({ gate: 'condition', check: 'cat depth', operator: 'gt', threshold: 100, cooldown: '30m' });
const heartbeat: Gate = parseGate({ gate: 'event', trigger: 'heartbeat' });

describe('evaluateGate', () => {
  describe('cooldown', () => {
    it('is open when the task never ran', () => {
      expect(evaluateGate(cooldown, { runCount: 0 }, { now: NOW })).toEqual({ open: true, reason: 'never run' });
    });

    it('is open once the interval has elapsed', () => {
      const decision = evaluateGate(cooldown, state({ lastRun: minutesAgo(25 * 60) }), { now: NOW });
      expect(decision).toEqual({ open: true, reason: 'cooldown elapsed (25h since last run)' });
    });

    it('is closed inside the interval', () => {
      const decision = evaluateGate(cooldown, state({ lastRun: minutesAgo(60) }), { now: NOW });
      expect(decision).toEqual({ open: false, reason: 'cooldown: 23h remaining' });
    });
  });

  describe('cron', () => {
    it('is open when the current slot has not run', () => {
      expect(evaluateGate(daily, { runCount: 0 }, { now: NOW })).toEqual({
        open: true,
        reason: 'slot 2026-03-10T09:00:00.000Z not yet run',
      });
      expect(evaluateGate(daily, state({ lastRun: '2026-03-09T09:00:00.000Z' }), { now: NOW }).open).toBe(true);
    });

    it('is closed after a run inside the current slot', () => {
      expect(evaluateGate(daily, state({ lastRun: '2026-03-10T09:00:05.000Z' }), { now: NOW })).toEqual({
        open: false,
        reason: 'already ran for slot 2026-03-10T09:00:00.000Z; next at 2026-03-11T09:00:00.000Z',
      });
    });
  });

  describe('condition', () => {
    it('stays closed while its cooldown runs even when the condition holds', () => {
      const decision = evaluateGate(queueDepth, state({ lastRun: minutesAgo(10) }), { now: NOW, probeOutput: '120' });
      expect(decision).toEqual({ open: false, reason: 'condition met (120 gt 100) but cooldown has 20m remaining' });
    });

    it('opens once the cooldown has passed', () => {
      const decision = evaluateGate(queueDepth, state({ lastRun: minutesAgo(40) }), { now: NOW, probeOutput: '120\n' });
      expect(decision).toEqual({ open: true, reason: 'condition met (120 gt 100)' });
    });

    it('is closed when the condition does not hold', () => {
      expect(evaluateGate(queueDepth, { runCount: 0 }, { now: NOW, probeOutput: '80' })).toEqual({
        open: false,
        reason: 'condition not met (80 gt 100)',
      });
    });

    it('closes with an error on non-numeric output', () => {
      expect(evaluateGate(queueDepth, { runCount: 0 }, { now: NOW, probeOutput: 'abc' })).toEqual({
        open: false,
        reason: 'condition probe output is not a number',
        error: "non-numeric probe output 'abc'",
      });
    });

    it('closes with the probe error', () => {
      expect(evaluateGate(queueDepth, { runCount: 0 }, { now: NOW, probeError: 'Check exited with code 1' })).toEqual({
        open: false,
        reason: 'condition probe failed',
        error: 'Check exited with code 1',
      });
    });

    it('closes when no probe ran', () => {
      expect(evaluateGate(queueDepth, { runCount: 0 }, { now: NOW }).error).toBe('no probe output');
    });
  });

  describe('event', () => {
    it('follows the pending trigger set', () => {
      expect(evaluateGate(heartbeat, { runCount: 0 }, { now: NOW, pendingTriggers: new Set(['heartbeat']) })).toEqual({
        open: true,
        reason: "trigger 'heartbeat' pending",
      });
      expect(evaluateGate(heartbeat, { runCount: 0 }, { now: NOW, pendingTriggers: new Set() }).open).toBe(false);
    });
  });

  it('keeps invalid gates closed with their error', () => {
    const gate = parseGate({ gate: 'cooldown', interval: 'later' });
    const decision = evaluateGate(gate, { runCount: 0 }, { now: NOW });
    expect(decision.open).toBe(false);
    expect(decision.reason).toBe('invalid gate configuration');
    expect(decision.error).toMatch(/^bad interval/);
  });

  it('holds any gate after a failure until nextEligible', () => {
    const held = state({ lastResult: 'failure', nextEligible: '2026-03-10T13:00:00.000Z' });
    const context = { now: NOW, pendingTriggers: new Set(['heartbeat']), holdFailures: true };
    expect(evaluateGate(heartbeat, held, context)).toEqual({
      open: false,
      reason: 'held until 2026-03-10T13:00:00.000Z',
    });
    expect(isHeld(held, NOW)).toBe(true);
    expect(isHeld(held, new Date('2026-03-10T13:00:00.000Z'))).toBe(false);
  });

  it('ignores a failure hold unless failures hold', () => {
    const held = state({ lastResult: 'failure', nextEligible: '2026-03-10T13:00:00.000Z' });
    expect(evaluateGate(heartbeat, held, { now: NOW, pendingTriggers: new Set(['heartbeat']) }).open).toBe(true);
  });

  it('opens a cooldown gate once a shortened interval has elapsed', () => {
    const oneHour = parseGate({ gate: 'cooldown', interval: '1h' });
    const ranUnderDailyInterval = state({
      lastRun: minutesAgo(120),
      lastResult: 'success',
      nextEligible: '2026-03-11T10:00:00.000Z',
    });

    expect(isHeld(ranUnderDailyInterval, NOW)).toBe(false);
    expect(evaluateGate(oneHour, ranUnderDailyInterval, { now: NOW, holdFailures: true })).toEqual({
      open: true,
      reason: 'cooldown elapsed (2h since last run)',
    });
  });
});

describe('nextEligibleAfterRun', () => {
  it('advances by the gate interval', () => {
    expect(nextEligibleAfterRun(cooldown, NOW)?.toISOString()).toBe('2026-03-11T12:00:00.000Z');
    expect(nextEligibleAfterRun(queueDepth, NOW)?.toISOString()).toBe('2026-03-10T12:30:00.000Z');
    expect(nextEligibleAfterRun(daily, NOW)?.toISOString()).toBe('2026-03-11T09:00:00.000Z');
  });

  it('sets no hold for event gates or conditions without cooldown', () => {
    expect(nextEligibleAfterRun(heartbeat, NOW)).toBeUndefined();
    expect(nextEligibleAfterRun(parseGate({ gate: 'condition', check: 'x', operator: 'lt', threshold: 1 }), NOW)).toBeUndefined();
  });
});

describe('parseProbeValue', () => {
  it('parses trimmed numbers and rejects empty output', () => {
    expect(parseProbeValue(' 42\n')).toBe(42);
    expect(parseProbeValue('')).toBeUndefined();
    expect(parseProbeValue('4 2')).toBeUndefined();
  });
});
