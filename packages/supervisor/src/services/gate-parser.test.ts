/**
 * Gate Parser Tests
 */

import { describe, it, expect } from 'vitest';
import type { Gate } from '../types/index.js';
import { isValidTrigger, mailTriggerAddress, parseGate } from './gate-parser.js';

function errorOf(gate: Gate): string | undefined {
  return gate.type === 'invalid' ? gate.error : undefined;
}

describe('parseGate', () => {
  describe('cooldown', () => {
    it('parses the interval', () => {
      expect(parseGate({ gate: 'cooldown', interval: '24h' })).toEqual({ type: 'cooldown', intervalMs: 86_400_000 });
    });

    it('reports a missing interval', () => {
      expect(errorOf(parseGate({ gate: 'cooldown' }))).toBe('missing interval');
    });

    it('reports a malformed interval', () => {
      expect(errorOf(parseGate({ gate: 'cooldown', interval: 'soon' }))).toBe(
        "bad interval: Invalid duration format: 'soon'. Expected format: <number><unit> (e.g., '500ms', '5m', '24h', '30d')"
      );
    });
  });

  describe('cron', () => {
    it('keeps the schedule source', () => {
      const gate = parseGate({ gate: 'cron', schedule: ' 0 9 * * * ' });
      expect(gate.type).toBe('cron');
      expect(gate.type === 'cron' && gate.schedule).toBe('0 9 * * *');
    });

    it('reports a bad schedule', () => {
      expect(errorOf(parseGate({ gate: 'cron', schedule: '* * *' }))).toBe("bad schedule '* * *'");
      expect(errorOf(parseGate({ gate: 'cron' }))).toBe('missing schedule');
    });
  });

  describe('condition', () => {
    it('parses a full condition with cooldown', () => {
      expect(
        parseGate({ gate: 'condition', check: 'wc -l < queue', operator: 'gt', threshold: '100', cooldown: '30m' })
      ).toEqual({
        type: 'condition',
        check: 'wc -l < queue',
        operator: 'gt',
        threshold: 100,
        cooldownMs: 1_800_000,
      });
    });

    it('omits the cooldown when absent', () => {
      expect(parseGate({ gate: 'condition', check: 'echo 1', operator: 'eq', threshold: 1 })).toEqual({
        type: 'condition',
        check: 'echo 1',
        operator: 'eq',
        threshold: 1,
      });
    });

    it('rejects unknown operators', () => {
      expect(errorOf(parseGate({ gate: 'condition', check: 'echo 1', operator: 'gte', threshold: 1 }))).toBe(
        "unknown operator 'gte' (expected gt, lt, eq, ge or le)"
      );
    });

    it('rejects missing and non-numeric thresholds', () => {
      expect(errorOf(parseGate({ gate: 'condition', check: 'echo 1', operator: 'gt' }))).toBe('missing threshold');
      expect(errorOf(parseGate({ gate: 'condition', check: 'echo 1', operator: 'gt', threshold: 'lots' }))).toBe(
        "non-numeric threshold 'lots'"
      );
    });

    it('rejects a missing check', () => {
      expect(errorOf(parseGate({ gate: 'condition', operator: 'gt', threshold: 1 }))).toBe('missing check');
    });
  });

  describe('event', () => {
    it('accepts built-in and mailbox triggers', () => {
      expect(parseGate({ gate: 'event', trigger: 'startup' })).toEqual({ type: 'event', trigger: 'startup' });
      expect(parseGate({ gate: 'event', trigger: 'mail:deacon/' })).toEqual({ type: 'event', trigger: 'mail:deacon/' });
    });

    it('rejects unknown triggers', () => {
      expect(errorOf(parseGate({ gate: 'event', trigger: 'sometimes' }))).toBe("unknown trigger 'sometimes'");
    });
  });

  it('reports missing and unknown gate types', () => {
    expect(errorOf(parseGate({}))).toBe('missing gate type');
    expect(errorOf(parseGate({ gate: 'weekly' }))).toBe("unknown gate type 'weekly'");
  });
});

describe('triggers', () => {
  it('extracts the mailbox address', () => {
    expect(mailTriggerAddress('mail:mayor/')).toBe('mayor/');
    expect(mailTriggerAddress('heartbeat')).toBeUndefined();
  });

  it('validates mailbox addresses against the address grammar', () => {
    expect(isValidTrigger('mail:gastown/witness')).toBe(true);
    expect(isValidTrigger('mail:a/b/c/d')).toBe(false);
    expect(isValidTrigger('heartbeat')).toBe(true);
  });
});
