/**
 * Gate Parser
 *
 * Validates a task header into a Gate. Never throws: a malformed header
 * produces an `invalid` gate carrying the configuration error.
 */

import { errorMessage } from '@outpost/core';
import { parseDurationValue } from '../config/index.js';
import { parseAgentAddress, isConditionOperator, isGateType, type Gate } from '../types/index.js';
import { tryParseCron } from './cron-schedule.js';

/**
 * Built-in trigger names; mailbox triggers are written `mail:<address>`
 */
export const BUILTIN_TRIGGERS = ['startup', 'heartbeat'] as const;

const MAIL_TRIGGER_PREFIX = 'mail:';

/**
 * Returns the inbox address of a `mail:<address>` trigger
 */
export function mailTriggerAddress(trigger: string): string | undefined {
  return trigger.startsWith(MAIL_TRIGGER_PREFIX) ? trigger.slice(MAIL_TRIGGER_PREFIX.length) : undefined;
}

/**
 * Whether a trigger name is one the trigger source can produce
 */
export function isValidTrigger(trigger: string): boolean {
  if (trigger === 'startup' || trigger === 'heartbeat') {
    return true;
  }
  const address = mailTriggerAddress(trigger);
  return address !== undefined && parseAgentAddress(address) !== undefined;
}

function invalid(error: string): Gate {
  return { type: 'invalid', error };
}

function readDuration(header: Readonly<Record<string, unknown>>, key: string): number | string {
  const value = header[key];
  if (value === undefined || value === null || value === '') {
    return `missing ${key}`;
  }
  try {
    return parseDurationValue(value);
  } catch (err) {
    return `bad ${key}: ${errorMessage(err)}`;
  }
}

function readThreshold(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Parses the gate fields of a task header
 *
 * @example
 * parseGate({ gate: 'cooldown', interval: '24h' })
 * // { type: 'cooldown', intervalMs: 86400000 }
 */
export function parseGate(header: Readonly<Record<string, unknown>>): Gate {
  const type = header.gate;
  if (type === undefined || type === null) {
    return invalid('missing gate type');
  }
  if (!isGateType(type)) {
    return invalid(`unknown gate type '${String(type)}'`);
  }

  switch (type) {
    case 'cooldown': {
      const interval = readDuration(header, 'interval');
      return typeof interval === 'number' ? { type, intervalMs: interval } : invalid(interval);
    }

    case 'cron': {
      const schedule = header.schedule;
      if (typeof schedule !== 'string' || schedule.trim() === '') {
        return invalid('missing schedule');
      }
      const expression = tryParseCron(schedule);
      return expression ? { type, schedule: expression.source, expression } : invalid(`bad schedule '${schedule}'`);
    }

    case 'condition': {
      const check = header.check;
      if (typeof check !== 'string' || check.trim() === '') {
        return invalid('missing check');
      }
      const operator = header.operator;
      if (!isConditionOperator(operator)) {
        return invalid(`unknown operator '${String(operator)}' (expected gt, lt, eq, ge or le)`);
      }
      if (header.threshold === undefined || header.threshold === null) {
        return invalid('missing threshold');
      }
      const threshold = readThreshold(header.threshold);
      if (threshold === undefined) {
        return invalid(`non-numeric threshold '${String(header.threshold)}'`);
      }
      if (header.cooldown === undefined || header.cooldown === null) {
        return { type, check, operator, threshold };
      }
      const cooldown = readDuration(header, 'cooldown');
      return typeof cooldown === 'number'
        ? { type, check, operator, threshold, cooldownMs: cooldown }
        : invalid(cooldown);
    }

    case 'event': {
      const trigger = header.trigger;
      if (typeof trigger !== 'string' || trigger.trim() === '') {
        return invalid('missing trigger');
      }
      return isValidTrigger(trigger.trim()) ? { type, trigger: trigger.trim() } : invalid(`unknown trigger '${trigger}'`);
    }
  }
}
