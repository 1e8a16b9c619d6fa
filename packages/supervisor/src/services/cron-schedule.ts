/**
 * Cron Schedule
 *
 * Five-field cron (minute hour day-of-month month day-of-week) with an
 * optional leading seconds field that is ignored. Supports `*`, `N`, `N-M`,
 * `N,M`, `*\/S` and `N-M/S`. All arithmetic is in UTC.
 *
 * When both day fields are restricted a day matches if either matches, as
 * in classic cron.
 */

import { invalidCron } from '@outpost/core';
import type { CronExpression } from '../types/index.js';

const MINUTE_MS = 60_000;

/** Upper bound on search steps; covers an eight-year gap such as Feb 29 */
const MAX_SEARCH_STEPS = 200_000;

// ============================================================================
// Parsing
// ============================================================================

function parseNumber(text: string, min: number, max: number): number | undefined {
  if (!/^\d+$/.test(text)) {
    return undefined;
  }
  const value = parseInt(text, 10);
  return value >= min && value <= max ? value : undefined;
}

/**
 * Parses a single cron field into a set of valid values.
 * Returns undefined when any segment is malformed or out of range.
 */
function parseCronField(field: string, min: number, max: number): Set<number> | undefined {
  const result = new Set<number>();

  for (const segment of field.split(',')) {
    let body = segment;
    let step = 1;

    const stepMatch = segment.match(/^(.+)\/(\d+)$/);
    if (stepMatch) {
      step = parseInt(stepMatch[2], 10);
      if (step <= 0) return undefined;
      body = stepMatch[1];
    }

    let rangeStart: number | undefined;
    let rangeEnd: number | undefined;

    if (body === '*') {
      rangeStart = min;
      rangeEnd = max;
    } else {
      const rangeMatch = body.match(/^(\d+)-(\d+)$/);
      if (rangeMatch) {
        rangeStart = parseNumber(rangeMatch[1], min, max);
        rangeEnd = parseNumber(rangeMatch[2], min, max);
      } else {
        rangeStart = parseNumber(body, min, max);
        // N/S means "from N to the end in steps of S"
        rangeEnd = stepMatch ? max : rangeStart;
      }
    }

    if (rangeStart === undefined || rangeEnd === undefined || rangeStart > rangeEnd) {
      return undefined;
    }
    for (let v = rangeStart; v <= rangeEnd; v += step) {
      result.add(v);
    }
  }

  return result.size > 0 ? result : undefined;
}

/**
 * Parses a cron expression, or returns undefined when it is invalid
 */
export function tryParseCron(schedule: string): CronExpression | undefined {
  const parts = schedule.trim().split(/\s+/);
  if (parts.length < 5 || parts.length > 6) {
    return undefined;
  }

  const fields = parts.length === 6 ? parts.slice(1) : parts;
  const [minuteField, hourField, domField, monthField, dowField] = fields;

  const minutes = parseCronField(minuteField, 0, 59);
  const hours = parseCronField(hourField, 0, 23);
  const daysOfMonth = parseCronField(domField, 1, 31);
  const months = parseCronField(monthField, 1, 12);
  // 7 is accepted as Sunday
  const rawDows = parseCronField(dowField, 0, 7);

  if (!minutes || !hours || !daysOfMonth || !months || !rawDows) {
    return undefined;
  }

  const daysOfWeek = new Set([...rawDows].map(d => (d === 7 ? 0 : d)));

  return {
    source: schedule.trim(),
    minutes,
    hours,
    daysOfMonth,
    months,
    daysOfWeek,
    domRestricted: domField !== '*',
    dowRestricted: dowField !== '*',
  };
}

/**
 * Parses a cron expression
 *
 * @throws ValidationError with code INVALID_CRON
 */
export function parseCron(schedule: string): CronExpression {
  const expression = tryParseCron(schedule);
  if (!expression) {
    throw invalidCron(schedule);
  }
  return expression;
}

/**
 * Checks whether a cron expression is valid
 */
export function isValidCronExpression(schedule: string): boolean {
  return tryParseCron(schedule) !== undefined;
}

// ============================================================================
// Matching
// ============================================================================

function dayMatches(expression: CronExpression, date: Date): boolean {
  const dom = expression.daysOfMonth.has(date.getUTCDate());
  const dow = expression.daysOfWeek.has(date.getUTCDay());
  if (expression.domRestricted && expression.dowRestricted) {
    return dom || dow;
  }
  return dom && dow;
}

/**
 * Whether the expression fires at the minute containing `date`
 */
export function cronMatches(expression: CronExpression, date: Date): boolean {
  return (
    expression.months.has(date.getUTCMonth() + 1) &&
    dayMatches(expression, date) &&
    expression.hours.has(date.getUTCHours()) &&
    expression.minutes.has(date.getUTCMinutes())
  );
}

function floorToMinute(ms: number): number {
  return Math.floor(ms / MINUTE_MS) * MINUTE_MS;
}

// ============================================================================
// Search
// ============================================================================

/**
 * First fire time strictly after `after`
 */
export function nextCronTime(expression: CronExpression, after: Date): Date | undefined {
  let t = floorToMinute(after.getTime()) + MINUTE_MS;

  for (let i = 0; i < MAX_SEARCH_STEPS; i++) {
    const d = new Date(t);
    if (!expression.months.has(d.getUTCMonth() + 1)) {
      t = Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 1);
    } else if (!dayMatches(expression, d)) {
      t = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() + 1);
    } else if (!expression.hours.has(d.getUTCHours())) {
      t = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate(), d.getUTCHours() + 1);
    } else if (!expression.minutes.has(d.getUTCMinutes())) {
      t += MINUTE_MS;
    } else {
      return d;
    }
  }
  return undefined;
}

/**
 * Latest fire time at or before `atOrBefore`, i.e. the start of the slot
 * that `atOrBefore` falls in
 */
export function previousCronTime(expression: CronExpression, atOrBefore: Date): Date | undefined {
  let t = floorToMinute(atOrBefore.getTime());

  for (let i = 0; i < MAX_SEARCH_STEPS; i++) {
    const d = new Date(t);
    if (!expression.months.has(d.getUTCMonth() + 1)) {
      t = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1) - MINUTE_MS;
    } else if (!dayMatches(expression, d)) {
      t = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()) - MINUTE_MS;
    } else if (!expression.hours.has(d.getUTCHours())) {
      t = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate(), d.getUTCHours()) - MINUTE_MS;
    } else if (!expression.minutes.has(d.getUTCMinutes())) {
      t -= MINUTE_MS;
    } else {
      return d;
    }
  }
  return undefined;
}
