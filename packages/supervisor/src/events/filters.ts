/**
 * Event Filters
 *
 * Pure predicates over classified events. Filters compose by conjunction,
 * so the order they are applied in does not matter.
 */

import { parseRfc3339 } from '@outpost/core';
import type { NarrativeEvent, Significance } from '../types/index.js';

export type EventFilter = (event: NarrativeEvent) => boolean;

export function byWorkspace(workspace: string): EventFilter {
  return event => event.workspace === workspace;
}

export function minSignificance(minimum: Significance): EventFilter {
  return event => event.significance >= minimum;
}

/**
 * Half-open range `[start, end)`. Events with unparseable timestamps never
 * match.
 */
export function inTimeRange(start: Date, end: Date): EventFilter {
  const startMs = start.getTime();
  const endMs = end.getTime();
  return event => {
    const ms = parseRfc3339(event.timestamp);
    return ms !== undefined && ms >= startMs && ms < endMs;
  };
}

export function includeTypes(types: Iterable<string>): EventFilter {
  const set = new Set(types);
  return event => set.has(event.type);
}

export function excludeTypes(types: Iterable<string>): EventFilter {
  const set = new Set(types);
  return event => !set.has(event.type);
}

/**
 * Events that pass every filter, in their original order
 */
export function applyFilters(events: readonly NarrativeEvent[], ...filters: EventFilter[]): NarrativeEvent[] {
  return events.filter(event => filters.every(filter => filter(event)));
}
