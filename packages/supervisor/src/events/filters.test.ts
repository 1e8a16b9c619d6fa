/**
 * Event Filter Tests
 */

import { describe, it, expect } from 'vitest';
import { Significance, type NarrativeEvent } from '../types/index.js';
import { applyFilters, byWorkspace, excludeTypes, includeTypes, inTimeRange, minSignificance } from './filters.js';

function narrative(
  type: string,
  timestamp: string,
  significance: Significance,
  workspace?: string
): NarrativeEvent {
  return {
    timestamp,
    type,
    actor: workspace ? `${workspace}/toast` : 'mayor/',
    payload: {},
    visibility: 'narrative',
    significance,
    summary: type,
    ...(workspace !== undefined ? { workspace } : {}),
  };
}

const events: NarrativeEvent[] = [
  narrative('sling', '2026-03-10T09:00:00Z', Significance.HIGH, 'gastown'),
  narrative('mail', '2026-03-10T10:00:00Z', Significance.MEDIUM, 'gastown'),
  narrative('patrol_complete', '2026-03-10T11:00:00Z', Significance.LOW),
  narrative('done', '2026-03-10T12:00:00+01:00', Significance.HIGH, 'beta'),
  narrative('done', 'yesterday', Significance.HIGH, 'beta'),
];

const types = (list: NarrativeEvent[]): string[] => list.map(e => `${e.type}@${e.timestamp}`);

describe('event filters', () => {
  it('filters by workspace', () => {
    expect(applyFilters(events, byWorkspace('gastown')).map(e => e.type)).toEqual(['sling', 'mail']);
  });

  it('filters by minimum significance', () => {
    expect(applyFilters(events, minSignificance(Significance.MEDIUM))).toHaveLength(4);
    expect(applyFilters(events, minSignificance(Significance.HIGH)).map(e => e.type)).toEqual(['sling', 'done', 'done']);
  });

  it('uses a half-open time range and honours offsets', () => {
    const range = inTimeRange(new Date('2026-03-10T09:00:00Z'), new Date('2026-03-10T11:00:00Z'));
    expect(types(applyFilters(events, range))).toEqual(['sling@2026-03-10T09:00:00Z', 'mail@2026-03-10T10:00:00Z']);

    // 12:00+01:00 is 11:00Z
    const late = inTimeRange(new Date('2026-03-10T11:00:00Z'), new Date('2026-03-10T11:00:01Z'));
    expect(types(applyFilters(events, late))).toEqual([
      'patrol_complete@2026-03-10T11:00:00Z',
      'done@2026-03-10T12:00:00+01:00',
    ]);
  });

  it('includes and excludes type sets', () => {
    expect(applyFilters(events, includeTypes(['mail', 'patrol_complete'])).map(e => e.type)).toEqual([
      'mail',
      'patrol_complete',
    ]);
    expect(applyFilters(events, excludeTypes(['done']))).toHaveLength(3);
  });

  it('composes in any order', () => {
    const a = applyFilters(events, byWorkspace('beta'), minSignificance(Significance.HIGH), excludeTypes(['sling']));
    const b = applyFilters(events, excludeTypes(['sling']), minSignificance(Significance.HIGH), byWorkspace('beta'));
    expect(a).toEqual(b);
    expect(a).toHaveLength(2);
  });
});
