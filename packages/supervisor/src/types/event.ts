/**
 * Activity Event Types
 *
 * Events are appended as newline-delimited JSON to one shared log.
 * Producers outside the supervisor write most of them; the supervisor only
 * appends its own patrol and lifecycle records.
 */

import type { Timestamp } from '@outpost/core';
import type { AgentKind } from './agent-identity.js';

// ============================================================================
// Event Types
// ============================================================================

export const EventType = {
  // Work
  SLING: 'sling',
  HOOK: 'hook',
  UNHOOK: 'unhook',
  DONE: 'done',
  HANDOFF: 'handoff',
  // Communication
  MAIL: 'mail',
  NUDGE: 'nudge',
  // Sessions
  SPAWN: 'spawn',
  KILL: 'kill',
  BOOT: 'boot',
  HALT: 'halt',
  SESSION_START: 'session_start',
  SESSION_END: 'session_end',
  SESSION_DEATH: 'session_death',
  MASS_DEATH: 'mass_death',
  // Patrol
  PATROL_STARTED: 'patrol_started',
  PATROL_COMPLETE: 'patrol_complete',
  WORKER_CHECKED: 'worker_checked',
  WORKER_NUDGED: 'worker_nudged',
  // Escalation
  ESCALATION_SENT: 'escalation_sent',
  ESCALATION_ACKED: 'escalation_acked',
  ESCALATION_CLOSED: 'escalation_closed',
  // Merge queue
  MERGE_STARTED: 'merge_started',
  MERGED: 'merged',
  MERGE_FAILED: 'merge_failed',
  MERGE_SKIPPED: 'merge_skipped',
} as const;

export type KnownEventType = typeof EventType[keyof typeof EventType];

export type EventVisibility = 'narrative' | 'audit';

export type EventPayload = Readonly<Record<string, unknown>>;

/**
 * One record of the activity log
 */
export interface ActivityEvent {
  /** RFC 3339 */
  readonly timestamp: Timestamp;
  /** Known types are listed in EventType; others are accepted */
  readonly type: string;
  /** Hierarchical '/'-path of the producer (e.g., gastown/witness) */
  readonly actor: string;
  readonly payload: EventPayload;
  readonly visibility: EventVisibility;
}

// ============================================================================
// Classification
// ============================================================================

export const Significance = {
  NONE: 0,
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
} as const;

export type Significance = typeof Significance[keyof typeof Significance];

/**
 * Event enriched with derived narrative metadata. Derived on read, never
 * persisted.
 */
export interface NarrativeEvent extends ActivityEvent {
  readonly significance: Significance;
  /** Workspace the event relates to, when one can be derived */
  readonly workspace?: string;
  /** Role of the actor; undefined for system actors and unparseable actors */
  readonly role?: AgentKind;
  /** One-line description */
  readonly summary: string;
}
