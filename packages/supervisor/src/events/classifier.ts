/**
 * Event Classifier
 *
 * Assigns each activity record a narrative significance and derives its
 * workspace, actor role and one-line summary. Audit records are never
 * narrative material and always classify to NONE.
 */

import {
  EventType,
  Significance,
  type ActivityEvent,
  type AgentKind,
  type NarrativeEvent,
} from '../types/index.js';
import { summarizeEvent } from './summary.js';

// ============================================================================
// Significance
// ============================================================================

const SIGNIFICANCE_BY_TYPE: Readonly<Record<string, Significance>> = {
  // Lifecycle-defining
  [EventType.SLING]: Significance.HIGH,
  [EventType.DONE]: Significance.HIGH,
  [EventType.HANDOFF]: Significance.HIGH,
  [EventType.MERGED]: Significance.HIGH,
  [EventType.MERGE_FAILED]: Significance.HIGH,
  [EventType.SPAWN]: Significance.HIGH,
  [EventType.KILL]: Significance.HIGH,
  [EventType.MASS_DEATH]: Significance.HIGH,
  [EventType.BOOT]: Significance.HIGH,
  [EventType.HALT]: Significance.HIGH,

  // Routine coordination
  [EventType.HOOK]: Significance.MEDIUM,
  [EventType.UNHOOK]: Significance.MEDIUM,
  [EventType.MAIL]: Significance.MEDIUM,
  [EventType.NUDGE]: Significance.MEDIUM,
  [EventType.SESSION_DEATH]: Significance.MEDIUM,
  [EventType.ESCALATION_SENT]: Significance.MEDIUM,
  [EventType.ESCALATION_ACKED]: Significance.MEDIUM,
  [EventType.ESCALATION_CLOSED]: Significance.MEDIUM,
  [EventType.MERGE_STARTED]: Significance.MEDIUM,
  [EventType.MERGE_SKIPPED]: Significance.MEDIUM,

  // Background telemetry
  [EventType.SESSION_START]: Significance.LOW,
  [EventType.SESSION_END]: Significance.LOW,
  [EventType.PATROL_STARTED]: Significance.LOW,
  [EventType.PATROL_COMPLETE]: Significance.LOW,
  [EventType.WORKER_CHECKED]: Significance.LOW,
  [EventType.WORKER_NUDGED]: Significance.LOW,
};

/**
 * Narrative significance of an event. Unknown types are LOW, never dropped.
 */
export function classifySignificance(event: Pick<ActivityEvent, 'type' | 'visibility'>): Significance {
  if (event.visibility === 'audit') {
    return Significance.NONE;
  }
  return Object.prototype.hasOwnProperty.call(SIGNIFICANCE_BY_TYPE, event.type)
    ? SIGNIFICANCE_BY_TYPE[event.type]
    : Significance.LOW;
}

// ============================================================================
// Derivation
// ============================================================================

export interface ClassifierOptions {
  /** Actors that belong to no workspace and have no role (e.g., 'gt') */
  readonly systemActors: readonly string[];
}

/** Town-level actors that never name a workspace */
const TOWN_LEVEL_ACTORS = new Set(['mayor', 'deacon', 'narrator']);

function payloadString(event: ActivityEvent, key: string): string | undefined {
  const value = event.payload[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Workspace an event relates to: the payload's `workspace` (or legacy
 * `rig`) field, else the leading segment of a workspace-level actor
 */
export function deriveWorkspace(event: ActivityEvent, options: ClassifierOptions): string | undefined {
  const fromPayload = payloadString(event, 'workspace') ?? payloadString(event, 'rig');
  if (fromPayload !== undefined) {
    return fromPayload;
  }

  const first = event.actor.split('/')[0];
  if (first === '' || TOWN_LEVEL_ACTORS.has(first) || options.systemActors.includes(first)) {
    return undefined;
  }
  return first;
}

/** Named roles recognised in the second segment of a workspace-level actor */
const WORKSPACE_ROLES: Readonly<Record<string, AgentKind>> = {
  witness: 'witness',
  refinery: 'refinery',
  narrator: 'narrator',
  workers: 'worker',
  polecats: 'worker',
  crew: 'human',
};

/**
 * Role of an actor, matched on its path segments. Actors are free-form
 * paths rather than mail addresses, so any workspace-level actor whose
 * second segment is not a named role counts as a worker.
 */
export function deriveRole(actor: string, options: ClassifierOptions): AgentKind | undefined {
  const path = actor.endsWith('/') ? actor.slice(0, -1) : actor;
  if (path === '' || options.systemActors.includes(path)) {
    return undefined;
  }

  const segments = path.split('/');
  if (segments.length === 1) {
    switch (segments[0]) {
      case 'mayor':
        return 'mayor';
      case 'deacon':
        return 'deacon';
      case 'narrator':
        return 'narrator';
      default:
        return undefined;
    }
  }

  const second = segments[1];
  return Object.prototype.hasOwnProperty.call(WORKSPACE_ROLES, second) ? WORKSPACE_ROLES[second] : 'worker';
}

/**
 * Enriches a record with significance, workspace, role and summary
 */
export function classifyEvent(event: ActivityEvent, options: ClassifierOptions): NarrativeEvent {
  const workspace = deriveWorkspace(event, options);
  const role = deriveRole(event.actor, options);
  return {
    ...event,
    significance: classifySignificance(event),
    summary: summarizeEvent(event),
    ...(workspace !== undefined ? { workspace } : {}),
    ...(role !== undefined ? { role } : {}),
  };
}
