/**
 * Event Summaries
 *
 * One-line descriptions built from payload fields, one template per event
 * type. A template falls back to a generic phrase when the fields it needs
 * are missing; unknown types summarize as their type name.
 */

import { EventType, type ActivityEvent, type EventPayload } from '../types/index.js';

function str(payload: EventPayload, ...keys: string[]): string {
  for (const key of keys) {
    const value = payload[key];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return '';
}

function int(payload: EventPayload, key: string): number {
  const value = payload[key];
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : 0;
}

function withReason(base: string, reason: string): string {
  return reason ? `${base}: ${reason}` : base;
}

type SummaryTemplate = (payload: EventPayload) => string;

// Payload keys accept their legacy names (bead, polecat, rig) as well
const TEMPLATES: Readonly<Record<string, SummaryTemplate>> = {
  [EventType.SLING]: p => {
    const item = str(p, 'item', 'bead');
    const target = str(p, 'target');
    return item && target ? `Work ${item} slung to ${target}` : 'Work assignment dispatched';
  },
  [EventType.HOOK]: p => {
    const item = str(p, 'item', 'bead');
    return item ? `Hooked work ${item}` : 'Work hooked';
  },
  [EventType.UNHOOK]: p => {
    const item = str(p, 'item', 'bead');
    return item ? `Unhooked work ${item}` : 'Work unhooked';
  },
  [EventType.DONE]: p => {
    const item = str(p, 'item', 'bead');
    return item ? `Completed work ${item}` : 'Work completed';
  },
  [EventType.HANDOFF]: p => {
    const subject = str(p, 'subject');
    return subject ? `Handoff: ${subject}` : 'Session handoff';
  },
  [EventType.MAIL]: p => {
    const to = str(p, 'to');
    const subject = str(p, 'subject');
    return to && subject ? `Mail to ${to}: ${subject}` : 'Mail sent';
  },
  [EventType.NUDGE]: p => {
    const target = str(p, 'target');
    return target ? withReason(`Nudged ${target}`, str(p, 'reason')) : 'Agent nudged';
  },
  [EventType.SPAWN]: p => {
    const worker = str(p, 'worker', 'polecat');
    const workspace = str(p, 'workspace', 'rig');
    return worker && workspace ? `Spawned worker ${worker} in ${workspace}` : 'Worker spawned';
  },
  [EventType.KILL]: p => {
    const target = str(p, 'target');
    return target ? withReason(`Killed ${target}`, str(p, 'reason')) : 'Process killed';
  },
  [EventType.BOOT]: p => {
    const workspace = str(p, 'workspace', 'rig');
    return workspace ? `Booted workspace ${workspace}` : 'Workspace booted';
  },
  [EventType.HALT]: () => 'Services halted',
  [EventType.SESSION_START]: p => {
    const role = str(p, 'role');
    const topic = str(p, 'topic');
    if (!role) return 'Session started';
    return topic ? `${role} session started: ${topic}` : `${role} session started`;
  },
  [EventType.SESSION_END]: p => {
    const role = str(p, 'role');
    return role ? `${role} session ended` : 'Session ended';
  },
  [EventType.SESSION_DEATH]: p => {
    const agent = str(p, 'agent');
    const reason = str(p, 'reason');
    if (!agent) return 'Session died';
    return reason ? `Session died: ${agent} (${reason})` : `Session died: ${agent}`;
  },
  [EventType.MASS_DEATH]: p => {
    const count = int(p, 'count');
    const cause = str(p, 'possible_cause');
    if (count <= 0) return 'Mass death event';
    return cause ? `Mass death: ${count} sessions (${cause})` : `Mass death: ${count} sessions`;
  },
  [EventType.PATROL_STARTED]: p => {
    const count = int(p, 'worker_count') || int(p, 'polecat_count');
    return count > 0 ? `Patrol started (${count} workers)` : 'Patrol started';
  },
  [EventType.PATROL_COMPLETE]: p => {
    const count = int(p, 'worker_count') || int(p, 'polecat_count');
    return count > 0 ? `Patrol complete (${count} workers)` : 'Patrol complete';
  },
  [EventType.WORKER_CHECKED]: p => {
    const worker = str(p, 'worker', 'polecat');
    const status = str(p, 'status');
    return worker && status ? `Checked ${worker}: ${status}` : 'Worker checked';
  },
  [EventType.WORKER_NUDGED]: p => {
    const worker = str(p, 'worker', 'polecat');
    return worker ? `Nudged ${worker}` : 'Worker nudged';
  },
  [EventType.ESCALATION_SENT]: p => {
    const target = str(p, 'target');
    const to = str(p, 'to');
    return target && to ? `Escalated ${target} to ${to}` : 'Escalation sent';
  },
  [EventType.ESCALATION_ACKED]: () => 'Escalation acknowledged',
  [EventType.ESCALATION_CLOSED]: () => 'Escalation closed',
  [EventType.MERGE_STARTED]: p => {
    const worker = str(p, 'worker');
    return worker ? `Merge started for ${worker}` : 'Merge started';
  },
  [EventType.MERGED]: p => {
    const worker = str(p, 'worker');
    return worker ? `Merged work from ${worker}` : 'Work merged';
  },
  [EventType.MERGE_FAILED]: p => {
    const worker = str(p, 'worker');
    return worker ? withReason(`Merge failed for ${worker}`, str(p, 'reason')) : 'Merge failed';
  },
  [EventType.MERGE_SKIPPED]: p => withReason('Merge skipped', str(p, 'reason')),
};

/**
 * One-line description of an event
 */
export function summarizeEvent(event: Pick<ActivityEvent, 'type' | 'payload'>): string {
  const template = Object.prototype.hasOwnProperty.call(TEMPLATES, event.type) ? TEMPLATES[event.type] : undefined;
  return template ? template(event.payload) : event.type;
}
