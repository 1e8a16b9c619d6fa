/**
 * Agent Session Types
 */

import { isValidTimestamp, type Timestamp } from '@outpost/core';
import type { StateCodec } from '../storage/index.js';
import { AGENT_KINDS, parseAgentAddress, type AgentIdentity } from './agent-identity.js';

// ============================================================================
// States
// ============================================================================

export const SessionState = {
  STOPPED: 'stopped',
  STARTING: 'starting',
  RUNNING: 'running',
  PAUSED: 'paused',
  /** Container alive, worker process gone */
  ZOMBIE: 'zombie',
} as const;

export type SessionState = typeof SessionState[keyof typeof SessionState];

export function isSessionState(value: unknown): value is SessionState {
  return (
    value === 'stopped' ||
    value === 'starting' ||
    value === 'running' ||
    value === 'paused' ||
    value === 'zombie'
  );
}

/**
 * Legal lifecycle edges. Anything else is an invalid transition.
 */
export const SESSION_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  stopped: ['starting'],
  starting: ['running', 'stopped'],
  running: ['stopped', 'zombie', 'paused'],
  paused: ['running', 'stopped', 'zombie'],
  zombie: ['starting', 'stopped'],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return SESSION_TRANSITIONS[from].includes(to);
}

// ============================================================================
// Records
// ============================================================================

/**
 * Persisted state of one supervised session
 */
export interface AgentSession {
  /** Terminal session id (e.g., gt-gastown-toast) */
  readonly id: string;
  /** Canonical address of the agent (e.g., gastown/toast) */
  readonly address: string;
  readonly role: AgentIdentity['kind'];
  readonly state: SessionState;
  readonly startedAt?: Timestamp;
  readonly updatedAt?: Timestamp;
}

/**
 * What the lifecycle manager needs to start a session
 */
export interface SessionDefinition {
  readonly identity: AgentIdentity;
  /** Working directory of the container */
  readonly workDir: string;
  /** Initial command run in the container */
  readonly command: string;
  /** Session-scoped environment */
  readonly env?: Readonly<Record<string, string>>;
  /** Cosmetic theme name handed to the controller */
  readonly theme?: string;
  /** Text sent once the worker is ready */
  readonly startupMessage?: string;
  /** Keystrokes sent after the startup message to begin work */
  readonly activationSignal?: string;
}

/**
 * Persisted state plus what the controller reports right now
 */
export interface SessionStatus {
  readonly session: AgentSession;
  /** Undefined when the controller could not be asked */
  readonly live?: {
    readonly hasSession: boolean;
    readonly workerAlive: boolean;
  };
}

/**
 * Session record before a session was ever started
 */
export function defaultSession(id: string, identity: AgentIdentity, address: string): AgentSession {
  return { id, address, role: identity.kind, state: SessionState.STOPPED };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAgentKind(value: unknown): value is AgentIdentity['kind'] {
  return AGENT_KINDS.some(kind => kind === value);
}

function optionalTimestamp(value: unknown): value is Timestamp | undefined {
  return value === undefined || isValidTimestamp(value);
}

/**
 * Validates a parsed session record
 */
export function decodeSession(raw: unknown): AgentSession | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { id, address, role, state, startedAt, updatedAt } = raw;
  if (typeof id !== 'string' || typeof address !== 'string' || !parseAgentAddress(address)) {
    return undefined;
  }
  if (!isAgentKind(role) || !isSessionState(state)) {
    return undefined;
  }
  if (!optionalTimestamp(startedAt) || !optionalTimestamp(updatedAt)) {
    return undefined;
  }
  return {
    id,
    address,
    role,
    state,
    ...(startedAt !== undefined ? { startedAt } : {}),
    ...(updatedAt !== undefined ? { updatedAt } : {}),
  };
}

/**
 * Codec for the session record of one identity. Missing records default to
 * a stopped session for that identity.
 */
export function sessionCodec(id: string, identity: AgentIdentity, address: string): StateCodec<AgentSession> {
  return {
    defaults: () => defaultSession(id, identity, address),
    decode: decodeSession,
  };
}
