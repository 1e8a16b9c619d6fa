/**
 * Session Lifecycle Manager
 *
 * State machine for supervised agent sessions:
 *
 *   stopped  -> starting
 *   starting -> running | stopped
 *   running  -> stopped | zombie | paused
 *   paused   -> running | stopped | zombie
 *   zombie   -> starting | stopped
 *
 * Every completed transition is persisted before control returns. A zombie
 * is a container whose worker process has died; starting one kills the
 * container first. Readiness and exit waits go through `pollUntil`.
 *
 * Operations that change a session run one at a time per session id and
 * read the persisted record only once they hold that session's turn.
 *
 * @module
 */

import * as path from 'node:path';
import {
  alreadyRunning,
  createTimestamp,
  errorMessage,
  invalidTransition,
  notRunning,
  readyTimeout,
  sessionCreateFailed,
  sessionKillFailed,
  sessionPaused,
  toError,
} from '@outpost/core';
import type { LifecycleConfig } from '../config/index.js';
import type { SessionController } from '../providers/index.js';
import { KeyedStateStore } from '../storage/index.js';
import type { EventSink } from '../events/index.js';
import { createEvent } from '../events/index.js';
import {
  EventType,
  SessionState,
  canTransition,
  formatIdentity,
  requireAgentAddress,
  sessionCodec,
  sessionIdFor,
  type AgentIdentity,
  type AgentSession,
  type SessionDefinition,
  type SessionStatus,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { pollUntil } from '../utils/poll.js';
import { runAuxiliaryActions, type AuxiliaryAction, type AuxiliaryResult } from './auxiliary-actions.js';

const logger = createLogger('session-lifecycle');

/** Sub-directory of the state dir holding one record per session */
export const SESSIONS_DIR = 'sessions';

// ============================================================================
// Types
// ============================================================================

export interface SessionLifecycleDeps {
  readonly controller: SessionController;
  /** Directory holding session records */
  readonly stateDir: string;
  readonly sessionPrefix: string;
  readonly lifecycle: LifecycleConfig;
  /** Actor recorded on the lifecycle's own activity events */
  readonly actor: string;
  /** Receives session_start, session_end and session_death events */
  readonly events?: EventSink;
  /** Clock (default: system time) */
  readonly now?: () => Date;
}

export interface StartResult {
  readonly session: AgentSession;
  /** Whether a zombie container was killed first */
  readonly recoveredZombie: boolean;
  readonly auxiliary: readonly AuxiliaryResult[];
}

export interface StopResult {
  readonly session: AgentSession;
  /** Whether the worker exited within the grace period */
  readonly exitedGracefully: boolean;
  readonly auxiliary: readonly AuxiliaryResult[];
}

export type HealthAction = 'none' | 'marked-zombie' | 'marked-stopped';

export interface HealthReport {
  readonly session: AgentSession;
  readonly hasSession: boolean;
  readonly workerAlive: boolean;
  readonly action: HealthAction;
}

/** A session is addressed by identity or by agent address */
export type SessionTarget = AgentIdentity | string;

// ============================================================================
// Manager
// ============================================================================

export class SessionLifecycle {
  private readonly now: () => Date;
  /** Tail of the operation chain per session id */
  private readonly lifecycleLocks = new Map<string, Promise<void>>();

  constructor(private readonly deps: SessionLifecycleDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  // --------------------------------------------------------------------------
  // Identity and persistence
  // --------------------------------------------------------------------------

  /**
   * Session id of a target
   */
  sessionId(target: SessionTarget): string {
    return sessionIdFor(this.identity(target), this.deps.sessionPrefix);
  }

  private identity(target: SessionTarget): AgentIdentity {
    return typeof target === 'string' ? requireAgentAddress(target) : target;
  }

  private store(identity: AgentIdentity): KeyedStateStore<AgentSession> {
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    return new KeyedStateStore(
      path.join(this.deps.stateDir, SESSIONS_DIR),
      sessionCodec(id, identity, formatIdentity(identity))
    );
  }

  private load(identity: AgentIdentity): Promise<AgentSession> {
    return this.store(identity).load(sessionIdFor(identity, this.deps.sessionPrefix));
  }

  /**
   * Moves a session along one edge and persists the result
   */
  private async transition(
    identity: AgentIdentity,
    session: AgentSession,
    to: SessionState,
    extra: Partial<Pick<AgentSession, 'startedAt'>> = {}
  ): Promise<AgentSession> {
    if (!canTransition(session.state, to)) {
      throw invalidTransition(session.id, session.state, to);
    }
    const next: AgentSession = { ...session, ...extra, state: to, updatedAt: createTimestamp(this.now()) };
    await this.store(identity).save(session.id, next);
    logger.debug(`${session.id}: ${session.state} -> ${to}`);
    return next;
  }

  private async emit(type: string, identity: AgentIdentity, payload: Record<string, unknown>): Promise<void> {
    if (!this.deps.events) {
      return;
    }
    try {
      await this.deps.events.append(createEvent(type, this.deps.actor, {
        agent: formatIdentity(identity),
        role: identity.kind,
        ...payload,
      }, 'narrative', this.now()));
    } catch (error) {
      logger.warn(`Failed to record ${type} event: ${errorMessage(error)}`);
    }
  }

  /**
   * Runs `work` after every operation already queued for the session
   */
  private exclusive<T>(id: string, work: () => Promise<T>): Promise<T> {
    const previous = this.lifecycleLocks.get(id) ?? Promise.resolve();
    const result = previous.then(work);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.lifecycleLocks.set(id, tail);
    void tail.then(() => {
      if (this.lifecycleLocks.get(id) === tail) {
        this.lifecycleLocks.delete(id);
      }
    });
    return result;
  }

  private async kill(id: string): Promise<void> {
    try {
      await this.deps.controller.killSession(id);
    } catch (error) {
      throw sessionKillFailed(id, toError(error));
    }
  }

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  /**
   * Starts a session
   *
   * @throws ConflictError ALREADY_RUNNING when the worker is alive (no side effects)
   * @throws InfrastructureError SESSION_CREATE_FAILED or READY_TIMEOUT
   */
  start(definition: SessionDefinition): Promise<StartResult> {
    return this.exclusive(this.sessionId(definition.identity), () => this.startSession(definition));
  }

  private async startSession(definition: SessionDefinition): Promise<StartResult> {
    const identity = definition.identity;
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    const { controller, lifecycle } = this.deps;

    const exists = await controller.hasSession(id);
    let recoveredZombie = false;
    let session = await this.load(identity);

    if (exists) {
      if (await controller.isWorkerAlive(id)) {
        throw alreadyRunning(id);
      }
      logger.warn(`${id} is a zombie (container alive, worker dead); killing before restart`);
      if (session.state === SessionState.RUNNING || session.state === SessionState.PAUSED) {
        session = await this.transition(identity, session, SessionState.ZOMBIE);
      } else if (session.state === SessionState.STARTING) {
        session = await this.transition(identity, session, SessionState.STOPPED);
      }
      await this.kill(id);
      recoveredZombie = true;
    } else if (session.state !== SessionState.STOPPED && session.state !== SessionState.ZOMBIE) {
      // Persisted state outlived its container
      session = await this.transition(identity, session, SessionState.STOPPED);
    }

    session = await this.transition(identity, session, SessionState.STARTING);

    try {
      await controller.createSession(id, definition.workDir, definition.command);
    } catch (error) {
      logger.error(`Failed to create ${id}: ${errorMessage(error)}`);
      await this.transition(identity, session, SessionState.STOPPED);
      throw sessionCreateFailed(id, toError(error));
    }

    const setup: AuxiliaryAction[] = Object.entries(definition.env ?? {}).map(([key, value]) => ({
      name: `env ${key}`,
      run: () => controller.setEnv(id, key, value),
    }));
    if (definition.theme !== undefined) {
      const theme = definition.theme;
      setup.push({ name: 'theme', run: () => controller.configureSession(id, theme) });
    }
    const auxiliary = await runAuxiliaryActions(setup, logger, id);

    const ready = await pollUntil(() => controller.isWorkerAlive(id), {
      timeoutMs: lifecycle.readyTimeoutMs,
      initialDelayMs: lifecycle.pollInitialMs,
      maxDelayMs: lifecycle.pollMaxMs,
    });
    if (!ready.satisfied) {
      logger.error(`${id} did not become ready within ${lifecycle.readyTimeoutMs}ms; tearing down`);
      try {
        await controller.killSession(id);
      } catch (error) {
        logger.warn(`Teardown of ${id} failed: ${errorMessage(error)}`);
      }
      await this.transition(identity, session, SessionState.STOPPED);
      throw readyTimeout(id, lifecycle.readyTimeoutMs);
    }

    session = await this.transition(identity, session, SessionState.RUNNING, {
      startedAt: createTimestamp(this.now()),
    });

    const followUp: AuxiliaryAction[] = [];
    if (definition.startupMessage !== undefined) {
      const text = definition.startupMessage;
      followUp.push({ name: 'startup notification', delayMs: lifecycle.settleDelayMs, run: () => controller.sendKeys(id, text) });
    }
    if (definition.activationSignal !== undefined) {
      const text = definition.activationSignal;
      followUp.push({ name: 'activation signal', delayMs: lifecycle.settleDelayMs, run: () => controller.sendKeys(id, text) });
    }
    auxiliary.push(...(await runAuxiliaryActions(followUp, logger, id)));

    logger.info(`Started ${id}${recoveredZombie ? ' (replaced zombie)' : ''}`);
    await this.emit(EventType.SESSION_START, identity, { session: id });
    return { session, recoveredZombie, auxiliary };
  }

  /**
   * Stops a session: interrupt, wait up to the grace period, then kill
   *
   * @throws ConflictError NOT_RUNNING when there is no container
   */
  stop(target: SessionTarget): Promise<StopResult> {
    const identity = this.identity(target);
    return this.exclusive(this.sessionId(identity), () => this.stopSession(identity));
  }

  private async stopSession(identity: AgentIdentity): Promise<StopResult> {
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    const { controller, lifecycle } = this.deps;
    let session = await this.load(identity);

    if (!(await controller.hasSession(id))) {
      if (session.state !== SessionState.STOPPED) {
        await this.transition(identity, session, SessionState.STOPPED);
      }
      throw notRunning(id);
    }

    const auxiliary = await runAuxiliaryActions(
      [{ name: 'interrupt', run: () => controller.sendInterrupt(id) }],
      logger,
      id
    );

    const exited = await pollUntil(async () => !(await controller.isWorkerAlive(id)), {
      timeoutMs: lifecycle.stopGraceMs,
      initialDelayMs: lifecycle.pollInitialMs,
      maxDelayMs: lifecycle.pollMaxMs,
    });
    if (!exited.satisfied) {
      logger.debug(`${id} still running after ${lifecycle.stopGraceMs}ms; killing`);
    }

    await this.kill(id);
    if (session.state !== SessionState.STOPPED) {
      session = await this.transition(identity, session, SessionState.STOPPED);
    }

    logger.info(`Stopped ${id}`);
    await this.emit(EventType.SESSION_END, identity, { session: id });
    return { session, exitedGracefully: exited.satisfied, auxiliary };
  }

  /**
   * Stop (errors logged) followed by start
   */
  restart(definition: SessionDefinition): Promise<StartResult> {
    const id = this.sessionId(definition.identity);
    return this.exclusive(id, async () => {
      try {
        await this.stopSession(definition.identity);
      } catch (error) {
        logger.warn(`Stop before restart of ${id} failed: ${errorMessage(error)}`);
      }
      return this.startSession(definition);
    });
  }

  /**
   * Persisted record plus live container info. Never changes state.
   */
  async status(target: SessionTarget): Promise<SessionStatus> {
    const identity = this.identity(target);
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    const session = await this.load(identity);
    try {
      const hasSession = await this.deps.controller.hasSession(id);
      const workerAlive = hasSession ? await this.deps.controller.isWorkerAlive(id) : false;
      return { session, live: { hasSession, workerAlive } };
    } catch (error) {
      logger.debug(`Live status of ${id} unavailable: ${errorMessage(error)}`);
      return { session };
    }
  }

  /**
   * Reconciles the persisted state with what the controller reports:
   * a dead worker in a live container becomes a zombie, a vanished
   * container becomes stopped.
   */
  checkHealth(target: SessionTarget): Promise<HealthReport> {
    const identity = this.identity(target);
    return this.exclusive(this.sessionId(identity), () => this.reconcile(identity));
  }

  private async reconcile(identity: AgentIdentity): Promise<HealthReport> {
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    let session = await this.load(identity);

    const hasSession = await this.deps.controller.hasSession(id);
    const workerAlive = hasSession ? await this.deps.controller.isWorkerAlive(id) : false;
    let action: HealthAction = 'none';

    if (hasSession && !workerAlive && (session.state === SessionState.RUNNING || session.state === SessionState.PAUSED)) {
      session = await this.transition(identity, session, SessionState.ZOMBIE);
      action = 'marked-zombie';
      logger.warn(`${id} worker died; session marked zombie`);
      await this.emit(EventType.SESSION_DEATH, identity, { session: id, reason: 'worker exited' });
    } else if (!hasSession && session.state !== SessionState.STOPPED) {
      session = await this.transition(identity, session, SessionState.STOPPED);
      action = 'marked-stopped';
      logger.warn(`${id} container is gone; session marked stopped`);
      await this.emit(EventType.SESSION_DEATH, identity, { session: id, reason: 'container gone' });
    }

    return { session, hasSession, workerAlive, action };
  }

  /**
   * Marks a running session paused; paused sessions receive no work
   *
   * @throws ConflictError NOT_RUNNING without a container, INVALID_TRANSITION unless running
   */
  pause(target: SessionTarget): Promise<AgentSession> {
    const identity = this.identity(target);
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    return this.exclusive(id, async () => {
      if (!(await this.deps.controller.hasSession(id))) {
        throw notRunning(id);
      }
      const session = await this.transition(identity, await this.load(identity), SessionState.PAUSED);
      logger.info(`Paused ${id}`);
      return session;
    });
  }

  /**
   * Returns a paused session to running
   *
   * @throws ConflictError NOT_RUNNING without a container, INVALID_TRANSITION unless paused
   */
  resume(target: SessionTarget): Promise<AgentSession> {
    const identity = this.identity(target);
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    return this.exclusive(id, async () => {
      if (!(await this.deps.controller.hasSession(id))) {
        throw notRunning(id);
      }
      const session = await this.load(identity);
      if (session.state !== SessionState.PAUSED) {
        throw invalidTransition(id, session.state, SessionState.RUNNING);
      }
      const resumed = await this.transition(identity, session, SessionState.RUNNING);
      logger.info(`Resumed ${id}`);
      return resumed;
    });
  }

  /**
   * Makes sure the session can take work: starts it when no live worker
   * exists, refuses a paused session. A caller arriving while a start is
   * under way waits for it and then finds the session running.
   *
   * @throws ConflictError SESSION_PAUSED
   */
  ensureRunning(definition: SessionDefinition): Promise<AgentSession> {
    const identity = definition.identity;
    const id = sessionIdFor(identity, this.deps.sessionPrefix);
    return this.exclusive(id, async () => {
      const session = await this.load(identity);
      if (session.state === SessionState.PAUSED) {
        throw sessionPaused(id);
      }

      const hasSession = await this.deps.controller.hasSession(id);
      if (hasSession && (await this.deps.controller.isWorkerAlive(id))) {
        return session;
      }
      return (await this.startSession(definition)).session;
    });
  }
}

export function createSessionLifecycle(deps: SessionLifecycleDeps): SessionLifecycle {
  return new SessionLifecycle(deps);
}
