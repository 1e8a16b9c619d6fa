/**
 * Patrol Loop
 *
 * The coordinator cycle of the supervisor:
 *
 *   load tasks -> collect triggers -> evaluate gates -> dispatch -> persist
 *
 * One cycle runs to completion before the next begins; a cycle requested
 * while another is in flight shares the in-flight result. `start()` runs
 * cycles on a self-rescheduling timer whose delay doubles (capped at
 * `maxIntervalMs`) while the fleet has been idle longer than
 * `idleThresholdMs`.
 *
 * @module
 */

import { errorMessage } from '@outpost/core';
import type { PatrolConfig } from '../config/index.js';
import type { EventSink } from '../events/index.js';
import { createEvent } from '../events/index.js';
import { EventType, type GateContext, type GateDecision, type RunState, type Task } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { ActivitySignal } from './activity-signal.js';
import type { ConditionProbe } from './condition-probe.js';
import { evaluateGate, isHeld } from './gate-evaluator.js';
import { loadTasks } from './task-catalog.js';
import type { DispatchItem, DispatchReport, TaskDispatcher } from './task-dispatcher.js';
import type { TriggerSource } from './trigger-source.js';

const logger = createLogger('patrol-loop');

// ============================================================================
// Types
// ============================================================================

export interface SkippedTask {
  readonly id: string;
  readonly reason: string;
  readonly error?: string;
}

export interface PatrolCycleReport {
  readonly startedAt: Date;
  /** Number of tasks whose gate was evaluated */
  readonly evaluated: number;
  /** Ids of the tasks whose gate was open */
  readonly open: readonly string[];
  readonly skipped: readonly SkippedTask[];
  readonly dispatch: DispatchReport;
}

export interface PatrolLoopDeps {
  readonly tasksDir: string;
  readonly patrol: PatrolConfig;
  readonly dispatcher: TaskDispatcher;
  readonly triggers: TriggerSource;
  readonly probe: ConditionProbe;
  /** Actor recorded on patrol events */
  readonly actor: string;
  readonly events?: EventSink;
  /** Enables idle backoff when given */
  readonly activity?: ActivitySignal;
  readonly now?: () => Date;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Delay before the next cycle: the base interval while the fleet is active,
 * doubling per idle cycle up to the cap while it is not.
 */
export function nextPatrolDelay(patrol: PatrolConfig, previousDelayMs: number, idleMs: number): number {
  if (idleMs <= patrol.idleThresholdMs) {
    return patrol.intervalMs;
  }
  return Math.min(Math.max(previousDelayMs, patrol.intervalMs) * 2, patrol.maxIntervalMs);
}

function eventTriggers(tasks: readonly Task[]): string[] {
  const triggers: string[] = [];
  for (const task of tasks) {
    if (task.gate.type === 'event') {
      triggers.push(task.gate.trigger);
    }
  }
  return triggers;
}

// ============================================================================
// Loop
// ============================================================================

export class PatrolLoop {
  private readonly now: () => Date;
  private inFlight: Promise<PatrolCycleReport> | undefined;
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  private delayMs: number;

  constructor(private readonly deps: PatrolLoopDeps) {
    this.now = deps.now ?? (() => new Date());
    this.delayMs = deps.patrol.intervalMs;
  }

  // ----------------------------------------
  // Cycle
  // ----------------------------------------

  /**
   * Runs one cycle, or joins the one already in flight
   */
  runCycle(): Promise<PatrolCycleReport> {
    if (this.inFlight) {
      logger.debug('Cycle already in flight; joining it');
      return this.inFlight;
    }
    const cycle = this.cycle().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async cycle(): Promise<PatrolCycleReport> {
    const startedAt = this.now();
    const tasks = await loadTasks(this.deps.tasksDir);
    await this.emit(EventType.PATROL_STARTED, { task_count: tasks.length });

    const pendingTriggers = await this.deps.triggers.collect(eventTriggers(tasks));
    const open: DispatchItem[] = [];
    const skipped: SkippedTask[] = [];

    for (const task of tasks) {
      const decision = await this.evaluate(task, pendingTriggers, startedAt);
      if (decision.open) {
        logger.debug(`Gate open for ${task.id}: ${decision.reason}`);
        open.push({ task, reason: decision.reason });
      } else {
        if (decision.error !== undefined) {
          logger.warn(`Skipping ${task.id}: ${decision.reason} (${decision.error})`);
        } else {
          logger.debug(`Gate closed for ${task.id}: ${decision.reason}`);
        }
        skipped.push({
          id: task.id,
          reason: decision.reason,
          ...(decision.error !== undefined ? { error: decision.error } : {}),
        });
      }
    }

    const dispatch = await this.deps.dispatcher.dispatch(open);
    await this.emit(EventType.PATROL_COMPLETE, {
      task_count: tasks.length,
      open_count: open.length,
      succeeded: dispatch.succeeded,
      failed: dispatch.failed,
    });

    logger.info(`Patrol cycle: ${tasks.length} evaluated, ${open.length} open, ${dispatch.failed} failed`);
    return {
      startedAt,
      evaluated: tasks.length,
      open: open.map(item => item.task.id),
      skipped,
      dispatch,
    };
  }

  private async evaluate(task: Task, pendingTriggers: ReadonlySet<string>, now: Date): Promise<GateDecision> {
    let runState: RunState;
    try {
      runState = await this.deps.dispatcher.loadRunState(task.id);
    } catch (error) {
      return { open: false, reason: 'run state unavailable', error: errorMessage(error) };
    }

    const holdFailures = this.deps.dispatcher.holdsFailures;
    let context: GateContext = { now, pendingTriggers, holdFailures };
    // No probe while a failure hold keeps the gate shut anyway
    if (task.gate.type === 'condition' && !(holdFailures && isHeld(runState, now))) {
      const result = await this.deps.probe.run(task.gate.check);
      context = result.ok
        ? { ...context, probeOutput: result.output }
        : { ...context, probeError: result.error };
    }
    return evaluateGate(task.gate, runState, context);
  }

  private async emit(type: string, payload: Record<string, unknown>): Promise<void> {
    if (!this.deps.events) {
      return;
    }
    try {
      await this.deps.events.append(createEvent(type, this.deps.actor, payload, 'audit', this.now()));
    } catch (error) {
      logger.warn(`Failed to record ${type} event: ${errorMessage(error)}`);
    }
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  /**
   * Runs a cycle now and keeps running them until `stop()`
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.delayMs = this.deps.patrol.intervalMs;
    logger.info(`Patrol started (interval ${this.deps.patrol.intervalMs}ms)`);
    this.schedule(0);
  }

  /**
   * Stops scheduling and waits for the in-flight cycle
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      try {
        await this.inFlight;
      } catch (error) {
        logger.warn(`In-flight cycle failed during stop: ${errorMessage(error)}`);
      }
    }
    logger.info('Patrol stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Delay the next scheduled cycle will wait */
  get currentDelayMs(): number {
    return this.delayMs;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) {
      return;
    }
    try {
      await this.runCycle();
    } catch (error) {
      logger.error(`Patrol cycle error: ${errorMessage(error)}`);
    }
    if (!this.running) {
      return;
    }
    const idleMs = this.deps.activity ? await this.deps.activity.age(this.now()) : 0;
    this.delayMs = nextPatrolDelay(this.deps.patrol, this.delayMs, idleMs);
    if (this.delayMs > this.deps.patrol.intervalMs) {
      logger.debug(`Fleet idle for ${idleMs}ms; next cycle in ${this.delayMs}ms`);
    }
    this.schedule(this.delayMs);
  }
}

export function createPatrolLoop(deps: PatrolLoopDeps): PatrolLoop {
  return new PatrolLoop(deps);
}
