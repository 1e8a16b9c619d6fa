/**
 * Task Dispatcher
 *
 * Executes the open tasks of one patrol cycle and records their outcomes.
 *
 * - Parallel tasks run through a bounded pool (`maxParallel`, 0 = unbounded).
 * - Sequential tasks run one at a time in lexicographic id order, alongside
 *   the pool.
 * - Both groups are joined before any run state is written.
 * - A failing, throwing or timed-out task is recorded as a failure and never
 *   affects the others.
 *
 * Run state is written once per attempted task after the batch:
 * `runCount` is incremented, `lastResult` set, and on success `lastRun` and
 * `nextEligible` advance. Under the `respect-interval` failure policy a
 * failure advances `nextEligible` as well. `nextEligible` never moves back.
 *
 * @module
 */

import * as path from 'node:path';
import { createTimestamp, errorMessage, parseRfc3339 } from '@outpost/core';
import type { DispatchConfig } from '../config/index.js';
import { KeyedStateStore } from '../storage/index.js';
import {
  runStateCodec,
  type RunState,
  type Task,
  type TaskRunResult,
} from '../types/index.js';
import { mapSettledWithLimit, withTimeout } from '../utils/concurrency.js';
import { createLogger } from '../utils/logger.js';
import { nextEligibleAfterRun } from './gate-evaluator.js';

const logger = createLogger('task-dispatcher');

/** Sub-directory of the state dir holding one run-state record per task */
export const RUN_STATE_DIR = 'run-state';

// ============================================================================
// Types
// ============================================================================

/**
 * What a runner is told about the attempt
 */
export interface TaskRunContext {
  /** Start of the dispatch batch */
  readonly now: Date;
  /** Why the task's gate was open */
  readonly reason?: string;
}

/**
 * Executes one task
 */
export interface TaskRunner {
  run(task: Task, context: TaskRunContext): Promise<TaskRunResult>;
}

/**
 * An open task handed to the dispatcher
 */
export interface DispatchItem {
  readonly task: Task;
  readonly reason?: string;
}

export interface TaskOutcome {
  readonly taskId: string;
  readonly parallel: boolean;
  readonly success: boolean;
  readonly output?: string;
  readonly error?: string;
  readonly durationMs: number;
  /** Run state written after the batch; undefined when the save failed */
  readonly runState?: RunState;
  /** Set when the run state could not be loaded or saved */
  readonly stateError?: string;
}

export interface DispatchReport {
  readonly attempted: number;
  readonly succeeded: number;
  readonly failed: number;
  /** One entry per attempted task, sorted by task id */
  readonly outcomes: readonly TaskOutcome[];
}

export interface TaskDispatcherDeps {
  readonly runner: TaskRunner;
  /** Directory holding run-state records */
  readonly stateDir: string;
  readonly dispatch: DispatchConfig;
  readonly now?: () => Date;
}

interface Execution {
  readonly task: Task;
  readonly result: TaskRunResult;
  readonly durationMs: number;
}

// ============================================================================
// Run State Updates
// ============================================================================

function laterOf(current: string | undefined, candidate: Date | undefined): string | undefined {
  if (candidate === undefined) {
    return current;
  }
  const currentMs = current === undefined ? undefined : parseRfc3339(current);
  if (currentMs !== undefined && currentMs >= candidate.getTime()) {
    return current;
  }
  return createTimestamp(candidate);
}

/**
 * Applies one outcome to a task's run state
 */
export function applyOutcome(
  previous: RunState,
  task: Task,
  success: boolean,
  now: Date,
  failurePolicy: DispatchConfig['failurePolicy']
): RunState {
  const runCount = previous.runCount + 1;
  const advance = success || failurePolicy === 'respect-interval';
  const nextEligible = advance
    ? laterOf(previous.nextEligible, nextEligibleAfterRun(task.gate, now))
    : previous.nextEligible;
  const lastRun = success ? createTimestamp(now) : previous.lastRun;

  return {
    runCount,
    lastResult: success ? 'success' : 'failure',
    ...(lastRun !== undefined ? { lastRun } : {}),
    ...(nextEligible !== undefined ? { nextEligible } : {}),
  };
}

// ============================================================================
// Dispatcher
// ============================================================================

export class TaskDispatcher {
  private readonly store: KeyedStateStore<RunState>;
  private readonly now: () => Date;

  constructor(private readonly deps: TaskDispatcherDeps) {
    this.store = new KeyedStateStore(path.join(deps.stateDir, RUN_STATE_DIR), runStateCodec);
    this.now = deps.now ?? (() => new Date());
  }

  /** Whether a failed run holds its gate until `nextEligible` */
  get holdsFailures(): boolean {
    return this.deps.dispatch.failurePolicy === 'respect-interval';
  }

  /**
   * Run state of one task
   */
  loadRunState(taskId: string): Promise<RunState> {
    return this.store.load(taskId);
  }

  /**
   * Runs every item and records the outcomes
   */
  async dispatch(items: readonly DispatchItem[]): Promise<DispatchReport> {
    if (items.length === 0) {
      return { attempted: 0, succeeded: 0, failed: 0, outcomes: [] };
    }

    const now = this.now();
    const parallel = items.filter(item => item.task.parallel);
    const sequential = items
      .filter(item => !item.task.parallel)
      .sort((a, b) => (a.task.id < b.task.id ? -1 : a.task.id > b.task.id ? 1 : 0));

    logger.info(`Dispatching ${items.length} task(s): ${parallel.length} parallel, ${sequential.length} sequential`);

    const [parallelRuns, sequentialRuns] = await Promise.all([
      this.runParallel(parallel, now),
      this.runSequential(sequential, now),
    ]);

    const executions = [...parallelRuns, ...sequentialRuns].sort((a, b) =>
      a.task.id < b.task.id ? -1 : a.task.id > b.task.id ? 1 : 0
    );

    const outcomes: TaskOutcome[] = [];
    for (const execution of executions) {
      outcomes.push(await this.record(execution, now));
    }

    const succeeded = outcomes.filter(outcome => outcome.success).length;
    const report: DispatchReport = {
      attempted: outcomes.length,
      succeeded,
      failed: outcomes.length - succeeded,
      outcomes,
    };
    logger.info(`Dispatch complete: ${report.succeeded} succeeded, ${report.failed} failed`);
    return report;
  }

  private async runParallel(items: readonly DispatchItem[], now: Date): Promise<Execution[]> {
    const settled = await mapSettledWithLimit(items, this.deps.dispatch.maxParallel, item => this.execute(item, now));
    return settled.map((entry, index) =>
      entry.status === 'fulfilled'
        ? entry.value
        : { task: items[index].task, result: { success: false, error: errorMessage(entry.reason) }, durationMs: 0 }
    );
  }

  private async runSequential(items: readonly DispatchItem[], now: Date): Promise<Execution[]> {
    const executions: Execution[] = [];
    for (const item of items) {
      executions.push(await this.execute(item, now));
    }
    return executions;
  }

  /**
   * Runs one task; never rejects
   */
  private async execute(item: DispatchItem, now: Date): Promise<Execution> {
    const { task } = item;
    const timeoutMs = this.deps.dispatch.taskTimeoutMs;
    const started = Date.now();
    let result: TaskRunResult;

    try {
      result = await withTimeout(
        this.deps.runner.run(task, { now, ...(item.reason !== undefined ? { reason: item.reason } : {}) }),
        timeoutMs,
        () => ({ success: false, error: `timed out after ${timeoutMs}ms` })
      );
    } catch (error) {
      result = { success: false, error: errorMessage(error) };
    }

    const durationMs = Date.now() - started;
    if (result.success) {
      logger.debug(`Task ${task.id} succeeded in ${durationMs}ms`);
    } else {
      logger.warn(`Task ${task.id} failed: ${result.error ?? 'unknown error'}`);
    }
    return { task, result, durationMs };
  }

  private async record(execution: Execution, now: Date): Promise<TaskOutcome> {
    const { task, result, durationMs } = execution;
    const base = {
      taskId: task.id,
      parallel: task.parallel,
      success: result.success,
      durationMs,
      ...(result.output !== undefined ? { output: result.output } : {}),
      ...(result.error !== undefined ? { error: result.error } : {}),
    };

    try {
      const previous = await this.store.load(task.id);
      const runState = applyOutcome(previous, task, result.success, now, this.deps.dispatch.failurePolicy);
      await this.store.save(task.id, runState);
      return { ...base, runState };
    } catch (error) {
      const stateError = errorMessage(error);
      logger.error(`Failed to record run state for ${task.id}: ${stateError}`);
      return { ...base, stateError };
    }
  }
}

export function createTaskDispatcher(deps: TaskDispatcherDeps): TaskDispatcher {
  return new TaskDispatcher(deps);
}
