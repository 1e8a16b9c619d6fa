/**
 * Task Dispatcher Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { DispatchConfig } from '../config/index.js';
import type { Gate, RunState, Task, TaskRunResult } from '../types/index.js';
import { sleep } from '../utils/poll.js';
import {
  TaskDispatcher,
  applyOutcome,
  type TaskRunContext,
  type TaskRunner,
} from './task-dispatcher.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');
const HOUR = 3_600_000;

function task(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    gate: { type: 'cooldown', intervalMs: HOUR },
    parallel: false,
    instructions: `run ${id}`,
    sourcePath: `/tasks/${id}.md`,
    ...overrides,
  };
}

type Behaviour = (task: Task) => Promise<TaskRunResult>;

class ScriptedRunner implements TaskRunner {
  readonly started: string[] = [];
  readonly finished: string[] = [];
  active = 0;
  peak = 0;

  constructor(private readonly behaviour: Behaviour = async () => ({ success: true })) {}

  async run(t: Task, _context: TaskRunContext): Promise<TaskRunResult> {
    this.started.push(t.id);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      return await this.behaviour(t);
    } finally {
      this.active--;
      this.finished.push(t.id);
    }
  }
}

describe('applyOutcome', () => {
  const cooldown: Gate = { type: 'cooldown', intervalMs: HOUR };

  it('advances lastRun and nextEligible on success', () => {
    expect(applyOutcome({ runCount: 2 }, task('a'), true, NOW, 'retry-next-cycle')).toEqual({
      runCount: 3,
      lastResult: 'success',
      lastRun: '2026-03-10T12:00:00.000Z',
      nextEligible: '2026-03-10T13:00:00.000Z',
    });
  });

  it('keeps the previous lastRun on failure under retry-next-cycle', () => {
    const previous: RunState = { runCount: 1, lastRun: '2026-03-09T12:00:00.000Z', lastResult: 'success' };
    expect(applyOutcome(previous, task('a', { gate: cooldown }), false, NOW, 'retry-next-cycle')).toEqual({
      runCount: 2,
      lastResult: 'failure',
      lastRun: '2026-03-09T12:00:00.000Z',
    });
  });

  it('advances nextEligible on failure under respect-interval', () => {
    expect(applyOutcome({ runCount: 0 }, task('a'), false, NOW, 'respect-interval')).toEqual({
      runCount: 1,
      lastResult: 'failure',
      nextEligible: '2026-03-10T13:00:00.000Z',
    });
  });

  it('never moves nextEligible backwards', () => {
    const previous: RunState = { runCount: 4, nextEligible: '2026-03-11T00:00:00.000Z' };
    expect(applyOutcome(previous, task('a'), true, NOW, 'retry-next-cycle').nextEligible).toBe(
      '2026-03-11T00:00:00.000Z'
    );
  });

  it('leaves nextEligible unset for event gates', () => {
    const state = applyOutcome({ runCount: 0 }, task('a', { gate: { type: 'event', trigger: 'heartbeat' } }), true, NOW, 'retry-next-cycle');
    expect(state).toEqual({ runCount: 1, lastResult: 'success', lastRun: '2026-03-10T12:00:00.000Z' });
  });
});

describe('TaskDispatcher', () => {
  let stateDir: string;
  const config: DispatchConfig = { maxParallel: 2, taskTimeoutMs: 0, failurePolicy: 'retry-next-cycle' };

  function dispatcher(runner: TaskRunner, overrides: Partial<DispatchConfig> = {}): TaskDispatcher {
    return new TaskDispatcher({ runner, stateDir, dispatch: { ...config, ...overrides }, now: () => NOW });
  }

  beforeEach(() => {
    stateDir = fs.mkdtempSync(path.join(os.tmpdir(), 'outpost-dispatch-'));
  });

  afterEach(() => {
    fs.rmSync(stateDir, { recursive: true, force: true });
  });

  it('reports an empty batch without running anything', async () => {
    const runner = new ScriptedRunner();
    expect(await dispatcher(runner).dispatch([])).toEqual({ attempted: 0, succeeded: 0, failed: 0, outcomes: [] });
    expect(runner.started).toEqual([]);
  });

  it('runs sequential tasks one at a time in id order', async () => {
    const runner = new ScriptedRunner(async () => {
      await sleep(2);
      return { success: true };
    });

    await dispatcher(runner).dispatch([{ task: task('c') }, { task: task('a') }, { task: task('b') }]);

    expect(runner.started).toEqual(['a', 'b', 'c']);
    expect(runner.finished).toEqual(['a', 'b', 'c']);
    expect(runner.peak).toBe(1);
  });

  it('bounds the parallel group by maxParallel', async () => {
    const runner = new ScriptedRunner(async () => {
      await sleep(5);
      return { success: true };
    });
    const items = ['p1', 'p2', 'p3', 'p4', 'p5'].map(id => ({ task: task(id, { parallel: true }) }));

    const report = await dispatcher(runner).dispatch(items);

    expect(runner.peak).toBe(2);
    expect(report.succeeded).toBe(5);
  });

  it('isolates failing and throwing tasks', async () => {
    const runner = new ScriptedRunner(async t => {
      if (t.id === 'boom') {
        throw new Error('exploded');
      }
      if (t.id === 'bad') {
        return { success: false, error: 'exit 3' };
      }
      return { success: true, output: 'ok' };
    });

    const report = await dispatcher(runner).dispatch([
      { task: task('boom', { parallel: true }) },
      { task: task('good', { parallel: true }) },
      { task: task('bad') },
      { task: task('fine') },
    ]);

    expect(report.attempted).toBe(4);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(2);
    expect(report.outcomes.map(o => [o.taskId, o.success, o.error ?? o.output])).toEqual([
      ['bad', false, 'exit 3'],
      ['boom', false, 'exploded'],
      ['fine', true, 'ok'],
      ['good', true, 'ok'],
    ]);
  });

  it('records a task that outlives its deadline as failed', async () => {
    const runner = new ScriptedRunner(async t => {
      if (t.id === 'slow') {
        await sleep(200);
      }
      return { success: true };
    });

    const report = await dispatcher(runner, { taskTimeoutMs: 20 }).dispatch([
      { task: task('slow', { parallel: true }) },
      { task: task('quick', { parallel: true }) },
    ]);

    expect(report.outcomes.map(o => [o.taskId, o.success, o.error])).toEqual([
      ['quick', true, undefined],
      ['slow', false, 'timed out after 20ms'],
    ]);
  });

  it('persists run state per task after the batch', async () => {
    const runner = new ScriptedRunner(async t => (t.id === 'bad' ? { success: false, error: 'no' } : { success: true }));
    const d = dispatcher(runner);

    await d.dispatch([{ task: task('good') }, { task: task('bad') }]);

    expect(await d.loadRunState('good')).toEqual({
      runCount: 1,
      lastResult: 'success',
      lastRun: '2026-03-10T12:00:00.000Z',
      nextEligible: '2026-03-10T13:00:00.000Z',
    });
    expect(await d.loadRunState('bad')).toEqual({ runCount: 1, lastResult: 'failure' });
    expect(await d.loadRunState('never')).toEqual({ runCount: 0 });
  });

  it('holds a failed task for its interval under respect-interval', async () => {
    const runner = new ScriptedRunner(async () => ({ success: false, error: 'no' }));
    const d = dispatcher(runner, { failurePolicy: 'respect-interval' });

    await d.dispatch([{ task: task('bad') }]);

    expect(await d.loadRunState('bad')).toEqual({
      runCount: 1,
      lastResult: 'failure',
      nextEligible: '2026-03-10T13:00:00.000Z',
    });
  });

  it('passes the batch time and gate reason to the runner', async () => {
    const contexts: TaskRunContext[] = [];
    const runner: TaskRunner = {
      async run(_t, context) {
        contexts.push(context);
        return { success: true };
      },
    };

    await dispatcher(runner).dispatch([{ task: task('a'), reason: 'cooldown elapsed (never run)' }]);

    expect(contexts).toEqual([{ now: NOW, reason: 'cooldown elapsed (never run)' }]);
  });
});
