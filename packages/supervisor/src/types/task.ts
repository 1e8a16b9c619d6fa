/**
 * Task Definitions
 */

import type { Gate } from './gate.js';

/**
 * Task loaded from the task catalog. Instructions are opaque to the
 * supervisor and handed to the executing agent unchanged.
 */
export interface Task {
  /** Unique id; also the run-state key and the sequential ordering key */
  readonly id: string;
  readonly gate: Gate;
  /** Runs in the parallel group when true */
  readonly parallel: boolean;
  readonly instructions: string;
  /** File the task was loaded from */
  readonly sourcePath: string;
  /** Address of the agent responsible for running the task */
  readonly agent?: string;
}

/**
 * Result reported by a task runner
 */
export interface TaskRunResult {
  readonly success: boolean;
  readonly output?: string;
  readonly error?: string;
}
