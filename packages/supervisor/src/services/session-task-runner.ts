/**
 * Session Task Runner
 *
 * Default TaskRunner: hands a task's instructions to the session of the
 * agent responsible for it, starting that session first when needed.
 * Tasks without an `agent` go to the fallback agent.
 */

import { errorMessage } from '@outpost/core';
import type { SessionController } from '../providers/index.js';
import type { SessionDefinitionResolver, SessionLifecycle } from '../runtime/index.js';
import { parseAgentAddress, type Task, type TaskRunResult } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { TaskRunContext, TaskRunner } from './task-dispatcher.js';

const logger = createLogger('session-task-runner');

/** Agent that runs tasks naming no agent of their own */
export const DEFAULT_TASK_AGENT = 'deacon/';

export interface SessionTaskRunnerDeps {
  readonly lifecycle: SessionLifecycle;
  readonly controller: SessionController;
  readonly definitions: SessionDefinitionResolver;
  /** Address used for tasks without an agent (default deacon/) */
  readonly fallbackAgent?: string;
}

export class SessionTaskRunner implements TaskRunner {
  constructor(private readonly deps: SessionTaskRunnerDeps) {}

  async run(task: Task, _context: TaskRunContext): Promise<TaskRunResult> {
    const address = task.agent ?? this.deps.fallbackAgent ?? DEFAULT_TASK_AGENT;
    const identity = parseAgentAddress(address);
    if (!identity) {
      return { success: false, error: `invalid agent address '${address}'` };
    }

    let sessionId: string;
    try {
      const session = await this.deps.lifecycle.ensureRunning(this.deps.definitions(identity));
      sessionId = session.id;
    } catch (error) {
      return { success: false, error: `session unavailable: ${errorMessage(error)}` };
    }

    try {
      await this.deps.controller.sendKeys(sessionId, task.instructions);
    } catch (error) {
      return { success: false, error: `failed to deliver instructions to ${sessionId}: ${errorMessage(error)}` };
    }

    logger.debug(`Task ${task.id} handed to ${sessionId}`);
    return { success: true, output: `delivered to ${sessionId}` };
  }
}

export function createSessionTaskRunner(deps: SessionTaskRunnerDeps): SessionTaskRunner {
  return new SessionTaskRunner(deps);
}
