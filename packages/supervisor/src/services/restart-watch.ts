/**
 * Restart Watch
 *
 * Supervisor self-recovery loop. Watches one inbox for a restart request
 * (a message whose subject matches a pattern, case-insensitively),
 * acknowledges it, waits for the requester's handoff to land and then
 * restarts the target session. The loop never runs two checks at once.
 */

import { errorMessage } from '@outpost/core';
import type { RestartWatchConfig } from '../config/index.js';
import type { SessionDefinitionResolver, SessionLifecycle, StartResult } from '../runtime/index.js';
import { requireAgentAddress, type ReceivedMessage } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/poll.js';

const logger = createLogger('restart-watch');

/**
 * The slice of the mail router the watch needs
 */
export interface RestartMailbox {
  inbox(address: string): Promise<ReceivedMessage[]>;
  acknowledge(messageId: string): Promise<void>;
}

export interface RestartWatchDeps {
  readonly mailbox: RestartMailbox;
  readonly lifecycle: SessionLifecycle;
  readonly definitions: SessionDefinitionResolver;
  readonly config: RestartWatchConfig;
}

export type RestartCheckResult =
  | { readonly triggered: false }
  | {
      readonly triggered: true;
      readonly messageId: string;
      readonly restarted: boolean;
      readonly result?: StartResult;
      readonly error?: string;
    };

export class RestartWatch {
  private readonly pattern: RegExp;
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  private checking: Promise<RestartCheckResult> | undefined;

  constructor(private readonly deps: RestartWatchDeps) {
    this.pattern = new RegExp(deps.config.subjectPattern, 'i');
  }

  /**
   * Looks for one restart request and handles it
   */
  async checkOnce(): Promise<RestartCheckResult> {
    const { mailbox, lifecycle, definitions, config } = this.deps;

    const request = (await mailbox.inbox(config.inboxAddress)).find(message => this.pattern.test(message.subject));
    if (!request) {
      return { triggered: false };
    }

    logger.info(`Found restart request ${request.id} from ${request.from}`);
    await mailbox.acknowledge(request.id);

    if (config.handoffDelayMs > 0) {
      await sleep(config.handoffDelayMs);
    }

    try {
      const result = await lifecycle.restart(definitions(requireAgentAddress(config.targetAddress)));
      logger.info(`Restarted ${result.session.id}`);
      return { triggered: true, messageId: request.id, restarted: true, result };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Restart of ${config.targetAddress} failed: ${message}`);
      return { triggered: true, messageId: request.id, restarted: false, error: message };
    }
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info(`Watching ${this.deps.config.inboxAddress} for restart requests`);
    this.schedule();
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.checking) {
      await this.checking.catch(error => {
        logger.warn(`In-flight check failed during stop: ${errorMessage(error)}`);
      });
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.tick();
    }, this.deps.config.intervalMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.checking = this.checkOnce();
    try {
      await this.checking;
    } catch (error) {
      logger.error(`Restart check failed: ${errorMessage(error)}`);
    } finally {
      this.checking = undefined;
    }
    if (this.running) {
      this.schedule();
    }
  }
}

export function createRestartWatch(deps: RestartWatchDeps): RestartWatch {
  return new RestartWatch(deps);
}
