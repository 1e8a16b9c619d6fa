/**
 * Trigger Source
 *
 * Computes the set of event triggers pending for one patrol cycle:
 * `startup` on the first collection of the process, `heartbeat` on every
 * collection, and `mail:<address>` whenever that inbox holds mail.
 */

import { errorMessage } from '@outpost/core';
import { createLogger } from '../utils/logger.js';
import { mailTriggerAddress } from './gate-parser.js';

const logger = createLogger('trigger-source');

/**
 * The slice of the mail router the trigger source needs
 */
export interface MailboxProbe {
  hasMail(address: string): Promise<boolean>;
}

export class TriggerSource {
  private startupFired = false;

  constructor(private readonly mailbox: MailboxProbe) {}

  /**
   * Returns the triggers among `triggerNames` that are pending now.
   * `startup` is consumed by the first call, whether or not a task asked
   * for it.
   */
  async collect(triggerNames: Iterable<string>): Promise<Set<string>> {
    const pending = new Set<string>(['heartbeat']);
    if (!this.startupFired) {
      pending.add('startup');
      this.startupFired = true;
    }

    const checked = new Set<string>();
    for (const trigger of triggerNames) {
      const address = mailTriggerAddress(trigger);
      if (address === undefined || checked.has(trigger)) {
        continue;
      }
      checked.add(trigger);
      try {
        if (await this.mailbox.hasMail(address)) {
          pending.add(trigger);
        }
      } catch (error) {
        logger.warn(`Mailbox check for ${address} failed: ${errorMessage(error)}`);
      }
    }

    return pending;
  }

  /**
   * Whether `startup` has already been handed out
   */
  get startupConsumed(): boolean {
    return this.startupFired;
  }
}
