/**
 * Auxiliary Actions
 *
 * Best-effort side steps of a lifecycle operation (environment propagation,
 * theming, notifications). Each action's outcome is logged and returned;
 * a failing action never fails the operation that scheduled it.
 */

import { errorMessage } from '@outpost/core';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/poll.js';

export interface AuxiliaryAction {
  readonly name: string;
  /** Pause before running, to let the worker settle */
  readonly delayMs?: number;
  run(): Promise<void>;
}

export interface AuxiliaryResult {
  readonly name: string;
  readonly ok: boolean;
  readonly error?: string;
}

/**
 * Runs actions one after another, in order
 */
export async function runAuxiliaryActions(
  actions: readonly AuxiliaryAction[],
  logger: Logger,
  context: string
): Promise<AuxiliaryResult[]> {
  const results: AuxiliaryResult[] = [];
  for (const action of actions) {
    if (action.delayMs !== undefined && action.delayMs > 0) {
      await sleep(action.delayMs);
    }
    try {
      await action.run();
      logger.debug(`${context}: ${action.name} ok`);
      results.push({ name: action.name, ok: true });
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`${context}: ${action.name} failed (continuing): ${message}`);
      results.push({ name: action.name, ok: false, error: message });
    }
  }
  return results;
}
