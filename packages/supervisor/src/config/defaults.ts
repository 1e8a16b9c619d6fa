/**
 * Default Configuration Values
 */

import type { SupervisorConfig } from './types.js';
import { DURATION_UNITS } from './duration.js';

/** Directory under the fleet root that holds supervisor files */
export const OUTPOST_DIR = '.outpost';

/** Config file name inside OUTPOST_DIR */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Returns a fresh default configuration. Path fields are relative and are
 * resolved against rootDir by the loader.
 */
export function getDefaultConfig(rootDir: string = process.cwd()): SupervisorConfig {
  return {
    rootDir,
    stateDir: `${OUTPOST_DIR}/state`,
    eventsFile: `${OUTPOST_DIR}/events.jsonl`,
    tasksDir: `${OUTPOST_DIR}/tasks`,
    sessionPrefix: 'gt-',
    systemActors: ['gt'],
    lifecycle: {
      agentCommand: 'claude',
      readyTimeoutMs: 30 * DURATION_UNITS.s,
      stopGraceMs: 2 * DURATION_UNITS.s,
      settleDelayMs: 500,
      pollInitialMs: 100,
      pollMaxMs: 2 * DURATION_UNITS.s,
    },
    dispatch: {
      maxParallel: 4,
      taskTimeoutMs: 10 * DURATION_UNITS.m,
      failurePolicy: 'retry-next-cycle',
    },
    patrol: {
      intervalMs: DURATION_UNITS.m,
      idleThresholdMs: 5 * DURATION_UNITS.m,
      maxIntervalMs: 10 * DURATION_UNITS.m,
    },
    restartWatch: {
      intervalMs: 10 * DURATION_UNITS.s,
      handoffDelayMs: 5 * DURATION_UNITS.s,
      inboxAddress: 'deacon/',
      subjectPattern: 'RESTART',
      targetAddress: 'mayor/',
    },
  };
}
