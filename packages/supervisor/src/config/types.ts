/**
 * Configuration Types
 *
 * One explicit configuration object is passed to every supervisor component.
 * Nothing below the loader reads the environment or discovers paths itself.
 */

import type { LogLevel } from '../utils/logger.js';

// ============================================================================
// Basic Types
// ============================================================================

/**
 * Duration in milliseconds
 */
export type Duration = number;

/**
 * Duration string format (e.g., '5m', '500ms', '24h')
 */
export type DurationString = `${number}${'ms' | 's' | 'm' | 'h' | 'd'}`;

/**
 * What happens to a task's eligibility after a failed run
 *
 * - `retry-next-cycle`: leave lastRun and nextEligible untouched, so the task
 *   is attempted again on the next patrol cycle
 * - `respect-interval`: advance nextEligible as if the run had succeeded,
 *   suppressing retries until the next natural interval
 */
export type FailurePolicy = 'retry-next-cycle' | 'respect-interval';

/**
 * Valid failure policies
 */
export const VALID_FAILURE_POLICIES: readonly FailurePolicy[] = ['retry-next-cycle', 'respect-interval'];

/**
 * Checks whether a value is a failure policy
 */
export function isFailurePolicy(value: unknown): value is FailurePolicy {
  return value === 'retry-next-cycle' || value === 'respect-interval';
}

// ============================================================================
// Configuration Sections
// ============================================================================

/**
 * Session lifecycle timing
 */
export interface LifecycleConfig {
  /** Command that launches an agent in a new session */
  agentCommand: string;
  /** Maximum wait for the worker to come up after session creation */
  readyTimeoutMs: Duration;
  /** How long a stop waits for the worker to exit after the interrupt */
  stopGraceMs: Duration;
  /** Pause between the startup notification and the activation signal */
  settleDelayMs: Duration;
  /** First backoff step of the readiness poll */
  pollInitialMs: Duration;
  /** Backoff ceiling of the readiness poll */
  pollMaxMs: Duration;
}

/**
 * Task dispatch settings
 */
export interface DispatchConfig {
  /** Parallel group ceiling; 0 runs the whole group at once */
  maxParallel: number;
  /** Per-task deadline; 0 disables it */
  taskTimeoutMs: Duration;
  /** Eligibility policy after a failed run */
  failurePolicy: FailurePolicy;
}

/**
 * Patrol loop timing
 */
export interface PatrolConfig {
  /** Base delay between cycles */
  intervalMs: Duration;
  /** Activity age after which the loop starts backing off */
  idleThresholdMs: Duration;
  /** Backoff ceiling */
  maxIntervalMs: Duration;
}

/**
 * Supervisor self-recovery watch
 */
export interface RestartWatchConfig {
  intervalMs: Duration;
  /** Wait between acknowledging a restart request and acting on it */
  handoffDelayMs: Duration;
  /** Inbox polled for restart requests */
  inboxAddress: string;
  /** Case-insensitive pattern matched against message subjects */
  subjectPattern: string;
  /** Session restarted when a request arrives */
  targetAddress: string;
}

/**
 * Complete supervisor configuration
 */
export interface SupervisorConfig {
  /** Fleet root; working directory for sessions and base for relative paths */
  rootDir: string;
  /** Directory holding run-state, session and cursor records */
  stateDir: string;
  /** Append-only activity log */
  eventsFile: string;
  /** Directory of task definitions */
  tasksDir: string;
  /** Prefix of every session id (e.g., 'gt-') */
  sessionPrefix: string;
  /** Actors that belong to no workspace and have no role */
  systemActors: string[];
  /** Minimum log level; falls back to LOG_LEVEL when unset */
  logLevel?: LogLevel;
  lifecycle: LifecycleConfig;
  dispatch: DispatchConfig;
  patrol: PatrolConfig;
  restartWatch: RestartWatchConfig;
}

/**
 * Partial configuration for merging
 */
export interface PartialSupervisorConfig {
  rootDir?: string;
  stateDir?: string;
  eventsFile?: string;
  tasksDir?: string;
  sessionPrefix?: string;
  systemActors?: string[];
  logLevel?: LogLevel;
  lifecycle?: Partial<LifecycleConfig>;
  dispatch?: Partial<DispatchConfig>;
  patrol?: Partial<PatrolConfig>;
  restartWatch?: Partial<RestartWatchConfig>;
}

// ============================================================================
// Environment Variables
// ============================================================================

/**
 * Environment variables read by the loader
 */
export const EnvVars = {
  STATE_DIR: 'OUTPOST_STATE_DIR',
  EVENTS_FILE: 'OUTPOST_EVENTS_FILE',
  TASKS_DIR: 'OUTPOST_TASKS_DIR',
  SESSION_PREFIX: 'OUTPOST_SESSION_PREFIX',
  LOG_LEVEL: 'OUTPOST_LOG_LEVEL',
  MAX_PARALLEL: 'OUTPOST_MAX_PARALLEL',
  TASK_TIMEOUT: 'OUTPOST_TASK_TIMEOUT',
  FAILURE_POLICY: 'OUTPOST_FAILURE_POLICY',
  READY_TIMEOUT: 'OUTPOST_READY_TIMEOUT',
  PATROL_INTERVAL: 'OUTPOST_PATROL_INTERVAL',
} as const;

export type EnvVar = typeof EnvVars[keyof typeof EnvVars];

/**
 * Environment snapshot handed to the loader
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;
