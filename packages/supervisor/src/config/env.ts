/**
 * Environment Variable Configuration
 *
 * Reads OUTPOST_* variables from an explicit environment snapshot.
 */

import { invalidInput } from '@outpost/core';
import { isLogLevel } from '../utils/logger.js';
import { EnvVars, isFailurePolicy, type EnvSource, type PartialSupervisorConfig } from './types.js';
import { parseDuration } from './duration.js';

function nonEmpty(env: EnvSource, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Parses a duration from an environment value. Accepts a duration string
 * ('5m') or a bare number of milliseconds.
 */
export function parseEnvDuration(name: string, value: string): number {
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  try {
    return parseDuration(value);
  } catch {
    throw invalidInput(name, value, 'duration such as 30s or 5m');
  }
}

/**
 * Loads configuration from environment variables
 *
 * @throws ValidationError when a variable is set to an unusable value
 */
export function loadEnvConfig(env: EnvSource): PartialSupervisorConfig {
  const config: PartialSupervisorConfig = {};

  const stateDir = nonEmpty(env, EnvVars.STATE_DIR);
  if (stateDir !== undefined) {
    config.stateDir = stateDir;
  }
  const eventsFile = nonEmpty(env, EnvVars.EVENTS_FILE);
  if (eventsFile !== undefined) {
    config.eventsFile = eventsFile;
  }
  const tasksDir = nonEmpty(env, EnvVars.TASKS_DIR);
  if (tasksDir !== undefined) {
    config.tasksDir = tasksDir;
  }
  const prefix = nonEmpty(env, EnvVars.SESSION_PREFIX);
  if (prefix !== undefined) {
    config.sessionPrefix = prefix;
  }

  const logLevel = nonEmpty(env, EnvVars.LOG_LEVEL)?.toUpperCase();
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw invalidInput(EnvVars.LOG_LEVEL, logLevel, 'DEBUG, INFO, WARNING or ERROR');
    }
    config.logLevel = logLevel;
  }

  const maxParallel = nonEmpty(env, EnvVars.MAX_PARALLEL);
  if (maxParallel !== undefined) {
    if (!/^\d+$/.test(maxParallel)) {
      throw invalidInput(EnvVars.MAX_PARALLEL, maxParallel, 'non-negative integer');
    }
    config.dispatch = { ...config.dispatch, maxParallel: parseInt(maxParallel, 10) };
  }
  const taskTimeout = nonEmpty(env, EnvVars.TASK_TIMEOUT);
  if (taskTimeout !== undefined) {
    config.dispatch = { ...config.dispatch, taskTimeoutMs: parseEnvDuration(EnvVars.TASK_TIMEOUT, taskTimeout) };
  }
  const failurePolicy = nonEmpty(env, EnvVars.FAILURE_POLICY);
  if (failurePolicy !== undefined) {
    if (!isFailurePolicy(failurePolicy)) {
      throw invalidInput(EnvVars.FAILURE_POLICY, failurePolicy, 'retry-next-cycle or respect-interval');
    }
    config.dispatch = { ...config.dispatch, failurePolicy };
  }

  const readyTimeout = nonEmpty(env, EnvVars.READY_TIMEOUT);
  if (readyTimeout !== undefined) {
    config.lifecycle = { readyTimeoutMs: parseEnvDuration(EnvVars.READY_TIMEOUT, readyTimeout) };
  }
  const patrolInterval = nonEmpty(env, EnvVars.PATROL_INTERVAL);
  if (patrolInterval !== undefined) {
    config.patrol = { intervalMs: parseEnvDuration(EnvVars.PATROL_INTERVAL, patrolInterval) };
  }

  return config;
}
