/**
 * Configuration Loading
 *
 * Precedence, lowest first: defaults, `.outpost/config.yaml`, OUTPOST_*
 * environment variables, explicit overrides.
 */

import * as path from 'node:path';
import { invalidInput } from '@outpost/core';
import { setLogLevel } from '../utils/logger.js';
import type { EnvSource, PartialSupervisorConfig, SupervisorConfig } from './types.js';
import { getDefaultConfig, OUTPOST_DIR, CONFIG_FILE_NAME } from './defaults.js';
import { loadConfigFile } from './file.js';
import { loadEnvConfig } from './env.js';

// ============================================================================
// Merging
// ============================================================================

/**
 * Merges a partial configuration over a complete one. Undefined fields in
 * the partial keep the base value; arrays are replaced, not merged.
 */
export function mergeConfig(base: SupervisorConfig, partial: PartialSupervisorConfig): SupervisorConfig {
  return {
    rootDir: partial.rootDir ?? base.rootDir,
    stateDir: partial.stateDir ?? base.stateDir,
    eventsFile: partial.eventsFile ?? base.eventsFile,
    tasksDir: partial.tasksDir ?? base.tasksDir,
    sessionPrefix: partial.sessionPrefix ?? base.sessionPrefix,
    systemActors: partial.systemActors ? [...partial.systemActors] : [...base.systemActors],
    logLevel: partial.logLevel ?? base.logLevel,
    lifecycle: {
      agentCommand: partial.lifecycle?.agentCommand ?? base.lifecycle.agentCommand,
      readyTimeoutMs: partial.lifecycle?.readyTimeoutMs ?? base.lifecycle.readyTimeoutMs,
      stopGraceMs: partial.lifecycle?.stopGraceMs ?? base.lifecycle.stopGraceMs,
      settleDelayMs: partial.lifecycle?.settleDelayMs ?? base.lifecycle.settleDelayMs,
      pollInitialMs: partial.lifecycle?.pollInitialMs ?? base.lifecycle.pollInitialMs,
      pollMaxMs: partial.lifecycle?.pollMaxMs ?? base.lifecycle.pollMaxMs,
    },
    dispatch: {
      maxParallel: partial.dispatch?.maxParallel ?? base.dispatch.maxParallel,
      taskTimeoutMs: partial.dispatch?.taskTimeoutMs ?? base.dispatch.taskTimeoutMs,
      failurePolicy: partial.dispatch?.failurePolicy ?? base.dispatch.failurePolicy,
    },
    patrol: {
      intervalMs: partial.patrol?.intervalMs ?? base.patrol.intervalMs,
      idleThresholdMs: partial.patrol?.idleThresholdMs ?? base.patrol.idleThresholdMs,
      maxIntervalMs: partial.patrol?.maxIntervalMs ?? base.patrol.maxIntervalMs,
    },
    restartWatch: {
      intervalMs: partial.restartWatch?.intervalMs ?? base.restartWatch.intervalMs,
      handoffDelayMs: partial.restartWatch?.handoffDelayMs ?? base.restartWatch.handoffDelayMs,
      inboxAddress: partial.restartWatch?.inboxAddress ?? base.restartWatch.inboxAddress,
      subjectPattern: partial.restartWatch?.subjectPattern ?? base.restartWatch.subjectPattern,
      targetAddress: partial.restartWatch?.targetAddress ?? base.restartWatch.targetAddress,
    },
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks cross-field constraints the per-field readers cannot see
 *
 * @throws ValidationError on the first violation
 */
export function validateConfig(config: SupervisorConfig): void {
  if (!Number.isInteger(config.dispatch.maxParallel) || config.dispatch.maxParallel < 0) {
    throw invalidInput('dispatch.maxParallel', config.dispatch.maxParallel, 'non-negative integer');
  }
  if (config.lifecycle.pollInitialMs <= 0) {
    throw invalidInput('lifecycle.pollInitialMs', config.lifecycle.pollInitialMs, 'positive duration');
  }
  if (config.lifecycle.pollMaxMs < config.lifecycle.pollInitialMs) {
    throw invalidInput('lifecycle.pollMaxMs', config.lifecycle.pollMaxMs, 'at least lifecycle.pollInitialMs');
  }
  if (config.patrol.intervalMs <= 0) {
    throw invalidInput('patrol.intervalMs', config.patrol.intervalMs, 'positive duration');
  }
  if (config.patrol.maxIntervalMs < config.patrol.intervalMs) {
    throw invalidInput('patrol.maxIntervalMs', config.patrol.maxIntervalMs, 'at least patrol.intervalMs');
  }
  if (config.restartWatch.intervalMs <= 0) {
    throw invalidInput('restartWatch.intervalMs', config.restartWatch.intervalMs, 'positive duration');
  }
  try {
    new RegExp(config.restartWatch.subjectPattern, 'i');
  } catch {
    throw invalidInput('restartWatch.subjectPattern', config.restartWatch.subjectPattern, 'valid regular expression');
  }
}

/**
 * Resolves relative path fields against rootDir
 */
export function resolvePaths(config: SupervisorConfig): SupervisorConfig {
  const rootDir = path.resolve(config.rootDir);
  return {
    ...config,
    rootDir,
    stateDir: path.resolve(rootDir, config.stateDir),
    eventsFile: path.resolve(rootDir, config.eventsFile),
    tasksDir: path.resolve(rootDir, config.tasksDir),
  };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Options for loadConfig
 */
export interface LoadConfigOptions {
  /** Fleet root */
  rootDir: string;
  /** Config file to read instead of `<rootDir>/.outpost/config.yaml` */
  configPath?: string;
  /** Environment snapshot; pass `process.env` explicitly to honour it */
  env?: EnvSource;
  /** Highest-precedence values */
  overrides?: PartialSupervisorConfig;
}

/**
 * Builds the supervisor configuration and applies its log level
 *
 * @throws ValidationError when any source holds an unusable value
 */
export function loadConfig(options: LoadConfigOptions): SupervisorConfig {
  const configPath = options.configPath ?? path.join(options.rootDir, OUTPOST_DIR, CONFIG_FILE_NAME);

  let config = getDefaultConfig(options.rootDir);
  config = mergeConfig(config, loadConfigFile(configPath));
  config = mergeConfig(config, loadEnvConfig(options.env ?? {}));
  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  config = resolvePaths(config);
  validateConfig(config);
  setLogLevel(config.logLevel);
  return config;
}

/**
 * Builds a configuration from defaults and overrides only, without touching
 * the filesystem or environment. Intended for tests and embedding.
 */
export function createConfig(rootDir: string, overrides: PartialSupervisorConfig = {}): SupervisorConfig {
  const config = resolvePaths(mergeConfig(getDefaultConfig(rootDir), overrides));
  validateConfig(config);
  return config;
}
