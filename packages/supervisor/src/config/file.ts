/**
 * Configuration File Loading
 *
 * Parses `.outpost/config.yaml` (snake_case keys) into a partial
 * configuration. Unknown keys are ignored; known keys with unusable values
 * raise ValidationError. Absent keys stay undefined and never override.
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode, errorMessage, invalidInput } from '@outpost/core';
import { isLogLevel } from '../utils/logger.js';
import { isFailurePolicy, type PartialSupervisorConfig } from './types.js';
import { parseDurationValue } from './duration.js';

type YamlSection = Record<string, unknown>;

function isSection(value: unknown): value is YamlSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Field Readers
// ============================================================================

function readString(section: YamlSection, key: string, path: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw invalidInput(path, value, 'non-empty string');
  }
  return value;
}

function readDuration(section: YamlSection, key: string, path: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  try {
    return parseDurationValue(value);
  } catch {
    throw invalidInput(path, value, 'duration such as 30s or 5m');
  }
}

function readCount(section: YamlSection, key: string, path: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw invalidInput(path, value, 'non-negative integer');
  }
  return value;
}

function readStringList(section: YamlSection, key: string, path: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalidInput(path, value, 'list of strings');
  }
  return [...value];
}

function readSection(root: YamlSection, key: string): YamlSection | undefined {
  const value = root[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isSection(value)) {
    throw invalidInput(key, value, 'mapping');
  }
  return value;
}

// ============================================================================
// YAML Parsing
// ============================================================================

/**
 * Parses YAML content into a config mapping
 *
 * @param content - YAML string content
 * @param filePath - Path to file (for error messages)
 */
export function parseYamlConfig(content: string, filePath?: string): YamlSection {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse YAML configuration${filePath ? ` (${filePath})` : ''}: ${errorMessage(err)}`,
      ErrorCode.INVALID_INPUT,
      { filePath }
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isSection(parsed)) {
    throw new ValidationError(
      `Configuration file must contain an object${filePath ? ` (${filePath})` : ''}`,
      ErrorCode.INVALID_INPUT,
      { value: parsed }
    );
  }
  return parsed;
}

/**
 * Converts a snake_case YAML mapping into the internal camelCase shape
 */
export function convertYamlToConfig(doc: YamlSection): PartialSupervisorConfig {
  const result: PartialSupervisorConfig = {
    stateDir: readString(doc, 'state_dir', 'state_dir'),
    eventsFile: readString(doc, 'events_file', 'events_file'),
    tasksDir: readString(doc, 'tasks_dir', 'tasks_dir'),
    sessionPrefix: readString(doc, 'session_prefix', 'session_prefix'),
    systemActors: readStringList(doc, 'system_actors', 'system_actors'),
  };

  const logLevel = readString(doc, 'log_level', 'log_level')?.toUpperCase();
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw invalidInput('log_level', logLevel, 'debug, info, warning or error');
    }
    result.logLevel = logLevel;
  }

  const lifecycle = readSection(doc, 'lifecycle');
  if (lifecycle) {
    result.lifecycle = {
      agentCommand: readString(lifecycle, 'agent_command', 'lifecycle.agent_command'),
      readyTimeoutMs: readDuration(lifecycle, 'ready_timeout', 'lifecycle.ready_timeout'),
      stopGraceMs: readDuration(lifecycle, 'stop_grace', 'lifecycle.stop_grace'),
      settleDelayMs: readDuration(lifecycle, 'settle_delay', 'lifecycle.settle_delay'),
      pollInitialMs: readDuration(lifecycle, 'poll_initial', 'lifecycle.poll_initial'),
      pollMaxMs: readDuration(lifecycle, 'poll_max', 'lifecycle.poll_max'),
    };
  }

  const dispatch = readSection(doc, 'dispatch');
  if (dispatch) {
    const policy = readString(dispatch, 'failure_policy', 'dispatch.failure_policy');
    if (policy !== undefined && !isFailurePolicy(policy)) {
      throw invalidInput('dispatch.failure_policy', policy, 'retry-next-cycle or respect-interval');
    }
    result.dispatch = {
      maxParallel: readCount(dispatch, 'max_parallel', 'dispatch.max_parallel'),
      taskTimeoutMs: readDuration(dispatch, 'task_timeout', 'dispatch.task_timeout'),
      failurePolicy: policy,
    };
  }

  const patrol = readSection(doc, 'patrol');
  if (patrol) {
    result.patrol = {
      intervalMs: readDuration(patrol, 'interval', 'patrol.interval'),
      idleThresholdMs: readDuration(patrol, 'idle_threshold', 'patrol.idle_threshold'),
      maxIntervalMs: readDuration(patrol, 'max_interval', 'patrol.max_interval'),
    };
  }

  const watch = readSection(doc, 'restart_watch');
  if (watch) {
    result.restartWatch = {
      intervalMs: readDuration(watch, 'interval', 'restart_watch.interval'),
      handoffDelayMs: readDuration(watch, 'handoff_delay', 'restart_watch.handoff_delay'),
      inboxAddress: readString(watch, 'inbox_address', 'restart_watch.inbox_address'),
      subjectPattern: readString(watch, 'subject_pattern', 'restart_watch.subject_pattern'),
      targetAddress: readString(watch, 'target_address', 'restart_watch.target_address'),
    };
  }

  return result;
}

/**
 * Reads and converts a config file. A missing file yields an empty partial.
 */
export function loadConfigFile(filePath: string): PartialSupervisorConfig {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  return convertYamlToConfig(parseYamlConfig(fs.readFileSync(filePath, 'utf-8'), filePath));
}
