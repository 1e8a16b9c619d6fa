/**
 * Configuration module
 */

export type {
  Duration,
  DurationString,
  FailurePolicy,
  LifecycleConfig,
  DispatchConfig,
  PatrolConfig,
  RestartWatchConfig,
  SupervisorConfig,
  PartialSupervisorConfig,
  EnvVar,
  EnvSource,
} from './types.js';
export { EnvVars, VALID_FAILURE_POLICIES, isFailurePolicy } from './types.js';

export {
  DURATION_UNITS,
  isDurationString,
  parseDuration,
  parseDurationValue,
  tryParseDuration,
  formatDuration,
} from './duration.js';

export { getDefaultConfig, OUTPOST_DIR, CONFIG_FILE_NAME } from './defaults.js';
export { loadEnvConfig, parseEnvDuration } from './env.js';
export { parseYamlConfig, convertYamlToConfig, loadConfigFile } from './file.js';
export {
  mergeConfig,
  validateConfig,
  resolvePaths,
  loadConfig,
  createConfig,
  type LoadConfigOptions,
} from './config.js';
