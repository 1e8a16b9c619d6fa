export {
  SessionLifecycle,
  createSessionLifecycle,
  SESSIONS_DIR,
  type SessionLifecycleDeps,
  type SessionTarget,
  type StartResult,
  type StopResult,
  type HealthAction,
  type HealthReport,
} from './session-lifecycle.js';
export { runAuxiliaryActions, type AuxiliaryAction, type AuxiliaryResult } from './auxiliary-actions.js';
export {
  createDefaultDefinitionResolver,
  AGENT_ENV_VAR,
  ROOT_ENV_VAR,
  type SessionDefinitionResolver,
} from './session-definitions.js';
