/**
 * Session Definitions
 *
 * Maps an agent identity onto what the lifecycle manager needs to start
 * its session. The default resolver starts the configured agent command
 * in the fleet root with the agent's address in its environment.
 */

import type { SupervisorConfig } from '../config/index.js';
import { formatIdentity, type AgentIdentity, type SessionDefinition } from '../types/index.js';

/** Environment variable carrying the agent's canonical address */
export const AGENT_ENV_VAR = 'OUTPOST_AGENT';

/** Environment variable carrying the fleet root directory */
export const ROOT_ENV_VAR = 'OUTPOST_ROOT';

export type SessionDefinitionResolver = (identity: AgentIdentity) => SessionDefinition;

export function createDefaultDefinitionResolver(
  config: Pick<SupervisorConfig, 'rootDir' | 'lifecycle'>
): SessionDefinitionResolver {
  return identity => ({
    identity,
    workDir: config.rootDir,
    command: config.lifecycle.agentCommand,
    env: {
      [AGENT_ENV_VAR]: formatIdentity(identity),
      [ROOT_ENV_VAR]: config.rootDir,
    },
  });
}
