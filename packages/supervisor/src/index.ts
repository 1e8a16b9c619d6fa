/**
 * @outpost/supervisor
 *
 * Gate scheduler, task dispatcher, session lifecycle manager, event bus
 * and mail router for a supervised fleet of agent sessions.
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './storage/index.js';
export * from './providers/index.js';
export * from './events/index.js';
export * from './runtime/index.js';
export * from './services/index.js';
export * from './api/index.js';
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  type Logger,
  type LogLevel,
} from './utils/logger.js';
export { pollUntil, sleep, type PollOptions, type PollResult } from './utils/poll.js';
export { mapSettledWithLimit, withTimeout, type Settled } from './utils/concurrency.js';
