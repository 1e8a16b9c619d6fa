/**
 * Supervisor services
 */

export * from './cron-schedule.js';
export * from './gate-parser.js';
export * from './gate-evaluator.js';
export * from './condition-probe.js';
export * from './trigger-source.js';
export * from './task-catalog.js';
export * from './task-dispatcher.js';
export * from './session-task-runner.js';
export * from './mail-router.js';
export * from './activity-signal.js';
export * from './patrol-loop.js';
export * from './restart-watch.js';
