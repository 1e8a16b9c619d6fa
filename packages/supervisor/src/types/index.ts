/**
 * Type definitions for the supervisor
 */

export * from './agent-identity.js';
export * from './gate.js';
export * from './run-state.js';
export * from './session.js';
export * from './event.js';
export * from './message.js';
export * from './task.js';
