/**
 * Shared type definitions for Outpost
 */

export {
  type Timestamp,
  isValidTimestamp,
  validateTimestamp,
  createTimestamp,
  parseTimestamp,
  parseRfc3339,
} from './timestamp.js';
