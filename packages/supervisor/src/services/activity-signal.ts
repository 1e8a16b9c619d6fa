/**
 * Activity Signal
 *
 * Keepalive record touched whenever an operator or agent command runs.
 * The patrol loop reads its age to back off while the fleet is idle.
 */

import { createTimestamp, errorMessage, isValidTimestamp, parseRfc3339, type Timestamp } from '@outpost/core';
import { FileStateStore, type StateCodec } from '../storage/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('activity-signal');

export const ACTIVITY_FILE_NAME = 'activity.json';

/** Age reported when no activity was ever recorded (365 days) */
export const NO_ACTIVITY_AGE_MS = 365 * 24 * 60 * 60 * 1000;

export interface ActivityRecord {
  readonly lastCommand: string;
  readonly timestamp: Timestamp;
}

/** `undefined` stands for "never touched" */
type StoredActivity = ActivityRecord | undefined;

const activityCodec: StateCodec<StoredActivity> = {
  defaults: () => undefined,
  decode: raw => {
    if (typeof raw !== 'object' || raw === null) {
      return undefined;
    }
    const lastCommand = 'lastCommand' in raw ? raw.lastCommand : undefined;
    const timestamp = 'timestamp' in raw ? raw.timestamp : undefined;
    if (typeof lastCommand !== 'string' || !isValidTimestamp(timestamp)) {
      return undefined;
    }
    return { lastCommand, timestamp };
  },
};

export class ActivitySignal {
  private readonly store: FileStateStore<StoredActivity>;

  constructor(stateDir: string, private readonly clock: () => Date = () => new Date()) {
    this.store = new FileStateStore(stateDir, ACTIVITY_FILE_NAME, activityCodec);
  }

  get filePath(): string {
    return this.store.filePath;
  }

  /**
   * Records that `command` just ran. Failures are logged, never thrown.
   */
  async touch(command: string): Promise<void> {
    try {
      await this.store.save({ lastCommand: command, timestamp: createTimestamp(this.clock()) });
    } catch (error) {
      logger.warn(`Failed to record activity: ${errorMessage(error)}`);
    }
  }

  /**
   * Latest record; undefined when none exists or it cannot be read
   */
  async read(): Promise<ActivityRecord | undefined> {
    try {
      return await this.store.load();
    } catch (error) {
      logger.warn(`Failed to read activity: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Milliseconds since the last recorded activity
   */
  async age(now: Date = this.clock()): Promise<number> {
    const record = await this.read();
    const at = record ? parseRfc3339(record.timestamp) : undefined;
    if (at === undefined) {
      return NO_ACTIVITY_AGE_MS;
    }
    return Math.max(0, now.getTime() - at);
  }
}

export function createActivitySignal(stateDir: string): ActivitySignal {
  return new ActivitySignal(stateDir);
}
