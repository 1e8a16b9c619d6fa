/**
 * Event Writer
 *
 * Appends newline-terminated JSON records to the activity log. Each record
 * is written with a single append call so concurrent producers interleave
 * whole lines.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createTimestamp } from '@outpost/core';
import type { ActivityEvent, EventPayload, EventVisibility } from '../types/index.js';

/**
 * Anything that accepts activity records
 */
export interface EventSink {
  append(event: ActivityEvent): Promise<void>;
}

export class EventWriter implements EventSink {
  constructor(readonly eventsFile: string) {}

  async append(event: ActivityEvent): Promise<void> {
    const line = JSON.stringify({
      timestamp: event.timestamp,
      type: event.type,
      actor: event.actor,
      payload: event.payload,
      visibility: event.visibility,
    });
    await fs.promises.mkdir(path.dirname(this.eventsFile), { recursive: true });
    await fs.promises.appendFile(this.eventsFile, `${line}\n`, 'utf-8');
  }
}

/**
 * Builds an event stamped with the current time
 */
export function createEvent(
  type: string,
  actor: string,
  payload: EventPayload = {},
  visibility: EventVisibility = 'narrative',
  now: Date = new Date()
): ActivityEvent {
  return { timestamp: createTimestamp(now), type, actor, payload, visibility };
}
