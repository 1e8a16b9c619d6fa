/**
 * Event Reader
 *
 * Offset-tracked consumer of the activity log. Positions are byte offsets,
 * never line numbers. A read stops at the end of the last complete line;
 * an unterminated trailing fragment (a write in progress) is left for the
 * next read. Malformed lines are skipped.
 *
 * @module
 */

import * as fs from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { errorMessage, storageFailed, toError } from '@outpost/core';
import { createLogger } from '../utils/logger.js';
import type { StateCodec, FileStateStore } from '../storage/index.js';
import type { ActivityEvent, NarrativeEvent } from '../types/index.js';
import { classifyEvent, type ClassifierOptions } from './classifier.js';

const logger = createLogger('event-reader');

const NEWLINE = 0x0a;

// ============================================================================
// Cursor
// ============================================================================

/**
 * Persisted reader position
 */
export interface EventCursor {
  readonly offset: number;
}

export const eventCursorCodec: StateCodec<EventCursor> = {
  defaults: () => ({ offset: 0 }),
  decode: raw => {
    if (typeof raw !== 'object' || raw === null || !('offset' in raw)) {
      return undefined;
    }
    const { offset } = raw;
    return typeof offset === 'number' && Number.isInteger(offset) && offset >= 0 ? { offset } : undefined;
  },
};

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses one log line, or returns undefined when it is not a valid record.
 * A missing payload reads as empty and a missing visibility as narrative.
 */
export function parseEventLine(line: string): ActivityEvent | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(raw)) {
    return undefined;
  }

  const { timestamp, type, actor, payload, visibility } = raw;
  if (typeof timestamp !== 'string' || typeof type !== 'string' || type === '') {
    return undefined;
  }
  if (actor !== undefined && typeof actor !== 'string') {
    return undefined;
  }
  if (payload !== undefined && payload !== null && !isRecord(payload)) {
    return undefined;
  }
  if (visibility !== undefined && visibility !== 'narrative' && visibility !== 'audit') {
    return undefined;
  }

  return {
    timestamp,
    type,
    actor: actor ?? '',
    payload: isRecord(payload) ? payload : {},
    visibility: visibility === 'audit' ? 'audit' : 'narrative',
  };
}

// ============================================================================
// Reader
// ============================================================================

export interface EventReaderOptions extends ClassifierOptions {
  /** Where the offset is persisted between processes */
  readonly cursorStore?: FileStateStore<EventCursor>;
}

interface Chunk {
  readonly events: NarrativeEvent[];
  /** Offset just past the last complete line */
  readonly end: number;
}

export class EventReader {
  private position = 0;

  constructor(
    readonly eventsFile: string,
    private readonly options: EventReaderOptions
  ) {}

  /**
   * Current byte offset
   */
  get offset(): number {
    return this.position;
  }

  /**
   * Moves the cursor. Offsets only move forward; a smaller value is ignored.
   */
  setOffset(offset: number): void {
    if (offset < this.position) {
      logger.warn(`Ignoring backwards offset ${offset} (at ${this.position})`);
      return;
    }
    this.position = offset;
  }

  /**
   * Restores the persisted offset, when a cursor store is configured
   */
  async init(): Promise<void> {
    if (this.options.cursorStore) {
      const cursor = await this.options.cursorStore.load();
      this.setOffset(cursor.offset);
    }
  }

  /**
   * Records appended since the cursor; advances and persists the cursor
   */
  async readNew(): Promise<NarrativeEvent[]> {
    const chunk = await this.readFrom(this.position);
    if (chunk.end > this.position) {
      this.position = chunk.end;
      if (this.options.cursorStore) {
        try {
          await this.options.cursorStore.save({ offset: this.position });
        } catch (error) {
          logger.warn(`Failed to persist event cursor: ${errorMessage(error)}`);
        }
      }
    }
    return chunk.events;
  }

  /**
   * Every complete record from the start of the log. Leaves the cursor alone.
   */
  async readAll(): Promise<NarrativeEvent[]> {
    return (await this.readFrom(0)).events;
  }

  private async readFrom(start: number): Promise<Chunk> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(this.eventsFile, 'r');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { events: [], end: start };
      }
      throw storageFailed('read', this.eventsFile, toError(error));
    }

    try {
      const { size } = await handle.stat();
      if (size < start) {
        logger.warn(`Event log ${this.eventsFile} is shorter than offset ${start}; waiting for it to grow`);
        return { events: [], end: start };
      }
      if (size === start) {
        return { events: [], end: start };
      }

      const buffer = Buffer.alloc(size - start);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
      const data = buffer.subarray(0, bytesRead);
      const lastNewline = data.lastIndexOf(NEWLINE);
      if (lastNewline === -1) {
        return { events: [], end: start };
      }

      const events: NarrativeEvent[] = [];
      for (const line of data.subarray(0, lastNewline).toString('utf-8').split('\n')) {
        if (line.trim() === '') {
          continue;
        }
        const event = parseEventLine(line);
        if (event) {
          events.push(classifyEvent(event, this.options));
        }
      }
      return { events, end: start + lastNewline + 1 };
    } finally {
      await handle.close();
    }
  }
}
