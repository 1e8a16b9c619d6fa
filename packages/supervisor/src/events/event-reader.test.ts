/**
 * Event Reader and Writer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileStateStore } from '../storage/index.js';
import { Significance } from '../types/index.js';
import { EventReader, eventCursorCodec, parseEventLine } from './event-reader.js';
import { EventWriter, createEvent } from './event-writer.js';

const options = { systemActors: ['gt'] };

function line(record: Record<string, unknown>): string {
  return `${JSON.stringify(record)}\n`;
}

const sling = line({
  timestamp: '2026-03-10T09:00:00Z',
  type: 'sling',
  actor: 'gastown/witness',
  payload: { item: 'op-1', target: 'gastown/toast' },
  visibility: 'narrative',
});
const done = line({
  timestamp: '2026-03-10T09:05:00Z',
  type: 'done',
  actor: 'gastown/toast',
  payload: { item: 'op-1' },
  visibility: 'narrative',
});

describe('parseEventLine', () => {
  it('defaults visibility and payload', () => {
    expect(parseEventLine('{"timestamp":"2026-03-10T09:00:00Z","type":"halt","actor":"gt"}')).toEqual({
      timestamp: '2026-03-10T09:00:00Z',
      type: 'halt',
      actor: 'gt',
      payload: {},
      visibility: 'narrative',
    });
  });

  it.each(['not json', '[]', '{"type":"halt"}', '{"timestamp":"x","type":"halt","visibility":"secret"}', '{"timestamp":"x","type":"halt","payload":[1]}'])(
    'rejects %s',
    raw => {
      expect(parseEventLine(raw)).toBeUndefined();
    }
  );
});

describe('EventReader', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'outpost-events-'));
    file = path.join(dir, 'events.jsonl');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns nothing for a missing log', async () => {
    const reader = new EventReader(file, options);
    expect(await reader.readNew()).toEqual([]);
    expect(reader.offset).toBe(0);
  });

  it('reads only records appended since the last read', async () => {
    fs.writeFileSync(file, sling);
    const reader = new EventReader(file, options);

    const first = await reader.readNew();
    expect(first.map(e => e.type)).toEqual(['sling']);
    expect(first[0].significance).toBe(Significance.HIGH);
    expect(first[0].summary).toBe('Work op-1 slung to gastown/toast');
    expect(reader.offset).toBe(Buffer.byteLength(sling));

    fs.appendFileSync(file, done);
    expect((await reader.readNew()).map(e => e.type)).toEqual(['done']);
    expect(await reader.readNew()).toEqual([]);
  });

  it('skips malformed lines', async () => {
    fs.writeFileSync(file, sling + 'garbage\n\n' + done);
    const reader = new EventReader(file, options);
    expect((await reader.readNew()).map(e => e.type)).toEqual(['sling', 'done']);
  });

  it('leaves a partial trailing line for the next read', async () => {
    const fragment = done.slice(0, 20);
    fs.writeFileSync(file, sling + fragment);
    const reader = new EventReader(file, options);

    expect((await reader.readNew()).map(e => e.type)).toEqual(['sling']);
    expect(reader.offset).toBe(Buffer.byteLength(sling));

    fs.appendFileSync(file, done.slice(20));
    expect((await reader.readNew()).map(e => e.type)).toEqual(['done']);
    expect(reader.offset).toBe(Buffer.byteLength(sling + done));
  });

  it('counts offsets in bytes', async () => {
    const unicode = line({ timestamp: '2026-03-10T09:00:00Z', type: 'mail', actor: 'mayor/', payload: { subject: 'café ☕' } });
    fs.writeFileSync(file, unicode);
    const reader = new EventReader(file, options);
    await reader.readNew();
    expect(reader.offset).toBe(Buffer.byteLength(unicode));
    expect(reader.offset).toBeGreaterThan(unicode.length);
  });

  it('replays everything without moving the cursor', async () => {
    fs.writeFileSync(file, sling + done);
    const reader = new EventReader(file, options);
    await reader.readNew();
    const offset = reader.offset;

    expect((await reader.readAll()).map(e => e.type)).toEqual(['sling', 'done']);
    expect(reader.offset).toBe(offset);
  });

  it('never moves the offset backwards', () => {
    const reader = new EventReader(file, options);
    reader.setOffset(100);
    reader.setOffset(10);
    expect(reader.offset).toBe(100);
  });

  it('returns nothing when the log is shorter than the offset', async () => {
    fs.writeFileSync(file, sling);
    const reader = new EventReader(file, options);
    reader.setOffset(10_000);
    expect(await reader.readNew()).toEqual([]);
    expect(reader.offset).toBe(10_000);
  });

  it('persists and restores the cursor', async () => {
    fs.writeFileSync(file, sling + done);
    const cursorStore = new FileStateStore(dir, 'cursor.json', eventCursorCodec);

    const first = new EventReader(file, { ...options, cursorStore });
    await first.init();
    await first.readNew();

    const second = new EventReader(file, { ...options, cursorStore });
    await second.init();
    expect(second.offset).toBe(Buffer.byteLength(sling + done));
    expect(await second.readNew()).toEqual([]);
  });
});

describe('EventWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'outpost-writer-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('appends records the reader can consume', async () => {
    const file = path.join(dir, 'nested', 'events.jsonl');
    const writer = new EventWriter(file);
    const now = new Date('2026-03-10T12:00:00.000Z');

    await writer.append(createEvent('patrol_started', 'gt', { task_count: 2 }, 'audit', now));
    await writer.append(createEvent('session_start', 'gt', { role: 'witness' }, 'narrative', now));

    expect(fs.readFileSync(file, 'utf-8').split('\n')[0]).toBe(
      '{"timestamp":"2026-03-10T12:00:00.000Z","type":"patrol_started","actor":"gt","payload":{"task_count":2},"visibility":"audit"}'
    );

    const events = await new EventReader(file, options).readAll();
    expect(events.map(e => [e.type, e.significance, e.summary])).toEqual([
      ['patrol_started', Significance.NONE, 'Patrol started'],
      ['session_start', Significance.LOW, 'witness session started'],
    ]);
  });
});
