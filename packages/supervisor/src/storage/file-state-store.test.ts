/**
 * File State Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ErrorCode, StorageError } from '@outpost/core';
import { runStateCodec, type RunState } from '../types/index.js';
import { FileStateStore, KeyedStateStore, keyToFileName } from './file-state-store.js';

describe('file state stores', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'outpost-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('KeyedStateStore', () => {
    it('returns a fresh default for a missing record', async () => {
      const store = new KeyedStateStore(dir, runStateCodec);
      const first = await store.load('never-saved');
      expect(first).toEqual({ runCount: 0 });
      expect(await store.load('never-saved')).not.toBe(first);
    });

    it('round-trips a record', async () => {
      const store = new KeyedStateStore(path.join(dir, 'run-state'), runStateCodec);
      const value: RunState = {
        runCount: 3,
        lastRun: '2026-03-10T12:00:00.000Z',
        lastResult: 'success',
        nextEligible: '2026-03-11T12:00:00.000Z',
      };
      await store.save('daily-digest', value);
      expect(await store.load('daily-digest')).toEqual(value);
    });

    it('leaves no temporary files behind', async () => {
      const store = new KeyedStateStore(dir, runStateCodec);
      await store.save('a', { runCount: 1 });
      await store.save('a', { runCount: 2 });
      expect(fs.readdirSync(dir)).toEqual(['a.json']);
    });

    it('sanitises keys into file names and lists them back', async () => {
      const store = new KeyedStateStore(dir, runStateCodec);
      await store.save('gastown/toast', { runCount: 1 });
      await store.save('alpha', { runCount: 1 });
      expect(keyToFileName('gastown/toast')).toBe('gastown%2Ftoast.json');
      expect(fs.existsSync(path.join(dir, 'gastown%2Ftoast.json'))).toBe(true);
      expect(await store.list()).toEqual(['alpha', 'gastown/toast']);
    });

    it('lists nothing for a missing directory', async () => {
      expect(await new KeyedStateStore(path.join(dir, 'absent'), runStateCodec).list()).toEqual([]);
    });

    it('raises CORRUPT_RECORD for unparseable or invalid records', async () => {
      const store = new KeyedStateStore(dir, runStateCodec);
      fs.writeFileSync(store.pathFor('bad-json'), '{ not json');
      fs.writeFileSync(store.pathFor('bad-shape'), JSON.stringify({ runCount: -1 }));

      await expect(store.load('bad-json')).rejects.toBeInstanceOf(StorageError);
      await expect(store.load('bad-shape')).rejects.toMatchObject({ code: ErrorCode.CORRUPT_RECORD });
    });
  });

  describe('FileStateStore', () => {
    it('stores one record at a fixed path', async () => {
      const store = new FileStateStore(dir, 'cursor.json', {
        defaults: () => ({ offset: 0 }),
        decode: raw =>
          typeof raw === 'object' && raw !== null && 'offset' in raw && typeof raw.offset === 'number'
            ? { offset: raw.offset }
            : undefined,
      });

      expect(await store.load()).toEqual({ offset: 0 });
      await store.save({ offset: 42 });
      expect(store.filePath).toBe(path.join(dir, 'cursor.json'));
      expect(JSON.parse(fs.readFileSync(store.filePath, 'utf-8'))).toEqual({ offset: 42 });
      expect(await store.load()).toEqual({ offset: 42 });
    });
  });
});
