/**
 * File State Store
 *
 * Persists small JSON records (run state, session state, reader cursors,
 * activity signal) under the state directory. Every save writes a temporary
 * file in the same directory and renames it over the target, so a reader
 * sees either the old record or the new one, never a partial write.
 *
 * Each entity has exactly one writer; the store does no locking.
 *
 * @module
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { corruptRecord, storageFailed, toError } from '@outpost/core';

// ============================================================================
// Types
// ============================================================================

/**
 * Describes how one record type is defaulted and decoded
 */
export interface StateCodec<T> {
  /** Fresh default returned when no record exists */
  defaults(): T;
  /** Validates a parsed JSON value; undefined marks the record corrupt */
  decode(raw: unknown): T | undefined;
}

// ============================================================================
// Low-level Helpers
// ============================================================================

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readRecord<T>(filePath: string, codec: StateCodec<T>): Promise<T> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissing(err)) {
      return codec.defaults();
    }
    throw storageFailed('read', filePath, toError(err));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw corruptRecord(filePath, toError(err));
  }
  const value = codec.decode(parsed);
  if (value === undefined) {
    throw corruptRecord(filePath);
  }
  return value;
}

async function writeRecord(filePath: string, value: unknown): Promise<void> {
  const tmpPath = `${filePath}.tmp.${process.pid}.${Math.random().toString(36).slice(2, 8)}`;
  try {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(tmpPath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    await fs.promises.rename(tmpPath, filePath);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true }).catch(() => undefined);
    throw storageFailed('write', filePath, toError(err));
  }
}

/**
 * Maps an entity key onto a file name inside the store directory
 */
export function keyToFileName(key: string): string {
  return `${encodeURIComponent(key)}.json`;
}

// ============================================================================
// Single Record Store
// ============================================================================

/**
 * Store for one record at a fixed path (e.g., the activity signal)
 */
export class FileStateStore<T> {
  readonly filePath: string;

  constructor(
    dir: string,
    fileName: string,
    private readonly codec: StateCodec<T>
  ) {
    this.filePath = path.join(dir, fileName);
  }

  /**
   * Reads the record, or the default when it does not exist
   *
   * @throws StorageError when the file exists but cannot be read or decoded
   */
  load(): Promise<T> {
    return readRecord(this.filePath, this.codec);
  }

  /**
   * Atomically replaces the record
   */
  save(value: T): Promise<void> {
    return writeRecord(this.filePath, value);
  }
}

// ============================================================================
// Keyed Store
// ============================================================================

/**
 * Store holding one JSON file per entity key (e.g., run state per task id)
 */
export class KeyedStateStore<T> {
  constructor(
    readonly dir: string,
    private readonly codec: StateCodec<T>
  ) {}

  /**
   * Path of the record for `key`
   */
  pathFor(key: string): string {
    return path.join(this.dir, keyToFileName(key));
  }

  /**
   * Reads the record for `key`, or the default when none exists
   */
  load(key: string): Promise<T> {
    return readRecord(this.pathFor(key), this.codec);
  }

  /**
   * Atomically replaces the record for `key`
   */
  save(key: string, value: T): Promise<void> {
    return writeRecord(this.pathFor(key), value);
  }

  /**
   * Lists the keys that have a stored record, sorted
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) {
        return [];
      }
      throw storageFailed('read', this.dir, toError(err));
    }
    return entries
      .filter(name => name.endsWith('.json'))
      .map(name => decodeURIComponent(name.slice(0, -'.json'.length)))
      .sort();
  }
}
