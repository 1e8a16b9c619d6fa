/**
 * Task Catalog
 *
 * Loads task definitions from the tasks directory. Each task is a Markdown
 * file, `<id>.md` or `<id>/task.md`, whose YAML front-matter header holds
 * the gate and scheduling fields:
 *
 * ```markdown
 * ---
 * gate: cooldown
 * interval: 24h
 * parallel: true
 * agent: gastown/witness
 * ---
 * Instructions handed to the agent unchanged.
 * ```
 *
 * A header problem never drops the task: it becomes an `invalid` gate that
 * stays closed and reports the error each cycle.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { errorMessage } from '@outpost/core';
import { createLogger } from '../utils/logger.js';
import { parseAgentAddress, type Gate, type Task } from '../types/index.js';
import { parseGate } from './gate-parser.js';

const logger = createLogger('task-catalog');

const FRONTMATTER_DELIMITER = '---';

/** File name used by directory-style tasks */
export const TASK_FILE_NAME = 'task.md';

// ============================================================================
// Front Matter
// ============================================================================

export interface ParsedTaskFile {
  /** Parsed header; undefined when the file has no header block */
  readonly header?: Readonly<Record<string, unknown>>;
  /** Error parsing the header block */
  readonly headerError?: string;
  readonly body: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Splits a task file into its YAML header and Markdown body
 */
export function parseTaskFile(raw: string): ParsedTaskFile {
  const normalized = raw.replace(/\r\n/g, '\n');
  const trimmed = normalized.trimStart();

  if (!trimmed.startsWith(`${FRONTMATTER_DELIMITER}\n`)) {
    return { body: normalized.trim() };
  }

  const rest = trimmed.slice(FRONTMATTER_DELIMITER.length + 1);
  let yamlBlock: string;
  let body: string;

  if (rest.startsWith(FRONTMATTER_DELIMITER)) {
    // Empty header: ---\n---
    yamlBlock = '';
    const lineEnd = rest.indexOf('\n');
    body = lineEnd === -1 ? '' : rest.slice(lineEnd + 1);
  } else {
    const closing = rest.indexOf(`\n${FRONTMATTER_DELIMITER}`);
    if (closing === -1) {
      return { headerError: 'unterminated header', body: '' };
    }
    yamlBlock = rest.slice(0, closing);
    const lineEnd = rest.indexOf('\n', closing + 1);
    body = lineEnd === -1 ? '' : rest.slice(lineEnd + 1);
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(yamlBlock);
  } catch (error) {
    return { headerError: `unparseable header: ${errorMessage(error)}`, body: body.trim() };
  }

  if (parsed === null || parsed === undefined) {
    return { header: {}, body: body.trim() };
  }
  if (!isRecord(parsed)) {
    return { headerError: 'header must be a mapping', body: body.trim() };
  }
  return { header: parsed, body: body.trim() };
}

// ============================================================================
// Task Construction
// ============================================================================

/**
 * Builds a task from a parsed file. Header problems become an invalid gate.
 */
export function buildTask(id: string, sourcePath: string, file: ParsedTaskFile): Task {
  const header = file.header ?? {};
  let gate: Gate = file.headerError !== undefined
    ? { type: 'invalid', error: file.headerError }
    : file.header === undefined
      ? { type: 'invalid', error: 'missing header' }
      : parseGate(header);

  let parallel = false;
  if (header.parallel !== undefined && header.parallel !== null) {
    if (typeof header.parallel === 'boolean') {
      parallel = header.parallel;
    } else if (gate.type !== 'invalid') {
      gate = { type: 'invalid', error: `parallel must be true or false, got '${String(header.parallel)}'` };
    }
  }

  let agent: string | undefined;
  if (header.agent !== undefined && header.agent !== null) {
    if (typeof header.agent === 'string' && parseAgentAddress(header.agent)) {
      agent = header.agent.trim();
    } else if (gate.type !== 'invalid') {
      gate = { type: 'invalid', error: `invalid agent address '${String(header.agent)}'` };
    }
  }

  return {
    id,
    gate,
    parallel,
    instructions: file.body,
    sourcePath,
    ...(agent !== undefined ? { agent } : {}),
  };
}

// ============================================================================
// Directory Loading
// ============================================================================

interface TaskSource {
  readonly id: string;
  readonly filePath: string;
}

async function discoverTaskFiles(dir: string): Promise<TaskSource[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug(`Tasks directory ${dir} does not exist`);
      return [];
    }
    throw error;
  }

  const sources: TaskSource[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }
    if (entry.isFile() && entry.name.endsWith('.md')) {
      sources.push({ id: entry.name.slice(0, -'.md'.length), filePath: path.join(dir, entry.name) });
    } else if (entry.isDirectory()) {
      const filePath = path.join(dir, entry.name, TASK_FILE_NAME);
      if (fs.existsSync(filePath)) {
        sources.push({ id: entry.name, filePath });
      }
    }
  }
  return sources;
}

/**
 * Loads every task under `dir`, sorted by id. Unreadable files are logged
 * and skipped; when two files claim the same id the first in sort order
 * wins.
 */
export async function loadTasks(dir: string): Promise<Task[]> {
  const sources = await discoverTaskFiles(dir);
  sources.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : a.filePath < b.filePath ? -1 : 1));

  const tasks: Task[] = [];
  const seen = new Set<string>();
  for (const source of sources) {
    if (seen.has(source.id)) {
      logger.warn(`Duplicate task id ${source.id}; ignoring ${source.filePath}`);
      continue;
    }
    let raw: string;
    try {
      raw = await fs.promises.readFile(source.filePath, 'utf-8');
    } catch (error) {
      logger.warn(`Skipping unreadable task ${source.filePath}: ${errorMessage(error)}`);
      continue;
    }
    seen.add(source.id);
    const task = buildTask(source.id, source.filePath, parseTaskFile(raw));
    if (task.gate.type === 'invalid') {
      logger.warn(`Task ${task.id} has an invalid gate: ${task.gate.error}`);
    }
    tasks.push(task);
  }

  return tasks;
}
