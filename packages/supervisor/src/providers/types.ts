/**
 * Collaborator Contracts
 *
 * The supervisor drives two external systems it does not implement: the
 * terminal multiplexer hosting agent sessions and the work ledger used as
 * durable storage for mail. Both are reached only through these interfaces.
 *
 * @module
 */

// ============================================================================
// Session Controller
// ============================================================================

/**
 * Narrow control surface over the terminal multiplexer
 */
export interface SessionController {
  /** Whether a container with this id exists */
  hasSession(id: string): Promise<boolean>;
  /** Whether the worker process inside the container is alive and responsive */
  isWorkerAlive(id: string): Promise<boolean>;
  /** Creates a container in `dir` running `command` */
  createSession(id: string, dir: string, command: string): Promise<void>;
  /** Destroys the container */
  killSession(id: string): Promise<void>;
  /** Types text into the session followed by Enter */
  sendKeys(id: string, text: string): Promise<void>;
  /** Sends a graceful interrupt (Ctrl-C) */
  sendInterrupt(id: string): Promise<void>;
  /** Sets a session-scoped environment variable */
  setEnv(id: string, key: string, value: string): Promise<void>;
  /** Applies a cosmetic theme (status line, colours) */
  configureSession(id: string, theme: string): Promise<void>;
  /** Shows a transient notification banner in the session */
  displayBanner(id: string, from: string, subject: string): Promise<void>;
}

// ============================================================================
// Work Ledger
// ============================================================================

/**
 * Fields of a ledger record created by the supervisor
 */
export interface LedgerRecordFields {
  readonly type: string;
  readonly title: string;
  readonly description: string;
  readonly assignee: string;
  /** 0 (most urgent) to 3 */
  readonly priority: number;
  readonly labels: readonly string[];
  /** Who created the record */
  readonly actor: string;
}

/**
 * Ledger record as returned by queries
 */
export interface LedgerRecord extends LedgerRecordFields {
  readonly id: string;
  readonly status: 'open' | 'closed';
  readonly createdAt: string;
}

export interface LedgerQuery {
  readonly type?: string;
  readonly assignee?: string;
  readonly status?: 'open' | 'closed';
}

/**
 * System of record for messages
 */
export interface WorkLedger {
  /** Persists a record and returns its id */
  createRecord(fields: LedgerRecordFields): Promise<string>;
  /** Records matching every given criterion, oldest first */
  queryRecords(query: LedgerQuery): Promise<LedgerRecord[]>;
  /** Marks a record closed */
  closeRecord(id: string): Promise<void>;
}
