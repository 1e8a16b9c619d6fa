/**
 * Mail Router
 *
 * Delivers messages between agents by persisting them as records in the
 * work ledger. The ledger has no mail schema, so sender, thread, reply and
 * message type travel as labels:
 *
 *   from:<address>  thread:<id>  reply-to:<id>  msg-type:<type>
 *
 * After a successful write the router tries to flash a banner in the
 * recipient's live session. That step is best-effort: delivery has already
 * happened through the ledger.
 *
 * @module
 */

import { errorMessage, invalidInput, ledgerWriteFailed, toError } from '@outpost/core';
import { createLogger } from '../utils/logger.js';
import type { SessionController, WorkLedger, LedgerRecord } from '../providers/index.js';
import {
  PRIORITY_TO_LEDGER,
  formatIdentity,
  isMessageType,
  parseAgentAddress,
  requireAgentAddress,
  sessionIdFor,
  type Message,
  type MessagePriority,
  type ReceivedMessage,
} from '../types/index.js';

const logger = createLogger('mail-router');

/** Ledger record type used for mail */
export const MESSAGE_RECORD_TYPE = 'message';

const LABEL_FROM = 'from:';
const LABEL_THREAD = 'thread:';
const LABEL_REPLY_TO = 'reply-to:';
const LABEL_TYPE = 'msg-type:';

// ============================================================================
// Encoding
// ============================================================================

/**
 * Canonical form of an address when it parses, else the trimmed input
 */
export function canonicalAddress(address: string): string {
  const identity = parseAgentAddress(address);
  return identity ? formatIdentity(identity) : address.trim();
}

/**
 * Labels carrying the message metadata
 */
export function buildMessageLabels(message: Message): string[] {
  const labels = [`${LABEL_FROM}${canonicalAddress(message.from)}`];
  if (message.threadId) {
    labels.push(`${LABEL_THREAD}${message.threadId}`);
  }
  if (message.replyTo) {
    labels.push(`${LABEL_REPLY_TO}${message.replyTo}`);
  }
  if (message.type && message.type !== 'notification') {
    labels.push(`${LABEL_TYPE}${message.type}`);
  }
  return labels;
}

function labelValue(labels: readonly string[], prefix: string): string | undefined {
  const label = labels.find(l => l.startsWith(prefix));
  return label === undefined ? undefined : label.slice(prefix.length);
}

function priorityFromLedger(value: number): MessagePriority {
  switch (value) {
    case 0:
      return 'urgent';
    case 1:
      return 'high';
    case 3:
      return 'low';
    default:
      return 'normal';
  }
}

/**
 * Maps a ledger record back into a message
 */
export function recordToMessage(record: LedgerRecord): ReceivedMessage {
  const type = labelValue(record.labels, LABEL_TYPE);
  const threadId = labelValue(record.labels, LABEL_THREAD);
  const replyTo = labelValue(record.labels, LABEL_REPLY_TO);
  return {
    id: record.id,
    from: labelValue(record.labels, LABEL_FROM) ?? record.actor,
    to: record.assignee,
    subject: record.title,
    body: record.description,
    priority: priorityFromLedger(record.priority),
    type: isMessageType(type) ? type : 'notification',
    createdAt: record.createdAt,
    ...(threadId !== undefined ? { threadId } : {}),
    ...(replyTo !== undefined ? { replyTo } : {}),
  };
}

// ============================================================================
// Router
// ============================================================================

export interface MailRouterDeps {
  readonly ledger: WorkLedger;
  readonly controller: SessionController;
  /** Session id prefix used to find the recipient's session */
  readonly sessionPrefix: string;
}

export interface SendResult {
  /** Ledger record id */
  readonly id: string;
  /** Whether a banner was shown in a live session */
  readonly notified: boolean;
}

export class MailRouter {
  constructor(private readonly deps: MailRouterDeps) {}

  /**
   * Persists a message and notifies the recipient's live session
   *
   * @throws ValidationError when the recipient address is outside the grammar
   * @throws InfrastructureError with code LEDGER_WRITE_FAILED
   */
  async send(message: Message): Promise<SendResult> {
    const recipient = requireAgentAddress(message.to);
    if (message.from.trim() === '') {
      throw invalidInput('from', message.from, 'sender address');
    }
    const to = formatIdentity(recipient);

    let id: string;
    try {
      id = await this.deps.ledger.createRecord({
        type: MESSAGE_RECORD_TYPE,
        title: message.subject,
        description: message.body,
        assignee: to,
        priority: PRIORITY_TO_LEDGER[message.priority ?? 'normal'],
        labels: buildMessageLabels(message),
        actor: canonicalAddress(message.from),
      });
    } catch (error) {
      logger.error(`Failed to persist message to ${to}: ${errorMessage(error)}`);
      throw ledgerWriteFailed(to, toError(error));
    }

    const notified = await this.notify(sessionIdFor(recipient, this.deps.sessionPrefix), message);
    logger.debug(`Delivered ${id} to ${to}${notified ? ' (banner shown)' : ''}`);
    return { id, notified };
  }

  /**
   * Open messages addressed to `address`, oldest first
   */
  async inbox(address: string): Promise<ReceivedMessage[]> {
    const identity = requireAgentAddress(address);
    const records = await this.deps.ledger.queryRecords({
      type: MESSAGE_RECORD_TYPE,
      assignee: formatIdentity(identity),
      status: 'open',
    });
    return records.map(recordToMessage);
  }

  async hasMail(address: string): Promise<boolean> {
    return (await this.inbox(address)).length > 0;
  }

  /**
   * Closes a message so it leaves the inbox
   */
  async acknowledge(messageId: string): Promise<void> {
    await this.deps.ledger.closeRecord(messageId);
  }

  private async notify(sessionId: string, message: Message): Promise<boolean> {
    try {
      if (!(await this.deps.controller.hasSession(sessionId))) {
        return false;
      }
      await this.deps.controller.displayBanner(sessionId, message.from, message.subject);
      return true;
    } catch (error) {
      logger.warn(`Banner for ${sessionId} failed: ${errorMessage(error)}`);
      return false;
    }
  }
}

export function createMailRouter(deps: MailRouterDeps): MailRouter {
  return new MailRouter(deps);
}
