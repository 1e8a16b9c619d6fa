/**
 * Mail Message Types
 */

export type MessagePriority = 'urgent' | 'high' | 'normal' | 'low';

export type MessageType = 'notification' | 'task' | 'scavenge' | 'reply';

export function isMessagePriority(value: unknown): value is MessagePriority {
  return value === 'urgent' || value === 'high' || value === 'normal' || value === 'low';
}

export function isMessageType(value: unknown): value is MessageType {
  return value === 'notification' || value === 'task' || value === 'scavenge' || value === 'reply';
}

/**
 * Numeric ledger priority for each message priority (0 is most urgent)
 */
export const PRIORITY_TO_LEDGER: Readonly<Record<MessagePriority, number>> = {
  urgent: 0,
  high: 1,
  normal: 2,
  low: 3,
};

/**
 * Message between agents. Once sent it is owned by the work ledger.
 */
export interface Message {
  /** Sender address */
  readonly from: string;
  /** Recipient address */
  readonly to: string;
  readonly subject: string;
  readonly body: string;
  /** Defaults to normal */
  readonly priority?: MessagePriority;
  readonly threadId?: string;
  /** Id of the message this one answers */
  readonly replyTo?: string;
  /** Defaults to notification */
  readonly type?: MessageType;
}

/**
 * Message read back from an inbox
 */
export interface ReceivedMessage extends Required<Pick<Message, 'from' | 'to' | 'subject' | 'body' | 'priority' | 'type'>> {
  /** Ledger record id; pass to acknowledge */
  readonly id: string;
  readonly threadId?: string;
  readonly replyTo?: string;
  readonly createdAt?: string;
}
