import { createHash } from 'crypto';
import { config } from './config';
import { Message } from './types/Message';

export type Clock = () => number;

// Control characters except tab, newline and carriage return
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g;

export function sanitizeText(text: string, maxLength = config.messages.maxTextLength): string {
  return text.replace(CONTROL_CHARS, '').trim().substring(0, maxLength);
}

export function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : text.substring(0, maxLength);
}

/**
 * Total order for a conversation timeline: createdAt, then messageId.
 */
export function compareMessages(a: Message, b: Message): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt - b.createdAt;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export function sortMessages(messages: Message[]): Message[] {
  return [...messages].sort(compareMessages);
}

export function memberKeyFor(memberIds: string[]): string {
  return [...new Set(memberIds)].sort().join(',');
}

/**
 * Document id shared by every attempt to open the direct conversation of
 * one member set, so concurrent first sends land on the same document.
 */
export function directConversationId(memberKey: string): string {
  return `direct_${createHash('sha256').update(memberKey).digest('hex').slice(0, 40)}`;
}

export function isVisibleTo(message: Message, userId: string): boolean {
  return !message.deletedFor.includes(userId);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
