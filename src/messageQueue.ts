import { randomUUID } from 'crypto';
import { MessagingError } from './errors';
import { Message, MessageDraft } from './types/Message';
import { sleep } from './utils';

/**
 * Exponential backoff retry delays
 * 1s, 2s, 5s, 10s, 30s
 */
export const RETRY_DELAYS = [1000, 2000, 5000, 10000, 30000];

export type OutboundState = 'queued' | 'sending' | 'sent' | 'failed';

export interface OutboundDraft extends MessageDraft {
  messageId: string;
}

export interface OutboundEntry {
  conversationId: string;
  draft: OutboundDraft;
  state: OutboundState;
  attempts: number;
  enqueuedAt: number;
  lastError?: string;
  message?: Message;
}

export interface MessageTransport {
  send(conversationId: string, draft: OutboundDraft): Promise<Message>;
}

export interface QueueOptions {
  retryDelaysMs?: number[];
  sleep?: (ms: number) => Promise<void>;
  generateId?: () => string;
}

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof MessagingError) {
    return error.retryable;
  }
  const code = errorCode(error);
  if (code === 'unavailable' || code === 'deadline-exceeded') {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return message.includes('network') || message.includes('timeout');
}

/**
 * Client-side outbox for optimistic sends. The messageId is generated here
 * once and never changes, so the server copy replaces the optimistic one
 * by id alone.
 */
export class OutboundMessageQueue {
  private readonly entries = new Map<string, OutboundEntry>();
  private readonly retryDelaysMs: number[];
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly generateId: () => string;
  private isProcessing = false;

  constructor(private readonly transport: MessageTransport, options: QueueOptions = {}) {
    this.retryDelaysMs = options.retryDelaysMs ?? RETRY_DELAYS;
    this.sleep = options.sleep ?? sleep;
    this.generateId = options.generateId ?? randomUUID;
  }

  enqueue(conversationId: string, draft: MessageDraft): OutboundEntry {
    const messageId = draft.messageId || this.generateId();
    const existing = this.entries.get(messageId);
    if (existing) {
      return existing;
    }
    const entry: OutboundEntry = {
      conversationId,
      draft: { ...draft, messageId },
      state: 'queued',
      attempts: 0,
      enqueuedAt: Date.now(),
    };
    this.entries.set(messageId, entry);
    console.log(`📤 Queued message ${messageId}`);
    return entry;
  }

  /**
   * Sends queued entries in enqueue order. Returns the entries that were attempted.
   */
  async flush(): Promise<OutboundEntry[]> {
    if (this.isProcessing) {
      console.log('⏭️ Queue already processing');
      return [];
    }
    this.isProcessing = true;
    try {
      const queued = [...this.entries.values()].filter((e) => e.state === 'queued');
      for (const entry of queued) {
        await this.sendWithRetry(entry);
      }
      return queued;
    } finally {
      this.isProcessing = false;
    }
  }

  /**
   * Explicit, user-initiated retry of a failed send.
   */
  async retry(messageId: string): Promise<OutboundEntry | null> {
    const entry = this.entries.get(messageId);
    if (!entry || entry.state !== 'failed') {
      return entry ?? null;
    }
    entry.state = 'queued';
    entry.attempts = 0;
    delete entry.lastError;
    await this.sendWithRetry(entry);
    return entry;
  }

  /**
   * Drops entries the server has confirmed, matching on messageId only.
   */
  reconcile(confirmed: Message[]): number {
    let removed = 0;
    for (const message of confirmed) {
      if (this.entries.delete(message.id)) {
        removed++;
      }
    }
    return removed;
  }

  get(messageId: string): OutboundEntry | undefined {
    return this.entries.get(messageId);
  }

  pending(): OutboundEntry[] {
    return [...this.entries.values()].filter((e) => e.state === 'queued' || e.state === 'sending');
  }

  failed(): OutboundEntry[] {
    return [...this.entries.values()].filter((e) => e.state === 'failed');
  }

  private async sendWithRetry(entry: OutboundEntry): Promise<void> {
    entry.state = 'sending';
    for (;;) {
      entry.attempts++;
      try {
        entry.message = await this.transport.send(entry.conversationId, entry.draft);
        entry.state = 'sent';
        delete entry.lastError;
        console.log(`✅ Sent message ${entry.draft.messageId}`);
        return;
      } catch (error) {
        entry.lastError = error instanceof Error ? error.message : String(error);
        const retryIndex = entry.attempts - 1;
        if (!isTransientError(error) || retryIndex >= this.retryDelaysMs.length) {
          entry.state = 'failed';
          console.error(`❌ Message ${entry.draft.messageId} failed after ${entry.attempts} attempts:`, error);
          return;
        }
        const delay = this.retryDelaysMs[retryIndex];
        console.log(`⏰ Retry ${entry.attempts}/${this.retryDelaysMs.length} for ${entry.draft.messageId} in ${delay}ms`);
        await this.sleep(delay);
      }
    }
  }
}
