import { config } from './config';
import { DuplicateMessageIdError, ValidationError } from './errors';
import { Message } from './types/Message';
import { ArchiveRepository } from './types/repositories';

export interface ArchiveResult {
  written: string[];
  skipped: string[];
}

// Fields that never change once a message is archived. Delivery and read
// state are snapshots and may legitimately differ between two archive attempts.
function contentFingerprint(message: Message): string {
  return JSON.stringify([
    message.id,
    message.conversationId,
    message.senderId,
    message.senderName,
    message.text,
    message.createdAt,
    message.type,
    message.mediaUrl ?? null,
    message.replyToMessageId ?? null,
  ]);
}

function compareNewestFirst(a: Message, b: Message): number {
  if (a.createdAt !== b.createdAt) {
    return b.createdAt - a.createdAt;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? 1 : -1;
}

/**
 * Durable, append-only history in Firestore. Nothing here mutates a message
 * after it is written.
 */
export class ArchiveMessageStore {
  constructor(private readonly repo: ArchiveRepository) {}

  /**
   * Idempotent for identical content; an id that already holds different
   * content is an integrity failure and nothing from the batch is written.
   */
  async archive(conversationId: string, messages: Message[]): Promise<ArchiveResult> {
    if (messages.length === 0) {
      return { written: [], skipped: [] };
    }

    const batch = new Map<string, Message>();
    for (const message of messages) {
      if (message.conversationId !== conversationId) {
        throw new ValidationError(`Message ${message.id} belongs to ${message.conversationId}, not ${conversationId}`);
      }
      const earlier = batch.get(message.id);
      if (earlier && contentFingerprint(earlier) !== contentFingerprint(message)) {
        throw new DuplicateMessageIdError(conversationId, message.id);
      }
      batch.set(message.id, message);
    }

    const existing = await this.repo.getMany(conversationId, [...batch.keys()]);
    const toWrite: Message[] = [];
    const skipped: string[] = [];

    for (const message of batch.values()) {
      const stored = existing.get(message.id);
      if (!stored) {
        toWrite.push(message);
      } else if (contentFingerprint(stored) === contentFingerprint(message)) {
        skipped.push(message.id);
      } else {
        console.error(`❌ Archive collision for ${conversationId}/${message.id}`);
        throw new DuplicateMessageIdError(conversationId, message.id);
      }
    }

    if (toWrite.length > 0) {
      await this.repo.putMany(conversationId, toWrite);
    }

    console.log(`📦 Archived ${toWrite.length} messages for ${conversationId} (${skipped.length} already present)`);
    return { written: toWrite.map((m) => m.id), skipped };
  }

  /**
   * Messages strictly older than the cursor, newest first. Passing the last
   * seen message id as well keeps equal timestamps from being skipped.
   */
  async page(
    conversationId: string,
    beforeTimestamp: number,
    limit: number,
    beforeMessageId?: string
  ): Promise<Message[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > config.archive.maxPageSize) {
      throw new ValidationError(`limit must be between 1 and ${config.archive.maxPageSize}`);
    }
    const messages = await this.repo.page(conversationId, { beforeTimestamp, beforeMessageId }, limit);
    return [...messages].sort(compareNewestFirst).slice(0, limit);
  }

  async get(conversationId: string, messageId: string): Promise<Message | null> {
    const found = await this.repo.getMany(conversationId, [messageId]);
    return found.get(messageId) ?? null;
  }

  async has(conversationId: string, messageId: string): Promise<boolean> {
    return (await this.get(conversationId, messageId)) !== null;
  }

  async count(conversationId: string): Promise<number> {
    return this.repo.count(conversationId);
  }
}
