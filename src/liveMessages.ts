import { randomUUID } from 'crypto';
import { ConversationDirectory } from './conversations';
import { DuplicateMessageIdError, NotSenderError, ValidationError } from './errors';
import { TypingIndicators } from './typing';
import { DeliveryState, Message, MessageDraft, RecipientState } from './types/Message';
import { LiveMessageRepository, Mutation } from './types/repositories';
import { Clock, isVisibleTo, sanitizeText, sortMessages } from './utils';

const DELIVERY_RANK: Record<DeliveryState, number> = {
  pending: 0,
  failed: 1,
  sent: 2,
  delivered: 3,
};

// Realtime Database keys cannot contain these
const INVALID_ID_CHARS = /[.#$/[\]]/;

export function recipientState(message: Message, userId: string): RecipientState {
  if (message.readBy[userId] !== undefined) {
    return 'read';
  }
  return message.deliveryStatus[userId]?.state ?? 'pending';
}

function hasReached(message: Message, userId: string, state: DeliveryState): boolean {
  const current = message.deliveryStatus[userId];
  return current !== undefined && DELIVERY_RANK[current.state] >= DELIVERY_RANK[state];
}

/**
 * Whether a stored message is the same send as a retried draft. Timestamps
 * and delivery state are ignored; content and author must match.
 * @param text - The draft text after sanitizing
 */
export function isSameSend(existing: Message, senderId: string, text: string, draft: MessageDraft): boolean {
  return (
    existing.senderId === senderId &&
    existing.text === text &&
    existing.type === (draft.type ?? 'text') &&
    (existing.mediaUrl ?? '') === (draft.mediaUrl ?? '')
  );
}

export interface AppendOptions {
  findArchived?: (messageId: string) => Promise<Message | null>;
}

export interface Subscription {
  unsubscribe(): void;
}

export interface LiveStoreOptions {
  clock?: Clock;
  generateId?: () => string;
}

export interface MessageTranslation {
  translatedText: string;
  detectedLanguage: string;
  translatedTo: string;
}

/**
 * The bounded window of recent messages each conversation keeps in the
 * Realtime Database. Every append is an independent child insert, and every
 * status change is a per-message transaction, so concurrent writers never
 * contend on a shared counter.
 */
export class LiveMessageStore {
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(
    private readonly repo: LiveMessageRepository,
    private readonly directory: ConversationDirectory,
    private readonly typing: TypingIndicators,
    options: LiveStoreOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  async append(conversationId: string, senderId: string, draft: MessageDraft): Promise<Message> {
    return (await this.appendTracked(conversationId, senderId, draft)).message;
  }

  /**
   * Same as append, also reporting whether this call created the message
   * or matched an earlier send of the same id.
   *
   * @param conversationId - Target conversation; the sender must be a member
   * @param senderId - Author of the message
   * @param draft - Message content, with an optional client-chosen id
   * @param options - `findArchived` looks the id up in the archive before and
   *   after the insert, so a resend never lands in both stores
   */
  async appendTracked(
    conversationId: string,
    senderId: string,
    draft: MessageDraft,
    options: AppendOptions = {}
  ): Promise<{ message: Message; created: boolean }> {
    const conversation = await this.directory.requireMember(conversationId, senderId);

    // 1. Validate content and id
    const text = sanitizeText(draft.text);
    if (!text && !draft.mediaUrl) {
      throw new ValidationError('Message text must not be empty', 'EMPTY_TEXT');
    }

    const clientId = draft.messageId?.trim();
    const messageId = clientId || this.generateId();
    if (INVALID_ID_CHARS.test(messageId)) {
      throw new ValidationError(`Invalid message id: ${messageId}`);
    }

    // 2. A resend of a stored id returns the stored copy
    if (clientId && options.findArchived) {
      const archived = await options.findArchived(messageId);
      if (archived) {
        return { message: this.resolveResend(archived, senderId, text, draft), created: false };
      }
    }

    const existing = await this.repo.get(conversationId, messageId);
    if (existing) {
      return { message: this.resolveResend(existing, senderId, text, draft), created: false };
    }

    const now = this.clock();
    const deliveryStatus: Message['deliveryStatus'] = {};
    for (const memberId of conversation.memberIds) {
      deliveryStatus[memberId] = { state: memberId === senderId ? 'sent' : 'pending', timestamp: now };
    }

    const message: Message = {
      id: messageId,
      conversationId,
      senderId,
      senderName: draft.senderName || conversation.memberDetails[senderId]?.displayName || senderId,
      text,
      createdAt: now,
      type: draft.type ?? 'text',
      ...(draft.mediaUrl ? { mediaUrl: draft.mediaUrl } : {}),
      ...(draft.replyToMessageId ? { replyToMessageId: draft.replyToMessageId } : {}),
      deliveryStatus,
      readBy: { [senderId]: now },
      isDeleted: false,
      isEdited: false,
      deletedFor: [],
    };

    // 3. Insert, then make sure no other instance archived the id meanwhile
    await this.repo.insert(message);

    if (clientId && options.findArchived) {
      const archived = await options.findArchived(messageId);
      if (archived) {
        await this.repo.removeMany(conversationId, [messageId]);
        console.warn(`⚠️ ${conversationId}/${messageId} was archived during the resend, dropped the live copy`);
        return { message: this.resolveResend(archived, senderId, text, draft), created: false };
      }
    }

    // 4. Fan out to the directory
    try {
      await this.directory.recordMessage(conversation, message);
    } catch (error) {
      // The message is durable; counters are recomputable from history
      console.error(`❌ Directory fan-out failed for ${conversationId}/${messageId}:`, error);
    }

    console.log(`✅ Appended message ${messageId} to ${conversationId}`);
    return { message, created: true };
  }

  async markDelivered(conversationId: string, messageId: string, userId: string): Promise<Message | null> {
    await this.directory.requireMember(conversationId, userId);
    const now = this.clock();

    return this.mutate(conversationId, messageId, (message) => {
      if (message.senderId === userId || hasReached(message, userId, 'delivered')) {
        return undefined;
      }
      return {
        ...message,
        deliveryStatus: { ...message.deliveryStatus, [userId]: { state: 'delivered', timestamp: now } },
      };
    });
  }

  /**
   * Read implies delivered. Also advances the reader's status record.
   */
  async markRead(
    conversationId: string,
    messageId: string,
    userId: string
  ): Promise<{ message: Message; unreadCount: number } | null> {
    await this.directory.requireMember(conversationId, userId);
    const now = this.clock();

    const message = await this.mutate(conversationId, messageId, (current) => {
      const alreadyRead = current.readBy[userId] !== undefined;
      const delivered = current.senderId === userId || hasReached(current, userId, 'delivered');
      if (alreadyRead && delivered) {
        return undefined;
      }
      return {
        ...current,
        readBy: alreadyRead ? current.readBy : { ...current.readBy, [userId]: now },
        deliveryStatus: delivered
          ? current.deliveryStatus
          : { ...current.deliveryStatus, [userId]: { state: 'delivered', timestamp: now } },
      };
    });
    if (!message) {
      return null;
    }

    const unreadCount = await this.directory.recordRead(conversationId, userId, message);
    return { message, unreadCount };
  }

  /**
   * Marks every live message from others as read, then advances the read
   * cursor once to the newest message.
   */
  async markAllRead(conversationId: string, userId: string): Promise<number> {
    await this.directory.requireMember(conversationId, userId);
    const now = this.clock();
    const messages = await this.snapshot(conversationId);

    for (const message of messages) {
      if (message.senderId === userId || message.readBy[userId] !== undefined) {
        continue;
      }
      await this.mutate(conversationId, message.id, (current) => {
        if (current.readBy[userId] !== undefined) {
          return undefined;
        }
        return {
          ...current,
          readBy: { ...current.readBy, [userId]: now },
          deliveryStatus: hasReached(current, userId, 'delivered')
            ? current.deliveryStatus
            : { ...current.deliveryStatus, [userId]: { state: 'delivered', timestamp: now } },
        };
      });
    }

    const newest = messages[messages.length - 1];
    if (!newest) {
      return this.directory.recomputeUnread(conversationId, userId);
    }
    return this.directory.recordRead(conversationId, userId, newest);
  }

  async markDeliveryFailed(conversationId: string, messageId: string, userId: string): Promise<Message | null> {
    const now = this.clock();
    return this.mutate(conversationId, messageId, (message) => {
      if (message.deliveryStatus[userId]?.state !== 'pending') {
        return undefined;
      }
      return {
        ...message,
        deliveryStatus: { ...message.deliveryStatus, [userId]: { state: 'failed', timestamp: now } },
      };
    });
  }

  /**
   * Pushes the full ordered window on every change. Messages the viewer
   * deleted for themselves are left out.
   */
  observe(
    conversationId: string,
    viewerId: string,
    listener: (messages: Message[]) => void,
    onError: (error: Error) => void = (error) =>
      console.error(`❌ Live message listener error for ${conversationId}:`, error)
  ): Subscription {
    const unsubscribe = this.repo.subscribe(
      conversationId,
      (messages) => listener(sortMessages(messages).filter((m) => isVisibleTo(m, viewerId))),
      onError
    );
    return { unsubscribe };
  }

  async setTyping(conversationId: string, userId: string, isTyping: boolean): Promise<void> {
    await this.directory.requireMember(conversationId, userId);
    await this.typing.setTyping(conversationId, userId, isTyping);
  }

  async snapshot(conversationId: string): Promise<Message[]> {
    return sortMessages(await this.repo.list(conversationId));
  }

  async get(conversationId: string, messageId: string): Promise<Message | null> {
    return this.repo.get(conversationId, messageId);
  }

  async count(conversationId: string): Promise<number> {
    return (await this.repo.list(conversationId)).length;
  }

  async editMessage(conversationId: string, messageId: string, userId: string, newText: string): Promise<Message | null> {
    const text = sanitizeText(newText);
    if (!text) {
      throw new ValidationError('Message text must not be empty', 'EMPTY_TEXT');
    }
    const now = this.clock();

    return this.mutate(conversationId, messageId, (message) => {
      this.assertSender(message, userId);
      if (message.isDeleted) {
        throw new ValidationError('Deleted messages cannot be edited');
      }
      if (message.text === text) {
        return undefined;
      }
      const { translatedText: _t, detectedLanguage: _d, translatedTo: _to, ...rest } = message;
      return { ...rest, text, isEdited: true, editedAt: now };
    });
  }

  /**
   * Deletes for everyone. Only the sender may do this.
   */
  async deleteMessage(conversationId: string, messageId: string, userId: string): Promise<Message | null> {
    return this.mutate(conversationId, messageId, (message) => {
      this.assertSender(message, userId);
      if (message.isDeleted) {
        return undefined;
      }
      const { mediaUrl: _m, translatedText: _t, ...rest } = message;
      return { ...rest, text: '', isDeleted: true };
    });
  }

  async deleteForUser(conversationId: string, messageId: string, userId: string): Promise<Message | null> {
    await this.directory.requireMember(conversationId, userId);
    return this.mutate(conversationId, messageId, (message) =>
      message.deletedFor.includes(userId) ? undefined : { ...message, deletedFor: [...message.deletedFor, userId] }
    );
  }

  async setTranslation(conversationId: string, messageId: string, translation: MessageTranslation): Promise<Message | null> {
    return this.mutate(conversationId, messageId, (message) => {
      if (
        message.translatedText === translation.translatedText &&
        message.translatedTo === translation.translatedTo &&
        message.detectedLanguage === translation.detectedLanguage
      ) {
        return undefined;
      }
      return { ...message, ...translation };
    });
  }

  async setEmbeddingId(conversationId: string, messageId: string, embeddingId: string): Promise<Message | null> {
    return this.mutate(conversationId, messageId, (message) =>
      message.embeddingId === embeddingId ? undefined : { ...message, embeddingId }
    );
  }

  /**
   * Removes messages from the live window. Only the archival coordinator
   * calls this, after the same messages are durable in the archive.
   */
  async evict(conversationId: string, messageIds: string[]): Promise<void> {
    if (messageIds.length === 0) {
      return;
    }
    await this.repo.removeMany(conversationId, messageIds);
  }

  private async mutate(conversationId: string, messageId: string, mutation: Mutation<Message>): Promise<Message | null> {
    const result = await this.repo.update(conversationId, messageId, mutation);
    return result ? result.value : null;
  }

  private assertSender(message: Message, userId: string): void {
    if (message.senderId !== userId) {
      throw new NotSenderError(message.id, userId);
    }
  }

  private resolveResend(existing: Message, senderId: string, text: string, draft: MessageDraft): Message {
    if (!isSameSend(existing, senderId, text, draft)) {
      console.error(`❌ Message id collision: ${existing.conversationId}/${existing.id}`);
      throw new DuplicateMessageIdError(existing.conversationId, existing.id);
    }
    console.log(`⏭️ Message ${existing.id} already stored, returning existing copy`);
    return existing;
  }
}
