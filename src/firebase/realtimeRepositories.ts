import * as admin from 'firebase-admin';
import { UserConversationStatus } from '../types/Conversation';
import { CachedTranslation, MentionedMessage } from '../types/Insights';
import { Message } from '../types/Message';
import {
  LiveMessageRepository,
  MentionRepository,
  Mutation,
  TranslationCacheRepository,
  TypingEntry,
  TypingRepository,
  Unsubscribe,
  UpdateResult,
  UserStatusRepository,
} from '../types/repositories';
import { getDatabase } from './admin';
import {
  decodeMention,
  decodeMessage,
  decodeStatus,
  decodeTranslation,
  encodeMessage,
  encodeStatus,
  isRecord,
} from './codec';
import { transact } from './transaction';

type DatabaseProvider = () => admin.database.Database;

function decodeMessages(conversationId: string, value: unknown): Message[] {
  if (!isRecord(value)) {
    return [];
  }
  const messages: Message[] = [];
  for (const [id, raw] of Object.entries(value)) {
    const message = decodeMessage(conversationId, id, raw);
    if (message) {
      messages.push(message);
    }
  }
  return messages;
}

function decodeTyping(value: unknown): TypingEntry[] {
  if (!isRecord(value)) {
    return [];
  }
  const entries: TypingEntry[] = [];
  for (const [userId, raw] of Object.entries(value)) {
    if (isRecord(raw) && typeof raw.expiresAt === 'number') {
      entries.push({ userId, expiresAt: raw.expiresAt });
    }
  }
  return entries;
}

/**
 * conversations/{conversationId}/activeMessages/{messageId}
 */
export class RealtimeLiveMessageRepository implements LiveMessageRepository {
  constructor(private readonly db: DatabaseProvider = getDatabase) {}

  async insert(message: Message): Promise<void> {
    await this.messagesRef(message.conversationId).child(message.id).set(encodeMessage(message));
  }

  async get(conversationId: string, messageId: string): Promise<Message | null> {
    const snapshot = await this.messagesRef(conversationId).child(messageId).once('value');
    return decodeMessage(conversationId, messageId, snapshot.val());
  }

  async list(conversationId: string): Promise<Message[]> {
    const snapshot = await this.messagesRef(conversationId).once('value');
    return decodeMessages(conversationId, snapshot.val());
  }

  async update(
    conversationId: string,
    messageId: string,
    mutate: Mutation<Message>
  ): Promise<UpdateResult<Message> | null> {
    return transact(
      this.messagesRef(conversationId).child(messageId),
      (raw) => decodeMessage(conversationId, messageId, raw),
      encodeMessage,
      mutate
    );
  }

  async removeMany(conversationId: string, messageIds: string[]): Promise<void> {
    const updates: Record<string, null> = {};
    for (const id of messageIds) {
      updates[id] = null;
    }
    // single multi-path update, all or nothing
    await this.messagesRef(conversationId).update(updates);
  }

  subscribe(
    conversationId: string,
    onChange: (messages: Message[]) => void,
    onError: (error: Error) => void
  ): Unsubscribe {
    const ref = this.messagesRef(conversationId);
    const callback = (snapshot: admin.database.DataSnapshot): void => {
      onChange(decodeMessages(conversationId, snapshot.val()));
    };
    ref.on('value', callback, onError);
    return () => ref.off('value', callback);
  }

  private messagesRef(conversationId: string): admin.database.Reference {
    return this.db().ref(`conversations/${conversationId}/activeMessages`);
  }
}

/**
 * userConversations/{userId}/{conversationId}
 */
export class RealtimeUserStatusRepository implements UserStatusRepository {
  constructor(private readonly db: DatabaseProvider = getDatabase) {}

  async get(userId: string, conversationId: string): Promise<UserConversationStatus | null> {
    const snapshot = await this.statusRef(userId, conversationId).once('value');
    return decodeStatus(conversationId, snapshot.val());
  }

  async put(userId: string, status: UserConversationStatus): Promise<void> {
    await this.statusRef(userId, status.conversationId).set(encodeStatus(status));
  }

  async update(
    userId: string,
    conversationId: string,
    mutate: Mutation<UserConversationStatus>
  ): Promise<UpdateResult<UserConversationStatus> | null> {
    return transact(
      this.statusRef(userId, conversationId),
      (raw) => decodeStatus(conversationId, raw),
      encodeStatus,
      mutate
    );
  }

  async listForUser(userId: string): Promise<UserConversationStatus[]> {
    const snapshot = await this.db().ref(`userConversations/${userId}`).once('value');
    const value: unknown = snapshot.val();
    if (!isRecord(value)) {
      return [];
    }
    const statuses: UserConversationStatus[] = [];
    for (const [conversationId, raw] of Object.entries(value)) {
      const status = decodeStatus(conversationId, raw);
      if (status) {
        statuses.push(status);
      }
    }
    return statuses;
  }

  private statusRef(userId: string, conversationId: string): admin.database.Reference {
    return this.db().ref(`userConversations/${userId}/${conversationId}`);
  }
}

/**
 * typing/{conversationId}/{userId} = { expiresAt }
 */
export class RealtimeTypingRepository implements TypingRepository {
  constructor(private readonly db: DatabaseProvider = getDatabase) {}

  async set(conversationId: string, userId: string, expiresAt: number): Promise<void> {
    await this.db().ref(`typing/${conversationId}/${userId}`).set({ expiresAt });
  }

  async remove(conversationId: string, userId: string): Promise<void> {
    await this.db().ref(`typing/${conversationId}/${userId}`).remove();
  }

  async list(conversationId: string): Promise<TypingEntry[]> {
    const snapshot = await this.db().ref(`typing/${conversationId}`).once('value');
    return decodeTyping(snapshot.val());
  }

  async removeExpired(now: number): Promise<number> {
    const root = this.db().ref('typing');
    const snapshot = await root.once('value');
    const value: unknown = snapshot.val();
    if (!isRecord(value)) {
      return 0;
    }

    const updates: Record<string, null> = {};
    for (const [conversationId, raw] of Object.entries(value)) {
      for (const entry of decodeTyping(raw)) {
        if (entry.expiresAt <= now) {
          updates[`${conversationId}/${entry.userId}`] = null;
        }
      }
    }
    const count = Object.keys(updates).length;
    if (count > 0) {
      await root.update(updates);
    }
    return count;
  }

  subscribe(
    conversationId: string,
    onChange: (entries: TypingEntry[]) => void,
    onError: (error: Error) => void
  ): Unsubscribe {
    const ref = this.db().ref(`typing/${conversationId}`);
    const callback = (snapshot: admin.database.DataSnapshot): void => {
      onChange(decodeTyping(snapshot.val()));
    };
    ref.on('value', callback, onError);
    return () => ref.off('value', callback);
  }
}

/**
 * translationCache/{messageId}/{targetLanguage}
 */
export class RealtimeTranslationCacheRepository implements TranslationCacheRepository {
  constructor(private readonly db: DatabaseProvider = getDatabase) {}

  async get(messageId: string, targetLanguage: string): Promise<CachedTranslation | null> {
    const snapshot = await this.db().ref(`translationCache/${messageId}/${targetLanguage}`).once('value');
    return decodeTranslation(messageId, targetLanguage, snapshot.val());
  }

  async put(entry: CachedTranslation): Promise<void> {
    await this.db().ref(`translationCache/${entry.messageId}/${entry.targetLanguage}`).set({
      translatedText: entry.translatedText,
      detectedLanguage: entry.detectedLanguage,
      cachedAt: entry.cachedAt,
    });
  }
}

/**
 * users/{userId}/mentionedMessages/{mentionId}
 */
export class RealtimeMentionRepository implements MentionRepository {
  constructor(private readonly db: DatabaseProvider = getDatabase) {}

  async create(userId: string, mention: Omit<MentionedMessage, 'id'>): Promise<MentionedMessage> {
    const ref = this.mentionsRef(userId).push();
    if (!ref.key) {
      throw new Error(`Could not allocate a mention id for ${userId}`);
    }
    await ref.set(mention);
    return { id: ref.key, ...mention };
  }

  async list(userId: string): Promise<MentionedMessage[]> {
    const snapshot = await this.mentionsRef(userId).once('value');
    return this.decodeAll(snapshot.val());
  }

  async find(userId: string, messageId: string, reason: MentionedMessage['reason']): Promise<MentionedMessage | null> {
    const snapshot = await this.mentionsRef(userId).orderByChild('messageId').equalTo(messageId).once('value');
    return this.decodeAll(snapshot.val()).find((m) => m.reason === reason) ?? null;
  }

  async markRead(userId: string, mentionId: string): Promise<boolean> {
    const ref = this.mentionsRef(userId).child(mentionId);
    const snapshot = await ref.once('value');
    if (!snapshot.exists()) {
      return false;
    }
    await ref.update({ isRead: true });
    return true;
  }

  async remove(userId: string, mentionId: string): Promise<void> {
    await this.mentionsRef(userId).child(mentionId).remove();
  }

  private mentionsRef(userId: string): admin.database.Reference {
    return this.db().ref(`users/${userId}/mentionedMessages`);
  }

  private decodeAll(value: unknown): MentionedMessage[] {
    if (!isRecord(value)) {
      return [];
    }
    const mentions: MentionedMessage[] = [];
    for (const [id, raw] of Object.entries(value)) {
      const mention = decodeMention(id, raw);
      if (mention) {
        mentions.push(mention);
      }
    }
    return mentions;
  }
}
