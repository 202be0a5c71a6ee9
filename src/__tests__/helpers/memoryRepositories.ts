import { Conversation, NewConversation, UserConversationStatus } from '../../types/Conversation';
import { CachedTranslation, MentionedMessage } from '../../types/Insights';
import { Message } from '../../types/Message';
import {
  ArchiveCursor,
  ArchiveRepository,
  ConversationRepository,
  LiveMessageRepository,
  MentionRepository,
  Mutation,
  TranslationCacheRepository,
  TypingEntry,
  TypingRepository,
  Unsubscribe,
  UpdateResult,
  UserStatusRepository,
} from '../../types/repositories';
import { compareMessages } from '../../utils';

function copy<T>(value: T): T {
  return structuredClone(value);
}

export class MemoryLiveMessageRepository implements LiveMessageRepository {
  readonly messages = new Map<string, Map<string, Message>>();
  private readonly listeners = new Map<string, Set<(messages: Message[]) => void>>();

  async insert(message: Message): Promise<void> {
    this.bucket(message.conversationId).set(message.id, copy(message));
    this.emit(message.conversationId);
  }

  async get(conversationId: string, messageId: string): Promise<Message | null> {
    const found = this.bucket(conversationId).get(messageId);
    return found ? copy(found) : null;
  }

  async list(conversationId: string): Promise<Message[]> {
    return [...this.bucket(conversationId).values()].map(copy);
  }

  async update(
    conversationId: string,
    messageId: string,
    mutate: Mutation<Message>
  ): Promise<UpdateResult<Message> | null> {
    const current = this.bucket(conversationId).get(messageId);
    if (!current) {
      return null;
    }
    const next = mutate(copy(current));
    if (next === undefined) {
      return { value: copy(current), changed: false };
    }
    this.bucket(conversationId).set(messageId, copy(next));
    this.emit(conversationId);
    return { value: copy(next), changed: true };
  }

  async removeMany(conversationId: string, messageIds: string[]): Promise<void> {
    for (const id of messageIds) {
      this.bucket(conversationId).delete(id);
    }
    this.emit(conversationId);
  }

  subscribe(
    conversationId: string,
    onChange: (messages: Message[]) => void,
    _onError: (error: Error) => void
  ): Unsubscribe {
    const set = this.listeners.get(conversationId) ?? new Set();
    set.add(onChange);
    this.listeners.set(conversationId, set);
    onChange([...this.bucket(conversationId).values()].map(copy));
    return () => set.delete(onChange);
  }

  private bucket(conversationId: string): Map<string, Message> {
    let bucket = this.messages.get(conversationId);
    if (!bucket) {
      bucket = new Map();
      this.messages.set(conversationId, bucket);
    }
    return bucket;
  }

  private emit(conversationId: string): void {
    const snapshot = [...this.bucket(conversationId).values()];
    for (const listener of this.listeners.get(conversationId) ?? []) {
      listener(snapshot.map(copy));
    }
  }
}

export class MemoryArchiveRepository implements ArchiveRepository {
  readonly messages = new Map<string, Map<string, Message>>();

  async getMany(conversationId: string, messageIds: string[]): Promise<Map<string, Message>> {
    const found = new Map<string, Message>();
    for (const id of messageIds) {
      const message = this.bucket(conversationId).get(id);
      if (message) {
        found.set(id, copy(message));
      }
    }
    return found;
  }

  async putMany(conversationId: string, messages: Message[]): Promise<void> {
    for (const message of messages) {
      this.bucket(conversationId).set(message.id, copy(message));
    }
  }

  async page(conversationId: string, cursor: ArchiveCursor, limit: number): Promise<Message[]> {
    return [...this.bucket(conversationId).values()]
      .filter((m) =>
        cursor.beforeMessageId === undefined
          ? m.createdAt < cursor.beforeTimestamp
          : m.createdAt < cursor.beforeTimestamp ||
            (m.createdAt === cursor.beforeTimestamp && m.id < cursor.beforeMessageId)
      )
      .sort((a, b) => compareMessages(b, a))
      .slice(0, limit)
      .map(copy);
  }

  async listCreatedAfter(conversationId: string, afterTimestamp: number): Promise<Message[]> {
    return [...this.bucket(conversationId).values()]
      .filter((m) => m.createdAt > afterTimestamp)
      .sort(compareMessages)
      .map(copy);
  }

  async count(conversationId: string): Promise<number> {
    return this.bucket(conversationId).size;
  }

  private bucket(conversationId: string): Map<string, Message> {
    let bucket = this.messages.get(conversationId);
    if (!bucket) {
      bucket = new Map();
      this.messages.set(conversationId, bucket);
    }
    return bucket;
  }
}

export class MemoryConversationRepository implements ConversationRepository {
  readonly conversations = new Map<string, Conversation>();
  private nextId = 1;

  async create(data: NewConversation): Promise<Conversation> {
    const conversation: Conversation = { ...copy(data), id: `conv-${this.nextId++}` };
    this.conversations.set(conversation.id, copy(conversation));
    return conversation;
  }

  async createIfAbsent(
    conversationId: string,
    data: NewConversation
  ): Promise<{ conversation: Conversation; created: boolean }> {
    const existing = this.conversations.get(conversationId);
    if (existing) {
      return { conversation: copy(existing), created: false };
    }
    const conversation: Conversation = { ...copy(data), id: conversationId };
    this.conversations.set(conversationId, copy(conversation));
    return { conversation, created: true };
  }

  async get(conversationId: string): Promise<Conversation | null> {
    const found = this.conversations.get(conversationId);
    return found ? copy(found) : null;
  }

  async findByMemberKey(memberKey: string): Promise<Conversation[]> {
    return [...this.conversations.values()].filter((c) => c.memberKey === memberKey).map(copy);
  }

  async update(conversationId: string, mutate: Mutation<Conversation>): Promise<UpdateResult<Conversation> | null> {
    const current = this.conversations.get(conversationId);
    if (!current) {
      return null;
    }
    const next = mutate(copy(current));
    if (next === undefined) {
      return { value: copy(current), changed: false };
    }
    this.conversations.set(conversationId, copy(next));
    return { value: copy(next), changed: true };
  }

  async incrementMessageCount(conversationId: string, by: number): Promise<void> {
    const current = this.conversations.get(conversationId);
    if (current) {
      current.metadata.totalMessages += by;
    }
  }
}

export class MemoryUserStatusRepository implements UserStatusRepository {
  readonly statuses = new Map<string, UserConversationStatus>();

  async get(userId: string, conversationId: string): Promise<UserConversationStatus | null> {
    const found = this.statuses.get(`${userId}/${conversationId}`);
    return found ? copy(found) : null;
  }

  async put(userId: string, status: UserConversationStatus): Promise<void> {
    this.statuses.set(`${userId}/${status.conversationId}`, copy(status));
  }

  async update(
    userId: string,
    conversationId: string,
    mutate: Mutation<UserConversationStatus>
  ): Promise<UpdateResult<UserConversationStatus> | null> {
    const key = `${userId}/${conversationId}`;
    const current = this.statuses.get(key);
    if (!current) {
      return null;
    }
    const next = mutate(copy(current));
    if (next === undefined) {
      return { value: copy(current), changed: false };
    }
    this.statuses.set(key, copy(next));
    return { value: copy(next), changed: true };
  }

  async listForUser(userId: string): Promise<UserConversationStatus[]> {
    return [...this.statuses.entries()].filter(([key]) => key.startsWith(`${userId}/`)).map(([, s]) => copy(s));
  }
}

export class MemoryTypingRepository implements TypingRepository {
  readonly entries = new Map<string, Map<string, number>>();
  private readonly listeners = new Map<string, Set<(entries: TypingEntry[]) => void>>();

  async set(conversationId: string, userId: string, expiresAt: number): Promise<void> {
    const bucket = this.entries.get(conversationId) ?? new Map<string, number>();
    bucket.set(userId, expiresAt);
    this.entries.set(conversationId, bucket);
    this.emit(conversationId);
  }

  async remove(conversationId: string, userId: string): Promise<void> {
    if (this.entries.get(conversationId)?.delete(userId)) {
      this.emit(conversationId);
    }
  }

  async list(conversationId: string): Promise<TypingEntry[]> {
    return this.snapshot(conversationId);
  }

  async removeExpired(now: number): Promise<number> {
    let removed = 0;
    for (const bucket of this.entries.values()) {
      for (const [userId, expiresAt] of bucket) {
        if (expiresAt <= now) {
          bucket.delete(userId);
          removed++;
        }
      }
    }
    return removed;
  }

  subscribe(
    conversationId: string,
    onChange: (entries: TypingEntry[]) => void,
    _onError: (error: Error) => void
  ): Unsubscribe {
    const set = this.listeners.get(conversationId) ?? new Set();
    set.add(onChange);
    this.listeners.set(conversationId, set);
    onChange(this.snapshot(conversationId));
    return () => set.delete(onChange);
  }

  private snapshot(conversationId: string): TypingEntry[] {
    return [...(this.entries.get(conversationId) ?? new Map<string, number>()).entries()].map(
      ([userId, expiresAt]) => ({ userId, expiresAt })
    );
  }

  private emit(conversationId: string): void {
    for (const listener of this.listeners.get(conversationId) ?? []) {
      listener(this.snapshot(conversationId));
    }
  }
}

export class MemoryTranslationCacheRepository implements TranslationCacheRepository {
  readonly entries = new Map<string, CachedTranslation>();

  async get(messageId: string, targetLanguage: string): Promise<CachedTranslation | null> {
    const found = this.entries.get(`${messageId}/${targetLanguage}`);
    return found ? copy(found) : null;
  }

  async put(entry: CachedTranslation): Promise<void> {
    this.entries.set(`${entry.messageId}/${entry.targetLanguage}`, copy(entry));
  }
}

export class MemoryMentionRepository implements MentionRepository {
  readonly mentions = new Map<string, Map<string, MentionedMessage>>();
  private nextId = 1;

  async create(userId: string, mention: Omit<MentionedMessage, 'id'>): Promise<MentionedMessage> {
    const created: MentionedMessage = { id: `mention-${this.nextId++}`, ...mention };
    this.bucket(userId).set(created.id, copy(created));
    return created;
  }

  async list(userId: string): Promise<MentionedMessage[]> {
    return [...this.bucket(userId).values()].map(copy);
  }

  async find(userId: string, messageId: string, reason: MentionedMessage['reason']): Promise<MentionedMessage | null> {
    const found = [...this.bucket(userId).values()].find((m) => m.messageId === messageId && m.reason === reason);
    return found ? copy(found) : null;
  }

  async markRead(userId: string, mentionId: string): Promise<boolean> {
    const found = this.bucket(userId).get(mentionId);
    if (!found) {
      return false;
    }
    found.isRead = true;
    return true;
  }

  async remove(userId: string, mentionId: string): Promise<void> {
    this.bucket(userId).delete(mentionId);
  }

  private bucket(userId: string): Map<string, MentionedMessage> {
    let bucket = this.mentions.get(userId);
    if (!bucket) {
      bucket = new Map();
      this.mentions.set(userId, bucket);
    }
    return bucket;
  }
}

export interface MemoryRepositories {
  live: MemoryLiveMessageRepository;
  archive: MemoryArchiveRepository;
  conversations: MemoryConversationRepository;
  statuses: MemoryUserStatusRepository;
  typing: MemoryTypingRepository;
  translations: MemoryTranslationCacheRepository;
  mentions: MemoryMentionRepository;
}

export function memoryRepositories(): MemoryRepositories {
  return {
    live: new MemoryLiveMessageRepository(),
    archive: new MemoryArchiveRepository(),
    conversations: new MemoryConversationRepository(),
    statuses: new MemoryUserStatusRepository(),
    typing: new MemoryTypingRepository(),
    translations: new MemoryTranslationCacheRepository(),
    mentions: new MemoryMentionRepository(),
  };
}
