import { Conversation, NewConversation, UserConversationStatus } from './Conversation';
import { CachedTranslation, MentionedMessage } from './Insights';
import { Message } from './Message';

export type Unsubscribe = () => void;

/**
 * Read-modify-write callback run inside a store transaction.
 * Returning undefined aborts without writing.
 */
export type Mutation<T> = (current: T) => T | undefined;

export interface UpdateResult<T> {
  value: T;
  changed: boolean;
}

export interface ArchiveCursor {
  beforeTimestamp: number;
  beforeMessageId?: string;
}

export interface LiveMessageRepository {
  insert(message: Message): Promise<void>;
  get(conversationId: string, messageId: string): Promise<Message | null>;
  list(conversationId: string): Promise<Message[]>;
  update(
    conversationId: string,
    messageId: string,
    mutate: Mutation<Message>
  ): Promise<UpdateResult<Message> | null>;
  removeMany(conversationId: string, messageIds: string[]): Promise<void>;
  subscribe(
    conversationId: string,
    onChange: (messages: Message[]) => void,
    onError: (error: Error) => void
  ): Unsubscribe;
}

export interface ArchiveRepository {
  getMany(conversationId: string, messageIds: string[]): Promise<Map<string, Message>>;
  putMany(conversationId: string, messages: Message[]): Promise<void>;
  page(conversationId: string, cursor: ArchiveCursor, limit: number): Promise<Message[]>;
  listCreatedAfter(conversationId: string, afterTimestamp: number): Promise<Message[]>;
  count(conversationId: string): Promise<number>;
}

export interface ConversationRepository {
  create(data: NewConversation): Promise<Conversation>;
  /**
   * Creates the document under a caller-chosen id unless it already exists,
   * in which case the stored conversation comes back with `created: false`.
   */
  createIfAbsent(conversationId: string, data: NewConversation): Promise<{ conversation: Conversation; created: boolean }>;
  get(conversationId: string): Promise<Conversation | null>;
  findByMemberKey(memberKey: string): Promise<Conversation[]>;
  update(
    conversationId: string,
    mutate: Mutation<Conversation>
  ): Promise<UpdateResult<Conversation> | null>;
  incrementMessageCount(conversationId: string, by: number): Promise<void>;
}

export interface UserStatusRepository {
  get(userId: string, conversationId: string): Promise<UserConversationStatus | null>;
  put(userId: string, status: UserConversationStatus): Promise<void>;
  update(
    userId: string,
    conversationId: string,
    mutate: Mutation<UserConversationStatus>
  ): Promise<UpdateResult<UserConversationStatus> | null>;
  listForUser(userId: string): Promise<UserConversationStatus[]>;
}

export interface TypingEntry {
  userId: string;
  expiresAt: number;
}

export interface TypingRepository {
  set(conversationId: string, userId: string, expiresAt: number): Promise<void>;
  remove(conversationId: string, userId: string): Promise<void>;
  list(conversationId: string): Promise<TypingEntry[]>;
  removeExpired(now: number): Promise<number>;
  subscribe(
    conversationId: string,
    onChange: (entries: TypingEntry[]) => void,
    onError: (error: Error) => void
  ): Unsubscribe;
}

export interface TranslationCacheRepository {
  get(messageId: string, targetLanguage: string): Promise<CachedTranslation | null>;
  put(entry: CachedTranslation): Promise<void>;
}

export interface MentionRepository {
  create(userId: string, mention: Omit<MentionedMessage, 'id'>): Promise<MentionedMessage>;
  list(userId: string): Promise<MentionedMessage[]>;
  find(userId: string, messageId: string, reason: MentionedMessage['reason']): Promise<MentionedMessage | null>;
  markRead(userId: string, mentionId: string): Promise<boolean>;
  remove(userId: string, mentionId: string): Promise<void>;
}
