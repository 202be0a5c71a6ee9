import { ArchiveMessageStore } from './archive';
import { ArchivalCoordinator } from './archival';
import { ConversationDirectory, CreateConversationInput, previewOf } from './conversations';
import { ArchivedMessageImmutableError, MessageNotFoundError, isRetryable } from './errors';
import { LiveMessageStore } from './liveMessages';
import { MentionService } from './mentions';
import { MessageEmbedder } from './messageEmbedding';
import { MessageEvents } from './notifications';
import { TranslationService } from './translation';
import { TypingIndicators } from './typing';
import { Conversation } from './types/Conversation';
import { MentionedMessage, TranslationResult } from './types/Insights';
import { Message, MessageDraft } from './types/Message';
import { isVisibleTo } from './utils';

const PREVIEW_CANDIDATE_PAGE = 20;

export interface MessagingDependencies {
  directory: ConversationDirectory;
  live: LiveMessageStore;
  archive: ArchiveMessageStore;
  archival: ArchivalCoordinator;
  mentions: MentionService;
  translation: TranslationService;
  events: MessageEvents;
  typing: TypingIndicators;
  embeddings?: MessageEmbedder;
}

/**
 * Entry point for user-facing message operations. Composes the stores so
 * callers never have to know which half of the history a message lives in.
 */
export class MessagingService {
  constructor(private readonly deps: MessagingDependencies) {}

  /**
   * Idempotent on messageId across live and archive. Post-commit work
   * (archival, typing, mentions, notification) never fails the send.
   *
   * @param conversationId - Target conversation
   * @param senderId - Authenticated sender; must be a member
   * @param draft - Message content and optional client id
   * @returns The stored message, or the earlier copy on a resend
   */
  async sendMessage(conversationId: string, senderId: string, draft: MessageDraft): Promise<Message> {
    // 1. Lookup and insert run between archival passes of this conversation
    const { message, created } = await this.deps.archival.runExclusive(conversationId, () =>
      this.deps.live.appendTracked(conversationId, senderId, draft, {
        findArchived: (messageId) => this.deps.archive.get(conversationId, messageId),
      })
    );

    // 2. Archival and notifications take the lock again, so they run after it is released
    if (created) {
      await this.afterCommit(message);
    }
    return message;
  }

  async createConversationAndSendMessage(
    input: CreateConversationInput,
    draft: MessageDraft
  ): Promise<{ conversation: Conversation; message: Message; created: boolean }> {
    const { conversation, created } = await this.deps.directory.findOrCreateConversation(input);
    const message = await this.sendMessage(conversation.id, input.createdBy, draft);
    return { conversation, message, created };
  }

  async loadRecentMessages(conversationId: string, viewerId: string): Promise<Message[]> {
    await this.deps.directory.requireMember(conversationId, viewerId);
    return (await this.deps.live.snapshot(conversationId)).filter((m) => isVisibleTo(m, viewerId));
  }

  async loadOlderMessages(
    conversationId: string,
    viewerId: string,
    beforeTimestamp: number,
    limit: number,
    beforeMessageId?: string
  ): Promise<Message[]> {
    await this.deps.directory.requireMember(conversationId, viewerId);
    const page = await this.deps.archive.page(conversationId, beforeTimestamp, limit, beforeMessageId);
    return page.filter((m) => isVisibleTo(m, viewerId));
  }

  /**
   * Returns null once the message is archived: delivery state is final there.
   */
  async markDelivered(conversationId: string, messageId: string, userId: string): Promise<Message | null> {
    const updated = await this.mutateLive(conversationId, messageId, () =>
      this.deps.live.markDelivered(conversationId, messageId, userId)
    );
    if (updated) {
      return updated;
    }
    await this.requireArchived(conversationId, messageId);
    return null;
  }

  /**
   * Returns the reader's unread count after the update.
   */
  async markRead(conversationId: string, messageId: string, userId: string): Promise<number> {
    const result = await this.mutateLive(conversationId, messageId, () =>
      this.deps.live.markRead(conversationId, messageId, userId)
    );
    if (result) {
      return result.unreadCount;
    }
    const archived = await this.requireArchived(conversationId, messageId);
    return this.deps.directory.recordRead(conversationId, userId, archived);
  }

  async markConversationRead(conversationId: string, userId: string): Promise<number> {
    return this.deps.archival.runExclusive(conversationId, () => this.deps.live.markAllRead(conversationId, userId));
  }

  async editMessage(conversationId: string, messageId: string, userId: string, text: string): Promise<Message> {
    await this.deps.directory.requireMember(conversationId, userId);
    const edited = await this.mutateLive(conversationId, messageId, () =>
      this.deps.live.editMessage(conversationId, messageId, userId, text)
    );
    if (!edited) {
      throw await this.missingLiveMessage(conversationId, messageId);
    }
    await this.deps.directory.updateLastMessage(conversationId, previewOf(edited));
    return edited;
  }

  async deleteMessage(conversationId: string, messageId: string, userId: string): Promise<Message> {
    const conversation = await this.deps.directory.requireMember(conversationId, userId);
    const deleted = await this.mutateLive(conversationId, messageId, () =>
      this.deps.live.deleteMessage(conversationId, messageId, userId)
    );
    if (!deleted) {
      throw await this.missingLiveMessage(conversationId, messageId);
    }
    if (conversation.lastMessage?.messageId === messageId) {
      await this.refreshPreview(conversationId);
    }
    return deleted;
  }

  async deleteMessageForUser(conversationId: string, messageId: string, userId: string): Promise<number> {
    const conversation = await this.deps.directory.requireMember(conversationId, userId);
    const updated = await this.mutateLive(conversationId, messageId, () =>
      this.deps.live.deleteForUser(conversationId, messageId, userId)
    );
    if (!updated) {
      throw await this.missingLiveMessage(conversationId, messageId);
    }
    if (conversation.lastMessage?.messageId === messageId) {
      await this.refreshPreview(conversationId);
    }
    return this.deps.directory.recomputeUnread(conversationId, userId);
  }

  async setTyping(conversationId: string, userId: string, isTyping: boolean): Promise<void> {
    await this.deps.live.setTyping(conversationId, userId, isTyping);
  }

  /**
   * Members typing right now, without the viewer. Expired flags are left out
   * even before the sweep removes them.
   */
  async getTypingUsers(conversationId: string, viewerId: string): Promise<string[]> {
    await this.deps.directory.requireMember(conversationId, viewerId);
    return this.deps.typing.getTypingUsers(conversationId, viewerId);
  }

  /**
   * Once every member has hidden the conversation its embeddings are removed.
   */
  async hideConversation(conversationId: string, userId: string): Promise<{ allHidden: boolean; embeddingsDeleted: number }> {
    const { allHidden } = await this.deps.directory.hideForUser(conversationId, userId);
    let embeddingsDeleted = 0;
    if (allHidden && this.deps.embeddings) {
      embeddingsDeleted = await this.deps.embeddings.deleteConversationEmbeddings(conversationId);
    }
    return { allHidden, embeddingsDeleted };
  }

  async translateMessage(
    conversationId: string,
    messageId: string,
    userId: string,
    targetLanguage: string
  ): Promise<TranslationResult> {
    await this.deps.directory.requireMember(conversationId, userId);
    const { message, live } = await this.findMessage(conversationId, messageId);
    const result = await this.deps.translation.translate(messageId, message.text, targetLanguage);

    if (live) {
      try {
        await this.mutateLive(conversationId, messageId, () =>
          this.deps.live.setTranslation(conversationId, messageId, {
            translatedText: result.translatedText,
            detectedLanguage: result.detectedLanguage,
            translatedTo: result.targetLanguage,
          })
        );
      } catch (error) {
        console.warn(`⚠️ Could not store translation on ${conversationId}/${messageId}:`, error);
      }
    }
    return result;
  }

  async starMessage(conversationId: string, messageId: string, userId: string): Promise<MentionedMessage> {
    const conversation = await this.deps.directory.requireMember(conversationId, userId);
    const { message } = await this.findMessage(conversationId, messageId);
    return this.deps.mentions.star(userId, conversation, message);
  }

  private async afterCommit(message: Message): Promise<void> {
    const { conversationId, senderId } = message;

    try {
      await this.deps.live.setTyping(conversationId, senderId, false);
    } catch (error) {
      console.warn(`⚠️ Could not clear typing for ${senderId} in ${conversationId}:`, error);
    }

    try {
      await this.deps.archival.enforce(conversationId);
    } catch (error) {
      if (isRetryable(error)) {
        console.warn(`⚠️ Archival deferred for ${conversationId}, next append retries:`, error);
      } else {
        console.error(`❌ Archival blocked for ${conversationId}:`, error);
      }
    }

    let conversation: Conversation | null = null;
    try {
      conversation = await this.deps.directory.requireConversation(conversationId);
      await this.deps.mentions.recordMentions(conversation, message);
    } catch (error) {
      console.warn(`⚠️ Could not record mentions for ${message.id}:`, error);
    }

    this.deps.events.emitMessageCommitted({
      conversationId,
      messageId: message.id,
      senderId,
      senderName: message.senderName,
      text: message.text,
      isGroupChat: conversation?.type === 'group',
    });
  }

  /**
   * Applies a change to a live message while no archival pass runs. A message
   * already archived but not yet evicted reads as gone, like an evicted one.
   */
  private async mutateLive<T>(
    conversationId: string,
    messageId: string,
    change: () => Promise<T | null>
  ): Promise<T | null> {
    return this.deps.archival.runExclusive(conversationId, async () => {
      if (this.deps.archival.isAwaitingEviction(conversationId, messageId)) {
        return null;
      }
      return change();
    });
  }

  private async findMessage(conversationId: string, messageId: string): Promise<{ message: Message; live: boolean }> {
    const live = await this.deps.live.get(conversationId, messageId);
    if (live) {
      return { message: live, live: true };
    }
    const archived = await this.deps.archive.get(conversationId, messageId);
    if (archived) {
      return { message: archived, live: false };
    }
    throw new MessageNotFoundError(conversationId, messageId);
  }

  private async requireArchived(conversationId: string, messageId: string): Promise<Message> {
    const archived = await this.deps.archive.get(conversationId, messageId);
    if (!archived) {
      throw new MessageNotFoundError(conversationId, messageId);
    }
    return archived;
  }

  private async missingLiveMessage(conversationId: string, messageId: string): Promise<Error> {
    return (await this.deps.archive.has(conversationId, messageId))
      ? new ArchivedMessageImmutableError(conversationId, messageId)
      : new MessageNotFoundError(conversationId, messageId);
  }

  private async refreshPreview(conversationId: string): Promise<void> {
    const [live, archived] = await Promise.all([
      this.deps.live.snapshot(conversationId),
      this.deps.archive.page(conversationId, Number.MAX_SAFE_INTEGER, PREVIEW_CANDIDATE_PAGE),
    ]);
    await this.deps.directory.refreshLastMessage(conversationId, [...live, ...archived]);
  }
}
