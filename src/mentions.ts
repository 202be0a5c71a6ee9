import { ConversationDirectory } from './conversations';
import { Conversation } from './types/Conversation';
import { MentionedMessage } from './types/Insights';
import { Message } from './types/Message';
import { MentionRepository } from './types/repositories';
import { Clock } from './utils';

const MENTION_PATTERN = /@([a-zA-Z0-9._-]+)/g;

export function extractMentions(text: string): string[] {
  const handles = new Set<string>();
  for (const match of text.matchAll(MENTION_PATTERN)) {
    handles.add(match[1].toLowerCase());
  }
  return [...handles];
}

function handleFor(displayName: string): string {
  return displayName.replace(/\s+/g, '').toLowerCase();
}

/**
 * Per-user inbox of messages the user was @mentioned in or starred.
 */
export class MentionService {
  constructor(
    private readonly repo: MentionRepository,
    private readonly directory: ConversationDirectory,
    private readonly clock: Clock = Date.now
  ) {}

  /**
   * Resolves @handles against member display names. The sender is never notified.
   */
  resolveMentions(conversation: Conversation, message: Message): string[] {
    const handles = new Set(extractMentions(message.text));
    if (handles.size === 0) {
      return [];
    }
    return conversation.memberIds.filter((userId) => {
      if (userId === message.senderId) {
        return false;
      }
      const displayName = conversation.memberDetails[userId]?.displayName;
      return displayName !== undefined && handles.has(handleFor(displayName));
    });
  }

  async recordMentions(conversation: Conversation, message: Message): Promise<MentionedMessage[]> {
    const userIds = this.resolveMentions(conversation, message);
    const records = await Promise.all(
      userIds.map((userId) => this.save(userId, conversation, message, 'mentioned'))
    );
    if (records.length > 0) {
      console.log(`✅ Recorded ${records.length} mentions for message ${message.id}`);
    }
    return records;
  }

  async star(userId: string, conversation: Conversation, message: Message): Promise<MentionedMessage> {
    const existing = await this.repo.find(userId, message.id, 'starred');
    if (existing) {
      return existing;
    }
    return this.save(userId, conversation, message, 'starred');
  }

  async list(userId: string): Promise<MentionedMessage[]> {
    return (await this.repo.list(userId)).sort((a, b) => b.createdAt - a.createdAt);
  }

  async markRead(userId: string, mentionId: string): Promise<boolean> {
    return this.repo.markRead(userId, mentionId);
  }

  async remove(userId: string, mentionId: string): Promise<void> {
    await this.repo.remove(userId, mentionId);
  }

  private async save(
    userId: string,
    conversation: Conversation,
    message: Message,
    reason: MentionedMessage['reason']
  ): Promise<MentionedMessage> {
    return this.repo.create(userId, {
      messageId: message.id,
      conversationId: conversation.id,
      conversationTitle: this.directory.displayTitle(conversation, userId),
      messageText: message.text,
      senderId: message.senderId,
      senderName: message.senderName,
      reason,
      createdAt: this.clock(),
      isRead: false,
    });
  }
}
