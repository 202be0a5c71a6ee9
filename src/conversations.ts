import {
  ConversationNotFoundError,
  InvalidMembershipError,
  NotAMemberError,
} from './errors';
import { ConversationTimeline } from './timeline';
import {
  Conversation,
  ConversationSummary,
  ConversationType,
  LastMessagePreview,
  MemberDetail,
  NewConversation,
  UserConversationStatus,
} from './types/Conversation';
import { Message } from './types/Message';
import { ConversationRepository, Mutation, UserStatusRepository } from './types/repositories';
import { Clock, directConversationId, memberKeyFor } from './utils';

export interface MemberProfile {
  displayName: string;
  photoURL?: string;
}

export interface CreateConversationInput {
  type: ConversationType;
  name?: string;
  memberIds: string[];
  createdBy: string;
  memberDetails?: { [userId: string]: MemberProfile };
}

export function emptyStatus(conversationId: string, lastMessageTimestamp: number): UserConversationStatus {
  return {
    conversationId,
    unreadCount: 0,
    isPinned: false,
    isMuted: false,
    isHidden: false,
    lastMessageTimestamp,
  };
}

export function previewOf(message: Message): LastMessagePreview {
  return {
    messageId: message.id,
    text: message.text,
    senderId: message.senderId,
    senderName: message.senderName,
    timestamp: message.createdAt,
    type: message.type,
  };
}

/**
 * Last-write-wins by message timestamp, ties broken by messageId.
 * The same message may replace itself (an edit changes its text).
 */
function supersedes(candidate: LastMessagePreview, current: LastMessagePreview | undefined): boolean {
  if (!current) {
    return true;
  }
  if (candidate.timestamp !== current.timestamp) {
    return candidate.timestamp > current.timestamp;
  }
  if (candidate.messageId === current.messageId) {
    return candidate.text !== current.text || candidate.type !== current.type;
  }
  return candidate.messageId > current.messageId;
}

function memberDetail(profile: MemberProfile | undefined, userId: string, joinedAt: number): MemberDetail {
  const detail: MemberDetail = { displayName: profile?.displayName || userId, joinedAt };
  if (profile?.photoURL) {
    detail.photoURL = profile.photoURL;
  }
  return detail;
}

export class ConversationDirectory {
  constructor(
    private readonly conversations: ConversationRepository,
    private readonly statuses: UserStatusRepository,
    private readonly timeline: ConversationTimeline,
    private readonly clock: Clock = Date.now
  ) {}

  async createConversation(input: CreateConversationInput): Promise<Conversation> {
    const data = this.newConversation(input);
    const conversation = await this.conversations.create(data);
    await this.seedStatuses(conversation);

    console.log(`✅ Created ${input.type} conversation ${conversation.id} with ${data.memberIds.length} members`);
    return conversation;
  }

  private newConversation(input: CreateConversationInput): NewConversation {
    const memberIds = input.memberIds.map((id) => id.trim());

    if (memberIds.length === 0) {
      throw new InvalidMembershipError('A conversation needs at least one member');
    }
    if (memberIds.some((id) => id === '')) {
      throw new InvalidMembershipError('Member ids must not be empty');
    }
    if (new Set(memberIds).size !== memberIds.length) {
      throw new InvalidMembershipError('Member ids must be unique');
    }

    // Member count vs type is advisory only
    if (input.type === 'direct' && memberIds.length !== 2) {
      console.warn(`⚠️ Direct conversation created with ${memberIds.length} members`);
    } else if (input.type === 'group' && memberIds.length < 3) {
      console.warn(`⚠️ Group conversation created with ${memberIds.length} members`);
    }

    const now = this.clock();
    const memberDetails: { [userId: string]: MemberDetail } = {};
    for (const id of memberIds) {
      memberDetails[id] = memberDetail(input.memberDetails?.[id], id, now);
    }

    return {
      type: input.type,
      ...(input.name ? { name: input.name } : {}),
      createdBy: input.createdBy,
      createdAt: now,
      memberIds,
      memberKey: memberKeyFor(memberIds),
      memberDetails,
      metadata: { totalMessages: 0 },
    };
  }

  private async seedStatuses(conversation: Conversation): Promise<void> {
    await Promise.all(
      conversation.memberIds.map((id) => this.statuses.put(id, emptyStatus(conversation.id, conversation.createdAt)))
    );
  }

  /**
   * Exact, order-insensitive match on the member set.
   */
  async findByParticipants(memberIds: string[]): Promise<Conversation | null> {
    const key = memberKeyFor(memberIds.map((id) => id.trim()).filter((id) => id !== ''));
    if (key === '') {
      return null;
    }
    const matches = await this.conversations.findByMemberKey(key);
    if (matches.length === 0) {
      return null;
    }
    return [...matches].sort((a, b) => a.createdAt - b.createdAt)[0];
  }

  /**
   * Direct conversations are unique per member set; groups are always new.
   *
   * @param input - Members, type and creator of the conversation
   * @returns The conversation and whether this call created it
   */
  async findOrCreateConversation(input: CreateConversationInput): Promise<{ conversation: Conversation; created: boolean }> {
    if (input.type !== 'direct') {
      return { conversation: await this.createConversation(input), created: true };
    }

    // 1. An existing direct thread, however it was created, wins
    const existing = await this.findByParticipants(input.memberIds);
    if (existing && existing.type === 'direct') {
      console.log(`⏭️ Reusing direct conversation ${existing.id}`);
      return { conversation: existing, created: false };
    }

    // 2. Concurrent first sends race on one document id; only one creates it
    const data = this.newConversation(input);
    const { conversation, created } = await this.conversations.createIfAbsent(
      directConversationId(data.memberKey),
      data
    );
    if (!created) {
      console.log(`⏭️ Reusing direct conversation ${conversation.id}`);
      return { conversation, created: false };
    }

    // 3. Only the creator seeds the member statuses
    await this.seedStatuses(conversation);
    console.log(`✅ Created direct conversation ${conversation.id} with ${data.memberIds.length} members`);
    return { conversation, created: true };
  }

  async getConversation(conversationId: string): Promise<Conversation | null> {
    return this.conversations.get(conversationId);
  }

  async requireConversation(conversationId: string): Promise<Conversation> {
    const conversation = await this.conversations.get(conversationId);
    if (!conversation) {
      throw new ConversationNotFoundError(conversationId);
    }
    return conversation;
  }

  async requireMember(conversationId: string, userId: string): Promise<Conversation> {
    const conversation = await this.requireConversation(conversationId);
    if (!conversation.memberIds.includes(userId)) {
      throw new NotAMemberError(conversationId, userId);
    }
    return conversation;
  }

  async updateLastMessage(conversationId: string, preview: LastMessagePreview): Promise<boolean> {
    const result = await this.conversations.update(conversationId, (current) =>
      supersedes(preview, current.lastMessage) ? { ...current, lastMessage: preview } : undefined
    );
    if (!result) {
      throw new ConversationNotFoundError(conversationId);
    }
    return result.changed;
  }

  /**
   * Unconditionally recomputes the preview from the newest candidate that is
   * not deleted and still visible to at least one current member.
   */
  async refreshLastMessage(conversationId: string, candidates: Message[]): Promise<LastMessagePreview | null> {
    const conversation = await this.requireConversation(conversationId);
    const visible = candidates
      .filter((m) => !m.isDeleted && conversation.memberIds.some((id) => !m.deletedFor.includes(id)))
      .map(previewOf)
      .reduce<LastMessagePreview | undefined>((best, p) => (supersedes(p, best) ? p : best), undefined);

    await this.conversations.update(conversationId, (current) => {
      if (visible) {
        return { ...current, lastMessage: visible };
      }
      if (!current.lastMessage) {
        return undefined;
      }
      const { lastMessage: _removed, ...rest } = current;
      return rest;
    });
    return visible ?? null;
  }

  /**
   * Fan-out after an append: preview, message count, and per-member status.
   */
  async recordMessage(conversation: Conversation, message: Message): Promise<void> {
    await Promise.all([
      this.updateLastMessage(conversation.id, previewOf(message)),
      this.conversations.incrementMessageCount(conversation.id, 1),
      ...conversation.memberIds.map((userId) =>
        this.touchStatus(userId, conversation.id, (status) => ({
          ...status,
          unreadCount: userId === message.senderId ? status.unreadCount : status.unreadCount + 1,
          lastMessageTimestamp: Math.max(status.lastMessageTimestamp, message.createdAt),
        }))
      ),
    ]);
  }

  /**
   * Moves the read cursor forward (never backwards) and recomputes unread.
   */
  async recordRead(conversationId: string, userId: string, message: Message): Promise<number> {
    await this.touchStatus(userId, conversationId, (status) => {
      if (status.lastReadTimestamp !== undefined && status.lastReadTimestamp >= message.createdAt) {
        return undefined;
      }
      return { ...status, lastReadMessageId: message.id, lastReadTimestamp: message.createdAt };
    });
    return this.recomputeUnread(conversationId, userId);
  }

  /**
   * Authoritative unread count: messages after the read cursor, excluding the
   * user's own and those they deleted for themselves.
   */
  async recomputeUnread(conversationId: string, userId: string): Promise<number> {
    const status = await this.statuses.get(userId, conversationId);
    const after = status?.lastReadTimestamp ?? 0;
    const messages = await this.timeline.listCreatedAfter(conversationId, after);
    const unread = messages.filter((m) => m.senderId !== userId && !m.deletedFor.includes(userId)).length;

    await this.touchStatus(userId, conversationId, (current) =>
      current.unreadCount === unread ? undefined : { ...current, unreadCount: unread }
    );
    return unread;
  }

  async getStatus(userId: string, conversationId: string): Promise<UserConversationStatus | null> {
    return this.statuses.get(userId, conversationId);
  }

  /**
   * Hides the conversation for one user. Reports whether every member has now hidden it.
   */
  async hideForUser(conversationId: string, userId: string): Promise<{ allHidden: boolean }> {
    const conversation = await this.requireMember(conversationId, userId);
    await this.touchStatus(userId, conversationId, (status) =>
      status.isHidden ? undefined : { ...status, isHidden: true }
    );

    const statuses = await Promise.all(conversation.memberIds.map((id) => this.statuses.get(id, conversationId)));
    return { allHidden: statuses.every((s) => s?.isHidden === true) };
  }

  async unhideForUser(conversationId: string, userId: string): Promise<void> {
    await this.requireMember(conversationId, userId);
    await this.touchStatus(userId, conversationId, (status) =>
      status.isHidden ? { ...status, isHidden: false } : undefined
    );
  }

  async setPinned(conversationId: string, userId: string, isPinned: boolean): Promise<void> {
    await this.requireMember(conversationId, userId);
    await this.touchStatus(userId, conversationId, (status) =>
      status.isPinned === isPinned ? undefined : { ...status, isPinned }
    );
  }

  async setMuted(conversationId: string, userId: string, isMuted: boolean): Promise<void> {
    await this.requireMember(conversationId, userId);
    await this.touchStatus(userId, conversationId, (status) =>
      status.isMuted === isMuted ? undefined : { ...status, isMuted }
    );
  }

  /**
   * Conversations visible to the user, pinned first, then most recent activity.
   */
  async listForUser(userId: string, includeHidden = false): Promise<ConversationSummary[]> {
    const statuses = (await this.statuses.listForUser(userId)).filter((s) => includeHidden || !s.isHidden);
    const conversations = await Promise.all(statuses.map((s) => this.conversations.get(s.conversationId)));

    const summaries: ConversationSummary[] = [];
    statuses.forEach((status, i) => {
      const conversation = conversations[i];
      if (conversation && conversation.memberIds.includes(userId)) {
        summaries.push({ conversation, status, title: this.displayTitle(conversation, userId) });
      }
    });

    return summaries.sort((a, b) => {
      if (a.status.isPinned !== b.status.isPinned) {
        return a.status.isPinned ? -1 : 1;
      }
      return b.status.lastMessageTimestamp - a.status.lastMessageTimestamp;
    });
  }

  displayTitle(conversation: Conversation, viewerId: string): string {
    if (conversation.name) {
      return conversation.name;
    }
    const others = conversation.memberIds
      .filter((id) => id !== viewerId)
      .map((id) => conversation.memberDetails[id]?.displayName ?? id);
    return others.length > 0 ? others.join(', ') : 'Conversation';
  }

  async addMember(conversationId: string, actorId: string, userId: string, profile?: MemberProfile): Promise<Conversation> {
    await this.requireMember(conversationId, actorId);
    const now = this.clock();

    const result = await this.conversations.update(conversationId, (current) => {
      if (current.memberIds.includes(userId)) {
        return undefined;
      }
      const memberIds = [...current.memberIds, userId];
      return {
        ...current,
        memberIds,
        memberKey: memberKeyFor(memberIds),
        memberDetails: { ...current.memberDetails, [userId]: memberDetail(profile, userId, now) },
      };
    });
    if (!result) {
      throw new ConversationNotFoundError(conversationId);
    }
    if (result.changed) {
      await this.statuses.put(userId, emptyStatus(conversationId, result.value.lastMessage?.timestamp ?? now));
      console.log(`✅ Added ${userId} to conversation ${conversationId}`);
    }
    return result.value;
  }

  /**
   * Member details are kept so past messages still render a name.
   */
  async removeMember(conversationId: string, userId: string): Promise<Conversation> {
    const conversation = await this.requireMember(conversationId, userId);
    if (conversation.memberIds.length === 1) {
      throw new InvalidMembershipError('A conversation needs at least one member');
    }

    const result = await this.conversations.update(conversationId, (current) => {
      if (!current.memberIds.includes(userId)) {
        return undefined;
      }
      const memberIds = current.memberIds.filter((id) => id !== userId);
      return { ...current, memberIds, memberKey: memberKeyFor(memberIds) };
    });
    if (!result) {
      throw new ConversationNotFoundError(conversationId);
    }
    console.log(`✅ Removed ${userId} from conversation ${conversationId}`);
    return result.value;
  }

  // Status records may be missing for members added by older clients
  private async touchStatus(
    userId: string,
    conversationId: string,
    mutate: Mutation<UserConversationStatus>
  ): Promise<void> {
    const result = await this.statuses.update(userId, conversationId, mutate);
    if (result) {
      return;
    }
    const seeded = emptyStatus(conversationId, 0);
    await this.statuses.put(userId, mutate(seeded) ?? seeded);
  }
}
