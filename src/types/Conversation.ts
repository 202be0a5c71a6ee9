import { MessageType } from './Message';

export type ConversationType = 'direct' | 'group';

export interface MemberDetail {
  displayName: string;
  photoURL?: string;
  joinedAt: number;
}

export interface LastMessagePreview {
  messageId: string;
  text: string;
  senderId: string;
  senderName: string;
  timestamp: number;
  type: MessageType;
}

export interface Conversation {
  id: string;
  type: ConversationType;
  name?: string;
  createdBy: string;
  createdAt: number;
  memberIds: string[];
  memberKey: string; // sorted unique memberIds joined with ','
  memberDetails: { [userId: string]: MemberDetail };
  lastMessage?: LastMessagePreview;
  metadata: {
    totalMessages: number;
    imageUrl?: string;
  };
}

export type NewConversation = Omit<Conversation, 'id'>;

export interface UserConversationStatus {
  conversationId: string;
  lastReadMessageId?: string;
  lastReadTimestamp?: number;
  unreadCount: number;
  isPinned: boolean;
  isMuted: boolean;
  isHidden: boolean;
  lastMessageTimestamp: number;
}

export interface ConversationSummary {
  conversation: Conversation;
  status: UserConversationStatus;
  title: string;
}
