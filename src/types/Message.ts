export type MessageType = 'text' | 'image' | 'video' | 'file' | 'actionItem' | 'system';

export type DeliveryState = 'pending' | 'sent' | 'delivered' | 'failed';

// What a recipient has seen, `read` is derived from readBy
export type RecipientState = DeliveryState | 'read';

export interface DeliveryEntry {
  state: DeliveryState;
  timestamp: number;
}

export interface Message {
  id: string;
  conversationId: string;
  senderId: string;
  senderName: string;
  text: string;
  createdAt: number; // server-assigned, ms since epoch
  type: MessageType;
  mediaUrl?: string;
  replyToMessageId?: string;
  deliveryStatus: { [userId: string]: DeliveryEntry };
  readBy: { [userId: string]: number };
  isDeleted: boolean;
  isEdited: boolean;
  editedAt?: number;
  deletedFor: string[];
  embeddingId?: string; // `${conversationId}_${id}` once embedded
  translatedText?: string;
  detectedLanguage?: string;
  translatedTo?: string;
}

export interface MessageDraft {
  messageId?: string; // client-generated for optimistic sends
  senderName?: string;
  text: string;
  type?: MessageType;
  mediaUrl?: string;
  replyToMessageId?: string;
}

export interface MessageCommittedEvent {
  conversationId: string;
  messageId: string;
  senderId: string;
  senderName: string;
  text: string;
  isGroupChat: boolean;
}
