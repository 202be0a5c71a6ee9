import { Conversation, LastMessagePreview, MemberDetail, UserConversationStatus } from '../types/Conversation';
import { CachedTranslation, MentionedMessage } from '../types/Insights';
import { DeliveryEntry, DeliveryState, Message, MessageType } from '../types/Message';

/*
 * Both databases hand back untyped JSON. These decoders narrow it into the
 * domain types and drop records that are missing required fields.
 * Neither database stores `undefined`, so encoders omit absent fields.
 */

type JsonRecord = Record<string, unknown>;

const MESSAGE_TYPES: readonly MessageType[] = ['text', 'image', 'video', 'file', 'actionItem', 'system'];
const DELIVERY_STATES: readonly DeliveryState[] = ['pending', 'sent', 'delivered', 'failed'];

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function num(record: JsonRecord, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function bool(record: JsonRecord, key: string): boolean {
  return record[key] === true;
}

function isMessageType(value: unknown): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}

function isDeliveryState(value: unknown): value is DeliveryState {
  return DELIVERY_STATES.some((state) => state === value);
}

function omitUndefined(record: JsonRecord): JsonRecord {
  const out: JsonRecord = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

// Lists of user ids are stored as { uid: true } maps, arrays are accepted on read
function decodeIdSet(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string');
  }
  if (isRecord(value)) {
    return Object.keys(value).filter((key) => value[key] === true);
  }
  return [];
}

function encodeIdSet(ids: string[]): JsonRecord {
  const out: JsonRecord = {};
  for (const id of ids) {
    out[id] = true;
  }
  return out;
}

function decodeDeliveryStatus(value: unknown): Message['deliveryStatus'] {
  const out: Message['deliveryStatus'] = {};
  if (!isRecord(value)) {
    return out;
  }
  for (const [userId, raw] of Object.entries(value)) {
    if (isRecord(raw) && isDeliveryState(raw.state)) {
      const entry: DeliveryEntry = { state: raw.state, timestamp: num(raw, 'timestamp') ?? 0 };
      out[userId] = entry;
    }
  }
  return out;
}

function decodeNumberMap(value: unknown): { [key: string]: number } {
  const out: { [key: string]: number } = {};
  if (!isRecord(value)) {
    return out;
  }
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'number') {
      out[key] = raw;
    }
  }
  return out;
}

export function encodeMessage(message: Message): JsonRecord {
  return omitUndefined({
    id: message.id,
    conversationId: message.conversationId,
    senderId: message.senderId,
    senderName: message.senderName,
    text: message.text,
    createdAt: message.createdAt,
    type: message.type,
    mediaUrl: message.mediaUrl,
    replyToMessageId: message.replyToMessageId,
    deliveryStatus: message.deliveryStatus,
    readBy: message.readBy,
    isDeleted: message.isDeleted,
    isEdited: message.isEdited,
    editedAt: message.editedAt,
    deletedFor: encodeIdSet(message.deletedFor),
    embeddingId: message.embeddingId,
    translatedText: message.translatedText,
    detectedLanguage: message.detectedLanguage,
    translatedTo: message.translatedTo,
  });
}

export function decodeMessage(conversationId: string, messageId: string, value: unknown): Message | null {
  if (!isRecord(value)) {
    return null;
  }
  const senderId = str(value, 'senderId');
  const createdAt = num(value, 'createdAt');
  if (!senderId || createdAt === undefined) {
    return null;
  }

  const message: Message = {
    id: messageId,
    conversationId,
    senderId,
    senderName: str(value, 'senderName') ?? senderId,
    text: str(value, 'text') ?? '',
    createdAt,
    type: isMessageType(value.type) ? value.type : 'text',
    deliveryStatus: decodeDeliveryStatus(value.deliveryStatus),
    readBy: decodeNumberMap(value.readBy),
    isDeleted: bool(value, 'isDeleted'),
    isEdited: bool(value, 'isEdited'),
    deletedFor: decodeIdSet(value.deletedFor),
  };

  const optional = {
    mediaUrl: str(value, 'mediaUrl'),
    replyToMessageId: str(value, 'replyToMessageId'),
    embeddingId: str(value, 'embeddingId'),
    translatedText: str(value, 'translatedText'),
    detectedLanguage: str(value, 'detectedLanguage'),
    translatedTo: str(value, 'translatedTo'),
  };
  for (const [key, field] of Object.entries(optional)) {
    if (field !== undefined) {
      Object.assign(message, { [key]: field });
    }
  }
  const editedAt = num(value, 'editedAt');
  if (editedAt !== undefined) {
    message.editedAt = editedAt;
  }
  return message;
}

function decodePreview(value: unknown): LastMessagePreview | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const messageId = str(value, 'messageId');
  const senderId = str(value, 'senderId');
  const timestamp = num(value, 'timestamp');
  if (!messageId || !senderId || timestamp === undefined) {
    return undefined;
  }
  return {
    messageId,
    text: str(value, 'text') ?? '',
    senderId,
    senderName: str(value, 'senderName') ?? senderId,
    timestamp,
    type: isMessageType(value.type) ? value.type : 'text',
  };
}

function decodeMemberDetails(value: unknown): { [userId: string]: MemberDetail } {
  const out: { [userId: string]: MemberDetail } = {};
  if (!isRecord(value)) {
    return out;
  }
  for (const [userId, raw] of Object.entries(value)) {
    if (!isRecord(raw)) {
      continue;
    }
    const detail: MemberDetail = {
      displayName: str(raw, 'displayName') ?? userId,
      joinedAt: num(raw, 'joinedAt') ?? 0,
    };
    const photoURL = str(raw, 'photoURL');
    if (photoURL) {
      detail.photoURL = photoURL;
    }
    out[userId] = detail;
  }
  return out;
}

export function encodeConversation(conversation: Conversation): JsonRecord {
  return omitUndefined({
    type: conversation.type,
    name: conversation.name,
    createdBy: conversation.createdBy,
    createdAt: conversation.createdAt,
    memberIds: conversation.memberIds,
    memberKey: conversation.memberKey,
    memberDetails: conversation.memberDetails,
    lastMessage: conversation.lastMessage,
    metadata: omitUndefined({ ...conversation.metadata }),
  });
}

export function decodeConversation(id: string, value: unknown): Conversation | null {
  if (!isRecord(value)) {
    return null;
  }
  const memberIds = Array.isArray(value.memberIds)
    ? value.memberIds.filter((v): v is string => typeof v === 'string')
    : [];
  const metadata = isRecord(value.metadata) ? value.metadata : {};

  const conversation: Conversation = {
    id,
    type: value.type === 'group' ? 'group' : 'direct',
    createdBy: str(value, 'createdBy') ?? '',
    createdAt: num(value, 'createdAt') ?? 0,
    memberIds,
    memberKey: str(value, 'memberKey') ?? [...memberIds].sort().join(','),
    memberDetails: decodeMemberDetails(value.memberDetails),
    metadata: { totalMessages: num(metadata, 'totalMessages') ?? 0 },
  };
  const name = str(value, 'name');
  if (name) {
    conversation.name = name;
  }
  const imageUrl = str(metadata, 'imageUrl');
  if (imageUrl) {
    conversation.metadata.imageUrl = imageUrl;
  }
  const lastMessage = decodePreview(value.lastMessage);
  if (lastMessage) {
    conversation.lastMessage = lastMessage;
  }
  return conversation;
}

export function encodeStatus(status: UserConversationStatus): JsonRecord {
  const { conversationId: _key, ...fields } = status;
  return omitUndefined(fields);
}

export function decodeStatus(conversationId: string, value: unknown): UserConversationStatus | null {
  if (!isRecord(value)) {
    return null;
  }
  const status: UserConversationStatus = {
    conversationId,
    unreadCount: num(value, 'unreadCount') ?? 0,
    isPinned: bool(value, 'isPinned'),
    isMuted: bool(value, 'isMuted'),
    isHidden: bool(value, 'isHidden'),
    lastMessageTimestamp: num(value, 'lastMessageTimestamp') ?? 0,
  };
  const lastReadMessageId = str(value, 'lastReadMessageId');
  if (lastReadMessageId) {
    status.lastReadMessageId = lastReadMessageId;
  }
  const lastReadTimestamp = num(value, 'lastReadTimestamp');
  if (lastReadTimestamp !== undefined) {
    status.lastReadTimestamp = lastReadTimestamp;
  }
  return status;
}

export function decodeTranslation(messageId: string, targetLanguage: string, value: unknown): CachedTranslation | null {
  if (!isRecord(value)) {
    return null;
  }
  const translatedText = str(value, 'translatedText');
  const cachedAt = num(value, 'cachedAt');
  if (!translatedText || cachedAt === undefined) {
    return null;
  }
  return {
    messageId,
    targetLanguage,
    translatedText,
    detectedLanguage: str(value, 'detectedLanguage') ?? '',
    cachedAt,
  };
}

export function decodeMention(id: string, value: unknown): MentionedMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const messageId = str(value, 'messageId');
  const conversationId = str(value, 'conversationId');
  if (!messageId || !conversationId) {
    return null;
  }
  return {
    id,
    messageId,
    conversationId,
    conversationTitle: str(value, 'conversationTitle') ?? '',
    messageText: str(value, 'messageText') ?? '',
    senderId: str(value, 'senderId') ?? '',
    senderName: str(value, 'senderName') ?? '',
    reason: value.reason === 'starred' ? 'starred' : 'mentioned',
    createdAt: num(value, 'createdAt') ?? 0,
    isRead: bool(value, 'isRead'),
  };
}
