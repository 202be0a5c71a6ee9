import * as functions from 'firebase-functions/v1';
import { config } from './config';
import { MessagingCore } from './core';
import {
  ArchivedMessageImmutableError,
  ConversationNotFoundError,
  MessageNotFoundError,
  MessagingError,
  NotAMemberError,
  NotSenderError,
  RateLimitedError,
  ValidationError,
} from './errors';
import { isRecord } from './firebase/codec';
import { incrementRateLimit, RateLimitFeature, rateLimitMiddleware } from './rateLimiting';
import { MessageDraft, MessageType } from './types/Message';

type HttpsError = functions.https.HttpsError;
type CallableData = Record<string, unknown>;

export interface RateLimiter {
  guard(userId: string, feature: RateLimitFeature): Promise<void>;
  record(userId: string, feature: RateLimitFeature): Promise<void>;
}

export const firestoreRateLimiter: RateLimiter = {
  guard: rateLimitMiddleware,
  record: incrementRateLimit,
};

export interface HandlerContext {
  core: MessagingCore;
  rateLimiter: RateLimiter;
}

export interface CallerAuth {
  uid: string;
}

const MESSAGE_TYPES: readonly MessageType[] = ['text', 'image', 'video', 'file', 'actionItem', 'system'];

function invalid(message: string): HttpsError {
  return new functions.https.HttpsError('invalid-argument', message);
}

function requireAuth(auth: CallerAuth | undefined): string {
  if (!auth) {
    throw new functions.https.HttpsError('unauthenticated', 'Must be logged in');
  }
  return auth.uid;
}

function payload(data: unknown): CallableData {
  if (!isRecord(data)) {
    throw invalid('Request body must be an object');
  }
  return data;
}

function requireString(data: CallableData, field: string): string {
  const value = data[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw invalid(`${field} is required and must be a string`);
  }
  return value;
}

function optionalString(data: CallableData, field: string): string | undefined {
  const value = data[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalid(`${field} must be a string`);
  }
  return value;
}

function optionalNumber(data: CallableData, field: string): number | undefined {
  const value = data[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(`${field} must be a number`);
  }
  return value;
}

function requireBoolean(data: CallableData, field: string): boolean {
  const value = data[field];
  if (typeof value !== 'boolean') {
    throw invalid(`${field} is required and must be a boolean`);
  }
  return value;
}

function requireStringArray(data: CallableData, field: string): string[] {
  const value = data[field];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw invalid(`${field} must be an array of strings`);
  }
  return value;
}

function readDraft(data: CallableData): MessageDraft {
  const type = optionalString(data, 'type');
  const messageType = MESSAGE_TYPES.find((t) => t === type);
  if (type !== undefined && messageType === undefined) {
    throw invalid(`Unknown message type: ${type}`);
  }
  return {
    text: optionalString(data, 'text') ?? '',
    messageId: optionalString(data, 'messageId'),
    senderName: optionalString(data, 'senderName'),
    type: messageType,
    mediaUrl: optionalString(data, 'mediaUrl'),
    replyToMessageId: optionalString(data, 'replyToMessageId'),
  };
}

/**
 * Follows the `cause` chain so a 429 wrapped by a pipeline stage still
 * reaches the caller with its retry-after value.
 * @param error - Error thrown by the callable body
 */
function findRateLimit(error: unknown): RateLimitedError | null {
  let current = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof RateLimitedError) {
      return current;
    }
    current = current.cause;
  }
  return null;
}

/**
 * Maps core errors onto callable error codes.
 */
export function toHttpsError(error: unknown): HttpsError {
  if (error instanceof functions.https.HttpsError) {
    return error;
  }
  const rateLimit = findRateLimit(error);
  if (rateLimit) {
    return new functions.https.HttpsError('resource-exhausted', rateLimit.message, {
      code: rateLimit.code,
      retryAfter: rateLimit.retryAfterSeconds,
    });
  }
  if (error instanceof NotAMemberError || error instanceof NotSenderError) {
    return new functions.https.HttpsError('permission-denied', error.message, { code: error.code });
  }
  if (error instanceof ConversationNotFoundError || error instanceof MessageNotFoundError) {
    return new functions.https.HttpsError('not-found', error.message, { code: error.code });
  }
  if (error instanceof ArchivedMessageImmutableError) {
    return new functions.https.HttpsError('failed-precondition', error.message, { code: error.code });
  }
  if (error instanceof ValidationError) {
    return new functions.https.HttpsError('invalid-argument', error.message, { code: error.code });
  }
  if (error instanceof MessagingError) {
    switch (error.category) {
      case 'integrity':
        return new functions.https.HttpsError('data-loss', error.message, { code: error.code });
      case 'transient':
        return new functions.https.HttpsError('unavailable', error.message, { code: error.code });
      default:
        return new functions.https.HttpsError('internal', error.message, { code: error.code });
    }
  }
  return new functions.https.HttpsError('internal', 'Internal error');
}

async function run<T>(name: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    const mapped = toHttpsError(error);
    if (mapped.code === 'internal' || mapped.code === 'data-loss') {
      console.error(`❌ ${name} failed:`, error);
    } else {
      console.warn(`⚠️ ${name} rejected (${mapped.code}): ${mapped.message}`);
    }
    throw mapped;
  }
}

/**
 * Guard, run, then record usage. Failed work is not counted.
 *
 * @param userId - Caller charged for the request
 * @param feature - Quota the request draws on
 * @param work - The guarded request
 */
async function rateLimited<T>(
  ctx: HandlerContext,
  userId: string,
  feature: RateLimitFeature,
  work: () => Promise<T>
): Promise<T> {
  await ctx.rateLimiter.guard(userId, feature);
  const result = await work();
  await ctx.rateLimiter.record(userId, feature);
  return result;
}

export function createConversationHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('createConversation', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const type = requireString(body, 'type');
    if (type !== 'direct' && type !== 'group') {
      throw invalid('type must be "direct" or "group"');
    }
    const memberIds = requireStringArray(body, 'memberIds');
    if (!memberIds.includes(uid)) {
      memberIds.push(uid);
    }
    const input = { type, name: optionalString(body, 'name'), memberIds, createdBy: uid } as const;

    if (body.firstMessage !== undefined) {
      const draft = readDraft(payload(body.firstMessage));
      const { conversation, message, created } = await ctx.core.messaging.createConversationAndSendMessage(
        input,
        draft
      );
      return { conversationId: conversation.id, messageId: message.id, created };
    }

    const { conversation, created } = await ctx.core.directory.findOrCreateConversation(input);
    return { conversationId: conversation.id, created };
  });
}

export function sendMessageHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('sendMessage', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const message = await ctx.core.messaging.sendMessage(requireString(body, 'conversationId'), uid, readDraft(body));
    return { messageId: message.id, createdAt: message.createdAt };
  });
}

export function markDeliveredHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('markDelivered', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const message = await ctx.core.messaging.markDelivered(
      requireString(body, 'conversationId'),
      requireString(body, 'messageId'),
      uid
    );
    return { archived: message === null };
  });
}

export function markReadHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('markRead', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const unreadCount = await ctx.core.messaging.markRead(
      requireString(body, 'conversationId'),
      requireString(body, 'messageId'),
      uid
    );
    return { unreadCount };
  });
}

export function markConversationReadHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('markConversationRead', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const unreadCount = await ctx.core.messaging.markConversationRead(requireString(body, 'conversationId'), uid);
    return { unreadCount };
  });
}

export function setTypingHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('setTyping', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    await ctx.core.messaging.setTyping(requireString(body, 'conversationId'), uid, requireBoolean(body, 'isTyping'));
    return { success: true };
  });
}

export function getTypingUsersHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('getTypingUsers', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const userIds = await ctx.core.messaging.getTypingUsers(requireString(body, 'conversationId'), uid);
    return { userIds };
  });
}

export function loadOlderMessagesHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('loadOlderMessages', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const messages = await ctx.core.messaging.loadOlderMessages(
      requireString(body, 'conversationId'),
      uid,
      optionalNumber(body, 'beforeTimestamp') ?? Number.MAX_SAFE_INTEGER,
      optionalNumber(body, 'limit') ?? 30,
      optionalString(body, 'beforeMessageId')
    );
    return { messages };
  });
}

export function editMessageHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('editMessage', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const message = await ctx.core.messaging.editMessage(
      requireString(body, 'conversationId'),
      requireString(body, 'messageId'),
      uid,
      requireString(body, 'text')
    );
    return { messageId: message.id, editedAt: message.editedAt ?? null };
  });
}

export function deleteMessageHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('deleteMessage', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    await ctx.core.messaging.deleteMessage(requireString(body, 'conversationId'), requireString(body, 'messageId'), uid);
    return { success: true };
  });
}

export function deleteMessageForUserHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('deleteMessageForUser', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const unreadCount = await ctx.core.messaging.deleteMessageForUser(
      requireString(body, 'conversationId'),
      requireString(body, 'messageId'),
      uid
    );
    return { unreadCount };
  });
}

export function hideConversationHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('hideConversation', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    return ctx.core.messaging.hideConversation(requireString(body, 'conversationId'), uid);
  });
}

export function listConversationsHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('listConversations', async () => {
    const uid = requireAuth(auth);
    const includeHidden = isRecord(data) && data.includeHidden === true;
    const summaries = await ctx.core.directory.listForUser(uid, includeHidden);
    return {
      conversations: summaries.map(({ conversation, status, title }) => ({
        conversationId: conversation.id,
        type: conversation.type,
        title,
        lastMessage: conversation.lastMessage ?? null,
        unreadCount: status.unreadCount,
        isPinned: status.isPinned,
        isMuted: status.isMuted,
      })),
    };
  });
}

export function translateMessageHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('translateMessage', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const conversationId = requireString(body, 'conversationId');
    const messageId = requireString(body, 'messageId');
    const targetLanguage = requireString(body, 'targetLanguage');

    return rateLimited(ctx, uid, 'translation', () =>
      ctx.core.messaging.translateMessage(conversationId, messageId, uid, targetLanguage)
    );
  });
}

export function generateInsightsHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('generateInsights', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const conversationId = requireString(body, 'conversationId');
    const query = requireString(body, 'query');
    const topK = optionalNumber(body, 'topK') ?? config.rag.defaultTopK;

    await ctx.core.directory.requireMember(conversationId, uid);
    return rateLimited(ctx, uid, 'insights', () => ctx.core.retrieval.answer(conversationId, query, topK));
  });
}

export function semanticSearchHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('semanticSearch', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const conversationId = requireString(body, 'conversationId');
    const query = requireString(body, 'query');
    const topK = optionalNumber(body, 'topK') ?? config.rag.defaultTopK;

    await ctx.core.directory.requireMember(conversationId, uid);
    const results = await rateLimited(ctx, uid, 'search', () => ctx.core.retrieval.search(conversationId, query, topK));
    return { results };
  });
}

export function starMessageHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('starMessage', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const mention = await ctx.core.messaging.starMessage(
      requireString(body, 'conversationId'),
      requireString(body, 'messageId'),
      uid
    );
    return { mentionId: mention.id };
  });
}

export function listMentionsHandler(ctx: HandlerContext, auth: CallerAuth | undefined) {
  return run('listMentions', async () => {
    const uid = requireAuth(auth);
    return { mentions: await ctx.core.mentions.list(uid) };
  });
}

export function retryFailedEmbeddingsHandler(ctx: HandlerContext, auth: CallerAuth | undefined, data: unknown) {
  return run('retryFailedEmbeddings', async () => {
    const uid = requireAuth(auth);
    const body = payload(data);
    const conversationId = requireString(body, 'conversationId');

    await ctx.core.directory.requireMember(conversationId, uid);
    return rateLimited(ctx, uid, 'embedding', () => ctx.core.embeddings.embedPending(conversationId));
  });
}
