import * as functions from 'firebase-functions/v1';
import { createAiClients, createFirebaseRepositories, createMessagingCore, MessagingCore } from './core';
import { decodeMessage } from './firebase/codec';
import * as handlers from './handlers';
import { SECRET_NAMES } from './secrets';

let core: MessagingCore | null = null;

function getCore(): MessagingCore {
  if (!core) {
    core = createMessagingCore(createFirebaseRepositories(), createAiClients());
    console.log('✅ Messaging core initialized');
  }
  return core;
}

function context(): handlers.HandlerContext {
  return { core: getCore(), rateLimiter: handlers.firestoreRateLimiter };
}

function callerOf(ctx: functions.https.CallableContext): handlers.CallerAuth | undefined {
  return ctx.auth ? { uid: ctx.auth.uid } : undefined;
}

type Handler = (
  ctx: handlers.HandlerContext,
  auth: handlers.CallerAuth | undefined,
  data: unknown
) => Promise<unknown>;

function callable(handler: Handler) {
  return functions.https.onCall((data: unknown, ctx) => handler(context(), callerOf(ctx), data));
}

// AI-backed callables need the model and index keys mounted
function secretCallable(handler: Handler) {
  return functions
    .runWith({ secrets: [...SECRET_NAMES] })
    .https.onCall((data: unknown, ctx) => handler(context(), callerOf(ctx), data));
}

export const createConversation = callable(handlers.createConversationHandler);
export const sendMessage = callable(handlers.sendMessageHandler);
export const markDelivered = callable(handlers.markDeliveredHandler);
export const markRead = callable(handlers.markReadHandler);
export const markConversationRead = callable(handlers.markConversationReadHandler);
export const setTyping = callable(handlers.setTypingHandler);
export const getTypingUsers = callable(handlers.getTypingUsersHandler);
export const loadOlderMessages = callable(handlers.loadOlderMessagesHandler);
export const editMessage = callable(handlers.editMessageHandler);
export const deleteMessage = callable(handlers.deleteMessageHandler);
export const deleteMessageForUser = callable(handlers.deleteMessageForUserHandler);
export const hideConversation = secretCallable(handlers.hideConversationHandler);
export const listConversations = callable(handlers.listConversationsHandler);
export const starMessage = callable(handlers.starMessageHandler);
export const listMentions = callable((ctx, auth) => handlers.listMentionsHandler(ctx, auth));

export const translateMessage = secretCallable(handlers.translateMessageHandler);
export const generateInsights = secretCallable(handlers.generateInsightsHandler);
export const semanticSearch = secretCallable(handlers.semanticSearchHandler);
export const retryFailedEmbeddings = secretCallable(handlers.retryFailedEmbeddingsHandler);

/**
 * Embeds each new live message. Failures are logged and left for
 * `retryFailedEmbeddings`; the send itself has already succeeded.
 */
export const autoEmbedMessage = functions
  .runWith({ secrets: [...SECRET_NAMES] })
  .database.ref('/conversations/{conversationId}/activeMessages/{messageId}')
  .onCreate(async (snapshot, ctx) => {
    const { conversationId, messageId } = ctx.params;
    const message = decodeMessage(conversationId, messageId, snapshot.val());

    if (!message) {
      console.warn(`⚠️ Skipping embed for ${conversationId}/${messageId}: unreadable message`);
      return;
    }

    try {
      const vectorId = await getCore().embeddings.embedMessage(message);
      if (vectorId) {
        console.log(`✅ Auto-embedded message ${messageId}`);
      }
    } catch (error) {
      console.error(`❌ Failed to auto-embed message ${messageId}:`, error);
    }
  });

export const sweepTypingIndicators = functions.pubsub.schedule('every 1 minutes').onRun(async () => {
  const removed = await getCore().typing.sweep();
  return { removed };
});
