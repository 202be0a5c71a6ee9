import { config } from './config';
import { Embedder } from './embeddings';
import { EmbeddingIntegrityError, errorMessage } from './errors';
import { LiveMessageStore } from './liveMessages';
import { EmbeddingMetadata } from './types/Insights';
import { Message } from './types/Message';
import { truncate } from './utils';
import { VectorIndexClient, vectorIdFor } from './vectorIndex';

export interface EmbedPendingResult {
  embedded: number;
  failed: number;
}

export function embeddingMetadataFor(message: Message): EmbeddingMetadata {
  return {
    messageId: message.id,
    conversationId: message.conversationId,
    text: truncate(message.text, config.pinecone.metadataTextLimit),
    timestamp: message.createdAt,
    userId: message.senderId,
  };
}

function sameMetadata(a: EmbeddingMetadata, b: EmbeddingMetadata): boolean {
  return (
    a.messageId === b.messageId &&
    a.conversationId === b.conversationId &&
    a.text === b.text &&
    a.timestamp === b.timestamp &&
    a.userId === b.userId
  );
}

/**
 * Embeds messages into the vector index, one vector per message.
 */
export class MessageEmbedder {
  constructor(
    private readonly embedder: Embedder,
    private readonly vectorIndex: VectorIndexClient,
    private readonly live: LiveMessageStore
  ) {}

  shouldEmbed(message: Message): boolean {
    return (
      (message.type === 'text' || message.type === 'actionItem') &&
      !message.isDeleted &&
      message.text.trim() !== '' &&
      !message.embeddingId
    );
  }

  /**
   * Generate and store the embedding of one message
   *
   * @param message - Live or archived message
   * @returns The vector id, or null when the message is not embeddable
   */
  async embedMessage(message: Message): Promise<string | null> {
    if (!this.shouldEmbed(message)) {
      console.log(`⏭️ Skipping embed for message ${message.id}`);
      return null;
    }

    const vectorId = vectorIdFor(message.conversationId, message.id);
    const metadata = embeddingMetadataFor(message);

    // 1. An existing vector must describe the same message
    const existing = (await this.vectorIndex.fetchMetadata([vectorId])).get(vectorId);
    if (existing && !sameMetadata(existing, metadata)) {
      console.error(`❌ Vector ${vectorId} exists with different metadata`);
      throw new EmbeddingIntegrityError(vectorId);
    }

    // 2. Embed and upsert only once
    if (!existing) {
      console.log(`📊 Embedding message ${message.id}`);
      const values = await this.embedder.embed(message.text);
      await this.vectorIndex.upsert(vectorId, values, metadata);
    }

    // 3. Archived messages are immutable; their vector id is derivable anyway
    await this.live.setEmbeddingId(message.conversationId, message.id, vectorId);
    console.log(`✅ Embedded message ${message.id} as ${vectorId}`);
    return vectorId;
  }

  /**
   * Retries live messages that have no embedding yet.
   */
  async embedPending(conversationId: string): Promise<EmbedPendingResult> {
    const pending = (await this.live.snapshot(conversationId)).filter((m) => this.shouldEmbed(m));
    const result: EmbedPendingResult = { embedded: 0, failed: 0 };

    for (const message of pending) {
      try {
        await this.embedMessage(message);
        result.embedded++;
      } catch (error) {
        result.failed++;
        console.error(`❌ Failed to embed message ${message.id}:`, error);
      }
    }

    console.log(`🔄 Embedding retry for ${conversationId}: ${result.embedded} embedded, ${result.failed} failed`);
    return result;
  }

  /**
   * Best-effort. A failure is logged and reported as zero deletions.
   */
  async deleteConversationEmbeddings(conversationId: string): Promise<number> {
    try {
      const ids = await this.vectorIndex.listIdsByConversation(conversationId);
      await this.vectorIndex.deleteMany(ids);
      console.log(`🧹 Deleted ${ids.length} embeddings for ${conversationId}`);
      return ids.length;
    } catch (error) {
      console.warn(`⚠️ Could not delete embeddings for ${conversationId}: ${errorMessage(error)}`);
      return 0;
    }
  }
}
