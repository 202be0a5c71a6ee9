import { Index, Pinecone } from '@pinecone-database/pinecone';
import { config } from './config';
import { ValidationError } from './errors';
import { getPineconeKey } from './secrets';
import { EmbeddingMetadata, VectorMatch } from './types/Insights';
import { chunk } from './utils';

export interface ConversationFilter {
  conversationId: string;
}

export interface VectorIndexClient {
  readonly dimensions: number;
  upsert(vectorId: string, values: number[], metadata: EmbeddingMetadata): Promise<void>;
  query(vector: number[], topK: number, filter: ConversationFilter): Promise<VectorMatch[]>;
  fetchMetadata(vectorIds: string[]): Promise<Map<string, EmbeddingMetadata>>;
  deleteMany(vectorIds: string[]): Promise<void>;
  listIdsByConversation(conversationId: string): Promise<string[]>;
}

export function vectorIdFor(conversationId: string, messageId: string): string {
  return `${conversationId}_${messageId}`;
}

let pinecone: Pinecone | null = null;

function getPinecone(): Pinecone {
  if (!pinecone) {
    pinecone = new Pinecone({ apiKey: getPineconeKey() });
  }
  return pinecone;
}

export interface PineconeIndexOptions {
  indexName?: string;
  dimensions?: number;
}

/**
 * Pinecone-backed index. Vector ids are `${conversationId}_${messageId}`, so
 * a conversation's vectors can be listed by prefix. Conversation ids are
 * Firestore auto-ids and never contain `_`.
 */
export class PineconeVectorIndex implements VectorIndexClient {
  readonly indexName: string;
  readonly dimensions: number;
  private index: Index<EmbeddingMetadata> | null = null;

  constructor(options: PineconeIndexOptions = {}) {
    this.indexName = options.indexName ?? config.pinecone.indexName;
    this.dimensions = options.dimensions ?? config.openai.embeddingDimensions;
  }

  async upsert(vectorId: string, values: number[], metadata: EmbeddingMetadata): Promise<void> {
    this.assertDimensions(values);
    await this.getIndex().upsert([{ id: vectorId, values, metadata }]);
  }

  async query(vector: number[], topK: number, filter: ConversationFilter): Promise<VectorMatch[]> {
    this.assertDimensions(vector);
    const response = await this.getIndex().query({
      vector,
      topK,
      includeMetadata: true,
      filter: { conversationId: { $eq: filter.conversationId } },
    });

    const matches: VectorMatch[] = [];
    for (const match of response.matches ?? []) {
      if (match.metadata) {
        matches.push({ id: match.id, score: match.score ?? 0, metadata: match.metadata });
      }
    }
    return matches;
  }

  async fetchMetadata(vectorIds: string[]): Promise<Map<string, EmbeddingMetadata>> {
    const found = new Map<string, EmbeddingMetadata>();
    if (vectorIds.length === 0) {
      return found;
    }
    const response = await this.getIndex().fetch(vectorIds);
    for (const [id, record] of Object.entries(response.records ?? {})) {
      if (record.metadata) {
        found.set(id, record.metadata);
      }
    }
    return found;
  }

  async deleteMany(vectorIds: string[]): Promise<void> {
    for (const batch of chunk(vectorIds, config.pinecone.deleteBatchSize)) {
      await this.getIndex().deleteMany(batch);
    }
  }

  async listIdsByConversation(conversationId: string): Promise<string[]> {
    const ids: string[] = [];
    let paginationToken: string | undefined;
    do {
      const prefix = `${conversationId}_`;
      const page = await this.getIndex().listPaginated(paginationToken ? { prefix, paginationToken } : { prefix });
      for (const vector of page.vectors ?? []) {
        if (vector.id) {
          ids.push(vector.id);
        }
      }
      paginationToken = page.pagination?.next;
    } while (paginationToken);
    return ids;
  }

  private getIndex(): Index<EmbeddingMetadata> {
    if (!this.index) {
      this.index = getPinecone().index<EmbeddingMetadata>(this.indexName);
    }
    return this.index;
  }

  private assertDimensions(values: number[]): void {
    if (values.length !== this.dimensions) {
      throw new ValidationError(`Vector has ${values.length} dimensions, index expects ${this.dimensions}`);
    }
  }
}
