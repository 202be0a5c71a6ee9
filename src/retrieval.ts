import { config } from './config';
import { Embedder } from './embeddings';
import { InsightGenerationFailedError, InsightStage, ValidationError } from './errors';
import { InsightGenerator } from './textGeneration';
import { InsightAnswer, SupportingMessage, VectorMatch } from './types/Insights';
import { VectorIndexClient } from './vectorIndex';

export const NO_RELEVANT_HISTORY_ANSWER =
  "I couldn't find any relevant messages in this conversation's history to answer that.";

export interface RetrievalOptions {
  similarityThreshold?: number;
  maxTopK?: number;
}

function toSupporting(match: VectorMatch): SupportingMessage {
  return {
    messageId: match.metadata.messageId,
    text: match.metadata.text,
    timestamp: match.metadata.timestamp,
    senderId: match.metadata.userId,
    score: match.score,
  };
}

function byRelevance(a: VectorMatch, b: VectorMatch): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Retrieval-augmented answers over one conversation's history.
 */
export class RetrievalOrchestrator {
  readonly similarityThreshold: number;
  private readonly maxTopK: number;

  constructor(
    private readonly embedder: Embedder,
    private readonly vectorIndex: VectorIndexClient,
    private readonly generator: InsightGenerator,
    options: RetrievalOptions = {}
  ) {
    this.similarityThreshold = options.similarityThreshold ?? config.rag.similarityThreshold;
    this.maxTopK = options.maxTopK ?? config.rag.maxTopK;
  }

  /**
   * Nearest messages above the similarity threshold, most relevant first.
   *
   * @param conversationId - Only this conversation's vectors are searched
   * @param query - Natural-language question or search text
   * @param topK - Maximum number of results, 1 to `maxTopK`
   */
  async search(conversationId: string, query: string, topK = config.rag.defaultTopK): Promise<SupportingMessage[]> {
    const question = this.validate(conversationId, query, topK);

    // 1. Embed the query
    const vector = await this.stage('embedding', () => this.embedder.embed(question));
    // 2. Over-fetch so the threshold filter still leaves topK candidates
    const matches = await this.stage('retrieval', () => this.vectorIndex.query(vector, topK * 2, { conversationId }));

    // 3. Keep confident matches from this conversation only
    const relevant = matches
      .filter((m) => m.score >= this.similarityThreshold && m.metadata.conversationId === conversationId)
      .sort(byRelevance)
      .slice(0, topK);

    console.log(`🔍 ${relevant.length}/${matches.length} matches above ${this.similarityThreshold} in ${conversationId}`);
    return relevant.map(toSupporting);
  }

  async answer(conversationId: string, query: string, topK = config.rag.defaultTopK): Promise<InsightAnswer> {
    // 1. Retrieve; without relevant history there is nothing to ask the model
    const supportingMessages = await this.search(conversationId, query, topK);
    if (supportingMessages.length === 0) {
      return { answerText: NO_RELEVANT_HISTORY_ANSWER, supportingMessages: [] };
    }

    // 2. Hand the model its context in chronological order
    const context = [...supportingMessages]
      .sort((a, b) => a.timestamp - b.timestamp)
      .map(({ text, timestamp }) => ({ text, timestamp }));

    const answerText = await this.stage('generation', () => this.generator.generateInsight(query.trim(), context));
    return { answerText, supportingMessages };
  }

  private validate(conversationId: string, query: string, topK: number): string {
    if (!conversationId) {
      throw new ValidationError('conversationId is required');
    }
    const question = query.trim();
    if (!question) {
      throw new ValidationError('Query must not be empty', 'EMPTY_TEXT');
    }
    if (!Number.isInteger(topK) || topK < 1 || topK > this.maxTopK) {
      throw new ValidationError(`topK must be between 1 and ${this.maxTopK}`);
    }
    return question;
  }

  private async stage<T>(stage: InsightStage, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      console.error(`❌ Insight ${stage} failed:`, error);
      throw new InsightGenerationFailedError(stage, error);
    }
  }
}
