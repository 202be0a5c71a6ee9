import OpenAI from 'openai';
import { config } from './config';
import { MalformedModelResponseError, ValidationError } from './errors';
import { getOpenAI, toModelError } from './openaiClient';

export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

export interface EmbeddingOptions {
  model?: string;
  dimensions?: number;
}

/**
 * text-embedding-3-small with an explicit output dimension, which must
 * match the vector index.
 */
export class OpenAIEmbeddingGenerator implements Embedder {
  readonly model: string;
  readonly dimensions: number;

  constructor(private readonly client: () => OpenAI = getOpenAI, options: EmbeddingOptions = {}) {
    this.model = options.model ?? config.openai.embeddingModel;
    this.dimensions = options.dimensions ?? config.openai.embeddingDimensions;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (texts.some((text) => text.trim() === '')) {
      throw new ValidationError('Cannot embed empty text', 'EMPTY_TEXT');
    }

    let data: Array<{ index: number; embedding: number[] }>;
    try {
      const response = await this.client().embeddings.create({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      });
      data = response.data;
    } catch (error) {
      throw toModelError(error);
    }

    if (data.length !== texts.length) {
      throw new MalformedModelResponseError(`Expected ${texts.length} embeddings, got ${data.length}`);
    }

    return [...data]
      .sort((a, b) => a.index - b.index)
      .map(({ embedding }) => {
        if (embedding.length !== this.dimensions) {
          throw new MalformedModelResponseError(
            `Embedding has ${embedding.length} dimensions, expected ${this.dimensions}`
          );
        }
        return embedding;
      });
  }
}
