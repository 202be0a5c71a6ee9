import { AiClients, createMessagingCore, CoreOptions, MessagingCore } from '../../core';
import { Embedder } from '../../embeddings';
import { InsightGenerator, Translator } from '../../textGeneration';
import { EmbeddingMetadata, InsightContextMessage, VectorMatch } from '../../types/Insights';
import { Message } from '../../types/Message';
import { ConversationFilter, VectorIndexClient } from '../../vectorIndex';
import { memoryRepositories, MemoryRepositories } from './memoryRepositories';

export const DIMENSIONS = 4;

/**
 * Manual clock. Every read advances by `step` so successive messages get
 * distinct, increasing timestamps.
 */
export class TestClock {
  constructor(public current = 1_000, private readonly step = 1) {}

  now = (): number => {
    const value = this.current;
    this.current += this.step;
    return value;
  };

  advance(ms: number): void {
    this.current += ms;
  }
}

export function sequentialIds(prefix = 'msg'): () => string {
  let next = 1;
  return () => `${prefix}-${String(next++).padStart(3, '0')}`;
}

export class FakeEmbedder implements Embedder {
  readonly dimensions = DIMENSIONS;
  readonly calls: string[] = [];

  embed = jest.fn(async (text: string): Promise<number[]> => {
    this.calls.push(text);
    return [text.length, 1, 0, 0];
  });
}

export class FakeVectorIndex implements VectorIndexClient {
  readonly dimensions = DIMENSIONS;
  readonly vectors = new Map<string, { values: number[]; metadata: EmbeddingMetadata }>();
  matches: VectorMatch[] = [];

  upsert = jest.fn(async (vectorId: string, values: number[], metadata: EmbeddingMetadata): Promise<void> => {
    this.vectors.set(vectorId, { values, metadata });
  });

  query = jest.fn(async (_vector: number[], topK: number, filter: ConversationFilter): Promise<VectorMatch[]> =>
    this.matches.filter((m) => m.metadata.conversationId === filter.conversationId).slice(0, topK)
  );

  fetchMetadata = jest.fn(async (vectorIds: string[]): Promise<Map<string, EmbeddingMetadata>> => {
    const found = new Map<string, EmbeddingMetadata>();
    for (const id of vectorIds) {
      const vector = this.vectors.get(id);
      if (vector) {
        found.set(id, vector.metadata);
      }
    }
    return found;
  });

  deleteMany = jest.fn(async (vectorIds: string[]): Promise<void> => {
    for (const id of vectorIds) {
      this.vectors.delete(id);
    }
  });

  listIdsByConversation = jest.fn(async (conversationId: string): Promise<string[]> =>
    [...this.vectors.keys()].filter((id) => id.startsWith(`${conversationId}_`))
  );
}

export class FakeTextGenerator implements Translator, InsightGenerator {
  translateText = jest.fn(async (text: string, targetLanguage: string) => ({
    translatedText: `[${targetLanguage}] ${text}`,
    detectedLanguage: 'en',
  }));

  generateInsight = jest.fn(async (query: string, context: InsightContextMessage[]) =>
    `Answer to "${query}" from ${context.length} messages`
  );
}

export interface FakeAi extends AiClients {
  embedder: FakeEmbedder;
  vectorIndex: FakeVectorIndex;
  translator: FakeTextGenerator;
  insights: FakeTextGenerator;
}

export function fakeAi(): FakeAi {
  const generator = new FakeTextGenerator();
  return {
    embedder: new FakeEmbedder(),
    vectorIndex: new FakeVectorIndex(),
    translator: generator,
    insights: generator,
  };
}

export interface TestHarness {
  core: MessagingCore;
  repos: MemoryRepositories;
  ai: FakeAi;
  clock: TestClock;
}

export function createHarness(options: CoreOptions = {}): TestHarness {
  const repos = memoryRepositories();
  const ai = fakeAi();
  const clock = new TestClock();
  const core = createMessagingCore(repos, ai, {
    ...options,
    clock: options.clock ?? clock.now,
    generateId: options.generateId ?? sequentialIds(),
    archival: { sleep: async () => undefined, ...options.archival },
  });
  return { core, repos, ai, clock };
}

export function buildMessage(overrides: Partial<Message> & Pick<Message, 'id'>): Message {
  return {
    conversationId: 'conv-1',
    senderId: 'alice',
    senderName: 'Alice',
    text: `text of ${overrides.id}`,
    createdAt: 1_000,
    type: 'text',
    deliveryStatus: {},
    readBy: {},
    isDeleted: false,
    isEdited: false,
    deletedFor: [],
    ...overrides,
  };
}
