import { InsightGenerationFailedError, RateLimitedError, ValidationError } from '../errors';
import { NO_RELEVANT_HISTORY_ANSWER, RetrievalOrchestrator } from '../retrieval';
import { VectorMatch } from '../types/Insights';
import { FakeEmbedder, FakeTextGenerator, FakeVectorIndex } from './helpers/fixtures';

function match(messageId: string, score: number, timestamp: number, conversationId = 'conv-1'): VectorMatch {
  return {
    id: `${conversationId}_${messageId}`,
    score,
    metadata: { messageId, conversationId, text: `text ${messageId}`, timestamp, userId: 'alice' },
  };
}

describe('RetrievalOrchestrator', () => {
  let embedder: FakeEmbedder;
  let index: FakeVectorIndex;
  let generator: FakeTextGenerator;
  let rag: RetrievalOrchestrator;

  beforeEach(() => {
    embedder = new FakeEmbedder();
    index = new FakeVectorIndex();
    generator = new FakeTextGenerator();
    rag = new RetrievalOrchestrator(embedder, index, generator, { similarityThreshold: 0.75, maxTopK: 20 });
  });

  describe('search', () => {
    it('should query twice topK, filter by threshold and keep the top matches', async () => {
      index.matches = [
        match('m1', 0.8, 100),
        match('m2', 0.95, 200),
        match('m3', 0.74, 300),
        match('m4', 0.75, 400),
        match('m5', 0.9, 500),
      ];

      const results = await rag.search('conv-1', '  when is the launch?  ', 2);

      expect(embedder.embed).toHaveBeenCalledWith('when is the launch?');
      expect(index.query).toHaveBeenCalledWith([19, 1, 0, 0], 4, { conversationId: 'conv-1' });
      expect(results).toEqual([
        { messageId: 'm2', text: 'text m2', timestamp: 200, senderId: 'alice', score: 0.95 },
        { messageId: 'm1', text: 'text m1', timestamp: 100, senderId: 'alice', score: 0.8 },
      ]);
    });

    it('should keep a match exactly at the threshold', async () => {
      index.matches = [match('m4', 0.75, 400)];

      const results = await rag.search('conv-1', 'launch', 5);

      expect(results.map((r) => r.messageId)).toEqual(['m4']);
    });

    it('should drop matches from other conversations', async () => {
      index.query.mockResolvedValueOnce([match('m1', 0.99, 100, 'conv-2'), match('m2', 0.8, 200)]);

      const results = await rag.search('conv-1', 'launch', 5);

      expect(results.map((r) => r.messageId)).toEqual(['m2']);
    });

    it('should validate the query and topK', async () => {
      await expect(rag.search('conv-1', '   ')).rejects.toMatchObject({ code: 'EMPTY_TEXT' });
      await expect(rag.search('conv-1', 'q', 0)).rejects.toThrow(ValidationError);
      await expect(rag.search('conv-1', 'q', 21)).rejects.toThrow('topK must be between 1 and 20');
      expect(embedder.embed).not.toHaveBeenCalled();
    });
  });

  describe('answer', () => {
    it('should answer without calling the model when nothing is relevant', async () => {
      index.matches = [match('m1', 0.5, 100)];

      const answer = await rag.answer('conv-1', 'anything?');

      expect(answer).toEqual({ answerText: NO_RELEVANT_HISTORY_ANSWER, supportingMessages: [] });
      expect(generator.generateInsight).not.toHaveBeenCalled();
    });

    it('should pass context chronologically and return sources by relevance', async () => {
      index.matches = [match('m1', 0.8, 300), match('m2', 0.9, 100), match('m3', 0.85, 200)];

      const answer = await rag.answer('conv-1', ' what did we decide? ');

      expect(generator.generateInsight).toHaveBeenCalledWith('what did we decide?', [
        { text: 'text m2', timestamp: 100 },
        { text: 'text m3', timestamp: 200 },
        { text: 'text m1', timestamp: 300 },
      ]);
      expect(answer.answerText).toBe('Answer to "what did we decide?" from 3 messages');
      expect(answer.supportingMessages.map((m) => m.messageId)).toEqual(['m2', 'm3', 'm1']);
    });

    it('should report which stage failed and keep retryability', async () => {
      index.matches = [match('m1', 0.9, 100)];
      generator.generateInsight.mockRejectedValueOnce(new RateLimitedError(20));
      jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const failure = rag.answer('conv-1', 'q');

      await expect(failure).rejects.toThrow(InsightGenerationFailedError);
      await expect(failure).rejects.toMatchObject({ stage: 'generation', category: 'transient' });
    });

    it('should mark embedding failures from bad input as not retryable', async () => {
      embedder.embed.mockRejectedValueOnce(new ValidationError('bad'));
      jest.spyOn(console, 'error').mockImplementation(() => undefined);

      await expect(rag.search('conv-1', 'q')).rejects.toMatchObject({ stage: 'embedding', category: 'upstream' });
    });
  });
});
