const mockIndex = {
  upsert: jest.fn(),
  query: jest.fn(),
  fetch: jest.fn(),
  deleteMany: jest.fn(),
  listPaginated: jest.fn(),
};
const mockIndexFactory = jest.fn(() => mockIndex);
jest.mock('@pinecone-database/pinecone', () => ({
  Pinecone: jest.fn().mockImplementation(() => ({ index: mockIndexFactory })),
}));

import { Pinecone } from '@pinecone-database/pinecone';
import { ValidationError } from '../errors';
import { EmbeddingMetadata } from '../types/Insights';
import { PineconeVectorIndex, vectorIdFor } from '../vectorIndex';

const metadata: EmbeddingMetadata = {
  messageId: 'm1',
  conversationId: 'conv-1',
  text: 'hello',
  timestamp: 1_000,
  userId: 'alice',
};

describe('PineconeVectorIndex', () => {
  let index: PineconeVectorIndex;

  beforeAll(() => {
    process.env.PINECONE_API_KEY = 'test-secret';
  });

  beforeEach(() => {
    Object.values(mockIndex).forEach((fn) => fn.mockReset());
    index = new PineconeVectorIndex({ indexName: 'test-index', dimensions: 3 });
  });

  it('should build vector ids from conversation and message', () => {
    expect(vectorIdFor('conv-1', 'm1')).toBe('conv-1_m1');
  });

  it('should upsert one record with its metadata', async () => {
    mockIndex.upsert.mockResolvedValue(undefined);

    await index.upsert('conv-1_m1', [1, 2, 3], metadata);

    expect(mockIndex.upsert).toHaveBeenCalledWith([{ id: 'conv-1_m1', values: [1, 2, 3], metadata }]);
    expect(Pinecone).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(mockIndexFactory).toHaveBeenCalledWith('test-index');
  });

  it('should refuse vectors of the wrong dimension', async () => {
    await expect(index.upsert('conv-1_m1', [1, 2], metadata)).rejects.toThrow(ValidationError);
    await expect(index.query([1], 5, { conversationId: 'conv-1' })).rejects.toThrow(
      'Vector has 1 dimensions, index expects 3'
    );
    expect(mockIndex.upsert).not.toHaveBeenCalled();
    expect(mockIndex.query).not.toHaveBeenCalled();
  });

  it('should query within one conversation and keep matches with metadata', async () => {
    mockIndex.query.mockResolvedValue({
      matches: [
        { id: 'conv-1_m1', score: 0.91, metadata },
        { id: 'conv-1_m2', metadata: { ...metadata, messageId: 'm2' } },
        { id: 'conv-1_m3', score: 0.8 },
      ],
    });

    const matches = await index.query([1, 2, 3], 4, { conversationId: 'conv-1' });

    expect(mockIndex.query).toHaveBeenCalledWith({
      vector: [1, 2, 3],
      topK: 4,
      includeMetadata: true,
      filter: { conversationId: { $eq: 'conv-1' } },
    });
    expect(matches).toEqual([
      { id: 'conv-1_m1', score: 0.91, metadata },
      { id: 'conv-1_m2', score: 0, metadata: { ...metadata, messageId: 'm2' } },
    ]);
  });

  it('should fetch metadata by id', async () => {
    mockIndex.fetch.mockResolvedValue({ records: { 'conv-1_m1': { id: 'conv-1_m1', values: [], metadata } } });

    const found = await index.fetchMetadata(['conv-1_m1', 'conv-1_m9']);

    expect(mockIndex.fetch).toHaveBeenCalledWith(['conv-1_m1', 'conv-1_m9']);
    expect([...found.entries()]).toEqual([['conv-1_m1', metadata]]);
    expect(await index.fetchMetadata([])).toEqual(new Map());
    expect(mockIndex.fetch).toHaveBeenCalledTimes(1);
  });

  it('should delete in batches of a thousand', async () => {
    mockIndex.deleteMany.mockResolvedValue(undefined);
    const ids = Array.from({ length: 1_500 }, (_, i) => `conv-1_m${i}`);

    await index.deleteMany(ids);

    expect(mockIndex.deleteMany).toHaveBeenCalledTimes(2);
    expect(mockIndex.deleteMany.mock.calls[0][0]).toHaveLength(1_000);
    expect(mockIndex.deleteMany.mock.calls[1][0]).toHaveLength(500);
  });

  it('should follow pagination when listing a conversation', async () => {
    mockIndex.listPaginated
      .mockResolvedValueOnce({ vectors: [{ id: 'conv-1_m1' }, { id: 'conv-1_m2' }], pagination: { next: 'page-2' } })
      .mockResolvedValueOnce({ vectors: [{ id: 'conv-1_m3' }] });

    const ids = await index.listIdsByConversation('conv-1');

    expect(ids).toEqual(['conv-1_m1', 'conv-1_m2', 'conv-1_m3']);
    expect(mockIndex.listPaginated.mock.calls).toEqual([
      [{ prefix: 'conv-1_' }],
      [{ prefix: 'conv-1_', paginationToken: 'page-2' }],
    ]);
  });
});
