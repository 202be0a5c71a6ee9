import * as admin from 'firebase-admin';
import { encodeConversation } from '../firebase/codec';
import { FirestoreConversationRepository } from '../firebase/firestoreRepositories';
import { NewConversation } from '../types/Conversation';

const data: NewConversation = {
  type: 'direct',
  createdBy: 'alice',
  createdAt: 1_000,
  memberIds: ['alice', 'bob'],
  memberKey: 'alice,bob',
  memberDetails: {},
  metadata: { totalMessages: 0 },
};

/**
 * Just enough of Firestore for conversations/{id} create and get.
 */
function fakeFirestore(createError?: Error) {
  const stored = new Map<string, unknown>();
  const doc = jest.fn((id: string) => ({
    create: jest.fn(async (value: unknown) => {
      if (createError) {
        throw createError;
      }
      if (stored.has(id)) {
        throw Object.assign(new Error('6 ALREADY_EXISTS: Document already exists'), { code: 6 });
      }
      stored.set(id, value);
    }),
    get: jest.fn(async () => ({ id, exists: stored.has(id), data: () => stored.get(id) })),
  }));
  const db = { collection: jest.fn(() => ({ doc })) };
  return { db: (db as unknown) as admin.firestore.Firestore, stored };
}

describe('FirestoreConversationRepository.createIfAbsent', () => {
  it('should create the document under the given id', async () => {
    const { db, stored } = fakeFirestore();
    const repo = new FirestoreConversationRepository(() => db);

    const result = await repo.createIfAbsent('direct_x', data);

    expect(result).toEqual({ conversation: { ...data, id: 'direct_x' }, created: true });
    expect(stored.get('direct_x')).toEqual(encodeConversation({ ...data, id: 'direct_x' }));
  });

  it('should return the stored conversation when the id is taken', async () => {
    const { db } = fakeFirestore();
    const repo = new FirestoreConversationRepository(() => db);
    await repo.createIfAbsent('direct_x', data);

    const second = await repo.createIfAbsent('direct_x', { ...data, createdBy: 'bob', createdAt: 2_000 });

    expect(second.created).toBe(false);
    expect(second.conversation).toMatchObject({ id: 'direct_x', createdBy: 'alice', createdAt: 1_000 });
  });

  it('should rethrow other write failures', async () => {
    const denied = Object.assign(new Error('7 PERMISSION_DENIED'), { code: 7 });
    const { db } = fakeFirestore(denied);
    const repo = new FirestoreConversationRepository(() => db);

    await expect(repo.createIfAbsent('direct_x', data)).rejects.toBe(denied);
  });
});
