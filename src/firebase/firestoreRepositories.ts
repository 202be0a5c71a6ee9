import * as admin from 'firebase-admin';
import { Conversation, NewConversation } from '../types/Conversation';
import { Message } from '../types/Message';
import {
  ArchiveCursor,
  ArchiveRepository,
  ConversationRepository,
  Mutation,
  UpdateResult,
} from '../types/repositories';
import { chunk } from '../utils';
import { getFirestore } from './admin';
import { decodeConversation, decodeMessage, encodeConversation, encodeMessage } from './codec';

type FirestoreProvider = () => admin.firestore.Firestore;

// Firestore caps a write batch at 500 operations
const MAX_BATCH_WRITES = 500;

// gRPC status returned by DocumentReference.create for an existing document
const ALREADY_EXISTS = 6;

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === ALREADY_EXISTS;
}

function decodeDocs(conversationId: string, docs: admin.firestore.QueryDocumentSnapshot[]): Message[] {
  const messages: Message[] = [];
  for (const doc of docs) {
    const message = decodeMessage(conversationId, doc.id, doc.data());
    if (message) {
      messages.push(message);
    }
  }
  return messages;
}

/**
 * conversations/{conversationId}/messages/{messageId}
 */
export class FirestoreArchiveRepository implements ArchiveRepository {
  constructor(private readonly db: FirestoreProvider = getFirestore) {}

  async getMany(conversationId: string, messageIds: string[]): Promise<Map<string, Message>> {
    const found = new Map<string, Message>();
    if (messageIds.length === 0) {
      return found;
    }
    const refs = messageIds.map((id) => this.messages(conversationId).doc(id));
    const snapshots = await this.db().getAll(...refs);
    for (const snapshot of snapshots) {
      if (!snapshot.exists) {
        continue;
      }
      const message = decodeMessage(conversationId, snapshot.id, snapshot.data());
      if (message) {
        found.set(message.id, message);
      }
    }
    return found;
  }

  async putMany(conversationId: string, messages: Message[]): Promise<void> {
    const db = this.db();
    for (const group of chunk(messages, MAX_BATCH_WRITES)) {
      const batch = db.batch();
      for (const message of group) {
        batch.set(this.messages(conversationId).doc(message.id), encodeMessage(message));
      }
      await batch.commit();
    }
  }

  async page(conversationId: string, cursor: ArchiveCursor, limit: number): Promise<Message[]> {
    const ordered = this.messages(conversationId).orderBy('createdAt', 'desc').orderBy('id', 'desc');
    const query = cursor.beforeMessageId
      ? ordered.startAfter(cursor.beforeTimestamp, cursor.beforeMessageId)
      : ordered.where('createdAt', '<', cursor.beforeTimestamp);
    const snapshot = await query.limit(limit).get();
    return decodeDocs(conversationId, snapshot.docs);
  }

  async listCreatedAfter(conversationId: string, afterTimestamp: number): Promise<Message[]> {
    const snapshot = await this.messages(conversationId)
      .where('createdAt', '>', afterTimestamp)
      .orderBy('createdAt', 'asc')
      .get();
    return decodeDocs(conversationId, snapshot.docs);
  }

  async count(conversationId: string): Promise<number> {
    const snapshot = await this.messages(conversationId).count().get();
    return snapshot.data().count;
  }

  private messages(conversationId: string): admin.firestore.CollectionReference {
    return this.db().collection('conversations').doc(conversationId).collection('messages');
  }
}

/**
 * conversations/{conversationId}
 */
export class FirestoreConversationRepository implements ConversationRepository {
  constructor(private readonly db: FirestoreProvider = getFirestore) {}

  async create(data: NewConversation): Promise<Conversation> {
    const ref = this.conversations().doc();
    const conversation: Conversation = { ...data, id: ref.id };
    await ref.set(encodeConversation(conversation));
    return conversation;
  }

  async createIfAbsent(
    conversationId: string,
    data: NewConversation
  ): Promise<{ conversation: Conversation; created: boolean }> {
    const ref = this.conversations().doc(conversationId);
    const conversation: Conversation = { ...data, id: conversationId };
    try {
      // create() fails when the document exists, unlike set()
      await ref.create(encodeConversation(conversation));
      return { conversation, created: true };
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }

    const existing = await this.get(conversationId);
    if (!existing) {
      throw new Error(`Conversation ${conversationId} already exists but could not be read`);
    }
    return { conversation: existing, created: false };
  }

  async get(conversationId: string): Promise<Conversation | null> {
    const snapshot = await this.conversations().doc(conversationId).get();
    return snapshot.exists ? decodeConversation(snapshot.id, snapshot.data()) : null;
  }

  async findByMemberKey(memberKey: string): Promise<Conversation[]> {
    const snapshot = await this.conversations().where('memberKey', '==', memberKey).get();
    const conversations: Conversation[] = [];
    for (const doc of snapshot.docs) {
      const conversation = decodeConversation(doc.id, doc.data());
      if (conversation) {
        conversations.push(conversation);
      }
    }
    return conversations;
  }

  async update(
    conversationId: string,
    mutate: Mutation<Conversation>
  ): Promise<UpdateResult<Conversation> | null> {
    const ref = this.conversations().doc(conversationId);
    return this.db().runTransaction(async (tx) => {
      const snapshot = await tx.get(ref);
      const current = snapshot.exists ? decodeConversation(snapshot.id, snapshot.data()) : null;
      if (!current) {
        return null;
      }
      const next = mutate(current);
      if (next === undefined) {
        return { value: current, changed: false };
      }
      tx.set(ref, encodeConversation(next));
      return { value: next, changed: true };
    });
  }

  async incrementMessageCount(conversationId: string, by: number): Promise<void> {
    await this.conversations()
      .doc(conversationId)
      .update({ 'metadata.totalMessages': admin.firestore.FieldValue.increment(by) });
  }

  private conversations(): admin.firestore.CollectionReference {
    return this.db().collection('conversations');
  }
}
