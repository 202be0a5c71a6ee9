import {
  decodeConversation,
  decodeMention,
  decodeMessage,
  decodeStatus,
  decodeTranslation,
  encodeConversation,
  encodeMessage,
  encodeStatus,
} from '../firebase/codec';
import { buildMessage } from './helpers/fixtures';

describe('firebase codec', () => {
  describe('messages', () => {
    it('should store deletedFor as a map of user ids and leave out absent fields', () => {
      const encoded = encodeMessage(buildMessage({ id: 'm1', deletedFor: ['bob', 'carol'] }));

      expect(encoded.deletedFor).toEqual({ bob: true, carol: true });
      expect('mediaUrl' in encoded).toBe(false);
      expect('editedAt' in encoded).toBe(false);
    });

    it('should decode what it encodes', () => {
      const message = buildMessage({
        id: 'm1',
        deletedFor: ['bob'],
        deliveryStatus: { bob: { state: 'delivered', timestamp: 1_200 } },
        readBy: { alice: 1_000 },
        isEdited: true,
        editedAt: 1_300,
        translatedText: 'hola',
        translatedTo: 'es',
      });

      expect(decodeMessage('conv-1', 'm1', encodeMessage(message))).toEqual(message);
    });

    it('should drop records without a sender or timestamp', () => {
      expect(decodeMessage('conv-1', 'm1', { text: 'hi', createdAt: 1 })).toBeNull();
      expect(decodeMessage('conv-1', 'm1', { senderId: 'alice', text: 'hi' })).toBeNull();
      expect(decodeMessage('conv-1', 'm1', 'not a record')).toBeNull();
    });

    it('should fill defaults for loose records', () => {
      const decoded = decodeMessage('conv-1', 'm1', {
        senderId: 'alice',
        createdAt: 5,
        type: 'sticker',
        deletedFor: ['bob', 7],
        deliveryStatus: { bob: { state: 'lost' }, carol: { state: 'sent' } },
      });

      expect(decoded).toEqual({
        id: 'm1',
        conversationId: 'conv-1',
        senderId: 'alice',
        senderName: 'alice',
        text: '',
        createdAt: 5,
        type: 'text',
        deliveryStatus: { carol: { state: 'sent', timestamp: 0 } },
        readBy: {},
        isDeleted: false,
        isEdited: false,
        deletedFor: ['bob'],
      });
    });
  });

  describe('conversations', () => {
    it('should rebuild the member key when it is missing', () => {
      const decoded = decodeConversation('c1', {
        type: 'group',
        name: 'Team',
        memberIds: ['carol', 'alice'],
        memberDetails: { alice: { displayName: 'Alice', joinedAt: 10 } },
        metadata: { totalMessages: 3 },
        lastMessage: { messageId: 'm1', senderId: 'alice', timestamp: 9 },
      });

      expect(decoded).toEqual({
        id: 'c1',
        type: 'group',
        name: 'Team',
        createdBy: '',
        createdAt: 0,
        memberIds: ['carol', 'alice'],
        memberKey: 'alice,carol',
        memberDetails: { alice: { displayName: 'Alice', joinedAt: 10 } },
        metadata: { totalMessages: 3 },
        lastMessage: { messageId: 'm1', text: '', senderId: 'alice', senderName: 'alice', timestamp: 9, type: 'text' },
      });
    });

    it('should leave the optional name out of the stored record', () => {
      const encoded = encodeConversation({
        id: 'c1',
        type: 'direct',
        createdBy: 'alice',
        createdAt: 1,
        memberIds: ['alice', 'bob'],
        memberKey: 'alice,bob',
        memberDetails: {},
        metadata: { totalMessages: 0 },
      });

      expect(encoded).toEqual({
        type: 'direct',
        createdBy: 'alice',
        createdAt: 1,
        memberIds: ['alice', 'bob'],
        memberKey: 'alice,bob',
        memberDetails: {},
        metadata: { totalMessages: 0 },
      });
    });
  });

  describe('status, translation and mentions', () => {
    it('should keep the conversation id in the key, not the record', () => {
      const status = {
        conversationId: 'c1',
        unreadCount: 2,
        isPinned: true,
        isMuted: false,
        isHidden: false,
        lastMessageTimestamp: 50,
        lastReadMessageId: 'm1',
      };

      const encoded = encodeStatus(status);

      expect('conversationId' in encoded).toBe(false);
      expect(decodeStatus('c1', encoded)).toEqual(status);
    });

    it('should reject cached translations without text or timestamp', () => {
      expect(decodeTranslation('m1', 'es', { detectedLanguage: 'en', cachedAt: 1 })).toBeNull();
      expect(decodeTranslation('m1', 'es', { translatedText: 'hola', cachedAt: 1 })).toEqual({
        messageId: 'm1',
        targetLanguage: 'es',
        translatedText: 'hola',
        detectedLanguage: '',
        cachedAt: 1,
      });
    });

    it('should treat unknown mention reasons as mentions', () => {
      const decoded = decodeMention('x1', { messageId: 'm1', conversationId: 'c1', reason: 'other', isRead: true });

      expect(decoded).toMatchObject({ id: 'x1', reason: 'mentioned', isRead: true, createdAt: 0 });
      expect(decodeMention('x2', { messageId: 'm1' })).toBeNull();
    });
  });
});
