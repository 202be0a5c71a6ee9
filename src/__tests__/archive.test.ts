import { ArchiveMessageStore } from '../archive';
import { DuplicateMessageIdError, ValidationError } from '../errors';
import { buildMessage } from './helpers/fixtures';
import { MemoryArchiveRepository } from './helpers/memoryRepositories';

describe('ArchiveMessageStore', () => {
  let repo: MemoryArchiveRepository;
  let archive: ArchiveMessageStore;

  beforeEach(() => {
    repo = new MemoryArchiveRepository();
    archive = new ArchiveMessageStore(repo);
  });

  describe('archive', () => {
    it('should do nothing for an empty batch', async () => {
      const putMany = jest.spyOn(repo, 'putMany');

      expect(await archive.archive('conv-1', [])).toEqual({ written: [], skipped: [] });
      expect(putMany).not.toHaveBeenCalled();
    });

    it('should skip messages already archived with the same content', async () => {
      const m1 = buildMessage({ id: 'm1', createdAt: 100 });
      await archive.archive('conv-1', [m1]);

      const resend = {
        ...m1,
        deliveryStatus: { bob: { state: 'delivered' as const, timestamp: 150 } },
        readBy: { bob: 160 },
      };
      const m2 = buildMessage({ id: 'm2', createdAt: 200 });

      expect(await archive.archive('conv-1', [resend, m2])).toEqual({ written: ['m2'], skipped: ['m1'] });
      expect(await archive.count('conv-1')).toBe(2);
    });

    it('should write nothing when an id already holds different content', async () => {
      await archive.archive('conv-1', [buildMessage({ id: 'm1', text: 'original' })]);

      await expect(
        archive.archive('conv-1', [buildMessage({ id: 'm2' }), buildMessage({ id: 'm1', text: 'tampered' })])
      ).rejects.toThrow(DuplicateMessageIdError);
      expect(await archive.has('conv-1', 'm2')).toBe(false);
      expect((await archive.get('conv-1', 'm1'))?.text).toBe('original');
    });

    it('should reject conflicting copies inside one batch', async () => {
      await expect(
        archive.archive('conv-1', [buildMessage({ id: 'm1', text: 'a' }), buildMessage({ id: 'm1', text: 'b' })])
      ).rejects.toThrow(DuplicateMessageIdError);
    });

    it('should reject messages from another conversation', async () => {
      await expect(
        archive.archive('conv-1', [buildMessage({ id: 'm1', conversationId: 'conv-2' })])
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('page', () => {
    beforeEach(async () => {
      await archive.archive('conv-1', [
        buildMessage({ id: 'a', createdAt: 100 }),
        buildMessage({ id: 'b', createdAt: 100 }),
        buildMessage({ id: 'c', createdAt: 200 }),
        buildMessage({ id: 'd', createdAt: 300 }),
      ]);
    });

    it('should return messages strictly before the cursor, newest first', async () => {
      const page = await archive.page('conv-1', 300, 10);
      expect(page.map((m) => m.id)).toEqual(['c', 'b', 'a']);
    });

    it('should honour the limit', async () => {
      const page = await archive.page('conv-1', Number.MAX_SAFE_INTEGER, 2);
      expect(page.map((m) => m.id)).toEqual(['d', 'c']);
    });

    it('should not skip messages that share the cursor timestamp', async () => {
      const page = await archive.page('conv-1', 100, 10, 'b');
      expect(page.map((m) => m.id)).toEqual(['a']);
    });

    it('should validate the page size', async () => {
      await expect(archive.page('conv-1', 300, 0)).rejects.toThrow('limit must be between 1 and 100');
      await expect(archive.page('conv-1', 300, 101)).rejects.toThrow(ValidationError);
    });
  });
});
