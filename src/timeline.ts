import { ArchiveRepository, LiveMessageRepository } from './types/repositories';
import { Message } from './types/Message';
import { sortMessages } from './utils';

/**
 * Read-only view over both halves of a conversation's history.
 * A message can briefly exist in both stores while an archival pass is
 * between its two steps, so results are deduplicated by id (live copy wins).
 */
export class ConversationTimeline {
  constructor(
    private readonly liveRepo: LiveMessageRepository,
    private readonly archiveRepo: ArchiveRepository
  ) {}

  async listCreatedAfter(conversationId: string, afterTimestamp: number): Promise<Message[]> {
    const [live, archived] = await Promise.all([
      this.liveRepo.list(conversationId),
      this.archiveRepo.listCreatedAfter(conversationId, afterTimestamp),
    ]);

    const byId = new Map<string, Message>();
    for (const message of archived) {
      byId.set(message.id, message);
    }
    for (const message of live) {
      if (message.createdAt > afterTimestamp) {
        byId.set(message.id, message);
      }
    }
    return sortMessages([...byId.values()]);
  }
}
