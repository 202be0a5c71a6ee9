import { config } from './config';
import { TypingEntry, TypingRepository, Unsubscribe } from './types/repositories';
import { Clock } from './utils';

export interface TypingOptions {
  ttlMs?: number;
  clock?: Clock;
}

/**
 * Ephemeral typing indicators. Expiry is enforced at read time, the sweep
 * only keeps storage tidy, so a client that vanishes without clearing its
 * flag stops showing as typing after the TTL either way.
 */
export class TypingIndicators {
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(private readonly repo: TypingRepository, options: TypingOptions = {}) {
    this.ttlMs = options.ttlMs ?? config.typing.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  async setTyping(conversationId: string, userId: string, isTyping: boolean): Promise<void> {
    if (isTyping) {
      await this.repo.set(conversationId, userId, this.clock() + this.ttlMs);
    } else {
      await this.repo.remove(conversationId, userId);
    }
  }

  async getTypingUsers(conversationId: string, excludeUserId?: string): Promise<string[]> {
    return this.activeUsers(await this.repo.list(conversationId), excludeUserId);
  }

  /**
   * Pushes the active typists on every change, and again when the earliest
   * flag expires: the store sees no write when a client vanishes mid-typing.
   *
   * @param conversationId - Conversation to watch
   * @param listener - Receives the sorted user ids currently typing
   * @param excludeUserId - Usually the viewer, who never sees their own flag
   */
  observe(
    conversationId: string,
    listener: (userIds: string[]) => void,
    excludeUserId?: string
  ): Unsubscribe {
    let expiryTimer: NodeJS.Timeout | undefined;
    let stopped = false;

    const publish = (entries: TypingEntry[]): void => {
      clearTimeout(expiryTimer);
      expiryTimer = undefined;
      if (stopped) {
        return;
      }
      listener(this.activeUsers(entries, excludeUserId));

      const now = this.clock();
      const pending = entries
        .filter((entry) => entry.userId !== excludeUserId && entry.expiresAt > now)
        .map((entry) => entry.expiresAt);
      if (pending.length > 0) {
        expiryTimer = setTimeout(() => publish(entries), Math.min(...pending) - now);
        expiryTimer.unref();
      }
    };

    const unsubscribe = this.repo.subscribe(conversationId, publish, (error) =>
      console.error(`❌ Typing listener error for ${conversationId}:`, error)
    );
    return () => {
      stopped = true;
      clearTimeout(expiryTimer);
      unsubscribe();
    };
  }

  async sweep(): Promise<number> {
    const removed = await this.repo.removeExpired(this.clock());
    if (removed > 0) {
      console.log(`🧹 Swept ${removed} expired typing indicators`);
    }
    return removed;
  }

  /**
   * Periodic in-process sweep. The timer is unref'd so it never keeps the process alive.
   */
  startSweeper(intervalMs = config.typing.sweepIntervalMs): () => void {
    const timer = setInterval(() => {
      this.sweep().catch((error) => console.error('❌ Typing sweep failed:', error));
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private activeUsers(entries: TypingEntry[], excludeUserId?: string): string[] {
    const now = this.clock();
    return entries
      .filter((entry) => entry.expiresAt > now && entry.userId !== excludeUserId)
      .map((entry) => entry.userId)
      .sort();
  }
}
