import { ArchiveMessageStore } from './archive';
import { config } from './config';
import { ArchivalFailedError, ArchivalStep, errorMessage, isRetryable } from './errors';
import { KeyedMutex } from './keyedMutex';
import { LiveMessageStore } from './liveMessages';
import { sleep } from './utils';

export type ArchivalPhase = 'STABLE' | 'ARCHIVING';

export interface ArchivalResult {
  conversationId: string;
  phase: ArchivalPhase;
  archivedIds: string[];
  liveCount: number;
}

export interface ArchivalOptions {
  threshold?: number;
  retryDelaysMs?: number[];
  mutex?: KeyedMutex;
  sleep?: (ms: number) => Promise<void>;
}

interface ConversationArchivalState {
  phase: ArchivalPhase;
  // archived but not yet removed from the live window
  pendingEviction: string[] | null;
  lastError?: string;
}

/**
 * Keeps each live window at or below the threshold by moving the oldest
 * overflow into the archive. Archive first, then delete from live; one pass
 * per conversation at a time.
 */
export class ArchivalCoordinator {
  readonly threshold: number;
  private readonly retryDelaysMs: number[];
  private readonly mutex: KeyedMutex;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly states = new Map<string, ConversationArchivalState>();

  constructor(
    private readonly live: LiveMessageStore,
    private readonly archive: ArchiveMessageStore,
    options: ArchivalOptions = {}
  ) {
    this.threshold = options.threshold ?? config.archive.threshold;
    this.retryDelaysMs = options.retryDelaysMs ?? config.archive.retryDelaysMs;
    this.mutex = options.mutex ?? new KeyedMutex();
    this.sleep = options.sleep ?? sleep;

    if (!Number.isInteger(this.threshold) || this.threshold < 1) {
      throw new Error(`Archive threshold must be a positive integer, got ${this.threshold}`);
    }
  }

  getPhase(conversationId: string): ArchivalPhase {
    return this.states.get(conversationId)?.phase ?? 'STABLE';
  }

  getLastError(conversationId: string): string | undefined {
    return this.states.get(conversationId)?.lastError;
  }

  /**
   * True while a message is in the archive but its live copy is not yet
   * removed. Live mutations of such a message would be lost on eviction.
   * @param conversationId - Conversation whose pass wrote the archive
   * @param messageId - Message to look up
   */
  isAwaitingEviction(conversationId: string, messageId: string): boolean {
    return this.states.get(conversationId)?.pendingEviction?.includes(messageId) ?? false;
  }

  /**
   * Runs a live-window change for one conversation between archival passes.
   * The task must not call `enforce` for the same conversation.
   */
  async runExclusive<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(conversationId, task);
  }

  /**
   * Run after every append. Brings the live window back under the threshold.
   * @param conversationId - Conversation to check
   * @returns The pass outcome, including the ids moved to the archive
   */
  async enforce(conversationId: string): Promise<ArchivalResult> {
    return this.mutex.runExclusive(conversationId, () => this.runPass(conversationId));
  }

  private async runPass(conversationId: string): Promise<ArchivalResult> {
    const state = this.stateFor(conversationId);
    const archivedIds: string[] = [];

    // 1. A previous pass archived these but failed to remove them from live
    if (state.pendingEviction) {
      const pending = state.pendingEviction;
      console.log(`🔄 Finishing eviction of ${pending.length} archived messages in ${conversationId}`);
      await this.runStep(conversationId, 'live-delete', () => this.live.evict(conversationId, pending));
      state.pendingEviction = null;
      archivedIds.push(...pending);
    }

    // 2. Nothing to do while the window fits
    const messages = await this.live.snapshot(conversationId);
    if (messages.length <= this.threshold) {
      this.settle(state);
      return { conversationId, phase: 'STABLE', archivedIds, liveCount: messages.length };
    }

    state.phase = 'ARCHIVING';
    const overflow = messages.slice(0, messages.length - this.threshold);
    const overflowIds = overflow.map((m) => m.id);
    console.log(`📦 ${conversationId} has ${messages.length} live messages, archiving oldest ${overflow.length}`);

    // 3. Copy the overflow into the archive, then drop it from live
    await this.runStep(conversationId, 'archive-write', () => this.archive.archive(conversationId, overflow));
    state.pendingEviction = overflowIds;

    await this.runStep(conversationId, 'live-delete', () => this.live.evict(conversationId, overflowIds));
    state.pendingEviction = null;
    archivedIds.push(...overflowIds);

    this.settle(state);
    console.log(`✅ Archived ${overflowIds.length} messages from ${conversationId}`);
    return { conversationId, phase: 'STABLE', archivedIds, liveCount: messages.length - overflow.length };
  }

  /**
   * Retries one step with backoff. Non-retryable errors (integrity,
   * validation) are rethrown as they are and leave the conversation ARCHIVING.
   */
  private async runStep(conversationId: string, step: ArchivalStep, work: () => Promise<unknown>): Promise<void> {
    const state = this.stateFor(conversationId);
    for (let attempt = 0; ; attempt++) {
      try {
        await work();
        return;
      } catch (error) {
        state.lastError = errorMessage(error);
        if (!isRetryable(error)) {
          console.error(`❌ Archival ${step} for ${conversationId} failed permanently:`, error);
          throw error;
        }
        if (attempt >= this.retryDelaysMs.length) {
          console.error(`❌ Archival ${step} for ${conversationId} failed after ${attempt + 1} attempts:`, error);
          throw new ArchivalFailedError(conversationId, step, { cause: error });
        }
        const delay = this.retryDelaysMs[attempt];
        console.warn(`🔄 Archival ${step} for ${conversationId} failed, retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }
  }

  private stateFor(conversationId: string): ConversationArchivalState {
    let state = this.states.get(conversationId);
    if (!state) {
      state = { phase: 'STABLE', pendingEviction: null };
      this.states.set(conversationId, state);
    }
    return state;
  }

  private settle(state: ConversationArchivalState): void {
    state.phase = 'STABLE';
    delete state.lastError;
  }
}
