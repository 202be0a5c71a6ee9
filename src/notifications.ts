import { EventEmitter } from 'events';
import { MessageCommittedEvent } from './types/Message';
import { Unsubscribe } from './types/repositories';

const MESSAGE_COMMITTED = 'message.committed';

/**
 * In-process hook for whatever delivers push notifications.
 * A throwing listener is logged and never affects the send.
 */
export class MessageEvents {
  private readonly emitter = new EventEmitter();

  onMessageCommitted(listener: (event: MessageCommittedEvent) => void): Unsubscribe {
    const wrapped = (event: MessageCommittedEvent): void => {
      try {
        listener(event);
      } catch (error) {
        console.error(`❌ message.committed listener failed for ${event.messageId}:`, error);
      }
    };
    this.emitter.on(MESSAGE_COMMITTED, wrapped);
    return () => {
      this.emitter.off(MESSAGE_COMMITTED, wrapped);
    };
  }

  emitMessageCommitted(event: MessageCommittedEvent): void {
    this.emitter.emit(MESSAGE_COMMITTED, event);
  }
}
