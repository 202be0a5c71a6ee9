import { MessageEvents } from '../notifications';
import { MessageCommittedEvent } from '../types/Message';

const event: MessageCommittedEvent = {
  conversationId: 'conv-1',
  messageId: 'msg-001',
  senderId: 'alice',
  senderName: 'Alice',
  text: 'hello',
  isGroupChat: false,
};

describe('MessageEvents', () => {
  it('should keep delivering to other listeners when one throws', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const events = new MessageEvents();
    const received = jest.fn();
    events.onMessageCommitted(() => {
      throw new Error('push service down');
    });
    events.onMessageCommitted(received);

    events.emitMessageCommitted(event);

    expect(received).toHaveBeenCalledWith(event);
    expect(error).toHaveBeenCalledWith('❌ message.committed listener failed for msg-001:', expect.any(Error));
    error.mockRestore();
  });

  it('should stop calling a listener after unsubscribe', () => {
    const events = new MessageEvents();
    const received = jest.fn();
    const unsubscribe = events.onMessageCommitted(received);

    unsubscribe();
    events.emitMessageCommitted(event);

    expect(received).not.toHaveBeenCalled();
  });
});
