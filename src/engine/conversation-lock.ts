/**
 * Per-conversation serialization.
 *
 * Turns of the same conversation queue behind each other; different
 * conversations run in parallel. Only the tail of each queue is kept, and it
 * is removed once the queue drains.
 */
export class ConversationLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(conversationId) ?? Promise.resolve();

    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(conversationId, tail);

    void tail.then(() => {
      if (this.tails.get(conversationId) === tail) this.tails.delete(conversationId);
    });

    return result;
  }
}
