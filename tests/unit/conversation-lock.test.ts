import { ConversationLock } from '../../src/engine/conversation-lock';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConversationLock', () => {
  it('should run tasks of one conversation one at a time, in order', async () => {
    const lock = new ConversationLock();
    const order: string[] = [];
    const gate = deferred<void>();

    const first = lock.run('conv-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('conv-1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should let different conversations run in parallel', async () => {
    const lock = new ConversationLock();
    const gate = deferred<void>();
    const started: string[] = [];

    const a = lock.run('conv-a', async () => {
      started.push('a');
      await gate.promise;
    });
    const b = lock.run('conv-b', async () => {
      started.push('b');
    });

    await b;
    expect(started).toEqual(['a', 'b']);
    gate.resolve();
    await a;
  });

  it('should keep the queue moving after a failed task', async () => {
    const lock = new ConversationLock();

    const failed = lock.run('conv-1', async () => {
      throw new Error('boom');
    });
    const next = lock.run('conv-1', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
