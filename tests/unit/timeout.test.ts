import { ExternalTimeoutError, TurnCancelledError } from '../../src/engine/errors';
import { ensureNotAborted, retryOnce, withTimeout } from '../../src/engine/timeout';

function hangUntilAborted(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => signal.addEventListener('abort', () => reject(new Error('aborted'))));
}

describe('withTimeout', () => {
  it('should resolve with the result of a fast call', async () => {
    await expect(withTimeout('test', 100, async () => 'done')).resolves.toBe('done');
  });

  it('should reject with ExternalTimeoutError and abort the call when the budget runs out', async () => {
    let seen: AbortSignal | undefined;
    const result = withTimeout('retrieval', 20, (signal) => {
      seen = signal;
      return hangUntilAborted(signal);
    });

    await expect(result).rejects.toBeInstanceOf(ExternalTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('should reject with TurnCancelledError when the parent aborts', async () => {
    const parent = new AbortController();
    const result = withTimeout('generation', 1000, hangUntilAborted, parent.signal);
    parent.abort();

    await expect(result).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('should not start the call when the parent has already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const op = jest.fn(async () => 'never');

    await expect(withTimeout('generation', 1000, op, parent.signal)).rejects.toBeInstanceOf(TurnCancelledError);
    expect(op).not.toHaveBeenCalled();
  });
});

describe('ensureNotAborted', () => {
  it('should throw only once the signal has fired', () => {
    const controller = new AbortController();
    expect(() => ensureNotAborted(controller.signal, 'commit')).not.toThrow();
    expect(() => ensureNotAborted(undefined, 'commit')).not.toThrow();

    controller.abort();
    expect(() => ensureNotAborted(controller.signal, 'commit')).toThrow(TurnCancelledError);
  });
});

describe('retryOnce', () => {
  it('should retry a retryable failure once', async () => {
    const fn = jest.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');
    const onRetry = jest.fn();

    await expect(retryOnce(fn, () => true, onRetry)).resolves.toBe('ok');
    expect(fn).toHaveBeenNthCalledWith(2, 2);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('should propagate the second failure', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('down'));

    await expect(retryOnce(fn, () => true)).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should not retry failures the predicate rejects', async () => {
    const fn = jest.fn().mockRejectedValue(new TurnCancelledError('retrieve'));

    await expect(retryOnce(fn, (err) => !(err instanceof TurnCancelledError))).rejects.toBeInstanceOf(
      TurnCancelledError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
