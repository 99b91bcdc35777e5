import { EngineError, ExternalTimeoutError, TurnCancelledError } from './errors';

/**
 * Run `op` with a time budget and an optional parent cancellation signal.
 *
 * `op` receives a signal that aborts on timeout or when the parent aborts, so
 * SDK calls that accept a signal stop their network work as well. The race
 * rejects with ExternalTimeoutError / TurnCancelledError without waiting for
 * `op` to notice, and the abort error `op` raises in response never replaces it.
 */
export async function withTimeout<T>(
  dependency: string,
  timeoutMs: number,
  op: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw new TurnCancelledError(dependency, parent.reason);
  }

  const controller = new AbortController();
  const start = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    // Reject before aborting: the guard must settle ahead of `op`'s own AbortError.
    timer = setTimeout(() => {
      const err = new ExternalTimeoutError(dependency, Date.now() - start);
      reject(err);
      controller.abort(err);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const err = new TurnCancelledError(dependency, parent.reason);
        reject(err);
        controller.abort(err);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  const work = op(controller.signal);
  // If the guard wins, a late rejection from `work` has nobody left to hear it.
  work.catch(() => undefined);

  try {
    return await Promise.race([work, guard]);
  } catch (err) {
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && reason instanceof EngineError) throw reason;
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
  }
}

/** Throw TurnCancelledError if the signal has fired. */
export function ensureNotAborted(signal: AbortSignal | undefined, phase: string): void {
  if (signal?.aborted) {
    throw new TurnCancelledError(phase, signal.reason);
  }
}

/**
 * Call `fn` and, if it throws something `shouldRetry` accepts, call it once more.
 * The second failure propagates.
 */
export async function retryOnce<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (err: unknown) => boolean,
  onRetry?: (err: unknown) => void,
): Promise<T> {
  try {
    return await fn(1);
  } catch (err) {
    if (!shouldRetry(err)) throw err;
    onRetry?.(err);
    return fn(2);
  }
}
