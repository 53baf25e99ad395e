import { CancelledError, NetworkError } from '@/core/errors';

export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The abort reason is used when it is an Error, otherwise a CancelledError.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    // Still observe the promise when the signal is already aborted
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Run an abortable operation with a deadline. On timeout the operation's
 * signal is aborted and the call rejects with NetworkError; when the parent
 * signal aborts first it rejects with CancelledError.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new NetworkError(`Operation timed out after ${timeoutMs}ms`)),
    timeoutMs
  );
  const onParentAbort = () => controller.abort(new CancelledError());

  if (parent?.aborted) {
    clearTimeout(timer);
    throw new CancelledError();
  }
  parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await raceWithSignal(operation(controller.signal), controller.signal);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.name !== 'AbortError') {
    return reason;
  }
  return new CancelledError();
}
