/**
 * Deadlines for outbound calls: a controller that aborts after `timeoutMs`
 * or when the caller's signal aborts, whichever comes first.
 */

export interface Deadline {
  signal: AbortSignal;
  /** True once the timer (not the caller) fired */
  timedOut: () => boolean;
  clear: () => void;
}

export function withDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let fired = false;

  const timeout = setTimeout(() => {
    fired = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => fired,
    clear: () => {
      clearTimeout(timeout);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 * The underlying work is not cancelled here; pass the signal to it as well.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted'));
    // Subscribe to `promise` even when already aborted
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
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

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
