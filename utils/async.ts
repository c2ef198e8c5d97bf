import { CancelledError } from './errors';

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * setTimeout as a promise. Rejects with CancelledError when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `task` with its own AbortSignal, bounded by `timeoutMs`.
 *
 * The task's signal aborts when the timeout fires or when `parentSignal`
 * aborts. A timeout rejects with `onTimeout()`; a parent abort rejects with
 * CancelledError. Either way the caller is released even if the task ignores
 * its signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parentSignal?: AbortSignal
): Promise<T> {
  throwIfAborted(parentSignal);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    // Settle before aborting so the task's own abort rejection loses the race
    timer = setTimeout(() => {
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
    onParentAbort = () => {
      reject(new CancelledError());
      controller.abort();
    };
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      parentSignal?.removeEventListener('abort', onParentAbort);
    }
  }
}
