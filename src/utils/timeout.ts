import { LayerTimeoutError } from './errors';

/**
 * Run an abortable task under a time limit
 * The task's signal is aborted when the limit passes or the parent signal aborts.
 * A task that ignores its signal is abandoned rather than awaited.
 *
 * @param task - Work to run; should pass the signal to any I/O it starts
 * @param timeoutMs - Time limit in milliseconds
 * @param parent - Optional outer signal (e.g. the turn's)
 * @throws {LayerTimeoutError} When the limit passes first
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new LayerTimeoutError(0);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new LayerTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, Math.max(0, timeoutMs));
    controller.signal.addEventListener('abort', () => reject(new LayerTimeoutError(timeoutMs)), {
      once: true,
    });
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Resolve after `ms`, or reject as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true }
    );
  });
}
