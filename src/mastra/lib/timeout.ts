import { CallTimeoutError } from './errors';

export type AbortableTask<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with CallTimeoutError when the timer wins and aborts the signal with it, which
 * cancels a pending HTTP request behind the task.
 */
export async function withTimeout<T>(
  task: AbortableTask<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CallTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
