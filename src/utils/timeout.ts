// Timeout boundary for collaborator calls (agent turns, tool handlers)

import { AppError } from './errors.js';

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with an `AppError` (code `timeout`) when the deadline passes first;
 * the timer is always cleared once the task settles.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so a task that settles on abort cannot win the race
      reject(AppError.timeout(`${label} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
