/**
 * Race a task against a timer.
 *
 * The task is not cancelled when the timer wins; it receives an AbortSignal
 * it can honour. A timeout of 0 disables the timer.
 */

export type TimedOutcome<T> = { timedOut: false; value: T } | { timedOut: true };

export async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<TimedOutcome<T>> {
  const controller = new AbortController();

  if (timeoutMs <= 0) {
    return { timedOut: false, value: await task(controller.signal) };
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<TimedOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ timedOut: true });
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      task(controller.signal).then((value): TimedOutcome<T> => ({ timedOut: false, value })),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
