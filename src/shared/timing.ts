/**
 * Returns a promise that resolves after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Sleeps for `ms` milliseconds unless `signal` aborts first.
 * Resolves `true` when the full delay elapsed, `false` when it was cut short.
 */
export function sleepUnlessAborted(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export const MINUTE_MS = 60_000;
export const DAY_MS = 86_400_000;
