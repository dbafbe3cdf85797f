import { getLogger } from './logger.js';
import { sleep } from './timing.js';

const log = getLogger('notification', { component: 'retry' });

export interface RetryOptions {
  /** Maximum number of attempts (including the first call). Default: 3 */
  maxAttempts?: number;
  /** Initial delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Upper bound on delay in milliseconds. Default: 30000 */
  maxDelayMs?: number;
  /** Multiplier applied to the delay after each attempt. Default: 2 */
  backoffMultiplier?: number;
  /**
   * Decides whether a failure is worth another attempt. Errors it rejects
   * are thrown immediately. Default: every error is retried.
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry. Useful for logging or metrics. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

function computeDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Executes `fn` and retries on failure using exponential backoff.
 *
 * @example
 * ```ts
 * await retry(() => postWebhook(payload), {
 *   maxAttempts: 3,
 *   shouldRetry: (err) => !(err instanceof NotificationError && err.httpStatus === 401),
 * });
 * ```
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30_000,
    backoffMultiplier = 2,
    shouldRetry,
    onRetry,
  } = options;

  let lastError: Error = new Error('retry() called with maxAttempts < 1');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (shouldRetry && !shouldRetry(error)) {
        throw lastError;
      }

      if (attempt >= maxAttempts) {
        break;
      }

      const delayMs = computeDelay(attempt, baseDelayMs, maxDelayMs, backoffMultiplier);

      log.debug(
        { attempt, maxAttempts, delayMs, error: lastError.message },
        `Retry attempt ${attempt}/${maxAttempts} after ${delayMs}ms`,
      );

      onRetry?.(lastError, attempt, delayMs);

      await sleep(delayMs);
    }
  }

  throw lastError;
}
