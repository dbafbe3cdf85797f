import { DAY_MS } from './timing.js';

/**
 * General-purpose helpers shared across modules.
 * All functions are pure (no side effects, no I/O) unless noted.
 */

/**
 * Truncates text to `maxLen` characters, appending an ellipsis if shortened.
 */
export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) {
    return text;
  }
  return text.slice(0, maxLen - 1) + '…'; // unicode ellipsis
}

/**
 * Converts a title into the anchor fragment used for per-offer URLs.
 * Example: "Copilot AI Pro" -> "copilot-ai-pro"
 */
export function toAnchor(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, '-');
}

/**
 * Whole days from `now` until `target`, truncated toward zero.
 */
export function daysUntil(target: Date, now: Date = new Date()): number {
  return Math.trunc((target.getTime() - now.getTime()) / DAY_MS);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Maps `items` through `fn` with at most `limit` calls in flight.
 * Results keep the order of `items`, whatever order the calls settle in.
 * Performs I/O only through `fn`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(limit, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    for (let index = next++; index < items.length; index = next++) {
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      results[index] = await fn(item, index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
