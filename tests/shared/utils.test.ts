import { describe, expect, it } from 'vitest';
import { retry } from '../../src/shared/retry.js';
import { addDays, daysUntil, mapWithConcurrency, toAnchor, truncate } from '../../src/shared/utils.js';
import { NOW } from '../helpers/fixtures.js';

describe('utils', () => {
  it('truncates with an ellipsis only when needed', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('abcdefghij', 5)).toBe('abcd…');
  });

  it('turns a title into an anchor', () => {
    expect(toAnchor('  Copilot AI   Pro ')).toBe('copilot-ai-pro');
  });

  it('counts whole days toward zero', () => {
    expect(daysUntil(addDays(NOW, 30), NOW)).toBe(30);
    expect(daysUntil(new Date(NOW.getTime() + 36 * 3_600_000), NOW)).toBe(1);
    expect(daysUntil(new Date(NOW.getTime() - 36 * 3_600_000), NOW)).toBe(-1);
  });

  it('keeps result order and the concurrency bound', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 0], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight -= 1;
      return index;
    });

    expect(results).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
  });
});

describe('retry', () => {
  it('returns the first successful attempt', async () => {
    let calls = 0;
    const result = await retry(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw new Error(`attempt ${calls}`);
        }
        return 'done';
      },
      { baseDelayMs: 1 },
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
  });

  it('rethrows the last error after the final attempt', async () => {
    let calls = 0;
    const attempt = retry(
      async () => {
        calls += 1;
        throw new Error(`attempt ${calls}`);
      },
      { maxAttempts: 2, baseDelayMs: 1 },
    );

    await expect(attempt).rejects.toThrow('attempt 2');
  });

  it('stops at an error the predicate refuses', async () => {
    let calls = 0;
    const attempt = retry(
      async () => {
        calls += 1;
        throw new Error('fatal');
      },
      { baseDelayMs: 1, shouldRetry: () => false },
    );

    await expect(attempt).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });
});
