import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CouponScheduler } from '../../src/pipeline/scheduler.js';
import type { BatchRunner, BatchSummary } from '../../src/pipeline/types.js';
import { NOW } from '../helpers/fixtures.js';

const MINUTE = 60_000;

function summary(runId: string): BatchSummary {
  return {
    runId,
    startedAt: new Date(),
    finishedAt: new Date(),
    durationMs: 0,
    collected: 0,
    collectorsFailed: 0,
    retried: { posted: 0, failed: 0 },
    outcomes: { deduped: 0, failed: 0, invalid: 0, expired: 0, posted: 0, valid_unposted: 0 },
    aborted: false,
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('CouponScheduler', () => {
  let runBatch: ReturnType<typeof vi.fn<BatchRunner['runBatch']>>;
  let cleanup: ReturnType<typeof vi.fn<() => Promise<number>>>;
  let scheduler: CouponScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    runBatch = vi.fn<BatchRunner['runBatch']>(async (_signal, runId = 'scheduled') => summary(runId));
    cleanup = vi.fn<() => Promise<number>>(async () => 0);
    scheduler = new CouponScheduler({ runBatch }, cleanup, { intervalMinutes: 1, cleanupIntervalMs: 3 * MINUTE });
  });

  afterEach(async () => {
    await scheduler.stop();
    vi.useRealTimers();
  });

  it('runs a batch immediately and then once per interval', async () => {
    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(runBatch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(MINUTE - 1);
    expect(runBatch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(runBatch).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(2 * MINUTE);
    expect(runBatch).toHaveBeenCalledTimes(4);
  });

  it('raises an interval below one minute to one minute', async () => {
    scheduler = new CouponScheduler({ runBatch }, cleanup, { intervalMinutes: 0 });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(MINUTE);

    expect(runBatch).toHaveBeenCalledTimes(2);
  });

  it('ignores a second start', async () => {
    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(runBatch).toHaveBeenCalledTimes(1);
  });

  it('sweeps expired records once the cleanup interval has passed', async () => {
    scheduler.start();

    await vi.advanceTimersByTimeAsync(2 * MINUTE);
    expect(cleanup).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().lastCleanupAt).toEqual(new Date(NOW.getTime() + 3 * MINUTE));

    await vi.advanceTimersByTimeAsync(2 * MINUTE);
    expect(cleanup).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(cleanup).toHaveBeenCalledTimes(2);
  });

  it('retries a failed cleanup on the next tick', async () => {
    cleanup.mockRejectedValueOnce(new Error('database is locked'));
    scheduler.start();

    await vi.advanceTimersByTimeAsync(3 * MINUTE);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().lastCleanupAt).toEqual(NOW);

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(cleanup).toHaveBeenCalledTimes(2);
    expect(scheduler.getStatus().lastCleanupAt).toEqual(new Date(NOW.getTime() + 4 * MINUTE));
  });

  it('keeps running after a batch throws', async () => {
    runBatch.mockRejectedValueOnce(new Error('disk full'));
    scheduler.start();

    await vi.advanceTimersByTimeAsync(MINUTE);

    expect(runBatch).toHaveBeenCalledTimes(2);
    expect(scheduler.getStatus().lastSummary?.runId).toBe('scheduled');
  });

  it('stops sleeping and scheduling once stopped', async () => {
    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(10 * MINUTE);

    expect(runBatch).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().running).toBe(false);
  });

  it('hands the abort signal to the running batch', async () => {
    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    const signal = runBatch.mock.calls[0]?.[0];

    await scheduler.stop();

    expect(signal?.aborted).toBe(true);
  });

  it('queues an ad-hoc run behind the batch in progress', async () => {
    const gate = deferred();
    runBatch.mockImplementationOnce(async (_signal, runId = 'scheduled') => {
      await gate.promise;
      return summary(runId);
    });
    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    const adHoc = scheduler.triggerNow('manual-1');
    await vi.advanceTimersByTimeAsync(0);

    expect(runBatch).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().batchInProgress).toBe(true);

    gate.resolve();
    const result = await adHoc;

    expect(result.runId).toBe('manual-1');
    expect(runBatch).toHaveBeenCalledTimes(2);
    expect(runBatch.mock.calls[1]?.[1]).toBe('manual-1');
  });

  it('reports the last run in its status', async () => {
    expect(scheduler.getStatus()).toEqual({
      running: false,
      batchInProgress: false,
      lastRunAt: null,
      lastCleanupAt: null,
      lastSummary: null,
    });

    await scheduler.triggerNow('manual-2');

    const status = scheduler.getStatus();
    expect(status.lastSummary?.runId).toBe('manual-2');
    expect(status.lastRunAt).toEqual(NOW);
    expect(status.batchInProgress).toBe(false);
  });

  it('returns the id of an enqueued run straight away', async () => {
    const runId = scheduler.enqueueRun();

    expect(runId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    await vi.advanceTimersByTimeAsync(0);
    expect(runBatch).toHaveBeenCalledWith(expect.any(AbortSignal), runId);
  });
});
