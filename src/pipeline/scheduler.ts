/**
 * Batch scheduler.
 *
 * One loop, one timer: run a batch immediately, then sleep the scrape
 * interval, run again, and sweep expired records once a day. Every batch
 * and sweep, scheduled or ad-hoc, goes through the same exclusive section
 * so two of them never touch the store at once.
 */

import { ulid } from 'ulid';
import { DEFAULT_LIMITS } from '../shared/constants.js';
import { getLogger } from '../shared/logger.js';
import { MINUTE_MS, sleepUnlessAborted } from '../shared/timing.js';
import type { BatchRunner, BatchSummary } from './types.js';

const log = getLogger('scheduler');

export interface SchedulerOptions {
  /** Minutes between batches; values below 1 are raised to 1. */
  intervalMinutes: number;
  /** Minimum gap between cleanup sweeps. Default: 24 hours */
  cleanupIntervalMs?: number;
}

export interface SchedulerStatus {
  running: boolean;
  batchInProgress: boolean;
  lastRunAt: Date | null;
  lastCleanupAt: Date | null;
  lastSummary: BatchSummary | null;
}

export class CouponScheduler {
  private readonly intervalMs: number;
  private readonly cleanupIntervalMs: number;

  private controller = new AbortController();
  private loop: Promise<void> | null = null;
  private tail: Promise<unknown> = Promise.resolve();
  private activeTasks = 0;

  private lastRunAt: Date | null = null;
  private lastCleanupAt: Date | null = null;
  private lastSummary: BatchSummary | null = null;

  constructor(
    private readonly runner: BatchRunner,
    private readonly cleanup: () => Promise<number>,
    options: SchedulerOptions,
  ) {
    this.intervalMs = Math.max(1, options.intervalMinutes) * MINUTE_MS;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_LIMITS.CLEANUP_INTERVAL_MS;
  }

  start(): void {
    if (this.loop) {
      log.warn('Scheduler already running');
      return;
    }

    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
    this.lastCleanupAt = new Date();
    this.loop = this.runLoop(this.controller.signal);

    log.info(
      { intervalMs: this.intervalMs, cleanupIntervalMs: this.cleanupIntervalMs },
      'Scheduler started',
    );
  }

  /**
   * Aborts the sleep and the in-flight batch (at its next candidate
   * boundary), then waits for the loop and any queued ad-hoc runs.
   */
  async stop(): Promise<void> {
    this.controller.abort();

    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    await this.tail;

    log.info('Scheduler stopped');
  }

  /**
   * Runs one batch through the exclusive section, after anything queued.
   * Rejects if the batch itself throws.
   */
  async triggerNow(runId: string = ulid()): Promise<BatchSummary> {
    log.info({ runId }, 'Ad-hoc batch requested');
    return this.exclusive(async () => {
      const summary = await this.runner.runBatch(this.controller.signal, runId);
      this.record(summary);
      return summary;
    });
  }

  /**
   * Queues an ad-hoc batch without waiting for it. Returns its run id.
   */
  enqueueRun(): string {
    const runId = ulid();
    this.triggerNow(runId).catch((err: unknown) => {
      log.error({ err, runId }, 'Ad-hoc batch failed');
    });
    return runId;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.loop !== null,
      batchInProgress: this.activeTasks > 0,
      lastRunAt: this.lastRunAt,
      lastCleanupAt: this.lastCleanupAt,
      lastSummary: this.lastSummary,
    };
  }

  // -------------------------------------------------------------------------
  // Internal logic
  // -------------------------------------------------------------------------

  private async runLoop(signal: AbortSignal): Promise<void> {
    await this.runScheduledBatch(signal);

    while (!signal.aborted) {
      const elapsed = await sleepUnlessAborted(this.intervalMs, signal);
      if (!elapsed) {
        break;
      }

      await this.runScheduledBatch(signal);

      if (signal.aborted) {
        break;
      }
      if (this.isCleanupDue()) {
        await this.runCleanup();
      }
    }
  }

  private async runScheduledBatch(signal: AbortSignal): Promise<void> {
    try {
      await this.exclusive(async () => {
        const summary = await this.runner.runBatch(signal);
        this.record(summary);
      });
    } catch (err) {
      log.error({ err }, 'Scheduled batch failed');
    }
  }

  private isCleanupDue(): boolean {
    const last = this.lastCleanupAt?.getTime() ?? 0;
    return Date.now() - last >= this.cleanupIntervalMs;
  }

  private async runCleanup(): Promise<void> {
    try {
      await this.exclusive(() => this.cleanup());
      // Only a successful sweep resets the clock; a failure retries next tick.
      this.lastCleanupAt = new Date();
    } catch (err) {
      log.error({ err }, 'Cleanup sweep failed; retrying next tick');
    }
  }

  private record(summary: BatchSummary): void {
    this.lastRunAt = summary.startedAt;
    this.lastSummary = summary;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this.activeTasks += 1;
      try {
        return await task();
      } finally {
        this.activeTasks -= 1;
      }
    };
    const result = this.tail.then(run, run);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
