/**
 * Pipeline runner.
 *
 * One batch:
 *   1. re-notify valid, unposted records left by earlier batches
 *   2. run every collector (bounded concurrency); a failed collector
 *      contributes nothing
 *   3. walk the candidates in collector order, one at a time:
 *      dedup -> insert -> validate -> notify -> mark posted
 *
 * Errors are scoped to the candidate or collector that raised them. The
 * abort signal is checked between candidates, never mid-candidate.
 */

import { ulid } from 'ulid';
import type { Logger } from 'pino';
import { isExpired } from '../coupons/candidate.js';
import { CouponDeduplicator } from '../coupons/dedup-gate.js';
import type { CouponCandidate, CouponRecord, CouponStore, ValidationOutcome } from '../coupons/types.js';
import type { SourceCollector } from '../collectors/types.js';
import type { Notifier } from '../notification/types.js';
import { DEFAULT_LIMITS } from '../shared/constants.js';
import { StoreError, errorMessage } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import type { HttpClient } from '../shared/http-client.js';
import { getRunLogger } from '../shared/logger.js';
import { mapWithConcurrency } from '../shared/utils.js';
import type { BatchRunner, BatchSummary, CandidateOutcome, CouponValidator } from './types.js';

export interface PipelineRunnerDeps {
  store: CouponStore;
  collectors: readonly SourceCollector[];
  validator: CouponValidator;
  notifier: Notifier;
  /** Client handed to collectors. */
  http: HttpClient;
  validationEnabled?: boolean;
  maxConcurrentCollectors?: number;
  events?: TypedEventEmitter;
  now?: () => Date;
}

function emptyOutcomes(): Record<CandidateOutcome, number> {
  return { deduped: 0, failed: 0, invalid: 0, expired: 0, posted: 0, valid_unposted: 0 };
}

export class PipelineRunner implements BatchRunner {
  private readonly store: CouponStore;
  private readonly collectors: readonly SourceCollector[];
  private readonly validator: CouponValidator;
  private readonly notifier: Notifier;
  private readonly http: HttpClient;
  private readonly deduplicator: CouponDeduplicator;
  private readonly validationEnabled: boolean;
  private readonly maxConcurrentCollectors: number;
  private readonly events: TypedEventEmitter;
  private readonly now: () => Date;

  constructor(deps: PipelineRunnerDeps) {
    this.store = deps.store;
    this.collectors = deps.collectors;
    this.validator = deps.validator;
    this.notifier = deps.notifier;
    this.http = deps.http;
    this.deduplicator = new CouponDeduplicator(deps.store);
    this.validationEnabled = deps.validationEnabled ?? true;
    this.maxConcurrentCollectors = deps.maxConcurrentCollectors ?? DEFAULT_LIMITS.MAX_CONCURRENT_COLLECTORS;
    this.events = deps.events ?? eventBus;
    this.now = deps.now ?? (() => new Date());
  }

  async runBatch(signal?: AbortSignal, runId: string = ulid()): Promise<BatchSummary> {
    const log = getRunLogger('pipeline', runId);
    const startedAt = this.now();
    const outcomes = emptyOutcomes();

    log.info({ collectors: this.collectors.length }, 'Batch started');
    this.events.emit('batch:started', { runId, collectors: this.collectors.length });

    const retried = await this.retryUnposted(log, signal);

    let collectorsFailed = 0;
    const results = await mapWithConcurrency(
      this.collectors,
      this.maxConcurrentCollectors,
      async (collector) => {
        try {
          const found = await collector.collect(this.http);
          log.debug({ collector: collector.name, count: found.length }, 'Collector finished');
          return found;
        } catch (error) {
          collectorsFailed += 1;
          log.error({ collector: collector.name, err: error }, 'Collector failed');
          this.events.emit('collector:failed', {
            runId,
            collector: collector.name,
            error: errorMessage(error),
          });
          return [];
        }
      },
    );
    const candidates = results.flat();

    let aborted = signal?.aborted ?? false;
    for (const candidate of candidates) {
      if (signal?.aborted) {
        aborted = true;
        log.warn('Batch aborted between candidates');
        break;
      }
      const outcome = await this.processCandidate(candidate, log);
      outcomes[outcome] += 1;
    }

    const finishedAt = this.now();
    const summary: BatchSummary = {
      runId,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      collected: candidates.length,
      collectorsFailed,
      retried,
      outcomes,
      aborted,
    };

    log.info(
      { collected: summary.collected, collectorsFailed, retried, outcomes, durationMs: summary.durationMs, aborted },
      'Batch completed',
    );
    this.events.emit('batch:completed', {
      runId,
      collected: summary.collected,
      posted: outcomes.posted + retried.posted,
      durationMs: summary.durationMs,
      aborted,
    });

    return summary;
  }

  // -------------------------------------------------------------------------
  // Retry sweep
  // -------------------------------------------------------------------------

  private async retryUnposted(
    log: Logger,
    signal?: AbortSignal,
  ): Promise<BatchSummary['retried']> {
    const retried = { posted: 0, failed: 0 };

    let pending: CouponRecord[];
    try {
      pending = await this.store.listValidUnposted(this.now());
    } catch (error) {
      log.error({ err: error }, 'Could not list unposted coupons; skipping retry sweep');
      return retried;
    }

    if (pending.length > 0) {
      log.info({ count: pending.length }, 'Retrying unposted coupons');
    }

    for (const record of pending) {
      if (signal?.aborted) {
        break;
      }
      if (await this.deliver(record, log)) {
        retried.posted += 1;
      } else {
        retried.failed += 1;
      }
    }

    return retried;
  }

  // -------------------------------------------------------------------------
  // Per-candidate state machine
  // -------------------------------------------------------------------------

  private async processCandidate(candidate: CouponCandidate, log: Logger): Promise<CandidateOutcome> {
    const ctx = { fingerprint: candidate.fingerprint, source: candidate.source, name: candidate.name };

    try {
      if (await this.deduplicator.isDuplicate(candidate)) {
        return 'deduped';
      }
    } catch (error) {
      log.error({ ...ctx, err: error }, 'Dedup lookup failed');
      return 'failed';
    }

    let id: number;
    try {
      id = await this.store.insert(candidate);
    } catch (error) {
      if (error instanceof StoreError && error.code === 'DUPLICATE_FINGERPRINT') {
        log.debug(ctx, 'Fingerprint inserted concurrently; treating as duplicate');
        return 'deduped';
      }
      log.error({ ...ctx, err: error }, 'Insert failed');
      return 'failed';
    }
    this.events.emit('coupon:persisted', { id, fingerprint: candidate.fingerprint, source: candidate.source });

    let verdict: ValidationOutcome;
    try {
      verdict = this.validationEnabled
        ? await this.validator.validate(candidate)
        : { isValid: true, message: 'validation disabled', validatedAt: this.now() };
    } catch (error) {
      log.warn({ ...ctx, id, err: error }, 'Validation failed; record left pending');
      return 'failed';
    }

    try {
      await this.store.updateValidation(id, verdict.isValid, verdict.validatedAt);
    } catch (error) {
      log.error({ ...ctx, id, err: error }, 'Could not record validation outcome');
      return 'failed';
    }
    this.events.emit('coupon:validated', { id, isValid: verdict.isValid, message: verdict.message });

    if (!verdict.isValid) {
      log.info({ ...ctx, id, reason: verdict.message }, 'Coupon invalid');
      return 'invalid';
    }

    if (isExpired(candidate.expiry, this.now())) {
      log.info({ ...ctx, id }, 'Coupon valid but expired; not announcing');
      return 'expired';
    }

    const record: CouponRecord = {
      id,
      fingerprint: candidate.fingerprint,
      name: candidate.name,
      description: candidate.description,
      discountPercentage: candidate.discountPercentage,
      code: candidate.code,
      url: candidate.url,
      source: candidate.source,
      expiry: candidate.expiry,
      createdAt: candidate.observedAt,
      validatedAt: verdict.validatedAt,
      isValid: true,
      isPosted: false,
    };

    return (await this.deliver(record, log)) ? 'posted' : 'valid_unposted';
  }

  /**
   * notify -> markPosted. Not transactional: a crash between the two
   * steps re-announces the record on a later batch.
   */
  private async deliver(record: CouponRecord, log: Logger): Promise<boolean> {
    try {
      await this.notifier.notify(record);
    } catch (error) {
      log.warn({ id: record.id, name: record.name, err: error }, 'Notification failed; will retry next batch');
      this.events.emit('coupon:notify-failed', { id: record.id, error: errorMessage(error) });
      return false;
    }

    try {
      await this.store.markPosted(record.id);
    } catch (error) {
      log.error({ id: record.id, err: error }, 'Announced but could not mark posted');
      return false;
    }

    this.events.emit('coupon:posted', { id: record.id, fingerprint: record.fingerprint });
    return true;
  }
}
