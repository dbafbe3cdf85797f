/**
 * Type definitions for the pipeline module.
 */

import type { ValidatableCoupon, ValidationOutcome } from '../coupons/types.js';

/** Where a single candidate ended up in one batch. */
export type CandidateOutcome =
  | 'deduped'
  | 'failed'
  | 'invalid'
  | 'expired'
  | 'posted'
  | 'valid_unposted';

export interface BatchSummary {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  /** Candidates returned by all collectors together. */
  collected: number;
  collectorsFailed: number;
  /** Valid-unposted records from earlier batches, re-notified at batch start. */
  retried: {
    posted: number;
    failed: number;
  };
  outcomes: Record<CandidateOutcome, number>;
  /** True when the abort signal stopped the batch early. */
  aborted: boolean;
}

/** The slice of the dispatcher the runner depends on. */
export interface CouponValidator {
  validate(coupon: ValidatableCoupon): Promise<ValidationOutcome>;
}

export interface BatchRunner {
  runBatch(signal?: AbortSignal, runId?: string): Promise<BatchSummary>;
}
