import type { CouponCandidate } from '../coupons/types.js';
import type { CouponSource } from '../shared/constants.js';
import type { HttpClient } from '../shared/http-client.js';

/**
 * A pluggable source of offers. `collect` may reject; the runner treats
 * a rejection as "this source contributed nothing" for the batch.
 */
export interface SourceCollector {
  readonly name: string;
  readonly source: CouponSource;
  collect(http: HttpClient): Promise<CouponCandidate[]>;
}

export interface CollectorOptions {
  /** Origin the collector's paths are resolved against. */
  baseUrl?: string;
  /** Clock used for `observedAt` and derived expiries. */
  now?: () => Date;
}
