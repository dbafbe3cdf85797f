import { createCandidate } from '../coupons/candidate.js';
import type { CandidateInput, CouponCandidate } from '../coupons/types.js';
import type { CouponSource } from '../shared/constants.js';
import type { HttpClient } from '../shared/http-client.js';
import { addDays } from '../shared/utils.js';
import type { CollectorOptions, SourceCollector } from './types.js';

/**
 * Shared plumbing for the built-in collectors: origin resolution, the
 * clock, and candidate construction with the collector's source label.
 */
export abstract class BaseCollector implements SourceCollector {
  abstract readonly name: string;
  abstract readonly source: CouponSource;

  protected readonly baseUrl: string;
  private readonly clock: () => Date;

  constructor(defaultBaseUrl: string, options: CollectorOptions = {}) {
    this.baseUrl = options.baseUrl ?? defaultBaseUrl;
    this.clock = options.now ?? (() => new Date());
  }

  abstract collect(http: HttpClient): Promise<CouponCandidate[]>;

  protected now(): Date {
    return this.clock();
  }

  protected expiresInDays(days: number): Date {
    return addDays(this.now(), days);
  }

  protected candidate(input: Omit<CandidateInput, 'source'>): CouponCandidate {
    return createCandidate({ ...input, source: this.source }, this.now());
  }
}
