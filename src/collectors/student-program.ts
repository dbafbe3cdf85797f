/**
 * Collectors for vendors whose student programme has no code to scrape:
 * the offer exists as long as the programme page answers 2xx.
 */

import type { CouponCandidate } from '../coupons/types.js';
import { COUPON_SOURCES } from '../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { BaseCollector } from './base-collector.js';
import { fetchPage, resolveUrl } from './fetch-page.js';
import type { CollectorOptions } from './types.js';

const log = getLogger('collector', { component: 'student-program' });

const PROGRAM_VALIDITY_DAYS = 365;

abstract class StudentProgramCollector extends BaseCollector {
  protected abstract readonly path: string;
  protected abstract readonly offer: {
    name: string;
    description: string;
    code: string;
  };

  async collect(http: HttpClient): Promise<CouponCandidate[]> {
    log.info({ source: this.source }, 'Scraping student programme page');

    const page = await fetchPage(http, resolveUrl(this.baseUrl, this.path), this.source);
    if (!isSuccessStatus(page.statusCode)) {
      log.warn(
        { source: this.source, url: page.url, statusCode: page.statusCode },
        'Failed to fetch student programme page',
      );
      return [];
    }

    return [
      this.candidate({
        ...this.offer,
        discountPercentage: 100,
        url: page.url,
        expiry: this.expiresInDays(PROGRAM_VALIDITY_DAYS),
      }),
    ];
  }
}

export class WarpCollector extends StudentProgramCollector {
  readonly name = 'Warp';
  readonly source = COUPON_SOURCES.WARP;
  protected readonly path = '/students';
  protected readonly offer = {
    name: 'Warp Terminal Student Plan',
    description: 'Free Warp Premium subscription for verified students',
    code: 'AUTO-APPLIED',
  };

  constructor(options: CollectorOptions = {}) {
    super('https://www.warp.dev', options);
  }
}

export class TabnineCollector extends StudentProgramCollector {
  readonly name = 'Tabnine';
  readonly source = COUPON_SOURCES.TABNINE;
  protected readonly path = '/students';
  protected readonly offer = {
    name: 'Tabnine Pro Student Plan',
    description: 'Free Tabnine Pro for verified students',
    code: 'STUDENT',
  };

  constructor(options: CollectorOptions = {}) {
    super('https://www.tabnine.com', options);
  }
}
