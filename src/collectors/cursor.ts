/**
 * Cursor AI: the student programme page and any promotion codes
 * advertised on the pricing page.
 */

import * as cheerio from 'cheerio';
import type { CouponCandidate } from '../coupons/types.js';
import { COUPON_SOURCES } from '../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { BaseCollector } from './base-collector.js';
import { fetchPage, resolveUrl } from './fetch-page.js';
import type { CollectorOptions } from './types.js';

const log = getLogger('collector', { component: 'cursor' });

const SELECTORS = {
  studentDiscount: 'div.student-discount',
  promotionCode: 'div.promotion-code',
} as const;

const DEFAULT_PROMO_CODE = 'PROMO';
const DEFAULT_PROMO_DISCOUNT = '10';

export class CursorCollector extends BaseCollector {
  readonly name = 'Cursor AI';
  readonly source = COUPON_SOURCES.CURSOR;

  constructor(options: CollectorOptions = {}) {
    super('https://cursor.sh', options);
  }

  async collect(http: HttpClient): Promise<CouponCandidate[]> {
    log.info('Scraping coupons from Cursor AI');
    const candidates: CouponCandidate[] = [];

    const studentPage = await fetchPage(http, resolveUrl(this.baseUrl, '/student'), this.source);
    if (!isSuccessStatus(studentPage.statusCode)) {
      log.warn({ url: studentPage.url, statusCode: studentPage.statusCode }, 'Failed to fetch student page');
      return candidates;
    }

    const student = cheerio.load(studentPage.body);
    if (student(SELECTORS.studentDiscount).length > 0) {
      candidates.push(
        this.candidate({
          name: 'Cursor AI Student Plan',
          description: 'Free Pro features for verified students',
          discountPercentage: 100,
          code: 'STUDENT',
          url: studentPage.url,
          expiry: this.expiresInDays(365),
        }),
      );
    }

    const pricingPage = await fetchPage(http, resolveUrl(this.baseUrl, '/pricing'), this.source);
    if (!isSuccessStatus(pricingPage.statusCode)) {
      log.warn({ url: pricingPage.url, statusCode: pricingPage.statusCode }, 'Failed to fetch pricing page');
      return candidates;
    }

    const $ = cheerio.load(pricingPage.body);
    $(SELECTORS.promotionCode).each((_index, element) => {
      const card = $(element);
      const code = card.attr('data-code') ?? DEFAULT_PROMO_CODE;
      const discount = card.attr('data-discount') ?? DEFAULT_PROMO_DISCOUNT;
      const parsed = Number.parseFloat(discount);

      candidates.push(
        this.candidate({
          name: `Cursor AI Promotion: ${discount}% Off`,
          description: 'Limited time promotion for Cursor AI Pro',
          discountPercentage: Number.isFinite(parsed) ? parsed : 10,
          code,
          url: pricingPage.url,
          expiry: this.expiresInDays(30),
        }),
      );
    });

    log.info({ count: candidates.length }, 'Found coupons from Cursor AI');
    return candidates;
  }
}
