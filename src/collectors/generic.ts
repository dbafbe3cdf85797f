/**
 * Generic deal-page collector.
 *
 * Scans the visible text of each configured page for "code: XYZ"
 * patterns. The first "N% off" on the page applies to every code found
 * there. A page that fails is skipped; the collector itself never rejects
 * because of one URL.
 */

import * as cheerio from 'cheerio';
import type { CouponCandidate } from '../coupons/types.js';
import { COUPON_SOURCES, DEFAULT_GENERIC_SOURCE_URLS } from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import { isSuccessStatus, type HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { BaseCollector } from './base-collector.js';
import { fetchPage } from './fetch-page.js';
import type { CollectorOptions } from './types.js';

const log = getLogger('collector', { component: 'generic' });

const CODE_PATTERN = /code[:\s]+([A-Z0-9-]+)/gi;
const DISCOUNT_PATTERN = /(\d+)%\s+(?:off|discount)/;
const DEFAULT_DISCOUNT = 10;
const VALIDITY_DAYS = 30;

export interface GenericCollectorOptions extends CollectorOptions {
  urls?: readonly string[];
}

export class GenericCollector extends BaseCollector {
  readonly name = 'Generic AI Tools';
  readonly source = COUPON_SOURCES.GENERIC;
  private readonly urls: readonly string[];

  constructor(options: GenericCollectorOptions = {}) {
    super('', options);
    this.urls = options.urls ?? DEFAULT_GENERIC_SOURCE_URLS;
  }

  async collect(http: HttpClient): Promise<CouponCandidate[]> {
    log.info({ urls: this.urls.length }, 'Scraping coupons from generic sources');
    const candidates: CouponCandidate[] = [];

    for (const url of this.urls) {
      try {
        const page = await fetchPage(http, url, this.source);
        if (!isSuccessStatus(page.statusCode)) {
          log.warn({ url, statusCode: page.statusCode }, 'Failed to fetch deal page');
          continue;
        }
        candidates.push(...this.extract(page.body, url));
      } catch (error) {
        log.warn({ url, error: errorMessage(error) }, 'Failed to fetch deal page');
      }
    }

    log.info({ count: candidates.length }, 'Found coupons from generic sources');
    return candidates;
  }

  /** Exposed for tests. */
  extract(html: string, url: string): CouponCandidate[] {
    const text = cheerio.load(html).root().text();
    const rawDiscount = DISCOUNT_PATTERN.exec(text)?.[1];
    const discount = rawDiscount === undefined ? DEFAULT_DISCOUNT : Number.parseInt(rawDiscount, 10);

    const candidates: CouponCandidate[] = [];
    for (const match of text.matchAll(CODE_PATTERN)) {
      const code = match[1];
      if (code === undefined) {
        continue;
      }
      candidates.push(
        this.candidate({
          name: `AI Tool Discount: ${discount}% Off`,
          description: `Use code ${code} for ${discount}% off`,
          discountPercentage: discount,
          code,
          url,
          expiry: this.expiresInDays(VALIDITY_DAYS),
        }),
      );
    }
    return candidates;
  }
}
