import * as cheerio from 'cheerio';
import type { CouponCandidate } from '../coupons/types.js';
import { COUPON_SOURCES } from '../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { BaseCollector } from './base-collector.js';
import { fetchPage, resolveUrl } from './fetch-page.js';
import type { CollectorOptions } from './types.js';

const log = getLogger('collector', { component: 'replit' });

export class ReplitCollector extends BaseCollector {
  readonly name = 'Replit';
  readonly source = COUPON_SOURCES.REPLIT;

  constructor(options: CollectorOptions = {}) {
    super('https://replit.com', options);
  }

  async collect(http: HttpClient): Promise<CouponCandidate[]> {
    log.info('Scraping coupons from Replit');

    const page = await fetchPage(http, resolveUrl(this.baseUrl, '/site/teams-for-education'), this.source);
    if (!isSuccessStatus(page.statusCode)) {
      log.warn({ url: page.url, statusCode: page.statusCode }, 'Failed to fetch Replit education page');
      return [];
    }

    const $ = cheerio.load(page.body);
    if ($('div.education-discount').length === 0) {
      log.info({ count: 0 }, 'Found coupons from Replit');
      return [];
    }

    const candidates = [
      this.candidate({
        name: 'Replit Teams for Education',
        description: 'Special pricing for educational institutions',
        discountPercentage: 50,
        code: 'EDUCATION',
        url: page.url,
        expiry: null,
      }),
    ];

    log.info({ count: candidates.length }, 'Found coupons from Replit');
    return candidates;
  }
}
