/**
 * GitHub Student Developer Pack. Only offers whose title mentions AI
 * are kept; each gets its own anchor URL so fingerprints differ.
 */

import * as cheerio from 'cheerio';
import type { CouponCandidate } from '../coupons/types.js';
import { COUPON_SOURCES } from '../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { toAnchor } from '../shared/utils.js';
import { BaseCollector } from './base-collector.js';
import { fetchPage, resolveUrl } from './fetch-page.js';
import type { CollectorOptions } from './types.js';

const log = getLogger('collector', { component: 'github' });

const SELECTORS = {
  offer: 'div.d-flex.flex-wrap.gutter',
  title: 'h3',
  description: 'p',
} as const;

export class GitHubCollector extends BaseCollector {
  readonly name = 'GitHub';
  readonly source = COUPON_SOURCES.GITHUB;

  constructor(options: CollectorOptions = {}) {
    super('https://education.github.com', options);
  }

  async collect(http: HttpClient): Promise<CouponCandidate[]> {
    log.info('Scraping coupons from GitHub Education');
    const candidates: CouponCandidate[] = [];

    const page = await fetchPage(http, resolveUrl(this.baseUrl, '/pack'), this.source);
    if (!isSuccessStatus(page.statusCode)) {
      log.warn({ url: page.url, statusCode: page.statusCode }, 'Failed to fetch GitHub Education page');
      return candidates;
    }

    const $ = cheerio.load(page.body);
    $(SELECTORS.offer).each((_index, element) => {
      const card = $(element);
      const title = card.find(SELECTORS.title).first().text().trim();
      const description = card.find(SELECTORS.description).first().text().trim();

      // Not an AI tool offer
      if (title.length === 0 || !title.toLowerCase().includes('ai')) {
        return;
      }

      candidates.push(
        this.candidate({
          name: `GitHub Student Pack: ${title}`,
          description,
          discountPercentage: null,
          code: 'GITHUB-STUDENT',
          url: `${page.url}#${toAnchor(title)}`,
          expiry: null,
        }),
      );
    });

    log.info({ count: candidates.length }, 'Found coupons from GitHub');
    return candidates;
  }
}
