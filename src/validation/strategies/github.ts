import type { ValidatableCoupon, ValidationOutcome } from '../../coupons/types.js';
import { COUPON_SOURCES } from '../../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../../shared/http-client.js';
import type { ValidatorStrategy } from '../types.js';
import { outcome, probe } from './probe.js';

/** The offer is live while the pack page still mentions it by name. */
export class GitHubValidator implements ValidatorStrategy {
  readonly name = 'GitHub Validator';

  canValidate(source: string): boolean {
    return source === COUPON_SOURCES.GITHUB;
  }

  async validate(coupon: ValidatableCoupon, http: HttpClient): Promise<ValidationOutcome> {
    const { statusCode, body } = await probe(http, coupon.url, this.name);

    if (!isSuccessStatus(statusCode)) {
      return outcome(false, `GitHub Education page returned status: ${statusCode}`);
    }

    return body.includes(coupon.name)
      ? outcome(true, 'Offer found on GitHub Education page')
      : outcome(false, 'Offer not found on GitHub Education page');
  }
}
