import type { ValidatableCoupon, ValidationOutcome } from '../../coupons/types.js';
import { COUPON_SOURCES } from '../../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../../shared/http-client.js';
import type { ValidatorStrategy } from '../types.js';
import { outcome, probe } from './probe.js';

/** A generic code stays valid while its source page still prints it. */
export class GenericValidator implements ValidatorStrategy {
  readonly name = 'Generic Validator';

  canValidate(source: string): boolean {
    return source === COUPON_SOURCES.GENERIC;
  }

  async validate(coupon: ValidatableCoupon, http: HttpClient): Promise<ValidationOutcome> {
    const { statusCode, body } = await probe(http, coupon.url, this.name);

    if (!isSuccessStatus(statusCode)) {
      return outcome(false, `Source page returned status: ${statusCode}`);
    }

    return body.includes(coupon.code)
      ? outcome(true, 'Coupon code found on source page')
      : outcome(false, 'Coupon code not found on source page');
  }
}
