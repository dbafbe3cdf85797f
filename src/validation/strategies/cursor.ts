import type { ValidatableCoupon, ValidationOutcome } from '../../coupons/types.js';
import { COUPON_SOURCES } from '../../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../../shared/http-client.js';
import type { ValidatorStrategy } from '../types.js';
import { outcome, probe } from './probe.js';

const CODE_FORMAT = /^[A-Za-z0-9-]{4,}$/;

/**
 * Student offers are checked against the live programme page; promotion
 * codes only get a format check, since there is no public redemption API.
 */
export class CursorValidator implements ValidatorStrategy {
  readonly name = 'Cursor AI Validator';

  canValidate(source: string): boolean {
    return source === COUPON_SOURCES.CURSOR;
  }

  async validate(coupon: ValidatableCoupon, http: HttpClient): Promise<ValidationOutcome> {
    if (coupon.code === 'STUDENT' && coupon.url.includes('/student')) {
      const { statusCode } = await probe(http, coupon.url, this.name);
      return isSuccessStatus(statusCode)
        ? outcome(true, 'Student program verified as active')
        : outcome(false, `Student program page returned status: ${statusCode}`);
    }

    return CODE_FORMAT.test(coupon.code)
      ? outcome(true, 'Coupon code format is valid')
      : outcome(false, 'Invalid coupon code format');
  }
}
