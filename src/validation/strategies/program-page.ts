import type { ValidatableCoupon, ValidationOutcome } from '../../coupons/types.js';
import { COUPON_SOURCES, type CouponSource } from '../../shared/constants.js';
import { isSuccessStatus, type HttpClient } from '../../shared/http-client.js';
import type { ValidatorStrategy } from '../types.js';
import { outcome, probe } from './probe.js';

/**
 * Valid while the programme page at the coupon's URL answers 2xx.
 * `label` names the programme in outcome messages.
 */
export class ProgramPageValidator implements ValidatorStrategy {
  readonly name: string;

  constructor(
    private readonly source: CouponSource,
    private readonly label: string,
  ) {
    this.name = `${source} Validator`;
  }

  canValidate(source: string): boolean {
    return source === this.source;
  }

  async validate(coupon: ValidatableCoupon, http: HttpClient): Promise<ValidationOutcome> {
    const { statusCode } = await probe(http, coupon.url, this.name);
    return isSuccessStatus(statusCode)
      ? outcome(true, `${this.label} verified as active`)
      : outcome(false, `${this.label} page returned status: ${statusCode}`);
  }
}

export const replitValidator = (): ProgramPageValidator =>
  new ProgramPageValidator(COUPON_SOURCES.REPLIT, 'Education program');
export const warpValidator = (): ProgramPageValidator =>
  new ProgramPageValidator(COUPON_SOURCES.WARP, 'Student program');
export const tabnineValidator = (): ProgramPageValidator =>
  new ProgramPageValidator(COUPON_SOURCES.TABNINE, 'Student program');
