import type { ValidatableCoupon, ValidationOutcome } from '../coupons/types.js';
import type { HttpClient } from '../shared/http-client.js';

/**
 * A pluggable validator for one or more sources. `validate` may reject
 * on transport failure; the dispatcher lets that propagate.
 */
export interface ValidatorStrategy {
  readonly name: string;
  canValidate(source: string): boolean;
  validate(coupon: ValidatableCoupon, http: HttpClient): Promise<ValidationOutcome>;
}
