/**
 * Validation dispatcher.
 *
 * Dispatch rule, in order:
 *   1. expiry in the past  -> invalid ("expired"), no strategy runs
 *   2. first registered strategy whose canValidate(source) holds
 *   3. no match            -> valid (fail-open), logged at warn
 *
 * A strategy rejection propagates; the caller scopes it to one record.
 */

import { isExpired } from '../coupons/candidate.js';
import type { ValidatableCoupon, ValidationOutcome } from '../coupons/types.js';
import type { HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import type { ValidatorStrategy } from './types.js';

const log = getLogger('validation', { component: 'dispatcher' });

export class ValidationDispatcher {
  private readonly strategies: ValidatorStrategy[];

  constructor(
    strategies: readonly ValidatorStrategy[],
    private readonly http: HttpClient,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.strategies = [...strategies];
  }

  /** Appends a strategy; earlier registrations keep precedence. */
  register(strategy: ValidatorStrategy): void {
    this.strategies.push(strategy);
  }

  async validate(coupon: ValidatableCoupon): Promise<ValidationOutcome> {
    const now = this.now();

    if (isExpired(coupon.expiry, now)) {
      return { isValid: false, message: 'expired', validatedAt: now };
    }

    const strategy = this.strategies.find((s) => s.canValidate(coupon.source));

    if (!strategy) {
      log.warn({ source: coupon.source, name: coupon.name }, 'No validator found for source');
      return {
        isValid: true,
        message: `no validator available for source ${coupon.source}`,
        validatedAt: now,
      };
    }

    log.debug({ validator: strategy.name, name: coupon.name }, 'Validating coupon');
    return strategy.validate(coupon, this.http);
  }
}
