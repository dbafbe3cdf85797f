import { createHash } from 'node:crypto';
import type { CandidateInput, CouponCandidate, CouponRecord, CouponState } from './types.js';

/**
 * Identity of an offer: SHA-256 over the JSON encoding of the ordered
 * (name, code, url) triple, hex encoded. JSON keeps the boundaries between
 * fields unambiguous, so ("ab", "c") and ("a", "bc") never collide.
 */
export function fingerprint(name: string, code: string, url: string): string {
  return createHash('sha256').update(JSON.stringify([name, code, url])).digest('hex');
}

export function createCandidate(input: CandidateInput, observedAt: Date = new Date()): CouponCandidate {
  return {
    ...input,
    fingerprint: fingerprint(input.name, input.code, input.url),
    observedAt,
  };
}

/** An expiry equal to `now` has not passed yet. */
export function isExpired(expiry: Date | null, now: Date = new Date()): boolean {
  return expiry !== null && expiry.getTime() < now.getTime();
}

export function couponState(record: Pick<CouponRecord, 'validatedAt' | 'isValid' | 'isPosted'>): CouponState {
  if (record.isPosted) {
    return 'posted';
  }
  if (record.validatedAt === null) {
    return 'pending';
  }
  return record.isValid ? 'valid' : 'invalid';
}
