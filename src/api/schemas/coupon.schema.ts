import { z } from 'zod';
import { couponState } from '../../coupons/candidate.js';
import type { CouponRecord, CouponState } from '../../coupons/types.js';
import { COUPON_SOURCE_LABELS, type CouponSource } from '../../shared/constants.js';

export const couponListQuerySchema = z.object({
  source: z.enum(COUPON_SOURCE_LABELS).optional(),
  /** `unposted` narrows to valid, unposted, unexpired records */
  state: z.enum(['all', 'unposted']).default('all'),
});

export type CouponListQuery = z.infer<typeof couponListQuerySchema>;

export interface CouponResponse {
  id: number;
  fingerprint: string;
  name: string;
  description: string;
  discountPercentage: number | null;
  code: string;
  url: string;
  source: CouponSource;
  expiry: string | null;
  createdAt: string;
  validatedAt: string | null;
  isValid: boolean;
  isPosted: boolean;
  state: CouponState;
}

export function toCouponResponse(record: CouponRecord): CouponResponse {
  return {
    id: record.id,
    fingerprint: record.fingerprint,
    name: record.name,
    description: record.description,
    discountPercentage: record.discountPercentage,
    code: record.code,
    url: record.url,
    source: record.source,
    expiry: record.expiry?.toISOString() ?? null,
    createdAt: record.createdAt.toISOString(),
    validatedAt: record.validatedAt?.toISOString() ?? null,
    isValid: record.isValid,
    isPosted: record.isPosted,
    state: couponState(record),
  };
}
