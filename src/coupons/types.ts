import type { CouponSource } from '../shared/constants.js';

/**
 * An offer as returned by a collector, before it is persisted.
 * The fingerprint is computed once, when the candidate is built.
 */
export interface CouponCandidate {
  name: string;
  description: string;
  discountPercentage: number | null;
  code: string;
  url: string;
  source: CouponSource;
  expiry: Date | null;
  fingerprint: string;
  observedAt: Date;
}

/** Fields a collector supplies; the rest is derived. */
export type CandidateInput = Omit<CouponCandidate, 'fingerprint' | 'observedAt'>;

/** The durable unit kept by the store. */
export interface CouponRecord {
  id: number;
  fingerprint: string;
  name: string;
  description: string;
  discountPercentage: number | null;
  code: string;
  url: string;
  source: CouponSource;
  expiry: Date | null;
  createdAt: Date;
  validatedAt: Date | null;
  isValid: boolean;
  isPosted: boolean;
}

/** Anything with enough of a coupon to be validated or checked for expiry. */
export type ValidatableCoupon = Pick<
  CouponRecord,
  'name' | 'code' | 'url' | 'source' | 'expiry'
>;

export interface ValidationOutcome {
  isValid: boolean;
  message: string | null;
  validatedAt: Date;
}

export type CouponState = 'pending' | 'valid' | 'invalid' | 'posted';

/**
 * Persistence contract for coupon records. All timestamps are compared
 * as instants; `now` parameters exist so callers and tests control the clock.
 */
export interface CouponStore {
  /** Rejects with StoreError `DUPLICATE_FINGERPRINT` if the fingerprint exists. */
  insert(candidate: CouponCandidate): Promise<number>;
  existsByFingerprint(fingerprint: string): Promise<boolean>;
  updateValidation(id: number, isValid: boolean, validatedAt?: Date): Promise<void>;
  /** Rejects with StoreError `NOT_POSTABLE` unless the record is validated and valid. */
  markPosted(id: number): Promise<void>;
  /** Valid, validated, unposted and unexpired records, oldest first. */
  listValidUnposted(now?: Date): Promise<CouponRecord[]>;
  deleteExpired(now?: Date): Promise<number>;
  getById(id: number): Promise<CouponRecord | null>;
  /** Newest first. */
  listAll(): Promise<CouponRecord[]>;
  /** Newest first. */
  listBySource(source: CouponSource): Promise<CouponRecord[]>;
}
