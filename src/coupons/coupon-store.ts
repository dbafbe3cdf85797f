/**
 * SQLite-backed coupon store (drizzle-orm over better-sqlite3).
 *
 * better-sqlite3 is synchronous; the methods stay async so the pipeline
 * depends only on the CouponStore contract.
 */

import { and, asc, desc, eq, gt, isNotNull, isNull, lt, or, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db/index.js';
import { coupons, type CouponRow } from '../db/schema.js';
import type { CouponSource } from '../shared/constants.js';
import { StoreError } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { CouponCandidate, CouponRecord, CouponStore } from './types.js';

const log = getLogger('store', { component: 'coupon-store' });

const UNIQUE_VIOLATION = 'SQLITE_CONSTRAINT_UNIQUE';

function hasCode(value: unknown, code: string): boolean {
  return typeof value === 'object' && value !== null && 'code' in value && value.code === code;
}

function isUniqueViolation(error: unknown): boolean {
  if (hasCode(error, UNIQUE_VIOLATION)) {
    return true;
  }
  return error instanceof Error && hasCode(error.cause, UNIQUE_VIOLATION);
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toRecord(row: CouponRow): CouponRecord {
  return {
    id: row.id,
    fingerprint: row.fingerprint,
    name: row.name,
    description: row.description,
    discountPercentage: row.discountPercentage,
    code: row.code,
    url: row.url,
    source: row.source,
    expiry: toDate(row.expiry),
    createdAt: new Date(row.createdAt),
    validatedAt: toDate(row.validatedAt),
    isValid: row.isValid,
    isPosted: row.isPosted,
  };
}

export class SqliteCouponStore implements CouponStore {
  constructor(private readonly db: AppDatabase) {}

  async insert(candidate: CouponCandidate): Promise<number> {
    try {
      const [row] = this.db
        .insert(coupons)
        .values({
          name: candidate.name,
          description: candidate.description,
          discountPercentage: candidate.discountPercentage,
          code: candidate.code,
          url: candidate.url,
          source: candidate.source,
          expiry: candidate.expiry?.toISOString() ?? null,
          createdAt: candidate.observedAt.toISOString(),
          validatedAt: null,
          isValid: false,
          isPosted: false,
          fingerprint: candidate.fingerprint,
        })
        .returning({ id: coupons.id })
        .all();

      if (!row) {
        throw new Error('Insert returned no row');
      }

      log.debug({ id: row.id, fingerprint: candidate.fingerprint }, 'Coupon inserted');
      return row.id;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StoreError(
          `Coupon with fingerprint ${candidate.fingerprint} already exists`,
          'DUPLICATE_FINGERPRINT',
          'insert',
          error,
        );
      }
      throw new StoreError('Failed to insert coupon', 'INSERT_FAILED', 'insert', error);
    }
  }

  async existsByFingerprint(fingerprint: string): Promise<boolean> {
    const row = this.db
      .select({ id: coupons.id })
      .from(coupons)
      .where(eq(coupons.fingerprint, fingerprint))
      .limit(1)
      .get();
    return row !== undefined;
  }

  async updateValidation(id: number, isValid: boolean, validatedAt: Date = new Date()): Promise<void> {
    const result = this.db
      .update(coupons)
      .set({ isValid, validatedAt: validatedAt.toISOString() })
      .where(eq(coupons.id, id))
      .run();

    if (result.changes === 0) {
      throw new StoreError(`Coupon ${id} not found`, 'NOT_FOUND', 'updateValidation');
    }
  }

  async markPosted(id: number): Promise<void> {
    const result = this.db
      .update(coupons)
      .set({ isPosted: true })
      .where(
        and(eq(coupons.id, id), eq(coupons.isValid, true), isNotNull(coupons.validatedAt)),
      )
      .run();

    if (result.changes === 0) {
      throw new StoreError(
        `Coupon ${id} cannot be marked posted: missing, invalid or not yet validated`,
        'NOT_POSTABLE',
        'markPosted',
      );
    }
  }

  async listValidUnposted(now: Date = new Date()): Promise<CouponRecord[]> {
    const rows = this.db
      .select()
      .from(coupons)
      .where(
        and(
          eq(coupons.isValid, true),
          eq(coupons.isPosted, false),
          isNotNull(coupons.validatedAt),
          or(isNull(coupons.expiry), gt(coupons.expiry, now.toISOString())),
        ),
      )
      .orderBy(asc(coupons.createdAt), asc(coupons.id))
      .all();
    return rows.map(toRecord);
  }

  async deleteExpired(now: Date = new Date()): Promise<number> {
    const result = this.db
      .delete(coupons)
      .where(and(isNotNull(coupons.expiry), lt(coupons.expiry, now.toISOString())))
      .run();
    return result.changes;
  }

  async getById(id: number): Promise<CouponRecord | null> {
    const row = this.db.select().from(coupons).where(eq(coupons.id, id)).get();
    return row ? toRecord(row) : null;
  }

  async listAll(): Promise<CouponRecord[]> {
    const rows = this.db
      .select()
      .from(coupons)
      .orderBy(desc(coupons.createdAt), desc(coupons.id))
      .all();
    return rows.map(toRecord);
  }

  async listBySource(source: CouponSource): Promise<CouponRecord[]> {
    const rows = this.db
      .select()
      .from(coupons)
      .where(eq(coupons.source, source))
      .orderBy(desc(coupons.createdAt), desc(coupons.id))
      .all();
    return rows.map(toRecord);
  }

  /** Row count, for the health endpoint. */
  async count(): Promise<number> {
    const row = this.db.select({ n: sql<number>`count(*)` }).from(coupons).get();
    return row?.n ?? 0;
  }
}
