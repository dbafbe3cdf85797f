import { createCandidate } from '../../src/coupons/candidate.js';
import type { CandidateInput, CouponCandidate, CouponRecord } from '../../src/coupons/types.js';
import type { Notifier } from '../../src/notification/types.js';
import type { SourceCollector } from '../../src/collectors/types.js';
import type { CouponSource } from '../../src/shared/constants.js';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

export const HOUR_MS = 3_600_000;

export function at(offsetMs: number): Date {
  return new Date(NOW.getTime() + offsetMs);
}

export function makeCandidate(
  overrides: Partial<CandidateInput> = {},
  observedAt: Date = NOW,
): CouponCandidate {
  return createCandidate(
    {
      name: 'Test Offer',
      description: 'An offer for tests',
      discountPercentage: 20,
      code: 'TEST-20',
      url: 'https://deals.example.test/offer',
      source: 'Generic',
      expiry: null,
      ...overrides,
    },
    observedAt,
  );
}

export function makeRecord(overrides: Partial<CouponRecord> = {}): CouponRecord {
  return {
    id: 1,
    fingerprint: 'f'.repeat(64),
    name: 'Test Offer',
    description: 'An offer for tests',
    discountPercentage: 20,
    code: 'TEST-20',
    url: 'https://deals.example.test/offer',
    source: 'Generic',
    expiry: null,
    createdAt: NOW,
    validatedAt: NOW,
    isValid: true,
    isPosted: false,
    ...overrides,
  };
}

/** Collector returning fixed candidates, or failing with `error`. */
export function staticCollector(
  name: string,
  source: CouponSource,
  result: CouponCandidate[] | Error,
): SourceCollector {
  return {
    name,
    source,
    collect: async () => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
  };
}

/** Notifier that records deliveries and fails for ids in `failing`. */
export class RecordingNotifier implements Notifier {
  readonly name = 'recording';
  readonly delivered: CouponRecord[] = [];
  readonly failing = new Set<number>();

  async notify(record: CouponRecord): Promise<void> {
    if (this.failing.has(record.id)) {
      throw new Error(`delivery refused for ${record.id}`);
    }
    this.delivered.push(record);
  }
}
