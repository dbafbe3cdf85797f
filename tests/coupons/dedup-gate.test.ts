import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CouponDeduplicator } from '../../src/coupons/dedup-gate.js';
import { createTestStore, type TestStore } from '../helpers/db.js';
import { makeCandidate } from '../helpers/fixtures.js';

describe('CouponDeduplicator', () => {
  let t: TestStore;
  let gate: CouponDeduplicator;

  beforeEach(() => {
    t = createTestStore();
    gate = new CouponDeduplicator(t.store);
  });

  afterEach(() => {
    t.close();
  });

  it('passes a candidate whose fingerprint is unknown', async () => {
    expect(await gate.isDuplicate(makeCandidate())).toBe(false);
  });

  it('drops a candidate once its fingerprint is stored', async () => {
    const candidate = makeCandidate();
    await t.store.insert(candidate);

    expect(await gate.isDuplicate(candidate)).toBe(true);
  });

  it('treats a re-scraped offer with new prose as the same offer', async () => {
    await t.store.insert(makeCandidate({ description: 'first wording' }));

    expect(await gate.isDuplicate(makeCandidate({ description: 'second wording' }))).toBe(true);
  });

  it('treats a different code as a different offer', async () => {
    await t.store.insert(makeCandidate({ code: 'ONE' }));

    expect(await gate.isDuplicate(makeCandidate({ code: 'TWO' }))).toBe(false);
  });
});
