import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StoreError } from '../../src/shared/errors.js';
import { createTestStore, type TestStore } from '../helpers/db.js';
import { HOUR_MS, NOW, at, makeCandidate } from '../helpers/fixtures.js';

describe('SqliteCouponStore', () => {
  let t: TestStore;

  beforeEach(() => {
    t = createTestStore();
  });

  afterEach(() => {
    t.close();
  });

  describe('insert', () => {
    it('persists a pending, unposted record and returns its id', async () => {
      const candidate = makeCandidate({ expiry: at(HOUR_MS) });
      const id = await t.store.insert(candidate);

      const record = await t.store.getById(id);
      expect(record).toEqual({
        id,
        fingerprint: candidate.fingerprint,
        name: 'Test Offer',
        description: 'An offer for tests',
        discountPercentage: 20,
        code: 'TEST-20',
        url: 'https://deals.example.test/offer',
        source: 'Generic',
        expiry: at(HOUR_MS),
        createdAt: NOW,
        validatedAt: null,
        isValid: false,
        isPosted: false,
      });
    });

    it('rejects a second insert of the same fingerprint', async () => {
      await t.store.insert(makeCandidate());

      const second = t.store.insert(makeCandidate({ description: 'different text' }));
      await expect(second).rejects.toBeInstanceOf(StoreError);
      await expect(t.store.insert(makeCandidate())).rejects.toMatchObject({
        code: 'DUPLICATE_FINGERPRINT',
      });
      expect(await t.store.listAll()).toHaveLength(1);
    });
  });

  describe('existsByFingerprint', () => {
    it('reports stored fingerprints only', async () => {
      const stored = makeCandidate();
      await t.store.insert(stored);

      expect(await t.store.existsByFingerprint(stored.fingerprint)).toBe(true);
      expect(await t.store.existsByFingerprint(makeCandidate({ code: 'OTHER' }).fingerprint)).toBe(false);
    });
  });

  describe('updateValidation', () => {
    it('records the verdict and its time', async () => {
      const id = await t.store.insert(makeCandidate());
      await t.store.updateValidation(id, true, at(1000));

      const record = await t.store.getById(id);
      expect(record?.isValid).toBe(true);
      expect(record?.validatedAt).toEqual(at(1000));
    });

    it('does not reset isPosted on re-validation', async () => {
      const id = await t.store.insert(makeCandidate());
      await t.store.updateValidation(id, true, NOW);
      await t.store.markPosted(id);

      await t.store.updateValidation(id, false, at(1000));

      const record = await t.store.getById(id);
      expect(record?.isPosted).toBe(true);
      expect(record?.isValid).toBe(false);
    });

    it('rejects an unknown id', async () => {
      await expect(t.store.updateValidation(999, true)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });
  });

  describe('markPosted', () => {
    it('refuses a record that was never validated', async () => {
      const id = await t.store.insert(makeCandidate());
      await expect(t.store.markPosted(id)).rejects.toMatchObject({ code: 'NOT_POSTABLE' });
      expect((await t.store.getById(id))?.isPosted).toBe(false);
    });

    it('refuses an invalid record', async () => {
      const id = await t.store.insert(makeCandidate());
      await t.store.updateValidation(id, false, NOW);
      await expect(t.store.markPosted(id)).rejects.toMatchObject({ code: 'NOT_POSTABLE' });
    });

    it('refuses a missing record', async () => {
      await expect(t.store.markPosted(42)).rejects.toMatchObject({ code: 'NOT_POSTABLE' });
    });

    it('marks a valid record posted', async () => {
      const id = await t.store.insert(makeCandidate());
      await t.store.updateValidation(id, true, NOW);
      await t.store.markPosted(id);
      expect((await t.store.getById(id))?.isPosted).toBe(true);
    });
  });

  describe('listValidUnposted', () => {
    it('returns valid, unposted, unexpired records oldest first', async () => {
      const newer = await t.store.insert(makeCandidate({ code: 'NEWER' }, at(2000)));
      const older = await t.store.insert(makeCandidate({ code: 'OLDER' }, at(1000)));
      const expired = await t.store.insert(makeCandidate({ code: 'GONE', expiry: at(-1000) }));
      const invalid = await t.store.insert(makeCandidate({ code: 'BAD' }));
      const pending = await t.store.insert(makeCandidate({ code: 'PENDING' }));
      const posted = await t.store.insert(makeCandidate({ code: 'POSTED' }));

      for (const id of [newer, older, expired, posted]) {
        await t.store.updateValidation(id, true, NOW);
      }
      await t.store.updateValidation(invalid, false, NOW);
      await t.store.markPosted(posted);

      const result = await t.store.listValidUnposted(NOW);
      expect(result.map((r) => r.id)).toEqual([older, newer]);
      expect(result.map((r) => r.id)).not.toContain(pending);
    });
  });

  describe('deleteExpired', () => {
    it('removes records whose expiry has passed and keeps the rest', async () => {
      const past = await t.store.insert(makeCandidate({ code: 'PAST', expiry: new Date(NOW.getTime() - 1000) }));
      const future = await t.store.insert(makeCandidate({ code: 'FUTURE', expiry: at(HOUR_MS) }));
      const never = await t.store.insert(makeCandidate({ code: 'NEVER', expiry: null }));

      expect(await t.store.deleteExpired(NOW)).toBe(1);

      expect(await t.store.getById(past)).toBeNull();
      expect(await t.store.getById(future)).not.toBeNull();
      expect(await t.store.getById(never)).not.toBeNull();
    });
  });

  describe('read accessors', () => {
    it('lists newest first, overall and by source', async () => {
      const a = await t.store.insert(makeCandidate({ code: 'A', source: 'Warp' }, at(1000)));
      const b = await t.store.insert(makeCandidate({ code: 'B', source: 'Tabnine' }, at(2000)));
      const c = await t.store.insert(makeCandidate({ code: 'C', source: 'Warp' }, at(3000)));

      expect((await t.store.listAll()).map((r) => r.id)).toEqual([c, b, a]);
      expect((await t.store.listBySource('Warp')).map((r) => r.id)).toEqual([c, a]);
      expect(await t.store.count()).toBe(3);
    });

    it('returns null for an unknown id', async () => {
      expect(await t.store.getById(123)).toBeNull();
    });
  });
});
