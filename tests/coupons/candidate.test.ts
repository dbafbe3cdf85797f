import { describe, expect, it } from 'vitest';
import { couponState, createCandidate, fingerprint, isExpired } from '../../src/coupons/candidate.js';
import { NOW, at } from '../helpers/fixtures.js';

describe('fingerprint', () => {
  it('is a 64-character lowercase hex digest', () => {
    expect(fingerprint('Offer', 'CODE', 'https://a.test')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is deterministic for the same triple', () => {
    const a = fingerprint('Offer', 'CODE', 'https://a.test');
    const b = fingerprint('Offer', 'CODE', 'https://a.test');
    expect(a).toBe(b);
  });

  it('is case-sensitive', () => {
    expect(fingerprint('Offer', 'CODE', 'https://a.test')).not.toBe(
      fingerprint('Offer', 'code', 'https://a.test'),
    );
  });

  it('is order-sensitive', () => {
    expect(fingerprint('A', 'B', 'C')).not.toBe(fingerprint('B', 'A', 'C'));
  });

  it('keeps field boundaries unambiguous', () => {
    expect(fingerprint('ab', 'c', 'u')).not.toBe(fingerprint('a', 'bc', 'u'));
  });
});

describe('createCandidate', () => {
  it('derives the fingerprint from name, code and url', () => {
    const candidate = createCandidate(
      {
        name: 'Offer',
        description: 'd',
        discountPercentage: null,
        code: 'CODE',
        url: 'https://a.test',
        source: 'Warp',
        expiry: null,
      },
      NOW,
    );

    expect(candidate.fingerprint).toBe(fingerprint('Offer', 'CODE', 'https://a.test'));
    expect(candidate.observedAt).toBe(NOW);
  });

  it('ignores description, discount, source and expiry', () => {
    const base = {
      name: 'Offer',
      code: 'CODE',
      url: 'https://a.test',
    };
    const a = createCandidate({ ...base, description: 'x', discountPercentage: 10, source: 'Warp', expiry: null });
    const b = createCandidate({ ...base, description: 'y', discountPercentage: 90, source: 'Tabnine', expiry: NOW });
    expect(a.fingerprint).toBe(b.fingerprint);
  });
});

describe('isExpired', () => {
  it('treats a missing expiry as never expiring', () => {
    expect(isExpired(null, NOW)).toBe(false);
  });

  it('is true once the expiry has passed', () => {
    expect(isExpired(at(-1000), NOW)).toBe(true);
  });

  it('is false at and before the expiry instant', () => {
    expect(isExpired(NOW, NOW)).toBe(false);
    expect(isExpired(at(1000), NOW)).toBe(false);
  });
});

describe('couponState', () => {
  it('is pending before validation', () => {
    expect(couponState({ validatedAt: null, isValid: false, isPosted: false })).toBe('pending');
  });

  it('follows isValid after validation', () => {
    expect(couponState({ validatedAt: NOW, isValid: true, isPosted: false })).toBe('valid');
    expect(couponState({ validatedAt: NOW, isValid: false, isPosted: false })).toBe('invalid');
  });

  it('reports posted regardless of a later re-validation', () => {
    expect(couponState({ validatedAt: NOW, isValid: false, isPosted: true })).toBe('posted');
  });
});
