/**
 * Deduplication gate.
 *
 * The store's unique fingerprint is the only source of truth: a candidate
 * is a duplicate exactly when its fingerprint is already persisted. No
 * fuzzy matching and no in-memory index, so the gate survives restarts.
 */

import { getLogger } from '../shared/logger.js';
import type { CouponCandidate, CouponStore } from './types.js';

const log = getLogger('pipeline', { component: 'dedup-gate' });

export class CouponDeduplicator {
  constructor(private readonly store: Pick<CouponStore, 'existsByFingerprint'>) {}

  async isDuplicate(candidate: CouponCandidate): Promise<boolean> {
    const exists = await this.store.existsByFingerprint(candidate.fingerprint);

    if (exists) {
      log.debug(
        { fingerprint: candidate.fingerprint, name: candidate.name, source: candidate.source },
        'Duplicate detected: fingerprint already stored',
      );
    }

    return exists;
  }
}
