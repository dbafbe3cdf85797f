import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { sweepExpired } from '../../src/pipeline/cleanup.js';
import { TypedEventEmitter } from '../../src/shared/events.js';
import { createTestStore, type TestStore } from '../helpers/db.js';
import { HOUR_MS, NOW, at, makeCandidate } from '../helpers/fixtures.js';

describe('sweepExpired', () => {
  let t: TestStore;

  beforeEach(() => {
    t = createTestStore();
  });

  afterEach(() => {
    t.close();
  });

  it('removes expired records and keeps current and open-ended ones', async () => {
    await t.store.insert(makeCandidate({ name: 'Expired', expiry: at(-HOUR_MS) }));
    await t.store.insert(makeCandidate({ name: 'Current', expiry: at(HOUR_MS) }));
    await t.store.insert(makeCandidate({ name: 'Open', expiry: null }));
    const events = new TypedEventEmitter();
    const reported: number[] = [];
    events.on('cleanup:completed', ({ deleted }) => reported.push(deleted));

    const deleted = await sweepExpired(t.store, NOW, events);

    expect(deleted).toBe(1);
    expect(reported).toEqual([1]);
    expect((await t.store.listAll()).map((r) => r.name).sort()).toEqual(['Current', 'Open']);
  });

  it('propagates a store failure', async () => {
    const failing = {
      deleteExpired: async (): Promise<number> => {
        throw new Error('database is locked');
      },
    };

    await expect(sweepExpired(failing, NOW, new TypedEventEmitter())).rejects.toThrow('database is locked');
  });
});
