import { describe, expect, it, vi } from 'vitest';
import { initEventLog } from '../../src/pipeline/event-log.js';
import { TypedEventEmitter } from '../../src/shared/events.js';

function batch(runId: string, posted: number) {
  return { runId, collected: posted, posted, durationMs: 5, aborted: false };
}

describe('initEventLog', () => {
  it('logs each batch with running totals', () => {
    const events = new TypedEventEmitter();
    const info = vi.fn<(obj: object, msg: string) => void>();
    initEventLog(events, { info });

    events.emit('batch:completed', batch('run-1', 2));
    events.emit('collector:failed', { runId: 'run-2', collector: 'Replit', error: 'timeout' });
    events.emit('coupon:notify-failed', { id: 3, error: 'rejected' });
    events.emit('batch:completed', batch('run-2', 1));

    expect(info).toHaveBeenCalledTimes(2);
    expect(info).toHaveBeenLastCalledWith(
      {
        runId: 'run-2',
        posted: 1,
        aborted: false,
        totals: { batches: 2, posted: 3, failedCollectors: 1, notifyFailures: 1, deleted: 0 },
      },
      'Batch totals',
    );
  });

  it('accumulates cleanup deletions', () => {
    const events = new TypedEventEmitter();
    const info = vi.fn<(obj: object, msg: string) => void>();
    initEventLog(events, { info });

    events.emit('cleanup:completed', { deleted: 4 });
    events.emit('cleanup:completed', { deleted: 2 });

    expect(info).toHaveBeenLastCalledWith({ deleted: 2, totalDeleted: 6 }, 'Cleanup totals');
  });

  it('stops listening once detached', () => {
    const events = new TypedEventEmitter();
    const info = vi.fn<(obj: object, msg: string) => void>();
    const detach = initEventLog(events, { info });

    detach();
    events.emit('batch:completed', batch('run-1', 1));

    expect(info).not.toHaveBeenCalled();
    expect(events.listenerCount('batch:completed')).toBe(0);
  });
});
