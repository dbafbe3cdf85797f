/**
 * Bridges the event bus to the log: one line per finished batch and
 * sweep, carrying running totals since startup.
 */

import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { getLogger } from '../shared/logger.js';

export interface EventLogSink {
  info(obj: object, msg: string): void;
}

export function initEventLog(
  events: TypedEventEmitter = eventBus,
  sink: EventLogSink = getLogger('pipeline', { service: 'event-log' }),
): () => void {
  const totals = { batches: 0, posted: 0, failedCollectors: 0, notifyFailures: 0, deleted: 0 };

  const onCollectorFailed = (): void => {
    totals.failedCollectors += 1;
  };
  const onNotifyFailed = (): void => {
    totals.notifyFailures += 1;
  };
  const onBatchCompleted = (data: { runId: string; posted: number; aborted: boolean }): void => {
    totals.batches += 1;
    totals.posted += data.posted;
    sink.info({ runId: data.runId, posted: data.posted, aborted: data.aborted, totals: { ...totals } }, 'Batch totals');
  };
  const onCleanupCompleted = (data: { deleted: number }): void => {
    totals.deleted += data.deleted;
    sink.info({ deleted: data.deleted, totalDeleted: totals.deleted }, 'Cleanup totals');
  };

  events.on('collector:failed', onCollectorFailed);
  events.on('coupon:notify-failed', onNotifyFailed);
  events.on('batch:completed', onBatchCompleted);
  events.on('cleanup:completed', onCleanupCompleted);

  return () => {
    events.off('collector:failed', onCollectorFailed);
    events.off('coupon:notify-failed', onNotifyFailed);
    events.off('batch:completed', onBatchCompleted);
    events.off('cleanup:completed', onCleanupCompleted);
  };
}
