import type { CouponStore } from '../coupons/types.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { getLogger } from '../shared/logger.js';

const log = getLogger('pipeline', { component: 'cleanup' });

/**
 * Deletes every record whose expiry lies before `now`. Records without an
 * expiry are kept. Errors propagate so the scheduler can retry next tick.
 */
export async function sweepExpired(
  store: Pick<CouponStore, 'deleteExpired'>,
  now: Date = new Date(),
  events: TypedEventEmitter = eventBus,
): Promise<number> {
  const deleted = await store.deleteExpired(now);

  log.info({ deleted }, 'Expired coupons removed');
  events.emit('cleanup:completed', { deleted });

  return deleted;
}
