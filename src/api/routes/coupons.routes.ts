import type { FastifyPluginAsync } from 'fastify';
import type { CouponRecord, CouponStore } from '../../coupons/types.js';
import { AppError } from '../../shared/errors.js';
import { parseParams, parseQuery } from '../middleware/validator.js';
import { idParamSchema, listResponse } from '../schemas/common.schema.js';
import { couponListQuerySchema, toCouponResponse } from '../schemas/coupon.schema.js';

export interface CouponRouteOptions {
  store: CouponStore;
}

/**
 * Read-only coupon routes.
 */
export const couponRoutes: FastifyPluginAsync<CouponRouteOptions> = async (app, opts) => {
  const { store } = opts;

  // GET / - List coupons, optionally by source or unposted state
  app.get('/', async (request, reply) => {
    const query = parseQuery(couponListQuerySchema, request.query);

    let records: CouponRecord[];
    if (query.state === 'unposted') {
      const unposted = await store.listValidUnposted();
      records = query.source ? unposted.filter((r) => r.source === query.source) : unposted;
    } else if (query.source) {
      records = await store.listBySource(query.source);
    } else {
      records = await store.listAll();
    }

    return reply.send(listResponse(records.map(toCouponResponse)));
  });

  // GET /:id - Single coupon
  app.get('/:id', async (request, reply) => {
    const { id } = parseParams(idParamSchema, request.params);

    const record = await store.getById(id);
    if (!record) {
      throw new AppError(`Coupon ${id} not found`, 'COUPON_NOT_FOUND', 404);
    }

    return reply.send({ data: toCouponResponse(record) });
  });
};
