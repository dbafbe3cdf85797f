import type { FastifyInstance } from 'fastify';
import type { CouponStore } from '../coupons/types.js';
import type { CouponScheduler } from '../pipeline/scheduler.js';
import { couponRoutes } from './routes/coupons.routes.js';
import { healthRoutes } from './routes/health.routes.js';
import { runRoutes } from './routes/runs.routes.js';

export interface ApiDependencies {
  store: CouponStore;
  scheduler: Pick<CouponScheduler, 'getStatus' | 'enqueueRun'>;
  checkDatabase: () => boolean;
}

/**
 * Registers all API route modules under the /api/v1 prefix.
 */
export async function registerRoutes(app: FastifyInstance, deps: ApiDependencies): Promise<void> {
  await app.register(healthRoutes, {
    prefix: '/api/v1/health',
    scheduler: deps.scheduler,
    checkDatabase: deps.checkDatabase,
  });
  await app.register(couponRoutes, { prefix: '/api/v1/coupons', store: deps.store });
  await app.register(runRoutes, { prefix: '/api/v1/runs', scheduler: deps.scheduler });
}
