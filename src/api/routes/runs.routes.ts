import type { FastifyPluginAsync } from 'fastify';
import type { CouponScheduler } from '../../pipeline/scheduler.js';

export interface RunRouteOptions {
  scheduler: Pick<CouponScheduler, 'enqueueRun'>;
}

/**
 * Ad-hoc batch runs. The batch is queued behind whatever the scheduler
 * is doing; the response does not wait for it.
 */
export const runRoutes: FastifyPluginAsync<RunRouteOptions> = async (app, opts) => {
  // POST / - Queue a batch
  app.post('/', async (_request, reply) => {
    const runId = opts.scheduler.enqueueRun();
    return reply.status(202).send({ data: { runId, status: 'queued' } });
  });
};
