import type { FastifyPluginAsync } from 'fastify';
import type { CouponScheduler } from '../../pipeline/scheduler.js';

export interface HealthRouteOptions {
  scheduler: Pick<CouponScheduler, 'getStatus'>;
  /** Returns true when a trivial query succeeds. */
  checkDatabase: () => boolean;
}

const startedAt = Date.now();

/**
 * Health check routes.
 * Provides service health for monitoring and orchestration.
 */
export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, opts) => {
  // GET / - Service health overview
  app.get('/', async (_request, reply) => {
    const uptimeMs = Date.now() - startedAt;
    const database: 'ok' | 'error' = opts.checkDatabase() ? 'ok' : 'error';
    const scheduler = opts.scheduler.getStatus();

    return reply.send({
      status: database === 'ok' ? 'healthy' : 'degraded',
      uptime: uptimeMs,
      uptimeHuman: formatUptime(uptimeMs),
      database,
      scheduler: {
        running: scheduler.running,
        batchInProgress: scheduler.batchInProgress,
        lastRunAt: scheduler.lastRunAt?.toISOString() ?? null,
        lastCleanupAt: scheduler.lastCleanupAt?.toISOString() ?? null,
        lastRunId: scheduler.lastSummary?.runId ?? null,
        lastOutcomes: scheduler.lastSummary?.outcomes ?? null,
      },
      timestamp: new Date().toISOString(),
    });
  });
};

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
