/**
 * Application entry point for Coupon Relay.
 *
 * Initializes all subsystems in order:
 * 1. Environment validation
 * 2. Notifier (fatal if unconfigured)
 * 3. Database (run migrations)
 * 4. Pipeline runner and scheduler
 * 5. HTTP API
 *
 * SIGINT/SIGTERM stop the scheduler, close the server, then the database.
 */

import type { FastifyInstance } from 'fastify';
import { createDefaultCollectors } from './collectors/index.js';
import { SqliteCouponStore } from './coupons/coupon-store.js';
import { closeDb, getDb, getSqlite, pingDatabase } from './db/index.js';
import { migrate } from './db/migrate.js';
import { loadEnv, toPipelineConfig, type Env } from './env.js';
import { createNotifier, type Notifier } from './notification/index.js';
import { sweepExpired } from './pipeline/cleanup.js';
import { initEventLog } from './pipeline/event-log.js';
import { PipelineRunner } from './pipeline/runner.js';
import { CouponScheduler } from './pipeline/scheduler.js';
import { createServer } from './server.js';
import { createHttpClient } from './shared/http-client.js';
import { getLogger } from './shared/logger.js';
import { createDefaultStrategies, ValidationDispatcher } from './validation/index.js';

const logger = getLogger('server');

const FORCE_KILL_TIMEOUT_MS = 30_000;

let shutdown: ((reason: string) => Promise<void>) | undefined;

async function main(): Promise<void> {
  logger.info('Starting Coupon Relay...');

  // ---------------------------------------------------------------------------
  // 1. Validate environment
  // ---------------------------------------------------------------------------
  let env: Env;
  try {
    env = loadEnv();
    logger.info({ nodeEnv: env.NODE_ENV }, 'Environment validated');
  } catch (error) {
    logger.fatal({ err: error }, 'Environment validation failed');
    process.exit(1);
  }
  const pipelineConfig = toPipelineConfig(env);

  // ---------------------------------------------------------------------------
  // 2. Outbound clients and notifier
  // ---------------------------------------------------------------------------
  const scrapeHttp = createHttpClient({ userAgent: pipelineConfig.userAgent });
  const validationHttp = createHttpClient({
    userAgent: pipelineConfig.userAgent,
    timeoutMs: pipelineConfig.validationTimeoutMs,
  });

  let notifier: Notifier;
  try {
    notifier = createNotifier(env, scrapeHttp);
  } catch (error) {
    logger.fatal({ err: error }, 'Notifier configuration invalid');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 3. Initialize database (run migrations)
  // ---------------------------------------------------------------------------
  let store: SqliteCouponStore;
  try {
    const db = getDb(env.DATABASE_PATH);
    migrate(getSqlite());
    store = new SqliteCouponStore(db);
    logger.info({ path: env.DATABASE_PATH }, 'Database ready');
  } catch (error) {
    logger.fatal({ err: error }, 'Database initialization failed');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 4. Pipeline and scheduler
  // ---------------------------------------------------------------------------
  const runner = new PipelineRunner({
    store,
    collectors: createDefaultCollectors(pipelineConfig),
    validator: new ValidationDispatcher(createDefaultStrategies(), validationHttp),
    notifier,
    http: scrapeHttp,
    validationEnabled: pipelineConfig.validationEnabled,
    maxConcurrentCollectors: pipelineConfig.maxConcurrentCollectors,
  });

  const scheduler = new CouponScheduler(runner, () => sweepExpired(store), {
    intervalMinutes: pipelineConfig.scrapeIntervalMinutes,
  });

  // ---------------------------------------------------------------------------
  // 5. HTTP API
  // ---------------------------------------------------------------------------
  let app: FastifyInstance | undefined;
  if (env.API_ENABLED) {
    try {
      app = await createServer({
        store,
        scheduler,
        checkDatabase: () => pingDatabase(getSqlite()),
        rateLimit: env.API_RATE_LIMIT,
      });
      await app.listen({ host: '0.0.0.0', port: env.API_PORT });
      logger.info({ port: env.API_PORT }, `API listening on http://0.0.0.0:${env.API_PORT}/api/v1/health`);
    } catch (error) {
      logger.fatal({ err: error }, 'Failed to start server');
      process.exit(1);
    }
  }

  // ---------------------------------------------------------------------------
  // Graceful shutdown
  // ---------------------------------------------------------------------------
  let isShuttingDown = false;

  shutdown = async (reason: string) => {
    if (isShuttingDown) {
      logger.warn({ reason }, 'Shutdown already in progress, ignoring duplicate signal');
      return;
    }
    isShuttingDown = true;

    logger.info({ reason }, 'Initiating graceful shutdown');

    // Force-kill safety net: if shutdown takes too long, exit hard
    const forceKillTimer = setTimeout(() => {
      logger.fatal('Graceful shutdown timed out after 30s, forcing exit');
      process.exit(1);
    }, FORCE_KILL_TIMEOUT_MS);
    forceKillTimer.unref();

    // 1. Stop the scheduler (in-flight batch finishes its current candidate)
    try {
      await scheduler.stop();
    } catch (error) {
      logger.error({ err: error }, 'Error stopping scheduler');
    }

    // 2. Stop accepting HTTP requests
    if (app) {
      try {
        await app.close();
        logger.info('Fastify server closed');
      } catch (error) {
        logger.error({ err: error }, 'Error during Fastify server close');
      }
    }

    // 3. Close database connection
    try {
      closeDb();
      logger.info('Database connection closed');
    } catch (error) {
      logger.error({ err: error }, 'Error closing database');
    }

    clearTimeout(forceKillTimer);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown?.(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  initEventLog();
  scheduler.start();
  logger.info(
    {
      intervalMinutes: pipelineConfig.scrapeIntervalMinutes,
      validationEnabled: pipelineConfig.validationEnabled,
      notifier: notifier.name,
    },
    'Coupon Relay started',
  );
}

// ---------------------------------------------------------------------------
// Global error handlers
// ---------------------------------------------------------------------------

function fatalShutdown(reason: string): void {
  if (!shutdown) {
    process.exit(1);
  }
  shutdown(reason).catch(() => process.exit(1));
}

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ err: error }, 'Uncaught exception - initiating graceful shutdown');
  fatalShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.fatal({ err: reason }, 'Unhandled rejection - initiating graceful shutdown');
  fatalShutdown('unhandledRejection');
});

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
