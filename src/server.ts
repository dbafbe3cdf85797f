import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import { registerRoutes, type ApiDependencies } from './api/index.js';
import { globalErrorHandler, notFoundHandler } from './api/middleware/error-handler.js';
import { getLogger } from './shared/logger.js';

const logger = getLogger('server');

export interface ServerOptions extends ApiDependencies {
  /** Requests per minute per client. Default: 60 */
  rateLimit?: number;
}

/**
 * Creates and configures the Fastify server instance.
 *
 * - Rate limiting per client IP
 * - API routes under /api/v1
 * - Global error handler with structured JSON responses
 *
 * Listening and shutdown are the caller's job.
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own pino logger
    requestTimeout: 30_000,
    bodyLimit: 1_048_576, // 1 MB
  });

  // ---------------------------------------------------------------------------
  // Rate limiting
  // ---------------------------------------------------------------------------
  await app.register(rateLimit, {
    max: options.rateLimit ?? 60,
    timeWindow: '1 minute',
  });

  // ---------------------------------------------------------------------------
  // Error handling
  // ---------------------------------------------------------------------------
  app.setErrorHandler(globalErrorHandler);
  app.setNotFoundHandler(notFoundHandler);

  // ---------------------------------------------------------------------------
  // Request logging
  // ---------------------------------------------------------------------------
  app.addHook('onRequest', (request, _reply, done) => {
    logger.debug(
      { method: request.method, url: request.url, id: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
    done();
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await registerRoutes(app, options);

  return app;
}
