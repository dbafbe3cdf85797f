import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, ValidationError } from '../../shared/errors.js';
import { getLogger } from '../../shared/logger.js';

const logger = getLogger('server', { component: 'error-handler' });

interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Maps known AppError subclasses to HTTP status codes. Falls back to
 * the error's own statusCode when available, or 500 for unknown errors.
 */
function resolveStatusCode(error: FastifyError | Error): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }

  // Fastify's own errors (body parsing, rate limiting) carry a statusCode
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    if (error.statusCode >= 400 && error.statusCode < 600) {
      return error.statusCode;
    }
  }

  return 500;
}

/**
 * Extracts a machine-readable error code from the error.
 */
function resolveErrorCode(error: FastifyError | Error, statusCode: number): string {
  if (error instanceof AppError) {
    return error.code;
  }
  if (statusCode === 429) {
    return 'RATE_LIMITED';
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'INTERNAL_ERROR';
}

/**
 * Builds the user-facing error message. In production, internal errors
 * get a generic message to avoid leaking implementation details.
 */
function resolveMessage(error: Error, statusCode: number): string {
  if (error instanceof AppError) {
    return error.message;
  }
  if (statusCode >= 500 && process.env['NODE_ENV'] === 'production') {
    return 'An unexpected error occurred';
  }
  return error.message;
}

/**
 * Global Fastify error handler. Registered as `app.setErrorHandler()`.
 * Every error leaves as `{ error: { code, message, details? } }`.
 */
export function globalErrorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  const statusCode = resolveStatusCode(error);
  const code = resolveErrorCode(error, statusCode);
  const message = resolveMessage(error, statusCode);

  const logContext = {
    err: error,
    statusCode,
    code,
    requestId: request.id,
    method: request.method,
    url: request.url,
  };

  if (statusCode >= 500) {
    logger.error(logContext, `Server error: ${message}`);
  } else {
    logger.warn(logContext, `Client error: ${message}`);
  }

  const body: ErrorResponseBody = {
    error: {
      code,
      message,
    },
  };

  if (error instanceof ValidationError) {
    body.error.details = error.details;
  } else if ('validation' in error && error.validation) {
    body.error.details = error.validation;
  }

  void reply.status(statusCode).send(body);
}

/** 404 for unknown routes, in the same envelope. */
export function notFoundHandler(_request: FastifyRequest, reply: FastifyReply): void {
  void reply.status(404).send({
    error: { code: 'NOT_FOUND', message: 'Resource not found' },
  });
}
