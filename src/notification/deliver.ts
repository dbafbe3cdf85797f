import { DEFAULT_LIMITS } from '../shared/constants.js';
import { NotificationError, errorMessage } from '../shared/errors.js';
import type { HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { retry } from '../shared/retry.js';
import type { DeliveryOptions } from './types.js';

const log = getLogger('notification', { component: 'deliver' });

const RATE_LIMITED = 429;

/**
 * Only a 429 is retried in place: the channel refused the message. A 5xx,
 * a timeout or a reset may follow an accepted post, so those are left to
 * the next batch's unposted sweep.
 */
export function isRetryableDelivery(error: unknown): boolean {
  return error instanceof NotificationError && error.httpStatus === RATE_LIMITED;
}

export interface JsonPost {
  channel: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
}

/**
 * POST a JSON body. Rate-limited attempts are retried with backoff; any
 * other failure rejects at once.
 */
export async function postJsonWithRetry(
  http: HttpClient,
  post: JsonPost,
  options: DeliveryOptions = {},
): Promise<void> {
  await retry(
    async () => {
      let statusCode: number;
      let responseBody: string;
      try {
        const response = await http.post(post.url, {
          json: post.body,
          headers: post.headers,
          responseType: 'text',
        });
        statusCode = response.statusCode;
        responseBody = response.body;
      } catch (error) {
        throw new NotificationError(
          `${post.channel} delivery failed: ${errorMessage(error)}`,
          'DELIVERY_FAILED',
          post.channel,
          undefined,
          error,
        );
      }

      if (statusCode < 200 || statusCode >= 300) {
        throw new NotificationError(
          `${post.channel} returned ${statusCode}: ${responseBody.slice(0, 200)}`,
          statusCode === RATE_LIMITED ? 'RATE_LIMITED' : 'DELIVERY_REJECTED',
          post.channel,
          statusCode,
        );
      }
    },
    {
      maxAttempts: options.maxAttempts ?? DEFAULT_LIMITS.NOTIFY_MAX_ATTEMPTS,
      baseDelayMs: options.baseDelayMs ?? 1000,
      maxDelayMs: 5000,
      backoffMultiplier: 2,
      shouldRetry: isRetryableDelivery,
      onRetry: (error, attempt, delayMs) => {
        log.warn(
          { channel: post.channel, attempt, delayMs, error: error.message },
          'Retrying notification delivery',
        );
      },
    },
  );
}
