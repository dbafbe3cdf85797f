import got, { type Got } from 'got';
import { DEFAULT_LIMITS, DEFAULT_USER_AGENT } from './constants.js';

export type HttpClient = Got;

export interface HttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Outbound client shared by collectors, validators and notifiers.
 *
 * Non-2xx responses resolve normally; callers inspect `statusCode`.
 * Only transport failures (DNS, refused connection, timeout) reject.
 * got's own retry is off; retrying is the caller's decision.
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  return got.extend({
    timeout: { request: options.timeoutMs ?? DEFAULT_LIMITS.REQUEST_TIMEOUT_MS },
    retry: { limit: 0 },
    throwHttpErrors: false,
    followRedirect: true,
    headers: {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
    },
  });
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}
