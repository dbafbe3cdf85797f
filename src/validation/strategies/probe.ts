import type { ValidationOutcome } from '../../coupons/types.js';
import { ValidatorError, errorMessage } from '../../shared/errors.js';
import type { HttpClient } from '../../shared/http-client.js';

export interface ProbeResult {
  statusCode: number;
  body: string;
}

/**
 * GET `url` on behalf of a strategy. Transport failures become a
 * ValidatorError named after the strategy.
 */
export async function probe(http: HttpClient, url: string, validator: string): Promise<ProbeResult> {
  try {
    const response = await http.get(url, { responseType: 'text' });
    return { statusCode: response.statusCode, body: response.body };
  } catch (error) {
    throw new ValidatorError(
      `Failed to fetch ${url}: ${errorMessage(error)}`,
      'PROBE_FAILED',
      validator,
      error,
    );
  }
}

export function outcome(isValid: boolean, message: string): ValidationOutcome {
  return { isValid, message, validatedAt: new Date() };
}
