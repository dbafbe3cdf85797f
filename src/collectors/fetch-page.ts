import { CollectorError, errorMessage } from '../shared/errors.js';
import type { HttpClient } from '../shared/http-client.js';

export interface FetchedPage {
  url: string;
  statusCode: number;
  body: string;
}

/**
 * GET a page as text. Resolves for any HTTP status; a transport failure
 * rejects with a CollectorError carrying the source label.
 */
export async function fetchPage(http: HttpClient, url: string, source: string): Promise<FetchedPage> {
  try {
    const response = await http.get(url, { responseType: 'text' });
    return { url, statusCode: response.statusCode, body: response.body };
  } catch (error) {
    throw new CollectorError(
      `Failed to fetch ${url}: ${errorMessage(error)}`,
      'FETCH_FAILED',
      source,
      error,
    );
  }
}

export function resolveUrl(baseUrl: string, path: string): string {
  return new URL(path, baseUrl).toString();
}
