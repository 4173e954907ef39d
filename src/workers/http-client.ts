import { request } from 'undici';
import { HttpError } from '../errors.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'nba-model-ledger/1.0',
  Accept: 'application/json',
};

/** Fetches a URL and returns its decoded JSON body. */
export type JsonFetcher = (url: string) => Promise<unknown>;

export function createJsonFetcher(timeoutMs: number): JsonFetcher {
  return async (url) => {
    const { statusCode, body } = await request(url, {
      method: 'GET',
      headers: DEFAULT_HEADERS,
      maxRedirections: 3,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    });

    if (statusCode >= 400) {
      // drain so the socket can be reused
      await body.dump();
      throw new HttpError(url, statusCode);
    }

    return body.json();
  };
}
