/**
 * HTTP transport for chapter pages and images
 *
 * Replaces the headless browser: the source site is static WordPress markup,
 * so a plain fetch returns the same content. No retries are made.
 */

import { FetchError, getErrorMessage } from "./errors.js";
import type { FetchFn } from "./types.js";

/**
 * Realistic Chrome user agent to avoid bot detection.
 * Matches a recent stable Chrome version on macOS.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Create a fetch function that sends the given user agent with every request.
 *
 * @param userAgent - User-Agent header value
 * @param fetchImpl - Underlying fetch, the global one by default
 */
export function createFetcher(userAgent: string = DEFAULT_USER_AGENT, fetchImpl: typeof fetch = fetch): FetchFn {
  return (url) => fetchImpl(url, { headers: { "User-Agent": userAgent } });
}

async function request(url: string, fetchFn: FetchFn): Promise<Response> {
  let response: Response;
  try {
    response = await fetchFn(url);
  } catch (error) {
    throw new FetchError(url, getErrorMessage(error));
  }
  if (!response.ok) {
    throw new FetchError(url, `HTTP ${response.status}`, response.status);
  }
  return response;
}

/**
 * Fetch a page as text.
 *
 * @throws {FetchError} On network failure or a non-2xx status
 */
export async function fetchText(url: string, fetchFn: FetchFn): Promise<string> {
  const response = await request(url, fetchFn);
  return await response.text();
}

/**
 * Fetch a resource as raw bytes.
 *
 * @throws {FetchError} On network failure or a non-2xx status
 */
export async function fetchBytes(url: string, fetchFn: FetchFn): Promise<Buffer> {
  const response = await request(url, fetchFn);
  return Buffer.from(await response.arrayBuffer());
}
