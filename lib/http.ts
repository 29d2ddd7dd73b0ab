/**
 * HTTP page fetcher
 * Single GET per call, no retries. Non-2xx responses are returned, not thrown.
 */

import type { FetchResult, PageFetcher } from '../types/company';
import { loadConfig } from './config';
import { FetchError, FetchTimeoutError, getErrorMessage } from './errors';
import { logger } from './monitoring';
import { extractVisibleText } from './page';

/**
 * Fetch with timeout and a browser-like user agent
 */
export const fetchPage: PageFetcher = async (url: string, timeoutMs?: number): Promise<FetchResult> => {
  const config = loadConfig();
  const timeout = timeoutMs ?? config.fetch.pageTimeoutMs;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': config.fetch.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
      },
      redirect: 'follow',
    });

    const html = await response.text();

    return {
      url: response.url || url,
      status: response.status,
      html,
      text: extractVisibleText(html),
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new FetchTimeoutError(url, timeout);
    }
    throw new FetchError(url, error instanceof Error ? error : new Error(String(error)));
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Fetch that turns network failures into null, for callers that treat them as absent data
 */
export async function tryFetchPage(
  fetcher: PageFetcher,
  url: string,
  timeoutMs?: number
): Promise<FetchResult | null> {
  try {
    return await fetcher(url, timeoutMs);
  } catch (error) {
    logger.debug('Fetch failed', { url, error: getErrorMessage(error) });
    return null;
  }
}
