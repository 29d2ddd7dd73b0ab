/**
 * Search Provider Module
 * Google results through SerpAPI, used to find candidate websites and
 * Facebook pages for a company name.
 */

import { z } from 'zod';
import { loadConfig } from './config';
import { ConfigurationError, SearchProviderError, getErrorMessage } from './errors';
import { logger } from './monitoring';
import { normalizeFacebookUrl } from './social-link-resolver';

export interface SearchResult {
  title: string;
  snippet: string;
  url: string;
}

export interface SearchOptions {
  apiKey?: string | null;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

const SERPAPI_ENDPOINT = 'https://serpapi.com/search';

// Directories and social networks never count as a company's own website
export const EXCLUDED_WEBSITE_DOMAINS = [
  'yelp.com', 'yellowpages.com', 'facebook.com', 'linkedin.com',
  'indeed.com', 'glassdoor.com', 'manta.com', 'bbb.org',
  'mapquest.com', 'whitepages.com', 'superpages.com',
  'birdeye.com', 'eyeglassworld.com', 'healthgrades.com', 'carecredit.com',
];

const MAX_WEBSITE_CANDIDATES = 5;

const serpApiResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
        snippet: z.string().optional(),
      })
    )
    .optional(),
  error: z.string().optional(),
});

/**
 * Run one Google query through SerpAPI
 */
export async function serpApiSearch(query: string, num: number, options: SearchOptions = {}): Promise<SearchResult[]> {
  const config = loadConfig();
  const apiKey = options.apiKey ?? config.search.serpApiKey;
  if (!apiKey) {
    throw new ConfigurationError('SERPAPI_API_KEY is required for search');
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? config.search.timeoutMs;
  const params = new URLSearchParams({
    engine: 'google',
    q: query,
    api_key: apiKey,
    num: String(num),
  });

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(`${SERPAPI_ENDPOINT}?${params.toString()}`, { signal: controller.signal });
    if (!response.ok) {
      throw new SearchProviderError(`SerpAPI request failed: ${response.status}`, { status: response.status });
    }

    const parsed = serpApiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SearchProviderError('Unexpected SerpAPI response shape', { issues: parsed.error.issues.length });
    }
    if (parsed.data.error) {
      throw new SearchProviderError(`SerpAPI error: ${parsed.data.error}`);
    }

    return (parsed.data.organic_results ?? []).map(result => ({
      title: result.title ?? '',
      snippet: result.snippet ?? '',
      url: result.link ?? '',
    }));
  } catch (error) {
    if (error instanceof SearchProviderError) throw error;
    throw new SearchProviderError(`SerpAPI request failed: ${getErrorMessage(error)}`, { query });
  } finally {
    clearTimeout(timeout);
  }
}

function toRootDomain(link: string): string | null {
  try {
    const parsed = new URL(link);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return null;
  }
}

/**
 * Candidate websites for a company, reduced to scheme://host, at most five
 */
export async function searchCompanyWebsites(companyName: string, options: SearchOptions = {}): Promise<string[]> {
  try {
    const results = await serpApiSearch(`"${companyName}"`, 10, options);
    const websites: string[] = [];

    for (const result of results) {
      const link = result.url.toLowerCase();
      if (!link || EXCLUDED_WEBSITE_DOMAINS.some(domain => link.includes(domain))) continue;

      const root = toRootDomain(result.url);
      if (root) websites.push(root);
    }

    return websites.slice(0, MAX_WEBSITE_CANDIDATES);
  } catch (error) {
    logger.error('Website search failed', error, { companyName });
    return [];
  }
}

export function buildFacebookQuery(companyName: string, address?: string): string {
  let query = `"${companyName}" site:facebook.com/pages OR site:facebook.com/${companyName.replace(/ /g, '')}`;
  const firstSegment = address?.split(',')[0].trim();
  if (firstSegment) {
    query += ` "${firstSegment}"`;
  }
  return query;
}

/**
 * First Facebook result for a company, normalized; null when none
 */
export async function searchFacebookPage(
  companyName: string,
  address?: string,
  options: SearchOptions = {}
): Promise<string | null> {
  try {
    const results = await serpApiSearch(buildFacebookQuery(companyName, address), 5, options);
    const hit = results.find(result => result.url.includes('facebook.com'));
    return hit ? normalizeFacebookUrl(hit.url) : null;
  } catch (error) {
    logger.warn('Facebook search error', { companyName, error: getErrorMessage(error) });
    return null;
  }
}
