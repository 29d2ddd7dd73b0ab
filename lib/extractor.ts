/**
 * Website analysis entry point
 * Runs the email, contact, social and logo extractors over one page.
 */

import type { CompanyContext, ExtractionResult, FetchResult, Page, PageFetcher } from '../types/company';
import { loadConfig } from './config';
import { findContactLocator } from './contact-form-detector';
import { extractEmails } from './email-extractor';
import { getErrorMessage } from './errors';
import { fetchPage } from './http';
import { locateLogo } from './logo-locator';
import { logger } from './monitoring';
import { createPage } from './page';
import { resolveSocialUrl } from './social-link-resolver';

export interface ExtractOptions {
  fetcher?: PageFetcher;
  timeoutMs?: number;
}

export const EMPTY_RESULT: ExtractionResult = Object.freeze({ emails: Object.freeze([]) });

/**
 * Extract the contact surface of a fetched homepage. Only the classifier's
 * dedicated-page tier fetches anything.
 */
export async function extract(
  page: Page,
  context: CompanyContext,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const fetcher = options.fetcher ?? fetchPage;

  const emails = extractEmails(page.html);
  const contactLocator = await findContactLocator(page, {
    fetcher,
    companyName: context.name,
    timeoutMs: options.timeoutMs,
  });
  const socialUrl = resolveSocialUrl(page);
  const logoUrl = locateLogo(page);

  return Object.freeze({
    emails: Object.freeze(emails),
    ...(contactLocator ? { contactLocator } : {}),
    ...(socialUrl ? { socialUrl } : {}),
    ...(logoUrl ? { logoUrl } : {}),
  });
}

/**
 * Fetch a homepage and extract from it. Unreachable sites yield an empty result.
 */
export async function analyzeWebsite(
  websiteUrl: string,
  context: CompanyContext,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  if (!websiteUrl) return EMPTY_RESULT;

  const fetcher = options.fetcher ?? fetchPage;

  let response: FetchResult;
  try {
    response = await fetcher(websiteUrl, loadConfig().fetch.pageTimeoutMs);
  } catch (error) {
    logger.warn('Error analyzing website', { websiteUrl, error: getErrorMessage(error) });
    return EMPTY_RESULT;
  }

  if (response.status < 200 || response.status >= 300) {
    logger.warn('Website returned an error status', { websiteUrl, status: response.status });
    return EMPTY_RESULT;
  }

  return extract(createPage(websiteUrl, response.html, response.text), context, options);
}
