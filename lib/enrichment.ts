/**
 * Enrichment Pipeline
 *
 * Walks a company list one row at a time: finds or keeps the website,
 * analyzes the homepage, then looks for a Facebook page when the site has
 * none. A failure in one company never stops the run.
 */

import type { CompanyContext, CompanyRecord, EnrichmentSummary, PageFetcher } from '../types/company';
import { loadConfig } from './config';
import { getErrorMessage, isNetworkError } from './errors';
import { analyzeWebsite } from './extractor';
import { fetchPage } from './http';
import { logger } from './monitoring';
import { existingWebsiteSchema } from './schemas/company';
import { searchCompanyWebsites, searchFacebookPage, type SearchOptions } from './search-provider';
import {
  createJudgeFromConfig,
  verifyFacebookPage,
  verifyWebsiteOwnership,
  type CandidateJudge,
} from './verification';

// ============ Types ============

export interface EnrichmentProgress {
  completed: number;
  total: number;
  companyName: string;
}

export interface EnrichOptions {
  fetcher?: PageFetcher;
  /** Omit to build one from configuration; pass null to skip verification */
  judge?: CandidateJudge | null;
  search?: SearchOptions;
  searchWebsites?: (companyName: string, options?: SearchOptions) => Promise<string[]>;
  searchFacebook?: (companyName: string, address?: string, options?: SearchOptions) => Promise<string | null>;
  delayMs?: number;
  signal?: AbortSignal;
  onProgress?: (progress: EnrichmentProgress) => void;
}

export interface EnrichmentRun {
  results: CompanyRecord[];
  summary: EnrichmentSummary;
}

interface Collaborators {
  fetcher: PageFetcher;
  judge: CandidateJudge | null;
  search: SearchOptions;
  searchWebsites: NonNullable<EnrichOptions['searchWebsites']>;
  searchFacebook: NonNullable<EnrichOptions['searchFacebook']>;
}

// ============ Helpers ============

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Website already present in the row, or null for blank spreadsheet cells
 */
export function existingWebsite(record: CompanyRecord): string | null {
  const parsed = existingWebsiteSchema.safeParse(record.website ?? '');
  return parsed.success ? parsed.data : null;
}

export function companyContext(record: CompanyRecord): CompanyContext {
  const address =
    record.address?.trim() ||
    [record.street_address, record.city, record.state]
      .map(part => part?.trim())
      .filter(Boolean)
      .join(', ');
  const phone = record.phone?.trim();

  return {
    name: record.name.trim(),
    ...(address ? { address } : {}),
    ...(phone ? { phone } : {}),
  };
}

export function summarizeResults(results: readonly CompanyRecord[]): EnrichmentSummary {
  return {
    total: results.length,
    websitesFound: results.filter(r => Boolean(r.website)).length,
    emailsFound: results.filter(r => Boolean(r.emails)).length,
    facebookPagesFound: results.filter(r => Boolean(r.facebook_page)).length,
  };
}

// ============ Per-Company Steps ============

async function resolveWebsite(
  record: CompanyRecord,
  context: CompanyContext,
  deps: Collaborators
): Promise<string | null> {
  const existing = existingWebsite(record);
  if (existing) {
    logger.info('Using existing website', { company: context.name, website: existing });
    return existing;
  }

  const candidates = await deps.searchWebsites(context.name, deps.search);
  if (candidates.length === 0) return null;

  for (const candidate of candidates) {
    const outcome = await verifyWebsiteOwnership(candidate, context, {
      judge: deps.judge,
      fetcher: deps.fetcher,
    });
    if (outcome.accepted) {
      logger.info('Found website', { company: context.name, website: candidate, reason: outcome.reason });
      return candidate;
    }
  }

  logger.info('No candidate verified, using first search result', { company: context.name, website: candidates[0] });
  return candidates[0];
}

async function findFacebookPage(context: CompanyContext, deps: Collaborators): Promise<string | null> {
  const candidate = await deps.searchFacebook(context.name, context.address, deps.search);
  if (!candidate) return null;

  const outcome = await verifyFacebookPage(candidate, context, {
    judge: deps.judge,
    fetcher: deps.fetcher,
  });
  if (!outcome.accepted) {
    logger.info('Facebook page failed verification', { company: context.name, facebookPage: candidate, reason: outcome.reason });
    return null;
  }
  return candidate;
}

/**
 * Enrich one row. The input row is copied, never modified.
 */
async function enrichCompany(record: CompanyRecord, deps: Collaborators): Promise<CompanyRecord> {
  const result: CompanyRecord = { ...record };
  const context = companyContext(record);

  const website = await resolveWebsite(record, context, deps);
  if (!website) {
    logger.info('No website found', { company: context.name });
    return result;
  }
  result.website = website;

  const analysis = await analyzeWebsite(website, context, { fetcher: deps.fetcher });
  result.emails = analysis.emails.join(', ');
  result.contact_form = analysis.contactLocator ?? '';
  result.logo_url = analysis.logoUrl ?? '';

  if (analysis.socialUrl) {
    result.facebook_page = analysis.socialUrl;
  }

  if (!result.facebook_page) {
    const facebookPage = await findFacebookPage(context, deps);
    if (facebookPage) result.facebook_page = facebookPage;
  }

  return result;
}

// ============ Batch ============

/**
 * Enrich companies sequentially with a pause between them. An aborted
 * signal stops the run before the next company starts.
 */
export async function enrichCompanies(
  records: readonly CompanyRecord[],
  options: EnrichOptions = {}
): Promise<EnrichmentRun> {
  const deps: Collaborators = {
    fetcher: options.fetcher ?? fetchPage,
    judge: options.judge === undefined ? createJudgeFromConfig() : options.judge,
    search: options.search ?? {},
    searchWebsites: options.searchWebsites ?? searchCompanyWebsites,
    searchFacebook: options.searchFacebook ?? searchFacebookPage,
  };
  const delayMs = options.delayMs ?? loadConfig().pipeline.delayMs;
  const results: CompanyRecord[] = [];

  for (let i = 0; i < records.length; i++) {
    if (options.signal?.aborted) {
      logger.warn('Enrichment aborted', { completed: results.length, total: records.length });
      break;
    }

    const record = records[i];
    let result: CompanyRecord;
    try {
      result = await enrichCompany(record, deps);
    } catch (error) {
      if (isNetworkError(error)) {
        logger.warn('Network error processing company', { company: record.name, error: getErrorMessage(error) });
      } else {
        logger.error('Error processing company', error, { company: record.name });
      }
      result = { ...record };
    }

    results.push(result);
    options.onProgress?.({ completed: i + 1, total: records.length, companyName: record.name });

    if (i < records.length - 1) {
      await sleep(delayMs, options.signal);
    }
  }

  return { results, summary: summarizeResults(results) };
}
