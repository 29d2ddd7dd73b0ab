/**
 * Tests for Enrichment Pipeline
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('@sentry/node', () => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  captureMessage: vi.fn(),
}));

import type { CompanyRecord, FetchResult, PageFetcher } from '../../types/company';
import { clearConfigCache } from '../config';
import { FetchError } from '../errors';
import {
  companyContext,
  enrichCompanies,
  existingWebsite,
  summarizeResults,
  type EnrichOptions,
} from '../enrichment';
import { getRecentErrors, resetMetrics } from '../monitoring';
import type { CandidateJudge } from '../verification';

const ACME_HTML = `
  <img src="/logo.png">
  <p>info@acme.com</p>
  <form><input name="your_name"><input type="email"><textarea></textarea></form>`;

const BOLT_HTML = `
  <title>Bolt Bakery</title>
  <a href="https://www.facebook.com/boltbakery">Follow us</a>`;

function siteFetcher(pages: Record<string, string>) {
  return vi.fn<PageFetcher>(async (url): Promise<FetchResult> =>
    url in pages
      ? { url, status: 200, html: pages[url], text: '' }
      : { url, status: 404, html: '', text: '' }
  );
}

function rejectingJudge() {
  return { judge: vi.fn<CandidateJudge['judge']>(async () => false) };
}

function baseOptions(overrides: EnrichOptions = {}): EnrichOptions {
  return {
    fetcher: siteFetcher({}),
    judge: null,
    delayMs: 0,
    searchWebsites: vi.fn(async () => []),
    searchFacebook: vi.fn(async () => null),
    ...overrides,
  };
}

describe('Enrichment Pipeline', () => {
  beforeEach(() => {
    clearConfigCache();
    resetMetrics();
    vi.clearAllMocks();
  });

  describe('existingWebsite', () => {
    it('should ignore blank spreadsheet values', () => {
      expect(existingWebsite({ name: 'A', website: 'NaN' })).toBeNull();
      expect(existingWebsite({ name: 'A', website: ' null ' })).toBeNull();
      expect(existingWebsite({ name: 'A', website: '' })).toBeNull();
      expect(existingWebsite({ name: 'A' })).toBeNull();
    });

    it('should return a trimmed website', () => {
      expect(existingWebsite({ name: 'A', website: ' https://acme.com ' })).toBe('https://acme.com');
    });
  });

  describe('companyContext', () => {
    it('should prefer an address column', () => {
      expect(companyContext({ name: ' Acme ', address: '1 Main St, Springfield', city: 'Ignored' })).toEqual({
        name: 'Acme',
        address: '1 Main St, Springfield',
      });
    });

    it('should build an address from its parts', () => {
      expect(
        companyContext({ name: 'Acme', street_address: '1 Main St', city: 'Springfield', state: '', phone: '555-0100' })
      ).toEqual({ name: 'Acme', address: '1 Main St, Springfield', phone: '555-0100' });
    });
  });

  describe('summarizeResults', () => {
    it('should count populated fields', () => {
      expect(
        summarizeResults([
          { name: 'A', website: 'https://a.com', emails: 'info@a.com', facebook_page: '' },
          { name: 'B', website: 'https://b.com', emails: '' },
          { name: 'C' },
        ])
      ).toEqual({ total: 3, websitesFound: 2, emailsFound: 1, facebookPagesFound: 0 });
    });
  });

  describe('enrichCompanies', () => {
    it('should keep an existing website and search for Facebook', async () => {
      const record: CompanyRecord = {
        name: 'Acme Dental',
        street_address: '1 Main St',
        city: 'Springfield',
        state: 'IL',
        website: 'https://acme.com',
      };
      const options = baseOptions({
        fetcher: siteFetcher({ 'https://acme.com': ACME_HTML }),
        searchFacebook: vi.fn(async () => 'https://www.facebook.com/acmedental'),
      });

      const { results } = await enrichCompanies([record], options);

      expect(results).toEqual([
        {
          ...record,
          emails: 'info@acme.com',
          contact_form: 'https://acme.com',
          logo_url: 'https://acme.com/logo.png',
          facebook_page: 'https://www.facebook.com/acmedental',
        },
      ]);
      expect(options.searchWebsites).not.toHaveBeenCalled();
      expect(options.searchFacebook).toHaveBeenCalledWith('Acme Dental', '1 Main St, Springfield, IL', {});
    });

    it('should not modify the input rows', async () => {
      const record: CompanyRecord = { name: 'Acme Dental', website: 'https://acme.com' };

      await enrichCompanies([record], baseOptions({ fetcher: siteFetcher({ 'https://acme.com': ACME_HTML }) }));

      expect(record).toEqual({ name: 'Acme Dental', website: 'https://acme.com' });
    });

    it('should take the first verified search candidate', async () => {
      const judge = rejectingJudge();
      const options = baseOptions({
        judge,
        fetcher: siteFetcher({
          'https://wrong.example.org': '<title>Bakery Directory</title>',
          'https://bolt.com': BOLT_HTML,
        }),
        searchWebsites: vi.fn(async () => ['https://wrong.example.org', 'https://bolt.com']),
      });

      const { results } = await enrichCompanies([{ name: 'Bolt Bakery', website: 'nan' }], options);

      expect(results[0]).toEqual({
        name: 'Bolt Bakery',
        website: 'https://bolt.com',
        emails: '',
        contact_form: '',
        logo_url: '',
        facebook_page: 'https://www.facebook.com/boltbakery',
      });
      expect(judge.judge).toHaveBeenCalledTimes(1);
      expect(options.searchFacebook).not.toHaveBeenCalled();
    });

    it('should fall back to the first candidate when none verifies', async () => {
      const options = baseOptions({
        judge: rejectingJudge(),
        fetcher: siteFetcher({
          'https://first.example.org': '<title>Listings</title>',
          'https://second.example.org': '<title>More listings</title>',
        }),
        searchWebsites: vi.fn(async () => ['https://first.example.org', 'https://second.example.org']),
      });

      const { results } = await enrichCompanies([{ name: 'Bolt Bakery' }], options);

      expect(results[0].website).toBe('https://first.example.org');
    });

    it('should keep the row unchanged when no website is found', async () => {
      const options = baseOptions();

      const { results, summary } = await enrichCompanies([{ name: 'Ghost Co', city: 'Nowhere' }], options);

      expect(results).toEqual([{ name: 'Ghost Co', city: 'Nowhere' }]);
      expect(summary).toEqual({ total: 1, websitesFound: 0, emailsFound: 0, facebookPagesFound: 0 });
      expect(options.searchFacebook).not.toHaveBeenCalled();
    });

    it('should drop a searched Facebook page that fails verification', async () => {
      const options = baseOptions({
        judge: rejectingJudge(),
        fetcher: siteFetcher({
          'https://acme.com': ACME_HTML,
          'https://www.facebook.com/someoneelse': '<title>Someone Else</title>',
        }),
        searchFacebook: vi.fn(async () => 'https://www.facebook.com/someoneelse'),
      });

      const { results } = await enrichCompanies([{ name: 'Acme Dental', website: 'https://acme.com' }], options);

      expect(results[0].facebook_page).toBeUndefined();
      expect(results[0].emails).toBe('info@acme.com');
    });

    it('should keep a Facebook page already in the row', async () => {
      const options = baseOptions({ fetcher: siteFetcher({ 'https://acme.com': ACME_HTML }) });

      const { results } = await enrichCompanies(
        [{ name: 'Acme Dental', website: 'https://acme.com', facebook_page: 'https://www.facebook.com/acme' }],
        options
      );

      expect(results[0].facebook_page).toBe('https://www.facebook.com/acme');
      expect(options.searchFacebook).not.toHaveBeenCalled();
    });

    it('should keep going after a failing company', async () => {
      const searchWebsites = vi
        .fn<NonNullable<EnrichOptions['searchWebsites']>>()
        .mockRejectedValueOnce(new Error('quota exceeded'))
        .mockResolvedValueOnce(['https://bolt.com']);
      const options = baseOptions({
        fetcher: siteFetcher({ 'https://bolt.com': BOLT_HTML }),
        searchWebsites,
      });

      const { results, summary } = await enrichCompanies([{ name: 'Acme Dental' }, { name: 'Bolt Bakery' }], options);

      expect(results[0]).toEqual({ name: 'Acme Dental' });
      expect(results[1].website).toBe('https://bolt.com');
      expect(summary).toEqual({ total: 2, websitesFound: 1, emailsFound: 0, facebookPagesFound: 1 });
      expect(getRecentErrors()).toHaveLength(1);
    });

    it('should treat network failures as soft errors', async () => {
      const options = baseOptions({
        searchWebsites: vi.fn(async () => {
          throw new FetchError('https://serpapi.com/search');
        }),
      });

      const { results } = await enrichCompanies([{ name: 'Acme Dental' }], options);

      expect(results).toEqual([{ name: 'Acme Dental' }]);
      expect(getRecentErrors()).toHaveLength(0);
    });

    it('should report progress and summarize each run on its own', async () => {
      const onProgress = vi.fn();
      const options = baseOptions({
        fetcher: siteFetcher({ 'https://acme.com': ACME_HTML }),
        onProgress,
      });

      const records: CompanyRecord[] = [{ name: 'Acme Dental', website: 'https://acme.com' }, { name: 'Ghost Co' }];

      const first = await enrichCompanies(records, options);
      const second = await enrichCompanies(records, baseOptions({ fetcher: siteFetcher({ 'https://acme.com': ACME_HTML }) }));

      expect(onProgress).toHaveBeenNthCalledWith(1, { completed: 1, total: 2, companyName: 'Acme Dental' });
      expect(onProgress).toHaveBeenNthCalledWith(2, { completed: 2, total: 2, companyName: 'Ghost Co' });
      expect(first.summary).toEqual({ total: 2, websitesFound: 1, emailsFound: 1, facebookPagesFound: 0 });
      expect(second.summary).toEqual(first.summary);
    });

    it('should stop before the next company once aborted', async () => {
      const controller = new AbortController();
      const options = baseOptions({
        signal: controller.signal,
        delayMs: 60_000,
        onProgress: () => controller.abort(),
      });

      const { results } = await enrichCompanies([{ name: 'Acme Dental' }, { name: 'Bolt Bakery' }], options);

      expect(results).toEqual([{ name: 'Acme Dental' }]);
    });
  });
});
