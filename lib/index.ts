/**
 * Company Enricher - Contact Extraction and Enrichment Library
 *
 * This module exports all public APIs for the company-enricher package.
 */

// ============================================================================
// Types
// ============================================================================
export type {
  Page,
  CompanyContext,
  ExtractionResult,
  VerificationDecision,
  FetchResult,
  PageFetcher,
  CompanyRecord,
  EnrichmentSummary,
} from '../types/company';

// ============================================================================
// Extraction Engine
// ============================================================================
export {
  extract,
  analyzeWebsite,
  EMPTY_RESULT,
  type ExtractOptions,
} from './extractor';

export {
  extractEmails,
  extractObfuscatedEmails,
  extractPlainEmails,
  decodeObfuscatedEmail,
  encodeObfuscatedEmail,
  isBusinessEmail,
  selectBestEmail,
} from './email-extractor';

export {
  findContactLocator,
  findContactSurface,
  detectContactSurface,
  searchContactPages,
  type ContactMatch,
  type ContactSearchOptions,
} from './contact-form-detector';

export { type ContactRule } from './contact-rules';

export {
  resolveSocialUrl,
  normalizeFacebookUrl,
  normalizeSocialUrl,
  FACEBOOK,
  type SocialPlatform,
} from './social-link-resolver';

export { locateLogo, LOGO_SELECTORS } from './logo-locator';

export { createPage, extractVisibleText, extractTitle, toAbsoluteUrl } from './page';

// ============================================================================
// Verification
// ============================================================================
export {
  verifyCandidate,
  verifyWebsiteOwnership,
  verifyFacebookPage,
  createJudgeFromConfig,
  ClaudeJudge,
  type CandidateJudge,
  type JudgeRequest,
  type VerificationOutcome,
} from './verification';

// ============================================================================
// Fetching & Search
// ============================================================================
export { fetchPage, tryFetchPage } from './http';

export {
  searchCompanyWebsites,
  searchFacebookPage,
  type SearchResult,
  type SearchOptions,
} from './search-provider';

// ============================================================================
// Pipeline & CSV
// ============================================================================
export {
  enrichCompanies,
  summarizeResults,
  type EnrichOptions,
  type EnrichmentProgress,
  type EnrichmentRun,
} from './enrichment';

export { parseCompaniesCsv, generateResultsCsv, OUTPUT_COLUMNS } from './csv';

// ============================================================================
// Configuration, Errors & Monitoring
// ============================================================================
export { loadConfig, validateConfig, clearConfigCache, type Config } from './config';

export {
  AppError,
  ValidationError,
  InvalidCsvError,
  ConfigurationError,
  FetchError,
  FetchTimeoutError,
  SearchProviderError,
  VerificationError,
  getErrorMessage,
  isNetworkError,
} from './errors';

export { logger, initMonitoring, getRecentErrors, resetMetrics } from './monitoring';
