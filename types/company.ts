export interface Page {
  readonly url: string;
  readonly html: string;
  readonly visibleText: string;
}

export interface CompanyContext {
  readonly name: string;
  readonly address?: string;
  readonly phone?: string;
}

export interface ExtractionResult {
  readonly emails: readonly string[];
  readonly contactLocator?: string;
  readonly socialUrl?: string;
  readonly logoUrl?: string;
}

export interface VerificationDecision {
  readonly accepted: boolean;
}

export interface FetchResult {
  readonly url: string;
  readonly status: number;
  readonly html: string;
  readonly text: string;
}

export type PageFetcher = (url: string, timeoutMs?: number) => Promise<FetchResult>;

export type CompanyRecord = Record<string, string>;

export interface EnrichmentSummary {
  total: number;
  websitesFound: number;
  emailsFound: number;
  facebookPagesFound: number;
}
