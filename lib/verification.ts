/**
 * Verification Adapter
 *
 * Asks an external judge whether a candidate website or Facebook page belongs
 * to a company. Website checks fail open: no judge, an unreachable page or a
 * judge error all count as accepted. Facebook checks keep the stricter
 * behaviour and reject whatever cannot be checked once a judge exists.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompanyContext, FetchResult, PageFetcher, VerificationDecision } from '../types/company';
import { loadConfig } from './config';
import { VerificationError, getErrorMessage } from './errors';
import { fetchPage } from './http';
import { logger } from './monitoring';
import { extractTitle } from './page';

export type CandidateKind = 'website' | 'facebook';

export interface JudgeRequest {
  kind: CandidateKind;
  candidateUrl: string;
  context: CompanyContext;
  title: string;
  snippet: string;
}

export interface CandidateJudge {
  judge(request: JudgeRequest): Promise<boolean>;
}

export type DecisionReason = 'no-judge' | 'name-match' | 'judge' | 'judge-error' | 'unreachable';

export interface VerificationOutcome extends VerificationDecision {
  reason: DecisionReason;
}

export interface VerifyOptions {
  judge: CandidateJudge | null;
  fetcher?: PageFetcher;
  timeoutMs?: number;
}

const WEBSITE_TEXT_LIMIT = 1500;
const WEBSITE_PROMPT_LIMIT = 800;
const FACEBOOK_TEXT_LIMIT = 2000;

export function buildJudgePrompt(request: JudgeRequest): string {
  const { context } = request;
  const identity = [
    `Company: ${context.name}`,
    context.address ? `Address: ${context.address}` : '',
    context.phone ? `Phone: ${context.phone}` : '',
  ].filter(Boolean).join('\n');

  if (request.kind === 'facebook') {
    return `Verify if this Facebook page belongs to the specific company:

${identity}

Facebook URL: ${request.candidateUrl}
Page Title: ${request.title}
Page Content: ${request.snippet}

Does this Facebook page clearly belong to "${context.name}"?
Check if the company name, address, or phone number appears on the Facebook page.
Reject generic pages or pages for different companies.

Respond with only "YES" or "NO".`;
  }

  return `Verify if this website belongs to the specific company:

${identity}

Website URL: ${request.candidateUrl}
Page Title: ${request.title}
Page Content: ${request.snippet.slice(0, WEBSITE_PROMPT_LIMIT)}

Does this website clearly belong to "${context.name}"?
Be lenient - accept if there's reasonable evidence this is the right company.
Only reject obvious mismatches or directory sites.

Respond with only "YES" or "NO".`;
}

export function isAffirmative(reply: string): boolean {
  return reply.toUpperCase().includes('YES');
}

/**
 * Judge backed by the Anthropic Messages API
 */
export class ClaudeJudge implements CandidateJudge {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(apiKey: string, options: { model: string; maxTokens: number }) {
    this.client = new Anthropic({ apiKey });
    this.model = options.model;
    this.maxTokens = options.maxTokens;
  }

  async judge(request: JudgeRequest): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: buildJudgePrompt(request) }],
      });

      const reply = response.content
        .map((b) => (b.type === 'text' ? b.text : ''))
        .join('');

      return isAffirmative(reply);
    } catch (error) {
      throw new VerificationError(request.candidateUrl, error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * Judge from configuration, or null when verification is off or no valid key exists
 */
export function createJudgeFromConfig(): CandidateJudge | null {
  const { judge } = loadConfig();
  if (!judge.enabled || !judge.anthropicApiKey) return null;

  if (!judge.anthropicApiKey.startsWith('sk-ant-')) {
    logger.warn("Invalid Anthropic API key format; keys should start with 'sk-ant-'");
    return null;
  }

  return new ClaudeJudge(judge.anthropicApiKey, { model: judge.model, maxTokens: judge.maxTokens });
}

function mentionsCompany(name: string, ...texts: string[]): boolean {
  const needle = name.trim().toLowerCase();
  if (!needle) return false;
  return texts.some(text => text.toLowerCase().includes(needle));
}

/**
 * Fail-open policy around the judge
 */
export async function verifyCandidate(
  judge: CandidateJudge | null,
  candidateUrl: string,
  context: CompanyContext,
  title: string,
  snippet: string
): Promise<VerificationOutcome> {
  if (!judge) {
    return { accepted: true, reason: 'no-judge' };
  }

  if (mentionsCompany(context.name, title, snippet)) {
    return { accepted: true, reason: 'name-match' };
  }

  try {
    const accepted = await judge.judge({ kind: 'website', candidateUrl, context, title, snippet });
    return { accepted, reason: 'judge' };
  } catch (error) {
    logger.warn('Verification error, accepting candidate', { candidateUrl, error: getErrorMessage(error) });
    return { accepted: true, reason: 'judge-error' };
  }
}

export async function verifyWebsiteOwnership(
  websiteUrl: string,
  context: CompanyContext,
  options: VerifyOptions
): Promise<VerificationOutcome> {
  if (!options.judge) {
    logger.debug('No judge available, skipping website verification', { websiteUrl });
    return { accepted: true, reason: 'no-judge' };
  }

  const fetcher = options.fetcher ?? fetchPage;
  const timeoutMs = options.timeoutMs ?? loadConfig().fetch.verifyTimeoutMs;

  let response: FetchResult;
  try {
    response = await fetcher(websiteUrl, timeoutMs);
  } catch (error) {
    logger.warn('Website unreachable during verification, accepting', { websiteUrl, error: getErrorMessage(error) });
    return { accepted: true, reason: 'unreachable' };
  }

  if (response.status !== 200) {
    logger.warn('Website returned non-200 during verification, accepting', { websiteUrl, status: response.status });
    return { accepted: true, reason: 'unreachable' };
  }

  const title = extractTitle(response.html);
  const snippet = response.text.slice(0, WEBSITE_TEXT_LIMIT);
  return verifyCandidate(options.judge, websiteUrl, context, title, snippet);
}

export async function verifyFacebookPage(
  facebookUrl: string,
  context: CompanyContext,
  options: VerifyOptions
): Promise<VerificationOutcome> {
  if (!options.judge) {
    return { accepted: true, reason: 'no-judge' };
  }

  const fetcher = options.fetcher ?? fetchPage;
  const timeoutMs = options.timeoutMs ?? loadConfig().fetch.verifyTimeoutMs;

  let response: FetchResult;
  try {
    response = await fetcher(facebookUrl, timeoutMs);
  } catch {
    return { accepted: false, reason: 'unreachable' };
  }

  if (response.status !== 200) {
    return { accepted: false, reason: 'unreachable' };
  }

  const title = extractTitle(response.html);
  const snippet = response.text.slice(0, FACEBOOK_TEXT_LIMIT);

  try {
    const accepted = await options.judge.judge({ kind: 'facebook', candidateUrl: facebookUrl, context, title, snippet });
    return { accepted, reason: 'judge' };
  } catch (error) {
    logger.warn('Facebook verification error, rejecting', { facebookUrl, error: getErrorMessage(error) });
    return { accepted: false, reason: 'judge-error' };
  }
}
