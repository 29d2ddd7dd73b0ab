/**
 * Social Link Resolver
 * Finds the business's Facebook page in page markup and reduces it to
 * https://www.facebook.com/<page>
 */

import type { Page } from '../types/company';
import { loadDocument } from './page';

export interface SocialPlatform {
  domain: string;
  mobileHost: string;
  canonicalHost: string;
  markupPattern: RegExp;
  shareWidgetPaths: readonly string[];
  excludedPaths: readonly string[];
  reservedSegments: readonly string[];
  directoryPrefix: string;
  minSegmentLength: number;
}

export const FACEBOOK: SocialPlatform = {
  domain: 'facebook.com',
  mobileHost: 'm.facebook.com',
  canonicalHost: 'www.facebook.com',
  markupPattern: /https?:\/\/(?:www\.)?(?:m\.)?facebook\.com\/[^\s"'<>]+/gi,
  shareWidgetPaths: ['/sharer'],
  // share widget, tracking pixel, plugin embed, auth dialog, directory listing
  excludedPaths: ['/sharer', '/tr?', '/plugins', '/dialog', '/pages'],
  reservedSegments: ['home', 'login', 'signup', 'help', 'about'],
  directoryPrefix: 'pages',
  minSegmentLength: 3,
};

/**
 * Path after the platform domain, subpaths included, with query, fragment
 * and trailing slash removed. Null when the URL is not on the platform.
 */
export function extractPagePath(url: string, platform: SocialPlatform = FACEBOOK): string | null {
  const cleaned = url.trim().split('?')[0].split('#')[0].replace(/\/+$/, '');
  const marker = `${platform.domain}/`;
  const index = cleaned.toLowerCase().lastIndexOf(marker);
  if (index === -1) return null;

  return cleaned.slice(index + marker.length) || null;
}

export function extractPageSegment(url: string, platform: SocialPlatform = FACEBOOK): string | null {
  const [segment] = (extractPagePath(url, platform) ?? '').split('/');
  return segment || null;
}

/**
 * Collapse mobile host, drop query and subpaths. Idempotent.
 */
export function normalizeSocialUrl(url: string, platform: SocialPlatform = FACEBOOK): string {
  if (!url || !url.toLowerCase().includes(platform.domain)) {
    return url;
  }

  const mobileHost = new RegExp(`(^|[/.])${platform.mobileHost.replace(/\./g, '\\.')}`, 'i');
  const withoutMobile = url.replace(mobileHost, `$1${platform.domain}`);
  const segment = extractPageSegment(withoutMobile, platform);
  return segment ? `https://${platform.canonicalHost}/${segment}` : url;
}

export function normalizeFacebookUrl(url: string): string {
  return normalizeSocialUrl(url, FACEBOOK);
}

export function collectSocialCandidates(html: string, platform: SocialPlatform = FACEBOOK): string[] {
  const $ = loadDocument(html);
  const candidates: string[] = [];

  for (const link of $('a[href]').toArray()) {
    const href = $(link).attr('href') ?? '';
    const lower = href.toLowerCase();
    if (lower.includes(platform.domain) && !platform.shareWidgetPaths.some(path => lower.includes(path))) {
      candidates.push(href);
    }
  }

  candidates.push(...(html.match(platform.markupPattern) || []));

  return candidates;
}

export function isPageCandidate(url: string, platform: SocialPlatform = FACEBOOK): boolean {
  const lower = url.toLowerCase();
  if (platform.excludedPaths.some(path => lower.includes(path))) return false;

  const path = extractPagePath(url, platform)?.toLowerCase();
  if (!path) return false;

  return (
    path.length > platform.minSegmentLength &&
    !path.startsWith(platform.directoryPrefix) &&
    !platform.reservedSegments.includes(path)
  );
}

/**
 * Canonical page URL of the first qualifying candidate, or undefined
 */
export function resolveSocialUrl(page: Pick<Page, 'html'>, platform: SocialPlatform = FACEBOOK): string | undefined {
  for (const candidate of collectSocialCandidates(page.html, platform)) {
    if (isPageCandidate(candidate, platform)) {
      return normalizeSocialUrl(candidate, platform);
    }
  }
  return undefined;
}
