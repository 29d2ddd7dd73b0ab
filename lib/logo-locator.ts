/**
 * Logo Locator
 * First image matching the selector list, resolved to an absolute URL.
 * Only the first element per selector counts; without a `src` the next
 * selector is tried.
 */

import type { Page } from '../types/company';
import { loadDocument, toAbsoluteUrl } from './page';

export const LOGO_SELECTORS = [
  'img[alt*="logo" i]',
  'img[src*="logo" i]',
  'img[class*="logo" i]',
  '.logo img',
  '#logo img',
  'header img',
  '.header img',
  '.brand img',
  '.navbar-brand img',
] as const;

export function locateLogo(page: Pick<Page, 'url' | 'html'>): string | undefined {
  const $ = loadDocument(page.html);

  for (const selector of LOGO_SELECTORS) {
    const src = $(selector).first().attr('src')?.trim();
    if (src) {
      return toAbsoluteUrl(src, page.url);
    }
  }

  return undefined;
}
