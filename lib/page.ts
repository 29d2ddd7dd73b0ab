/**
 * Page helpers shared by the extractors
 */

import * as cheerio from 'cheerio';
import type { Page } from '../types/company';

export type Document = cheerio.CheerioAPI;

/**
 * Lenient parse; malformed markup never throws.
 */
export function loadDocument(html: string): Document {
  return cheerio.load(html);
}

/**
 * Rendered text of a document, without script and style bodies
 */
export function extractVisibleText(html: string): string {
  const $ = loadDocument(html);
  $('script, style, noscript, template').remove();
  return $.root().text().replace(/\s+/g, ' ').trim();
}

export function extractTitle(html: string): string {
  const $ = loadDocument(html);
  return $('title').first().text().trim();
}

export function createPage(url: string, html: string, visibleText?: string): Page {
  return Object.freeze({
    url,
    html,
    visibleText: visibleText ?? extractVisibleText(html),
  });
}

/**
 * Resolve a possibly relative reference against a page URL.
 * Returns undefined when the result is not a valid absolute URL.
 */
export function toAbsoluteUrl(reference: string, pageUrl: string): string | undefined {
  const ref = reference.trim();
  if (!ref) return undefined;

  try {
    if (ref.startsWith('//')) {
      return new URL(`https:${ref}`).toString();
    }
    return new URL(ref, pageUrl).toString();
  } catch {
    return undefined;
  }
}

export function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}
