/**
 * Contact-Surface Classifier
 *
 * Tiered search for a usable contact mechanism on a site:
 * - Tier 0 fetches dedicated contact pages in priority order and runs the
 *   page-local rules on each; the first hit wins.
 * - Tier 1 runs the page-local rules (a-g) on the homepage.
 *
 * Every rule is exported so a single tier can be tested on its own.
 */

import type { Element } from 'domhandler';
import type { Page, PageFetcher } from '../types/company';
import {
  APPOINTMENT_BUTTON_PHRASES,
  APPOINTMENT_WORDS,
  CONTACT_ACTION_WORDS,
  CONTACT_CONTAINER_CLASSES,
  CONTACT_FORM_WORDS,
  CONTACT_LINK_WORDS,
  CONTACT_PAGE_PATHS,
  EMBEDDED_FORM_MARKERS,
  FORM_FIELD_ELEMENTS,
  FORM_INPUT_ELEMENTS,
  FORM_PLUGIN_MARKUP_MARKERS,
  FORM_PLUGIN_SCRIPT_MARKERS,
  FORM_SERVICE_DOMAINS,
  FORM_SKIP_WORDS,
  HIDDEN_CONTAINER_ELEMENTS,
  HIDDEN_STYLE_PATTERN,
  MIN_CONTACT_FORM_INPUTS,
  MIN_FORM_INPUTS,
  MODAL_CLASS_PATTERN,
  MODAL_TRIGGER_PHRASES,
  TRIGGER_ELEMENTS,
  containsAny,
  type ContactRule,
} from './contact-rules';
import { loadConfig } from './config';
import { tryFetchPage } from './http';
import { logger } from './monitoring';
import { createPage, isAbsoluteHttpUrl, loadDocument, type Document } from './page';

export interface ContactMatch {
  url: string;
  rule: ContactRule;
  tier: 0 | 1;
}

export interface ContactSearchOptions {
  fetcher: PageFetcher;
  companyName?: string;
  timeoutMs?: number;
}

interface FormSignals {
  inputCount: number;
  hasName: boolean;
  hasEmail: boolean;
  hasMessage: boolean;
}

/**
 * Text of an element whose content is a single string, directly or through one
 * wrapping child. Null for elements with mixed content.
 */
function soleText($: Document, el: Element): string | null {
  const $el = $(el);
  const children = $el.children();
  if (children.length === 0) return $el.text();
  if (children.length === 1 && $el.text().trim() === children.first().text().trim()) {
    return $el.text();
  }
  return null;
}

export function hasTriggerText($: Document, phrases: readonly string[]): boolean {
  return $(TRIGGER_ELEMENTS).toArray().some(el => {
    const text = soleText($, el);
    return text !== null && containsAny(text.toLowerCase(), phrases);
  });
}

// ============ Rule a: modal/popup forms ============

export function detectModalForm($: Document, html: string): ContactRule | null {
  if (!hasTriggerText($, MODAL_TRIGGER_PHRASES)) return null;

  const hidden = $(HIDDEN_CONTAINER_ELEMENTS).filter((_, el) =>
    HIDDEN_STYLE_PATTERN.test($(el).attr('style') ?? '')
  );
  const modals = $('div').filter((_, el) => MODAL_CLASS_PATTERN.test($(el).attr('class') ?? ''));

  const containers = [...hidden.toArray(), ...modals.toArray()];
  if (containers.some(container => $(container).find(FORM_FIELD_ELEMENTS).length > 0)) {
    return 'modal-form';
  }

  if (containsAny(html.toLowerCase(), EMBEDDED_FORM_MARKERS)) {
    return 'embedded-form-service';
  }

  return null;
}

// ============ Rule b: real HTML forms ============

function collectFormSignals($: Document, form: Element, formText: string): FormSignals {
  const inputs = $(form).find(FORM_INPUT_ELEMENTS).toArray();
  const names = inputs.map(input => ($(input).attr('name') ?? '').toLowerCase());
  const types = inputs.map(input => ($(input).attr('type') ?? '').toLowerCase());
  const placeholders = inputs.map(input => ($(input).attr('placeholder') ?? '').toLowerCase());

  const hasName =
    names.some(name => name.includes('name')) ||
    placeholders.some(ph => ph.includes('name')) ||
    formText.includes('name');

  const hasEmail =
    names.some(name => name.includes('email')) ||
    types.includes('email') ||
    placeholders.some(ph => ph.includes('email'));

  const hasMessage =
    names.some(name => name.includes('message') || name.includes('comment')) ||
    inputs.some(input => $(input).is('textarea')) ||
    placeholders.some(ph => ph.includes('message') || ph.includes('comment'));

  return { inputCount: inputs.length, hasName, hasEmail, hasMessage };
}

export function detectHtmlForm($: Document): ContactRule | null {
  let appointmentFormFound = false;

  for (const form of $('form').toArray()) {
    const formText = $(form).text().toLowerCase();
    const signals = collectFormSignals($, form, formText);

    if (signals.inputCount < MIN_FORM_INPUTS) continue;
    if (containsAny(formText, FORM_SKIP_WORDS)) continue;
    if (formText.includes('search') && signals.inputCount <= MIN_FORM_INPUTS) continue;

    if (containsAny(formText, CONTACT_FORM_WORDS) && signals.inputCount >= MIN_CONTACT_FORM_INPUTS) {
      return 'html-form';
    }

    if (signals.hasName && signals.hasEmail && signals.hasMessage && signals.inputCount >= MIN_CONTACT_FORM_INPUTS) {
      return 'html-form';
    }

    const action = ($(form).attr('action') ?? '').toLowerCase();
    if (
      action &&
      containsAny(action, CONTACT_ACTION_WORDS) &&
      signals.inputCount >= MIN_CONTACT_FORM_INPUTS &&
      (signals.hasEmail || signals.hasMessage)
    ) {
      return 'html-form';
    }

    if (containsAny(formText, APPOINTMENT_WORDS)) {
      appointmentFormFound = true;
    }
  }

  // Appointment forms count only when no contact form qualified
  return appointmentFormFound ? 'appointment-form' : null;
}

// ============ Rules c-f ============

export function detectAppointmentButton($: Document): ContactRule | null {
  return hasTriggerText($, APPOINTMENT_BUTTON_PHRASES) ? 'appointment-button' : null;
}

export function detectFormPlugin($: Document, html: string): ContactRule | null {
  const scripts = $('script').toArray();
  if (scripts.some(script => containsAny($(script).text().toLowerCase(), FORM_PLUGIN_SCRIPT_MARKERS))) {
    return 'form-plugin-script';
  }

  if (containsAny(html.toLowerCase(), FORM_PLUGIN_MARKUP_MARKERS)) {
    return 'form-plugin-markup';
  }

  return null;
}

export function detectContactContainer($: Document): ContactRule | null {
  const match = $('div').toArray().some(div => {
    const classList = ($(div).attr('class') ?? '').split(/\s+/).filter(Boolean).join(' ').toLowerCase();
    return classList.length > 0 && containsAny(classList, CONTACT_CONTAINER_CLASSES);
  });
  return match ? 'contact-container' : null;
}

export function detectFormServiceIframe($: Document): ContactRule | null {
  const match = $('iframe').toArray().some(iframe =>
    containsAny(($(iframe).attr('src') ?? '').toLowerCase(), FORM_SERVICE_DOMAINS)
  );
  return match ? 'form-service-iframe' : null;
}

// ============ Rule g: contact-labelled links ============

/**
 * Returns the locator for the first contact-form link: its href when absolute,
 * otherwise the current page URL.
 */
export function detectContactLink($: Document, currentUrl: string): string | null {
  for (const link of $('a[href]').toArray()) {
    const rawHref = ($(link).attr('href') ?? '').trim();
    const href = rawHref.toLowerCase();
    const linkText = $(link).text().toLowerCase();

    if (containsAny(href, APPOINTMENT_WORDS) || containsAny(linkText, APPOINTMENT_WORDS)) {
      continue;
    }

    const contactish = containsAny(href, CONTACT_LINK_WORDS) || containsAny(linkText, CONTACT_LINK_WORDS);
    if (contactish && `${href} ${linkText}`.includes('form')) {
      return isAbsoluteHttpUrl(rawHref) ? rawHref : currentUrl;
    }
  }

  return null;
}

/**
 * Tier 1: page-local detection in fixed sub-order a-g
 */
export function detectContactSurface(page: Pick<Page, 'url' | 'html'>): Omit<ContactMatch, 'tier'> | null {
  const $ = loadDocument(page.html);
  const html = page.html;

  const rule =
    detectModalForm($, html) ??
    detectHtmlForm($) ??
    detectAppointmentButton($) ??
    detectFormPlugin($, html) ??
    detectContactContainer($) ??
    detectFormServiceIframe($);

  if (rule) {
    return { url: page.url, rule };
  }

  const linkUrl = detectContactLink($, page.url);
  if (linkUrl) {
    return { url: linkUrl, rule: 'contact-link' };
  }

  return null;
}

/**
 * Tier 0: dedicated contact pages, fetched one at a time until one qualifies
 */
export async function searchContactPages(
  homepageUrl: string,
  options: ContactSearchOptions
): Promise<ContactMatch | null> {
  const timeoutMs = options.timeoutMs ?? loadConfig().fetch.subPageTimeoutMs;
  const baseUrl = homepageUrl.replace(/\/+$/, '');

  for (const path of CONTACT_PAGE_PATHS) {
    const url = baseUrl + path;
    const response = await tryFetchPage(options.fetcher, url, timeoutMs);
    if (!response || response.status !== 200) continue;

    const match = detectContactSurface(createPage(url, response.html, response.text));
    if (match) {
      // The dedicated page itself is the locator, whatever rule fired on it
      return { url, rule: match.rule, tier: 0 };
    }
  }

  return null;
}

export async function findContactSurface(
  homepage: Page,
  options: ContactSearchOptions
): Promise<ContactMatch | null> {
  const dedicated = await searchContactPages(homepage.url, options);
  if (dedicated) {
    logger.debug('Contact page found', { company: options.companyName, url: dedicated.url, rule: dedicated.rule });
    return dedicated;
  }

  const local = detectContactSurface(homepage);
  if (local) {
    logger.debug('Contact surface found on homepage', { company: options.companyName, url: local.url, rule: local.rule });
    return { ...local, tier: 1 };
  }

  return null;
}

/**
 * Contact locator URL, or undefined when no tier matched
 */
export async function findContactLocator(homepage: Page, options: ContactSearchOptions): Promise<string | undefined> {
  const match = await findContactSurface(homepage, options);
  return match?.url;
}
