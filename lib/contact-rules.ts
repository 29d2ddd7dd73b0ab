/**
 * Keyword and selector tables for the contact-surface search.
 * Order matters wherever a list is scanned first-match-wins.
 */

// Tier 0: dedicated contact pages, highest priority first
export const CONTACT_PAGE_PATHS = [
  '/contact-us',
  '/contact',
  '/contact.html',
  '/contact.htm',
  '/contact.php',
  '/contact_us',
  '/get-in-touch',
  '/reach-us',
  '/hours-location',
  '/location-hours',
] as const;

// Rule a: elements that open a modal or popup contact form
export const MODAL_TRIGGER_PHRASES = [
  'send message',
  'contact us',
  'get in touch',
  'send inquiry',
  'message us',
  'contact form',
  'reach out',
  'send email',
] as const;

export const TRIGGER_ELEMENTS = 'button, a, div, span';

export const HIDDEN_CONTAINER_ELEMENTS = 'div, section';
export const HIDDEN_STYLE_PATTERN = /display.*none/i;
export const MODAL_CLASS_PATTERN = /modal|popup|overlay|dialog/i;
export const FORM_FIELD_ELEMENTS = 'form, input, textarea';

export const EMBEDDED_FORM_MARKERS = ['contact-form', 'message-form', 'inquiry-form'] as const;

// Rule b: real <form> elements
export const FORM_INPUT_ELEMENTS = 'input, textarea, select';
export const MIN_FORM_INPUTS = 2;
export const MIN_CONTACT_FORM_INPUTS = 3;
export const FORM_SKIP_WORDS = ['error!', 'close', 'login', 'sign in', 'password'] as const;
export const CONTACT_FORM_WORDS = ['contact', 'message', 'inquiry', 'question', 'feedback'] as const;
export const CONTACT_ACTION_WORDS = ['contact', 'message', 'inquiry', 'send'] as const;
export const APPOINTMENT_WORDS = ['appointment', 'schedule', 'book', 'patient'] as const;

// Rule c: appointment request buttons
export const APPOINTMENT_BUTTON_PHRASES = [
  'request appointment',
  'book appointment',
  'schedule appointment',
  'request an appointment',
  'book an appointment',
  'schedule an appointment',
] as const;

// Rule d: CMS form plugins
export const FORM_PLUGIN_SCRIPT_MARKERS = ['gform', 'gravity', 'gravityforms'] as const;
export const FORM_PLUGIN_MARKUP_MARKERS = ['wpcf7', 'contact-form-7', 'contact-form'] as const;

// Rule e: classed lead-form containers
export const CONTACT_CONTAINER_CLASSES = [
  'contact-us',
  'form__container',
  'leadform',
  'contact form',
  'pleform',
  'gform',
  'wpcf7',
] as const;

// Rule f: third-party form services embedded by iframe
export const FORM_SERVICE_DOMAINS = [
  'typeform',
  'jotform',
  'wufoo',
  'google.com/forms',
  'formstack',
] as const;

// Rule g: contact-labelled links
export const CONTACT_LINK_WORDS = ['contact', 'get-in-touch', 'reach-us'] as const;

export type ContactRule =
  | 'modal-form'
  | 'embedded-form-service'
  | 'html-form'
  | 'appointment-form'
  | 'appointment-button'
  | 'form-plugin-script'
  | 'form-plugin-markup'
  | 'contact-container'
  | 'form-service-iframe'
  | 'contact-link';

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some(needle => haystack.includes(needle));
}
