/**
 * Email Extractor
 * Decodes obfuscated addresses, filters technical noise and narrows the page
 * down to a single business email.
 */

// Hex payloads of the two obfuscation markers (protected link and data attribute)
export const OBFUSCATION_PATTERNS: readonly RegExp[] = [
  /\/cdn-cgi\/l\/email-protection#([a-f0-9]+)/g,
  /data-cfemail="([a-f0-9]+)"/g,
];

const EMAIL_REGEX = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/gi;
const SINGLE_EMAIL_REGEX = /^[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}$/;

// Placeholders, monitoring vendors and asset file names
export const EXCLUDED_EMAIL_PATTERNS: readonly RegExp[] = [
  /@example\./,
  /@test\./,
  /@domain\./,
  /@email\./,
  /@(noreply|no-reply)/,
  /^(noreply|no-reply|donotreply)@/,
  /@(support|info|contact|admin)\.example/,
  /@sentry\./,
  /@sentry-next\./,
  /@sentry\.io$/,
  /@sentry\.wixpress\.com$/,
  /\.(png|jpg|jpeg|gif|svg|webp|bmp|tiff)$/,
  /^[a-f0-9]{32}@/,
  /@2x\./,
  /@3x\./,
  /_\d+x@\d+x\./,
  /@\d+x\./,
  /placeholder.*@/,
  /loader.*@/,
];

export const FAKE_PERSONAL_PATTERNS: readonly RegExp[] = [
  /^test@/,
  /^example@/,
  /^demo@/,
  /^sample@/,
];

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.svg', '.webp'];

const HASH_LOCAL_PART = /^[a-f0-9]{8,}@/;

// Local-part keywords preferred when several candidates survive, highest first
export const PREFERRED_LOCAL_PARTS = ['info', 'contact', 'hello', 'admin'] as const;

/**
 * Decode a single hex payload: first byte is the XOR key for the rest.
 * Returns null when the payload is not valid hex.
 */
export function decodeObfuscatedEmail(payload: string): string | null {
  if (payload.length < 2 || !/^[0-9a-f]+$/i.test(payload)) return null;

  const key = parseInt(payload.slice(0, 2), 16);
  let decoded = '';
  for (let i = 2; i < payload.length; i += 2) {
    decoded += String.fromCharCode(parseInt(payload.slice(i, i + 2), 16) ^ key);
  }
  return decoded;
}

/**
 * Inverse of decodeObfuscatedEmail, used to build fixtures
 */
export function encodeObfuscatedEmail(email: string, key: number): string {
  const hex = (n: number) => n.toString(16).padStart(2, '0');
  let payload = hex(key);
  for (const char of email) {
    payload += hex(char.charCodeAt(0) ^ key);
  }
  return payload;
}

export function extractObfuscatedEmails(html: string): string[] {
  const found: string[] = [];

  for (const pattern of OBFUSCATION_PATTERNS) {
    for (const match of html.matchAll(pattern)) {
      const decoded = decodeObfuscatedEmail(match[1]);
      if (!decoded) continue;
      if (decoded.includes('@') && decoded.includes('.') && decoded.length > 5) {
        const email = decoded.toLowerCase();
        if (SINGLE_EMAIL_REGEX.test(email)) {
          found.push(email);
        }
      }
    }
  }

  return found;
}

export function isBusinessEmail(candidate: string): boolean {
  const email = candidate.toLowerCase().trim();

  if (EXCLUDED_EMAIL_PATTERNS.some(pattern => pattern.test(email))) return false;
  if (FAKE_PERSONAL_PATTERNS.some(pattern => pattern.test(email))) return false;
  if (IMAGE_EXTENSIONS.some(ext => email.includes(ext))) return false;
  if (HASH_LOCAL_PART.test(email)) return false;

  const [localPart] = email.split('@');
  return email.includes('@') && email.includes('.') && localPart.length > 0;
}

export function extractPlainEmails(html: string): string[] {
  const matches = html.match(EMAIL_REGEX) || [];
  return matches
    .map(match => match.toLowerCase().trim())
    .filter(isBusinessEmail);
}

/**
 * Pick one address: a preferred local part if any candidate has one, else the first seen
 */
export function selectBestEmail(candidates: readonly string[]): string | null {
  if (candidates.length === 0) return null;
  if (candidates.length === 1) return candidates[0];

  for (const keyword of PREFERRED_LOCAL_PARTS) {
    const preferred = candidates.find(email => email.split('@')[0].includes(keyword));
    if (preferred) return preferred;
  }

  return candidates[0];
}

/**
 * Extract the best business email from raw HTML. Returns zero or one address.
 */
export function extractEmails(html: string): string[] {
  // Set keeps first-seen order, which the tie-break relies on
  const candidates = new Set<string>([
    ...extractObfuscatedEmails(html),
    ...extractPlainEmails(html),
  ]);

  const best = selectBestEmail([...candidates]);
  return best ? [best] : [];
}
