/**
 * Text cleaning applied to archive values before they reach the store.
 */

const SCRIPT_OR_STYLE = /<(script|style)[^>]*?>[\s\S]*?<\/\1\s*>/gi;
const TAG = /<[^>]*>/g;

export function stripTags(text: string): string {
  return text.replace(SCRIPT_OR_STYLE, '').replace(TAG, '');
}

/**
 * Normalizes a login key: tags stripped, characters outside
 * `a-z 0-9 space _ . - @` dropped, whitespace collapsed, trimmed, lowercased.
 * Returns `''` when nothing usable is left.
 */
export function normalizeKey(raw: string): string {
  return stripTags(raw)
    .replace(/[^a-z0-9 _.\-@]/gi, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/** `''` unless the cleaned value looks like `local@domain.tld`. */
export function sanitizeEmail(raw: string): string {
  const cleaned = raw.trim().replace(/[^a-zA-Z0-9.!#$%&'*+/=?^_`{|}~@-]/g, '');
  return /^[^@]+@[^@.]+(\.[^@.]+)+$/.test(cleaned) ? cleaned : '';
}

/** `''` unless the value is an absolute http(s) URL. */
export function sanitizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    return '';
  }
  try {
    new URL(trimmed);
    return trimmed;
  } catch {
    return '';
  }
}

/** Lowercase, URL-safe slug: `Alice Smith` → `alice-smith`. */
export function slugify(raw: string): string {
  return stripTags(raw)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

/** Single-line text: tags stripped, whitespace collapsed. */
export function sanitizeText(raw: string): string {
  return stripTags(raw).replace(/\s+/g, ' ').trim();
}

/** Multi-line text: like sanitizeText, but line breaks survive. */
export function sanitizeMultiline(raw: string): string {
  return stripTags(raw)
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .join('\n')
    .trim();
}
