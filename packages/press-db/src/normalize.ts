import { sha256 } from './hashing.js';

// Tracking parameters to remove from URLs
const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'ref',
  'source',
]);

/**
 * Normalize a URL into the canonical key a work item is derived from
 * - Lowercase scheme and host
 * - Remove default ports
 * - Remove fragment
 * - Remove tracking parameters, sort the rest
 * - Remove trailing slash ("example.com" and "example.com/" are one item)
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim().toLowerCase();
  }

  const scheme = parsed.protocol.toLowerCase();
  const host = parsed.hostname.toLowerCase();
  let port = parsed.port;
  if ((scheme === 'https:' && port === '443') || (scheme === 'http:' && port === '80')) {
    port = '';
  }

  let pathname = parsed.pathname;
  if (pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }

  const params: [string, string][] = [];
  for (const [key, value] of parsed.searchParams) {
    if (!TRACKING_PARAMS.has(key.toLowerCase())) {
      params.push([key, value]);
    }
  }
  // Sort by key, then by value
  params.sort((a, b) => {
    if (a[0] !== b[0]) return a[0] < b[0] ? -1 : 1;
    if (a[1] !== b[1]) return a[1] < b[1] ? -1 : 1;
    return 0;
  });
  const search = params.length > 0
    ? '?' + params.map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(v)}`).join('&')
    : '';

  const portPart = port ? `:${port}` : '';
  return `${scheme}//${host}${portPart}${pathname}${search}`;
}

export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url.trim());
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Extract text content from HTML
 * Simple approach: remove script and style tags, then strip all remaining tags
 */
export function extractTextFromHtml(html: string): string {
  let text = html.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, ' ');
  text = text.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, ' ');
  text = text.replace(/<[^>]+>/g, ' ');

  // Decode common HTML entities; &amp; last so "&amp;lt;" stays "&lt;"
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#x27;|&#39;/g, "'")
    .replace(/&#x2F;/g, '/')
    .replace(/&nbsp;/g, ' ')
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(parseInt(code, 10)))
    .replace(/&amp;/g, '&');
}

/** Collapse whitespace runs to single spaces and trim. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalize text for content hashing
 * - Extract text from HTML if needed
 * - Collapse whitespace, trim, lowercase
 */
export function normalizeText(input: string, isHtml = true): string {
  const text = isHtml ? extractTextFromHtml(input) : input;
  return collapseWhitespace(text).toLowerCase();
}

export function computeContentSha256(input: string, isHtml = true): string {
  return sha256(Buffer.from(normalizeText(input, isHtml), 'utf-8'));
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}
