/**
 * Sanitization helpers for external content (RSS items, article bodies) and logs.
 */

// Characters that could be used for log injection
const LOG_DANGEROUS_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f]/g;

// Tags whose end marks a paragraph or line break in the rendered page
const BLOCK_BOUNDARY = /<\/?(?:p|div|br|li|ul|ol|h[1-6]|blockquote|section|article|header|footer|tr|table)\b[^>]*>/gi;

const NAMED_ENTITIES: Record<string, string> = {
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#039;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
  '&#x27;': "'",
  '&#x2F;': '/',
  '&mdash;': '—',
  '&ndash;': '–',
  '&hellip;': '…',
  '&rsquo;': '’',
  '&lsquo;': '‘',
  '&rdquo;': '”',
  '&ldquo;': '“',
};

/**
 * Sanitize input for safe logging (prevents log injection/forging)
 */
export function sanitizeForLog(input: string): string {
  if (!input) {
    return '';
  }

  return input
    .replace(LOG_DANGEROUS_CHARS, '')
    // Replace newlines with escaped versions for single-line logging
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    // Limit length to prevent log flooding
    .substring(0, 1000);
}

function decodeCodePoint(code: number): string {
  if (code === 9 || code === 10 || code === 13) return String.fromCodePoint(code);
  if (code < 32 || (code >= 127 && code < 160) || code > 0x10ffff) return '';
  return String.fromCodePoint(code);
}

/**
 * Strip markup from external HTML while keeping paragraph boundaries as newlines.
 * Script/style bodies, event handlers and javascript:/data: URLs are removed first.
 */
export function sanitizeHtml(html: string): string {
  if (!html) {
    return '';
  }

  let text = html
    // Remove script tags and their contents
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    // Remove style tags and their contents
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    // Remove on* event handlers
    .replace(/\s+on\w+\s*=\s*["'][^"']*["']/gi, '')
    .replace(/\s+on\w+\s*=\s*[^\s>]*/gi, '')
    // Remove javascript: and data: URLs
    .replace(/\b(?:href|src)\s*=\s*["']?\s*(?:javascript|data):[^"'\s>]*/gi, '')
    .replace(BLOCK_BOUNDARY, '\n')
    // Remove all remaining HTML tags
    .replace(/<[^>]*>/g, '');

  for (const [entity, char] of Object.entries(NAMED_ENTITIES)) {
    text = text.replace(new RegExp(entity, 'gi'), char);
  }
  text = text
    .replace(/&#(\d+);/g, (_, code: string) => decodeCodePoint(parseInt(code, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (_, code: string) => decodeCodePoint(parseInt(code, 16)))
    // Decoded last so "&amp;lt;" stays "&lt;"
    .replace(/&amp;/gi, '&');

  return text
    .replace(/[ \t\f\v\u00a0]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
