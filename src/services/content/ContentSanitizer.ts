// Converts fetched repository HTML into plain text and wraps it in inline content markers

import { CONTENT_MARKERS } from '../../shared/constants';

const BLOCK_PATTERNS: RegExp[] = [
  /<script[^>]*>[\s\S]*?<\/script>/gi,
  /<style[^>]*>[\s\S]*?<\/style>/gi,
  /<iframe[^>]*>[\s\S]*?<\/iframe>/gi,
  /<object[^>]*>[\s\S]*?<\/object>/gi,
  /<form[^>]*>[\s\S]*?<\/form>/gi,
  /<embed[^>]*>/gi,
];

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  mdash: '—',
  ndash: '–',
  hellip: '…',
  copy: '©',
  reg: '®',
  trade: '™',
};

function decodeCodePoint(code: number, original: string): string {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return original;
  return String.fromCodePoint(code);
}

export function decodeHtmlEntities(text: string): string {
  return (
    text
      .replace(/&#(\d+);/g, (m, dec: string) => decodeCodePoint(Number.parseInt(dec, 10), m))
      .replace(/&#x([0-9a-f]+);/gi, (m, hex: string) => decodeCodePoint(Number.parseInt(hex, 16), m))
      .replace(/&([a-z]+);/gi, (m, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? m)
      // &amp; last so "&amp;lt;" stays "&lt;"
      .replace(/&amp;/gi, '&')
  );
}

/**
 * Plain text of an HTML fragment: dangerous blocks dropped, tags removed,
 * entities decoded, control characters stripped, whitespace collapsed.
 */
export function htmlToPlainText(html: string): string {
  if (!html) return '';

  let text = html;
  for (const pattern of BLOCK_PATTERNS) {
    text = text.replace(pattern, ' ');
  }
  text = text.replace(/<[^>]*>/g, ' ');
  text = decodeHtmlEntities(text);
  text = text.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, '');
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Replace every literal END marker so the embedded block has exactly one closing delimiter.
 */
export function escapeMarkerContent(text: string): string {
  return text.split(CONTENT_MARKERS.END).join(CONTENT_MARKERS.AT_SURROGATE);
}

export function buildContentMarker(rawContent: string): string {
  return `${CONTENT_MARKERS.START}${escapeMarkerContent(htmlToPlainText(rawContent))}${CONTENT_MARKERS.END}`;
}
