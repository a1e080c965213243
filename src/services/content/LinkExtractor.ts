// Finds links into the configured content repository inside free-form text

import type { ContentReference } from './types';

// Identifiers are opaque page ids or slugs
export const IDENTIFIER_PATTERN = /^[A-Za-z0-9_-]+$/;

const URL_CANDIDATE = /https?:\/\/[^\s<>"'`]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}>]+$/;
const PAGE_SEGMENT = /\/pages\/([A-Za-z0-9_-]+)(?:\/|$)/;

export function isValidIdentifier(identifier: string): boolean {
  return IDENTIFIER_PATTERN.test(identifier);
}

/**
 * Strip sentence punctuation that a URL candidate swallowed ("see https://x/pages/1.").
 */
export function cleanUrl(url: string): string {
  return url.replace(TRAILING_PUNCTUATION, '');
}

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Identifier of a repository link, or null when the URL is not under `baseUrl`
 * or has no `/pages/<id>` segment.
 */
export function extractIdentifier(url: string, baseUrl: string): string | null {
  const target = parseUrl(url);
  const base = parseUrl(baseUrl);
  if (!target || !base) return null;
  if (target.host !== base.host) return null;

  const basePath = base.pathname.replace(/\/+$/, '');
  if (basePath && target.pathname !== basePath && !target.pathname.startsWith(`${basePath}/`)) {
    return null;
  }

  const match = PAGE_SEGMENT.exec(target.pathname.slice(basePath.length));
  return match ? match[1] : null;
}

/**
 * Every repository link in `text`, in order of appearance. Repeated links yield one
 * reference per occurrence so each span can be substituted.
 */
export function extractReferences(text: string, baseUrl: string): ContentReference[] {
  if (!text || !baseUrl) return [];

  const refs: ContentReference[] = [];
  for (const match of text.matchAll(URL_CANDIDATE)) {
    const start = match.index ?? 0;
    const url = cleanUrl(match[0]);
    const identifier = extractIdentifier(url, baseUrl);
    if (identifier) {
      refs.push({ identifier, url, start, end: start + url.length });
    }
  }
  return refs;
}

// Distinct identifiers, first-seen order
export function uniqueIdentifiers(refs: readonly ContentReference[]): string[] {
  return Array.from(new Set(refs.map((r) => r.identifier)));
}
