import { describe, it, expect } from 'vitest';
import {
  extractReferences,
  extractIdentifier,
  cleanUrl,
  isValidIdentifier,
  uniqueIdentifiers,
} from '../LinkExtractor';

const BASE = 'https://docs.example.test/wiki';

describe('LinkExtractor', () => {
  it('extracts a page link with its span', () => {
    const text = 'See https://docs.example.test/wiki/spaces/ENG/pages/12345/Setup for details';
    const refs = extractReferences(text, BASE);
    expect(refs).toEqual([
      {
        identifier: '12345',
        url: 'https://docs.example.test/wiki/spaces/ENG/pages/12345/Setup',
        start: 4,
        end: 63,
      },
    ]);
    expect(text.slice(refs[0].start, refs[0].end)).toBe(refs[0].url);
  });

  it('drops trailing sentence punctuation from the span', () => {
    const text = 'Read (https://docs.example.test/wiki/pages/77).';
    const refs = extractReferences(text, BASE);
    expect(refs).toHaveLength(1);
    expect(refs[0].url).toBe('https://docs.example.test/wiki/pages/77');
    expect(text.slice(refs[0].end)).toBe(').');
  });

  it('ignores links on other hosts or outside the base path', () => {
    const text = [
      'https://other.example.test/wiki/pages/1',
      'https://docs.example.test/blog/pages/2',
      'https://docs.example.test/wikipedia/pages/3',
      'https://docs.example.test/wiki/spaces/ENG/overview',
    ].join(' ');
    expect(extractReferences(text, BASE)).toEqual([]);
  });

  it('returns one reference per occurrence', () => {
    const link = 'https://docs.example.test/wiki/pages/9';
    const refs = extractReferences(`${link} and again ${link}`, BASE);
    expect(refs.map((r) => r.start)).toEqual([0, 49]);
    expect(uniqueIdentifiers(refs)).toEqual(['9']);
  });

  it('accepts any path when the base URL has none', () => {
    expect(extractIdentifier('https://docs.example.test/x/pages/abc-1', 'https://docs.example.test')).toBe('abc-1');
  });

  it('returns nothing for empty input', () => {
    expect(extractReferences('', BASE)).toEqual([]);
    expect(extractReferences('https://docs.example.test/wiki/pages/1', '')).toEqual([]);
  });

  it('cleans and validates helpers', () => {
    expect(cleanUrl('https://docs.example.test/wiki/pages/1!?')).toBe('https://docs.example.test/wiki/pages/1');
    expect(isValidIdentifier('page_42-b')).toBe(true);
    expect(isValidIdentifier('')).toBe(false);
    expect(isValidIdentifier('../etc')).toBe(false);
  });
});
