import { describe, it, expect } from 'vitest';
import { redactSecrets, redactObjectSecrets, describeError } from './security';

describe('redactSecrets', () => {
  it('should redact bearer tokens', () => {
    const header = 'Bearer abcdefghij0123456789KLMN';
    const result = redactSecrets(header);
    expect(result).toBe('Bear****KLMN');
  });

  it('should redact long token-like runs inside a sentence', () => {
    const result = redactSecrets('stored token abcdefghijklmnopqrstuvwxyz012345 for later');
    expect(result).toBe('stored token abcd****2345 for later');
  });

  it('should redact token query parameters', () => {
    const result = redactSecrets('https://docs.example.test/pages/42?token=secret123456');
    expect(result).toBe('https://docs.example.test/pages/42?toke****3456');
  });

  it('should not redact ordinary text', () => {
    const normalString = 'Fetched page 12345 in 40ms';
    expect(redactSecrets(normalString)).toBe(normalString);
  });

  it('should handle empty strings', () => {
    expect(redactSecrets('')).toBe('');
  });

  it('should handle null/undefined and non-strings', () => {
    expect(redactSecrets(null)).toBe('');
    expect(redactSecrets(undefined)).toBe('');
    expect(redactSecrets(42)).toBe('42');
  });
});

describe('redactObjectSecrets', () => {
  it('should redact sensitive keys and leave the rest', () => {
    const obj = {
      token: 'test-secret',
      baseUrl: 'https://docs.example.test',
      nested: {
        encryptionKey: { raw: 'x' },
        normal: 'another normal value',
      },
    };

    const result = redactObjectSecrets(obj);
    expect(result).toEqual({
      token: 'test****cret',
      baseUrl: 'https://docs.example.test',
      nested: {
        encryptionKey: '[REDACTED]',
        normal: 'another normal value',
      },
    });
  });

  it('should handle non-objects', () => {
    expect(redactObjectSecrets('string')).toBe('string');
    expect(redactObjectSecrets(123)).toBe(123);
    expect(redactObjectSecrets(null)).toBe(null);
    expect(redactObjectSecrets(undefined)).toBe(undefined);
  });
});

describe('describeError', () => {
  it('formats errors with their name', () => {
    expect(describeError(new TypeError('bad input'))).toBe('TypeError: bad input');
  });

  it('stringifies non-error values', () => {
    expect(describeError('plain failure')).toBe('plain failure');
  });
});
