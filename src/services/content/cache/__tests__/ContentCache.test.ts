import { describe, it, expect } from 'vitest';
import { ContentCache, estimateEntrySize } from '../ContentCache';

const MB = 1024 * 1024;

describe('ContentCache', () => {
  it('estimates entry size as two bytes per char plus overhead', () => {
    expect(estimateEntrySize('')).toBe(64);
    expect(estimateEntrySize('abcd')).toBe(72);
  });

  it('returns hits and tracks memory usage', () => {
    const cache = new ContentCache({ maxEntries: 10, maxBytes: MB, ttlMs: 1000 });
    cache.set('1', 'hello', 0);
    expect(cache.lookup('1', 10)).toEqual({ status: 'hit', content: 'hello' });
    expect(cache.lookup('2', 10)).toEqual({ status: 'miss' });
    expect(cache.memoryUsageBytes).toBe(74);
    expect(cache.size).toBe(1);
  });

  it('evicts least-recently-used entries past maxEntries', () => {
    const cache = new ContentCache({ maxEntries: 3, maxBytes: MB, ttlMs: 60_000 });
    cache.set('a', 'A', 0);
    cache.set('b', 'B', 1);
    cache.set('c', 'C', 2);
    // touch 'a' so 'b' becomes the oldest
    cache.lookup('a', 3);
    const evicted = cache.set('d', 'D', 4);

    expect(evicted).toBe(1);
    expect(cache.size).toBe(3);
    expect(cache.has('b')).toBe(false);
    expect(cache.keys()).toEqual(['d', 'a', 'c']);
  });

  it('evicts until the memory limit holds', () => {
    // each 'x'.repeat(18) entry is 100 bytes; cap 1000 bytes, 10% = 100 per entry allowed
    const cache = new ContentCache({ maxEntries: 100, maxBytes: 1000, ttlMs: 60_000 });
    let evicted = 0;
    for (let i = 0; i < 12; i++) {
      evicted += cache.set(`k${i}`, 'x'.repeat(18), i);
    }
    expect(cache.memoryUsageBytes).toBe(1000);
    expect(cache.size).toBe(10);
    expect(evicted).toBe(2);
    expect(cache.has('k0')).toBe(false);
    expect(cache.has('k1')).toBe(false);
    expect(cache.has('k2')).toBe(true);
  });

  it('refuses entries larger than a tenth of the memory cap', () => {
    const cache = new ContentCache({ maxEntries: 10, maxBytes: 1000, ttlMs: 60_000 });
    expect(cache.set('big', 'x'.repeat(19), 0)).toBe(-1);
    expect(cache.has('big')).toBe(false);
    expect(cache.memoryUsageBytes).toBe(0);
  });

  it('replacing a key does not double count memory', () => {
    const cache = new ContentCache({ maxEntries: 10, maxBytes: MB, ttlMs: 60_000 });
    cache.set('1', 'aa', 0);
    cache.set('1', 'aaaa', 1);
    expect(cache.size).toBe(1);
    expect(cache.memoryUsageBytes).toBe(72);
  });

  it('drops expired entries on lookup and sweep', () => {
    const cache = new ContentCache({ maxEntries: 10, maxBytes: MB, ttlMs: 100 });
    cache.set('old', 'o', 0);
    cache.set('new', 'n', 150);
    expect(cache.statistics(200)).toEqual({
      totalEntries: 2,
      freshEntries: 1,
      staleEntries: 1,
      memoryUsageBytes: 132,
      averageEntrySize: 66,
    });
    expect(cache.lookup('old', 200)).toEqual({ status: 'expired' });
    expect(cache.has('old')).toBe(false);
    expect(cache.sweepExpired(300)).toBe(1);
    expect(cache.size).toBe(0);
    expect(cache.memoryUsageBytes).toBe(0);
  });

  it('resize evicts down to the new limits', () => {
    const cache = new ContentCache({ maxEntries: 5, maxBytes: MB, ttlMs: 60_000 });
    ['a', 'b', 'c', 'd'].forEach((k, i) => cache.set(k, k, i));
    expect(cache.resize({ maxEntries: 2 })).toBe(2);
    expect(cache.keys()).toEqual(['d', 'c']);
  });

  it('clear empties everything', () => {
    const cache = new ContentCache({ maxEntries: 5, maxBytes: MB, ttlMs: 60_000 });
    cache.set('a', 'a', 0);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.memoryUsageBytes).toBe(0);
    expect(cache.keys()).toEqual([]);
  });
});
