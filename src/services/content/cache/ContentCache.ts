/* LRU content cache bounded by entry count and aggregate memory, with TTL */

import { OPTIMIZER_DEFAULTS } from '../../../shared/constants';
import type { CacheStatistics } from '../types';

interface CacheEntry {
  key: string;
  content: string;
  sizeBytes: number;
  createdAt: number;
  lastAccessed: number;
  // Doubly-linked list pointers for LRU
  prev?: CacheEntry;
  next?: CacheEntry;
}

export interface ContentCacheLimits {
  maxEntries: number;
  maxBytes: number;
  ttlMs: number;
}

export type CacheLookup =
  | { status: 'hit'; content: string }
  | { status: 'miss' }
  | { status: 'expired' };

/**
 * UTF-16 estimate plus fixed per-entry overhead.
 */
export function estimateEntrySize(content: string): number {
  return content.length * 2 + OPTIMIZER_DEFAULTS.ENTRY_OVERHEAD_BYTES;
}

/**
 * ContentCache keeps resolved content per identifier.
 * - Evicts least-recently-used entries on insert until both limits hold
 * - An expired entry is dropped on lookup and reported as 'expired'
 * - Entries larger than MAX_ENTRY_FRACTION of maxBytes are never stored
 */
export class ContentCache {
  private limits: ContentCacheLimits;

  private map: Map<string, CacheEntry> = new Map();
  private head?: CacheEntry; // Most recently used
  private tail?: CacheEntry; // Least recently used
  private totalBytes = 0;

  constructor(limits: ContentCacheLimits) {
    this.limits = { ...limits };
  }

  public get size(): number {
    return this.map.size;
  }

  public get memoryUsageBytes(): number {
    return this.totalBytes;
  }

  public get maxBytes(): number {
    return this.limits.maxBytes;
  }

  /**
   * Look up a fresh entry. A hit moves the entry to the front of the LRU order.
   */
  public lookup(key: string, now = Date.now()): CacheLookup {
    const entry = this.map.get(key);
    if (!entry) return { status: 'miss' };
    if (this.isExpired(entry, now)) {
      this.deleteEntry(entry);
      return { status: 'expired' };
    }
    entry.lastAccessed = now;
    this.moveToFront(entry);
    return { status: 'hit', content: entry.content };
  }

  public has(key: string): boolean {
    return this.map.has(key);
  }

  /**
   * Insert or replace content. Returns the number of entries evicted to make room,
   * or -1 when the content is too large to cache.
   */
  public set(key: string, content: string, now = Date.now()): number {
    const sizeBytes = estimateEntrySize(content);
    if (sizeBytes > this.limits.maxBytes * OPTIMIZER_DEFAULTS.MAX_ENTRY_FRACTION) {
      return -1;
    }

    const existing = this.map.get(key);
    if (existing) {
      this.deleteEntry(existing);
    }

    const entry: CacheEntry = { key, content, sizeBytes, createdAt: now, lastAccessed: now };
    this.map.set(key, entry);
    this.insertAtFront(entry);
    this.totalBytes += sizeBytes;
    return this.evictIfNeeded();
  }

  public delete(key: string): boolean {
    const entry = this.map.get(key);
    if (!entry) return false;
    this.deleteEntry(entry);
    return true;
  }

  public clear(): void {
    this.map.clear();
    this.head = undefined;
    this.tail = undefined;
    this.totalBytes = 0;
  }

  /**
   * Drop every expired entry. Returns how many were removed.
   */
  public sweepExpired(now = Date.now()): number {
    let removed = 0;
    for (const entry of Array.from(this.map.values())) {
      if (this.isExpired(entry, now)) {
        this.deleteEntry(entry);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Apply new limits, evicting as needed. Returns the number of evicted entries.
   */
  public resize(limits: Partial<ContentCacheLimits>): number {
    this.limits = { ...this.limits, ...limits };
    return this.evictIfNeeded();
  }

  // Keys from most to least recently used
  public keys(): string[] {
    const out: string[] = [];
    for (let e = this.head; e; e = e.next) out.push(e.key);
    return out;
  }

  public statistics(now = Date.now()): CacheStatistics {
    let fresh = 0;
    for (const entry of this.map.values()) {
      if (!this.isExpired(entry, now)) fresh++;
    }
    const total = this.map.size;
    return {
      totalEntries: total,
      freshEntries: fresh,
      staleEntries: total - fresh,
      memoryUsageBytes: this.totalBytes,
      averageEntrySize: total === 0 ? 0 : Math.round(this.totalBytes / total),
    };
  }

  // Internal helpers

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt > this.limits.ttlMs;
  }

  private insertAtFront(entry: CacheEntry): void {
    entry.prev = undefined;
    entry.next = this.head;
    if (this.head) {
      this.head.prev = entry;
    }
    this.head = entry;
    if (!this.tail) {
      this.tail = entry;
    }
  }

  private moveToFront(entry: CacheEntry): void {
    if (this.head === entry) return;
    this.unlink(entry);
    this.insertAtFront(entry);
  }

  private unlink(entry: CacheEntry): void {
    if (entry.prev) {
      entry.prev.next = entry.next;
    }
    if (entry.next) {
      entry.next.prev = entry.prev;
    }
    if (this.head === entry) {
      this.head = entry.next;
    }
    if (this.tail === entry) {
      this.tail = entry.prev;
    }
    entry.prev = undefined;
    entry.next = undefined;
  }

  private deleteEntry(entry: CacheEntry): void {
    this.unlink(entry);
    this.map.delete(entry.key);
    this.totalBytes -= entry.sizeBytes;
  }

  private evictIfNeeded(): number {
    let evicted = 0;
    while (this.map.size > this.limits.maxEntries || this.totalBytes > this.limits.maxBytes) {
      if (!this.tail) break;
      this.deleteEntry(this.tail);
      evicted++;
    }
    return evicted;
  }
}

export default ContentCache;
