// Types for the linked-content pipeline: collaborators, references, outcomes and stat snapshots

import type { FetchError, ValidationError } from './errors/ContentErrors';

/**
 * The content-fetch collaborator. Given an opaque identifier, resolves with raw (usually HTML)
 * content or rejects. Implementations should honour `signal` so timeouts and disposal abort the call.
 */
export interface ContentFetchClient {
  fetchContent(identifier: string, options: { signal: AbortSignal }): Promise<string>;
}

// A located link inside a source text. Offsets are UTF-16 code unit indices, `end` exclusive.
export interface ContentReference {
  identifier: string;
  url: string;
  start: number;
  end: number;
}

export type ResolveSource = 'cache' | 'network' | 'shared';

export type ResolveOutcome =
  | { status: 'fulfilled'; content: string; source: ResolveSource }
  | { status: 'rejected'; error: FetchError | ValidationError };

export interface OptimizerMetrics {
  totalRequests: number;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRate: number; // percent, 0..100
  deduplications: number;
  errors: number;
  evictions: number;
  cacheSize: number;
  memoryUsageBytes: number;
  memoryUsageMB: number;
  memoryUtilization: number; // percent, 0..100
  pendingRequests: number;
  maxCacheSize: number;
  maxMemoryMB: number;
  cacheTtlMs: number;
  averageProcessingTimeMs: number;
  totalFetches: number;
}

export interface CacheStatistics {
  totalEntries: number;
  freshEntries: number;
  staleEntries: number;
  memoryUsageBytes: number;
  averageEntrySize: number;
}

export interface OverallDebounceMetrics {
  activeOperations: number;
  totalOperations: number;
  totalAttempts: number;
  totalSuccesses: number;
  totalErrors: number;
  totalCancellations: number;
  successRate: number; // percent, 0..100
  averageExecutionTimeMs: number;
}

export interface ProcessorCacheStats {
  totalCached: number;
  validLinks: number;
  invalidLinks: number;
  sessionContentCount: number;
  documentCount: number;
  memoryUsageBytes: number;
  memoryUsageKB: number;
  maxCacheSize: number;
  maxContentSize: number;
  performanceOptimizer?: OptimizerMetrics;
  debouncer: OverallDebounceMetrics;
}

// One processed link, kept for the processor's own bookkeeping
export interface ContentLink {
  url: string;
  identifier: string;
  content: string;
  processedAt: number;
  isValid: boolean;
  errorMessage?: string;
}

export interface ProcessOptions {
  debounce?: boolean;
  enableOptimizations?: boolean;
  documentKey?: string;
  debounceKey?: string;
}

// Cleanup contract the session registry relies on
export interface ManagedProcessor {
  clearAllData(): void;
  clearCache(): void;
  getCacheStats(): ProcessorCacheStats;
  isMemoryUsageHigh(): boolean;
}

export interface ProcessorRegistry {
  registerProcessor(processor: ManagedProcessor): void;
  unregisterProcessor(processor: ManagedProcessor): void;
}
