import { OPTIMIZER_DEFAULTS } from '../../../shared/constants';
import { describeError } from '../../../shared/security';
import type { PipelineSettings } from '../../../shared/types';
import { ContentCache } from '../cache/ContentCache';
import {
  CircuitOpenError,
  FetchCancelledError,
  FetchError,
  ValidationError,
  toFetchError,
} from '../errors/ContentErrors';
import { isValidIdentifier } from '../LinkExtractor';
import type {
  CacheStatistics,
  ContentFetchClient,
  OptimizerMetrics,
  ResolveOutcome,
} from '../types';
import type { CircuitBreaker } from './CircuitBreaker';
import { fetchWithTimeout } from './fetchWithTimeout';
import { runWithConcurrency } from './RequestBatcher';

export type OptimizerSettings = Omit<PipelineSettings, 'tokenStorePath'>;

export interface PerformanceOptimizerOptions extends Partial<OptimizerSettings> {
  circuitBreaker?: CircuitBreaker;
}

interface InFlightRequest {
  identifier: string;
  controller: AbortController;
  promise: Promise<ResolveOutcome>;
  settle: (outcome: ResolveOutcome) => void;
  subscribers: number;
  generation: number;
}

interface Counters {
  totalRequests: number;
  cacheHits: number;
  cacheMisses: number;
  deduplications: number;
  errors: number;
  evictions: number;
  totalFetches: number;
}

// Moving window for average fetch time
const TIMING_WINDOW = 100;
const MB = 1024 * 1024;

const emptyCounters = (): Counters => ({
  totalRequests: 0,
  cacheHits: 0,
  cacheMisses: 0,
  deduplications: 0,
  errors: 0,
  evictions: 0,
  totalFetches: 0,
});

const round2 = (n: number) => Math.round(n * 100) / 100;

/**
 * Resolves content identifiers through a bounded LRU cache, with at most one
 * outstanding fetch per identifier and concurrency-limited batch fetching.
 *
 * All bookkeeping happens synchronously between awaits, so concurrent callers
 * never observe a half-updated cache or in-flight map.
 */
export class PerformanceOptimizer {
  private settings: OptimizerSettings;
  private readonly cache: ContentCache;
  private readonly inFlight: Map<string, InFlightRequest> = new Map();
  private readonly breaker?: CircuitBreaker;

  private counters: Counters = emptyCounters();
  private fetchTimes: number[] = [];
  // Bumped by clearCache/dispose; fetches from an older generation leave no trace
  private generation = 0;
  private disposed = false;

  constructor(private readonly client: ContentFetchClient, options: PerformanceOptimizerOptions = {}) {
    const { circuitBreaker, ...overrides } = options;
    this.settings = {
      maxCacheSize: overrides.maxCacheSize ?? OPTIMIZER_DEFAULTS.MAX_CACHE_SIZE,
      maxMemoryMB: overrides.maxMemoryMB ?? OPTIMIZER_DEFAULTS.MAX_MEMORY_MB,
      cacheTtlMs: overrides.cacheTtlMs ?? OPTIMIZER_DEFAULTS.CACHE_TTL_MS,
      fetchTimeoutMs: overrides.fetchTimeoutMs ?? OPTIMIZER_DEFAULTS.FETCH_TIMEOUT_MS,
      maxConcurrentRequests: overrides.maxConcurrentRequests ?? OPTIMIZER_DEFAULTS.MAX_CONCURRENT_REQUESTS,
    };
    this.breaker = circuitBreaker;
    this.cache = new ContentCache({
      maxEntries: this.settings.maxCacheSize,
      maxBytes: this.settings.maxMemoryMB * MB,
      ttlMs: this.settings.cacheTtlMs,
    });
  }

  /**
   * Resolve one identifier: cache hit, join an in-flight fetch, or start a new one.
   * Never rejects; failures arrive as a rejected outcome.
   */
  public resolve(identifier: string): Promise<ResolveOutcome> {
    const prepared = this.prepare(identifier);
    if (prepared.pending) {
      return this.runFetch(prepared.pending).then(() => prepared.outcome);
    }
    return prepared.outcome;
  }

  /**
   * Resolve many identifiers at once. Duplicates resolve once; new fetches run with
   * at most `maxConcurrentRequests` in flight. Keys of the result follow first-seen order.
   */
  public async resolveBatch(identifiers: readonly string[]): Promise<Map<string, ResolveOutcome>> {
    const unique = Array.from(new Set(identifiers));
    const outcomes = new Map<string, Promise<ResolveOutcome>>();
    const toFetch: InFlightRequest[] = [];

    // Register every new fetch before the first await so overlapping callers join them
    for (const identifier of unique) {
      const prepared = this.prepare(identifier);
      outcomes.set(identifier, prepared.outcome);
      if (prepared.pending) toFetch.push(prepared.pending);
    }

    if (toFetch.length > 0) {
      console.debug(
        `[PerformanceOptimizer] Batch of ${unique.length}: fetching ${toFetch.length} with concurrency ${this.settings.maxConcurrentRequests}`
      );
      await runWithConcurrency(toFetch, this.settings.maxConcurrentRequests, (req) => this.runFetch(req));
    }

    const result = new Map<string, ResolveOutcome>();
    for (const [identifier, outcome] of outcomes) {
      result.set(identifier, await outcome);
    }
    return result;
  }

  /**
   * Drop cached content and reset counters. Fetches already running still settle for
   * their subscribers but no longer populate the cache.
   */
  public clearCache(): void {
    const dropped = this.cache.size;
    this.cache.clear();
    this.counters = emptyCounters();
    this.fetchTimes = [];
    // Running fetches keep deduplicating, but their results belong to the old generation
    this.generation++;
    if (dropped > 0) {
      console.debug(`[PerformanceOptimizer] Cleared ${dropped} cached entries`);
    }
  }

  public getMetrics(): OptimizerMetrics {
    const c = this.counters;
    const memoryUsageBytes = this.cache.memoryUsageBytes;
    const maxBytes = this.cache.maxBytes;
    const avg =
      this.fetchTimes.length === 0 ? 0 : this.fetchTimes.reduce((a, b) => a + b, 0) / this.fetchTimes.length;

    return {
      totalRequests: c.totalRequests,
      cacheHits: c.cacheHits,
      cacheMisses: c.cacheMisses,
      cacheHitRate: c.totalRequests === 0 ? 0 : round2((c.cacheHits / c.totalRequests) * 100),
      deduplications: c.deduplications,
      errors: c.errors,
      evictions: c.evictions,
      cacheSize: this.cache.size,
      memoryUsageBytes,
      memoryUsageMB: round2(memoryUsageBytes / MB),
      memoryUtilization: maxBytes === 0 ? 0 : round2((memoryUsageBytes / maxBytes) * 100),
      pendingRequests: this.inFlight.size,
      maxCacheSize: this.settings.maxCacheSize,
      maxMemoryMB: this.settings.maxMemoryMB,
      cacheTtlMs: this.settings.cacheTtlMs,
      averageProcessingTimeMs: Math.round(avg),
      totalFetches: c.totalFetches,
    };
  }

  public getCacheStatistics(): CacheStatistics {
    return this.cache.statistics();
  }

  /**
   * Sweep expired entries. Returns how many were removed.
   */
  public performMaintenance(): number {
    const removed = this.cache.sweepExpired();
    if (removed > 0) {
      console.debug(`[PerformanceOptimizer] Maintenance removed ${removed} expired entries`);
    }
    return removed;
  }

  /**
   * Re-apply cache limits and fetch tunables; shrinking limits evicts immediately.
   */
  public updateConfiguration(update: Partial<OptimizerSettings>): void {
    this.settings = { ...this.settings, ...update };
    this.counters.evictions += this.cache.resize({
      maxEntries: this.settings.maxCacheSize,
      maxBytes: this.settings.maxMemoryMB * MB,
      ttlMs: this.settings.cacheTtlMs,
    });
  }

  /**
   * Abort every running fetch and release all state. Subscribers receive FetchCancelledError;
   * later calls resolve to a cancelled outcome.
   */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const pending = Array.from(this.inFlight.values());
    this.inFlight.clear();
    for (const req of pending) {
      req.settle({ status: 'rejected', error: new FetchCancelledError(req.identifier, 'cancelled by dispose') });
      req.controller.abort();
    }
    this.cache.clear();
    this.counters = emptyCounters();
    this.fetchTimes = [];
    this.generation++;
    this.breaker?.reset();
  }

  public isDisposed(): boolean {
    return this.disposed;
  }

  // Internal

  /**
   * Synchronous part of a resolve: validation, cache lookup, in-flight join, or
   * registration of a new (not yet started) fetch.
   */
  private prepare(identifier: string): { outcome: Promise<ResolveOutcome>; pending?: InFlightRequest } {
    if (this.disposed) {
      return this.rejected(new FetchCancelledError(identifier, 'rejected: optimizer disposed'));
    }

    this.counters.totalRequests++;

    if (!isValidIdentifier(identifier)) {
      return this.rejected(new ValidationError('identifier', `"${identifier}" is not a valid content identifier`));
    }

    const lookup = this.cache.lookup(identifier);
    if (lookup.status === 'hit') {
      this.counters.cacheHits++;
      return { outcome: Promise.resolve<ResolveOutcome>({ status: 'fulfilled', content: lookup.content, source: 'cache' }) };
    }
    this.counters.cacheMisses++;

    const existing = this.inFlight.get(identifier);
    if (existing) {
      existing.subscribers++;
      this.counters.deduplications++;
      return {
        outcome: existing.promise.then((o): ResolveOutcome => (o.status === 'fulfilled' ? { ...o, source: 'shared' } : o)),
      };
    }

    const pending = this.register(identifier);
    return { outcome: pending.promise, pending };
  }

  private rejected(error: FetchError | ValidationError): { outcome: Promise<ResolveOutcome> } {
    return { outcome: Promise.resolve<ResolveOutcome>({ status: 'rejected', error }) };
  }

  private register(identifier: string): InFlightRequest {
    let settle: (outcome: ResolveOutcome) => void = () => undefined;
    const promise = new Promise<ResolveOutcome>((resolve) => {
      settle = resolve;
    });
    const req: InFlightRequest = {
      identifier,
      controller: new AbortController(),
      promise,
      settle,
      subscribers: 1,
      generation: this.generation,
    };
    this.inFlight.set(identifier, req);
    return req;
  }

  /**
   * Execute a registered fetch and fan the outcome out to its subscribers. Never rejects.
   */
  private async runFetch(req: InFlightRequest): Promise<void> {
    if (req.controller.signal.aborted) return;

    const { identifier } = req;
    const startedAt = Date.now();
    let outcome: ResolveOutcome;
    let fetched = false;

    try {
      this.breaker?.beforeCall(identifier);
      fetched = true;
      const content = await fetchWithTimeout(this.client, identifier, req.controller, this.settings.fetchTimeoutMs);
      this.breaker?.onSuccess(identifier);
      if (req.subscribers > 1) {
        console.debug(`[PerformanceOptimizer] Fetch for ${identifier} shared by ${req.subscribers} callers`);
      }
      outcome = { status: 'fulfilled', content, source: 'network' };
    } catch (err) {
      const error = toFetchError(identifier, err);
      if (!(error instanceof CircuitOpenError) && !(error instanceof FetchCancelledError)) {
        this.breaker?.onFailure(identifier);
      }
      outcome = { status: 'rejected', error };
    }

    if (this.inFlight.get(identifier) === req) {
      this.inFlight.delete(identifier);
    }

    if (!this.disposed && req.generation === this.generation) {
      if (fetched) {
        this.counters.totalFetches++;
        this.recordFetchTime(Date.now() - startedAt);
      }
      if (outcome.status === 'fulfilled') {
        const evicted = this.cache.set(identifier, outcome.content);
        if (evicted > 0) this.counters.evictions += evicted;
      } else {
        this.counters.errors++;
        console.warn(`[PerformanceOptimizer] Fetch failed for ${identifier}: ${describeError(outcome.error)}`);
      }
    }

    req.settle(outcome);
  }

  private recordFetchTime(ms: number): void {
    this.fetchTimes.push(ms);
    if (this.fetchTimes.length > TIMING_WINDOW) {
      this.fetchTimes.shift();
    }
  }
}

export default PerformanceOptimizer;
