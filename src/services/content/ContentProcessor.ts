import { OPTIMIZER_DEFAULTS, PROCESSOR_DEFAULTS } from '../../shared/constants';
import { describeError, redactSecrets } from '../../shared/security';
import type { ContentConfig } from '../../shared/types';
import { isConfigComplete, normalizeBaseUrl } from './config/ContentConfig';
import { buildContentMarker, htmlToPlainText } from './ContentSanitizer';
import { Debouncer } from './Debouncer';
import { toFetchError } from './errors/ContentErrors';
import { extractReferences, uniqueIdentifiers } from './LinkExtractor';
import { fetchWithTimeout } from './optimization/fetchWithTimeout';
import { PerformanceOptimizer, type PerformanceOptimizerOptions } from './optimization/PerformanceOptimizer';
import type {
  ContentFetchClient,
  ContentLink,
  ContentReference,
  ManagedProcessor,
  ProcessOptions,
  ProcessorCacheStats,
  ProcessorRegistry,
  ResolveOutcome,
} from './types';

export interface ContentProcessorOptions {
  // false: every call fetches directly, uncached
  enableOptimizations?: boolean;
  optimizer?: PerformanceOptimizerOptions;
  registry?: ProcessorRegistry;
  maxCacheSize?: number;
  maxContentSize?: number;
  linkTtlMs?: number;
  cleanupIntervalMs?: number;
  // Called once, after the processor has released everything
  onDispose?: (processor: ContentProcessor) => void;
}

interface SessionDocument {
  entries: Map<string, string>; // url -> marker, or the url itself when resolution failed
  totalBytes: number;
}

function linkSize(link: ContentLink): number {
  return (
    (link.url.length + link.identifier.length + link.content.length + (link.errorMessage?.length ?? 0)) * 2 +
    OPTIMIZER_DEFAULTS.ENTRY_OVERHEAD_BYTES
  );
}

/**
 * Replaces repository links in free-form text with inline `@conf-cnt …@` blocks.
 *
 * - Resolution goes through the PerformanceOptimizer unless optimizations are off
 * - A link whose fetch fails keeps its original text
 * - Tracks processed links and per-document session content for stats and cleanup
 */
export class ContentProcessor implements ManagedProcessor {
  private readonly optimizer?: PerformanceOptimizer;
  private readonly debouncer = new Debouncer();
  private readonly registry?: ProcessorRegistry;

  private readonly maxCacheSize: number;
  private readonly maxContentSize: number;
  private readonly linkTtlMs: number;
  private readonly fetchTimeoutMs: number;

  private readonly links: Map<string, ContentLink> = new Map();
  private readonly sessions: Map<string, SessionDocument> = new Map();
  private readonly directFetches: Set<AbortController> = new Set();
  private readonly debounceOwners: Map<string, string> = new Map(); // debounce key -> document of its pending call
  private memoryUsageBytes = 0;

  private cleanupTimer?: ReturnType<typeof setInterval>;
  private readonly onDispose?: (processor: ContentProcessor) => void;
  private disposed = false;

  constructor(private readonly client: ContentFetchClient, options: ContentProcessorOptions = {}) {
    if (options.enableOptimizations !== false) {
      this.optimizer = new PerformanceOptimizer(client, options.optimizer);
    }
    this.maxCacheSize = options.maxCacheSize ?? PROCESSOR_DEFAULTS.MAX_CACHE_SIZE;
    this.maxContentSize = options.maxContentSize ?? PROCESSOR_DEFAULTS.MAX_CONTENT_SIZE;
    this.linkTtlMs = options.linkTtlMs ?? PROCESSOR_DEFAULTS.LINK_TTL_MS;
    this.fetchTimeoutMs = options.optimizer?.fetchTimeoutMs ?? OPTIMIZER_DEFAULTS.FETCH_TIMEOUT_MS;

    this.cleanupTimer = setInterval(
      () => this.performPeriodicCleanup(),
      options.cleanupIntervalMs ?? PROCESSOR_DEFAULTS.CLEANUP_INTERVAL_MS
    );
    // Never keep the process alive for housekeeping
    this.cleanupTimer.unref?.();

    this.onDispose = options.onDispose;
    this.registry = options.registry;
    this.registry?.registerProcessor(this);
  }

  /**
   * Substitute every repository link in `text` with its content.
   * Returns `text` unchanged when it is empty, the config is incomplete, or a
   * debounced call is superseded by a newer one.
   */
  public async process(text: string, config: ContentConfig, options: ProcessOptions = {}): Promise<string> {
    if (this.disposed || !text || !isConfigComplete(config)) {
      return text;
    }

    const documentKey = options.documentKey ?? PROCESSOR_DEFAULTS.DEFAULT_DOCUMENT_KEY;
    const useOptimizer = options.enableOptimizations !== false && this.optimizer !== undefined;
    const refs = this.extractReferences(text, config.baseUrl);

    if (!options.debounce) {
      return this.substitute(text, refs, documentKey, useOptimizer);
    }

    const key = options.debounceKey ?? `process:${documentKey}`;
    this.debounceOwners.set(key, documentKey);
    const outcome = await this.debouncer.adaptiveDebounce(
      key,
      text,
      () => this.substitute(text, refs, documentKey, useOptimizer),
      { referenceCount: refs.length }
    );
    if (!this.debouncer.isPending(key)) {
      this.debounceOwners.delete(key);
    }

    if (outcome.status === 'fired') return outcome.value;
    if (outcome.status === 'failed') {
      console.warn(`[ContentProcessor] Debounced processing failed: ${describeError(outcome.error)}`);
    }
    return text;
  }

  public extractReferences(text: string, baseUrl: string): ContentReference[] {
    return extractReferences(text, normalizeBaseUrl(baseUrl));
  }

  /**
   * Session content for a link. Without `documentKey`, searches every open document.
   */
  public getSessionContent(sourceUrl: string, documentKey?: string): string | undefined {
    if (documentKey !== undefined) {
      return this.sessions.get(documentKey)?.entries.get(sourceUrl);
    }
    for (const doc of this.sessions.values()) {
      const value = doc.entries.get(sourceUrl);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  public clearSessionContent(documentKey?: string): void {
    if (documentKey !== undefined) {
      this.sessions.delete(documentKey);
      return;
    }
    this.sessions.clear();
  }

  /**
   * Forget a document's session content and drop its pending debounced calls,
   * including those made under a custom debounce key.
   */
  public closeDocument(documentKey: string): void {
    this.debouncer.cancel(`process:${documentKey}`);
    for (const [key, owner] of Array.from(this.debounceOwners)) {
      if (owner !== documentKey) continue;
      this.debouncer.cancel(key);
      this.debounceOwners.delete(key);
    }
    this.clearSessionContent(documentKey);
  }

  public clearCache(): void {
    this.links.clear();
    this.memoryUsageBytes = 0;
    this.optimizer?.clearCache();
  }

  /**
   * Zero every cache, session and counter this processor owns.
   */
  public clearAllData(): void {
    this.clearCache();
    this.clearSessionContent();
    console.debug('[ContentProcessor] All data cleared');
  }

  public cancelDebounce(): void {
    this.debouncer.cancelAll();
    this.debounceOwners.clear();
  }

  public getCacheStats(): ProcessorCacheStats {
    let validLinks = 0;
    for (const link of this.links.values()) {
      if (link.isValid) validLinks++;
    }
    let sessionContentCount = 0;
    for (const doc of this.sessions.values()) {
      sessionContentCount += doc.entries.size;
    }

    return {
      totalCached: this.links.size,
      validLinks,
      invalidLinks: this.links.size - validLinks,
      sessionContentCount,
      documentCount: this.sessions.size,
      memoryUsageBytes: this.memoryUsageBytes,
      memoryUsageKB: Math.round(this.memoryUsageBytes / 1024),
      maxCacheSize: this.maxCacheSize,
      maxContentSize: this.maxContentSize,
      performanceOptimizer: this.optimizer?.getMetrics(),
      debouncer: this.debouncer.getOverallMetrics(),
    };
  }

  public isMemoryUsageHigh(): boolean {
    return this.memoryUsageBytes > PROCESSOR_DEFAULTS.MEMORY_WARNING_FRACTION * this.maxCacheSize * this.maxContentSize;
  }

  public isDisposed(): boolean {
    return this.disposed;
  }

  public dispose(): void {
    if (this.disposed) return;
    this.cancelDebounce();
    this.disposed = true;
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    for (const controller of this.directFetches) {
      controller.abort();
    }
    this.directFetches.clear();
    this.optimizer?.dispose();
    this.debouncer.dispose();
    this.clearAllData();
    this.registry?.unregisterProcessor(this);
    this.onDispose?.(this);
    console.debug('[ContentProcessor] Disposed');
  }

  // Internal

  private async substitute(
    text: string,
    refs: ContentReference[],
    documentKey: string,
    useOptimizer: boolean
  ): Promise<string> {
    if (refs.length === 0) return text;

    const outcomes = await this.resolveAll(uniqueIdentifiers(refs), useOptimizer);
    if (this.disposed) return text;

    const markers = new Map<string, string>();
    const recorded = new Set<string>();
    const session = this.sessionFor(documentKey);

    for (const ref of refs) {
      const outcome = outcomes.get(ref.identifier);
      if (!outcome) continue;

      if (outcome.status === 'fulfilled' && !markers.has(ref.identifier)) {
        markers.set(ref.identifier, buildContentMarker(outcome.content));
      }
      if (recorded.has(ref.url)) continue;
      recorded.add(ref.url);
      this.record(ref, outcome, markers.get(ref.identifier), session);
    }

    // Back to front keeps earlier offsets valid
    let result = text;
    for (const ref of [...refs].sort((a, b) => b.start - a.start)) {
      const marker = markers.get(ref.identifier);
      if (marker !== undefined) {
        result = result.slice(0, ref.start) + marker + result.slice(ref.end);
      }
    }
    return result;
  }

  private async resolveAll(identifiers: string[], useOptimizer: boolean): Promise<Map<string, ResolveOutcome>> {
    if (useOptimizer && this.optimizer) {
      if (identifiers.length > 1) {
        return this.optimizer.resolveBatch(identifiers);
      }
      const [only] = identifiers;
      return new Map([[only, await this.optimizer.resolve(only)]]);
    }

    const outcomes = await Promise.all(identifiers.map((id) => this.fetchDirect(id)));
    return new Map(identifiers.map((id, i) => [id, outcomes[i]]));
  }

  private async fetchDirect(identifier: string): Promise<ResolveOutcome> {
    const controller = new AbortController();
    this.directFetches.add(controller);
    try {
      const content = await fetchWithTimeout(this.client, identifier, controller, this.fetchTimeoutMs);
      return { status: 'fulfilled', content, source: 'network' };
    } catch (err) {
      return { status: 'rejected', error: toFetchError(identifier, err) };
    } finally {
      this.directFetches.delete(controller);
    }
  }

  private record(ref: ContentReference, outcome: ResolveOutcome, marker: string | undefined, session: SessionDocument): void {
    const processedAt = Date.now();

    if (outcome.status === 'rejected') {
      console.warn(`[ContentProcessor] Keeping link ${redactSecrets(ref.url)}: ${describeError(outcome.error)}`);
      this.storeLink({
        url: ref.url,
        identifier: ref.identifier,
        content: '',
        processedAt,
        isValid: false,
        errorMessage: outcome.error.message,
      });
      this.storeSession(session, ref.url, ref.url);
      return;
    }

    const content = htmlToPlainText(outcome.content);
    if (content.length > this.maxContentSize) {
      console.warn(`[ContentProcessor] Content too large to keep: ${content.length} chars from ${ref.identifier}`);
      return;
    }
    this.storeLink({ url: ref.url, identifier: ref.identifier, content, processedAt, isValid: true });
    if (marker !== undefined) {
      this.storeSession(session, ref.url, marker);
    }
  }

  private storeLink(link: ContentLink): void {
    this.removeLink(link.url);
    this.links.set(link.url, link);
    this.memoryUsageBytes += linkSize(link);

    // Map order is insertion order, so the first key is the oldest
    while (this.links.size > this.maxCacheSize) {
      const oldest = this.links.keys().next();
      if (oldest.done) break;
      this.removeLink(oldest.value);
    }
  }

  private removeLink(url: string): void {
    const existing = this.links.get(url);
    if (!existing) return;
    this.links.delete(url);
    this.memoryUsageBytes -= linkSize(existing);
  }

  private sessionFor(documentKey: string): SessionDocument {
    let doc = this.sessions.get(documentKey);
    if (!doc) {
      doc = { entries: new Map(), totalBytes: 0 };
      this.sessions.set(documentKey, doc);
    }
    return doc;
  }

  private storeSession(doc: SessionDocument, url: string, value: string): void {
    const previous = doc.entries.get(url);
    if (previous !== undefined) {
      doc.totalBytes -= (url.length + previous.length) * 2;
    }
    doc.entries.set(url, value);
    doc.totalBytes += (url.length + value.length) * 2;
  }

  private performPeriodicCleanup(): void {
    const now = Date.now();
    let removed = 0;
    for (const [url, link] of Array.from(this.links)) {
      if (now - link.processedAt > this.linkTtlMs) {
        this.removeLink(url);
        removed++;
      }
    }
    const swept = this.optimizer?.performMaintenance() ?? 0;
    console.info(
      `[ContentProcessor] Periodic cleanup removed ${removed} links and ${swept} cache entries. ` +
        `Cache size: ${this.links.size}, memory usage: ${this.memoryUsageBytes} bytes`
    );
  }
}

export default ContentProcessor;
