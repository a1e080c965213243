import * as path from 'path';
import { DEFAULT_TOKEN_STORE_FILE } from '../shared/constants';
import type { PipelineSettings } from '../shared/types';
import { loadPipelineSettings } from '../services/content/config/ContentConfig';
import { ContentProcessor, type ContentProcessorOptions } from '../services/content/ContentProcessor';
import { CircuitBreaker, type BreakerOptions } from '../services/content/optimization/CircuitBreaker';
import type { OptimizerSettings } from '../services/content/optimization/PerformanceOptimizer';
import type { ContentFetchClient } from '../services/content/types';
import { SessionRegistry } from '../services/session/SessionRegistry';
import { bindProcessLifecycle, type LifecycleBindingOptions } from './lifecycle';
import { FileKeyValueStore, type KeyValueStore } from './services/KeyValueStore';
import { SecureTokenStore } from './services/SecureTokenStore';

export interface ContentPipelineOptions {
  client: ContentFetchClient;
  // Defaults to process.env
  env?: NodeJS.ProcessEnv;
  // Applied over settings read from env
  settings?: Partial<PipelineSettings>;
  // Backing store for the token store; defaults to a JSON file under tokenStorePath
  keyValueStore?: KeyValueStore;
  // Per-identifier circuit breaking for every processor; off when omitted
  circuitBreaker?: BreakerOptions;
  // Bind SIGINT/SIGTERM/beforeExit to full cleanup
  bindLifecycle?: boolean | LifecycleBindingOptions;
}

export type ProcessorOverrides = Omit<ContentProcessorOptions, 'registry' | 'optimizer' | 'onDispose'>;

export interface ContentPipeline {
  readonly settings: PipelineSettings;
  readonly registry: SessionRegistry;
  readonly tokenStore: SecureTokenStore;
  // Processors created here that are neither disposed nor collected
  readonly processorCount: number;
  createProcessor(overrides?: ProcessorOverrides): ContentProcessor;
  dispose(): void;
}

/**
 * Wire settings, session registry, token store and processors for one host process.
 */
export function createContentPipeline(options: ContentPipelineOptions): ContentPipeline {
  const settings: PipelineSettings = { ...loadPipelineSettings(options.env), ...options.settings };

  const registry = new SessionRegistry();
  registry.initialize();

  const storage =
    options.keyValueStore ??
    new FileKeyValueStore(path.join(settings.tokenStorePath ?? process.cwd(), DEFAULT_TOKEN_STORE_FILE));
  const tokenStore = new SecureTokenStore(storage);

  const optimizerSettings: OptimizerSettings = {
    maxCacheSize: settings.maxCacheSize,
    maxMemoryMB: settings.maxMemoryMB,
    cacheTtlMs: settings.cacheTtlMs,
    fetchTimeoutMs: settings.fetchTimeoutMs,
    maxConcurrentRequests: settings.maxConcurrentRequests,
  };
  // Held weakly; a processor leaves the set when it disposes
  const processors = new Set<WeakRef<ContentProcessor>>();

  let unbindLifecycle: (() => void) | undefined;
  if (options.bindLifecycle) {
    unbindLifecycle = bindProcessLifecycle(
      registry,
      options.bindLifecycle === true ? {} : options.bindLifecycle
    );
  }

  let disposed = false;

  console.debug(
    `[ContentPipeline] Ready: cache ${settings.maxCacheSize} entries / ${settings.maxMemoryMB}MB, ` +
      `timeout ${settings.fetchTimeoutMs}ms, concurrency ${settings.maxConcurrentRequests}`
  );

  return {
    settings,
    registry,
    tokenStore,

    get processorCount(): number {
      let count = 0;
      for (const ref of Array.from(processors)) {
        if (ref.deref()) {
          count++;
        } else {
          processors.delete(ref);
        }
      }
      return count;
    },

    createProcessor(overrides: ProcessorOverrides = {}): ContentProcessor {
      if (disposed) {
        throw new Error('Content pipeline has been disposed');
      }
      // Breakers are per processor: disposing one optimizer resets its breaker
      const circuitBreaker = options.circuitBreaker ? new CircuitBreaker(options.circuitBreaker) : undefined;
      let ref: WeakRef<ContentProcessor> | undefined;
      const processor = new ContentProcessor(options.client, {
        ...overrides,
        registry,
        optimizer: { ...optimizerSettings, circuitBreaker },
        onDispose: () => {
          if (ref) processors.delete(ref);
        },
      });
      ref = new WeakRef(processor);
      processors.add(ref);
      return processor;
    },

    dispose(): void {
      if (disposed) return;
      disposed = true;
      unbindLifecycle?.();
      for (const ref of Array.from(processors)) {
        ref.deref()?.dispose();
      }
      processors.clear();
      registry.dispose();
      console.debug('[ContentPipeline] Disposed');
    },
  };
}
