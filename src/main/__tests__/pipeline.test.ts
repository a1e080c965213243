import { describe, it, expect, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { createContentPipeline, type ContentPipeline } from '../index';
import { MemoryKeyValueStore } from '../services/KeyValueStore';
import { createFakeClient } from '../../services/content/__tests__/testUtils';
import { parseContentConfig } from '../../services/content/config/ContentConfig';
import { ValidationError } from '../../services/content/errors/ContentErrors';

describe('createContentPipeline', () => {
  let pipeline: ContentPipeline | undefined;

  afterEach(() => {
    pipeline?.dispose();
    pipeline = undefined;
  });

  it('applies environment settings to the processors it creates', () => {
    pipeline = createContentPipeline({
      client: createFakeClient(),
      env: { CONTENT_CACHE_MAX_ENTRIES: '5', CONTENT_MAX_CONCURRENT_REQUESTS: '2' },
      keyValueStore: new MemoryKeyValueStore(),
    });

    expect(pipeline.settings.maxCacheSize).toBe(5);
    expect(pipeline.settings.maxConcurrentRequests).toBe(2);
    expect(pipeline.createProcessor().getCacheStats().performanceOptimizer?.maxCacheSize).toBe(5);
  });

  it('lets explicit settings win over the environment', () => {
    pipeline = createContentPipeline({
      client: createFakeClient(),
      env: { CONTENT_CACHE_TTL_MS: '1000' },
      settings: { cacheTtlMs: 2000 },
      keyValueStore: new MemoryKeyValueStore(),
    });

    expect(pipeline.settings.cacheTtlMs).toBe(2000);
  });

  it('rejects malformed environment values', () => {
    expect(() =>
      createContentPipeline({
        client: createFakeClient(),
        env: { CONTENT_FETCH_TIMEOUT_MS: 'soon' },
        keyValueStore: new MemoryKeyValueStore(),
      })
    ).toThrow(ValidationError);
  });

  it('processes text end to end with a stored credential', async () => {
    const client = createFakeClient();
    pipeline = createContentPipeline({ client, env: {}, keyValueStore: new MemoryKeyValueStore() });

    const credential = await pipeline.tokenStore.storeCredential('test-secret-token-0001');
    const config = parseContentConfig({
      enabled: true,
      baseUrl: 'https://wiki.test/',
      secureTokenReference: credential?.reference,
      isValid: true,
    });

    const processor = pipeline.createProcessor();
    const result = await processor.process('Spec: https://wiki.test/pages/abc-1', config);

    expect(result).toBe('Spec: @conf-cnt Page abc-1@');
    expect(pipeline.registry.isInitialized).toBe(true);
    expect(pipeline.registry.getMemoryStats().totalCachedLinks).toBe(1);

    pipeline.registry.handleLifecycleChange('detached');
    expect(processor.getCacheStats().totalCached).toBe(0);
  });

  it('disposes its processors and refuses new ones', () => {
    pipeline = createContentPipeline({
      client: createFakeClient(),
      env: {},
      keyValueStore: new MemoryKeyValueStore(),
    });
    const processor = pipeline.createProcessor();

    pipeline.dispose();

    expect(processor.isDisposed()).toBe(true);
    expect(pipeline.registry.getMemoryStats().processorsCount).toBe(0);
    expect(() => pipeline?.createProcessor()).toThrow('Content pipeline has been disposed');
  });

  it('stops tracking a processor once it disposes itself', () => {
    pipeline = createContentPipeline({
      client: createFakeClient(),
      env: {},
      keyValueStore: new MemoryKeyValueStore(),
    });
    const first = pipeline.createProcessor();
    const second = pipeline.createProcessor();
    expect(pipeline.processorCount).toBe(2);

    first.dispose();

    expect(pipeline.processorCount).toBe(1);
    expect(pipeline.registry.getMemoryStats().processorsCount).toBe(1);

    pipeline.dispose();
    expect(second.isDisposed()).toBe(true);
    expect(pipeline.processorCount).toBe(0);
  });

  it('binds and unbinds process lifecycle signals', () => {
    const target = new EventEmitter();
    pipeline = createContentPipeline({
      client: createFakeClient(),
      env: {},
      keyValueStore: new MemoryKeyValueStore(),
      bindLifecycle: { target, onSignal: () => undefined },
    });
    expect(target.listenerCount('SIGTERM')).toBe(1);

    target.emit('beforeExit');
    expect(pipeline.registry.store.getState().lastCleanup?.kind).toBe('full');

    pipeline.dispose();
    expect(target.listenerCount('SIGTERM')).toBe(0);
    expect(target.listenerCount('beforeExit')).toBe(0);
  });
});
