// Public surface of the linked-content pipeline

export { createContentPipeline } from './main';
export type { ContentPipeline, ContentPipelineOptions, ProcessorOverrides } from './main';
export { bindProcessLifecycle } from './main/lifecycle';
export type { LifecycleBindingOptions, LifecycleTarget } from './main/lifecycle';
export { FileKeyValueStore, MemoryKeyValueStore } from './main/services/KeyValueStore';
export type { KeyValueStore } from './main/services/KeyValueStore';
export { SecureCredential, SecureTokenStore } from './main/services/SecureTokenStore';
export type { TokenStorageInfo } from './main/services/SecureTokenStore';

export { ContentProcessor } from './services/content/ContentProcessor';
export type { ContentProcessorOptions } from './services/content/ContentProcessor';
export { Debouncer, computeAdaptiveDelay } from './services/content/Debouncer';
export type { DebounceOutcome, DebounceKeyMetrics } from './services/content/Debouncer';
export { PerformanceOptimizer } from './services/content/optimization/PerformanceOptimizer';
export type { PerformanceOptimizerOptions, OptimizerSettings } from './services/content/optimization/PerformanceOptimizer';
export { CircuitBreaker } from './services/content/optimization/CircuitBreaker';
export { extractReferences, extractIdentifier } from './services/content/LinkExtractor';
export { htmlToPlainText, buildContentMarker } from './services/content/ContentSanitizer';
export { parseContentConfig, loadPipelineSettings, isConfigComplete } from './services/content/config/ContentConfig';
export * from './services/content/errors/ContentErrors';
export type * from './services/content/types';

export { SessionRegistry } from './services/session/SessionRegistry';
export type { SessionMemoryStats } from './services/session/SessionRegistry';
export type { SessionState } from './services/session/sessionStore';

export type { ContentConfig, LifecycleState, DebouncePriority, PipelineSettings } from './shared/types';
