// Core data types shared by the linked-content pipeline and its host process

/**
 * Read-only configuration for one content repository.
 * `secureTokenReference` is the opaque reference handed out by the token store, never the token.
 */
export interface ContentConfig {
  enabled: boolean;
  baseUrl: string;
  secureTokenReference: string;
  isValid: boolean;
  email?: string;
  lastValidated?: number;
}

// Host lifecycle signals the session registry reacts to
export type LifecycleState = 'resumed' | 'inactive' | 'paused' | 'detached' | 'hidden';

export type DebouncePriority = 'high' | 'normal' | 'low';

// Tunables for the optimizer, shared by config parsing and the optimizer itself
export interface PipelineSettings {
  maxCacheSize: number;
  maxMemoryMB: number;
  cacheTtlMs: number;
  fetchTimeoutMs: number;
  maxConcurrentRequests: number;
  tokenStorePath?: string;
}
