// Shared constants for the linked-content pipeline

// Inline substitution markers
export const CONTENT_MARKERS = {
  START: '@conf-cnt ',
  END: '@',
  // Stands in for literal '@' inside embedded content so END stays unambiguous
  AT_SURROGATE: '＠',
};

// PerformanceOptimizer defaults
export const OPTIMIZER_DEFAULTS = {
  MAX_CACHE_SIZE: 200,
  MAX_MEMORY_MB: 50,
  CACHE_TTL_MS: 30 * 60 * 1000,
  FETCH_TIMEOUT_MS: 30_000,
  MAX_CONCURRENT_REQUESTS: 3,
  // Entries above this share of the memory cap are served but never cached
  MAX_ENTRY_FRACTION: 0.1,
  ENTRY_OVERHEAD_BYTES: 64,
};

// ContentProcessor defaults
export const PROCESSOR_DEFAULTS = {
  MAX_CACHE_SIZE: 100,
  MAX_CONTENT_SIZE: 50_000,
  LINK_TTL_MS: 30 * 60 * 1000,
  CLEANUP_INTERVAL_MS: 10 * 60 * 1000,
  MEMORY_WARNING_FRACTION: 0.1,
  DEFAULT_DOCUMENT_KEY: 'default',
};

// Debounce delays (ms) and adaptive thresholds
export const DEBOUNCE_DELAYS = {
  DEFAULT: 500,
  FAST: 200,
  SLOW: 1000,
};

export const ADAPTIVE_THRESHOLDS = {
  SHORT_TEXT: 100,
  LONG_TEXT: 1000,
  REFERENCE_COUNT: 3,
  REFERENCE_MULTIPLIER: 1.5,
};

// Secure token storage
export const TOKEN_STORAGE_KEYS = {
  TOKEN: 'linked_content_token',
  ENCRYPTION_KEY: 'linked_content_encryption_key',
};

export const TOKEN_LIMITS = {
  MIN_LENGTH: 10,
  MAX_LENGTH: 500,
  FORMAT: /^[A-Za-z0-9+/=_-]+$/,
};

export const CREDENTIAL_REFERENCE_PREFIX = 'secure_';

// Default token store file name (under CONTENT_TOKEN_STORE_PATH or cwd)
export const DEFAULT_TOKEN_STORE_FILE = 'secure-store.json';
