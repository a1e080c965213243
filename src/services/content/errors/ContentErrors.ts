// Structured error classification for the linked-content pipeline

export type ContentErrorType =
  | 'validation'
  | 'network'
  | 'not_found'
  | 'authentication'
  | 'rate_limit'
  | 'timeout'
  | 'cancelled'
  | 'circuit_open'
  | 'storage';

export abstract class ContentPipelineError extends Error {
  abstract readonly errorType: ContentErrorType;
  abstract readonly userMessage: string;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = 'ContentPipelineError';
  }
}

/**
 * Rejected input: malformed identifier, credential or configuration.
 * Raised before any network or storage call.
 */
export class ValidationError extends ContentPipelineError {
  readonly errorType = 'validation' as const;
  readonly retryable = false;
  readonly userMessage: string;
  readonly field: string;

  constructor(field: string, details: string) {
    super(`Invalid ${field}: ${details}`);
    this.name = 'ValidationError';
    this.field = field;
    this.userMessage = `The ${field} value is not valid. Please check it and try again.`;
  }
}

/**
 * Base for every failure of the content-fetch collaborator.
 */
export abstract class FetchError extends ContentPipelineError {
  readonly identifier: string;

  constructor(identifier: string, message: string) {
    super(message);
    this.name = 'FetchError';
    this.identifier = identifier;
  }
}

export class NetworkError extends FetchError {
  readonly errorType = 'network' as const;
  readonly retryable = true;
  readonly userMessage = 'Network connection failed. Please check your connection and try again.';
  readonly causeOriginal?: unknown;

  constructor(identifier: string, details: string, cause?: unknown) {
    super(identifier, `Network error fetching ${identifier}: ${details}`);
    this.name = 'NetworkError';
    this.causeOriginal = cause;
  }
}

export class NotFoundError extends FetchError {
  readonly errorType = 'not_found' as const;
  readonly retryable = false;
  readonly userMessage = 'The linked page could not be found. It may have been moved or deleted.';

  constructor(identifier: string) {
    super(identifier, `Content ${identifier} not found`);
    this.name = 'NotFoundError';
  }
}

export class AuthenticationError extends FetchError {
  readonly errorType = 'authentication' as const;
  readonly retryable = false;
  readonly userMessage = 'Access to the content repository was denied. Verify your token in Settings.';
  readonly status?: number;

  constructor(identifier: string, status?: number) {
    super(identifier, `Authentication failed fetching ${identifier}${status ? ` (HTTP ${status})` : ''}`);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

export class RateLimitError extends FetchError {
  readonly errorType = 'rate_limit' as const;
  readonly retryable = true;
  readonly userMessage = 'Rate limit exceeded. Please wait a moment before trying again.';
  readonly retryAfterSeconds?: number;

  constructor(identifier: string, retryAfterSeconds?: number) {
    super(
      identifier,
      `Rate limit exceeded fetching ${identifier}${retryAfterSeconds ? ` (retry after ${retryAfterSeconds}s)` : ''}`
    );
    this.name = 'RateLimitError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class FetchTimeoutError extends FetchError {
  readonly errorType = 'timeout' as const;
  readonly retryable = true;
  readonly userMessage = 'The content repository took too long to respond.';
  readonly timeoutMs: number;

  constructor(identifier: string, timeoutMs: number) {
    super(identifier, `Fetching ${identifier} timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class FetchCancelledError extends FetchError {
  readonly errorType = 'cancelled' as const;
  readonly retryable = true;
  readonly userMessage = 'The content request was cancelled.';

  constructor(identifier: string, reason = 'cancelled') {
    super(identifier, `Fetching ${identifier} ${reason}`);
    this.name = 'FetchCancelledError';
  }
}

export class CircuitOpenError extends FetchError {
  readonly errorType = 'circuit_open' as const;
  readonly retryable = true;
  readonly userMessage = 'This page failed repeatedly and is paused for a moment.';

  constructor(identifier: string) {
    super(identifier, `Circuit OPEN for ${identifier}`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Encryption, decryption or key/value store failure.
 */
export class StorageError extends ContentPipelineError {
  readonly errorType = 'storage' as const;
  readonly retryable = false;
  readonly userMessage = 'Secure storage is unavailable. The token could not be saved or read.';
  readonly operation: string;
  readonly causeOriginal?: unknown;

  constructor(operation: string, details: string, cause?: unknown) {
    super(`Storage ${operation} failed: ${details}`);
    this.name = 'StorageError';
    this.operation = operation;
    this.causeOriginal = cause;
  }
}

type MaybeErrorLike = {
  name?: unknown;
  message?: unknown;
  code?: unknown;
  status?: unknown;
  statusCode?: unknown;
  retryAfter?: unknown;
  response?: { status?: unknown } | null;
};

function numberOrUndefined(v: unknown): number | undefined {
  const n = typeof v === 'string' ? Number(v) : v;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
}

function msgIncludesAny(msg: string, needles: string[]): boolean {
  return needles.some((n) => msg.includes(n));
}

/**
 * Translate whatever the fetch collaborator threw into a typed FetchError.
 *
 * Heuristics, in order:
 * - already a FetchError => unchanged
 * - HTTP status (status / statusCode / response.status): 404 => not found, 401/403 => auth, 429 => rate limit
 * - AbortError => cancelled
 * - network codes (ECONNRESET, ENOTFOUND, ...) or messages => network
 * - default => network, with the original kept as cause
 */
export function toFetchError(identifier: string, err: unknown): FetchError {
  if (err instanceof FetchError) return err;

  const e: MaybeErrorLike = typeof err === 'object' && err !== null ? err : {};
  const name = String(e.name ?? '').trim();
  const code = String(e.code ?? '').trim().toUpperCase();
  const message = typeof e.message === 'string' ? e.message : String(err);
  const status =
    numberOrUndefined(e.status) ?? numberOrUndefined(e.statusCode) ?? numberOrUndefined(e.response?.status);

  if (status === 404) return new NotFoundError(identifier);
  if (status === 401 || status === 403) return new AuthenticationError(identifier, status);
  if (status === 429) return new RateLimitError(identifier, numberOrUndefined(e.retryAfter));

  if (name === 'AbortError') return new FetchCancelledError(identifier, 'aborted');

  const lower = message.toLowerCase();
  if (msgIncludesAny(lower, ['not found'])) return new NotFoundError(identifier);
  if (msgIncludesAny(lower, ['unauthorized', 'forbidden'])) return new AuthenticationError(identifier);
  if (msgIncludesAny(lower, ['rate limit', 'too many requests'])) return new RateLimitError(identifier);

  const details = code ? `${code} ${message}` : message;
  return new NetworkError(identifier, details, err);
}

export function isFetchError(err: unknown): err is FetchError {
  return err instanceof FetchError;
}
