import { z } from 'zod';
import { OPTIMIZER_DEFAULTS } from '../../../shared/constants';
import { redactObjectSecrets } from '../../../shared/security';
import type { ContentConfig, PipelineSettings } from '../../../shared/types';
import { ValidationError } from '../errors/ContentErrors';

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const ContentConfigSchema = z.object({
  enabled: z.boolean().default(false),
  baseUrl: z
    .string()
    .trim()
    .default('')
    .refine((v) => v === '' || isHttpUrl(v), { message: 'baseUrl must be an http(s) URL' }),
  secureTokenReference: z.string().trim().default(''),
  isValid: z.boolean().default(false),
  email: z.string().trim().email().optional(),
  lastValidated: z.number().int().nonnegative().optional(),
});

// Blank env values count as unset
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const envInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

export const PipelineSettingsSchema = z.object({
  CONTENT_CACHE_MAX_ENTRIES: envInt(OPTIMIZER_DEFAULTS.MAX_CACHE_SIZE),
  CONTENT_CACHE_MAX_MEMORY_MB: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().default(OPTIMIZER_DEFAULTS.MAX_MEMORY_MB)
  ),
  CONTENT_CACHE_TTL_MS: envInt(OPTIMIZER_DEFAULTS.CACHE_TTL_MS),
  CONTENT_FETCH_TIMEOUT_MS: envInt(OPTIMIZER_DEFAULTS.FETCH_TIMEOUT_MS),
  CONTENT_MAX_CONCURRENT_REQUESTS: envInt(OPTIMIZER_DEFAULTS.MAX_CONCURRENT_REQUESTS),
  CONTENT_TOKEN_STORE_PATH: z.preprocess(blankToUndefined, z.string().optional()),
});

export type ContentConfigInput = z.input<typeof ContentConfigSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

/**
 * Parse and normalize a repository configuration. Throws ValidationError on malformed input.
 */
export function parseContentConfig(input: unknown): ContentConfig {
  const parsed = ContentConfigSchema.safeParse(input);
  if (!parsed.success) {
    console.warn(`[ContentConfig] Rejected configuration: ${JSON.stringify(redactObjectSecrets(input))}`);
    throw new ValidationError('configuration', describeIssues(parsed.error));
  }
  return { ...parsed.data, baseUrl: normalizeBaseUrl(parsed.data.baseUrl) };
}

/**
 * A configuration is usable only when enabled, pointed at a repository and holding a token reference.
 */
export function isConfigComplete(config: ContentConfig): boolean {
  return config.enabled && config.baseUrl.trim() !== '' && config.secureTokenReference.trim() !== '';
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '');
}

/**
 * Read optimizer tunables from the environment, falling back to defaults for unset values.
 */
export function loadPipelineSettings(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
  const parsed = PipelineSettingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('environment', describeIssues(parsed.error));
  }
  const e = parsed.data;
  return {
    maxCacheSize: e.CONTENT_CACHE_MAX_ENTRIES,
    maxMemoryMB: e.CONTENT_CACHE_MAX_MEMORY_MB,
    cacheTtlMs: e.CONTENT_CACHE_TTL_MS,
    fetchTimeoutMs: e.CONTENT_FETCH_TIMEOUT_MS,
    maxConcurrentRequests: e.CONTENT_MAX_CONCURRENT_REQUESTS,
    tokenStorePath: e.CONTENT_TOKEN_STORE_PATH,
  };
}
