/**
 * Security utilities for redacting credentials from log lines and stat snapshots
 */

const SECRET_PATTERNS: RegExp[] = [
  // Bearer / Basic authorization values
  /Bearer\s+[A-Za-z0-9+/=_-]{20,}/g,
  /Basic\s+[A-Za-z0-9+/=]{20,}/g,
  // Authorization headers
  /authorization:\s*[A-Za-z0-9+/=_-]{20,}/gi,
  // token=... in query strings
  /token=[A-Za-z0-9+/=_-]{12,}/gi,
  // Generic long token-like runs (API tokens, base64 ciphertext)
  /\b[A-Za-z0-9+/_-]{24,}={0,2}/g,
];

/**
 * Redacts credentials from a string so it can be logged
 * @param str - The string to redact secrets from
 * @returns The string with secrets redacted
 */
export function redactSecrets(str: unknown): string {
  if (typeof str !== 'string') {
    if (str === null || str === undefined) {
      return '';
    }
    return String(str);
  }

  let redacted = str;

  for (const pattern of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, maskValue);
  }

  return redacted;
}

/**
 * Keeps the first and last 4 characters for identification, masks the middle.
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}****${value.substring(value.length - 4)}`;
}

/**
 * Redacts sensitive values from objects before they are logged
 * @param obj - The object to redact
 * @param sensitiveKeys - Keys whose values are always masked
 */
export function redactObjectSecrets(
  obj: unknown,
  sensitiveKeys: string[] = ['token', 'secret', 'password', 'apiKey', 'encryptionKey']
): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactSecrets(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redactObjectSecrets(item, sensitiveKeys));
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      const isSensitive = sensitiveKeys.some((sensitiveKey) =>
        key.toLowerCase().includes(sensitiveKey.toLowerCase())
      );
      if (isSensitive) {
        result[key] = typeof value === 'string' ? maskValue(value) : '[REDACTED]';
      } else {
        result[key] = redactObjectSecrets(value, sensitiveKeys);
      }
    }

    return result;
  }

  return obj;
}

/**
 * Message of an unknown thrown value, redacted for logging.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return redactSecrets(`${err.name}: ${err.message}`);
  }
  return redactSecrets(String(err));
}
