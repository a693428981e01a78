/**
 * Log sanitization
 *
 * Header and field names whose values never reach a log.
 */

const SENSITIVE_KEYS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'api-key',
  'apikey',
  'token',
  'password',
  'secret'
]);

const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact sensitive header values
 */
export function sanitizeHeaders(headers: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!headers) return {};

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(headers)) {
    sanitized[key] = isSensitiveKey(key) ? REDACTED : value;
  }
  return sanitized;
}

/**
 * Deep-copy a value with sensitive keys redacted.
 * Dates and other non-plain objects pass through as they are.
 */
export function sanitizeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }

  if (value !== null && typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeValue(entry);
    }
    return sanitized;
  }

  return value;
}

export function sanitizeLogArgs(...args: unknown[]): unknown[] {
  return args.map(sanitizeValue);
}
