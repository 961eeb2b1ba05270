/**
 * Credential redaction rules for client logging
 *
 * The client holds an API key, a login password and a session cookie.
 * None of them may reach a log line, whatever object they are nested in.
 */

/**
 * Field names redacted wherever they appear in a logged object
 */
export const REDACTED_FIELDS: readonly string[] = [
  'apikey',
  'api_key',
  'x-fastly-key',
  'password',
  'old_password',
  'cookie',
  'set-cookie',
  'session',
  'token',
  'authorization',
  'secret',
];

/**
 * Paths handed to pino's own redaction. Deeper nesting is covered by the
 * logger's `redactRecord` formatter.
 */
export const REDACTION_PATHS: string[] = [
  'apiKey',
  'api_key',
  'password',
  'old_password',
  'cookie',
  'session',
  'token',
  'authorization',
  'headers.cookie',
  'headers.Cookie',
  'headers["x-fastly-key"]',
  'headers["X-Fastly-Key"]',
  'headers.authorization',
  'credentials.apiKey',
  'credentials.password',
  'login.password',
];

// Session cookies and bare key headers inside free text (error bodies, URLs)
const SECRET_PATTERNS = {
  sessionCookie: /fastly\.session=[^;\s]+/g,
  keyHeader: /(x-fastly-key:\s*)\S+/gi,
  apiKeyParam: /(api_key=)[^&\s]+/gi,
} as const;

/**
 * Create redaction censor function
 */
export function createCensor(_value: unknown, path: string[]): string {
  const fieldName = path[path.length - 1] ?? 'unknown';
  return `[REDACTED:${fieldName}]`;
}

/**
 * Redact secrets embedded in a string value
 */
export function redactString(value: string): string {
  return value
    .replace(SECRET_PATTERNS.sessionCookie, 'fastly.session=[REDACTED]')
    .replace(SECRET_PATTERNS.keyHeader, '$1[REDACTED]')
    .replace(SECRET_PATTERNS.apiKeyParam, '$1[REDACTED]');
}

/**
 * Check if a field name should be redacted
 */
export function shouldRedactField(key: string): boolean {
  return REDACTED_FIELDS.includes(key.toLowerCase());
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Redact credential fields of a log record at any depth
 *
 * Only plain objects and arrays are walked; errors and other class instances
 * are left for pino's serializers.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    redacted[key] = shouldRedactField(key) ? `[REDACTED:${key}]` : redactObject(value);
  }
  return redacted;
}

/**
 * Recursively redact credentials from an object
 */
export function redactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (typeof obj === 'object' && isPlainObject(obj)) {
    return redactRecord(obj);
  }

  return obj;
}
