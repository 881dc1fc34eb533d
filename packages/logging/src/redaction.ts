const SENSITIVE_KEY_FRAGMENTS = ['token', 'secret', 'authorization', 'cookie', 'password', 'privatekey', 'private_key'];

// Bearer credentials and compact JWS/JWT values, whatever key they sit under.
const CREDENTIAL_VALUE_PATTERNS = [/^bearer\s+[\w.~+/-]+=*$/iu, /^eyJ[\w-]*\.[\w-]+\.[\w-]*$/u];

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

const normalizeKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const looksLikeCredential = (value: string) => CREDENTIAL_VALUE_PATTERNS.some(pattern => pattern.test(value.trim()));

type SanitizeState = {
  extraKeys: ReadonlySet<string>;
  visited: WeakSet<object>;
};

const isSensitiveKey = (key: string, state: SanitizeState) => {
  const normalized = normalizeKey(key);
  return state.extraKeys.has(normalized) || SENSITIVE_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
};

const describeError = (error: Error) => ({
  name: error.name,
  message: error.message,
  ...('code' in error && typeof error.code === 'string' ? {code: error.code} : {}),
  ...(error.stack ? {stack: error.stack} : {})
});

const sanitizeValue = (value: unknown, depth: number, state: SanitizeState): unknown => {
  if (depth > MAX_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return looksLikeCredential(value) ? REDACTED : value;
  }
  if (typeof value === 'bigint' || typeof value === 'symbol') {
    return value.toString();
  }
  if (typeof value === 'function') {
    return '[FUNCTION]';
  }
  if (typeof value !== 'object') {
    return String(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return describeError(value);
  }
  if (state.visited.has(value)) {
    return '[CIRCULAR]';
  }
  state.visited.add(value);

  if (Array.isArray(value)) {
    return value.map(item => sanitizeValue(item, depth + 1, state));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    sanitized[key] = isSensitiveKey(key, state) ? REDACTED : sanitizeValue(entry, depth + 1, state);
  }
  return sanitized;
};

/**
 * Copies `value` into something safe to serialize into a log line. Values under sensitive keys and
 * values that look like bearer credentials are replaced, errors are reduced to their name, message
 * and stack, and cycles are cut.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown =>
  sanitizeValue(value, 0, {
    extraKeys: new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0)),
    visited: new WeakSet<object>()
  });
