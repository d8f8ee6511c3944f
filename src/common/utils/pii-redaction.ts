import { isRecord } from './object.utils';

const HARD_REDACT_KEYS = new Set([
  'api_key',
  'apikey',
  'authorization',
  'password',
  'secret',
  'token',
  'access_token',
  'accesstoken',
  'database_url',
  'chat_db_url',
  'connectionstring',
]);

const EMAIL_KEYS = new Set(['email', 'user_email', 'useremail']);

const NAME_KEYS = new Set([
  'first_name',
  'firstname',
  'last_name',
  'lastname',
  'full_name',
  'fullname',
  'username',
]);

const REDACTED_LITERAL = '[REDACTED]';
const EMAIL_PATTERN = /\b([A-Za-z0-9._%+-])[A-Za-z0-9._%+-]*@([A-Za-z0-9.-]+\.[A-Za-z]{2,})\b/g;
const CONNECTION_STRING_CREDENTIALS = /(\b[a-z][a-z0-9+.-]*:\/\/[^:/\s]+:)[^@\s]+@/gi;

/**
 * Returns a deep copy of `value` safe to write to logs: credentials become
 * `[REDACTED]`, emails and person names keep only their first character.
 */
export function redactSensitiveData(value: unknown): unknown {
  const visited = new WeakSet<object>();
  return redactRecursive(value, undefined, visited);
}

function redactRecursive(
  value: unknown,
  key: string | undefined,
  visited: WeakSet<object>,
): unknown {
  const normalizedKey = key ? normalizeKey(key) : '';

  if (shouldHardRedact(normalizedKey)) {
    return REDACTED_LITERAL;
  }

  if (EMAIL_KEYS.has(normalizedKey)) {
    return typeof value === 'string' ? maskEmails(value) : REDACTED_LITERAL;
  }

  if (NAME_KEYS.has(normalizedKey)) {
    return redactNameValue(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, key, visited));
  }

  if (isRecord(value)) {
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = redactRecursive(childValue, childKey, visited);
    }
    return output;
  }

  if (typeof value === 'string') {
    return redactInlineSecrets(value);
  }

  return value;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[^a-z0-9_]/g, '');
}

function shouldHardRedact(normalizedKey: string): boolean {
  if (normalizedKey.length === 0) {
    return false;
  }

  if (HARD_REDACT_KEYS.has(normalizedKey)) {
    return true;
  }

  return normalizedKey.includes('secret') || normalizedKey.endsWith('api_key');
}

function redactNameValue(value: unknown): string {
  if (typeof value !== 'string') {
    return REDACTED_LITERAL;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return REDACTED_LITERAL;
  }

  return `${trimmed[0]}***`;
}

function maskEmails(value: string): string {
  return value.replace(EMAIL_PATTERN, '$1***@$2');
}

function redactInlineSecrets(value: string): string {
  return maskEmails(
    value
      .replace(/\bBearer\s+[A-Za-z0-9\-._~+/]+=*/gi, 'Bearer [REDACTED]')
      .replace(CONNECTION_STRING_CREDENTIALS, '$1[REDACTED]@'),
  );
}
