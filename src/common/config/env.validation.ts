export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  CHAT_DB_URL: string;
  AZURE_OPENAI_ENDPOINT?: string;
  AZURE_OPENAI_API_KEY?: string;
  AZURE_OPENAI_API_VERSION: string;
  AZURE_OPENAI_TIMEOUT_MS: number;
  HIGH_CAPABILITY_DEPLOYMENT: string;
  FAST_DEPLOYMENT: string;
  DISABLED_MODELS: string[];
  CHAT_SCORER_LENGTH_THRESHOLD: number;
  CHAT_SCORER_MIN_QUESTION_MARKS: number;
  CHAT_SCORE_CAP?: number;
  CHAT_COMPLEXITY_KEYWORDS?: string[];
  CHAT_SELECTION_THRESHOLDS: SelectionThresholdEntry[];
  CHAT_FALLBACK_MODEL: string;
  CHAT_DISPATCH_MAX_ATTEMPTS: number;
  CHAT_DISPATCH_BASE_BACKOFF_MS: number;
  CHAT_DISPATCH_MAX_BACKOFF_MS: number;
  CHAT_REQUEST_DEADLINE_MS: number;
  CHAT_MAX_OUTPUT_TOKENS: number;
  CHAT_TEMPERATURE: number;
  CHAT_CONTEXT_MAX_TURNS: number;
  CHAT_CONTEXT_MAX_CHARS: number;
  CHAT_CONTEXT_CACHE_MAX_SESSIONS: number;
  CHAT_HISTORY_LIMIT: number;
  ALLOWED_ORIGINS: string[];
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
}

export interface SelectionThresholdEntry {
  threshold: number;
  modelId: string;
}

export const DEFAULT_SELECTION_THRESHOLDS = '4:gpt-4,2:gpt-35-turbo,0:gpt-35-turbo';

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseInteger(value: unknown, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid integer value: ${String(value)}`);
  }

  return parsed;
}

function parseOptionalInteger(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  return parseInteger(value, 0);
}

function parseList(value: unknown): string[] {
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'warn' ||
    value === 'error' ||
    value === 'info' ||
    value === 'log'
  ) {
    return value;
  }

  return 'log';
}

/**
 * Parses `threshold:model` pairs such as `4:gpt-4,2:gpt-35-turbo,0:gpt-35-turbo`.
 * Entries come back sorted high-to-low.
 */
export function parseSelectionThresholds(value: unknown): SelectionThresholdEntry[] {
  const raw =
    typeof value === 'string' && value.trim().length > 0
      ? value
      : DEFAULT_SELECTION_THRESHOLDS;

  const entries = parseList(raw).map((pair) => {
    const separator = pair.indexOf(':');
    if (separator <= 0 || separator === pair.length - 1) {
      throw new Error(`Invalid CHAT_SELECTION_THRESHOLDS entry: ${pair}`);
    }

    const threshold = Number(pair.slice(0, separator).trim());
    if (!Number.isInteger(threshold) || threshold < 0) {
      throw new Error(`Invalid CHAT_SELECTION_THRESHOLDS threshold: ${pair}`);
    }

    return { threshold, modelId: pair.slice(separator + 1).trim() };
  });

  if (entries.length === 0) {
    throw new Error('CHAT_SELECTION_THRESHOLDS must contain at least one entry');
  }

  return entries.sort((left, right) => right.threshold - left.threshold);
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const CHAT_DB_URL = String(config.CHAT_DB_URL ?? '').trim();
  const ALLOWED_ORIGINS = parseList(config.ALLOWED_ORIGINS);

  if (CHAT_DB_URL.length === 0) {
    throw new Error('CHAT_DB_URL is required');
  }

  if (NODE_ENV === 'production' && ALLOWED_ORIGINS.length === 0) {
    throw new Error('ALLOWED_ORIGINS is required in production');
  }

  const keywords = parseList(config.CHAT_COMPLEXITY_KEYWORDS).map((keyword) =>
    keyword.toLowerCase(),
  );
  const scoreCap = parseOptionalInteger(config.CHAT_SCORE_CAP);

  return {
    NODE_ENV,
    PORT: parseInteger(config.PORT, 3090),
    CHAT_DB_URL,
    AZURE_OPENAI_ENDPOINT: String(config.AZURE_OPENAI_ENDPOINT ?? '').trim() || undefined,
    AZURE_OPENAI_API_KEY: String(config.AZURE_OPENAI_API_KEY ?? '').trim() || undefined,
    AZURE_OPENAI_API_VERSION:
      String(config.AZURE_OPENAI_API_VERSION ?? '').trim() || '2024-02-15-preview',
    AZURE_OPENAI_TIMEOUT_MS: Math.max(1000, parseInteger(config.AZURE_OPENAI_TIMEOUT_MS, 20_000)),
    HIGH_CAPABILITY_DEPLOYMENT:
      String(config.HIGH_CAPABILITY_DEPLOYMENT ?? '').trim() || 'gpt-4',
    FAST_DEPLOYMENT: String(config.FAST_DEPLOYMENT ?? '').trim() || 'gpt-35-turbo',
    DISABLED_MODELS: parseList(config.DISABLED_MODELS),
    CHAT_SCORER_LENGTH_THRESHOLD: Math.max(
      0,
      parseInteger(config.CHAT_SCORER_LENGTH_THRESHOLD, 500),
    ),
    CHAT_SCORER_MIN_QUESTION_MARKS: Math.max(
      2,
      parseInteger(config.CHAT_SCORER_MIN_QUESTION_MARKS, 2),
    ),
    CHAT_SCORE_CAP: scoreCap === undefined ? undefined : Math.max(0, scoreCap),
    CHAT_COMPLEXITY_KEYWORDS: keywords.length > 0 ? keywords : undefined,
    CHAT_SELECTION_THRESHOLDS: parseSelectionThresholds(config.CHAT_SELECTION_THRESHOLDS),
    CHAT_FALLBACK_MODEL: String(config.CHAT_FALLBACK_MODEL ?? '').trim() || 'gpt-35-turbo',
    CHAT_DISPATCH_MAX_ATTEMPTS: Math.max(1, parseInteger(config.CHAT_DISPATCH_MAX_ATTEMPTS, 3)),
    CHAT_DISPATCH_BASE_BACKOFF_MS: Math.max(
      0,
      parseInteger(config.CHAT_DISPATCH_BASE_BACKOFF_MS, 250),
    ),
    CHAT_DISPATCH_MAX_BACKOFF_MS: Math.max(
      0,
      parseInteger(config.CHAT_DISPATCH_MAX_BACKOFF_MS, 4000),
    ),
    CHAT_REQUEST_DEADLINE_MS: Math.max(1000, parseInteger(config.CHAT_REQUEST_DEADLINE_MS, 30_000)),
    CHAT_MAX_OUTPUT_TOKENS: Math.max(1, parseInteger(config.CHAT_MAX_OUTPUT_TOKENS, 2048)),
    CHAT_TEMPERATURE: Math.min(2, Math.max(0, parseNumber(config.CHAT_TEMPERATURE, 0.7))),
    CHAT_CONTEXT_MAX_TURNS: Math.max(2, parseInteger(config.CHAT_CONTEXT_MAX_TURNS, 10)),
    CHAT_CONTEXT_MAX_CHARS: Math.max(1, parseInteger(config.CHAT_CONTEXT_MAX_CHARS, 12_000)),
    CHAT_CONTEXT_CACHE_MAX_SESSIONS: Math.max(
      1,
      parseInteger(config.CHAT_CONTEXT_CACHE_MAX_SESSIONS, 1000),
    ),
    CHAT_HISTORY_LIMIT: Math.max(0, parseInteger(config.CHAT_HISTORY_LIMIT, 10)),
    ALLOWED_ORIGINS,
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
  };
}
