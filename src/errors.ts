// Error taxonomy for provider, platform and tool-registry failures

export type ProviderErrorKind =
  | 'rate_limited'
  | 'timeout'
  | 'server'
  | 'network'
  | 'auth'
  | 'quota'
  | 'invalid_request'
  | 'aborted'
  | 'unknown';

/**
 * Typed failure of a provider call. Adapters throw it; the retry loop in
 * `BaseProviderAdapter` decides from `kind` whether another attempt is allowed.
 */
export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly provider: string;
  readonly status: number | undefined;
  readonly retryAfterMs: number | undefined;

  constructor(
    message: string,
    kind: ProviderErrorKind,
    provider: string,
    options: { status?: number; retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.kind = kind;
    this.provider = provider;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

const QUOTA_PATTERN = /insufficient_quota|quota exceeded|exceeded your current quota|billing|credit balance/i;

/**
 * Classify a failed HTTP response. A 429 whose body talks about quota or
 * billing is fatal, every other 429 is a rate limit.
 */
export function classifyProviderErrorFromStatus(status: number, body = ''): ProviderErrorKind {
  if (status === 429) {
    return QUOTA_PATTERN.test(body) ? 'quota' : 'rate_limited';
  }
  if (status === 401 || status === 403) return 'auth';
  if (status === 402) return 'quota';
  if (status === 408 || status === 504) return 'timeout';
  if (status === 529 || status === 503 || (status >= 500 && status < 600)) return 'server';
  if (status >= 400 && status < 500) return 'invalid_request';
  return 'unknown';
}

/**
 * Fallback classification for errors that only carry a message
 * (SDK clients, socket errors).
 */
export function classifyProviderErrorFromMessage(message: string): ProviderErrorKind {
  const text = message.toLowerCase();
  if (/rate.?limit|too many requests|\b429\b/.test(text)) return 'rate_limited';
  if (QUOTA_PATTERN.test(text)) return 'quota';
  if (/unauthorized|invalid api key|invalid_api_key|authentication|\b401\b|\b403\b/.test(text)) return 'auth';
  if (/timed? ?out|timeout/.test(text)) return 'timeout';
  if (/econnrefused|econnreset|enotfound|socket hang up|fetch failed|network/.test(text)) return 'network';
  if (/\b5\d\d\b|overloaded|internal server error|bad gateway|service unavailable/.test(text)) return 'server';
  return 'unknown';
}

export function isTransientKind(kind: ProviderErrorKind): boolean {
  return kind === 'rate_limited' || kind === 'timeout' || kind === 'server' || kind === 'network';
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Failure reported by the Home Assistant REST or WebSocket API.
 */
export class HomeAssistantError extends Error {
  readonly status: number | undefined;
  readonly path: string;
  /** WebSocket error code, e.g. `config_not_found` */
  readonly code: string | undefined;

  constructor(message: string, path: string, status?: number, code?: string) {
    super(message);
    this.name = 'HomeAssistantError';
    this.path = path;
    this.status = status;
    this.code = code;
  }
}

export class UnknownToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

/**
 * Raised when a history is about to be sent with an assistant tool call that
 * has no matching tool result.
 */
export class ToolPairingError extends Error {
  constructor(readonly toolCallIds: string[]) {
    super(`Tool calls without results: ${toolCallIds.join(', ')}`);
    this.name = 'ToolPairingError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
