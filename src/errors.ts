/**
 * Error types and upstream failure classification.
 *
 * `classifyError` turns anything thrown on the upstream path into an
 * {@link ErrorEnvelope}; `toCallerError` maps that envelope onto the
 * Messages API error body and HTTP status.
 *
 * @packageDocumentation
 */

import type { CallerErrorBody, CallerErrorType } from './types.js';

export const ErrorCategories = [
  'authentication',
  'rate_limited',
  'invalid_request',
  'upstream_unavailable',
  'timeout',
  'internal',
] as const;

export type ErrorCategory = (typeof ErrorCategories)[number];

export interface ErrorEnvelope {
  category: ErrorCategory;
  message: string;
  /** Status code returned by the upstream, when there was one. */
  statusCode?: number;
}

// ============================================================================
// Error classes
// ============================================================================

/** Invalid or incomplete configuration. Fatal at startup. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Inbound request failed validation; raised before any upstream call. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

/** The caller went away before the request was dispatched. */
export class ClientDisconnectedError extends Error {
  constructor() {
    super('Client disconnected');
    this.name = 'ClientDisconnectedError';
  }
}

/** Upstream answered with a non-2xx status. */
export class UpstreamHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Upstream responded with HTTP ${status}`);
    this.name = 'UpstreamHttpError';
    this.status = status;
    this.body = body;
  }
}

/** No upstream progress within the idle deadline. */
export class UpstreamTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Upstream request timed out after ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Upstream answered 2xx but the body, or a stream frame, carried an `error` object without a usable status. */
export class UpstreamPayloadError extends Error {
  readonly body: string;

  constructor(body: string) {
    super('Upstream returned an error payload');
    this.name = 'UpstreamPayloadError';
    this.body = body;
  }
}

/** Upstream body could not be parsed into the expected shape. */
export class MalformedResponseError extends Error {
  constructor(detail: string) {
    super(`Malformed upstream response: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}

// ============================================================================
// Classification
// ============================================================================

const KEYWORD_RULES: Array<{ category: ErrorCategory; patterns: RegExp[] }> = [
  {
    category: 'authentication',
    patterns: [/invalid[_ ]api[_ ]key/i, /incorrect api key/i, /unauthori[sz]ed/i, /authentication/i, /permission denied/i],
  },
  {
    category: 'rate_limited',
    patterns: [/rate[_ ]?limit/i, /too many requests/i, /quota/i, /insufficient_quota/i],
  },
  {
    category: 'timeout',
    patterns: [/timed? ?out/i, /ETIMEDOUT/, /deadline exceeded/i],
  },
  {
    category: 'upstream_unavailable',
    patterns: [/ECONNREFUSED/, /ECONNRESET/, /ENOTFOUND/, /EAI_AGAIN/, /socket hang up/i, /fetch failed/i, /service unavailable/i, /bad gateway/i, /overloaded/i],
  },
  {
    category: 'invalid_request',
    patterns: [/invalid[_ ]request/i, /bad request/i, /context length/i, /unsupported/i],
  },
];

const CATEGORY_PREFIX: Record<ErrorCategory, string> = {
  authentication: 'Upstream rejected the configured credential',
  rate_limited: 'Rate limited by upstream provider',
  invalid_request: 'Upstream rejected the request',
  upstream_unavailable: 'Upstream service unavailable',
  timeout: 'Upstream request timed out',
  internal: 'Internal proxy error',
};

const MAX_DETAIL_LENGTH = 300;

const TOKEN_PATTERNS: RegExp[] = [
  /Bearer\s+[A-Za-z0-9._~+/=-]+/g,
  /\b(?:sk|ms)-[A-Za-z0-9_-]{4,}/g,
];

export interface ClassifyOptions {
  /** Credential values that must never appear in a caller-visible message. */
  secrets?: readonly string[];
}

function categoryForStatus(status: number): ErrorCategory | null {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'rate_limited';
  if (status === 408) return 'timeout';
  if (status >= 400 && status < 500) return 'invalid_request';
  if (status >= 500) return 'upstream_unavailable';
  return null;
}

function categoryForText(text: string): ErrorCategory | null {
  for (const rule of KEYWORD_RULES) {
    if (rule.patterns.some((p) => p.test(text))) return rule.category;
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Pull the human-readable part out of an upstream error body. Bodies are
 * usually `{"error":{"message":...}}`, sometimes `{"error":"..."}` or plain text.
 */
export function extractUpstreamDetail(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '';
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
  if (!isRecord(parsed)) return trimmed;
  const err = parsed['error'];
  if (typeof err === 'string') return err;
  if (isRecord(err) && typeof err['message'] === 'string') return err['message'];
  if (typeof parsed['message'] === 'string') return parsed['message'];
  if (typeof parsed['detail'] === 'string') return parsed['detail'];
  return trimmed;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    // fetch wraps socket errors: "fetch failed" with the errno on `cause`
    const cause = error.cause;
    if (cause instanceof Error && cause.message && !error.message.includes(cause.message)) {
      const code = 'code' in cause && typeof cause.code === 'string' ? ` (${cause.code})` : '';
      return `${error.message}: ${cause.message}${code}`;
    }
    return error.message;
  }
  if (typeof error === 'string') return error;
  if (isRecord(error) && typeof error['message'] === 'string') return error['message'];
  return '';
}

/**
 * Remove credential material from a message and cap its length.
 */
export function sanitizeMessage(text: string, secrets: readonly string[] = []): string {
  let out = text;
  for (const secret of secrets) {
    if (secret) out = out.split(secret).join('[redacted]');
  }
  for (const pattern of TOKEN_PATTERNS) {
    out = out.replace(pattern, '[redacted]');
  }
  out = out.replace(/\s+/g, ' ').trim();
  if (out.length > MAX_DETAIL_LENGTH) out = `${out.slice(0, MAX_DETAIL_LENGTH)}...`;
  return out;
}

function envelope(category: ErrorCategory, detail: string, secrets: readonly string[], statusCode?: number): ErrorEnvelope {
  const clean = sanitizeMessage(detail, secrets);
  const message = clean ? `${CATEGORY_PREFIX[category]}: ${clean}` : CATEGORY_PREFIX[category];
  return statusCode === undefined ? { category, message } : { category, message, statusCode };
}

/**
 * Classify an upstream failure. Checks the HTTP status first, then typed
 * failures, then keywords in the body or description. Never throws.
 */
export function classifyError(error: unknown, options: ClassifyOptions = {}): ErrorEnvelope {
  const secrets = options.secrets ?? [];
  try {
    if (error instanceof UpstreamHttpError) {
      const detail = extractUpstreamDetail(error.body);
      const category = categoryForStatus(error.status) ?? categoryForText(detail) ?? 'internal';
      return envelope(category, detail, secrets, error.status);
    }
    if (error instanceof UpstreamPayloadError) {
      const detail = extractUpstreamDetail(error.body);
      return envelope(categoryForText(detail) ?? 'upstream_unavailable', detail, secrets);
    }
    if (error instanceof UpstreamTimeoutError) {
      return envelope('timeout', error.message, secrets);
    }
    if (error instanceof MalformedResponseError) {
      return envelope('invalid_request', error.message, secrets);
    }
    const detail = describeError(error);
    const category = categoryForText(detail) ?? 'internal';
    return envelope(category, detail, secrets);
  } catch {
    return { category: 'internal', message: CATEGORY_PREFIX.internal };
  }
}

// ============================================================================
// Caller mapping
// ============================================================================

const CALLER_MAPPING: Record<ErrorCategory, { status: number; type: CallerErrorType }> = {
  authentication: { status: 401, type: 'authentication_error' },
  rate_limited: { status: 429, type: 'rate_limit_error' },
  invalid_request: { status: 400, type: 'invalid_request_error' },
  upstream_unavailable: { status: 502, type: 'api_error' },
  timeout: { status: 504, type: 'api_error' },
  internal: { status: 500, type: 'api_error' },
};

export function callerErrorType(category: ErrorCategory): CallerErrorType {
  return CALLER_MAPPING[category].type;
}

/**
 * Map an envelope onto the HTTP status and JSON body returned to the caller.
 */
export function toCallerError(env: ErrorEnvelope): { status: number; body: CallerErrorBody } {
  const mapping = CALLER_MAPPING[env.category];
  return {
    status: mapping.status,
    body: { type: 'error', error: { type: mapping.type, message: env.message } },
  };
}

/** Categories for which re-dispatching with another credential may help. */
export function isRetryable(category: ErrorCategory): boolean {
  return category === 'rate_limited' || category === 'upstream_unavailable' || category === 'timeout';
}
