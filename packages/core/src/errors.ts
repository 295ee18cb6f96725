/** Category of a failed model call. The first three are transient. */
export type LLMErrorKind =
  | 'rate_limited'
  | 'server_error'
  | 'network_error'
  | 'invalid_api_key'
  | 'invalid_request'
  | 'model_not_found'
  | 'context_length_exceeded'
  | 'content_filtered'
  | 'decoding_error'
  | 'capability_not_supported';

/** Thrown by Model implementations when a provider call fails. */
export class LLMError extends Error {
  constructor(
    public readonly kind: LLMErrorKind,
    message: string,
    public readonly retryAfterMs?: number,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'LLMError';
    this.cause = cause;
  }
}

const RATE_LIMIT = /\b429\b|rate.?limit|too many requests/i;
const SERVER = /\b5\d\d\b|overloaded|internal server error|service unavailable|bad gateway/i;
const NETWORK = /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|ENOTFOUND|socket hang up|fetch failed|network error|socket timeout/i;
const API_KEY = /\b401\b|api.?key|unauthori[sz]ed/i;
const MODEL_NOT_FOUND = /model.{0,40}not found|unknown model|no such model/i;
const CONTEXT_LENGTH = /context.?length|context window|too many tokens|maximum context/i;
const CONTENT_FILTER = /content.?filter|safety system|flagged/i;

/**
 * Map a provider's error text onto an {@link LLMError}.
 * Anything unrecognised is treated as a non-retryable invalid request.
 */
export function classifyProviderError(message: string, cause?: unknown): LLMError {
  return new LLMError(kindFromMessage(message), message, parseRetryAfter(message), cause);
}

function kindFromMessage(message: string): LLMErrorKind {
  if (RATE_LIMIT.test(message)) return 'rate_limited';
  if (CONTEXT_LENGTH.test(message)) return 'context_length_exceeded';
  if (API_KEY.test(message)) return 'invalid_api_key';
  if (MODEL_NOT_FOUND.test(message)) return 'model_not_found';
  if (CONTENT_FILTER.test(message)) return 'content_filtered';
  if (NETWORK.test(message)) return 'network_error';
  if (SERVER.test(message)) return 'server_error';
  return 'invalid_request';
}

/** Extracts "retry after N seconds" / "retry-after: N" hints. */
function parseRetryAfter(message: string): number | undefined {
  const match = /retry.?after:?\s*(\d+(?:\.\d+)?)\s*(ms|s|seconds?)?/i.exec(message);
  if (!match?.[1]) return undefined;
  const value = Number(match[1]);
  return match[2] === 'ms' ? value : value * 1000;
}

/** The error kinds a retry policy may choose to retry. */
export type TransientErrorKind = Extract<LLMErrorKind, 'rate_limited' | 'server_error' | 'network_error'>;

export const TRANSIENT_ERROR_KINDS: readonly TransientErrorKind[] = [
  'rate_limited',
  'server_error',
  'network_error',
];

export function isTransientKind(kind: string): kind is TransientErrorKind {
  return TRANSIENT_ERROR_KINDS.some((k) => k === kind);
}
