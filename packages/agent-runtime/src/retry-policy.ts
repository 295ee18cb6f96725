import { TRANSIENT_ERROR_KINDS, type RetryConfig, type TransientErrorKind } from '@tether/core';

/** Backoff settings for transient model-call failures. */
export interface RetryPolicy {
  /** Total attempts, including the first. */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  /** Random jitter as a fraction of the delay (0..1). */
  readonly jitter: number;
  readonly retryableErrors: ReadonlySet<TransientErrorKind>;
  /** Optional RNG for deterministic testing (defaults to Math.random) */
  readonly rng?: () => number;
}

/** Longest server-requested wait that is honoured as-is. */
export const MAX_RETRY_AFTER_MS = 60_000;

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    initialDelayMs: 100,
    maxDelayMs: 30_000,
    multiplier: 2,
    jitter: 0.1,
    retryableErrors: new Set(TRANSIENT_ERROR_KINDS),
    ...overrides,
  };
}

export const RetryPolicies = {
  /** Fail on the first error. */
  none: createRetryPolicy({ maxAttempts: 1, retryableErrors: new Set<TransientErrorKind>() }),
  default: createRetryPolicy(),
  /** Five attempts with longer waits. */
  aggressive: createRetryPolicy({
    maxAttempts: 5,
    initialDelayMs: 200,
    maxDelayMs: 60_000,
    multiplier: 2.5,
    jitter: 0.2,
  }),
} as const satisfies Record<string, RetryPolicy>;

/**
 * Wait before the attempt that follows failed attempt number `attempt`:
 * `min(maxDelay, initialDelay * multiplier^(attempt-1))`, then +/- jitter.
 * Zero for `attempt <= 0`.
 */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 0) return 0;
  const capped = Math.min(policy.maxDelayMs, policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1));
  if (policy.jitter <= 0) return capped;
  const rand = policy.rng ?? Math.random;
  const range = capped * policy.jitter;
  return Math.max(0, capped + (rand() * 2 - 1) * range);
}

/** Build a policy from the `retry` config section. */
export function retryPolicyFromConfig(config: RetryConfig = {}): RetryPolicy {
  const base = RetryPolicies[config.preset ?? 'default'];
  return createRetryPolicy({
    maxAttempts: config.maxAttempts ?? base.maxAttempts,
    initialDelayMs: config.initialDelayMs ?? base.initialDelayMs,
    maxDelayMs: config.maxDelayMs ?? base.maxDelayMs,
    multiplier: config.multiplier ?? base.multiplier,
    jitter: config.jitter ?? base.jitter,
    retryableErrors: config.retryableErrors ? new Set(config.retryableErrors) : base.retryableErrors,
  });
}
