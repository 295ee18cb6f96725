import {
  LLMError,
  isTransientKind,
  type CompletionRequest,
  type CompletionResponse,
  type Logger,
  type Model,
  type ModelStreamEvent,
} from '@tether/core';
import { sleep, throwIfAborted } from './abort.js';
import { AgentCancelledError, RetriesExhaustedError, UnexpectedModelBehaviorError } from './errors.js';
import { MAX_RETRY_AFTER_MS, retryDelay, type RetryPolicy } from './retry-policy.js';

export interface RetryingCompletionOptions {
  policy: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Calls the model with backoff on transient failures. Transient failures
 * outside the policy's allow-set, or past its last attempt, surface as
 * {@link RetriesExhaustedError}; every other error is rethrown unchanged.
 */
export class RetryingCompletion {
  constructor(
    private readonly model: Model,
    private readonly options: RetryingCompletionOptions,
  ) {}

  complete(request: CompletionRequest): Promise<CompletionResponse> {
    return this.withRetry(() => this.model.complete(request, { signal: this.options.signal }), () => true);
  }

  /**
   * Streams one completion, forwarding every event to `onEvent`. A failed
   * stream is only retried while nothing has been forwarded yet.
   */
  stream(request: CompletionRequest, onEvent: (event: ModelStreamEvent) => void): Promise<CompletionResponse> {
    let forwarded = false;
    return this.withRetry(
      async () => {
        for await (const event of this.model.stream(request, { signal: this.options.signal })) {
          forwarded = true;
          onEvent(event);
          if (event.type === 'completion') return event.response;
        }
        throw new UnexpectedModelBehaviorError('Stream ended without a completion event');
      },
      () => !forwarded,
    );
  }

  private async withRetry<T>(call: () => Promise<T>, canRetry: () => boolean): Promise<T> {
    const { policy, logger, signal } = this.options;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);
      try {
        return await call();
      } catch (err) {
        if (signal?.aborted) throw new AgentCancelledError(signal.reason);
        if (!(err instanceof LLMError)) throw err;
        const kind = err.kind;
        if (!isTransientKind(kind)) throw err;

        const allowed = policy.retryableErrors.has(kind) && canRetry();
        if (!allowed || attempt >= policy.maxAttempts) {
          throw new RetriesExhaustedError(attempt, err);
        }

        const delay = waitBeforeRetry(policy, attempt, err);
        logger.warn(`Model call failed (${kind}), retrying in ${Math.round(delay)}ms`, {
          attempt,
          maxAttempts: policy.maxAttempts,
        });
        await sleep(delay, signal);
      }
    }
  }
}

function waitBeforeRetry(policy: RetryPolicy, attempt: number, err: LLMError): number {
  if (
    err.kind === 'rate_limited' &&
    err.retryAfterMs !== undefined &&
    err.retryAfterMs > 0 &&
    err.retryAfterMs <= MAX_RETRY_AFTER_MS
  ) {
    return err.retryAfterMs;
  }
  return retryDelay(policy, attempt);
}
