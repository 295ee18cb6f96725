import { totalTokens, type Usage } from '@tether/core';
import { UsageLimitExceededError } from './errors.js';
import type { UsageLimits } from './types.js';

export interface UsageSnapshot {
  usage: Usage;
  requestCount: number;
  toolCallCount: number;
}

/**
 * Throws for the first ceiling that has been crossed. Token ceilings trip
 * once usage is above the limit; request and tool-call ceilings trip once
 * the count has reached it, since the next step would go past it.
 */
export function checkUsageLimits(limits: UsageLimits, snapshot: UsageSnapshot): void {
  const { usage, requestCount, toolCallCount } = snapshot;

  if (limits.maxInputTokens !== undefined && usage.inputTokens > limits.maxInputTokens) {
    throw new UsageLimitExceededError('inputTokens', usage.inputTokens, limits.maxInputTokens);
  }
  if (limits.maxOutputTokens !== undefined && usage.outputTokens > limits.maxOutputTokens) {
    throw new UsageLimitExceededError('outputTokens', usage.outputTokens, limits.maxOutputTokens);
  }
  const total = totalTokens(usage);
  if (limits.maxTotalTokens !== undefined && total > limits.maxTotalTokens) {
    throw new UsageLimitExceededError('totalTokens', total, limits.maxTotalTokens);
  }
  if (limits.maxRequests !== undefined && requestCount >= limits.maxRequests) {
    throw new UsageLimitExceededError('requests', requestCount, limits.maxRequests);
  }
  if (limits.maxToolCalls !== undefined && toolCallCount >= limits.maxToolCalls) {
    throw new UsageLimitExceededError('toolCalls', toolCallCount, limits.maxToolCalls);
  }
}
