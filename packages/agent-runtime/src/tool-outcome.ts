import { generateId, type DeferralKind, type DeferredToolCall } from '@tether/core';
import type { ToolOutcome } from './types.js';

export function toolSuccess(content: string): ToolOutcome {
  return { type: 'success', content };
}

/** Ask the engine to invoke the tool again, passing `feedback` along if retries run out. */
export function toolRetry(feedback: string): ToolOutcome {
  return { type: 'retry', feedback };
}

export function toolFailure(error: Error | string): ToolOutcome {
  return { type: 'failure', error: typeof error === 'string' ? new Error(error) : error };
}

export function toolDeferred(deferral: DeferredToolCall): ToolOutcome {
  return { type: 'deferred', deferral };
}

function defer(kind: DeferralKind, reason: string, id?: string): ToolOutcome {
  return toolDeferred({ id: id ?? generateId(), reason, kind });
}

/** Pause the run until a human approves or denies this call. */
export function needsApproval(reason: string, id?: string): ToolOutcome {
  return defer('approval', reason, id);
}

/** Pause the run until an external system supplies this call's result. */
export function awaitExternal(reason: string, id?: string): ToolOutcome {
  return defer('external', reason, id);
}

export function deferCustom(reason: string, id?: string): ToolOutcome {
  return defer('custom', reason, id);
}

export function isToolOutcome(value: unknown): value is ToolOutcome {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  switch (value.type) {
    case 'success':
      return 'content' in value && typeof value.content === 'string';
    case 'retry':
      return 'feedback' in value && typeof value.feedback === 'string';
    case 'failure':
      return 'error' in value && value.error instanceof Error;
    case 'deferred':
      return 'deferral' in value && typeof value.deferral === 'object' && value.deferral !== null;
    default:
      return false;
  }
}
