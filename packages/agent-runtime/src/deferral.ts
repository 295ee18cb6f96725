import type { ToolCall, ToolResultEntry } from '@tether/core';
import type { RunState } from './run-state.js';
import type { ToolCallScope, ToolExecutionEngine } from './tool-execution-engine.js';
import type { PausedAgentRun, PendingToolCall, Resolution, Resolutions } from './types.js';

export const NOT_EXECUTED_MESSAGE = 'Tool call was not executed because the run paused before reaching it';

/** Snapshot a run that is pausing on `pendingCalls`. */
export function capturePausedRun<Deps>(
  state: RunState<Deps>,
  pendingCalls: PendingToolCall[],
  skippedCalls: ToolCall[],
): PausedAgentRun {
  return {
    runId: state.runId,
    messages: state.copyMessages(),
    usage: { ...state.usage },
    requestCount: state.requestCount,
    toolCallCount: state.toolCallCount,
    validationRetries: state.validationRetries,
    pendingCalls: pendingCalls.map((p) => ({ call: { ...p.call }, deferral: { ...p.deferral } })),
    skippedCalls: skippedCalls.map((c) => ({ ...c })),
  };
}

export function toResolutionMap(resolutions: Resolutions): Map<string, Resolution> {
  if (isResolvedList(resolutions)) {
    return new Map(resolutions.map((r) => [r.id, r.resolution]));
  }
  return new Map(Object.entries(resolutions));
}

function isResolvedList(resolutions: Resolutions): resolutions is Extract<Resolutions, readonly unknown[]> {
  return Array.isArray(resolutions);
}

export interface ResolutionOutcome {
  /** Results in pending-call order, then not-executed results for skipped calls. */
  results: ToolResultEntry[];
  /** Approved calls that deferred again. */
  redeferred: PendingToolCall[];
}

/**
 * Apply caller resolutions to a paused run's pending calls. A pending call
 * with no resolution is denied. Approved calls run once, without retries.
 */
export async function resolvePendingCalls<Deps>(
  paused: PausedAgentRun,
  resolutions: Resolutions,
  engine: ToolExecutionEngine<Deps>,
  scope: ToolCallScope<Deps>,
): Promise<ResolutionOutcome> {
  const byId = toResolutionMap(resolutions);
  const results: ToolResultEntry[] = [];
  const redeferred: PendingToolCall[] = [];

  for (const { call, deferral } of paused.pendingCalls) {
    const resolution: Resolution = byId.get(deferral.id) ?? { type: 'denied', reason: 'No resolution was provided' };
    switch (resolution.type) {
      case 'approved': {
        const { outcome } = await engine.executeOnce(call, scope, true);
        if (outcome.type === 'deferred') {
          redeferred.push({ call, deferral: outcome.deferral });
        } else if (outcome.type === 'success') {
          results.push({ toolCallId: call.id, content: outcome.content, isError: false });
        } else {
          const message = outcome.type === 'failure' ? outcome.error.message : outcome.feedback;
          results.push({ toolCallId: call.id, content: message, isError: true });
        }
        break;
      }
      case 'denied':
        results.push({ toolCallId: call.id, content: `Tool call denied: ${resolution.reason}`, isError: true });
        break;
      case 'completed':
        results.push({ toolCallId: call.id, content: resolution.result, isError: false });
        break;
      case 'failed':
        results.push({ toolCallId: call.id, content: `Tool call failed: ${resolution.error}`, isError: true });
        break;
    }
  }

  if (redeferred.length === 0) {
    for (const call of paused.skippedCalls) {
      results.push({ toolCallId: call.id, content: NOT_EXECUTED_MESSAGE, isError: true });
    }
  }

  return { results, redeferred };
}

export interface GroupedDeferrals {
  approvals: PendingToolCall[];
  external: PendingToolCall[];
  custom: PendingToolCall[];
}

/** Split a paused run's pending calls by deferral kind. */
export function groupDeferrals(paused: PausedAgentRun): GroupedDeferrals {
  const grouped: GroupedDeferrals = { approvals: [], external: [], custom: [] };
  for (const pending of paused.pendingCalls) {
    switch (pending.deferral.kind) {
      case 'approval':
        grouped.approvals.push(pending);
        break;
      case 'external':
        grouped.external.push(pending);
        break;
      case 'custom':
        grouped.custom.push(pending);
        break;
    }
  }
  return grouped;
}

export const approved = (): Resolution => ({ type: 'approved' });
export const denied = (reason: string): Resolution => ({ type: 'denied', reason });
export const completed = (result: string): Resolution => ({ type: 'completed', result });
export const failed = (error: string): Resolution => ({ type: 'failed', error });
