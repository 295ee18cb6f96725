import type { LLMError } from '@tether/core';
import type { PausedAgentRun, UsageLimitKind } from './types.js';

/** The run hit its iteration ceiling without producing output. */
export class IterationLimitExceededError extends Error {
  constructor(public readonly iterations: number) {
    super(`Iteration limit of ${iterations} exceeded`);
    this.name = 'IterationLimitExceededError';
  }
}

/** A configured usage ceiling was reached. */
export class UsageLimitExceededError extends Error {
  constructor(
    public readonly kind: UsageLimitKind,
    public readonly used: number,
    public readonly limit: number,
  ) {
    super(`Usage limit exceeded for ${kind}: used ${used}, limit ${limit}`);
    this.name = 'UsageLimitExceededError';
  }
}

export class ModelRefusedError extends Error {
  constructor(public readonly reason: string) {
    super(`Model refused: ${reason}`);
    this.name = 'ModelRefusedError';
  }
}

/** The response was cut off by the token limit or withheld by a content filter. */
export class TruncatedOrFilteredError extends Error {
  constructor(public readonly reason: 'max_tokens' | 'content_filtered') {
    super(
      reason === 'max_tokens'
        ? 'Model response was truncated by the token limit'
        : 'Model response was blocked by a content filter',
    );
    this.name = 'TruncatedOrFilteredError';
  }
}

/** The Model layer broke its contract (e.g. ended a turn with nothing in it). */
export class UnexpectedModelBehaviorError extends Error {
  constructor(public readonly detail: string) {
    super(`Unexpected model behavior: ${detail}`);
    this.name = 'UnexpectedModelBehaviorError';
  }
}

export class ToolNotFoundError extends Error {
  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

export class ToolRetriesExhaustedError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly attempts: number,
    public readonly lastFeedback?: string,
  ) {
    super(
      `Tool "${toolName}" did not succeed after ${attempts} attempt${attempts === 1 ? '' : 's'}` +
        (lastFeedback ? `: ${lastFeedback}` : ''),
    );
    this.name = 'ToolRetriesExhaustedError';
  }
}

/** One schema violation found in a tool's arguments. */
export interface ArgumentViolation {
  path: string;
  message: string;
}

/** Tool arguments could not be parsed or did not match the tool's schema. */
export class ToolArgumentError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly violations: ArgumentViolation[],
    message: string,
  ) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

/** Two tools, or a tool and the output tool, share a name. */
export class ToolConflictError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'ToolConflictError';
  }
}

/** A tool invocation outlived its timeout. Fails the run. */
export class ToolTimeoutError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

/** A transient model-call failure persisted through every allowed attempt. */
export class RetriesExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: LLMError,
  ) {
    super(`Model call failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`);
    this.name = 'RetriesExhaustedError';
    this.cause = lastError;
  }
}

/**
 * The run paused on tool calls that need outside resolution.
 * Pass `pausedRun` to `Agent.resume` to continue.
 */
export class HasDeferredToolsError extends Error {
  constructor(public readonly pausedRun: PausedAgentRun) {
    super(
      `Run ${pausedRun.runId} paused on ${pausedRun.pendingCalls.length} deferred tool call` +
        (pausedRun.pendingCalls.length === 1 ? '' : 's'),
    );
    this.name = 'HasDeferredToolsError';
  }
}

/** Thrown by output validators to send feedback to the model and try again. */
export class ValidationRetry extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationRetry';
  }
}

/** The output was rejected more often than `maxValidationRetries` allows. */
export class OutputValidationError extends Error {
  constructor(
    public readonly retries: number,
    public readonly lastFeedback: string,
  ) {
    super(`Output validation failed after ${retries} retr${retries === 1 ? 'y' : 'ies'}: ${lastFeedback}`);
    this.name = 'OutputValidationError';
  }
}

export class AgentCancelledError extends Error {
  constructor(cause?: unknown) {
    super('Agent run was cancelled');
    this.name = 'AgentCancelledError';
    this.cause = cause;
  }
}

/** An engine invariant was broken. Indicates a bug, never expected in practice. */
export class InternalAgentError extends Error {
  constructor(public readonly detail: string) {
    super(`Internal agent error: ${detail}`);
    this.name = 'InternalAgentError';
  }
}

export class PausedRunFormatError extends Error {
  constructor(
    message: string,
    public readonly violations: ArgumentViolation[] = [],
  ) {
    super(message);
    this.name = 'PausedRunFormatError';
  }
}
