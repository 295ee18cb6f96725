import type {
  CompletionRequest,
  CompletionResponse,
  DeferredToolCall,
  Message,
  ToolCall,
  Usage,
  UsageLimitsConfig,
  UserMessage,
} from '@tether/core';

/** Result of one tool invocation attempt. */
export type ToolOutcome =
  | { type: 'success'; content: string }
  | { type: 'retry'; feedback: string }
  | { type: 'failure'; error: Error }
  | { type: 'deferred'; deferral: DeferredToolCall };

/** A tool call waiting on outside resolution. */
export interface PendingToolCall {
  call: ToolCall;
  deferral: DeferredToolCall;
}

/**
 * Snapshot of a run suspended on deferred tool calls. The transcript
 * already holds the results of the paused batch that settled before the
 * deferral.
 */
export interface PausedAgentRun {
  runId: string;
  messages: Message[];
  usage: Usage;
  requestCount: number;
  toolCallCount: number;
  validationRetries: number;
  pendingCalls: PendingToolCall[];
  /** Calls in the paused batch after the deferring call; never attempted. */
  skippedCalls: ToolCall[];
}

export type Resolution =
  | { type: 'approved' }
  | { type: 'denied'; reason: string }
  | { type: 'completed'; result: string }
  | { type: 'failed'; error: string };

export interface ResolvedTool {
  id: string;
  resolution: Resolution;
}

/** Resolutions by list or keyed by deferral id. */
export type Resolutions = readonly ResolvedTool[] | Readonly<Record<string, Resolution>>;

export type UsageLimits = Readonly<UsageLimitsConfig>;

export type UsageLimitKind = 'inputTokens' | 'outputTokens' | 'totalTokens' | 'requests' | 'toolCalls';

/** Timed outcome of one tool call in a batch. */
export interface ToolExecutionRecord {
  call: ToolCall;
  outcome: ToolOutcome;
  durationMs: number;
}

export interface AgentResult<Output> {
  output: Output;
  usage: Usage;
  messages: Message[];
  /** Name of the output tool that produced `output`; absent for text output. */
  outputToolName?: string;
  runId: string;
  requestCount: number;
  toolCallCount: number;
}

/** Events emitted by `Agent.stream`. */
export type AgentStreamEvent<Output> =
  | { type: 'content_delta'; delta: string }
  | { type: 'tool_call_start'; id: string; name: string }
  | { type: 'tool_call_delta'; id?: string; delta: string }
  | { type: 'tool_call_end'; id: string }
  | { type: 'usage'; usage: Usage; total: Usage }
  | { type: 'tool_result'; toolCallId: string; toolName: string; content: string; isError: boolean; durationMs: number }
  | { type: 'result'; result: AgentResult<Output> };

/** Steps yielded by `Agent.iterate`. */
export type AgentNode<Output> =
  | { type: 'user_prompt'; message: UserMessage }
  | { type: 'model_request'; step: number; request: CompletionRequest }
  | { type: 'model_response'; step: number; response: CompletionResponse }
  | { type: 'tool_batch_start'; step: number; calls: ToolCall[] }
  | { type: 'tool_batch_results'; step: number; results: ToolExecutionRecord[] }
  | { type: 'end'; result: AgentResult<Output> };

export interface RunOptions {
  /** Prior conversation, placed after the system prompt and before the new prompt. */
  history?: Message[];
  signal?: AbortSignal;
}

export interface ResumeOptions {
  signal?: AbortSignal;
}
