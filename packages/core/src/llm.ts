import type { Message, ToolCall } from './messages.js';
import type { ToolDefinition } from './tools.js';
import type { Usage } from './usage.js';

/** Options for a completion request. */
export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
  topP?: number;
}

export interface CompletionRequest {
  messages: Message[];
  tools?: ToolDefinition[];
  options?: CompletionOptions;
}

/** Why the model stopped generating. */
export type StopReason =
  | 'end_turn'
  | 'tool_use'
  | 'max_tokens'
  | 'stop_sequence'
  | 'content_filtered';

export interface CompletionResponse {
  content?: string;
  /** Set when the model declined to answer. */
  refusal?: string;
  toolCalls: ToolCall[];
  stopReason: StopReason;
  usage: Usage;
}

/** A single event from a streaming completion. The last one is always `completion`. */
export type ModelStreamEvent =
  | { type: 'content_delta'; delta: string }
  | { type: 'tool_call_start'; id: string; name: string }
  | { type: 'tool_call_delta'; id?: string; delta: string }
  | { type: 'tool_call_end'; id: string }
  | { type: 'completion'; response: CompletionResponse };

export interface ModelCallOptions {
  signal?: AbortSignal;
}

/**
 * Provider-agnostic model interface.
 * Implementations own all wire-format encoding and decoding.
 */
export interface Model {
  readonly name: string;
  complete(request: CompletionRequest, options?: ModelCallOptions): Promise<CompletionResponse>;
  stream(request: CompletionRequest, options?: ModelCallOptions): AsyncIterable<ModelStreamEvent>;
}
