import type { CompletionRequest, CompletionResponse, ToolCall, Usage, UserMessage } from '@tether/core';
import type { AsyncEventQueue } from './async-event-queue.js';
import type { AgentNode, AgentResult, AgentStreamEvent, ToolExecutionRecord } from './types.js';

/**
 * Lifecycle hooks the run loop calls at fixed points. Each execution mode
 * supplies an observer that projects them into its own event shape.
 */
export interface LoopObserver<Output> {
  onLoopStart(runId: string, prompt: UserMessage | undefined): void;
  onBeforeModelCall(step: number, request: CompletionRequest): void;
  /** `total` is the run's usage including this response. */
  onModelResponse(step: number, response: CompletionResponse, total: Usage): void;
  onBeforeToolBatch(step: number, calls: ToolCall[]): void;
  onToolComplete(record: ToolExecutionRecord): void;
  onAfterToolBatch(step: number, records: ToolExecutionRecord[]): void;
  onEnd(result: AgentResult<Output>): void;
}

/** Observer for the blocking `run` mode. */
export class NoopLoopObserver<Output> implements LoopObserver<Output> {
  onLoopStart(): void {}
  onBeforeModelCall(): void {}
  onModelResponse(): void {}
  onBeforeToolBatch(): void {}
  onToolComplete(): void {}
  onAfterToolBatch(): void {}
  onEnd(): void {}
}

/** Projects lifecycle hooks into `AgentNode`s for step-wise iteration. */
export class IteratingLoopObserver<Output> implements LoopObserver<Output> {
  constructor(private readonly queue: AsyncEventQueue<AgentNode<Output>>) {}

  onLoopStart(_runId: string, prompt: UserMessage | undefined): void {
    if (prompt) this.queue.push({ type: 'user_prompt', message: prompt });
  }

  onBeforeModelCall(step: number, request: CompletionRequest): void {
    this.queue.push({ type: 'model_request', step, request });
  }

  onModelResponse(step: number, response: CompletionResponse): void {
    this.queue.push({ type: 'model_response', step, response });
  }

  onBeforeToolBatch(step: number, calls: ToolCall[]): void {
    this.queue.push({ type: 'tool_batch_start', step, calls });
  }

  onToolComplete(): void {}

  onAfterToolBatch(step: number, records: ToolExecutionRecord[]): void {
    this.queue.push({ type: 'tool_batch_results', step, results: records });
  }

  onEnd(result: AgentResult<Output>): void {
    this.queue.push({ type: 'end', result });
  }
}

/**
 * Lifecycle half of the live-stream mode: usage updates, tool results and
 * the final result. Model deltas are forwarded separately by the stream
 * model caller.
 */
export class StreamingLoopObserver<Output> implements LoopObserver<Output> {
  constructor(private readonly queue: AsyncEventQueue<AgentStreamEvent<Output>>) {}

  onLoopStart(): void {}
  onBeforeModelCall(): void {}

  onModelResponse(_step: number, response: CompletionResponse, total: Usage): void {
    this.queue.push({ type: 'usage', usage: response.usage, total });
  }

  onBeforeToolBatch(): void {}

  onToolComplete(record: ToolExecutionRecord): void {
    const { call, outcome, durationMs } = record;
    const isError = outcome.type !== 'success';
    const content =
      outcome.type === 'success'
        ? outcome.content
        : outcome.type === 'failure'
          ? outcome.error.message
          : outcome.type === 'retry'
            ? outcome.feedback
            : `Deferred: ${outcome.deferral.reason}`;
    this.queue.push({ type: 'tool_result', toolCallId: call.id, toolName: call.name, content, isError, durationMs });
  }

  onAfterToolBatch(): void {}

  onEnd(result: AgentResult<Output>): void {
    this.queue.push({ type: 'result', result });
  }
}
