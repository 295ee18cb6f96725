import type {
  CompletionRequest,
  CompletionResponse,
  Model,
  ModelCallOptions,
  ModelStreamEvent,
  ToolCall,
  Usage,
} from '@tether/core';

type ScriptStep = CompletionResponse | Error | ((request: CompletionRequest) => CompletionResponse);

export const STEP_USAGE: Usage = { inputTokens: 10, outputTokens: 5 };

export function toolCall(name: string, args: object, id: string): ToolCall {
  return { id, name, arguments: JSON.stringify(args) };
}

export function textResponse(content: string, usage: Usage = STEP_USAGE): CompletionResponse {
  return { content, toolCalls: [], stopReason: 'end_turn', usage };
}

export function toolUseResponse(calls: ToolCall[], usage: Usage = STEP_USAGE): CompletionResponse {
  return { toolCalls: calls, stopReason: 'tool_use', usage };
}

/**
 * Model that replays a fixed script, one step per request. Errors in the
 * script are thrown in place of a response. Every request is recorded.
 */
export class ScriptedModel implements Model {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  get remaining(): number {
    return this.steps.length;
  }

  async complete(request: CompletionRequest, options?: ModelCallOptions): Promise<CompletionResponse> {
    return this.next(request, options);
  }

  async *stream(request: CompletionRequest, options?: ModelCallOptions): AsyncIterable<ModelStreamEvent> {
    const response = this.next(request, options);
    if (response.content) {
      for (const word of response.content.split(/(?<= )/)) {
        yield { type: 'content_delta', delta: word };
      }
    }
    for (const call of response.toolCalls) {
      yield { type: 'tool_call_start', id: call.id, name: call.name };
      yield { type: 'tool_call_delta', id: call.id, delta: call.arguments };
      yield { type: 'tool_call_end', id: call.id };
    }
    yield { type: 'completion', response };
  }

  private next(request: CompletionRequest, options?: ModelCallOptions): CompletionResponse {
    this.requests.push(request);
    this.signals.push(options?.signal);
    const step = this.steps.shift();
    if (step === undefined) throw new Error('Scripted model ran out of responses');
    if (step instanceof Error) throw step;
    return typeof step === 'function' ? step(request) : step;
  }
}

/** Model that never settles until its signal aborts. */
export class HangingModel implements Model {
  readonly name = 'hanging';
  calls = 0;

  complete(_request: CompletionRequest, options?: ModelCallOptions): Promise<CompletionResponse> {
    this.calls++;
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }

  async *stream(request: CompletionRequest, options?: ModelCallOptions): AsyncIterable<ModelStreamEvent> {
    yield { type: 'completion', response: await this.complete(request, options) };
  }
}

export function tick(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
