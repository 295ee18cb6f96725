import {
  LLMError,
  classifyProviderError,
  errorMessage,
  isRecord,
  type CompletionRequest,
  type CompletionResponse,
  type Message,
  type Model,
  type ModelCallOptions,
  type ModelStreamEvent,
  type StopReason,
  type ToolCall,
  type ToolDefinition,
} from '@tether/core';
import { stream } from '@mariozechner/pi-ai';
import type {
  Api,
  AssistantMessage as PiAssistantMessage,
  Context as PiContext,
  Model as PiModel,
  Tool as PiTool,
  ToolCall as PiToolCall,
  ToolResultMessage as PiToolResultMessage,
  UserMessage as PiUserMessage,
} from '@mariozechner/pi-ai';
import type { TSchema } from '@sinclair/typebox';
import { AgentCancelledError } from './errors.js';

export interface PiAiModelOptions {
  model: PiModel<Api>;
  /** Overrides the key pi-ai would read from the environment. */
  apiKey?: string;
  name?: string;
}

/**
 * Model backed by pi-ai's `stream()` function.
 * Converts between tether message/event types and pi-ai types.
 */
export class PiAiModel implements Model {
  readonly name: string;

  private readonly model: PiModel<Api>;
  private readonly apiKey?: string;

  constructor(options: PiAiModelOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.name = options.name ?? `${options.model.provider}/${options.model.id}`;
  }

  async complete(request: CompletionRequest, options?: ModelCallOptions): Promise<CompletionResponse> {
    for await (const event of this.stream(request, options)) {
      if (event.type === 'completion') return event.response;
    }
    throw new LLMError('decoding_error', 'pi-ai stream ended without a done event');
  }

  async *stream(request: CompletionRequest, options: ModelCallOptions = {}): AsyncIterable<ModelStreamEvent> {
    const context = this.buildContext(request.messages, request.tools ?? []);

    try {
      const eventStream = stream(this.model, context, {
        temperature: request.options?.temperature,
        maxTokens: request.options?.maxTokens,
        signal: options.signal,
        apiKey: this.apiKey,
      });

      for await (const event of eventStream) {
        if (event.type === 'text_delta') {
          yield { type: 'content_delta', delta: event.delta };
        } else if (event.type === 'toolcall_start') {
          const block = event.partial.content[event.contentIndex];
          if (block?.type === 'toolCall') {
            yield { type: 'tool_call_start', id: block.id, name: block.name };
          }
        } else if (event.type === 'toolcall_delta') {
          const block = event.partial.content[event.contentIndex];
          yield { type: 'tool_call_delta', id: block?.type === 'toolCall' ? block.id : undefined, delta: event.delta };
        } else if (event.type === 'toolcall_end') {
          yield { type: 'tool_call_end', id: event.toolCall.id };
        } else if (event.type === 'done') {
          yield { type: 'completion', response: toCompletionResponse(event.message, mapStopReason(event.reason)) };
          return;
        } else if (event.type === 'error') {
          if (event.reason === 'aborted') throw new AgentCancelledError();
          throw classifyProviderError(event.error.errorMessage ?? 'Unknown provider error');
        }
        // Ignore: start, text_start, text_end, thinking_*
      }
    } catch (err) {
      if (err instanceof LLMError || err instanceof AgentCancelledError) throw err;
      throw classifyProviderError(errorMessage(err), err);
    }
  }

  /** Convert tether messages + tools into a pi-ai Context. */
  private buildContext(messages: Message[], tools: ToolDefinition[]): PiContext {
    const systemParts: string[] = [];
    const piMessages: (PiUserMessage | PiAssistantMessage | PiToolResultMessage)[] = [];
    const toolNames = new Map<string, string>();

    for (const msg of messages) {
      switch (msg.role) {
        case 'system':
          systemParts.push(msg.content);
          break;
        case 'user':
          piMessages.push({
            role: 'user',
            content: msg.content.map((part) =>
              part.type === 'text'
                ? { type: 'text' as const, text: part.text }
                : { type: 'image' as const, data: part.data, mimeType: part.mimeType },
            ),
            timestamp: Date.now(),
          });
          break;
        case 'assistant':
          for (const tc of msg.toolCalls) toolNames.set(tc.id, tc.name);
          piMessages.push(this.convertAssistantMessage(msg.content, msg.toolCalls));
          break;
        case 'tool_results':
          for (const result of msg.results) {
            piMessages.push({
              role: 'toolResult',
              toolCallId: result.toolCallId,
              toolName: toolNames.get(result.toolCallId) ?? 'unknown',
              content: [{ type: 'text', text: result.content }],
              isError: result.isError,
              timestamp: Date.now(),
            });
          }
          break;
      }
    }

    const piTools: PiTool[] | undefined =
      tools.length > 0
        ? tools.map((t) => ({
            name: t.name,
            description: t.description,
            parameters: t.inputSchema as TSchema,
          }))
        : undefined;

    return {
      systemPrompt: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
      messages: piMessages,
      tools: piTools,
    };
  }

  /** Convert a tether assistant turn to a pi-ai AssistantMessage. */
  private convertAssistantMessage(text: string, toolCalls: ToolCall[]): PiAssistantMessage {
    const content: ({ type: 'text'; text: string } | PiToolCall)[] = [];

    if (text) {
      content.push({ type: 'text', text });
    }

    for (const tc of toolCalls) {
      content.push({
        type: 'toolCall',
        id: tc.id,
        name: tc.name,
        arguments: safeParseJson(tc.arguments),
      });
    }

    return {
      role: 'assistant',
      content,
      api: this.model.api,
      provider: this.model.provider,
      model: this.model.id,
      usage: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, totalTokens: 0, cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 } },
      stopReason: toolCalls.length > 0 ? 'toolUse' : 'stop',
      timestamp: Date.now(),
    };
  }
}

function toCompletionResponse(message: PiAssistantMessage, stopReason: StopReason): CompletionResponse {
  let text = '';
  const toolCalls: ToolCall[] = [];
  for (const block of message.content) {
    if (block.type === 'text') {
      text += block.text;
    } else if (block.type === 'toolCall') {
      toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.arguments) });
    }
  }

  const response: CompletionResponse = {
    toolCalls,
    stopReason,
    usage: {
      inputTokens: message.usage.input,
      outputTokens: message.usage.output,
      cachedTokens: message.usage.cacheRead,
    },
  };
  if (text) response.content = text;
  return response;
}

/** Map pi-ai stop reasons to tether stop reasons. */
function mapStopReason(reason: string): StopReason {
  switch (reason) {
    case 'toolUse':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return 'end_turn';
  }
}

/** Parse a JSON object string, returning {} for anything else. */
function safeParseJson(str: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(str);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
