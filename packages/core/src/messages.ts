/** A single part of a user message. Image data is base64 encoded. */
export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string };

/** A tool invocation requested by the model. `arguments` is the raw JSON text. */
export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

/** One tool call's answer inside a `tool_results` message. */
export interface ToolResultEntry {
  toolCallId: string;
  content: string;
  isError: boolean;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: ContentPart[];
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls: ToolCall[];
}

export interface ToolResultsMessage {
  role: 'tool_results';
  results: ToolResultEntry[];
}

/** A single transcript message. */
export type Message = SystemMessage | UserMessage | AssistantMessage | ToolResultsMessage;

/** Role in a conversation message. */
export type MessageRole = Message['role'];

export function systemMessage(content: string): SystemMessage {
  return { role: 'system', content };
}

export function userMessage(content: string | ContentPart[]): UserMessage {
  return {
    role: 'user',
    content: typeof content === 'string' ? [{ type: 'text', text: content }] : [...content],
  };
}

export function assistantMessage(content: string, toolCalls: ToolCall[] = []): AssistantMessage {
  return { role: 'assistant', content, toolCalls: [...toolCalls] };
}

export function toolResultsMessage(results: ToolResultEntry[]): ToolResultsMessage {
  return { role: 'tool_results', results: [...results] };
}

/** Concatenated text parts of a user message. */
export function userText(message: UserMessage): string {
  return message.content
    .filter((part): part is { type: 'text'; text: string } => part.type === 'text')
    .map((part) => part.text)
    .join('');
}
