/** JSON Schema type for tool input/output definitions. */
export type JSONSchema = Record<string, unknown>;

/** Tool definition as advertised to the model. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JSONSchema;
}

/** Why a tool call was deferred. */
export type DeferralKind = 'approval' | 'external' | 'custom';

/** Deferral information returned by a tool that cannot complete synchronously. */
export interface DeferredToolCall {
  id: string;
  reason: string;
  kind: DeferralKind;
}
