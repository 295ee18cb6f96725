import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { PausedRunFormatError } from './errors.js';
import type { PausedAgentRun } from './types.js';

const ToolCallSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  arguments: Type.String(),
});

const ContentPartSchema = Type.Union([
  Type.Object({ type: Type.Literal('text'), text: Type.String() }),
  Type.Object({ type: Type.Literal('image'), data: Type.String(), mimeType: Type.String() }),
]);

const MessageSchema = Type.Union([
  Type.Object({ role: Type.Literal('system'), content: Type.String() }),
  Type.Object({ role: Type.Literal('user'), content: Type.Array(ContentPartSchema) }),
  Type.Object({ role: Type.Literal('assistant'), content: Type.String(), toolCalls: Type.Array(ToolCallSchema) }),
  Type.Object({
    role: Type.Literal('tool_results'),
    results: Type.Array(Type.Object({ toolCallId: Type.String(), content: Type.String(), isError: Type.Boolean() })),
  }),
]);

const Count = Type.Integer({ minimum: 0 });

const PausedRunSchema = Type.Object({
  version: Type.Literal(1),
  runId: Type.String({ minLength: 1 }),
  messages: Type.Array(MessageSchema),
  usage: Type.Object({
    inputTokens: Count,
    outputTokens: Count,
    cachedTokens: Type.Optional(Count),
    reasoningTokens: Type.Optional(Count),
  }),
  requestCount: Count,
  toolCallCount: Count,
  validationRetries: Count,
  pendingCalls: Type.Array(
    Type.Object({
      call: ToolCallSchema,
      deferral: Type.Object({
        id: Type.String(),
        reason: Type.String(),
        kind: Type.Union([Type.Literal('approval'), Type.Literal('external'), Type.Literal('custom')]),
      }),
    }),
  ),
  skippedCalls: Type.Array(ToolCallSchema),
});

type SerializedPausedRun = Static<typeof PausedRunSchema>;

/** Encode a paused run as JSON text for storage or transport. */
export function serializePausedRun(paused: PausedAgentRun): string {
  const encoded: SerializedPausedRun = { version: 1, ...paused };
  return JSON.stringify(encoded);
}

/** Decode and validate a paused run produced by {@link serializePausedRun}. */
export function deserializePausedRun(text: string): PausedAgentRun {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new PausedRunFormatError(`Paused run is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!Value.Check(PausedRunSchema, parsed)) {
    const violations = [...Value.Errors(PausedRunSchema, parsed)].map((e) => ({
      path: e.path || '/',
      message: e.message,
    }));
    const first = violations[0];
    throw new PausedRunFormatError(
      `Paused run is malformed${first ? `: ${first.path}: ${first.message}` : ''}`,
      violations,
    );
  }

  const { version: _version, ...paused } = parsed;
  return paused;
}
