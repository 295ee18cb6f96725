import type { Static, TSchema } from '@sinclair/typebox';
import type { ToolDefinition } from '@tether/core';
import type { AgentContext } from './agent-context.js';
import { ToolArgumentError } from './errors.js';
import { decodeArguments, formatViolations } from './schema-validation.js';
import { isToolOutcome, toolFailure, toolSuccess } from './tool-outcome.js';
import type { ToolOutcome } from './types.js';

export const DEFAULT_TOOL_MAX_RETRIES = 1;

/**
 * Type-erased tool as the engine sees it. Argument decoding and result
 * encoding live inside `invoke`.
 */
export interface AgentTool<Deps> {
  definition: ToolDefinition;
  /** Extra attempts allowed after a `retry` outcome. */
  maxRetries: number;
  invoke(context: AgentContext<Deps>, argumentsJson: string): Promise<ToolOutcome>;
}

/** What a tool's `execute` may return: an outcome, success text, or any JSON value. */
export type ToolExecuteResult = ToolOutcome | string | number | boolean | null | object;

export interface ToolSpec<Deps, P extends TSchema> {
  name: string;
  description: string;
  parameters: P;
  maxRetries?: number;
  execute(args: Static<P>, context: AgentContext<Deps>): ToolExecuteResult | Promise<ToolExecuteResult>;
}

/**
 * Build an {@link AgentTool} from a TypeBox parameter schema. Arguments
 * that fail to parse or validate never reach `execute`; the model gets a
 * failure listing each violation instead.
 */
export function defineTool<Deps, P extends TSchema>(spec: ToolSpec<Deps, P>): AgentTool<Deps> {
  return {
    definition: {
      name: spec.name,
      description: spec.description,
      inputSchema: spec.parameters,
    },
    maxRetries: spec.maxRetries ?? DEFAULT_TOOL_MAX_RETRIES,
    async invoke(context, argumentsJson) {
      const decoded = decodeArguments(spec.parameters, argumentsJson);
      if (!decoded.ok) {
        const message = formatViolations(
          `Invalid arguments for tool "${spec.name}":`,
          decoded.violations,
          spec.parameters,
        );
        return toolFailure(new ToolArgumentError(spec.name, decoded.violations, message));
      }
      return toOutcome(await spec.execute(decoded.value, context));
    },
  };
}

function toOutcome(result: ToolExecuteResult): ToolOutcome {
  if (isToolOutcome(result)) return result;
  if (typeof result === 'string') return toolSuccess(result);
  return toolSuccess(JSON.stringify(result) ?? 'null');
}
