import type { CompletionOptions, EndStrategy, Logger, Model } from '@tether/core';
import type { AgentTool } from './agent-tool.js';
import type { OutputSpec, OutputValidator } from './output.js';
import type { RetryPolicy } from './retry-policy.js';
import type { ToolExecutionEngine } from './tool-execution-engine.js';
import type { UsageLimits } from './types.js';

/** Immutable configuration shared by every run of one agent. */
export interface RunSettings<Deps, Output> {
  readonly model: Model;
  readonly output: OutputSpec<Output>;
  readonly systemPrompt?: string;
  readonly tools: readonly AgentTool<Deps>[];
  readonly engine: ToolExecutionEngine<Deps>;
  readonly outputValidators: readonly OutputValidator<Deps, Output>[];
  readonly maxIterations: number;
  readonly usageLimits: UsageLimits;
  readonly endStrategy: EndStrategy;
  readonly outputToolName: string;
  readonly outputToolDescription: string;
  readonly retryPolicy: RetryPolicy;
  readonly maxValidationRetries?: number;
  readonly completionOptions?: CompletionOptions;
  readonly logger: Logger;
}
