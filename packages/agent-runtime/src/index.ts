// Types
export type {
  ToolOutcome,
  PendingToolCall,
  PausedAgentRun,
  Resolution,
  ResolvedTool,
  Resolutions,
  UsageLimits,
  UsageLimitKind,
  ToolExecutionRecord,
  AgentResult,
  AgentStreamEvent,
  AgentNode,
  RunOptions,
  ResumeOptions,
} from './types.js';
export type { RunContext, AgentContext } from './agent-context.js';

// Errors
export {
  IterationLimitExceededError,
  UsageLimitExceededError,
  ModelRefusedError,
  TruncatedOrFilteredError,
  UnexpectedModelBehaviorError,
  ToolNotFoundError,
  ToolRetriesExhaustedError,
  ToolArgumentError,
  ToolConflictError,
  ToolTimeoutError,
  RetriesExhaustedError,
  HasDeferredToolsError,
  ValidationRetry,
  OutputValidationError,
  AgentCancelledError,
  InternalAgentError,
  PausedRunFormatError,
} from './errors.js';
export type { ArgumentViolation } from './errors.js';

// Agent
export {
  Agent,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_OUTPUT_TOOL_NAME,
  DEFAULT_OUTPUT_TOOL_DESCRIPTION,
} from './agent.js';
export type { AgentOptions, Prompt } from './agent.js';
export { agentSettingsFromConfig, loadAgentSettings } from './settings.js';
export type { ConfiguredAgentOptions } from './settings.js';

// Tools
export { defineTool, DEFAULT_TOOL_MAX_RETRIES } from './agent-tool.js';
export type { AgentTool, ToolSpec, ToolExecuteResult } from './agent-tool.js';
export {
  toolSuccess,
  toolRetry,
  toolFailure,
  toolDeferred,
  needsApproval,
  awaitExternal,
  deferCustom,
  isToolOutcome,
} from './tool-outcome.js';
export { ToolExecutionEngine } from './tool-execution-engine.js';
export type { ToolExecutionEngineOptions, ToolCallScope, BatchExecution } from './tool-execution-engine.js';
export { decodeArguments, formatViolations } from './schema-validation.js';
export type { DecodeResult } from './schema-validation.js';

// Output
export { textOutput, structuredOutput } from './output.js';
export type { OutputSpec, TextOutputSpec, StructuredOutputSpec, ParsedOutput, OutputValidator } from './output.js';

// Retry
export {
  RetryPolicies,
  createRetryPolicy,
  retryDelay,
  retryPolicyFromConfig,
  MAX_RETRY_AFTER_MS,
} from './retry-policy.js';
export type { RetryPolicy } from './retry-policy.js';
export { RetryingCompletion } from './retrying-completion.js';
export type { RetryingCompletionOptions } from './retrying-completion.js';

// Usage limits
export { checkUsageLimits } from './usage-limiter.js';
export type { UsageSnapshot } from './usage-limiter.js';

// Deferral
export { groupDeferrals, approved, denied, completed, failed, NOT_EXECUTED_MESSAGE } from './deferral.js';
export type { GroupedDeferrals } from './deferral.js';
export { serializePausedRun, deserializePausedRun } from './paused-run-codec.js';

// Models
export { PiAiModel } from './pi-ai-model.js';
export type { PiAiModelOptions } from './pi-ai-model.js';

// Event queue
export { AsyncEventQueue } from './async-event-queue.js';
