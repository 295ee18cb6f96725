// Messages
export { systemMessage, userMessage, assistantMessage, toolResultsMessage, userText } from './messages.js';
export type {
  ContentPart,
  ToolCall,
  ToolResultEntry,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolResultsMessage,
  Message,
  MessageRole,
} from './messages.js';

// Tool definitions
export type { JSONSchema, ToolDefinition, DeferralKind, DeferredToolCall } from './tools.js';

// Model abstraction
export type {
  CompletionOptions,
  CompletionRequest,
  CompletionResponse,
  StopReason,
  ModelStreamEvent,
  ModelCallOptions,
  Model,
} from './llm.js';

// Usage
export { emptyUsage, addUsage, totalTokens } from './usage.js';
export type { Usage } from './usage.js';

// Provider errors
export { LLMError, classifyProviderError, isTransientKind, TRANSIENT_ERROR_KINDS } from './errors.js';
export type { LLMErrorKind, TransientErrorKind } from './errors.js';

// Logging
export { createConsoleLogger, noopLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Configuration
export { CONFIG_SECTION_KEYS } from './config.js';
export type {
  TetherConfig,
  EndStrategy,
  AgentConfig,
  RetryPreset,
  RetryConfig,
  UsageLimitsConfig,
  LoggingConfig,
} from './config.js';

// Configuration validator
export {
  validateConfig,
  validateConfigObject,
  loadConfig,
  formatConfigErrors,
  ConfigError,
} from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateId, isRecord, errorMessage } from './utils.js';
