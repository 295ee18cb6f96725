import type { TransientErrorKind } from './errors.js';
import type { LogLevel } from './logger.js';

/** Top-level configuration for a tether engine. Every section is optional. */
export interface TetherConfig {
  agent?: AgentConfig;
  retry?: RetryConfig;
  usageLimits?: UsageLimitsConfig;
  logging?: LoggingConfig;
}

export type EndStrategy = 'early' | 'exhaustive';

export interface AgentConfig {
  maxIterations?: number;
  endStrategy?: EndStrategy;
  outputToolName?: string;
  outputToolDescription?: string;
  toolTimeoutMs?: number;
  maxValidationRetries?: number;
}

export type RetryPreset = 'none' | 'default' | 'aggressive';

/**
 * Model-call retry settings. `preset` picks the base policy; the
 * remaining fields override individual values on top of it.
 */
export interface RetryConfig {
  preset?: RetryPreset;
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  multiplier?: number;
  jitter?: number;
  retryableErrors?: TransientErrorKind[];
}

export interface UsageLimitsConfig {
  maxInputTokens?: number;
  maxOutputTokens?: number;
  maxTotalTokens?: number;
  maxRequests?: number;
  maxToolCalls?: number;
}

export interface LoggingConfig {
  level?: LogLevel;
}

/** Keys accepted in each config section. */
export const CONFIG_SECTION_KEYS = {
  agent: [
    'maxIterations',
    'endStrategy',
    'outputToolName',
    'outputToolDescription',
    'toolTimeoutMs',
    'maxValidationRetries',
  ],
  retry: ['preset', 'maxAttempts', 'initialDelayMs', 'maxDelayMs', 'multiplier', 'jitter', 'retryableErrors'],
  usageLimits: ['maxInputTokens', 'maxOutputTokens', 'maxTotalTokens', 'maxRequests', 'maxToolCalls'],
  logging: ['level'],
} as const;
