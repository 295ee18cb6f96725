import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import {
  CONFIG_SECTION_KEYS,
  type AgentConfig,
  type LoggingConfig,
  type RetryConfig,
  type RetryPreset,
  type TetherConfig,
  type UsageLimitsConfig,
} from './config.js';
import { isTransientKind, type TransientErrorKind } from './errors.js';
import { isLogLevel } from './logger.js';
import { isRecord } from './utils.js';

/** All valid top-level keys. */
const VALID_TOP_LEVEL_KEYS = new Set<string>(Object.keys(CONFIG_SECTION_KEYS));

const RETRY_PRESETS: readonly RetryPreset[] = ['none', 'default', 'aggressive'];

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: TetherConfig;
}

/**
 * Parse and validate a JSON5 config string.
 * Rejects unknown keys (strict mode) at every level.
 */
export function validateConfig(json5String: string): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }
  return validateConfigObject(parsed);
}

/** Validate an already-parsed value, e.g. after env overrides were applied. */
export function validateConfigObject(parsed: unknown): ConfigValidationResult {
  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  const config: TetherConfig = {};
  const agent = section(parsed, 'agent', errors);
  if (agent) config.agent = validateAgent(agent, errors);
  const retry = section(parsed, 'retry', errors);
  if (retry) config.retry = validateRetry(retry, errors);
  const limits = section(parsed, 'usageLimits', errors);
  if (limits) config.usageLimits = validateUsageLimits(limits, errors);
  const logging = section(parsed, 'logging', errors);
  if (logging) config.logging = validateLogging(logging, errors);

  return {
    valid: errors.length === 0,
    errors,
    config: errors.length === 0 ? config : undefined,
  };
}

/** Thrown where a config must be valid to proceed. */
export class ConfigError extends Error {
  constructor(public readonly errors: ConfigValidationError[]) {
    super(`Invalid config:\n${formatConfigErrors(errors)}`);
    this.name = 'ConfigError';
  }
}

/** Render validation errors as `path: message` lines. */
export function formatConfigErrors(errors: ConfigValidationError[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join('\n');
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(filePath: string): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content);
}

function section(
  root: Record<string, unknown>,
  name: string,
  errors: ConfigValidationError[],
): Record<string, unknown> | undefined {
  const value = root[name];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    errors.push({ path: name, message: `Section "${name}" must be an object` });
    return undefined;
  }
  return value;
}

/** Reports keys not listed in `known`. */
function rejectUnknown(
  obj: Record<string, unknown>,
  prefix: string,
  known: readonly string[],
  errors: ConfigValidationError[],
): void {
  for (const key of Object.keys(obj)) {
    if (!known.includes(key)) {
      errors.push({ path: `${prefix}.${key}`, message: `Unknown key: "${key}"` });
    }
  }
}

type Check = 'positive integer' | 'non-negative integer' | 'non-negative number';

function numberField(
  obj: Record<string, unknown>,
  prefix: string,
  key: string,
  check: Check,
  errors: ConfigValidationError[],
): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  const ok =
    typeof value === 'number' &&
    Number.isFinite(value) &&
    (check === 'positive integer'
      ? Number.isInteger(value) && value > 0
      : check === 'non-negative integer'
        ? Number.isInteger(value) && value >= 0
        : value >= 0);
  if (!ok) {
    errors.push({ path: `${prefix}.${key}`, message: `must be a ${check}` });
    return undefined;
  }
  return value;
}

function stringField(
  obj: Record<string, unknown>,
  prefix: string,
  key: string,
  errors: ConfigValidationError[],
): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    errors.push({ path: `${prefix}.${key}`, message: 'must be a non-empty string' });
    return undefined;
  }
  return value;
}

function validateAgent(obj: Record<string, unknown>, errors: ConfigValidationError[]): AgentConfig {
  rejectUnknown(obj, 'agent', CONFIG_SECTION_KEYS.agent, errors);
  const agent: AgentConfig = {};
  const maxIterations = numberField(obj, 'agent', 'maxIterations', 'positive integer', errors);
  if (maxIterations !== undefined) agent.maxIterations = maxIterations;

  const endStrategy = obj['endStrategy'];
  if (endStrategy === 'early' || endStrategy === 'exhaustive') {
    agent.endStrategy = endStrategy;
  } else if (endStrategy !== undefined) {
    errors.push({ path: 'agent.endStrategy', message: 'must be "early" or "exhaustive"' });
  }

  const outputToolName = stringField(obj, 'agent', 'outputToolName', errors);
  if (outputToolName !== undefined) agent.outputToolName = outputToolName;
  const outputToolDescription = stringField(obj, 'agent', 'outputToolDescription', errors);
  if (outputToolDescription !== undefined) agent.outputToolDescription = outputToolDescription;
  const toolTimeoutMs = numberField(obj, 'agent', 'toolTimeoutMs', 'positive integer', errors);
  if (toolTimeoutMs !== undefined) agent.toolTimeoutMs = toolTimeoutMs;
  const maxValidationRetries = numberField(obj, 'agent', 'maxValidationRetries', 'non-negative integer', errors);
  if (maxValidationRetries !== undefined) agent.maxValidationRetries = maxValidationRetries;
  return agent;
}

function validateRetry(obj: Record<string, unknown>, errors: ConfigValidationError[]): RetryConfig {
  rejectUnknown(obj, 'retry', CONFIG_SECTION_KEYS.retry, errors);
  const retry: RetryConfig = {};

  const preset = obj['preset'];
  if (preset !== undefined) {
    const match = RETRY_PRESETS.find((p) => p === preset);
    if (match) retry.preset = match;
    else errors.push({ path: 'retry.preset', message: `must be one of ${RETRY_PRESETS.join(', ')}` });
  }

  const maxAttempts = numberField(obj, 'retry', 'maxAttempts', 'positive integer', errors);
  if (maxAttempts !== undefined) retry.maxAttempts = maxAttempts;
  const initialDelayMs = numberField(obj, 'retry', 'initialDelayMs', 'non-negative number', errors);
  if (initialDelayMs !== undefined) retry.initialDelayMs = initialDelayMs;
  const maxDelayMs = numberField(obj, 'retry', 'maxDelayMs', 'non-negative number', errors);
  if (maxDelayMs !== undefined) retry.maxDelayMs = maxDelayMs;

  const multiplier = obj['multiplier'];
  if (typeof multiplier === 'number' && multiplier >= 1) {
    retry.multiplier = multiplier;
  } else if (multiplier !== undefined) {
    errors.push({ path: 'retry.multiplier', message: 'must be a number >= 1' });
  }

  const jitter = obj['jitter'];
  if (typeof jitter === 'number' && jitter >= 0 && jitter <= 1) {
    retry.jitter = jitter;
  } else if (jitter !== undefined) {
    errors.push({ path: 'retry.jitter', message: 'must be a number between 0 and 1' });
  }

  const retryable = obj['retryableErrors'];
  if (retryable !== undefined) {
    if (!Array.isArray(retryable)) {
      errors.push({ path: 'retry.retryableErrors', message: 'must be an array' });
    } else {
      const kinds: TransientErrorKind[] = [];
      retryable.forEach((entry: unknown, i) => {
        if (typeof entry === 'string' && isTransientKind(entry)) kinds.push(entry);
        else
          errors.push({
            path: `retry.retryableErrors[${i}]`,
            message: 'must be one of rate_limited, server_error, network_error',
          });
      });
      retry.retryableErrors = kinds;
    }
  }

  if (
    retry.initialDelayMs !== undefined &&
    retry.maxDelayMs !== undefined &&
    retry.maxDelayMs < retry.initialDelayMs
  ) {
    errors.push({ path: 'retry.maxDelayMs', message: 'must be >= retry.initialDelayMs' });
  }
  return retry;
}

function validateUsageLimits(
  obj: Record<string, unknown>,
  errors: ConfigValidationError[],
): UsageLimitsConfig {
  rejectUnknown(obj, 'usageLimits', CONFIG_SECTION_KEYS.usageLimits, errors);
  const limits: UsageLimitsConfig = {};
  for (const key of CONFIG_SECTION_KEYS.usageLimits) {
    const value = numberField(obj, 'usageLimits', key, 'non-negative integer', errors);
    if (value !== undefined) limits[key] = value;
  }
  return limits;
}

function validateLogging(obj: Record<string, unknown>, errors: ConfigValidationError[]): LoggingConfig {
  rejectUnknown(obj, 'logging', CONFIG_SECTION_KEYS.logging, errors);
  const level = obj['level'];
  if (level === undefined) return {};
  if (!isLogLevel(level)) {
    errors.push({ path: 'logging.level', message: 'must be one of debug, info, warn, error, silent' });
    return {};
  }
  return { level };
}
