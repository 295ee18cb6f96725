import {
  ConfigError,
  applyEnvOverrides,
  createConsoleLogger,
  loadConfig,
  validateConfigObject,
  type TetherConfig,
} from '@tether/core';
import type { AgentOptions } from './agent.js';
import { retryPolicyFromConfig } from './retry-policy.js';

/** The part of {@link AgentOptions} a config file can supply. */
export type ConfiguredAgentOptions = Pick<
  AgentOptions<unknown, unknown>,
  | 'maxIterations'
  | 'usageLimits'
  | 'endStrategy'
  | 'outputToolName'
  | 'outputToolDescription'
  | 'retryPolicy'
  | 'toolTimeoutMs'
  | 'maxValidationRetries'
  | 'logger'
>;

/**
 * Turn a validated config into agent options. Spread the result into
 * `new Agent({ model, output, ...settings })`.
 */
export function agentSettingsFromConfig(config: TetherConfig): ConfiguredAgentOptions {
  const agent = config.agent ?? {};
  const settings: ConfiguredAgentOptions = {
    retryPolicy: retryPolicyFromConfig(config.retry),
    usageLimits: { ...config.usageLimits },
  };
  if (agent.maxIterations !== undefined) settings.maxIterations = agent.maxIterations;
  if (agent.endStrategy !== undefined) settings.endStrategy = agent.endStrategy;
  if (agent.outputToolName !== undefined) settings.outputToolName = agent.outputToolName;
  if (agent.outputToolDescription !== undefined) settings.outputToolDescription = agent.outputToolDescription;
  if (agent.toolTimeoutMs !== undefined) settings.toolTimeoutMs = agent.toolTimeoutMs;
  if (agent.maxValidationRetries !== undefined) settings.maxValidationRetries = agent.maxValidationRetries;
  if (config.logging?.level !== undefined) settings.logger = createConsoleLogger(config.logging.level);
  return settings;
}

/**
 * Load a JSON5 config file, overlay `TETHER_` environment variables and
 * convert the result. Throws ConfigError when either step leaves it invalid.
 */
export function loadAgentSettings(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): ConfiguredAgentOptions {
  const loaded = loadConfig(filePath);
  if (!loaded.config) throw new ConfigError(loaded.errors);
  const overlaid = validateConfigObject(applyEnvOverrides(loaded.config, env));
  if (!overlaid.config) throw new ConfigError(overlaid.errors);
  return agentSettingsFromConfig(overlaid.config);
}
