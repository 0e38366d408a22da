import type { SupportedModel, ModelProvider } from './types.js';
import { detectProvider } from './clients/types.js';
import { invalidConfigError, missingCredentialError } from './utils/errors.js';

interface ConfigDefaults {
  model: SupportedModel;
  timeout: number;
  parallel: boolean;
  verbose: boolean;
  previewLength: number;
  /** Unset: provider default */
  temperature?: number;
  /** Unset: provider default */
  maxTokens?: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Readonly<ConfigDefaults> = {
  model: 'gpt-4o-mini',
  timeout: 60000,
  parallel: false,
  verbose: false,
  previewLength: 2000,
};

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  ANTHROPIC_API_KEY: 'ANTHROPIC_API_KEY',
  MODEL: 'CONTRACT_ANALYZER_MODEL',
  PROVIDER: 'CONTRACT_ANALYZER_PROVIDER',
  TIMEOUT: 'CONTRACT_ANALYZER_TIMEOUT',
  PARALLEL: 'CONTRACT_ANALYZER_PARALLEL',
  TEMPERATURE: 'CONTRACT_ANALYZER_TEMPERATURE',
  MAX_TOKENS: 'CONTRACT_ANALYZER_MAX_TOKENS',
  PREVIEW_LENGTH: 'CONTRACT_ANALYZER_PREVIEW_LENGTH',
  VERBOSE: 'CONTRACT_ANALYZER_VERBOSE',
} as const;

/**
 * Options accepted by resolveConfig. Anything left out falls back to the
 * environment, then to DEFAULT_CONFIG.
 */
export interface AnalyzerConfigOptions {
  model?: SupportedModel;
  provider?: ModelProvider;
  apiKey?: string;
  baseUrl?: string;
  /** Request timeout in ms for each completion call */
  timeout?: number;
  /** Issue the five narrative calls concurrently */
  parallel?: boolean;
  temperature?: number;
  maxTokens?: number;
  previewLength?: number;
  verbose?: boolean;
}

/**
 * Resolved configuration with all required values set.
 */
export interface ResolvedConfig {
  model: SupportedModel;
  provider: ModelProvider;
  apiKey: string;
  baseUrl?: string;
  timeout: number;
  parallel: boolean;
  temperature?: number;
  maxTokens?: number;
  previewLength: number;
  verbose: boolean;
}

function parseProvider(value: string): ModelProvider {
  const lower = value.toLowerCase();
  if (lower === 'openai' || lower === 'anthropic') {
    return lower;
  }
  throw invalidConfigError(`Unknown provider: ${value}`);
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfigOptions {
  const config: AnalyzerConfigOptions = {};

  // Model
  const model = env[ENV_VARS.MODEL];
  if (model) {
    config.model = model;
  }

  // Provider
  const provider = env[ENV_VARS.PROVIDER];
  if (provider) {
    config.provider = parseProvider(provider);
  }

  // Timeout
  const timeout = env[ENV_VARS.TIMEOUT];
  if (timeout) {
    const parsed = parseInt(timeout, 10);
    if (!isNaN(parsed)) config.timeout = parsed;
  }

  // Parallel
  const parallel = env[ENV_VARS.PARALLEL];
  if (parallel) {
    config.parallel = parallel.toLowerCase() === 'true';
  }

  // Temperature
  const temperature = env[ENV_VARS.TEMPERATURE];
  if (temperature) {
    const parsed = parseFloat(temperature);
    if (!isNaN(parsed)) config.temperature = parsed;
  }

  // Max tokens
  const maxTokens = env[ENV_VARS.MAX_TOKENS];
  if (maxTokens) {
    const parsed = parseInt(maxTokens, 10);
    if (!isNaN(parsed)) config.maxTokens = parsed;
  }

  // Preview length
  const previewLength = env[ENV_VARS.PREVIEW_LENGTH];
  if (previewLength) {
    const parsed = parseInt(previewLength, 10);
    if (!isNaN(parsed)) config.previewLength = parsed;
  }

  // Verbose
  const verbose = env[ENV_VARS.VERBOSE];
  if (verbose) {
    config.verbose = verbose.toLowerCase() === 'true';
  }

  return config;
}

/**
 * Get the API key for a provider.
 * Throws MISSING_CREDENTIAL when neither an explicit key nor the provider's
 * environment variable is set.
 */
export function getApiKey(
  provider: ModelProvider,
  explicitKey?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (explicitKey) {
    return explicitKey;
  }

  const envVar = provider === 'openai' ? ENV_VARS.OPENAI_API_KEY : ENV_VARS.ANTHROPIC_API_KEY;
  const key = env[envVar];

  if (!key) {
    throw missingCredentialError(provider, envVar);
  }

  return key;
}

/**
 * Resolve and validate configuration.
 */
export function resolveConfig(
  options: AnalyzerConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  // Load env config first, then override with explicit options
  const envConfig = loadEnvConfig(env);

  // Explicit options win over env; undefined never overrides a default
  const merged = {
    model: options.model ?? envConfig.model ?? DEFAULT_CONFIG.model,
    provider: options.provider ?? envConfig.provider,
    apiKey: options.apiKey,
    baseUrl: options.baseUrl,
    timeout: options.timeout ?? envConfig.timeout ?? DEFAULT_CONFIG.timeout,
    parallel: options.parallel ?? envConfig.parallel ?? DEFAULT_CONFIG.parallel,
    temperature: options.temperature ?? envConfig.temperature ?? DEFAULT_CONFIG.temperature,
    maxTokens: options.maxTokens ?? envConfig.maxTokens ?? DEFAULT_CONFIG.maxTokens,
    previewLength: options.previewLength ?? envConfig.previewLength ?? DEFAULT_CONFIG.previewLength,
    verbose: options.verbose ?? envConfig.verbose ?? DEFAULT_CONFIG.verbose,
  };

  if (!merged.model) {
    throw invalidConfigError('Model is required');
  }

  const provider = merged.provider ?? detectProvider(merged.model);

  if (!Number.isFinite(merged.timeout) || merged.timeout < 1000) {
    throw invalidConfigError('timeout must be at least 1000ms');
  }

  if (
    merged.temperature !== undefined &&
    (!Number.isFinite(merged.temperature) || merged.temperature < 0 || merged.temperature > 2)
  ) {
    throw invalidConfigError('temperature must be between 0 and 2');
  }

  if (merged.maxTokens !== undefined && (!Number.isInteger(merged.maxTokens) || merged.maxTokens <= 0)) {
    throw invalidConfigError('maxTokens must be positive');
  }

  if (!Number.isInteger(merged.previewLength) || merged.previewLength <= 0) {
    throw invalidConfigError('previewLength must be positive');
  }

  // Credential last so that value errors are reported first
  const apiKey = getApiKey(provider, merged.apiKey, env);

  return {
    model: merged.model,
    provider,
    apiKey,
    baseUrl: merged.baseUrl,
    timeout: merged.timeout,
    parallel: merged.parallel,
    temperature: merged.temperature,
    maxTokens: merged.maxTokens,
    previewLength: merged.previewLength,
    verbose: merged.verbose,
  };
}

/**
 * Get a summary of current configuration.
 */
export function getConfigSummary(config: ResolvedConfig): string {
  const lines = [
    `Model: ${config.model} (${config.provider})`,
    `Timeout: ${config.timeout}ms`,
    `Parallel: ${config.parallel ? 'yes' : 'no'}`,
    `Preview Length: ${config.previewLength}`,
  ];

  if (config.temperature !== undefined) {
    lines.push(`Temperature: ${config.temperature}`);
  }

  if (config.maxTokens) {
    lines.push(`Max Tokens: ${config.maxTokens.toLocaleString()}`);
  }

  return lines.join('\n');
}
