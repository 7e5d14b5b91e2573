/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';
import { ConfigurationError } from '../utils/errors.js';

/**
 * Supported provider variants
 */
export const ProviderKindSchema = z.enum(['openai', 'anthropic', 'ollama', 'custom']);

export type ProviderKind = z.infer<typeof ProviderKindSchema>;

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Storage
  dbPath: z
    .string()
    .default('./process_flows.db')
    .describe('Path to the SQLite database'),

  // LLM Provider Configuration
  provider: ProviderKindSchema
    .default('openai')
    .describe('LLM provider variant'),
  model: z
    .string()
    .default('gpt-4o-mini')
    .describe('Model identifier sent to the provider'),
  temperature: z
    .coerce
    .number()
    .min(0)
    .max(2)
    .default(0.1)
    .describe('Sampling temperature'),
  maxTokens: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(100000)
    .default(2000)
    .describe('Maximum tokens for LLM responses'),
  timeoutMs: z
    .coerce
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Provider call timeout override in milliseconds'),
  openaiApiKey: z
    .string()
    .optional()
    .describe('OpenAI API key'),
  anthropicApiKey: z
    .string()
    .optional()
    .describe('Anthropic API key'),
  apiKey: z
    .string()
    .optional()
    .describe('Bearer token for the custom provider'),
  apiBaseUrl: z
    .string()
    .url()
    .optional()
    .describe('Endpoint for the custom provider, or override for the others'),

  // Extraction
  maxContentLength: z
    .coerce
    .number()
    .int()
    .min(1)
    .default(20000)
    .describe('Characters of document content sent to the model'),
  promptFile: z
    .string()
    .optional()
    .describe('Path to a prompt template file'),

  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends ConfigurationError {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message, issues);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Empty strings in .env files mean "unset"
 */
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    dbPath: env('PROCFLOW_DB_PATH'),
    provider: env('PROCFLOW_PROVIDER')?.toLowerCase(),
    model: env('PROCFLOW_MODEL'),
    temperature: env('PROCFLOW_TEMPERATURE'),
    maxTokens: env('PROCFLOW_MAX_TOKENS'),
    timeoutMs: env('PROCFLOW_TIMEOUT_MS'),
    openaiApiKey: env('OPENAI_API_KEY'),
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    apiKey: env('PROCFLOW_API_KEY'),
    apiBaseUrl: env('PROCFLOW_API_BASE_URL'),
    maxContentLength: env('PROCFLOW_MAX_CONTENT_LENGTH'),
    promptFile: env('PROCFLOW_PROMPT_FILE'),
    logLevel: env('PROCFLOW_LOG_LEVEL'),
    logFormat: env('PROCFLOW_LOG_FORMAT'),
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const rawConfig = buildRawConfig();
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: unknown): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}

/**
 * Get the credential the given provider needs, if configured
 */
export function getProviderApiKey(config: Config, provider: ProviderKind = config.provider): string | undefined {
  switch (provider) {
    case 'openai':
      return config.openaiApiKey;
    case 'anthropic':
      return config.anthropicApiKey;
    case 'custom':
      return config.apiKey;
    case 'ollama':
      return undefined;
  }
}
