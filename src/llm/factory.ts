/**
 * Provider factory
 * Builds the adapter for a configured variant
 */

import { ProviderKindSchema, getProviderApiKey, type Config } from '../config/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { LLMProvider, ProviderConfig } from './provider.js';
import type { Transport } from './transport.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import { CustomProvider } from './custom.js';

/**
 * Create a provider by variant name
 * @throws ConfigurationError for unknown variants or missing settings
 */
export function createProvider(
  kind: string,
  config: ProviderConfig,
  transport?: Transport
): LLMProvider {
  const parsed = ProviderKindSchema.safeParse(kind.toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unsupported provider: ${kind}. Supported providers: ${ProviderKindSchema.options.join(', ')}`
    );
  }

  const logger = createLogger({ module: 'llm' });

  switch (parsed.data) {
    case 'openai':
      logger.info('Initializing OpenAI provider');
      return new OpenAIProvider(config, transport);
    case 'anthropic':
      logger.info('Initializing Anthropic provider');
      return new AnthropicProvider(config, transport);
    case 'ollama':
      logger.info('Initializing Ollama provider');
      return new OllamaProvider(config, transport);
    case 'custom':
      logger.info('Initializing custom REST provider');
      return new CustomProvider(config, transport);
  }
}

/**
 * Map application config onto provider config
 */
export function toProviderConfig(config: Config): ProviderConfig {
  return {
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeout: config.timeoutMs,
    apiKey: getProviderApiKey(config),
    baseUrl: config.apiBaseUrl,
  };
}

/**
 * Create the provider named in application config
 */
export function createProviderFromConfig(config: Config, transport?: Transport): LLMProvider {
  return createProvider(config.provider, toProviderConfig(config), transport);
}
