/**
 * Anthropic messages provider
 */

import { HttpProvider, requireSetting, type ProviderConfig, type ProviderRequest } from './provider.js';
import type { Transport } from './transport.js';

export const ANTHROPIC_DEFAULTS = {
  endpoint: 'https://api.anthropic.com/v1/messages',
  timeout: 60000,
  apiVersion: '2023-06-01',
};

/**
 * Anthropic API request
 */
interface AnthropicRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export class AnthropicProvider extends HttpProvider {
  private readonly apiKey: string;

  constructor(config: ProviderConfig, transport?: Transport) {
    super('anthropic', config, ANTHROPIC_DEFAULTS, transport);
    this.apiKey = requireSetting(
      config.apiKey,
      'Anthropic API key is required. Provide apiKey or set ANTHROPIC_API_KEY.'
    );
  }

  protected buildRequest(prompt: string): ProviderRequest {
    const body: AnthropicRequest = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system: this.systemPrompt,
      messages: [{ role: 'user', content: prompt }],
    };

    return {
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_DEFAULTS.apiVersion,
      },
      body,
    };
  }
}
