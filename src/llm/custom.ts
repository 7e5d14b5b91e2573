/**
 * Generic REST provider
 * Sends an OpenAI-compatible chat payload to any endpoint with a bearer token
 */

import { HttpProvider, buildMessages, requireSetting, type ProviderConfig, type ProviderRequest } from './provider.js';
import type { Transport } from './transport.js';

export const CUSTOM_DEFAULTS = {
  timeout: 60000,
};

export class CustomProvider extends HttpProvider {
  private readonly apiKey: string;

  constructor(config: ProviderConfig, transport?: Transport) {
    super('custom', config, CUSTOM_DEFAULTS, transport);
    this.apiKey = requireSetting(config.apiKey, 'API key is required for the custom provider');
  }

  protected buildRequest(prompt: string): ProviderRequest {
    return {
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: {
        model: this.model,
        messages: buildMessages(prompt, this.systemPrompt),
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        response_format: { type: 'json_object' },
      },
    };
  }
}
