/**
 * OpenAI chat-completion provider
 */

import { HttpProvider, buildMessages, requireSetting, type ProviderConfig, type ProviderRequest } from './provider.js';
import type { Transport } from './transport.js';

export const OPENAI_DEFAULTS = {
  endpoint: 'https://api.openai.com/v1/chat/completions',
  timeout: 60000,
};

export class OpenAIProvider extends HttpProvider {
  private readonly apiKey: string;

  constructor(config: ProviderConfig, transport?: Transport) {
    super('openai', config, OPENAI_DEFAULTS, transport);
    this.apiKey = requireSetting(
      config.apiKey,
      'OpenAI API key is required. Provide apiKey or set OPENAI_API_KEY.'
    );
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
