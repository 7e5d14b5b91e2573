/**
 * Ollama generate provider
 * Runs against a local daemon; no credential needed
 */

import { HttpProvider, type ProviderConfig, type ProviderRequest } from './provider.js';
import type { Transport } from './transport.js';

export const OLLAMA_DEFAULTS = {
  endpoint: 'http://localhost:11434/api/generate',
  timeout: 120000,
};

export class OllamaProvider extends HttpProvider {
  constructor(config: ProviderConfig, transport?: Transport) {
    super('ollama', config, OLLAMA_DEFAULTS, transport);
  }

  protected buildRequest(prompt: string): ProviderRequest {
    return {
      headers: { 'Content-Type': 'application/json' },
      body: {
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: this.temperature,
          num_predict: this.maxTokens,
        },
      },
    };
  }
}
