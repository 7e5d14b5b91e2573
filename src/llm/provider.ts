/**
 * LLM Provider abstraction
 * Every backend exposes the same send-prompt / get-text contract
 */

import type { ProviderKind } from '../config/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { EXTRACTION_SYSTEM_PROMPT } from '../extract/prompts.js';
import { extractResponseText } from './shapes.js';
import { FetchTransport, type Transport } from './transport.js';

/**
 * Message role in conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Chat message
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Provider configuration
 * Credentials are passed in explicitly; providers never read the environment
 */
export interface ProviderConfig {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Milliseconds; each variant has its own default */
  timeout?: number;
  apiKey?: string;
  baseUrl?: string;
  systemPrompt?: string;
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  readonly name: ProviderKind;
  readonly model: string;

  /**
   * Send a prompt and return the raw response text
   * @throws TransportError on network failure, HTTP error or timeout
   * @throws ProviderProtocolError when the response body is empty or holds no text
   */
  send(prompt: string): Promise<string>;
}

/**
 * Default completion options
 */
export const DEFAULT_OPTIONS = {
  model: 'gpt-4o-mini',
  temperature: 0.1,
  maxTokens: 2000,
} as const;

/**
 * Per-variant endpoint and timeout defaults
 */
export interface VariantDefaults {
  endpoint?: string;
  timeout: number;
}

/**
 * Outgoing request without the endpoint
 */
export interface ProviderRequest {
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Require a non-empty setting
 * @throws ConfigurationError when it is missing
 */
export function requireSetting(value: string | undefined, message: string): string {
  if (!value || value.trim() === '') {
    throw new ConfigurationError(message);
  }
  return value;
}

/**
 * Check that an endpoint is an absolute http(s) URL
 */
export function validateEndpoint(endpoint: string, provider: string): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigurationError(`Invalid base URL for ${provider}: ${endpoint}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`Base URL for ${provider} must use http or https: ${endpoint}`);
  }
  return endpoint;
}

/**
 * Build messages array with optional system prompt
 */
export function buildMessages(
  prompt: string,
  systemPrompt?: string
): ChatMessage[] {
  const messages: ChatMessage[] = [];

  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }

  messages.push({ role: 'user', content: prompt });

  return messages;
}

/**
 * Shared plumbing for providers reached over HTTP
 */
export abstract class HttpProvider implements LLMProvider {
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly timeout: number;
  readonly endpoint: string;
  readonly systemPrompt: string;
  protected readonly logger: Logger;

  protected constructor(
    readonly name: ProviderKind,
    config: ProviderConfig,
    defaults: VariantDefaults,
    protected readonly transport: Transport = new FetchTransport()
  ) {
    this.model = config.model ?? DEFAULT_OPTIONS.model;
    this.temperature = config.temperature ?? DEFAULT_OPTIONS.temperature;
    this.maxTokens = config.maxTokens ?? DEFAULT_OPTIONS.maxTokens;
    this.timeout = config.timeout ?? defaults.timeout;
    this.systemPrompt = config.systemPrompt ?? EXTRACTION_SYSTEM_PROMPT;
    this.endpoint = validateEndpoint(
      requireSetting(config.baseUrl ?? defaults.endpoint, `Base URL is required for provider '${name}'`),
      name
    );
    this.logger = createLogger({ module: 'llm', provider: name });
  }

  /**
   * Build headers and body for one prompt
   */
  protected abstract buildRequest(prompt: string): ProviderRequest;

  async send(prompt: string): Promise<string> {
    const { headers, body } = this.buildRequest(prompt);

    this.logger.debug({ model: this.model, endpoint: this.endpoint, promptLength: prompt.length }, 'Sending prompt');

    const response = await this.transport.postJson({
      provider: this.name,
      url: this.endpoint,
      headers,
      body,
      timeout: this.timeout,
    });

    if (response.kind === 'text') {
      this.logger.warn(
        { responseLength: response.text.length },
        'Response body is not JSON, returning it as text'
      );
      return response.text;
    }

    const { text, shape } = extractResponseText(response.payload, this.name, this.logger);
    this.logger.debug({ shape, responseLength: text.length }, 'Received response');
    return text;
  }
}
