/**
 * procflow - process-flow extraction from SOP documents
 * Main library entry point
 */

export * from './config/index.js';
export * from './utils/errors.js';
export { getLogger, setLogger, createLogger, type Logger } from './utils/logger.js';
export * from './db/connection.js';
export * from './db/flows.js';
export * from './documents/reader.js';
export * from './extract/prompts.js';
export * from './extract/recover.js';
export * from './extract/normalize.js';
export * from './llm/provider.js';
export * from './llm/transport.js';
export * from './llm/shapes.js';
export * from './llm/factory.js';
export { OpenAIProvider, OPENAI_DEFAULTS } from './llm/openai.js';
export { AnthropicProvider, ANTHROPIC_DEFAULTS } from './llm/anthropic.js';
export { OllamaProvider, OLLAMA_DEFAULTS } from './llm/ollama.js';
export { CustomProvider, CUSTOM_DEFAULTS } from './llm/custom.js';
export * from './pipeline/extract.js';
export { version } from './version.js';
