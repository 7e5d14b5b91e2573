/**
 * Response shape matchers
 *
 * Backends reuse overlapping field names, so shapes are tried in a fixed
 * order. Add new shapes as new matchers rather than editing existing ones.
 */

import type { Logger } from '../utils/logger.js';
import { ProviderProtocolError } from '../utils/errors.js';

type JsonObject = Record<string, unknown>;

/**
 * Pulls response text out of one payload shape
 */
export interface ShapeMatcher {
  name: string;
  match(payload: JsonObject): string | undefined;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * { choices: [{ message: { content } }] }
 */
export const chatChoicesShape: ShapeMatcher = {
  name: 'choices',
  match(payload) {
    if (!Array.isArray(payload.choices) || payload.choices.length === 0) return undefined;
    const first: unknown = payload.choices[0];
    if (!isObject(first) || !isObject(first.message)) return undefined;
    return typeof first.message.content === 'string' ? first.message.content : undefined;
  },
};

/**
 * { content: [{ type: 'text', text }, ...] }, concatenated in order
 */
export const contentBlocksShape: ShapeMatcher = {
  name: 'content-blocks',
  match(payload) {
    if (!Array.isArray(payload.content)) return undefined;
    const parts: string[] = [];
    for (const block of payload.content) {
      if (typeof block === 'string') {
        parts.push(block);
      } else if (isObject(block) && typeof block.text === 'string') {
        parts.push(block.text);
      }
    }
    return parts.length > 0 ? parts.join('') : undefined;
  },
};

/**
 * { response: '...' }
 */
export const generateShape: ShapeMatcher = {
  name: 'response',
  match(payload) {
    return typeof payload.response === 'string' ? payload.response : undefined;
  },
};

/**
 * { content: '...' }
 */
export const contentStringShape: ShapeMatcher = {
  name: 'content',
  match(payload) {
    return typeof payload.content === 'string' ? payload.content : undefined;
  },
};

/**
 * { text: '...' }
 */
export const textShape: ShapeMatcher = {
  name: 'text',
  match(payload) {
    return typeof payload.text === 'string' ? payload.text : undefined;
  },
};

/**
 * { message: { content } } or any other message value, stringified
 */
export const messageShape: ShapeMatcher = {
  name: 'message',
  match(payload) {
    const message = payload.message;
    if (message === undefined || message === null) return undefined;
    if (isObject(message)) {
      return typeof message.content === 'string' ? message.content : JSON.stringify(message);
    }
    return typeof message === 'string' ? message : JSON.stringify(message);
  },
};

/**
 * Matchers in priority order
 */
export const RESPONSE_SHAPES: readonly ShapeMatcher[] = [
  chatChoicesShape,
  contentBlocksShape,
  generateShape,
  contentStringShape,
  textShape,
  messageShape,
];

/**
 * Extracted text and the shape that produced it
 */
export interface ExtractedText {
  text: string;
  shape: string;
}

/**
 * Get response text from a decoded payload
 * Unknown shapes are serialized whole and returned with a warning
 * @throws ProviderProtocolError if the payload cannot be turned into text
 */
export function extractResponseText(
  payload: unknown,
  provider: string,
  logger: Logger,
  shapes: readonly ShapeMatcher[] = RESPONSE_SHAPES
): ExtractedText {
  if (isObject(payload)) {
    for (const shape of shapes) {
      const text = shape.match(payload);
      if (text !== undefined) {
        return { text, shape: shape.name };
      }
    }
  }

  const serialized: string | undefined = JSON.stringify(payload);
  if (serialized === undefined) {
    throw new ProviderProtocolError(`${provider} returned a response with no text`, provider);
  }

  logger.warn(
    { provider, keys: isObject(payload) ? Object.keys(payload) : [] },
    'Unexpected API response format, returning whole payload'
  );
  return { text: serialized, shape: 'raw' };
}
