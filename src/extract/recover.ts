/**
 * Structural recovery of JSON objects from LLM output
 *
 * Providers are asked for JSON but routinely return it wrapped in prose or
 * code fences, with `//` comments, trailing commas, or cut off at the end.
 * `recover` applies a fixed sequence of repairs and gives up with a
 * MalformedOutputError once they are exhausted. It is not a parser: nested
 * unbalanced braces beyond a single closing pass still fail.
 */

import { MalformedOutputError } from '../utils/errors.js';

/**
 * Loosely-typed object recovered from model output
 */
export type RecoveredObject = Record<string, unknown>;

/**
 * Contract for swapping in a stricter or more lenient parser
 */
export type StructuralRecovery = (rawText: string) => RecoveredObject;

/**
 * Which repair step produced the object
 */
export type RecoveryStrategy = 'direct' | 'span' | 'cleaned' | 'autoclosed';

/**
 * Recovery result with the strategy that succeeded
 */
export interface RecoveryReport {
  value: RecoveredObject;
  strategy: RecoveryStrategy;
}

/**
 * Greedy span from the first `{` to the last `}`
 */
const OBJECT_SPAN = /\{[\s\S]*\}/;

/**
 * Comma followed only by whitespace before a closing bracket or brace
 */
const TRAILING_COMMA = /,(\s*[\]}])/g;

/**
 * Check for a keyed mapping (not an array, not null)
 */
export function isRecoveredObject(value: unknown): value is RecoveredObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse text, returning undefined unless it is a keyed mapping
 */
function tryParseObject(text: string): RecoveredObject | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isRecoveredObject(parsed) ? parsed : undefined;
}

function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}

/**
 * Remove `//` to end of line, except inside string literals
 */
export function stripLineComments(text: string): string {
  let result = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];

    if (inString) {
      result += c;
      if (escaped) {
        escaped = false;
      } else if (c === '\\') {
        escaped = true;
      } else if (c === '"' || c === '\n') {
        inString = false;
      }
      continue;
    }

    if (c === '/' && text[i + 1] === '/') {
      const end = text.indexOf('\n', i);
      if (end === -1) {
        break;
      }
      i = end - 1;
      continue;
    }

    if (c === '"') {
      inString = true;
    }
    result += c;
  }

  return result;
}

/**
 * Strip line comments and trailing commas from a candidate span
 */
export function cleanCandidate(candidate: string): string {
  return stripLineComments(candidate).replace(TRAILING_COMMA, '$1');
}

/**
 * Append one closing brace and one closing bracket where they look missing
 */
export function autoClose(candidate: string): string {
  let closed = candidate;
  if (!closed.trim().endsWith('}')) {
    closed += '}';
  }
  if (countChar(closed, '[') > countChar(closed, ']')) {
    closed += ']';
  }
  return closed;
}

/**
 * Recover an object and report which strategy worked
 * @throws MalformedOutputError when every strategy fails
 */
export function recoverWithReport(rawText: string): RecoveryReport {
  const direct = tryParseObject(rawText);
  if (direct) {
    return { value: direct, strategy: 'direct' };
  }

  const match = OBJECT_SPAN.exec(rawText);
  if (!match) {
    throw new MalformedOutputError('No JSON object found in response', rawText);
  }

  const span = tryParseObject(match[0]);
  if (span) {
    return { value: span, strategy: 'span' };
  }

  const cleaned = cleanCandidate(match[0]);
  const repaired = tryParseObject(cleaned);
  if (repaired) {
    return { value: repaired, strategy: 'cleaned' };
  }

  const closed = tryParseObject(autoClose(cleaned));
  if (closed) {
    return { value: closed, strategy: 'autoclosed' };
  }

  throw new MalformedOutputError('Response is not valid JSON after repair', rawText);
}

/**
 * Recover a keyed object from raw model output
 * @throws MalformedOutputError when every strategy fails
 */
export const recover: StructuralRecovery = (rawText) => recoverWithReport(rawText).value;
