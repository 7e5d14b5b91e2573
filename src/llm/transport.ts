/**
 * HTTP transport for provider calls
 * Every call is bounded by a timeout; failures surface as TransportError
 */

import { TransportError, ProviderProtocolError, RAW_EXCERPT_LENGTH } from '../utils/errors.js';

/**
 * One JSON POST to a provider endpoint
 */
export interface TransportRequest {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  /** Milliseconds before the call is abandoned */
  timeout: number;
}

/**
 * Response body: decoded JSON, or the text itself when it is not JSON
 */
export type TransportBody =
  | { kind: 'json'; payload: unknown }
  | { kind: 'text'; text: string };

/**
 * Sends a JSON request and returns the response body
 */
export interface Transport {
  postJson(request: TransportRequest): Promise<TransportBody>;
}

/**
 * Map a thrown fetch error onto TransportError
 */
function toTransportError(error: unknown, request: TransportRequest): TransportError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new TransportError(
      `Request to ${request.provider} timed out after ${request.timeout}ms`,
      request.provider,
      undefined,
      true
    );
  }

  const message = error instanceof Error ? error.message : 'Unknown network error';
  return new TransportError(
    `Request to ${request.provider} failed: ${message}`,
    request.provider,
    undefined,
    false,
    error
  );
}

/**
 * Transport over the global fetch
 */
export class FetchTransport implements Transport {
  async postJson(request: TransportRequest): Promise<TransportBody> {
    let status: number;
    let ok: boolean;
    let text: string;

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: AbortSignal.timeout(request.timeout),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      throw toTransportError(error, request);
    }

    if (!ok) {
      const excerpt = text.slice(0, RAW_EXCERPT_LENGTH);
      throw new TransportError(
        `${request.provider} returned HTTP ${status}: ${excerpt}`,
        request.provider,
        status,
        false,
        excerpt
      );
    }

    if (text.trim() === '') {
      throw new ProviderProtocolError(`${request.provider} returned an empty body`, request.provider);
    }

    try {
      const payload: unknown = JSON.parse(text);
      return { kind: 'json', payload };
    } catch {
      return { kind: 'text', text };
    }
  }
}
