/**
 * Error taxonomy for the extraction pipeline
 */

/**
 * Pipeline error kinds, one per failure class
 */
export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'PROVIDER_PROTOCOL_ERROR'
  | 'MALFORMED_OUTPUT_ERROR'
  | 'STORAGE_ERROR';

/**
 * Base class for all pipeline errors
 */
export class ProcflowError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ProcflowError';
  }
}

/**
 * Missing or invalid configuration (credential, base URL, variant name)
 */
export class ConfigurationError extends ProcflowError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network failure, non-success HTTP status or timeout on a provider call
 */
export class TransportError extends ProcflowError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    public readonly timedOut: boolean = false,
    details?: unknown
  ) {
    super(message, 'TRANSPORT_ERROR', details);
    this.name = 'TransportError';
  }
}

/**
 * The provider answered, but not with anything we can read as text
 */
export class ProviderProtocolError extends ProcflowError {
  constructor(
    message: string,
    public readonly provider: string,
    details?: unknown
  ) {
    super(message, 'PROVIDER_PROTOCOL_ERROR', details);
    this.name = 'ProviderProtocolError';
  }
}

/**
 * Maximum raw text kept on a MalformedOutputError
 */
export const RAW_EXCERPT_LENGTH = 500;

/**
 * Model output could not be recovered into a keyed object
 */
export class MalformedOutputError extends ProcflowError {
  public readonly rawExcerpt: string;

  constructor(message: string, rawText: string) {
    super(message, 'MALFORMED_OUTPUT_ERROR');
    this.name = 'MalformedOutputError';
    this.rawExcerpt = rawText.slice(0, RAW_EXCERPT_LENGTH);
  }
}

/**
 * Transactional write failure; the transaction has been rolled back
 */
export class StorageError extends ProcflowError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

/**
 * Readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
