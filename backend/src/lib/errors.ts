/**
 * Application Errors
 * Error taxonomy shared by the ingestion pipeline, the query path and the API
 */

export interface ErrorDetails {
  [key: string]: unknown;
}

/**
 * Base class for all errors raised by the core
 */
export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: ErrorDetails;

  constructor(message: string, code: string, statusCode = 500, details?: ErrorDetails) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export type MalformedReason =
  | 'not_an_object'
  | 'missing_id'
  | 'missing_content'
  | 'invalid_timestamp'
  | 'invalid_json';

/**
 * A raw item that cannot be normalized. Counted and dropped, never fatal.
 */
export class MalformedRecordError extends AppError {
  constructor(
    public readonly reason: MalformedReason,
    message: string,
    public readonly recordId?: string
  ) {
    super(message, 'MALFORMED_RECORD', 422, { reason, recordId });
    this.name = 'MalformedRecordError';
  }
}

/**
 * The vector backend could not be reached or rejected an operation
 */
export class VectorStoreUnavailableError extends AppError {
  constructor(
    public readonly backend: string,
    message = 'Vector store unavailable',
    public readonly originalError?: unknown
  ) {
    super(message, 'VECTOR_STORE_UNAVAILABLE', 503, { backend });
    this.name = 'VectorStoreUnavailableError';
  }
}

/**
 * The external answer-synthesis call failed, timed out or is switched off
 */
export class SynthesisUnavailableError extends AppError {
  constructor(message = 'Answer synthesis unavailable', public readonly originalError?: unknown) {
    super(message, 'SYNTHESIS_UNAVAILABLE', 503);
    this.name = 'SynthesisUnavailableError';
  }
}

/**
 * The embedding service failed for the query text itself
 */
export class EmbeddingUnavailableError extends AppError {
  constructor(message = 'Embedding service unavailable', public readonly originalError?: unknown) {
    super(message, 'EMBEDDING_UNAVAILABLE', 503);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, 'CONFIG_ERROR', 500, { issues });
    this.name = 'ConfigError';
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'BAD_REQUEST', 400, details);
    this.name = 'BadRequestError';
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
