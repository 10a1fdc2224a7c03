import type { IndexingReport } from '../types';

// Base error class for every pipeline error
export class PipelineError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export type RejectionReason = 'empty' | 'too_short' | 'boilerplate' | 'low_quality';

// Article failed the quality filter; the run skips it and continues
export class QualityRejectedError extends PipelineError {
  constructor(
    public readonly reason: RejectionReason,
    public readonly detail: string
  ) {
    super(`Article rejected (${reason}): ${detail}`, 'QUALITY_REJECTED');
    this.name = 'QualityRejectedError';
  }
}

// Segmentation response did not satisfy the segment schema; triggers fallback chunking
export class ChunkValidationError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CHUNK_VALIDATION_FAILED');
    this.name = 'ChunkValidationError';
  }
}

// Network or timeout failure that outlived its retry budget
export class TransientProviderError extends PipelineError {
  constructor(message: string, public readonly attempts: number, options?: { cause?: unknown }) {
    super(message, 'TRANSIENT_PROVIDER_ERROR', options);
    this.name = 'TransientProviderError';
  }
}

// Rate limit or quota signal that outlived its retry budget
export class QuotaExceededError extends PipelineError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly retryAfterSeconds = 30,
    options?: { cause?: unknown }
  ) {
    super(message, 'QUOTA_EXCEEDED', options);
    this.name = 'QuotaExceededError';
  }
}

// Invalid configuration or call order; fatal, never retried
export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Vector size disagrees with the collection or with the rest of the batch
export class DimensionMismatchError extends PipelineError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string
  ) {
    super(`${context}: expected dimensionality ${expected}, got ${actual}`, 'DIMENSION_MISMATCH');
    this.name = 'DimensionMismatchError';
  }
}

// Non-retryable backend failure (bad response shape, rejected credentials)
export class ProviderError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PROVIDER_ERROR', options);
    this.name = 'ProviderError';
  }
}

// Caller supplied invalid input
export class ValidationError extends PipelineError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class TimeoutError extends PipelineError {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

// A fatal embedding/store error stopped an indexing run; `failure` holds the original error
export class IndexingAbortedError extends PipelineError {
  constructor(
    public readonly failure: Error,
    public readonly report: IndexingReport
  ) {
    super(`Indexing run aborted: ${failure.message}`, 'INDEXING_ABORTED', { cause: failure });
    this.name = 'IndexingAbortedError';
  }
}

export function isFatalConfigError(e: unknown): e is ConfigError | DimensionMismatchError {
  return e instanceof ConfigError || e instanceof DimensionMismatchError;
}

export interface HttpError {
  status: number;
  body: { error: string; message: string };
  retryAfterSeconds?: number;
}

/**
 * Map an error to the response class the REST layer returns.
 * Quota exhaustion is "temporarily unavailable", configuration problems are fatal,
 * everything unexpected is an internal error.
 */
export function toHttpError(e: unknown): HttpError {
  const error = e instanceof IndexingAbortedError ? e.failure : e;

  if (error instanceof QuotaExceededError) {
    return {
      status: 503,
      body: { error: 'temporarily_unavailable', message: 'Upstream quota exhausted, retry later' },
      retryAfterSeconds: error.retryAfterSeconds,
    };
  }
  if (isFatalConfigError(error)) {
    return {
      status: 500,
      body: { error: 'configuration_error', message: error.message },
    };
  }
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: { error: 'invalid_request', message: error.message },
    };
  }
  return {
    status: 500,
    body: { error: 'internal_error', message: 'Internal server error' },
  };
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
