import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DimensionMismatchError,
  IndexingAbortedError,
  ProviderError,
  QuotaExceededError,
  ValidationError,
  toHttpError,
} from '../src/errors';
import type { IndexingReport } from '../src/types';

const report: IndexingReport = {
  articlesIndexed: 1,
  chunksIndexed: 2,
  articlesSkipped: 0,
  articlesNotProcessed: 3,
  cancelled: false,
  skipped: [],
};

describe('toHttpError', () => {
  it('maps quota exhaustion to 503 with a retry hint', () => {
    const error = new QuotaExceededError('embeddings: quota exceeded', 4, 6);
    expect(toHttpError(error)).toEqual({
      status: 503,
      body: { error: 'temporarily_unavailable', message: 'Upstream quota exhausted, retry later' },
      retryAfterSeconds: 6,
    });
  });

  it('maps configuration problems to 500 with their message', () => {
    expect(toHttpError(new ConfigError('bad setting'))).toEqual({
      status: 500,
      body: { error: 'configuration_error', message: 'bad setting' },
    });
    expect(toHttpError(new DimensionMismatchError(384, 1536, 'collection articles_384')).body).toEqual({
      error: 'configuration_error',
      message: 'collection articles_384: expected dimensionality 384, got 1536',
    });
  });

  it('maps validation errors to 400', () => {
    expect(toHttpError(new ValidationError('q: too short'))).toEqual({
      status: 400,
      body: { error: 'invalid_request', message: 'q: too short' },
    });
  });

  it('unwraps an aborted indexing run', () => {
    const aborted = new IndexingAbortedError(new QuotaExceededError('quota', 4, 2), report);
    expect(aborted.message).toBe('Indexing run aborted: quota');
    expect(aborted.report).toBe(report);
    expect(toHttpError(aborted).status).toBe(503);
    expect(toHttpError(aborted).retryAfterSeconds).toBe(2);
  });

  it('hides unexpected errors behind a generic 500', () => {
    expect(toHttpError(new ProviderError('secret upstream detail'))).toEqual({
      status: 500,
      body: { error: 'internal_error', message: 'Internal server error' },
    });
    expect(toHttpError('not an error').status).toBe(500);
  });
});
