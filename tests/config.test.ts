import { describe, it, expect } from 'vitest';
import { LOCAL_EMBEDDING_DIMENSIONS, LOCAL_EMBEDDING_MODEL, REMOTE_EMBEDDING_MODEL, loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server.port).toBe(3001);
    expect(config.server.nodeEnv).toBe('development');
    expect(config.server.apiKey).toBeUndefined();
    expect(config.debug).toBe(false);
    expect(config.chunking.strategy).toBe('simple');
    expect(config.chunking.windowSize).toBe(2000);
    expect(config.chunking.overlap).toBe(200);
    expect(config.embeddings.provider).toBe('local');
    expect(config.embeddings.model).toBe(LOCAL_EMBEDDING_MODEL);
    expect(config.embeddings.dimensions).toBe(LOCAL_EMBEDDING_DIMENSIONS);
    expect(config.vectorStore.provider).toBe('qdrant');
    expect(config.vectorStore.collection).toBe('articles');
    expect(config.vectorStore.distance).toBe('Cosine');
    expect(config.retry).toEqual({
      maxAttempts: 4,
      maxTransientAttempts: 3,
      baseDelayMs: 500,
      maxDelayMs: 6000,
      jitterMs: 300,
    });
    expect(config.search).toEqual({ fanOut: 8, minCandidates: 20, snippetsPerArticle: 3 });
  });

  it('coerces numeric and boolean variables', () => {
    const config = loadConfig({
      PORT: '8080',
      DEBUG: '1',
      CHUNK_WINDOW_SIZE: '500',
      CHUNK_OVERLAP: '50',
      SCHEDULER_ENABLED: 'true',
      VECTOR_STORE_PROVIDER: 'memory',
    });

    expect(config.server.port).toBe(8080);
    expect(config.debug).toBe(true);
    expect(config.chunking.windowSize).toBe(500);
    expect(config.chunking.overlap).toBe(50);
    expect(config.ingestion.schedulerEnabled).toBe(true);
    expect(config.vectorStore.provider).toBe('memory');
  });

  it('treats blank optional strings as unset', () => {
    const config = loadConfig({ API_KEY: '   ', FRONTEND_URL: '' });
    expect(config.server.apiKey).toBeUndefined();
    expect(config.server.frontendUrl).toBeUndefined();
  });

  it('uses the remote default model without a declared size', () => {
    const config = loadConfig({ EMBEDDING_PROVIDER: 'remote', OPENROUTER_API_KEY: 'test-secret' });
    expect(config.embeddings.model).toBe(REMOTE_EMBEDDING_MODEL);
    expect(config.embeddings.dimensions).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', VECTOR_DISTANCE: 'Euclid' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'abc', VECTOR_DISTANCE: 'Euclid' })).toThrow(/PORT: .*; VECTOR_DISTANCE: /);
  });

  it('rejects an overlap that is not smaller than the window', () => {
    expect(() => loadConfig({ CHUNK_WINDOW_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'CHUNK_OVERLAP (100) must be smaller than CHUNK_WINDOW_SIZE (100)'
    );
  });

  it('rejects an inverted agentic range', () => {
    expect(() => loadConfig({ AGENTIC_MIN_CHARS: '5000', AGENTIC_MAX_CHARS: '1000' })).toThrow(
      'AGENTIC_MIN_CHARS must not exceed AGENTIC_MAX_CHARS'
    );
  });

  it('requires an API key for remote embeddings and agentic chunking', () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: 'remote' })).toThrow(
      'OPENROUTER_API_KEY is required when EMBEDDING_PROVIDER=remote'
    );
    expect(() => loadConfig({ CHUNK_STRATEGY: 'agentic' })).toThrow(
      'OPENROUTER_API_KEY is required when CHUNK_STRATEGY=agentic'
    );
  });

  it('returns a frozen value', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.chunking)).toBe(true);
  });
});
