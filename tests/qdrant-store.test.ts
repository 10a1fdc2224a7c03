import { describe, it, expect, vi } from 'vitest';
import { ConfigError, DimensionMismatchError, TimeoutError, TransientProviderError } from '../src/errors';
import { QdrantVectorStore, buildFilter, collectionNameFor, pointIdFor } from '../src/stores';
import { fastRetryPolicy, makePayload, makePoint } from './fixtures';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function fakeClient(existing: Array<{ name: string; size: number }> = []) {
  return {
    getCollections: vi.fn().mockResolvedValue({ collections: existing.map(({ name }) => ({ name })) }),
    getCollection: vi.fn().mockImplementation(async (name: string) => {
      const found = existing.find(c => c.name === name);
      return { config: { params: { vectors: { size: found?.size ?? 0, distance: 'Cosine' } } } };
    }),
    createCollection: vi.fn().mockResolvedValue(true),
    createPayloadIndex: vi.fn().mockResolvedValue({ status: 'completed' }),
    upsert: vi.fn().mockResolvedValue({ status: 'completed' }),
    search: vi.fn().mockResolvedValue([]),
  };
}

function storeFor(client: ReturnType<typeof fakeClient>) {
  return new QdrantVectorStore(client, { collection: 'articles', timeoutMs: 1000, retryPolicy: fastRetryPolicy() });
}

describe('pointIdFor', () => {
  it('derives a stable UUID from the chunk id', () => {
    expect(pointIdFor('a1:0')).toMatch(UUID);
    expect(pointIdFor('a1:0')).toBe(pointIdFor('a1:0'));
    expect(pointIdFor('a1:0')).not.toBe(pointIdFor('a1:1'));
  });
});

describe('buildFilter', () => {
  it('returns undefined without conditions', () => {
    expect(buildFilter(undefined)).toBeUndefined();
    expect(buildFilter({})).toBeUndefined();
  });

  it('combines source and date range conditions', () => {
    expect(
      buildFilter({
        source: 'Wire',
        publishedAfter: new Date('2024-01-01T00:00:00Z'),
        publishedBefore: new Date('2024-02-01T00:00:00Z'),
      })
    ).toEqual({
      must: [
        { key: 'source', match: { value: 'Wire' } },
        { key: 'published_at_ts', range: { gte: 1_704_067_200, lte: 1_706_745_600 } },
      ],
    });
  });

  it('filters by article id', () => {
    expect(buildFilter({ articleId: 'a1' })).toEqual({ must: [{ key: 'article_id', match: { value: 'a1' } }] });
  });
});

describe('QdrantVectorStore', () => {
  it('creates a collection per dimensionality with payload indexes', async () => {
    const client = fakeClient();
    const store = storeFor(client);

    await store.ensureCollection(3, 'Cosine');
    await store.ensureCollection(3, 'Cosine');

    expect(collectionNameFor('articles', 3)).toBe('articles_3');
    expect(client.getCollections).toHaveBeenCalledTimes(1);
    expect(client.createCollection).toHaveBeenCalledWith('articles_3', { vectors: { size: 3, distance: 'Cosine' } });
    expect(client.createPayloadIndex.mock.calls.map(([, params]) => params)).toEqual([
      { field_name: 'article_id', field_schema: 'keyword', wait: true },
      { field_name: 'source', field_schema: 'keyword', wait: true },
      { field_name: 'published_at_ts', field_schema: 'integer', wait: true },
    ]);
  });

  it('reuses an existing collection of the right size', async () => {
    const client = fakeClient([{ name: 'articles_3', size: 3 }]);

    await storeFor(client).ensureCollection(3, 'Cosine');

    expect(client.getCollection).toHaveBeenCalledWith('articles_3');
    expect(client.createCollection).not.toHaveBeenCalled();
  });

  it('rejects an existing collection of another size', async () => {
    const client = fakeClient([{ name: 'articles_3', size: 5 }]);

    await expect(storeFor(client).ensureCollection(3, 'Cosine')).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it('refuses to write before setup', async () => {
    await expect(storeFor(fakeClient()).upsert([makePoint('a:0', [1, 0, 0])])).rejects.toBeInstanceOf(ConfigError);
  });

  it('upserts points under derived ids and waits for the write', async () => {
    const client = fakeClient();
    const store = storeFor(client);
    await store.ensureCollection(3, 'Cosine');

    await store.upsert([makePoint('a:0', [1, 0, 0])]);

    expect(client.upsert).toHaveBeenCalledTimes(1);
    const [collection, request] = client.upsert.mock.calls[0];
    expect(collection).toBe('articles_3');
    expect(request).toEqual({
      wait: true,
      points: [{ id: pointIdFor('a:0'), vector: [1, 0, 0], payload: makePoint('a:0', [1, 0, 0]).payload }],
    });
  });

  it('splits large upserts into batches', async () => {
    const client = fakeClient();
    const store = storeFor(client);
    await store.ensureCollection(2, 'Cosine');

    await store.upsert(Array.from({ length: 130 }, (_, i) => makePoint(`a:${i}`, [1, 0])));

    expect(client.upsert).toHaveBeenCalledTimes(3);
  });

  it('rejects points of the wrong size before writing', async () => {
    const client = fakeClient();
    const store = storeFor(client);
    await store.ensureCollection(3, 'Cosine');

    await expect(store.upsert([makePoint('a:0', [1, 0])])).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(client.upsert).not.toHaveBeenCalled();
  });

  it('searches with filters and drops hits with invalid payloads', async () => {
    const client = fakeClient();
    client.search.mockResolvedValue([
      { id: 'x', version: 1, score: 0.5, payload: makePayload({ chunk_id: 'b:0', article_id: 'b' }) },
      { id: 'y', version: 1, score: 0.9, payload: { chunk_id: 'broken' } },
      { id: 'z', version: 1, score: 0.8, payload: makePayload({ chunk_id: 'a:0', article_id: 'a' }) },
    ]);
    const store = storeFor(client);
    await store.ensureCollection(2, 'Cosine');

    const hits = await store.search([1, 0], 10, { source: 'Example News' });

    expect(hits.map(h => [h.chunkId, h.score])).toEqual([
      ['a:0', 0.8],
      ['b:0', 0.5],
    ]);
    expect(client.search).toHaveBeenCalledWith('articles_2', {
      vector: [1, 0],
      limit: 10,
      filter: { must: [{ key: 'source', match: { value: 'Example News' } }] },
      with_payload: true,
      timeout: 1,
    });
  });

  it('gives up on a search that outlives the store timeout', async () => {
    const client = fakeClient();
    client.search.mockReturnValue(new Promise(() => {}));
    const store = new QdrantVectorStore(client, {
      collection: 'articles',
      timeoutMs: 2500,
      retryPolicy: fastRetryPolicy({ maxTransientAttempts: 1 }),
    });
    await store.ensureCollection(2, 'Cosine');
    vi.useFakeTimers();

    try {
      const result = store.search([1, 0], 5).catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(2500);
      const error = await result;

      expect(error).toBeInstanceOf(TransientProviderError);
      expect(error instanceof TransientProviderError && error.cause).toBeInstanceOf(TimeoutError);
      expect(client.search.mock.calls[0][1]).toMatchObject({ timeout: 3 });
    } finally {
      vi.useRealTimers();
    }
  });

  it('retries transient failures', async () => {
    const client = fakeClient();
    client.getCollections.mockRejectedValueOnce({ status: 503 });

    await storeFor(client).ensureCollection(2, 'Cosine');

    expect(client.getCollections).toHaveBeenCalledTimes(2);
    expect(client.createCollection).toHaveBeenCalledTimes(1);
  });

  it('reports an unreachable server as unhealthy', async () => {
    const client = fakeClient();
    client.getCollections.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6333'));

    await expect(storeFor(client).healthCheck()).resolves.toEqual({
      ok: false,
      collection: undefined,
      error: 'connect ECONNREFUSED 127.0.0.1:6333',
    });
  });
});
