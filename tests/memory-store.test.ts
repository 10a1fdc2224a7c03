import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigError, DimensionMismatchError } from '../src/errors';
import { MemoryVectorStore } from '../src/stores';
import { makePoint } from './fixtures';

describe('MemoryVectorStore', () => {
  let store: MemoryVectorStore;

  beforeEach(() => {
    store = new MemoryVectorStore();
  });

  it('refuses upsert and search before the collection exists', async () => {
    await expect(store.upsert([makePoint('a:0', [1, 0])])).rejects.toThrow('upsert called before ensureCollection');
    await expect(store.search([1, 0], 5)).rejects.toBeInstanceOf(ConfigError);
  });

  it('accepts repeated setup with the same size and rejects another size', async () => {
    await store.ensureCollection(2, 'Cosine');
    await store.ensureCollection(2, 'Cosine');
    await expect(store.ensureCollection(3, 'Cosine')).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it('writes nothing when a point has the wrong size', async () => {
    await store.ensureCollection(2, 'Cosine');
    await expect(store.upsert([makePoint('a:0', [1, 0]), makePoint('a:1', [1, 0, 0])])).rejects.toThrow(
      'point a:1: expected dimensionality 2, got 3'
    );
    expect(store.size).toBe(0);
  });

  it('keeps one point per chunk id with the latest vector', async () => {
    await store.ensureCollection(2, 'Cosine');
    await store.upsert([makePoint('a:0', [1, 0])]);
    await store.upsert([makePoint('a:0', [0, 1])]);

    expect(store.size).toBe(1);
    expect(store.get('a:0')?.vector).toEqual([0, 1]);
  });

  it('ranks by cosine similarity', async () => {
    await store.ensureCollection(2, 'Cosine');
    await store.upsert([makePoint('a:0', [0, 1]), makePoint('b:0', [1, 0]), makePoint('c:0', [3, 3])]);

    const hits = await store.search([2, 0], 10);

    expect(hits.map(h => h.chunkId)).toEqual(['b:0', 'c:0', 'a:0']);
    expect(hits[0].score).toBeCloseTo(1, 10);
    expect(hits[1].score).toBeCloseTo(Math.SQRT1_2, 10);
    expect(hits[2].score).toBe(0);
  });

  it('ranks by dot product when configured', async () => {
    await store.ensureCollection(2, 'Dot');
    await store.upsert([makePoint('a:0', [1, 0]), makePoint('b:0', [3, 0])]);

    const hits = await store.search([2, 0], 10);

    expect(hits.map(h => [h.chunkId, h.score])).toEqual([
      ['b:0', 6],
      ['a:0', 2],
    ]);
  });

  it('breaks score ties by recency with undated points last', async () => {
    await store.ensureCollection(2, 'Cosine');
    await store.upsert([
      makePoint('old:0', [1, 0], { published_at_ts: 100 }),
      makePoint('undated:0', [1, 0]),
      makePoint('new:0', [1, 0], { published_at_ts: 200 }),
    ]);

    const hits = await store.search([1, 0], 10);

    expect(hits.map(h => h.chunkId)).toEqual(['new:0', 'old:0', 'undated:0']);
  });

  it('limits the number of hits', async () => {
    await store.ensureCollection(2, 'Cosine');
    await store.upsert([makePoint('a:0', [1, 0]), makePoint('b:0', [1, 1]), makePoint('c:0', [0, 1])]);

    expect(await store.search([1, 0], 2)).toHaveLength(2);
  });

  it('filters by source, article and publication date', async () => {
    await store.ensureCollection(2, 'Cosine');
    await store.upsert([
      makePoint('a:0', [1, 0], { source: 'Wire', published_at_ts: 1_704_067_200 }),
      makePoint('a:1', [1, 0], { source: 'Wire', published_at_ts: 1_704_067_200 }),
      makePoint('b:0', [1, 0], { source: 'Daily', published_at_ts: 1_706_745_600 }),
      makePoint('c:0', [1, 0], { source: 'Daily' }),
    ]);

    const bySource = await store.search([1, 0], 10, { source: 'Daily' });
    expect(bySource.map(h => h.chunkId).sort()).toEqual(['b:0', 'c:0']);

    const byArticle = await store.search([1, 0], 10, { articleId: 'a' });
    expect(byArticle.map(h => h.chunkId).sort()).toEqual(['a:0', 'a:1']);

    const after = await store.search([1, 0], 10, { publishedAfter: new Date('2024-01-15T00:00:00Z') });
    expect(after.map(h => h.chunkId)).toEqual(['b:0']);

    const before = await store.search([1, 0], 10, { publishedBefore: new Date('2024-01-01T00:00:00Z') });
    expect(before.map(h => h.chunkId).sort()).toEqual(['a:0', 'a:1']);
  });

  it('rejects a query vector of the wrong size', async () => {
    await store.ensureCollection(2, 'Cosine');
    await expect(store.search([1, 0, 0], 5)).rejects.toThrow('query vector: expected dimensionality 2, got 3');
  });

  it('reports itself healthy', async () => {
    await expect(store.healthCheck()).resolves.toEqual({ ok: true, collection: 'memory' });
  });
});
