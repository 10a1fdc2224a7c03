import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ValidationError } from '../src/errors';
import { SearchPipeline, toSearchResponse } from '../src/search/search-pipeline';
import { firstCleanSentence } from '../src/search/snippets';
import { MemoryVectorStore } from '../src/stores';
import { FakeBackend, makePayload, makePoint, makeProvider } from './fixtures';

const ALPHA_FIRST = 'Alpha first chunk describes the new transit line opening.';
const ALPHA_SECOND = 'Alpha second chunk covers the funding debate in detail.';
const BETA = 'Beta opening chunk mentions the same transit line briefly.';

function createSearch(store: MemoryVectorStore): SearchPipeline {
  const backend = new FakeBackend({ 'query: transit': [1, 0] }, 2);
  return new SearchPipeline(
    { embeddings: makeProvider(backend, { queryPrefix: 'query: ' }), store },
    { fanOut: 8, minCandidates: 20, snippetsPerArticle: 3, distance: 'Cosine' }
  );
}

describe('SearchPipeline', () => {
  let store: MemoryVectorStore;
  let pipeline: SearchPipeline;

  beforeEach(async () => {
    store = new MemoryVectorStore();
    await store.ensureCollection(2, 'Cosine');
    await store.upsert([
      makePoint('a:0', [1, 0], { title: 'Alpha', snippet: ALPHA_FIRST, published_at_ts: 200 }),
      makePoint('a:1', [0.8, 0.6], { title: 'Alpha', snippet: ALPHA_SECOND, published_at_ts: 200 }),
      makePoint('b:0', [0.6, 0.8], { title: 'Beta', snippet: BETA.toLowerCase(), published_at_ts: 100 }),
      makePoint('b:1', [0.9, Math.sqrt(0.19)], { title: 'Beta', snippet: BETA, published_at_ts: 100 }),
      makePoint('c:0', [0, 1], {
        title: 'Gamma',
        snippet: 'Subscribe to our newsletter for more updates every single morning.',
      }),
    ]);
    pipeline = createSearch(store);
  });

  it('ranks articles by their best chunk', async () => {
    const results = await pipeline.search('transit', 5);

    expect(results.map(r => r.articleId)).toEqual(['a', 'b', 'c']);
    expect(results[0].score).toBeCloseTo(1, 10);
    expect(results[1].score).toBeCloseTo(0.9, 10);
    expect(results[2].score).toBeCloseTo(0, 10);
    expect(results[0].title).toBe('Alpha');
  });

  it('returns distinct snippets in document order', async () => {
    const [alpha, beta, gamma] = await pipeline.search('transit', 5);

    expect(alpha.matchedSnippets.map(s => [s.chunkIndex, s.text])).toEqual([
      [0, ALPHA_FIRST],
      [1, ALPHA_SECOND],
    ]);
    expect(alpha.matchedSnippets[1].score).toBeCloseTo(0.8, 10);
    expect(beta.matchedSnippets.map(s => [s.chunkId, s.text])).toEqual([['b:1', BETA]]);
    expect(gamma.matchedSnippets).toEqual([]);
  });

  it('returns at most topK articles', async () => {
    const results = await pipeline.search('transit', 1);
    expect(results.map(r => r.articleId)).toEqual(['a']);
  });

  it('over-fetches chunk hits and passes filters through', async () => {
    const search = vi.spyOn(store, 'search');

    await pipeline.search('transit', 1);
    await pipeline.search('transit', 5, { source: 'Example News' });

    expect(search.mock.calls[0][1]).toBe(20);
    expect(search.mock.calls[1][1]).toBe(40);
    expect(search.mock.calls[1][2]).toEqual({ source: 'Example News' });
  });

  it('trims the query before embedding it', async () => {
    const backend = new FakeBackend({ 'query: transit': [1, 0] }, 2);
    const trimmed = new SearchPipeline(
      { embeddings: makeProvider(backend, { queryPrefix: 'query: ' }), store },
      { fanOut: 8, minCandidates: 20, snippetsPerArticle: 3, distance: 'Cosine' }
    );

    await trimmed.search('  transit  ', 5);

    expect(backend.calls).toEqual([['query: transit']]);
  });

  it('rejects empty queries and invalid topK', async () => {
    await expect(pipeline.search('   ', 5)).rejects.toThrow(ValidationError);
    await expect(pipeline.search('transit', 0)).rejects.toThrow('topK must be a positive integer, got 0');
  });

  it('creates the collection on first use', async () => {
    const fresh = new MemoryVectorStore();
    await expect(createSearch(fresh).search('transit', 5)).resolves.toEqual([]);
  });

  it('puts the most recent article first on equal scores', () => {
    const results = pipeline.aggregate(
      [
        { chunkId: 'x:0', score: 0.5, payload: makePayload({ chunk_id: 'x:0', article_id: 'x', published_at_ts: 100 }) },
        { chunkId: 'y:0', score: 0.5, payload: makePayload({ chunk_id: 'y:0', article_id: 'y', published_at_ts: 300 }) },
        { chunkId: 'z:0', score: 0.5, payload: makePayload({ chunk_id: 'z:0', article_id: 'z' }) },
      ],
      10
    );

    expect(results.map(r => r.articleId)).toEqual(['y', 'x', 'z']);
  });

  it('caps snippets per article', () => {
    const hits = [0, 1, 2, 3, 4].map(i => ({
      chunkId: `m:${i}`,
      score: 1 - i / 10,
      payload: makePayload({
        chunk_id: `m:${i}`,
        article_id: 'm',
        chunk_index: i,
        snippet: `Sentence number ${i} of the many chunk article is long enough.`,
      }),
    }));

    const [result] = pipeline.aggregate(hits, 5);

    expect(result.matchedSnippets.map(s => s.chunkIndex)).toEqual([0, 1, 2]);
  });

  it('shapes the HTTP response', async () => {
    const results = await pipeline.search('transit', 1);

    expect(toSearchResponse('transit', results)).toEqual({
      query: 'transit',
      results: [
        {
          article_id: 'a',
          title: 'Alpha',
          url: 'https://news.example.com/a',
          source: 'Example News',
          published_at: null,
          score: results[0].score,
          snippets: [
            { text: ALPHA_FIRST, score: results[0].matchedSnippets[0].score },
            { text: ALPHA_SECOND, score: results[0].matchedSnippets[1].score },
          ],
        },
      ],
    });
  });
});

describe('firstCleanSentence', () => {
  it('returns the first sentence that is long enough', () => {
    expect(firstCleanSentence('Short one. This sentence is definitely longer than forty characters. Another.')).toBe(
      'This sentence is definitely longer than forty characters.'
    );
  });

  it('skips sentences that look like page chrome', () => {
    expect(
      firstCleanSentence(
        'We use cookies to improve the experience on this website, sorry. The harbour reopened after a week of repairs and inspections.'
      )
    ).toBe('The harbour reopened after a week of repairs and inspections.');
  });

  it('falls back to the start of the text', () => {
    expect(firstCleanSentence('Tiny. Also tiny.')).toBe('Tiny. Also tiny.');
  });

  it('caps the length', () => {
    expect(firstCleanSentence('a'.repeat(400))).toBe('a'.repeat(300));
  });

  it('returns an empty string for boilerplate-only text', () => {
    expect(firstCleanSentence('Subscribe to our newsletter for more updates every single morning.')).toBe('');
  });
});
