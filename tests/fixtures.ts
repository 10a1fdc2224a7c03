import { EmbeddingProvider, type EmbeddingBackend, type EmbeddingProviderOptions } from '../src/embeddings';
import { RetryPolicy, classifyRemoteError } from '../src/utils/retry';
import type { Article, IndexedPoint, PointPayload } from '../src/types';

export const TRANSPORT_PARAGRAPHS = [
  'The regional government approved a new public transport plan on Tuesday after months of negotiation with unions. ' +
    'Officials said the plan will add more than forty electric buses to the busiest routes before the end of next year. ' +
    'Residents in the northern districts have long complained about crowded services and unreliable timetables during rush hour.',
  'The transport minister told reporters that the budget also covers new cycle lanes and safer pedestrian crossings near schools. ' +
    'Opposition parties welcomed the investment but questioned whether the timeline was realistic given recent construction delays. ' +
    'A final vote in the regional parliament is expected next month, and the first buses could arrive by early spring.',
];

export const FOOTBALL_PARAGRAPHS = [
  'The national football team secured a narrow victory on Saturday night thanks to a late goal from its young striker. ' +
    'Thousands of supporters filled the stadium despite heavy rain and cheered for the players until the final whistle. ' +
    'The coach praised the defensive discipline of the squad and said the result gives them confidence for the tournament.',
  'Several players are still recovering from injuries picked up during training camp earlier in the season. ' +
    'Medical staff expect the captain to return for the qualifier against their neighbours in three weeks. ' +
    'Tickets for that match sold out within hours, according to a statement published by the federation.',
];

export const TRANSPORT_TEXT = TRANSPORT_PARAGRAPHS.join('\n\n');
export const FOOTBALL_TEXT = FOOTBALL_PARAGRAPHS.join('\n\n');

export function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    id: 'article-1',
    url: 'https://news.example.com/transport-plan',
    title: 'Regional transport plan approved',
    source: 'Example News',
    publishedAt: new Date('2024-03-01T10:00:00Z'),
    rawText: TRANSPORT_TEXT,
    author: null,
    ...overrides,
  };
}

export const NORMALIZER_OPTIONS = {
  minChars: 400,
  minQualityScore: 0.55,
  minWordCount: 60,
  maxBoilerplateMatches: 3,
};

/** Retry policy that never waits */
export function fastRetryPolicy(overrides: { maxAttempts?: number; maxTransientAttempts?: number } = {}): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: overrides.maxAttempts ?? 3,
    maxTransientAttempts: overrides.maxTransientAttempts ?? 3,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitterMs: 0,
    classify: classifyRemoteError,
    sleep: async () => {},
    label: 'test',
  });
}

export function providerOptions(overrides: Partial<EmbeddingProviderOptions> = {}): EmbeddingProviderOptions {
  return {
    batchSize: 8,
    concurrency: 2,
    timeoutMs: 1000,
    maxInputChars: 8000,
    passagePrefix: '',
    queryPrefix: '',
    retryPolicy: fastRetryPolicy(),
    ...overrides,
  };
}

export function makeProvider(backend: EmbeddingBackend, overrides: Partial<EmbeddingProviderOptions> = {}): EmbeddingProvider {
  return new EmbeddingProvider(backend, providerOptions(overrides));
}

export function rateLimitError(): Error {
  return Object.assign(new Error('Too Many Requests'), { status: 429 });
}

/**
 * Backend returning fixed vectors per input text, recording every call
 */
export class FakeBackend implements EmbeddingBackend {
  readonly calls: string[][] = [];

  constructor(
    private readonly vectors: Record<string, number[]>,
    readonly dimensions?: number,
    readonly kind: 'local' | 'remote' = 'remote',
    readonly modelName = 'fake-model'
  ) {}

  embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return Promise.resolve(texts.map(text => this.vectors[text] ?? new Array<number>(this.dimensions ?? 2).fill(0)));
  }
}

export function makePayload(overrides: Partial<PointPayload> = {}): PointPayload {
  return {
    chunk_id: 'a:0',
    article_id: 'a',
    chunk_index: 0,
    source: 'Example News',
    title: 'Example title',
    url: 'https://news.example.com/a',
    published_at: null,
    published_at_ts: null,
    snippet: 'Example snippet text that is long enough to be shown.',
    model_name: 'fake-model',
    strategy: 'simple',
    fallback: false,
    ...overrides,
  };
}

export function makePoint(chunkId: string, vector: number[], payload: Partial<PointPayload> = {}): IndexedPoint {
  const [articleId, index] = chunkId.split(':');
  return {
    chunkId,
    vector,
    payload: makePayload({
      chunk_id: chunkId,
      article_id: articleId,
      chunk_index: Number(index),
      ...payload,
    }),
  };
}
