import type { Config } from '../config';
import type { EmbeddingProvider } from '../embeddings';
import { ValidationError } from '../errors';
import { compareHits, type VectorStore } from '../stores';
import type { DistanceMetric, MatchedSnippet, ScoredPoint, SearchFilters, SearchResult } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { sanitizeForLog } from '../utils/sanitize';
import { firstCleanSentence, isNoise } from './snippets';

export interface SearchPipelineDependencies {
  embeddings: EmbeddingProvider;
  store: VectorStore;
}

export interface SearchPipelineOptions {
  /** Raw hits fetched per requested article */
  fanOut: number;
  /** Lower bound on raw hits fetched */
  minCandidates: number;
  snippetsPerArticle: number;
  distance: DistanceMetric;
}

export interface SearchResponse {
  query: string;
  results: Array<{
    article_id: string;
    title: string;
    url: string;
    source: string;
    published_at: string | null;
    score: number;
    snippets: Array<{ text: string; score: number }>;
  }>;
}

export class SearchPipeline {
  private ready?: Promise<void>;

  constructor(
    private readonly deps: SearchPipelineDependencies,
    private readonly options: SearchPipelineOptions
  ) {}

  private ensureReady(): Promise<void> {
    this.ready ??= (async () => {
      const dimensions = await this.deps.embeddings.resolveDimensions();
      await this.deps.store.ensureCollection(dimensions, this.options.distance);
    })().catch((error: unknown) => {
      this.ready = undefined;
      throw error;
    });
    return this.ready;
  }

  /**
   * Article-level semantic search: over-fetch chunk hits, group them by article,
   * score each article by its best chunk.
   */
  async search(query: string, topK: number, filters?: SearchFilters): Promise<SearchResult[]> {
    const text = query.trim();
    if (text.length === 0) {
      throw new ValidationError('query must not be empty');
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    }

    const stepId = debugLogger.stepStart('SEARCH', `Searching: "${sanitizeForLog(text.substring(0, 60))}"`, { topK, filters });
    try {
      await this.ensureReady();
      const [vector] = await this.deps.embeddings.embedBatch([text], 'query');

      const candidates = Math.max(topK * this.options.fanOut, this.options.minCandidates);
      const hits = await this.deps.store.search(vector, candidates, filters);
      debugLogger.info('VECTOR_SEARCH', `Retrieved ${hits.length} chunk hits`, { candidates });

      const results = this.aggregate(hits, topK);
      debugLogger.stepFinish(stepId, { hits: hits.length, results: results.length });
      return results;
    } catch (error) {
      debugLogger.stepError(stepId, 'SEARCH', 'Search failed', error);
      throw error;
    }
  }

  aggregate(hits: readonly ScoredPoint[], topK: number): SearchResult[] {
    const groups = new Map<string, ScoredPoint[]>();
    for (const hit of hits) {
      const group = groups.get(hit.payload.article_id);
      if (group) {
        group.push(hit);
      } else {
        groups.set(hit.payload.article_id, [hit]);
      }
    }

    return [...groups.values()]
      .map(group => group.sort(compareHits))
      .sort((a, b) => compareHits(a[0], b[0]))
      .slice(0, topK)
      .map(group => {
        const best = group[0];
        return {
          articleId: best.payload.article_id,
          score: best.score,
          title: best.payload.title,
          url: best.payload.url,
          source: best.payload.source,
          publishedAt: best.payload.published_at,
          matchedSnippets: this.selectSnippets(group),
        };
      });
  }

  /** Best-scoring distinct snippets, shown in document order */
  private selectSnippets(group: readonly ScoredPoint[]): MatchedSnippet[] {
    const seen = new Set<string>();
    const snippets: MatchedSnippet[] = [];

    for (const hit of group) {
      if (snippets.length >= this.options.snippetsPerArticle) break;
      const text = firstCleanSentence(hit.payload.snippet);
      if (!text || isNoise(text)) continue;
      const key = text.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      snippets.push({ chunkId: hit.chunkId, chunkIndex: hit.payload.chunk_index, text, score: hit.score });
    }

    return snippets.sort((a, b) => a.chunkIndex - b.chunkIndex);
  }
}

export function toSearchResponse(query: string, results: readonly SearchResult[]): SearchResponse {
  return {
    query,
    results: results.map(result => ({
      article_id: result.articleId,
      title: result.title,
      url: result.url,
      source: result.source,
      published_at: result.publishedAt,
      score: result.score,
      snippets: result.matchedSnippets.map(snippet => ({ text: snippet.text, score: snippet.score })),
    })),
  };
}

export function createSearchPipeline(config: Config, deps: SearchPipelineDependencies): SearchPipeline {
  return new SearchPipeline(deps, {
    fanOut: config.search.fanOut,
    minCandidates: config.search.minCandidates,
    snippetsPerArticle: config.search.snippetsPerArticle,
    distance: config.vectorStore.distance,
  });
}
