export interface RSSSource {
  name: string;
  url: string;
  contentField: 'content:encoded' | 'description';
  fallbackField?: 'description' | 'content' | 'contentSnippet' | 'summary';
}

export interface Article {
  id: string;
  source: string;
  url: string;
  publishedAt: Date | null;
  title: string;
  rawText: string;
  author?: string | null;
}

export interface CleanedDocument {
  articleId: string;
  text: string;
  qualityScore: number;
}

export type ChunkStrategy = 'simple' | 'agentic';

export interface Chunk {
  chunkId: string;
  articleId: string;
  index: number;
  text: string;
  offsetStart: number;
  offsetEnd: number;
  strategy: ChunkStrategy;
  fallback: boolean;
}

export interface EmbeddingVector {
  chunkId: string;
  vector: number[];
  modelName: string;
}

export type DistanceMetric = 'Cosine' | 'Dot';

export interface PointPayload {
  chunk_id: string;
  article_id: string;
  chunk_index: number;
  source: string;
  title: string;
  url: string;
  published_at: string | null;
  published_at_ts: number | null;
  snippet: string;
  model_name: string;
  strategy: ChunkStrategy;
  fallback: boolean;
}

export interface IndexedPoint {
  chunkId: string;
  vector: number[];
  payload: PointPayload;
}

export interface ScoredPoint {
  chunkId: string;
  score: number;
  payload: PointPayload;
}

export interface SearchFilters {
  source?: string;
  articleId?: string;
  publishedAfter?: Date;
  publishedBefore?: Date;
}

export interface MatchedSnippet {
  chunkId: string;
  chunkIndex: number;
  text: string;
  score: number;
}

export interface SearchResult {
  articleId: string;
  score: number;
  title: string;
  url: string;
  source: string;
  publishedAt: string | null;
  matchedSnippets: MatchedSnippet[];
}

export interface SkippedArticle {
  articleId: string;
  reason: string;
}

export interface IndexingReport {
  articlesIndexed: number;
  chunksIndexed: number;
  articlesSkipped: number;
  articlesNotProcessed: number;
  cancelled: boolean;
  skipped: SkippedArticle[];
}

export interface IngestionStats {
  fetched: number;
  unique: number;
  report: IndexingReport;
}
