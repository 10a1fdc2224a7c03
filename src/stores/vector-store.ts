import type { DistanceMetric, IndexedPoint, ScoredPoint, SearchFilters } from '../types';

export interface StoreHealth {
  ok: boolean;
  collection?: string;
  error?: string;
}

export interface VectorStore {
  readonly name: string;
  /**
   * Create the collection for this dimensionality if missing. Idempotent.
   * Must run before upsert or search.
   * @throws DimensionMismatchError when an existing collection has another size
   */
  ensureCollection(dimensions: number, distance: DistanceMetric): Promise<void>;
  /** Insert or replace points keyed by chunkId */
  upsert(points: readonly IndexedPoint[]): Promise<void>;
  search(vector: readonly number[], topK: number, filters?: SearchFilters): Promise<ScoredPoint[]>;
  healthCheck(): Promise<StoreHealth>;
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Score descending; equal scores put the most recent article first and
 * undated points last.
 */
export function compareHits(a: ScoredPoint, b: ScoredPoint): number {
  if (b.score !== a.score) return b.score - a.score;
  const ta = a.payload.published_at_ts;
  const tb = b.payload.published_at_ts;
  if (ta === tb) return 0;
  if (ta === null) return 1;
  if (tb === null) return -1;
  return tb - ta;
}
