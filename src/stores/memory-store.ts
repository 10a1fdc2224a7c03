import { ConfigError, DimensionMismatchError } from '../errors';
import type { DistanceMetric, IndexedPoint, ScoredPoint, SearchFilters } from '../types';
import { compareHits, toEpochSeconds, type StoreHealth, type VectorStore } from './vector-store';

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

function cosine(a: readonly number[], b: readonly number[]): number {
  const norms = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
  return norms === 0 ? 0 : dot(a, b) / norms;
}

function matches(point: IndexedPoint, filters: SearchFilters | undefined): boolean {
  if (!filters) return true;
  const { payload } = point;
  if (filters.source !== undefined && payload.source !== filters.source) return false;
  if (filters.articleId !== undefined && payload.article_id !== filters.articleId) return false;
  if (filters.publishedAfter || filters.publishedBefore) {
    if (payload.published_at_ts === null) return false;
    if (filters.publishedAfter && payload.published_at_ts < toEpochSeconds(filters.publishedAfter)) return false;
    if (filters.publishedBefore && payload.published_at_ts > toEpochSeconds(filters.publishedBefore)) return false;
  }
  return true;
}

/**
 * In-process store keyed by chunkId. Brute-force scoring over every point.
 */
export class MemoryVectorStore implements VectorStore {
  readonly name = 'memory';
  private readonly points = new Map<string, IndexedPoint>();
  private dimensions?: number;
  private distance: DistanceMetric = 'Cosine';

  get size(): number {
    return this.points.size;
  }

  get(chunkId: string): IndexedPoint | undefined {
    return this.points.get(chunkId);
  }

  ensureCollection(dimensions: number, distance: DistanceMetric): Promise<void> {
    if (this.dimensions !== undefined && this.dimensions !== dimensions) {
      return Promise.reject(new DimensionMismatchError(this.dimensions, dimensions, 'memory collection'));
    }
    this.dimensions = dimensions;
    this.distance = distance;
    return Promise.resolve();
  }

  private requireDimensions(operation: string): number {
    if (this.dimensions === undefined) {
      throw new ConfigError(`${operation} called before ensureCollection`);
    }
    return this.dimensions;
  }

  async upsert(points: readonly IndexedPoint[]): Promise<void> {
    if (points.length === 0) return;
    const dimensions = this.requireDimensions('upsert');

    for (const point of points) {
      if (point.vector.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, point.vector.length, `point ${point.chunkId}`);
      }
    }
    for (const point of points) {
      this.points.set(point.chunkId, { ...point, vector: [...point.vector] });
    }
  }

  async search(vector: readonly number[], topK: number, filters?: SearchFilters): Promise<ScoredPoint[]> {
    const dimensions = this.requireDimensions('search');
    if (vector.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, vector.length, 'query vector');
    }

    const score = this.distance === 'Dot' ? dot : cosine;
    const hits: ScoredPoint[] = [];
    for (const point of this.points.values()) {
      if (!matches(point, filters)) continue;
      hits.push({ chunkId: point.chunkId, score: score(vector, point.vector), payload: point.payload });
    }
    return hits.sort(compareHits).slice(0, topK);
  }

  healthCheck(): Promise<StoreHealth> {
    return Promise.resolve({ ok: true, collection: 'memory' });
  }
}
