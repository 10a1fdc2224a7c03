import { QdrantClient, type Schemas } from '@qdrant/js-client-rest';
import { v5 as uuidv5 } from 'uuid';
import type { Config } from '../config';
import { ConfigError, DimensionMismatchError, handleUnknownError } from '../errors';
import { PointPayloadSchema } from '../schemas';
import type { DistanceMetric, IndexedPoint, ScoredPoint, SearchFilters } from '../types';
import { chunkArray } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { createRetryPolicy, withTimeout, type RetryPolicy } from '../utils/retry';
import { compareHits, toEpochSeconds, type StoreHealth, type VectorStore } from './vector-store';

/** Namespace for point ids; Qdrant accepts only UUIDs or integers */
const POINT_NAMESPACE = uuidv5('chunk.news-semantic-indexer', uuidv5.URL);

const UPSERT_BATCH_SIZE = 64;

export type QdrantApi = Pick<
  QdrantClient,
  'getCollections' | 'getCollection' | 'createCollection' | 'createPayloadIndex' | 'upsert' | 'search'
>;

export interface QdrantStoreOptions {
  /** Base name; the dimensionality is appended */
  collection: string;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
}

export function pointIdFor(chunkId: string): string {
  return uuidv5(chunkId, POINT_NAMESPACE);
}

export function collectionNameFor(base: string, dimensions: number): string {
  return `${base}_${dimensions}`;
}

export function buildFilter(filters: SearchFilters | undefined): Schemas['Filter'] | undefined {
  if (!filters) return undefined;

  const must: Schemas['FieldCondition'][] = [];
  if (filters.source !== undefined) {
    must.push({ key: 'source', match: { value: filters.source } });
  }
  if (filters.articleId !== undefined) {
    must.push({ key: 'article_id', match: { value: filters.articleId } });
  }
  if (filters.publishedAfter || filters.publishedBefore) {
    must.push({
      key: 'published_at_ts',
      range: {
        ...(filters.publishedAfter && { gte: toEpochSeconds(filters.publishedAfter) }),
        ...(filters.publishedBefore && { lte: toEpochSeconds(filters.publishedBefore) }),
      },
    });
  }
  return must.length > 0 ? { must } : undefined;
}

function vectorSize(info: Schemas['CollectionInfo']): number | undefined {
  const vectors = info.config.params.vectors;
  if (vectors && 'size' in vectors && typeof vectors.size === 'number') {
    return vectors.size;
  }
  return undefined;
}

export class QdrantVectorStore implements VectorStore {
  readonly name = 'qdrant';
  private collectionName?: string;
  private dimensions?: number;

  constructor(
    private readonly client: QdrantApi,
    private readonly options: QdrantStoreOptions
  ) {}

  /**
   * Run one client request under the retry policy and the store timeout.
   * The client's own `timeout` aborts the HTTP request at the same deadline.
   */
  private call<T>(label: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return this.options.retryPolicy
      .withLabel(`qdrant ${label}`)
      .execute(() => withTimeout(fn, this.options.timeoutMs, `qdrant ${label}`));
  }

  /** Server-side search budget in whole seconds */
  private get serverTimeoutSeconds(): number {
    return Math.max(1, Math.ceil(this.options.timeoutMs / 1000));
  }

  private requireCollection(operation: string): { name: string; dimensions: number } {
    if (this.collectionName === undefined || this.dimensions === undefined) {
      throw new ConfigError(`${operation} called before ensureCollection`);
    }
    return { name: this.collectionName, dimensions: this.dimensions };
  }

  async ensureCollection(dimensions: number, distance: DistanceMetric): Promise<void> {
    const name = collectionNameFor(this.options.collection, dimensions);
    if (this.collectionName === name) return;

    const stepId = debugLogger.stepStart('QDRANT', `Ensuring collection ${name}`, { dimensions, distance });
    try {
      const { collections } = await this.call('getCollections', () => this.client.getCollections());

      if (collections.some(c => c.name === name)) {
        const info = await this.call('getCollection', () => this.client.getCollection(name));
        const size = vectorSize(info);
        if (size !== undefined && size !== dimensions) {
          throw new DimensionMismatchError(size, dimensions, `collection ${name}`);
        }
        debugLogger.stepFinish(stepId, { created: false });
      } else {
        await this.call('createCollection', () =>
          this.client.createCollection(name, { vectors: { size: dimensions, distance } })
        );
        for (const [field, schema] of [
          ['article_id', 'keyword'],
          ['source', 'keyword'],
          ['published_at_ts', 'integer'],
        ] as const) {
          await this.call('createPayloadIndex', () =>
            this.client.createPayloadIndex(name, { field_name: field, field_schema: schema, wait: true })
          );
        }
        console.log(`✅ Created Qdrant collection ${name} (${dimensions}d, ${distance})`);
        debugLogger.stepFinish(stepId, { created: true });
      }

      this.collectionName = name;
      this.dimensions = dimensions;
    } catch (error) {
      debugLogger.stepError(stepId, 'QDRANT', `Failed to ensure collection ${name}`, error);
      throw error;
    }
  }

  async upsert(points: readonly IndexedPoint[]): Promise<void> {
    if (points.length === 0) return;
    const { name, dimensions } = this.requireCollection('upsert');

    for (const point of points) {
      if (point.vector.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, point.vector.length, `point ${point.chunkId}`);
      }
    }

    for (const batch of chunkArray(points, UPSERT_BATCH_SIZE)) {
      await this.call('upsert', () =>
        this.client.upsert(name, {
          wait: true,
          points: batch.map(point => ({
            id: pointIdFor(point.chunkId),
            vector: [...point.vector],
            payload: { ...point.payload },
          })),
        })
      );
    }
    debugLogger.info('UPSERT', `Upserted ${points.length} points into ${name}`);
  }

  async search(vector: readonly number[], topK: number, filters?: SearchFilters): Promise<ScoredPoint[]> {
    const { name, dimensions } = this.requireCollection('search');
    if (vector.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, vector.length, 'query vector');
    }

    const hits = await this.call('search', () =>
      this.client.search(name, {
        vector: [...vector],
        limit: topK,
        filter: buildFilter(filters),
        with_payload: true,
        timeout: this.serverTimeoutSeconds,
      })
    );

    const scored: ScoredPoint[] = [];
    for (const hit of hits) {
      const parsed = PointPayloadSchema.safeParse(hit.payload);
      if (!parsed.success) {
        debugLogger.warn('VECTOR_SEARCH', 'Dropping hit with invalid payload', {
          id: hit.id,
          issues: parsed.error.issues.map(issue => issue.path.join('.')),
        });
        continue;
      }
      scored.push({ chunkId: parsed.data.chunk_id, score: hit.score, payload: parsed.data });
    }
    return scored.sort(compareHits);
  }

  async healthCheck(): Promise<StoreHealth> {
    try {
      await withTimeout(() => this.client.getCollections(), this.options.timeoutMs, 'qdrant health check');
      return { ok: true, collection: this.collectionName };
    } catch (error) {
      return { ok: false, collection: this.collectionName, error: handleUnknownError(error, 'qdrant').message };
    }
  }
}

export function createQdrantVectorStore(config: Config, retryPolicy?: RetryPolicy): QdrantVectorStore {
  const { url, apiKey, collection, timeoutMs } = config.vectorStore;
  const client = new QdrantClient({ url, apiKey, timeout: timeoutMs });
  return new QdrantVectorStore(client, {
    collection,
    timeoutMs,
    retryPolicy: retryPolicy ?? createRetryPolicy(config.retry, 'qdrant'),
  });
}
