import type { Config } from '../config';
import type { RetryPolicy } from '../utils/retry';
import { MemoryVectorStore } from './memory-store';
import { createQdrantVectorStore } from './qdrant-store';
import type { VectorStore } from './vector-store';

export type { VectorStore, StoreHealth } from './vector-store';
export { compareHits, toEpochSeconds } from './vector-store';
export { MemoryVectorStore } from './memory-store';
export { QdrantVectorStore, createQdrantVectorStore, pointIdFor, collectionNameFor, buildFilter, type QdrantApi } from './qdrant-store';

export function createVectorStore(config: Config, retryPolicy?: RetryPolicy): VectorStore {
  switch (config.vectorStore.provider) {
    case 'memory':
      return new MemoryVectorStore();
    case 'qdrant':
      return createQdrantVectorStore(config, retryPolicy);
  }
}
