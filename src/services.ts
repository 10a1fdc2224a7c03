import type { Config } from './config';
import type { SegmentationService } from './agents/segmentation';
import { createEmbeddingProvider, type EmbeddingBackend, type EmbeddingProvider } from './embeddings';
import { createChunker } from './ingestion/chunker';
import { createIndexingPipeline, type IndexingPipeline } from './ingestion/indexing-pipeline';
import { Normalizer } from './ingestion/normalizer';
import { IngestionQueue, type FeedFetchers } from './ingestion/queue';
import { RSS_SOURCES } from './ingestion/sources';
import { MetricsTracker } from './jobs/metrics-tracker';
import { NewsIngestionJob } from './jobs/news-ingestion-job';
import { JobScheduler } from './jobs/scheduler';
import { createSearchPipeline, type SearchPipeline } from './search/search-pipeline';
import type { RSSSource } from './types';
import { createVectorStore, type VectorStore } from './stores';
import { createRetryPolicy } from './utils/retry';

export interface AppServices {
  config: Config;
  store: VectorStore;
  embeddings: EmbeddingProvider;
  indexing: IndexingPipeline;
  search: SearchPipeline;
  sources: RSSSource[];
  queue: IngestionQueue;
  metrics: MetricsTracker;
  job: NewsIngestionJob;
  scheduler: JobScheduler;
}

/** Substitutes for the network-facing collaborators */
export interface ServiceOverrides {
  store?: VectorStore;
  embeddingBackend?: EmbeddingBackend;
  segmenter?: SegmentationService;
  fetchers?: FeedFetchers;
}

/**
 * Wire every component from one configuration value
 */
export function createServices(config: Config, overrides: ServiceOverrides = {}): AppServices {
  const retryPolicy = createRetryPolicy(config.retry, 'remote call');

  const store = overrides.store ?? createVectorStore(config, retryPolicy.withLabel('qdrant'));
  const embeddings = createEmbeddingProvider(config, {
    backend: overrides.embeddingBackend,
    retryPolicy: retryPolicy.withLabel('embeddings'),
  });
  const chunker = createChunker(config, {
    segmenter: overrides.segmenter,
    retryPolicy: retryPolicy.withLabel('segmentation'),
  });

  const indexing = createIndexingPipeline(config, {
    normalizer: new Normalizer(config.normalizer),
    chunker,
    embeddings,
    store,
  });
  const search = createSearchPipeline(config, { embeddings, store });

  const queue = new IngestionQueue({
    pipeline: indexing,
    sources: RSS_SOURCES,
    maxItemsPerFeed: config.ingestion.maxItemsPerFeed,
    fetchers: overrides.fetchers,
  });
  const metrics = new MetricsTracker();
  const job = new NewsIngestionJob(queue, metrics);
  const scheduler = new JobScheduler(job, config.ingestion.cron);

  return { config, store, embeddings, indexing, search, sources: RSS_SOURCES, queue, metrics, job, scheduler };
}
