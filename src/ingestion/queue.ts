import type { Article, IngestionStats, RSSSource } from '../types';
import { dedupeArticles } from './filter';
import type { IndexingPipeline, RunOptions } from './indexing-pipeline';
import { fetchAllRSS, fetchFeed, type FetchOptions } from './rss-fetcher';
import { debugLogger } from '../utils/debug-logger';

export interface IngestOptions extends RunOptions {
  /** Index this feed instead of the configured sources */
  feedUrl?: string;
  maxItemsPerFeed?: number;
}

export interface FeedFetchers {
  fetchAll: (sources: readonly RSSSource[], options: FetchOptions) => Promise<Article[]>;
  fetchOne: (url: string, options: FetchOptions) => Promise<Article[]>;
}

export interface IngestionQueueDependencies {
  pipeline: IndexingPipeline;
  sources: readonly RSSSource[];
  maxItemsPerFeed: number;
  fetchers?: FeedFetchers;
}

/**
 * Serializes feed ingestion. A call asking for the same feeds as a run that is
 * active or queued shares that run's result; any other call is queued behind it.
 */
export class IngestionQueue {
  private readonly runs = new Map<string, Promise<IngestionStats>>();
  private tail: Promise<void> = Promise.resolve();
  private readonly fetchers: FeedFetchers;

  constructor(private readonly deps: IngestionQueueDependencies) {
    this.fetchers = deps.fetchers ?? { fetchAll: fetchAllRSS, fetchOne: fetchFeed };
  }

  get isIngesting(): boolean {
    return this.runs.size > 0;
  }

  ingest(options: IngestOptions = {}): Promise<IngestionStats> {
    const key = this.runKey(options);
    const pending = this.runs.get(key);
    if (pending) {
      debugLogger.info('INGESTION', 'Same ingestion already pending, sharing its result', { key });
      return pending;
    }

    const queued = this.runs.size > 0;
    if (queued) {
      debugLogger.info('INGESTION', 'Ingestion queued behind the current run', { key });
    }
    const started = queued ? this.tail.then(() => this.run(options)) : this.run(options);

    const tracked = started.finally(() => {
      if (this.runs.get(key) === tracked) {
        this.runs.delete(key);
      }
    });
    this.runs.set(key, tracked);
    this.tail = tracked.then(
      () => undefined,
      () => undefined
    );
    return tracked;
  }

  private runKey(options: IngestOptions): string {
    const maxItems = options.maxItemsPerFeed ?? this.deps.maxItemsPerFeed;
    return `${options.feedUrl ?? '*'}|${maxItems}`;
  }

  private async run(options: IngestOptions): Promise<IngestionStats> {
    const stepId = debugLogger.stepStart('INGESTION', 'Starting ingestion process', {
      feedUrl: options.feedUrl,
    });

    try {
      const fetchOptions: FetchOptions = {
        maxItemsPerFeed: options.maxItemsPerFeed ?? this.deps.maxItemsPerFeed,
      };

      // Step 1: Fetch feeds
      const articles = options.feedUrl
        ? await this.fetchers.fetchOne(options.feedUrl, fetchOptions)
        : await this.fetchers.fetchAll(this.deps.sources, fetchOptions);

      // Step 2: Deduplicate within the batch
      const unique = dedupeArticles(articles);

      // Step 3: Index
      const report = await this.deps.pipeline.run(unique, { signal: options.signal });

      const result: IngestionStats = {
        fetched: articles.length,
        unique: unique.length,
        report,
      };
      debugLogger.stepFinish(stepId, {
        fetched: result.fetched,
        unique: result.unique,
        indexed: report.articlesIndexed,
        skipped: report.articlesSkipped,
      });
      return result;
    } catch (error) {
      debugLogger.stepError(stepId, 'INGESTION', 'Ingestion failed', error);
      throw error;
    }
  }
}
