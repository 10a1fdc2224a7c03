import type { Config } from '../config';
import type { EmbeddingProvider } from '../embeddings';
import { IndexingAbortedError, QualityRejectedError, handleUnknownError } from '../errors';
import type { VectorStore } from '../stores';
import { toEpochSeconds } from '../stores';
import type {
  Article,
  Chunk,
  ChunkStrategy,
  CleanedDocument,
  DistanceMetric,
  EmbeddingVector,
  IndexedPoint,
  IndexingReport,
} from '../types';
import { processConcurrently } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import type { Chunker } from './chunker';
import type { Normalizer } from './normalizer';

export type ArticleState = 'normalizing' | 'chunking' | 'embedding' | 'upserting' | 'done' | 'skipped';

type ArticleOutcome =
  | { status: 'indexed'; chunks: number }
  | { status: 'skipped'; reason: string };

export interface IndexingPipelineDependencies {
  normalizer: Normalizer;
  chunker: Chunker;
  embeddings: EmbeddingProvider;
  store: VectorStore;
}

export interface IndexingPipelineOptions {
  concurrency: number;
  distance: DistanceMetric;
  snippetMaxChars: number;
}

export interface RunOptions {
  /** Aborting stops scheduling new articles; in-flight ones finish */
  signal?: AbortSignal;
}

function emptyReport(articles: number): IndexingReport {
  return {
    articlesIndexed: 0,
    chunksIndexed: 0,
    articlesSkipped: 0,
    articlesNotProcessed: articles,
    cancelled: false,
    skipped: [],
  };
}

export class IndexingPipeline {
  constructor(
    private readonly deps: IndexingPipelineDependencies,
    private readonly options: IndexingPipelineOptions
  ) {}

  get chunkMode(): ChunkStrategy {
    return this.deps.chunker.strategy;
  }

  /**
   * Normalize, chunk, embed and upsert every article.
   * Quality rejections and empty chunk lists are skips; any other failure aborts the run.
   * @throws IndexingAbortedError with the partial report when the run aborts
   */
  async run(articles: readonly Article[], options: RunOptions = {}): Promise<IndexingReport> {
    const { signal } = options;
    const report = emptyReport(articles.length);
    const stepId = debugLogger.stepStart('INDEXING', `Indexing ${articles.length} articles`, {
      chunkMode: this.chunkMode,
      model: this.deps.embeddings.modelName,
    });

    try {
      const dimensions = await this.deps.embeddings.resolveDimensions();
      await this.deps.store.ensureCollection(dimensions, this.options.distance);
    } catch (error) {
      const err = handleUnknownError(error, 'indexing setup');
      debugLogger.stepError(stepId, 'INDEXING', 'Indexing setup failed', err);
      throw new IndexingAbortedError(err, report);
    }

    const abort: { failure?: Error } = {};

    const results = await processConcurrently(
      articles,
      async article => {
        try {
          return await this.indexArticle(article);
        } catch (error) {
          abort.failure ??= handleUnknownError(error, `article ${article.id}`);
          throw error;
        }
      },
      {
        concurrency: this.options.concurrency,
        label: 'Article indexing',
        shouldContinue: () => abort.failure === undefined && !signal?.aborted,
      }
    );

    results.successful
      .sort((a, b) => a.index - b.index)
      .forEach(({ result, index }) => {
        if (result.status === 'indexed') {
          report.articlesIndexed++;
          report.chunksIndexed += result.chunks;
        } else {
          report.articlesSkipped++;
          report.skipped.push({ articleId: articles[index].id, reason: result.reason });
        }
      });
    report.articlesNotProcessed = articles.length - report.articlesIndexed - report.articlesSkipped;
    report.cancelled = signal?.aborted ?? false;

    const { failure } = abort;
    if (failure) {
      debugLogger.stepError(stepId, 'INDEXING', 'Indexing run aborted', failure);
      console.error(`❌ Indexing aborted after ${report.articlesIndexed} articles: ${failure.message}`);
      throw new IndexingAbortedError(failure, report);
    }

    debugLogger.stepFinish(stepId, {
      indexed: report.articlesIndexed,
      chunks: report.chunksIndexed,
      skipped: report.articlesSkipped,
      notProcessed: report.articlesNotProcessed,
      cancelled: report.cancelled,
    });
    return report;
  }

  private async indexArticle(article: Article): Promise<ArticleOutcome> {
    let state: ArticleState = 'normalizing';
    const stepId = debugLogger.stepStart('INDEX_ARTICLE', `Indexing article: ${article.title}`, {
      articleId: article.id,
      source: article.source,
    });

    try {
      const document = this.normalizeOrReject(article);
      if (document instanceof QualityRejectedError) {
        state = 'skipped';
        debugLogger.stepFinish(stepId, { state, reason: document.reason });
        return { status: 'skipped', reason: document.reason };
      }

      state = 'chunking';
      const chunks = await this.deps.chunker.chunk(document);
      if (chunks.length === 0) {
        state = 'skipped';
        debugLogger.stepFinish(stepId, { state, reason: 'no_chunks' });
        return { status: 'skipped', reason: 'no_chunks' };
      }

      state = 'embedding';
      const vectors = await this.deps.embeddings.embedChunks(chunks);

      state = 'upserting';
      await this.deps.store.upsert(this.toPoints(article, chunks, vectors));

      state = 'done';
      debugLogger.stepFinish(stepId, { state, chunks: chunks.length, fallback: chunks.some(c => c.fallback) });
      return { status: 'indexed', chunks: chunks.length };
    } catch (error) {
      debugLogger.stepError(stepId, 'INDEX_ARTICLE', `Failed while ${state}: ${article.url}`, error);
      throw error;
    }
  }

  private normalizeOrReject(article: Article): CleanedDocument | QualityRejectedError {
    try {
      return this.deps.normalizer.normalize(article);
    } catch (error) {
      if (error instanceof QualityRejectedError) return error;
      throw error;
    }
  }

  private toPoints(article: Article, chunks: readonly Chunk[], vectors: readonly EmbeddingVector[]): IndexedPoint[] {
    const publishedAt = article.publishedAt ? article.publishedAt.toISOString() : null;
    const publishedAtTs = article.publishedAt ? toEpochSeconds(article.publishedAt) : null;

    return chunks.map((chunk, i) => ({
      chunkId: chunk.chunkId,
      vector: vectors[i].vector,
      payload: {
        chunk_id: chunk.chunkId,
        article_id: article.id,
        chunk_index: chunk.index,
        source: article.source,
        title: article.title,
        url: article.url,
        published_at: publishedAt,
        published_at_ts: publishedAtTs,
        snippet: chunk.text.slice(0, this.options.snippetMaxChars),
        model_name: vectors[i].modelName,
        strategy: chunk.strategy,
        fallback: chunk.fallback,
      },
    }));
  }
}

export function createIndexingPipeline(config: Config, deps: IndexingPipelineDependencies): IndexingPipeline {
  return new IndexingPipeline(deps, {
    concurrency: config.indexing.concurrency,
    distance: config.vectorStore.distance,
    snippetMaxChars: config.indexing.snippetMaxChars,
  });
}
