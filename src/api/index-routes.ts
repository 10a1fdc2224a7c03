import { Router } from 'express';
import type { IndexingPipeline } from '../ingestion/indexing-pipeline';
import type { IngestionQueue } from '../ingestion/queue';
import { articleIdForUrl } from '../ingestion/filter';
import { IndexArticlesRequestSchema, IndexRequestSchema, type IndexArticlesRequest } from '../schemas';
import type { Article, ChunkStrategy, IndexingReport } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { asyncHandler, toValidationError } from './middleware';

export interface IndexResponse {
  articles_indexed: number;
  chunks_indexed: number;
  articles_skipped: number;
  chunk_mode: ChunkStrategy;
}

export function toIndexResponse(report: IndexingReport, chunkMode: ChunkStrategy): IndexResponse {
  return {
    articles_indexed: report.articlesIndexed,
    chunks_indexed: report.chunksIndexed,
    articles_skipped: report.articlesSkipped,
    chunk_mode: chunkMode,
  };
}

export function toArticle(input: IndexArticlesRequest['articles'][number]): Article {
  return {
    id: input.id ?? articleIdForUrl(input.url),
    url: input.url,
    title: input.title,
    source: input.source,
    publishedAt: input.published_at ? new Date(input.published_at) : null,
    rawText: input.raw_text,
    author: input.author ?? null,
  };
}

export function createIndexRouter(pipeline: IndexingPipeline, queue: IngestionQueue): Router {
  const router = Router();

  /**
   * POST /index
   * Fetch the configured feeds (or one feed) and index them
   */
  router.post('/', asyncHandler(async (req, res) => {
    const parsed = IndexRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const stepId = debugLogger.stepStart('INDEX_REQUEST', 'Indexing feeds', {
      feedUrl: parsed.data.feed_url,
    });
    const { report } = await queue.ingest({
      feedUrl: parsed.data.feed_url,
      maxItemsPerFeed: parsed.data.max_items_per_feed,
    });
    debugLogger.stepFinish(stepId, { indexed: report.articlesIndexed });

    res.json(toIndexResponse(report, pipeline.chunkMode));
  }));

  /**
   * POST /index/articles
   * Index articles pushed by an ingestion collaborator
   */
  router.post('/articles', asyncHandler(async (req, res) => {
    const parsed = IndexArticlesRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const report = await pipeline.run(parsed.data.articles.map(toArticle));
    res.json(toIndexResponse(report, pipeline.chunkMode));
  }));

  return router;
}
