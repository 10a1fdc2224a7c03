import { Router } from 'express';
import { SearchQuerySchema } from '../schemas';
import { toSearchResponse, type SearchPipeline } from '../search/search-pipeline';
import type { SearchFilters } from '../types';
import { asyncHandler, toValidationError } from './middleware';

export function createSearchRouter(pipeline: SearchPipeline): Router {
  const router = Router();

  /**
   * GET /search?q=&k=
   * Article-level semantic search with optional source and date filters
   */
  router.get('/', asyncHandler(async (req, res) => {
    const parsed = SearchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const { q, k, source, after, before } = parsed.data;
    const filters: SearchFilters = {
      ...(source && { source }),
      ...(after && { publishedAfter: new Date(after) }),
      ...(before && { publishedBefore: new Date(before) }),
    };

    const results = await pipeline.search(q, k, Object.keys(filters).length > 0 ? filters : undefined);
    res.json(toSearchResponse(q, results));
  }));

  return router;
}
