import { Router } from 'express';
import type { RSSSource } from '../types';

/**
 * Lists the RSS sources background ingestion reads
 */
export function createFeedsRouter(sources: readonly RSSSource[]): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ feeds: sources.map(({ name, url }) => ({ name, url })) });
  });

  return router;
}
