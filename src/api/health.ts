import type { Request, Response } from 'express';
import type { VectorStore } from '../stores';

export function createHealthCheck(store: VectorStore) {
  return async (_req: Request, res: Response): Promise<void> => {
    const health = await store.healthCheck();

    const body = {
      status: health.ok ? 'healthy' : 'unhealthy',
      vectorStore: {
        provider: store.name,
        connected: health.ok,
        collection: health.collection ?? null,
      },
      timestamp: new Date().toISOString(),
    };

    res.status(health.ok ? 200 : 503).json(body);
  };
}
