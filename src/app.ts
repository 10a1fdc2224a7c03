import express, { type Express } from 'express';
import { createFeedsRouter } from './api/feeds';
import { createHealthCheck } from './api/health';
import { createIndexRouter } from './api/index-routes';
import { createJobStatusRouter } from './api/job-status';
import {
  asyncHandler,
  createApiKeyAuth,
  createCorsMiddleware,
  createRateLimiter,
  errorHandler,
  requestLogger,
  securityHeaders,
} from './api/middleware';
import { createSearchRouter } from './api/search-routes';
import type { AppServices } from './services';

const SEARCH_REQUESTS_PER_MINUTE = 60;
const INDEX_REQUESTS_PER_MINUTE = 10;

export function createApp(services: AppServices): Express {
  const { config } = services;
  const app = express();

  // Trust only the first proxy so rate limiting sees client addresses
  if (config.server.nodeEnv === 'production') {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json({ limit: '5mb' }));
  app.use(createCorsMiddleware(config));
  if (config.server.nodeEnv !== 'test') {
    app.use(requestLogger);
  }

  app.get('/health', asyncHandler(createHealthCheck(services.store)));
  app.use(
    '/index',
    createRateLimiter(INDEX_REQUESTS_PER_MINUTE),
    createApiKeyAuth(config.server.apiKey),
    createIndexRouter(services.indexing, services.queue)
  );
  app.use('/search', createRateLimiter(SEARCH_REQUESTS_PER_MINUTE), createSearchRouter(services.search));
  app.use('/feeds', createFeedsRouter(services.sources));
  app.use('/api/job-status', createJobStatusRouter(services.scheduler, services.metrics));

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found', message: 'Route not found' });
  });
  app.use(errorHandler);

  return app;
}
