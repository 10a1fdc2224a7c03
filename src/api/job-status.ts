/**
 * API endpoint for background job status and metrics
 */

import { Router } from 'express';
import type { MetricsTracker } from '../jobs/metrics-tracker';
import type { JobScheduler } from '../jobs/scheduler';

export function createJobStatusRouter(scheduler: JobScheduler, metrics: MetricsTracker): Router {
  const router = Router();

  /**
   * GET /api/job-status
   * Returns current status and metrics for the background job
   */
  router.get('/', (_req, res) => {
    const schedulerStatus = scheduler.getStatus();
    const stats = metrics.getStats();
    const [lastRun] = stats.recentRuns;

    const isHealthy =
      schedulerStatus.isRunning &&
      stats.consecutiveFailures < 3 &&
      (lastRun?.status === 'SUCCESS' || lastRun?.status === 'RUNNING');

    res.json({
      healthy: isHealthy,
      scheduler: {
        running: schedulerStatus.isRunning,
        cronExpression: schedulerStatus.cronExpression,
        currentlyExecuting: schedulerStatus.isJobCurrentlyExecuting,
      },
      stats: {
        totalRuns: stats.totalRuns,
        successfulRuns: stats.successfulRuns,
        failedRuns: stats.failedRuns,
        consecutiveFailures: stats.consecutiveFailures,
        averageDurationMs: stats.averageDurationMs,
        totalArticlesIndexed: stats.totalArticlesIndexed,
        totalChunksIndexed: stats.totalChunksIndexed,
        lastSuccessAt: stats.lastSuccessAt,
        lastError: stats.lastError,
      },
      lastRun: lastRun
        ? { ...lastRun, timeSinceLastRunMs: Date.now() - lastRun.startedAt.getTime() }
        : null,
      recentRuns: stats.recentRuns,
    });
  });

  return router;
}
