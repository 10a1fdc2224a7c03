/**
 * Background job that indexes the configured news feeds
 */

import { IndexingAbortedError } from '../errors';
import type { IngestionQueue } from '../ingestion/queue';
import { debugLogger } from '../utils/debug-logger';
import type { JobMetrics, MetricsTracker } from './metrics-tracker';

export class NewsIngestionJob {
  private isJobRunning = false;
  private cancellation: AbortController | null = null;

  constructor(
    private readonly queue: IngestionQueue,
    private readonly metrics: MetricsTracker
  ) {}

  get isRunning(): boolean {
    return this.isJobRunning;
  }

  /**
   * Stop scheduling new articles in the current run; articles already in flight finish
   */
  cancel(): void {
    if (!this.cancellation || this.cancellation.signal.aborted) {
      return;
    }
    console.log('⏹️ Background job: cancelling current run');
    this.cancellation.abort();
  }

  /**
   * Run the news ingestion job. Failures are recorded, never thrown.
   */
  async run(): Promise<void> {
    // Prevent overlapping job executions
    if (this.isJobRunning) {
      debugLogger.info('INGESTION', 'Job already running, skipping this execution');
      return;
    }

    this.isJobRunning = true;
    const startTime = Date.now();

    try {
      this.metrics.recordJobStart();

      this.cancellation = new AbortController();
      const { fetched, report } = await this.queue.ingest({ signal: this.cancellation.signal });

      const durationMs = Date.now() - startTime;
      const metrics: JobMetrics = {
        articlesIndexed: report.articlesIndexed,
        chunksIndexed: report.chunksIndexed,
        articlesSkipped: report.articlesSkipped,
        durationMs,
      };
      this.metrics.recordJobSuccess(metrics);

      if (report.cancelled) {
        console.log(
          `⏹️ Background job: Cancelled after ${metrics.articlesIndexed} articles, ` +
          `${report.articlesNotProcessed} not processed (${durationMs}ms)`
        );
      } else if (metrics.articlesIndexed > 0) {
        console.log(
          `🎉 Background job: Indexed ${metrics.articlesIndexed} articles, ` +
          `${metrics.chunksIndexed} chunks, ${metrics.articlesSkipped} skipped (${durationMs}ms)`
        );
      } else if (debugLogger.isEnabled()) {
        console.log(`😴 Background job: Nothing indexed (checked ${fetched} articles in ${durationMs}ms)`);
      }
    } catch (error) {
      const cause = error instanceof IndexingAbortedError ? error.failure : error;
      const errorMessage = cause instanceof Error ? cause.message : String(cause);
      const durationMs = Date.now() - startTime;

      this.metrics.recordJobFailure(errorMessage);
      console.error(`❌ Background job failed: ${errorMessage} (${durationMs}ms)`);

      if (this.metrics.isCriticalFailureState()) {
        const failures = this.metrics.getConsecutiveFailures();
        console.error(`🚨 CRITICAL: Background job has failed ${failures} times consecutively!`);
      }
    } finally {
      this.cancellation = null;
      this.isJobRunning = false;
    }
  }
}
