/**
 * Tracks metrics for background job execution
 */

export interface JobMetrics {
  articlesIndexed: number;
  chunksIndexed: number;
  articlesSkipped: number;
  durationMs: number;
}

export type JobStatus = 'RUNNING' | 'SUCCESS' | 'FAILED';

export interface JobRun {
  startedAt: Date;
  completedAt: Date | null;
  status: JobStatus;
  metrics: JobMetrics | null;
  errorMessage: string | null;
}

export interface JobStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  averageDurationMs: number;
  totalArticlesIndexed: number;
  totalChunksIndexed: number;
  recentRuns: JobRun[];
}

const RECENT_RUNS = 10;

export class MetricsTracker {
  private stats: Omit<JobStats, 'recentRuns'> = {
    totalRuns: 0,
    successfulRuns: 0,
    failedRuns: 0,
    lastRunAt: null,
    lastSuccessAt: null,
    lastError: null,
    consecutiveFailures: 0,
    averageDurationMs: 0,
    totalArticlesIndexed: 0,
    totalChunksIndexed: 0,
  };
  private runs: JobRun[] = [];

  /**
   * Record the start of a job run
   */
  recordJobStart(): void {
    const now = new Date();
    this.stats.lastRunAt = now;
    this.stats.totalRuns++;
    this.runs.unshift({ startedAt: now, completedAt: null, status: 'RUNNING', metrics: null, errorMessage: null });
    this.runs = this.runs.slice(0, RECENT_RUNS);
  }

  /**
   * Record a successful job completion
   */
  recordJobSuccess(metrics: JobMetrics): void {
    this.stats.successfulRuns++;
    this.stats.consecutiveFailures = 0;
    this.stats.lastSuccessAt = new Date();
    this.stats.lastError = null;

    this.stats.totalArticlesIndexed += metrics.articlesIndexed;
    this.stats.totalChunksIndexed += metrics.chunksIndexed;

    const totalDuration = this.stats.averageDurationMs * (this.stats.successfulRuns - 1);
    this.stats.averageDurationMs = (totalDuration + metrics.durationMs) / this.stats.successfulRuns;

    this.finishRun({ status: 'SUCCESS', metrics });
  }

  /**
   * Record a failed job run
   */
  recordJobFailure(error: string): void {
    this.stats.failedRuns++;
    this.stats.consecutiveFailures++;
    this.stats.lastError = error;
    this.finishRun({ status: 'FAILED', errorMessage: error });
  }

  private finishRun(update: Partial<JobRun>): void {
    const run = this.runs[0];
    if (run && run.status === 'RUNNING') {
      Object.assign(run, update, { completedAt: new Date() });
    }
  }

  getStats(): JobStats {
    return { ...this.stats, recentRuns: this.runs.map(run => ({ ...run })) };
  }

  /**
   * Check if job is in a critical failure state (3+ consecutive failures)
   */
  isCriticalFailureState(): boolean {
    return this.stats.consecutiveFailures >= 3;
  }

  getConsecutiveFailures(): number {
    return this.stats.consecutiveFailures;
  }
}
