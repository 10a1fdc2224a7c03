/**
 * Background job scheduler using node-cron
 */

import * as cron from 'node-cron';
import { ConfigError } from '../errors';
import type { NewsIngestionJob } from './news-ingestion-job';

export interface SchedulerStatus {
  isRunning: boolean;
  cronExpression: string;
  isJobCurrentlyExecuting: boolean;
}

const SHUTDOWN_WAIT_MS = 30000;

export class JobScheduler {
  private scheduledTask: cron.ScheduledTask | null = null;

  constructor(
    private readonly job: NewsIngestionJob,
    private readonly cronExpression: string
  ) {}

  /**
   * Start the background job scheduler
   */
  start(options: { runImmediately?: boolean } = {}): void {
    if (this.scheduledTask) {
      console.warn('Job scheduler is already running');
      return;
    }

    if (!cron.validate(this.cronExpression)) {
      throw new ConfigError(`Invalid cron expression: ${this.cronExpression}`);
    }

    this.scheduledTask = cron.schedule(this.cronExpression, () => {
      this.job.run().catch((error: unknown) => {
        console.error('Error in scheduled job run:', error);
      });
    });

    console.log(`🤖 Background job scheduler started (${this.cronExpression})`);

    if (options.runImmediately ?? true) {
      this.job.run().catch((error: unknown) => {
        console.error('Error in initial job run:', error);
      });
    }
  }

  stop(): void {
    if (!this.scheduledTask) {
      return;
    }

    this.scheduledTask.stop();
    this.scheduledTask = null;

    console.log('Background job scheduler stopped');
  }

  /**
   * Gracefully shutdown: stop scheduler, cancel the current run and wait for
   * its in-flight articles to finish
   */
  async gracefulShutdown(maxWaitTime = SHUTDOWN_WAIT_MS): Promise<void> {
    this.stop();
    this.job.cancel();

    const startWait = Date.now();
    while (this.job.isRunning && Date.now() - startWait < maxWaitTime) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    if (this.job.isRunning) {
      console.warn('Background job did not finish within timeout period');
    }
  }

  getStatus(): SchedulerStatus {
    return {
      isRunning: this.scheduledTask !== null,
      cronExpression: this.cronExpression,
      isJobCurrentlyExecuting: this.job.isRunning,
    };
  }
}
