/**
 * Step logger for the indexing and search pipelines. Silent unless enabled
 * through config.debug (the server calls setEnabled at startup).
 *
 * Each stepStart returns an id; stepFinish or stepError closes it and prints
 * the elapsed time.
 */

import chalk from 'chalk';
import { sanitizeForLog } from './sanitize';

type Painter = chalk.Chalk;

interface OpenStep {
  category: string;
  description: string;
  startedAt: number;
}

const HTTP = chalk.bgCyan.black.bold;
const PIPELINE = chalk.bgMagenta.white.bold;
const REMOTE = chalk.bgBlue.white.bold;
const STORAGE = chalk.bgGreen.black.bold;

const CATEGORY_PAINTERS: Record<string, Painter> = {
  API: HTTP,
  INDEX_REQUEST: HTTP,
  RSS: HTTP,

  INDEXING: PIPELINE,
  INDEX_ARTICLE: PIPELINE,
  INGESTION: PIPELINE,
  CHUNKING: chalk.bgYellow.black.bold,
  SEGMENTATION: chalk.bgRed.white.bold,

  EMBED: REMOTE,
  EMBED_BATCH: REMOTE,
  SEARCH: REMOTE,
  VECTOR_SEARCH: REMOTE,
  RETRY: chalk.bgYellow.black.bold,

  QDRANT: STORAGE,
  UPSERT: STORAGE,

  CONCURRENCY: chalk.bgWhite.black.bold,
};

function label(category: string): string {
  const paint = CATEGORY_PAINTERS[category] ?? chalk.bgGray.white.bold;
  return paint(` ${category} `);
}

function details(data?: Record<string, unknown>): string {
  if (!data || Object.keys(data).length === 0) return '';
  return chalk.dim(` │ ${sanitizeForLog(JSON.stringify(data))}`);
}

function elapsed(ms: number): string {
  const paint = ms > 1000 ? chalk.yellow : ms > 500 ? chalk.cyan : chalk.green;
  return paint(`(${ms}ms)`);
}

class DebugLogger {
  private enabled = false;
  private readonly steps = new Map<string, OpenStep>();
  private counter = 0;

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.steps.clear();
    }
  }

  /**
   * Open a step. Returns '' while disabled, which the other methods ignore.
   */
  stepStart(category: string, description: string, metadata?: Record<string, unknown>): string {
    if (!this.enabled) return '';

    const stepId = `${category}_${++this.counter}`;
    this.steps.set(stepId, { category, description, startedAt: Date.now() });
    this.write(chalk.cyan('▶'), category, chalk.white(description), metadata);
    return stepId;
  }

  stepFinish(stepId: string, result?: Record<string, unknown>): void {
    const step = this.close(stepId);
    if (!step) return;

    const duration = Date.now() - step.startedAt;
    this.write(chalk.green('✓'), step.category, `${chalk.white(step.description)} ${elapsed(duration)}`, result);
  }

  /**
   * Close a step as failed. Without an open step the given category is used.
   */
  stepError(stepId: string | null, category: string, description: string, error: unknown): void {
    if (!this.enabled) return;

    const step = stepId ? this.close(stepId) : undefined;
    const duration = step ? chalk.dim(` (${Date.now() - step.startedAt}ms)`) : '';
    const message = error instanceof Error ? error.message : String(error);

    this.write(
      chalk.red('✗'),
      step?.category ?? category,
      `${chalk.white(description)}${duration} ${chalk.red('│')} ${chalk.red(sanitizeForLog(message))}`
    );

    const frame = error instanceof Error ? error.stack?.split('\n')[1]?.trim() : undefined;
    if (frame) {
      console.log(chalk.dim(`  └─ ${frame}`));
    }
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled) return;
    this.write(chalk.blue('ℹ'), category, chalk.white(message), data);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled) return;
    this.write(chalk.yellow('⚠'), category, chalk.yellow(message), data);
  }

  private close(stepId: string): OpenStep | undefined {
    if (!this.enabled || !stepId) return undefined;
    const step = this.steps.get(stepId);
    this.steps.delete(stepId);
    return step;
  }

  private write(symbol: string, category: string, text: string, data?: Record<string, unknown>): void {
    console.log(`${symbol} ${label(category)} ${text}${details(data)}`);
  }
}

export const debugLogger = new DebugLogger();
