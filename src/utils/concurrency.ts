import { debugLogger } from './debug-logger';
import { handleUnknownError } from '../errors';

export interface ConcurrencyOptions {
  /** Maximum number of concurrent operations. Default: 4 */
  concurrency?: number;
  /** Label for logging purposes */
  label?: string;
  /**
   * Checked before each new item is started. Returning false stops scheduling;
   * items already running are awaited.
   */
  shouldContinue?: () => boolean;
}

export interface ConcurrencyResult<T> {
  successful: Array<{ result: T; index: number }>;
  failed: Array<{ error: Error; index: number }>;
  /** Number of items never started because shouldContinue returned false */
  notStarted: number;
}

/**
 * Process items concurrently with a controlled concurrency limit.
 * Executes multiple async operations in parallel while respecting the concurrency limit.
 *
 * @example
 * const results = await processConcurrently(
 *   articles,
 *   async (article) => indexArticle(article),
 *   { concurrency: 4, label: 'Article Indexing' }
 * );
 */
export async function processConcurrently<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyResult<R>> {
  const { concurrency = 4, label = 'Operation', shouldContinue = () => true } = options;

  if (items.length === 0) {
    return { successful: [], failed: [], notStarted: 0 };
  }

  const startLabel = `${label} (${items.length} items, concurrency: ${concurrency})`;
  const stepId = debugLogger.stepStart('CONCURRENCY', startLabel, {
    itemCount: items.length,
    concurrency
  });
  const startTime = Date.now();

  const successful: Array<{ result: R; index: number }> = [];
  const failed: Array<{ error: Error; index: number }> = [];
  let started = 0;

  // Create a queue of promises to maintain concurrency limit
  const executing = new Set<Promise<void>>();

  for (let i = 0; i < items.length; i++) {
    if (!shouldContinue()) {
      debugLogger.info('CONCURRENCY', `${label}: scheduling stopped`, {
        started,
        remaining: items.length - i
      });
      break;
    }

    const item = items[i];
    started++;

    const promise: Promise<void> = fn(item, i)
      .then((result) => {
        successful.push({ result, index: i });
      })
      .catch((error: unknown) => {
        const err = handleUnknownError(error, `${label} item ${i + 1}`);
        debugLogger.warn('CONCURRENCY', `${label}: Item ${i + 1}/${items.length} failed`, {
          error: err.message
        });
        failed.push({ error: err, index: i });
      })
      .finally(() => {
        executing.delete(promise);
      });

    executing.add(promise);

    // Wait if we've reached the concurrency limit
    if (executing.size >= concurrency) {
      await Promise.race(executing);
    }
  }

  // Wait for all remaining promises to complete
  await Promise.all(executing);

  const duration = Date.now() - startTime;
  debugLogger.stepFinish(stepId, {
    successful: successful.length,
    failed: failed.length,
    notStarted: items.length - started,
    avgTimePerItem: started > 0 ? `${(duration / started).toFixed(0)}ms` : 'n/a',
  });

  return { successful, failed, notStarted: items.length - started };
}

/**
 * Split an array into chunks of a specified size.
 * Useful for batching operations.
 *
 * @example
 * chunkArray([1,2,3,4,5], 2) // [[1,2], [3,4], [5]]
 */
export function chunkArray<T>(array: readonly T[], chunkSize: number): T[][] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Counting semaphore capping how many calls run at once across callers.
 * Shared by every article pipeline that embeds through the same provider.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiters.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}
