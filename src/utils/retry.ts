import OpenAI from 'openai';
import {
  PipelineError,
  QuotaExceededError,
  TimeoutError,
  TransientProviderError,
  handleUnknownError,
} from '../errors';
import type { RetryConfig } from '../config';
import { debugLogger } from './debug-logger';
import { sleep as defaultSleep } from './html';

export type ErrorClass = 'quota' | 'transient' | 'fatal';

export type ErrorClassifier = (error: unknown) => ErrorClass;

export interface RetryPolicyOptions extends RetryConfig {
  classify: ErrorClassifier;
  /** Name used in logs and in the escalated error message */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const QUOTA_MESSAGE = /\b429\b|rate[\s_-]?limit|too many requests|quota|resource[\s_-]?exhausted/i;
const TRANSIENT_MESSAGE = /fetch failed|socket hang up|network|timed? ?out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|ENOTFOUND|EPIPE/i;
const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_SOCKET']);

function statusOf(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function codeOf(error: object): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error && error.cause && typeof error.cause === 'object') {
    return codeOf(error.cause);
  }
  return undefined;
}

/**
 * Map backend-specific failures (OpenAI SDK, LangChain, Qdrant, fetch) onto the
 * three retry classes. Errors raised by this codebase are fatal except TimeoutError.
 */
export function classifyRemoteError(error: unknown): ErrorClass {
  if (error instanceof TimeoutError) return 'transient';
  if (error instanceof PipelineError) return 'fatal';
  if (error instanceof OpenAI.RateLimitError) return 'quota';
  if (error instanceof OpenAI.APIConnectionTimeoutError) return 'transient';
  if (error instanceof OpenAI.APIConnectionError) return 'transient';

  if (!error || typeof error !== 'object') return 'fatal';

  const status = statusOf(error);
  if (status === 429) return 'quota';
  if (status === 408 || status === 409 || (status !== undefined && status >= 500)) return 'transient';
  if (status !== undefined) return 'fatal';

  const code = codeOf(error);
  if (code && TRANSIENT_CODES.has(code)) return 'transient';

  const message = error instanceof Error ? error.message : '';
  const name = error instanceof Error ? error.name : '';
  if (QUOTA_MESSAGE.test(message)) return 'quota';
  if (name === 'TimeoutError' || TRANSIENT_MESSAGE.test(message)) return 'transient';

  return 'fatal';
}

/**
 * Retry with exponential backoff and jitter, parameterized by an error classifier.
 * Quota and transient failures have separate attempt budgets; fatal errors are
 * rethrown unchanged on the first occurrence.
 */
export class RetryPolicy {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly label: string;

  constructor(private readonly options: RetryPolicyOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.label = options.label ?? 'remote call';
  }

  /** Same budgets and backoff, different label (and optionally classifier) */
  withLabel(label: string, classify: ErrorClassifier = this.options.classify): RetryPolicy {
    return new RetryPolicy({ ...this.options, label, classify });
  }

  delayFor(failures: number): number {
    const { baseDelayMs, maxDelayMs, jitterMs } = this.options;
    const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, failures - 1));
    return exponential + this.random() * jitterMs;
  }

  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    let quotaFailures = 0;
    let transientFailures = 0;
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await operation(attempt);
      } catch (error) {
        const kind = this.options.classify(error);
        const err = handleUnknownError(error, this.label);

        if (kind === 'fatal') {
          throw error;
        }

        if (kind === 'quota') {
          quotaFailures++;
          if (quotaFailures >= this.options.maxAttempts) {
            debugLogger.warn('RETRY', `${this.label}: quota retries exhausted`, { attempts: attempt });
            throw new QuotaExceededError(
              `${this.label}: quota exceeded after ${attempt} attempts (${err.message})`,
              attempt,
              Math.ceil(this.options.maxDelayMs / 1000) || 1,
              { cause: error }
            );
          }
        } else {
          transientFailures++;
          if (transientFailures >= this.options.maxTransientAttempts) {
            debugLogger.warn('RETRY', `${this.label}: transient retries exhausted`, { attempts: attempt });
            throw new TransientProviderError(
              `${this.label}: failed after ${attempt} attempts (${err.message})`,
              attempt,
              { cause: error }
            );
          }
        }

        const delay = this.delayFor(quotaFailures + transientFailures);
        debugLogger.info('RETRY', `${this.label}: ${kind} failure, retrying in ${Math.round(delay)}ms`, {
          attempt,
          quotaFailures,
          transientFailures,
          error: err.message
        });
        await this.sleep(delay);
      }
    }
  }
}

export function createRetryPolicy(config: RetryConfig, label: string): RetryPolicy {
  return new RetryPolicy({ ...config, classify: classifyRemoteError, label });
}

/**
 * Run an abortable call with its own deadline. The signal handed to `fn` is aborted
 * when the deadline passes, and the returned promise rejects with TimeoutError.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
