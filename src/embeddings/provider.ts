import type { Config } from '../config';
import { DimensionMismatchError, ProviderError } from '../errors';
import type { Chunk, EmbeddingVector } from '../types';
import { chunkArray, Semaphore } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { createRetryPolicy, withTimeout, type RetryPolicy } from '../utils/retry';
import type { EmbeddingBackend } from './backend';
import { LocalHashingBackend } from './local';
import { createRemoteEmbeddingBackend } from './remote';

export type InputType = 'passage' | 'query';

export interface EmbeddingProviderOptions {
  batchSize: number;
  /** Max sub-batches in flight; local backends always run one at a time */
  concurrency: number;
  timeoutMs: number;
  maxInputChars: number;
  passagePrefix: string;
  queryPrefix: string;
  retryPolicy: RetryPolicy;
}

/**
 * Batching, truncation, prefixes, per-call timeout and quota-aware retry around
 * any EmbeddingBackend. One instance is shared by every concurrent article so the
 * semaphore bounds remote calls process-wide.
 */
export class EmbeddingProvider {
  private readonly semaphore: Semaphore;
  private dimensions?: number;
  private probe?: Promise<number>;

  constructor(
    private readonly backend: EmbeddingBackend,
    private readonly options: EmbeddingProviderOptions
  ) {
    this.semaphore = new Semaphore(backend.kind === 'local' ? 1 : options.concurrency);
    this.dimensions = backend.dimensions;
  }

  get modelName(): string {
    return this.backend.modelName;
  }

  get kind(): EmbeddingBackend['kind'] {
    return this.backend.kind;
  }

  private prepare(text: string, inputType: InputType): string {
    const prefix = inputType === 'query' ? this.options.queryPrefix : this.options.passagePrefix;
    const prefixed = `${prefix}${text}`;
    return prefixed.length > this.options.maxInputChars
      ? prefixed.slice(0, this.options.maxInputChars)
      : prefixed;
  }

  /**
   * Embed texts in order. Either every text gets a vector or the call rejects.
   */
  async embedBatch(texts: readonly string[], inputType: InputType = 'passage'): Promise<number[][]> {
    if (texts.length === 0) return [];

    const prepared = texts.map(text => this.prepare(text, inputType));
    const batches = chunkArray(prepared, this.options.batchSize);
    const stepId = debugLogger.stepStart('EMBED', `Embedding ${texts.length} ${inputType} texts`, {
      model: this.backend.modelName,
      batches: batches.length,
    });

    // Aborted by the first failing sub-batch so queued ones never reach the backend
    const siblings = new AbortController();

    try {
      const results = await Promise.all(
        batches.map((batch, i) =>
          this.embedSubBatch(batch, `embedding batch ${i + 1}/${batches.length}`, siblings)
        )
      );
      const vectors = results.flat();
      this.checkDimensions(vectors);
      debugLogger.stepFinish(stepId, { vectors: vectors.length, dimensions: vectors[0]?.length });
      return vectors;
    } catch (error) {
      debugLogger.stepError(stepId, 'EMBED', 'Embedding failed', error);
      throw error;
    }
  }

  private async embedSubBatch(batch: string[], label: string, siblings: AbortController): Promise<number[][]> {
    const { retryPolicy, timeoutMs } = this.options;
    siblings.signal.throwIfAborted();

    return this.semaphore.run(async () => {
      try {
        return await retryPolicy.withLabel(label).execute(async attempt => {
          siblings.signal.throwIfAborted();
          debugLogger.info('EMBED_BATCH', label, { size: batch.length, attempt });
          const vectors = await withTimeout(signal => this.backend.embed(batch, signal), timeoutMs, label);
          if (vectors.length !== batch.length) {
            throw new ProviderError(`${label}: backend returned ${vectors.length} vectors for ${batch.length} texts`);
          }
          return vectors;
        });
      } catch (error) {
        // Abort before the semaphore slot is released to the next queued sub-batch
        if (!siblings.signal.aborted) {
          siblings.abort(new ProviderError('embedding sub-batch cancelled after another sub-batch failed'));
        }
        throw error;
      }
    });
  }

  private checkDimensions(vectors: number[][]): void {
    const expected = this.dimensions ?? vectors[0]?.length;
    if (expected === undefined) return;
    for (const vector of vectors) {
      if (vector.length !== expected) {
        throw new DimensionMismatchError(expected, vector.length, `${this.backend.modelName} embeddings`);
      }
    }
  }

  async embedChunks(chunks: readonly Chunk[]): Promise<EmbeddingVector[]> {
    const vectors = await this.embedBatch(
      chunks.map(chunk => chunk.text),
      'passage'
    );
    return chunks.map((chunk, i) => ({
      chunkId: chunk.chunkId,
      vector: vectors[i],
      modelName: this.backend.modelName,
    }));
  }

  /**
   * Declared dimensionality, or the size of one probe embedding (computed once).
   */
  async resolveDimensions(): Promise<number> {
    if (this.dimensions !== undefined) return this.dimensions;

    this.probe ??= this.embedBatch(['dimension probe'], 'passage').then(([vector]) => {
      this.dimensions = vector.length;
      return vector.length;
    });

    try {
      return await this.probe;
    } catch (error) {
      this.probe = undefined;
      throw error;
    }
  }
}

export interface EmbeddingProviderDependencies {
  backend?: EmbeddingBackend;
  retryPolicy?: RetryPolicy;
}

export function createEmbeddingProvider(config: Config, deps: EmbeddingProviderDependencies = {}): EmbeddingProvider {
  const { embeddings } = config;
  const backend =
    deps.backend ??
    (embeddings.provider === 'local'
      ? new LocalHashingBackend(embeddings.dimensions, embeddings.model)
      : createRemoteEmbeddingBackend(config));

  return new EmbeddingProvider(backend, {
    batchSize: embeddings.batchSize,
    concurrency: embeddings.concurrency,
    timeoutMs: embeddings.timeoutMs,
    maxInputChars: embeddings.maxInputChars,
    passagePrefix: embeddings.passagePrefix,
    queryPrefix: embeddings.queryPrefix,
    retryPolicy: deps.retryPolicy ?? createRetryPolicy(config.retry, 'embeddings'),
  });
}
