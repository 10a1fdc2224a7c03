/**
 * A model that turns texts into vectors. Backends do no batching, retrying
 * or prefixing; EmbeddingProvider does that for every backend alike.
 */
export interface EmbeddingBackend {
  readonly kind: 'local' | 'remote';
  readonly modelName: string;
  /** Known output size, when the backend declares one */
  readonly dimensions?: number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}
