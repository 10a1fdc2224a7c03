import OpenAI from 'openai';
import type { Config } from '../config';
import { ProviderError } from '../errors';
import { openRouterHeaders, requireOpenRouterKey } from '../agents/llm';
import type { EmbeddingBackend } from './backend';

/** The part of `openai.embeddings` the backend calls */
export interface EmbeddingsClient {
  create(
    params: { model: string; input: string[]; dimensions?: number },
    options?: { signal?: AbortSignal }
  ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
}

/**
 * OpenAI-compatible embeddings endpoint (OpenRouter by default).
 */
export class RemoteEmbeddingBackend implements EmbeddingBackend {
  readonly kind = 'remote' as const;

  constructor(
    private readonly client: EmbeddingsClient,
    readonly modelName: string,
    readonly dimensions?: number
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.client.create(
      {
        model: this.modelName,
        input: texts,
        ...(this.dimensions !== undefined && { dimensions: this.dimensions }),
      },
      { signal }
    );

    if (!Array.isArray(response.data) || response.data.length !== texts.length) {
      const received = Array.isArray(response.data) ? response.data.length : 0;
      throw new ProviderError(`Embedding response has ${received} vectors for ${texts.length} inputs`);
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}

export function createRemoteEmbeddingBackend(config: Config): RemoteEmbeddingBackend {
  const client = new OpenAI({
    apiKey: requireOpenRouterKey(config),
    baseURL: config.openRouter.baseURL,
    defaultHeaders: openRouterHeaders(),
    // Retries and deadlines are handled by EmbeddingProvider
    maxRetries: 0,
  });
  return new RemoteEmbeddingBackend(client.embeddings, config.embeddings.model, config.embeddings.dimensions);
}
