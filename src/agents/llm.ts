import { CallbackHandler } from '@langfuse/langchain';
import { ChatOpenAI } from '@langchain/openai';
import type { Config } from '../config';
import { ConfigError } from '../errors';
import { isLangfuseEnabled } from '../instrumentation';

/**
 * Headers OpenRouter uses to attribute traffic
 */
export function openRouterHeaders(): Record<string, string> {
  return {
    'HTTP-Referer': process.env.APP_URL || 'http://localhost:3001',
    'X-Title': 'News Semantic Indexer',
  };
}

export function requireOpenRouterKey(config: Config): string {
  const apiKey = config.openRouter.apiKey;
  if (!apiKey) {
    throw new ConfigError('OPENROUTER_API_KEY is not set');
  }
  return apiKey;
}

/**
 * Create ChatOpenAI instance configured for OpenRouter.
 * LangChain's own retries are off: callers go through the shared RetryPolicy.
 */
export function createOpenRouterLLM(
  config: Config,
  options: {
    model: string;
    temperature?: number;
    maxTokens?: number;
  }
): ChatOpenAI {
  return new ChatOpenAI({
    model: options.model,
    apiKey: requireOpenRouterKey(config),
    configuration: {
      baseURL: config.openRouter.baseURL,
      defaultHeaders: openRouterHeaders(),
    },
    temperature: options.temperature ?? 0,
    maxTokens: options.maxTokens ?? 1024,
    maxRetries: 0,
    streaming: false,
  });
}

/**
 * LangFuse callback handler for tracing LLM calls.
 * Undefined when the Langfuse keys are not configured.
 */
export function createLangfuseHandler(
  config: Config,
  options?: {
    sessionId?: string;
    tags?: string[];
  }
): CallbackHandler | undefined {
  if (!isLangfuseEnabled(config)) {
    return undefined;
  }

  return new CallbackHandler({
    sessionId: options?.sessionId,
    tags: options?.tags,
    traceMetadata: {
      model: config.chunking.segmentationModel,
    },
  });
}
