import { z } from 'zod';
import { ConfigError } from '../errors';
import type { DistanceMetric, ChunkStrategy } from '../types';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

/**
 * Environment schema. Every variable is optional; defaults mirror a local
 * development setup (local embeddings, Qdrant on localhost).
 */
export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_KEY: optionalString,
  FRONTEND_URL: optionalString,
  DEBUG: booleanFlag,

  MIN_ARTICLE_CHARS: z.coerce.number().int().min(0).default(400),
  MIN_QUALITY_SCORE: z.coerce.number().min(0).max(1).default(0.55),
  MIN_WORD_COUNT: z.coerce.number().int().min(1).default(60),
  MAX_BOILERPLATE_MATCHES: z.coerce.number().int().min(0).default(3),

  CHUNK_STRATEGY: z.enum(['simple', 'agentic']).default('simple'),
  CHUNK_WINDOW_SIZE: z.coerce.number().int().min(1).default(2000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  MAX_CHUNKS_PER_ARTICLE: z.coerce.number().int().min(0).default(0),
  AGENTIC_MIN_CHARS: z.coerce.number().int().min(0).default(1500),
  AGENTIC_MAX_CHARS: z.coerce.number().int().min(1).default(8000),
  SEGMENTATION_MODEL: z.string().default('google/gemini-2.5-flash-lite'),
  SEGMENTATION_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),

  EMBEDDING_PROVIDER: z.enum(['local', 'remote']).default('local'),
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_DIMENSIONS: z.coerce.number().int().min(1).optional(),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).default(8),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().min(1).default(20000),
  EMBEDDING_MAX_INPUT_CHARS: z.coerce.number().int().min(1).default(8000),
  EMBEDDING_PASSAGE_PREFIX: z.string().default(''),
  EMBEDDING_QUERY_PREFIX: z.string().default(''),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  LANGFUSE_PUBLIC_KEY: optionalString,
  LANGFUSE_SECRET_KEY: optionalString,
  LANGFUSE_HOST: z.string().url().default('https://cloud.langfuse.com'),
  LANGFUSE_DEBUG: booleanFlag,

  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
  RETRY_MAX_TRANSIENT_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(6000),
  RETRY_JITTER_MS: z.coerce.number().int().min(0).default(300),

  VECTOR_STORE_PROVIDER: z.enum(['qdrant', 'memory']).default('qdrant'),
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION: z.string().min(1).default('articles'),
  VECTOR_DISTANCE: z.enum(['Cosine', 'Dot']).default('Cosine'),
  VECTOR_STORE_TIMEOUT_MS: z.coerce.number().int().min(1).default(10000),

  INDEX_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  SEARCH_FAN_OUT: z.coerce.number().int().min(1).default(8),
  SEARCH_MIN_CANDIDATES: z.coerce.number().int().min(1).default(20),
  SEARCH_SNIPPETS_PER_ARTICLE: z.coerce.number().int().min(1).default(3),
  SNIPPET_MAX_CHARS: z.coerce.number().int().min(1).default(1200),

  RSS_MAX_ITEMS_PER_FEED: z.coerce.number().int().min(1).default(10),
  INDEX_CRON: z.string().default('*/30 * * * *'),
  SCHEDULER_ENABLED: booleanFlag,
});

export type Env = z.infer<typeof EnvSchema>;

export interface RetryConfig {
  maxAttempts: number;
  maxTransientAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface AppConfig {
  server: {
    port: number;
    host: string;
    nodeEnv: 'development' | 'production' | 'test';
    apiKey?: string;
    frontendUrl?: string;
  };
  debug: boolean;
  normalizer: {
    minChars: number;
    minQualityScore: number;
    minWordCount: number;
    maxBoilerplateMatches: number;
  };
  chunking: {
    strategy: ChunkStrategy;
    windowSize: number;
    overlap: number;
    maxChunksPerArticle: number;
    agenticMinChars: number;
    agenticMaxChars: number;
    segmentationModel: string;
    segmentationTimeoutMs: number;
  };
  embeddings: {
    provider: 'local' | 'remote';
    model: string;
    dimensions?: number;
    batchSize: number;
    concurrency: number;
    timeoutMs: number;
    maxInputChars: number;
    passagePrefix: string;
    queryPrefix: string;
  };
  openRouter: {
    apiKey?: string;
    baseURL: string;
  };
  /** Tracing is on only when both keys are set */
  langfuse: {
    publicKey?: string;
    secretKey?: string;
    baseUrl: string;
    debug: boolean;
  };
  retry: RetryConfig;
  vectorStore: {
    provider: 'qdrant' | 'memory';
    url: string;
    apiKey?: string;
    collection: string;
    distance: DistanceMetric;
    timeoutMs: number;
  };
  indexing: {
    concurrency: number;
    snippetMaxChars: number;
  };
  search: {
    fanOut: number;
    minCandidates: number;
    snippetsPerArticle: number;
  };
  ingestion: {
    maxItemsPerFeed: number;
    cron: string;
    schedulerEnabled: boolean;
  };
}

export type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export type Config = DeepReadonly<AppConfig>;

export const LOCAL_EMBEDDING_MODEL = 'hashing-bow-384';
export const LOCAL_EMBEDDING_DIMENSIONS = 384;
export const REMOTE_EMBEDDING_MODEL = 'openai/text-embedding-3-small';

function deepFreeze<T extends object>(value: T): DeepReadonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function toAppConfig(env: Env): AppConfig {
  const isLocal = env.EMBEDDING_PROVIDER === 'local';

  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
      apiKey: env.API_KEY,
      frontendUrl: env.FRONTEND_URL,
    },
    debug: env.DEBUG,
    normalizer: {
      minChars: env.MIN_ARTICLE_CHARS,
      minQualityScore: env.MIN_QUALITY_SCORE,
      minWordCount: env.MIN_WORD_COUNT,
      maxBoilerplateMatches: env.MAX_BOILERPLATE_MATCHES,
    },
    chunking: {
      strategy: env.CHUNK_STRATEGY,
      windowSize: env.CHUNK_WINDOW_SIZE,
      overlap: env.CHUNK_OVERLAP,
      maxChunksPerArticle: env.MAX_CHUNKS_PER_ARTICLE,
      agenticMinChars: env.AGENTIC_MIN_CHARS,
      agenticMaxChars: env.AGENTIC_MAX_CHARS,
      segmentationModel: env.SEGMENTATION_MODEL,
      segmentationTimeoutMs: env.SEGMENTATION_TIMEOUT_MS,
    },
    embeddings: {
      provider: env.EMBEDDING_PROVIDER,
      model: env.EMBEDDING_MODEL ?? (isLocal ? LOCAL_EMBEDDING_MODEL : REMOTE_EMBEDDING_MODEL),
      dimensions: env.EMBEDDING_DIMENSIONS ?? (isLocal ? LOCAL_EMBEDDING_DIMENSIONS : undefined),
      batchSize: env.EMBEDDING_BATCH_SIZE,
      concurrency: env.EMBEDDING_CONCURRENCY,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
      maxInputChars: env.EMBEDDING_MAX_INPUT_CHARS,
      passagePrefix: env.EMBEDDING_PASSAGE_PREFIX,
      queryPrefix: env.EMBEDDING_QUERY_PREFIX,
    },
    openRouter: {
      apiKey: env.OPENROUTER_API_KEY,
      baseURL: env.OPENROUTER_BASE_URL,
    },
    langfuse: {
      publicKey: env.LANGFUSE_PUBLIC_KEY,
      secretKey: env.LANGFUSE_SECRET_KEY,
      baseUrl: env.LANGFUSE_HOST,
      debug: env.LANGFUSE_DEBUG,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      maxTransientAttempts: env.RETRY_MAX_TRANSIENT_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      jitterMs: env.RETRY_JITTER_MS,
    },
    vectorStore: {
      provider: env.VECTOR_STORE_PROVIDER,
      url: env.QDRANT_URL,
      apiKey: env.QDRANT_API_KEY,
      collection: env.QDRANT_COLLECTION,
      distance: env.VECTOR_DISTANCE,
      timeoutMs: env.VECTOR_STORE_TIMEOUT_MS,
    },
    indexing: {
      concurrency: env.INDEX_CONCURRENCY,
      snippetMaxChars: env.SNIPPET_MAX_CHARS,
    },
    search: {
      fanOut: env.SEARCH_FAN_OUT,
      minCandidates: env.SEARCH_MIN_CANDIDATES,
      snippetsPerArticle: env.SEARCH_SNIPPETS_PER_ARTICLE,
    },
    ingestion: {
      maxItemsPerFeed: env.RSS_MAX_ITEMS_PER_FEED,
      cron: env.INDEX_CRON,
      schedulerEnabled: env.SCHEDULER_ENABLED,
    },
  };
}

/**
 * Build the immutable configuration value passed to every component.
 * Throws ConfigError listing each invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  const config = toAppConfig(parsed.data);

  if (config.chunking.overlap >= config.chunking.windowSize) {
    throw new ConfigError(
      `CHUNK_OVERLAP (${config.chunking.overlap}) must be smaller than CHUNK_WINDOW_SIZE (${config.chunking.windowSize})`
    );
  }
  if (config.chunking.agenticMinChars > config.chunking.agenticMaxChars) {
    throw new ConfigError('AGENTIC_MIN_CHARS must not exceed AGENTIC_MAX_CHARS');
  }
  if (config.embeddings.provider === 'remote' && !config.openRouter.apiKey) {
    throw new ConfigError('OPENROUTER_API_KEY is required when EMBEDDING_PROVIDER=remote');
  }
  if (config.chunking.strategy === 'agentic' && !config.openRouter.apiKey) {
    throw new ConfigError('OPENROUTER_API_KEY is required when CHUNK_STRATEGY=agentic');
  }

  return deepFreeze(config);
}
