import type { Config } from '../config';
import { ChunkValidationError, ConfigError, handleUnknownError } from '../errors';
import { createSegmentArraySchema, type Segment } from '../schemas';
import type { ChunkStrategy, Chunk, CleanedDocument } from '../types';
import { createSegmentationService, type SegmentationService } from '../agents/segmentation';
import { debugLogger } from '../utils/debug-logger';
import { createRetryPolicy, withTimeout, type RetryPolicy } from '../utils/retry';

export const DEFAULT_WINDOW_SIZE = 2000;
export const DEFAULT_OVERLAP = 200;

export interface Span {
  start: number;
  end: number;
}

export interface Chunker {
  readonly strategy: ChunkStrategy;
  chunk(document: CleanedDocument): Promise<Chunk[]>;
}

function validateWindow(windowSize: number, overlap: number): void {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new ConfigError(`windowSize must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= windowSize) {
    throw new ConfigError(`overlap must be an integer in [0, ${windowSize}), got ${overlap}`);
  }
}

/**
 * Sliding character window. The last span ends at text.length and may be shorter.
 */
export function splitTextByChars(text: string, windowSize: number, overlap: number): Span[] {
  validateWindow(windowSize, overlap);

  const spans: Span[] = [];
  const step = windowSize - overlap;
  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(start + windowSize, text.length);
    spans.push({ start, end });
    if (end === text.length) break;
  }
  return spans;
}

function toChunks(
  document: CleanedDocument,
  spans: Span[],
  strategy: ChunkStrategy,
  fallback: boolean,
  maxChunks: number
): Chunk[] {
  const capped = maxChunks > 0 ? spans.slice(0, maxChunks) : spans;
  return capped.map((span, index) => ({
    chunkId: `${document.articleId}:${index}`,
    articleId: document.articleId,
    index,
    text: document.text.slice(span.start, span.end),
    offsetStart: span.start,
    offsetEnd: span.end,
    strategy,
    fallback,
  }));
}

export interface SimpleChunkerOptions {
  windowSize?: number;
  overlap?: number;
  /** 0 means no cap */
  maxChunks?: number;
}

export class SimpleChunker implements Chunker {
  readonly strategy = 'simple' as const;
  private readonly windowSize: number;
  private readonly overlap: number;
  private readonly maxChunks: number;

  constructor(options: SimpleChunkerOptions = {}) {
    this.windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
    this.overlap = options.overlap ?? DEFAULT_OVERLAP;
    this.maxChunks = options.maxChunks ?? 0;
    validateWindow(this.windowSize, this.overlap);
  }

  chunk(document: CleanedDocument): Promise<Chunk[]> {
    return Promise.resolve(this.chunkSync(document, false));
  }

  /** Synchronous variant; `fallback` tags chunks produced on behalf of the agentic strategy */
  chunkSync(document: CleanedDocument, fallback: boolean): Chunk[] {
    const spans = splitTextByChars(document.text, this.windowSize, this.overlap);
    return toChunks(document, spans, 'simple', fallback, this.maxChunks);
  }
}

/**
 * Strip code fences and keep the outermost JSON array of a model response,
 * then validate it against the document length. Any violation rejects the whole response.
 */
export function parseSegments(raw: string, textLength: number): Segment[] {
  const unfenced = raw
    .split('\n')
    .filter(line => !line.trim().startsWith('```'))
    .join('\n');
  const start = unfenced.indexOf('[');
  const end = unfenced.lastIndexOf(']');
  if (start === -1 || end <= start) {
    throw new ChunkValidationError('Segmentation response contains no JSON array');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced.slice(start, end + 1));
  } catch (error) {
    throw new ChunkValidationError(`Segmentation response is not valid JSON: ${handleUnknownError(error, 'parse').message}`);
  }

  const result = createSegmentArraySchema(textLength).safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ChunkValidationError(`Invalid segments: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export interface AgenticChunkerOptions {
  /** Documents shorter than this go straight to the simple chunker */
  minChars: number;
  /** Documents longer than this go straight to the simple chunker */
  maxChars: number;
  maxChunks: number;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  /** Chunker for documents outside [minChars, maxChars]; defaults to 2000/200 windows */
  simple?: SimpleChunker;
}

export class AgenticChunker implements Chunker {
  readonly strategy = 'agentic' as const;
  private readonly simple: SimpleChunker;
  private readonly fallback: SimpleChunker;

  constructor(
    private readonly segmenter: SegmentationService,
    private readonly options: AgenticChunkerOptions
  ) {
    this.fallback = new SimpleChunker({ maxChunks: options.maxChunks });
    this.simple = options.simple ?? this.fallback;
  }

  /** Never throws: every failure degrades to simple chunks tagged fallback=true */
  async chunk(document: CleanedDocument): Promise<Chunk[]> {
    const { minChars, maxChars, maxChunks, timeoutMs, retryPolicy } = this.options;
    const length = document.text.length;

    if (length < minChars || length > maxChars) {
      debugLogger.info('CHUNKING', 'Document outside agentic range, using simple windows', {
        articleId: document.articleId,
        length,
      });
      return this.simple.chunkSync(document, false);
    }

    const stepId = debugLogger.stepStart('SEGMENTATION', `Segmenting ${document.articleId}`, { length });
    try {
      const raw = await retryPolicy.execute(() =>
        withTimeout(signal => this.segmenter.segment(document.text, signal), timeoutMs, 'segmentation')
      );
      const segments = parseSegments(raw, length);

      const blank = segments.findIndex(segment => document.text.slice(segment.start, segment.end).trim() === '');
      if (blank !== -1) {
        throw new ChunkValidationError(`Segment ${blank} covers only whitespace`);
      }

      const chunks = toChunks(document, segments, 'agentic', false, maxChunks);
      debugLogger.stepFinish(stepId, { segments: segments.length, chunks: chunks.length });
      return chunks;
    } catch (error) {
      debugLogger.stepError(stepId, 'SEGMENTATION', 'Segmentation failed, falling back to simple windows', error);
      const err = handleUnknownError(error, 'segmentation');
      console.warn(`Agentic chunking failed for ${document.articleId}, using simple windows: ${err.message}`);
      return this.fallback.chunkSync(document, true);
    }
  }
}

export interface ChunkerDependencies {
  segmenter?: SegmentationService;
  retryPolicy?: RetryPolicy;
}

export function createChunker(config: Config, deps: ChunkerDependencies = {}): Chunker {
  const { strategy, windowSize, overlap, maxChunksPerArticle } = config.chunking;
  const simple = new SimpleChunker({ windowSize, overlap, maxChunks: maxChunksPerArticle });

  if (strategy === 'simple') {
    return simple;
  }

  return new AgenticChunker(deps.segmenter ?? createSegmentationService(config), {
    minChars: config.chunking.agenticMinChars,
    maxChars: config.chunking.agenticMaxChars,
    maxChunks: maxChunksPerArticle,
    timeoutMs: config.chunking.segmentationTimeoutMs,
    retryPolicy: deps.retryPolicy ?? createRetryPolicy(config.retry, 'segmentation'),
    simple,
  });
}
