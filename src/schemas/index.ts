import { z } from 'zod';

/**
 * Schema for one segment returned by the segmentation service
 */
export const SegmentSchema = z.object({
  start: z.number().int().min(0).describe('Inclusive start offset in the document'),
  end: z.number().int().min(1).describe('Exclusive end offset in the document'),
  topic: z.string().describe('Short topic label for the segment'),
});

export type Segment = z.infer<typeof SegmentSchema>;

/**
 * Segment array bound to a document length: offsets inside [0, length],
 * non-empty segments, sorted and non-overlapping.
 */
export function createSegmentArraySchema(textLength: number) {
  return z
    .array(SegmentSchema)
    .min(1, 'at least one segment is required')
    .superRefine((segments, ctx) => {
      segments.forEach((segment, i) => {
        if (segment.end > textLength) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'end'],
            message: `end ${segment.end} exceeds text length ${textLength}`,
          });
        }
        if (segment.start >= segment.end) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i],
            message: `start ${segment.start} must be before end ${segment.end}`,
          });
        }
        const previous = segments[i - 1];
        if (previous && segment.start < previous.end) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'start'],
            message: `segment overlaps or precedes the previous one (start ${segment.start} < ${previous.end})`,
          });
        }
      });
    });
}

/**
 * Payload stored with every point; read back from the vector store on search
 */
export const PointPayloadSchema = z.object({
  chunk_id: z.string(),
  article_id: z.string(),
  chunk_index: z.number().int().min(0),
  source: z.string(),
  title: z.string(),
  url: z.string(),
  published_at: z.string().nullable(),
  published_at_ts: z.number().nullable(),
  snippet: z.string(),
  model_name: z.string(),
  strategy: z.enum(['simple', 'agentic']),
  fallback: z.boolean(),
});

/**
 * POST /index body
 */
export const IndexRequestSchema = z.object({
  feed_url: z.string().url().optional().describe('Single RSS feed to index; defaults to the configured sources'),
  max_items_per_feed: z.number().int().min(1).max(100).optional().describe('RSS items read per feed'),
});

export type IndexRequest = z.infer<typeof IndexRequestSchema>;

/**
 * One article pushed directly by an ingestion collaborator
 */
export const ArticleInputSchema = z.object({
  id: z.string().min(1).optional(),
  url: z.string().url(),
  title: z.string().min(1),
  source: z.string().min(1),
  published_at: z.string().datetime({ offset: true }).nullable().optional(),
  raw_text: z.string(),
  author: z.string().nullable().optional(),
});

export const IndexArticlesRequestSchema = z.object({
  articles: z.array(ArticleInputSchema).min(1).max(500),
});

export type IndexArticlesRequest = z.infer<typeof IndexArticlesRequestSchema>;

/**
 * GET /search query string
 */
export const SearchQuerySchema = z.object({
  q: z.string().trim().min(2, 'q must be at least 2 characters').max(500),
  k: z.coerce.number().int().min(1).max(50).default(5),
  source: z.string().min(1).optional(),
  after: z.string().datetime({ offset: true }).optional(),
  before: z.string().datetime({ offset: true }).optional(),
});

export type SearchQuery = z.infer<typeof SearchQuerySchema>;
