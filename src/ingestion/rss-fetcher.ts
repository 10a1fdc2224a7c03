import Parser from 'rss-parser';
import type { Article, RSSSource } from '../types';
import { handleUnknownError } from '../errors';
import { stripHtml, sleep } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';
import { articleIdForUrl } from './filter';

interface FeedItemFields {
  contentEncoded?: string;
  creator?: string;
  description?: string;
}

type FeedItem = FeedItemFields & Parser.Item;

const parser = new Parser<Record<string, unknown>, FeedItemFields>({
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['dc:creator', 'creator'],
      'description'
    ]
  }
});

const FETCH_TIMEOUT_MS = 30000;

export interface FetchOptions {
  maxItemsPerFeed: number;
  /** Attempts per feed */
  maxRetries?: number;
}

/**
 * Some feeds omit the version attribute on <rss>, which the parser rejects
 */
export function fixMissingRssVersion(xml: string): string {
  const rssTag = xml.match(/<rss[^>]*>/);
  if (rssTag && !rssTag[0].includes('version=')) {
    return xml.replace(/<rss(\s|>)/, '<rss version="2.0"$1');
  }
  return xml;
}

async function fetchWithRetry(url: string, maxRetries = 3): Promise<Parser.Output<FeedItem>> {
  const stepId = debugLogger.stepStart('RSS', `Fetching RSS feed with retry logic`, {
    url,
    maxRetries
  });

  let lastError: Error = new Error(`No attempt made for ${url}`);

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
        headers: { 'User-Agent': 'news-semantic-indexer/1.0 (+rss)' }
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }

      const feed = await parser.parseString(fixMissingRssVersion(await response.text()));
      debugLogger.stepFinish(stepId, { itemCount: feed.items.length, attempts: attempt });
      return feed;
    } catch (error) {
      lastError = handleUnknownError(error, `fetch ${url}`);
      console.error(`Fetch attempt ${attempt}/${maxRetries} failed for ${url}:`, lastError.message);

      if (attempt < maxRetries) {
        const delay = Math.pow(2, attempt - 1) * 1000;
        debugLogger.info('RSS', `Retrying after ${delay}ms delay`, { delay, nextAttempt: attempt + 1 });
        await sleep(delay);
      }
    }
  }

  debugLogger.stepError(stepId, 'RSS', 'All retry attempts exhausted', lastError);
  throw lastError;
}

function extractContent(item: FeedItem, source: RSSSource): string {
  const primaryContent = source.contentField === 'content:encoded' ? item.contentEncoded : item.description;
  const fallbackContent = source.fallbackField ? item[source.fallbackField] : undefined;

  const rawContent = primaryContent || fallbackContent || item.content || '';
  return stripHtml(rawContent);
}

function parseDate(dateString: string | undefined): Date | null {
  if (!dateString) return null;

  const parsed = new Date(dateString);
  return isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Turn parsed feed items into articles; items without link or title are dropped
 */
export function toArticles(items: readonly FeedItem[], source: RSSSource, maxItems: number): Article[] {
  const articles: Article[] = [];

  for (const item of items) {
    if (articles.length >= maxItems) break;
    const url = item.link?.trim();
    const title = item.title?.trim();
    if (!url || !title) continue;

    articles.push({
      id: articleIdForUrl(url),
      url,
      title,
      rawText: extractContent(item, source),
      publishedAt: parseDate(item.isoDate || item.pubDate),
      source: source.name,
      author: item.creator || null
    });
  }

  return articles;
}

export async function parseFeedXml(xml: string, source: RSSSource, maxItems: number): Promise<Article[]> {
  const feed = await parser.parseString(fixMissingRssVersion(xml));
  return toArticles(feed.items, source, maxItems);
}

async function fetchSource(source: RSSSource, options: FetchOptions): Promise<Article[]> {
  const stepId = debugLogger.stepStart('RSS', `Fetching articles from ${source.name}`, {
    sourceName: source.name,
    url: source.url
  });

  try {
    const feed = await fetchWithRetry(source.url, options.maxRetries);
    const articles = toArticles(feed.items, source, options.maxItemsPerFeed);

    debugLogger.stepFinish(stepId, {
      rawItemCount: feed.items.length,
      validArticleCount: articles.length
    });

    return articles;
  } catch (error) {
    debugLogger.stepError(stepId, 'RSS', `Failed to fetch from ${source.name}`, error);
    throw error;
  }
}

/**
 * Fetch one feed given at request time
 */
export async function fetchFeed(url: string, options: FetchOptions): Promise<Article[]> {
  const name = new URL(url).hostname.replace(/^www\./, '');
  return fetchSource(
    { name, url, contentField: 'content:encoded', fallbackField: 'description' },
    options
  );
}

export async function fetchAllRSS(sources: readonly RSSSource[], options: FetchOptions): Promise<Article[]> {
  const stepId = debugLogger.stepStart('RSS', 'Fetching from all RSS sources', {
    sourceCount: sources.length,
    sources: sources.map(s => s.name)
  });

  const results = await Promise.allSettled(
    sources.map(source => fetchSource(source, options))
  );

  const articles: Article[] = [];
  const errors: string[] = [];

  results.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      articles.push(...result.value);
      debugLogger.info('RSS', `Source succeeded: ${sources[i].name}`, {
        articleCount: result.value.length
      });
    } else {
      const message = handleUnknownError(result.reason, sources[i].name).message;
      errors.push(`${sources[i].name}: ${message}`);
      debugLogger.warn('RSS', `Source failed: ${sources[i].name}`, { error: message });
    }
  });

  if (sources.length > 0 && errors.length === sources.length) {
    debugLogger.stepError(stepId, 'RSS', 'All RSS sources failed', new Error(errors.join(', ')));
    throw new Error(`All RSS sources failed: ${errors.join(', ')}`);
  }

  if (errors.length > 0) {
    console.warn('Some RSS sources failed:', errors);
  }

  debugLogger.stepFinish(stepId, {
    totalArticles: articles.length,
    successfulSources: sources.length - errors.length,
    failedSources: errors.length,
    errors: errors.length > 0 ? errors : undefined
  });

  return articles;
}
