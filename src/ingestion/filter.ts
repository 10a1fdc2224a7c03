import { v5 as uuidv5 } from 'uuid';
import type { Article } from '../types';
import { debugLogger } from '../utils/debug-logger';

const TRACKING_PARAMS = [
  'utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content',
  'fbclid', 'gclid', 'timestamp', 'ttt', '_t', '_ts', '_dc', '_refresh', '_rnd', '__', 'r', 'nc', 'rand', '_q'
];

/**
 * Normalize URL by stripping tracking parameters
 * Keeps the base URL path but removes utm_*, timestamp, cache-busting params
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const param of TRACKING_PARAMS) {
      parsed.searchParams.delete(param);
    }
    parsed.hash = '';

    // If all params were tracking params, return URL without query string
    if (parsed.searchParams.toString() === '') {
      return `${parsed.origin}${parsed.pathname}`;
    }

    return parsed.toString();
  } catch {
    return url;
  }
}

/** Stable article id: the same URL always yields the same id */
export function articleIdForUrl(url: string): string {
  return uuidv5(normalizeUrl(url), uuidv5.URL);
}

/**
 * Drop repeated articles within a batch, by normalized URL or by title
 */
export function dedupeArticles(articles: readonly Article[]): Article[] {
  const seenUrls = new Set<string>();
  const seenTitles = new Set<string>();

  const unique = articles.filter(article => {
    const url = normalizeUrl(article.url);
    const title = article.title.toLowerCase().trim();
    if (seenUrls.has(url) || seenTitles.has(title)) {
      return false;
    }
    seenUrls.add(url);
    seenTitles.add(title);
    return true;
  });

  if (unique.length !== articles.length) {
    debugLogger.info('INGESTION', 'Deduplicated within batch', {
      beforeDedup: articles.length,
      afterDedup: unique.length,
      removed: articles.length - unique.length,
    });
  }

  return unique;
}
