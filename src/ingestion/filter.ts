import { RawArticle } from '../types';
import { debugLogger } from '../utils/debug-logger';

const TRACKING_PARAMS = [
  'utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content',
  'timestamp', 'ttt', '_t', '_ts', '_dc', '_refresh', '_rnd', '__', 'r', 'nc', 'rand', '_q'
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

    if (parsed.searchParams.toString() === '') {
      return `${parsed.origin}${parsed.pathname}`;
    }
    return parsed.toString();
  } catch {
    // Not an absolute URL; keep it as the identity
    return url;
  }
}

/**
 * Drop repeats of the same (source, normalized URL) inside one fetched batch.
 * The same story from different outlets is kept: clustering groups those.
 */
export function dedupeBatch(articles: RawArticle[]): RawArticle[] {
  const seen = new Set<string>();

  const unique = articles.filter(article => {
    const key = `${article.source}\u0000${normalizeUrl(article.url)}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  if (unique.length !== articles.length) {
    debugLogger.info('INGESTION_FILTER', 'Deduplicated within batch', {
      beforeDedup: articles.length,
      afterDedup: unique.length,
      removed: articles.length - unique.length,
    });
  }

  return unique;
}
