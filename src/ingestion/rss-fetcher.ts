import Parser from 'rss-parser';
import { RSSSource, RawArticle } from '../types';
import { stripHtml, sleep } from '../utils/html';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';
import { categorizeArticle } from './categorizer';
import { dedupeBatch } from './filter';

export interface FeedItem {
  link?: string;
  title?: string;
  pubDate?: string;
  isoDate?: string;
  content?: string;
  creator?: string;
  contentEncoded?: string;
  description?: string;
}

export interface Feed {
  items: FeedItem[];
}

export type FeedLoader = (url: string) => Promise<Feed>;

export interface FetchOptions {
  loadFeed?: FeedLoader;
  /** Used for sources tagged `category: 'auto'` */
  categoryKeywords?: Record<string, string[]>;
  fallbackCategory?: string;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  minContentLength?: number;
}

const MIN_CONTENT_LENGTH = 40;

const parser = new Parser<Record<string, unknown>, { contentEncoded?: string; description?: string }>({
  timeout: 30000,
  headers: { 'User-Agent': 'news-highlights-service/1.0 (+rss)' },
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['description', 'description'],
    ]
  }
});

export const loadFeedFromUrl: FeedLoader = async (url: string) => {
  const feed = await parser.parseURL(url);
  return { items: feed.items };
};

async function fetchWithRetry(
  url: string,
  loadFeed: FeedLoader,
  maxRetries: number,
  baseDelayMs: number
): Promise<Feed> {
  const stepId = debugLogger.stepStart('RSS', 'Fetching RSS feed with retry logic', { url, maxRetries });
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const feed = await loadFeed(url);
      debugLogger.stepFinish(stepId, { itemCount: feed.items.length, attempts: attempt });
      return feed;
    } catch (error) {
      lastError = error;
      debugLogger.warn('RSS', `Attempt ${attempt}/${maxRetries} failed`, { url, error: errorMessage(error) });

      if (attempt < maxRetries) {
        const delay = Math.pow(2, attempt - 1) * baseDelayMs;
        await sleep(delay);
      }
    }
  }

  debugLogger.stepError(stepId, 'RSS', 'All retry attempts exhausted', lastError);
  throw lastError instanceof Error ? lastError : new Error(errorMessage(lastError));
}

function fieldValue(item: FeedItem, field: string | undefined): string | undefined {
  switch (field) {
    case 'content:encoded':
      return item.contentEncoded;
    case 'description':
      return item.description;
    case 'content':
      return item.content;
    default:
      return undefined;
  }
}

export function extractContent(item: FeedItem, source: RSSSource): string {
  const rawContent = fieldValue(item, source.contentField)
    || fieldValue(item, source.fallbackField)
    || item.content
    || '';
  return stripHtml(rawContent);
}

export function parseDate(dateString: string | undefined, now: Date = new Date()): Date {
  if (!dateString) return now;
  const parsed = new Date(dateString);
  return isNaN(parsed.getTime()) ? now : parsed;
}

function toRawArticles(feed: Feed, source: RSSSource, category: string, options: FetchOptions): RawArticle[] {
  const minLength = options.minContentLength ?? MIN_CONTENT_LENGTH;
  const articles: RawArticle[] = [];

  for (const item of feed.items) {
    if (!item.link || !item.title) continue;

    const title = stripHtml(item.title);
    const content = extractContent(item, source);
    if (content.length < minLength) continue;

    if (source.category === 'auto') {
      const assigned = categorizeArticle(
        title,
        content,
        options.categoryKeywords ?? {},
        options.fallbackCategory ?? category
      );
      if (assigned !== category) continue;
    }

    articles.push({
      url: item.link,
      title,
      content,
      publishedAt: parseDate(item.isoDate || item.pubDate),
      source: source.name,
      author: item.creator?.trim() || null,
      category,
    });
  }

  return articles;
}

/**
 * Fetch every source of one category. A failing source is logged and skipped;
 * when all of them fail the batch is simply empty.
 */
export async function fetchCategoryArticles(
  category: string,
  sources: RSSSource[],
  options: FetchOptions = {}
): Promise<RawArticle[]> {
  const loadFeed = options.loadFeed ?? loadFeedFromUrl;
  const stepId = debugLogger.stepStart('RSS', `Fetching ${category} sources`, {
    sourceCount: sources.length,
    sources: sources.map(s => s.name)
  });

  const results = await Promise.allSettled(
    sources.map(source =>
      fetchWithRetry(source.url, loadFeed, options.maxRetries ?? 3, options.retryBaseDelayMs ?? 1000)
        .then(feed => toRawArticles(feed, source, category, options))
    )
  );

  const articles: RawArticle[] = [];
  const errors: string[] = [];

  results.forEach((result, i) => {
    const source = sources[i];
    if (result.status === 'fulfilled') {
      articles.push(...result.value);
      debugLogger.info('RSS', `Source succeeded: ${source.name}`, { articleCount: result.value.length });
    } else {
      errors.push(`${source.name}: ${errorMessage(result.reason)}`);
    }
  });

  if (errors.length > 0) {
    console.warn(`⚠️  ${errors.length}/${sources.length} ${category} sources failed:`, errors);
  }

  const unique = dedupeBatch(articles);
  debugLogger.stepFinish(stepId, {
    totalArticles: unique.length,
    successfulSources: sources.length - errors.length,
    failedSources: errors.length
  });

  return unique;
}
