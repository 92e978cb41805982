import { randomUUID } from 'crypto';
import { Article, Highlight } from '../types';
import { normalizeUrl } from '../ingestion/filter';
import {
  ArticleQuery,
  ArticleStore,
  HighlightQuery,
  NewArticle,
  compareArticles,
  compareHighlights,
} from './article-store';

function cloneArticle(article: Article): Article {
  return {
    ...article,
    publishedAt: new Date(article.publishedAt),
    embedding: article.embedding ? [...article.embedding] : undefined,
  };
}

function cloneHighlight(highlight: Highlight): Highlight {
  return {
    ...highlight,
    sourceList: [...highlight.sourceList],
    urls: [...highlight.urls],
    authors: [...highlight.authors],
    matchedKeywords: [...highlight.matchedKeywords],
    publishedDates: highlight.publishedDates.map(d => new Date(d)),
    createdAt: new Date(highlight.createdAt),
  };
}

interface StoredHighlight {
  highlight: Highlight;
  supersededAt: Date | null;
}

/**
 * Process-local store. Used when no DATABASE_URL is configured and in tests.
 * Mutations run without awaiting, so each operation is atomic.
 */
export class InMemoryArticleStore implements ArticleStore {
  private articles = new Map<string, Article>();
  private articleKeys = new Map<string, string>();
  private highlights = new Map<string, StoredHighlight>();

  async getArticles(query: ArticleQuery = {}): Promise<Article[]> {
    return Array.from(this.articles.values())
      .filter(a => !query.category || a.category === query.category)
      .filter(a => !query.since || a.publishedAt.getTime() >= query.since.getTime())
      .sort(compareArticles)
      .map(cloneArticle);
  }

  async upsertArticle(article: NewArticle): Promise<string> {
    const key = `${article.source}\u0000${normalizeUrl(article.url)}`;
    const existingId = this.articleKeys.get(key);
    if (existingId) {
      return existingId;
    }

    const id = randomUUID();
    this.articles.set(id, cloneArticle({ ...article, id }));
    this.articleKeys.set(key, id);
    return id;
  }

  async saveArticleEmbedding(articleId: string, embedding: number[], model: string): Promise<void> {
    const article = this.articles.get(articleId);
    if (article) {
      this.articles.set(articleId, { ...article, embedding: [...embedding], embeddingModel: model });
    }
  }

  async countArticles(category?: string): Promise<number> {
    return Array.from(this.articles.values()).filter(a => !category || a.category === category).length;
  }

  async upsertHighlight(highlight: Highlight): Promise<string> {
    const existing = this.highlights.get(highlight.id);
    this.highlights.set(highlight.id, {
      highlight: cloneHighlight(highlight),
      supersededAt: existing?.supersededAt ?? null,
    });
    return highlight.id;
  }

  async listHighlights(query: HighlightQuery): Promise<Highlight[]> {
    if (query.limit <= 0) return [];
    return this.active()
      .filter(h => !query.category || h.category === query.category)
      .sort(compareHighlights)
      .slice(0, query.limit)
      .map(cloneHighlight);
  }

  async getHighlightsByIds(ids: string[]): Promise<Highlight[]> {
    const wanted = new Set(ids);
    return this.active()
      .filter(h => wanted.has(h.id))
      .map(cloneHighlight);
  }

  async countHighlights(category?: string): Promise<number> {
    return this.active().filter(h => !category || h.category === category).length;
  }

  async supersedeHighlights(category: string): Promise<string[]> {
    return this.supersede(category);
  }

  async replaceCategoryHighlights(category: string, highlights: Highlight[]): Promise<{ superseded: string[] }> {
    const superseded = this.supersede(category);
    for (const highlight of highlights) {
      this.highlights.set(highlight.id, { highlight: cloneHighlight(highlight), supersededAt: null });
    }
    return { superseded };
  }

  async ping(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }

  private supersede(category: string): string[] {
    const now = new Date();
    const superseded: string[] = [];
    for (const stored of this.highlights.values()) {
      if (stored.highlight.category === category && stored.supersededAt === null) {
        stored.supersededAt = now;
        superseded.push(stored.highlight.id);
      }
    }
    return superseded;
  }

  private active(): Highlight[] {
    return Array.from(this.highlights.values())
      .filter(stored => stored.supersededAt === null)
      .map(stored => stored.highlight);
  }
}
