import { Article, Highlight } from '../types';

export type NewArticle = Omit<Article, 'id'>;

export interface ArticleQuery {
  category?: string;
  since?: Date;
}

export interface HighlightQuery {
  category?: string;
  limit: number;
}

/**
 * Persistence boundary for articles and highlights. Every method rejects with
 * StoreUnavailable when the backing store cannot be reached.
 */
export interface ArticleStore {
  /** Articles ordered by publishedAt ascending, then id */
  getArticles(query?: ArticleQuery): Promise<Article[]>;
  /** Insert, or return the id of the existing article with the same (source, url) */
  upsertArticle(article: NewArticle): Promise<string>;
  /** Cache an article's vector together with the provider that computed it */
  saveArticleEmbedding(articleId: string, embedding: number[], model: string): Promise<void>;
  countArticles(category?: string): Promise<number>;

  upsertHighlight(highlight: Highlight): Promise<string>;
  /** Active highlights, best rank first; across categories newest run first */
  listHighlights(query: HighlightQuery): Promise<Highlight[]>;
  getHighlightsByIds(ids: string[]): Promise<Highlight[]>;
  countHighlights(category?: string): Promise<number>;
  /** Archive the category's active highlights; returns their ids */
  supersedeHighlights(category: string): Promise<string[]>;
  /** Supersede and insert in one atomic step */
  replaceCategoryHighlights(category: string, highlights: Highlight[]): Promise<{ superseded: string[] }>;

  ping(): Promise<void>;
  close(): Promise<void>;
}

export function compareArticles(a: Article, b: Article): number {
  const byTime = a.publishedAt.getTime() - b.publishedAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function compareHighlights(a: Highlight, b: Highlight): number {
  const byCreated = b.createdAt.getTime() - a.createdAt.getTime();
  if (byCreated !== 0) return byCreated;
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  return a.rank - b.rank;
}
