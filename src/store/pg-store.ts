import { randomUUID } from 'crypto';
import { Pool, PoolClient } from 'pg';
import { Article, Highlight, IndexEntry, SummaryMode } from '../types';
import { IndexPersistence } from '../search/semantic-index';
import { normalizeUrl } from '../ingestion/filter';
import { withTransaction } from '../utils/db';
import { StoreUnavailable, errorMessage, isPipelineError } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';
import { ArticleQuery, ArticleStore, HighlightQuery, NewArticle } from './article-store';

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS articles (
    id TEXT PRIMARY KEY,
    source TEXT NOT NULL,
    category TEXT NOT NULL,
    title TEXT NOT NULL,
    body_text TEXT NOT NULL,
    author TEXT,
    published_at TIMESTAMPTZ NOT NULL,
    url TEXT NOT NULL,
    normalized_url TEXT NOT NULL,
    embedding DOUBLE PRECISION[],
    embedding_model TEXT,
    extracted_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    UNIQUE (source, normalized_url)
  )`,
  `ALTER TABLE articles ADD COLUMN IF NOT EXISTS embedding_model TEXT`,
  `CREATE INDEX IF NOT EXISTS articles_category_published_idx ON articles (category, published_at)`,
  `CREATE TABLE IF NOT EXISTS highlights (
    id TEXT PRIMARY KEY,
    category TEXT NOT NULL,
    title TEXT NOT NULL,
    summary TEXT NOT NULL,
    frequency INTEGER NOT NULL,
    priority_flag BOOLEAN NOT NULL,
    score DOUBLE PRECISION NOT NULL,
    rank INTEGER NOT NULL,
    source_list TEXT[] NOT NULL,
    representative_article_id TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    urls TEXT[] NOT NULL,
    authors TEXT[] NOT NULL,
    published_dates TIMESTAMPTZ[] NOT NULL,
    matched_keywords TEXT[] NOT NULL,
    summary_mode TEXT NOT NULL,
    superseded_at TIMESTAMPTZ
  )`,
  `CREATE INDEX IF NOT EXISTS highlights_active_idx ON highlights (category, created_at) WHERE superseded_at IS NULL`,
  `CREATE TABLE IF NOT EXISTS highlight_index (
    highlight_id TEXT PRIMARY KEY,
    embedding DOUBLE PRECISION[],
    text_for_retrieval TEXT NOT NULL,
    content_hash TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL
  )`,
];

interface ArticleRow {
  id: string;
  source: string;
  category: string;
  title: string;
  body_text: string;
  author: string | null;
  published_at: Date;
  url: string;
  embedding: number[] | null;
  embedding_model: string | null;
}

interface HighlightRow {
  id: string;
  category: string;
  title: string;
  summary: string;
  frequency: number;
  priority_flag: boolean;
  score: number;
  rank: number;
  source_list: string[];
  representative_article_id: string;
  created_at: Date;
  urls: string[];
  authors: string[];
  published_dates: Date[];
  matched_keywords: string[];
  summary_mode: string;
}

interface IndexRow {
  highlight_id: string;
  embedding: number[] | null;
  text_for_retrieval: string;
  content_hash: string;
  created_at: Date;
}

const HIGHLIGHT_COLUMNS = `id, category, title, summary, frequency, priority_flag, score, rank,
  source_list, representative_article_id, created_at, urls, authors, published_dates,
  matched_keywords, summary_mode`;

function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    source: row.source,
    category: row.category,
    title: row.title,
    bodyText: row.body_text,
    author: row.author,
    publishedAt: row.published_at,
    url: row.url,
    embedding: row.embedding ?? undefined,
    embeddingModel: row.embedding_model ?? undefined,
  };
}

function toSummaryMode(value: string): SummaryMode {
  return value === 'generated' ? 'generated' : 'extractive';
}

function toHighlight(row: HighlightRow): Highlight {
  return {
    id: row.id,
    category: row.category,
    title: row.title,
    summary: row.summary,
    frequency: row.frequency,
    priorityFlag: row.priority_flag,
    score: row.score,
    rank: row.rank,
    sourceList: row.source_list,
    representativeArticleId: row.representative_article_id,
    createdAt: row.created_at,
    urls: row.urls,
    authors: row.authors,
    publishedDates: row.published_dates,
    matchedKeywords: row.matched_keywords,
    summaryMode: toSummaryMode(row.summary_mode),
  };
}

function highlightValues(h: Highlight): unknown[] {
  return [
    h.id, h.category, h.title, h.summary, h.frequency, h.priorityFlag, h.score, h.rank,
    h.sourceList, h.representativeArticleId, h.createdAt, h.urls, h.authors, h.publishedDates,
    h.matchedKeywords, h.summaryMode,
  ];
}

const INSERT_HIGHLIGHT = `
  INSERT INTO highlights (${HIGHLIGHT_COLUMNS})
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
  ON CONFLICT (id) DO UPDATE SET
    title = EXCLUDED.title,
    summary = EXCLUDED.summary,
    frequency = EXCLUDED.frequency,
    priority_flag = EXCLUDED.priority_flag,
    score = EXCLUDED.score,
    rank = EXCLUDED.rank,
    source_list = EXCLUDED.source_list,
    urls = EXCLUDED.urls,
    authors = EXCLUDED.authors,
    published_dates = EXCLUDED.published_dates,
    matched_keywords = EXCLUDED.matched_keywords,
    summary_mode = EXCLUDED.summary_mode`;

/**
 * Wrap driver failures as StoreUnavailable so the run registry can tell a
 * storage outage from a bug.
 */
async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isPipelineError(error)) throw error;
    debugLogger.warn('STORE', `${operation} failed`, { error: errorMessage(error) });
    throw new StoreUnavailable(`Article store ${operation} failed: ${errorMessage(error)}`, { cause: error });
  }
}

async function supersedeWith(client: Pool | PoolClient, category: string): Promise<string[]> {
  const result = await client.query<{ id: string }>(
    `UPDATE highlights SET superseded_at = now()
     WHERE category = $1 AND superseded_at IS NULL
     RETURNING id`,
    [category]
  );
  return result.rows.map(row => row.id);
}

/**
 * Postgres-backed article and highlight store.
 */
export class PgArticleStore implements ArticleStore {
  constructor(private readonly pool: Pool) {}

  async migrate(): Promise<void> {
    await guarded('migrate', async () => {
      for (const statement of SCHEMA) {
        await this.pool.query(statement);
      }
    });
    console.log('🗄️  Database schema ready');
  }

  getArticles(query: ArticleQuery = {}): Promise<Article[]> {
    return guarded('getArticles', async () => {
      const result = await this.pool.query<ArticleRow>(
        `SELECT id, source, category, title, body_text, author, published_at, url, embedding, embedding_model
         FROM articles
         WHERE ($1::text IS NULL OR category = $1)
           AND ($2::timestamptz IS NULL OR published_at >= $2)
         ORDER BY published_at ASC, id COLLATE "C" ASC`,
        [query.category ?? null, query.since ?? null]
      );
      return result.rows.map(toArticle);
    });
  }

  upsertArticle(article: NewArticle): Promise<string> {
    return guarded('upsertArticle', async () => {
      // The no-op update makes RETURNING yield the existing row's id
      const result = await this.pool.query<{ id: string }>(
        `INSERT INTO articles (
           id, source, category, title, body_text, author, published_at, url, normalized_url, embedding, embedding_model
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         ON CONFLICT (source, normalized_url) DO UPDATE SET source = EXCLUDED.source
         RETURNING id`,
        [
          randomUUID(),
          article.source,
          article.category,
          article.title,
          article.bodyText,
          article.author,
          article.publishedAt,
          article.url,
          normalizeUrl(article.url),
          article.embedding ?? null,
          article.embedding ? article.embeddingModel ?? null : null,
        ]
      );
      const row = result.rows[0];
      if (!row) {
        throw new StoreUnavailable('Article upsert returned no id');
      }
      return row.id;
    });
  }

  saveArticleEmbedding(articleId: string, embedding: number[], model: string): Promise<void> {
    return guarded('saveArticleEmbedding', async () => {
      await this.pool.query(
        'UPDATE articles SET embedding = $2, embedding_model = $3 WHERE id = $1',
        [articleId, embedding, model]
      );
    });
  }

  countArticles(category?: string): Promise<number> {
    return guarded('countArticles', async () => {
      const result = await this.pool.query<{ count: number }>(
        'SELECT COUNT(*)::int AS count FROM articles WHERE ($1::text IS NULL OR category = $1)',
        [category ?? null]
      );
      return result.rows[0]?.count ?? 0;
    });
  }

  upsertHighlight(highlight: Highlight): Promise<string> {
    return guarded('upsertHighlight', async () => {
      await this.pool.query(INSERT_HIGHLIGHT, highlightValues(highlight));
      return highlight.id;
    });
  }

  listHighlights(query: HighlightQuery): Promise<Highlight[]> {
    if (query.limit <= 0) return Promise.resolve([]);
    return guarded('listHighlights', async () => {
      const result = await this.pool.query<HighlightRow>(
        `SELECT ${HIGHLIGHT_COLUMNS} FROM highlights
         WHERE superseded_at IS NULL AND ($1::text IS NULL OR category = $1)
         ORDER BY created_at DESC, category COLLATE "C" ASC, rank ASC
         LIMIT $2`,
        [query.category ?? null, query.limit]
      );
      return result.rows.map(toHighlight);
    });
  }

  getHighlightsByIds(ids: string[]): Promise<Highlight[]> {
    if (ids.length === 0) return Promise.resolve([]);
    return guarded('getHighlightsByIds', async () => {
      const result = await this.pool.query<HighlightRow>(
        `SELECT ${HIGHLIGHT_COLUMNS} FROM highlights
         WHERE superseded_at IS NULL AND id = ANY($1::text[])`,
        [ids]
      );
      return result.rows.map(toHighlight);
    });
  }

  countHighlights(category?: string): Promise<number> {
    return guarded('countHighlights', async () => {
      const result = await this.pool.query<{ count: number }>(
        `SELECT COUNT(*)::int AS count FROM highlights
         WHERE superseded_at IS NULL AND ($1::text IS NULL OR category = $1)`,
        [category ?? null]
      );
      return result.rows[0]?.count ?? 0;
    });
  }

  supersedeHighlights(category: string): Promise<string[]> {
    return guarded('supersedeHighlights', () => supersedeWith(this.pool, category));
  }

  replaceCategoryHighlights(category: string, highlights: Highlight[]): Promise<{ superseded: string[] }> {
    return guarded('replaceCategoryHighlights', () =>
      withTransaction(this.pool, async client => {
        const superseded = await supersedeWith(client, category);
        for (const highlight of highlights) {
          await client.query(INSERT_HIGHLIGHT, highlightValues(highlight));
        }
        debugLogger.info('STORE', 'Replaced category highlights', {
          category,
          inserted: highlights.length,
          superseded: superseded.length
        });
        return { superseded };
      })
    );
  }

  ping(): Promise<void> {
    return guarded('ping', async () => {
      await this.pool.query('SELECT 1');
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Index entries persisted beside the highlights they describe. `loadAll`
 * returns every row, orphans included; reconciliation on startup drops them.
 */
export class PgIndexPersistence implements IndexPersistence {
  constructor(private readonly pool: Pool) {}

  loadAll(): Promise<IndexEntry[]> {
    return guarded('loadIndex', async () => {
      const result = await this.pool.query<IndexRow>(
        `SELECT highlight_id, embedding, text_for_retrieval, content_hash, created_at
         FROM highlight_index`
      );
      return result.rows.map(row => ({
        highlightId: row.highlight_id,
        embedding: row.embedding,
        textForRetrieval: row.text_for_retrieval,
        contentHash: row.content_hash,
        createdAt: row.created_at,
      }));
    });
  }

  save(entry: IndexEntry): Promise<void> {
    return guarded('saveIndexEntry', async () => {
      await this.pool.query(
        `INSERT INTO highlight_index (highlight_id, embedding, text_for_retrieval, content_hash, created_at)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (highlight_id) DO UPDATE SET
           embedding = EXCLUDED.embedding,
           text_for_retrieval = EXCLUDED.text_for_retrieval,
           content_hash = EXCLUDED.content_hash,
           created_at = EXCLUDED.created_at`,
        [entry.highlightId, entry.embedding ? [...entry.embedding] : null, entry.textForRetrieval, entry.contentHash, entry.createdAt]
      );
    });
  }

  delete(highlightId: string): Promise<void> {
    return guarded('deleteIndexEntry', async () => {
      await this.pool.query('DELETE FROM highlight_index WHERE highlight_id = $1', [highlightId]);
    });
  }
}
