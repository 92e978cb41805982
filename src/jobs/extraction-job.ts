/**
 * Extraction pipeline for one category: fetch, cluster, rank, persist, index.
 */

import { Article, RawArticle, RSSSource } from '../types';
import { AppConfig } from '../config';
import { ArticleStore } from '../store/article-store';
import { SemanticIndex } from '../search/semantic-index';
import { EmbeddingProvider } from '../agents/embedding-provider';
import { Summarizer } from '../agents/summarizer';
import { clusterArticles } from '../highlights/clustering';
import { rankClusters } from '../highlights/ranker';
import { FetchOptions, fetchCategoryArticles } from '../ingestion/rss-fetcher';
import { SourceCatalog } from '../ingestion/sources';
import { processConcurrently } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { RunContext, RunExecutor } from './run-registry';

export type PipelineConfig = Pick<
  AppConfig,
  | 'similarityThreshold'
  | 'categoryLimit'
  | 'frequencyWeight'
  | 'priorityWeight'
  | 'priorityKeywords'
  | 'lookbackHours'
  | 'summaryMaxLength'
  | 'embeddingConcurrency'
  | 'useGeneration'
>;

export type ArticleFetcher = (
  category: string,
  sources: RSSSource[],
  options: FetchOptions
) => Promise<RawArticle[]>;

export interface PipelineDeps {
  store: ArticleStore;
  index: SemanticIndex;
  provider: EmbeddingProvider;
  summarizer: Summarizer;
  catalog: SourceCatalog;
  config: PipelineConfig;
  fetchArticles?: ArticleFetcher;
  now?: () => Date;
}

async function storeBatch(store: ArticleStore, category: string, batch: RawArticle[]): Promise<void> {
  for (const raw of batch) {
    await store.upsertArticle({
      source: raw.source,
      category,
      title: raw.title,
      bodyText: raw.content,
      author: raw.author,
      publishedAt: raw.publishedAt,
      url: raw.url,
    });
  }
}

function withoutCachedEmbeddings(articles: Article[]): Article[] {
  return articles.map(({ embedding: _embedding, embeddingModel: _model, ...article }) => article);
}

export async function runCategoryPipeline(run: RunContext, deps: PipelineDeps): Promise<void> {
  const { category } = run;
  const { store, index, provider, summarizer, catalog, config } = deps;
  const now = deps.now ?? (() => new Date());
  const fetchArticles = deps.fetchArticles ?? fetchCategoryArticles;

  // Stage 1: fetch and store
  run.enter('fetching');
  const batch = await fetchArticles(category, catalog.sourcesFor(category), {
    categoryKeywords: catalog.categoryKeywords,
    fallbackCategory: catalog.fallbackCategory,
  });
  await storeBatch(store, category, batch);

  const since = new Date(now().getTime() - config.lookbackHours * 3600_000);
  const stored = await store.getArticles({ category, since });
  run.count({ fetched: batch.length, articles: stored.length });

  // Stage 2: cluster; forced runs recompute every embedding
  run.enter('clustering');
  const articles = run.forceRefresh ? withoutCachedEmbeddings(stored) : stored;
  const { clusters, failedEmbeddings } = await clusterArticles(articles, config.similarityThreshold, provider, {
    concurrency: config.embeddingConcurrency,
    onEmbedding: (articleId, vector) => store.saveArticleEmbedding(articleId, vector, provider.name),
  });
  if (failedEmbeddings.length > 0) {
    run.degrade('embedding_fallback');
  }
  run.count({ clusters: clusters.length });

  // Stage 3: rank and summarize
  run.enter('ranking');
  const highlights = await rankClusters(
    clusters,
    {
      categoryLimit: config.categoryLimit,
      frequencyWeight: config.frequencyWeight,
      priorityWeight: config.priorityWeight,
      priorityKeywords: config.priorityKeywords,
      summaryMaxLength: config.summaryMaxLength,
      now,
    },
    summarizer
  );
  if (config.useGeneration && highlights.some(h => h.summaryMode === 'extractive')) {
    run.degrade('summary_fallback');
  }

  // Stage 4: supersede and write in one step
  run.enter('persisting');
  const { superseded } = await store.replaceCategoryHighlights(category, highlights);
  run.count({ highlights: highlights.length, superseded: superseded.length });

  // Stage 5: bring the semantic index in line with the active highlights
  run.enter('indexing');
  const removals = await processConcurrently(superseded, id => index.remove(id), {
    concurrency: config.embeddingConcurrency,
    label: 'Index Removals'
  });
  const upserts = await processConcurrently(highlights, highlight => index.upsert(highlight), {
    concurrency: config.embeddingConcurrency,
    label: 'Index Upserts'
  });

  const indexed = upserts.successful.filter(({ value }) => value !== 'stale').length;
  const lexicalOnly = upserts.successful.filter(({ value }) => value === 'degraded').length;
  run.count({ indexed });

  if (lexicalOnly > 0 || upserts.failed.length > 0 || removals.failed.length > 0) {
    run.degrade('index_fallback');
    debugLogger.warn('PIPELINE', 'Semantic index partially updated', {
      category,
      lexicalOnly,
      failedUpserts: upserts.failed.length,
      failedRemovals: removals.failed.length
    });
  }
}

export function createExtractionExecutor(deps: PipelineDeps): RunExecutor {
  return run => runCategoryPipeline(run, deps);
}
