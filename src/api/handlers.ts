import { Article, ChatAnswer, Highlight, RunRecord } from '../types';
import { ArticleStore } from '../store/article-store';
import { RunRegistry, OverallRunState } from '../jobs/run-registry';
import { MetricsTracker, RunStats } from '../jobs/metrics-tracker';
import { SchedulerStatus } from '../jobs/scheduler';
import { ChatService } from '../agents/chat';
import {
  ArticlesQuerySchema,
  ChatRequestSchema,
  ExtractRequestSchema,
  HighlightsQuerySchema,
} from '../schemas';
import { InvalidArgument } from '../utils/errors';

export interface ApiServices {
  registry: RunRegistry;
  store: ArticleStore;
  chat: ChatService;
  categories: string[];
  metrics: MetricsTracker;
  scheduler?: { getStatus(): SchedulerStatus };
}

export interface ApiResponse<T> {
  status: number;
  body: T;
}

export type ArticleView = Omit<Article, 'embedding' | 'embeddingModel'>;

export interface StatusBody {
  status: 'operational';
  run_state: OverallRunState;
  counts: {
    articles: number;
    highlights: number;
    articles_by_category: Record<string, number>;
    highlights_by_category: Record<string, number>;
  };
  categories: string[];
  runs: RunRecord[];
  scheduler: SchedulerStatus | null;
  metrics: RunStats;
}

const STATUS_RUN_LIMIT = 20;

function toArticleView({ embedding: _embedding, embeddingModel: _model, ...article }: Article): ArticleView {
  return article;
}

/**
 * Transport-free handlers behind the Express routes. Input is the raw body or
 * query; invalid input throws and is mapped by the error handler.
 */
export function createApiHandlers(services: ApiServices) {
  const { registry, store, chat, categories, metrics, scheduler } = services;

  function checkCategory(category: string | undefined): void {
    if (category !== undefined && !categories.includes(category)) {
      throw new InvalidArgument(`Unknown category: ${category}`);
    }
  }

  return {
    async extract(body: unknown): Promise<ApiResponse<{ status: 'accepted'; runs: RunRecord[] }>> {
      const request = ExtractRequestSchema.parse(body ?? {});
      const requested = request.categories ?? categories;
      const unknownCategories = requested.filter(category => !categories.includes(category));
      if (unknownCategories.length > 0) {
        throw new InvalidArgument(`Unknown categories: ${unknownCategories.join(', ')}`);
      }

      const runs = Array.from(new Set(requested)).map(category =>
        registry.submit(category, { forceRefresh: request.force_refresh })
      );
      return { status: 202, body: { status: 'accepted', runs } };
    },

    async highlights(query: unknown): Promise<ApiResponse<{ highlights: Highlight[] }>> {
      const { category, limit } = HighlightsQuerySchema.parse(query);
      checkCategory(category);
      const highlights = await store.listHighlights({ category, limit });
      return { status: 200, body: { highlights } };
    },

    async articles(query: unknown): Promise<ApiResponse<{ articles: ArticleView[] }>> {
      const { category } = ArticlesQuerySchema.parse(query);
      checkCategory(category);
      const articles = await store.getArticles({ category });
      return { status: 200, body: { articles: articles.map(toArticleView) } };
    },

    async chat(body: unknown): Promise<ApiResponse<ChatAnswer>> {
      const { message } = ChatRequestSchema.parse(body ?? {});
      const answer = await chat.ask(message);
      return { status: 200, body: answer };
    },

    async status(): Promise<ApiResponse<StatusBody>> {
      const articlesByCategory: Record<string, number> = {};
      const highlightsByCategory: Record<string, number> = {};
      for (const category of categories) {
        articlesByCategory[category] = await store.countArticles(category);
        highlightsByCategory[category] = await store.countHighlights(category);
      }

      return {
        status: 200,
        body: {
          status: 'operational',
          run_state: registry.state(),
          counts: {
            articles: await store.countArticles(),
            highlights: await store.countHighlights(),
            articles_by_category: articlesByCategory,
            highlights_by_category: highlightsByCategory,
          },
          categories,
          runs: registry.list().slice(0, STATUS_RUN_LIMIT),
          scheduler: scheduler?.getStatus() ?? null,
          metrics: metrics.getStats(),
        },
      };
    },
  };
}

export type ApiHandlers = ReturnType<typeof createApiHandlers>;
