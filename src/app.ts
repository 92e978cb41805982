import express, { Express } from 'express';
import { AppConfig } from './config';
import { ArticleStore } from './store/article-store';
import { InMemoryArticleStore } from './store/memory-store';
import { PgArticleStore, PgIndexPersistence } from './store/pg-store';
import { SemanticIndex } from './search/semantic-index';
import { restoreSemanticIndex } from './search/reindex';
import { EmbeddingProvider, createEmbeddingProvider } from './agents/embedding-provider';
import { Summarizer, createSummarizer } from './agents/summarizer';
import { ChatService } from './agents/chat';
import { SourceCatalog, loadSourceCatalog } from './ingestion/sources';
import { RunRegistry } from './jobs/run-registry';
import { createExtractionExecutor } from './jobs/extraction-job';
import { ExtractionScheduler } from './jobs/scheduler';
import { MetricsTracker, metricsTracker } from './jobs/metrics-tracker';
import { createApiRouter } from './api/routes';
import { createHealthCheck } from './api/health';
import { createCorsMiddleware, createErrorHandler, requestLogger, securityHeaders } from './api/middleware';
import { createPool } from './utils/db';
import { debugLogger } from './utils/debug-logger';

export interface Services {
  config: AppConfig;
  store: ArticleStore;
  index: SemanticIndex;
  provider: EmbeddingProvider;
  summarizer: Summarizer;
  catalog: SourceCatalog;
  registry: RunRegistry;
  scheduler: ExtractionScheduler;
  chat: ChatService;
  metrics: MetricsTracker;
}

export interface ServiceOverrides {
  store?: ArticleStore;
  provider?: EmbeddingProvider;
  summarizer?: Summarizer;
  catalog?: SourceCatalog;
}

/**
 * Wire the store, index, pipeline and chat from configuration. With a
 * DATABASE_URL the schema is migrated and the index restored from Postgres and
 * reconciled with the active highlights.
 */
export async function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Promise<Services> {
  debugLogger.setEnabled(config.debug);

  const catalog = overrides.catalog ?? loadSourceCatalog(config.sourcesFile);
  const provider = overrides.provider ?? createEmbeddingProvider(config);
  const summarizer = overrides.summarizer ?? createSummarizer(config);

  let store: ArticleStore;
  let index: SemanticIndex;
  if (overrides.store) {
    store = overrides.store;
    index = new SemanticIndex(provider);
  } else if (config.databaseUrl) {
    const pool = createPool(config.databaseUrl);
    const pgStore = new PgArticleStore(pool);
    await pgStore.migrate();
    store = pgStore;
    index = new SemanticIndex(provider, new PgIndexPersistence(pool));
    await restoreSemanticIndex(store, index, { concurrency: config.embeddingConcurrency });
  } else {
    console.log('💾 No DATABASE_URL set, using the in-memory store');
    store = new InMemoryArticleStore();
    index = new SemanticIndex(provider);
  }

  const registry = new RunRegistry(
    createExtractionExecutor({ store, index, provider, summarizer, catalog, config }),
    { metrics: metricsTracker }
  );
  const scheduler = new ExtractionScheduler(registry, catalog.categories, config.extractionCron);
  const chat = new ChatService({
    index,
    store,
    summarizer,
    categories: catalog.categories,
    topK: config.chatTopK,
  });

  debugLogger.info('CONFIG', 'Services ready', {
    categories: catalog.categories,
    embedding: provider.name,
    generation: summarizer.available,
    persistence: config.databaseUrl ? 'postgres' : 'memory',
  });

  return { config, store, index, provider, summarizer, catalog, registry, scheduler, chat, metrics: metricsTracker };
}

export function createApp(services: Services): Express {
  const { config } = services;
  const app = express();

  // Trust only the first proxy in front of the service
  if (config.nodeEnv === 'production') {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json({ limit: '32kb' }));
  app.use(createCorsMiddleware({ frontendUrl: config.frontendUrl, production: config.nodeEnv === 'production' }));
  app.use(requestLogger);

  app.get('/health', createHealthCheck(services.store, services.index));
  app.use('/api', createApiRouter({
    registry: services.registry,
    store: services.store,
    chat: services.chat,
    categories: services.catalog.categories,
    metrics: services.metrics,
    scheduler: services.scheduler,
  }, { apiKey: config.apiKey }));

  app.use(createErrorHandler({ exposeMessages: config.nodeEnv === 'development' }));
  return app;
}
