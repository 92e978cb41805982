import { beforeEach, describe, it, expect, vi } from 'vitest';
import { Highlight, RawArticle } from '../types';
import { InMemoryArticleStore } from '../store/memory-store';
import { SemanticIndex } from '../search/semantic-index';
import { EmbeddingProvider } from '../agents/embedding-provider';
import { Summarizer, unavailableSummarizer } from '../agents/summarizer';
import { buildSourceCatalog } from '../ingestion/sources';
import { StoreUnavailable } from '../utils/errors';
import { ArticleStore } from '../store/article-store';
import { ArticleFetcher, PipelineConfig, createExtractionExecutor } from './extraction-job';
import { RunRegistry } from './run-registry';
import {
  BASE_TIME,
  StubEmbeddingProvider,
  StubSummarizer,
  failingProvider,
  minutesAfter,
  topicProvider,
} from '../testing/fixtures';

const CONFIG: PipelineConfig = {
  similarityThreshold: 0.85,
  categoryLimit: 20,
  frequencyWeight: 1,
  priorityWeight: 2,
  priorityKeywords: ['breaking'],
  lookbackHours: 48,
  summaryMaxLength: 300,
  embeddingConcurrency: 2,
  useGeneration: false,
};

const CATALOG = buildSourceCatalog({
  categories: {
    sports: [{ name: 'Wire A', url: 'https://feeds.example.com/sport.xml', contentField: 'description' }],
  },
  autoSources: [],
  fallbackCategory: 'sports',
  categoryKeywords: {},
});

const BATCH: RawArticle[] = [
  {
    url: 'https://news.example.com/rugby-1',
    title: 'Rugby final goes to extra time',
    content: 'The rugby final needed extra time to settle a tense contest.',
    publishedAt: minutesAfter(-120),
    source: 'Wire A',
    author: null,
    category: 'sports',
  },
  {
    url: 'https://other.example.com/rugby-2',
    title: 'Extra time decides rugby final',
    content: 'A rugby final decided in extra time thrilled the home crowd.',
    publishedAt: minutesAfter(-90),
    source: 'Wire B',
    author: 'Jo Park',
    category: 'sports',
  },
  {
    url: 'https://news.example.com/cricket',
    title: 'Cricket side names new captain',
    content: 'The cricket board confirmed the new captain on Tuesday morning.',
    publishedAt: minutesAfter(-60),
    source: 'Wire A',
    author: null,
    category: 'sports',
  },
  {
    url: 'https://news.example.com/archive',
    title: 'Rugby archive piece',
    content: 'An older rugby story that falls outside the lookback window.',
    publishedAt: minutesAfter(-72 * 60),
    source: 'Wire A',
    author: null,
    category: 'sports',
  },
];

class FlakyStore extends InMemoryArticleStore {
  failReplace = false;

  async replaceCategoryHighlights(category: string, highlights: Highlight[]): Promise<{ superseded: string[] }> {
    if (this.failReplace) {
      throw new StoreUnavailable('database offline');
    }
    return super.replaceCategoryHighlights(category, highlights);
  }
}

interface Harness {
  store: ArticleStore;
  index: SemanticIndex;
  registry: RunRegistry;
  fetchArticles: ArticleFetcher;
}

function harness(options: {
  store?: ArticleStore;
  provider?: EmbeddingProvider;
  summarizer?: Summarizer;
  config?: Partial<PipelineConfig>;
  batch?: RawArticle[];
} = {}): Harness {
  const store = options.store ?? new InMemoryArticleStore();
  const provider = options.provider ?? topicProvider();
  const index = new SemanticIndex(provider);
  const fetchArticles: ArticleFetcher = vi.fn(async () => options.batch ?? BATCH);
  const executor = createExtractionExecutor({
    store,
    index,
    provider,
    summarizer: options.summarizer ?? unavailableSummarizer,
    catalog: CATALOG,
    config: { ...CONFIG, ...options.config },
    fetchArticles,
    now: () => BASE_TIME,
  });
  return { store, index, registry: new RunRegistry(executor), fetchArticles };
}

async function run(registry: RunRegistry, forceRefresh = false) {
  const submitted = registry.submit('sports', { forceRefresh });
  return registry.wait(submitted.id);
}

function articleEmbeddingCalls(provider: StubEmbeddingProvider): number {
  // retrieval texts join title and summary with a newline; article texts do not
  return provider.calls.filter(text => !text.includes('\n')).length;
}

describe('extraction pipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('turns a fetched batch into ranked, indexed highlights', async () => {
    const { store, index, registry, fetchArticles } = harness();

    const record = await run(registry);

    expect(record?.state).toBe('succeeded');
    expect(record?.degraded).toEqual([]);
    expect(record?.counts).toEqual({ fetched: 4, articles: 3, clusters: 2, highlights: 2, superseded: 0, indexed: 2 });
    expect(fetchArticles).toHaveBeenCalledWith('sports', CATALOG.sourcesFor('sports'), {
      categoryKeywords: {},
      fallbackCategory: 'sports',
    });

    const highlights = await store.listHighlights({ category: 'sports', limit: 20 });
    expect(highlights.map(h => [h.rank, h.title, h.frequency])).toEqual([
      [1, 'Rugby final goes to extra time', 2],
      [2, 'Cricket side names new captain', 1],
    ]);
    expect(highlights[0].sourceList).toEqual(['Wire A', 'Wire B']);
    expect(highlights[0].summary).toBe(
      'The rugby final needed extra time to settle a tense contest. ' +
      'A rugby final decided in extra time thrilled the home crowd.'
    );
    expect(index.ids().sort()).toEqual(highlights.map(h => h.id).sort());

    const clustered = await store.getArticles({ since: minutesAfter(-48 * 60) });
    expect(clustered.every(a => a.embedding?.length === 3)).toBe(true);
    expect(await store.countArticles()).toBe(4);
  });

  it('counts every outlet that carried the same headline', async () => {
    const syndicated = (source: string, url: string, minutes: number): RawArticle => ({
      url,
      title: 'Rugby stadium reopens',
      content: 'The rugby stadium reopened after a year of repairs.',
      publishedAt: minutesAfter(minutes),
      source,
      author: null,
      category: 'sports',
    });
    const { store, registry } = harness({
      batch: [
        syndicated('Wire A', 'https://a.example.com/stadium', -30),
        syndicated('Wire B', 'https://b.example.com/stadium', -20),
      ],
    });

    await run(registry);

    const highlights = await store.listHighlights({ category: 'sports', limit: 20 });
    expect(highlights.map(h => [h.frequency, h.sourceList])).toEqual([[2, ['Wire A', 'Wire B']]]);
  });

  it('supersedes the previous highlights and reuses cached embeddings', async () => {
    const provider = topicProvider();
    const { store, index, registry } = harness({ provider });
    await run(registry);
    const first = await store.listHighlights({ limit: 20 });
    expect(articleEmbeddingCalls(provider)).toBe(3);

    const record = await run(registry);

    const second = await store.listHighlights({ limit: 20 });
    expect(record?.counts.superseded).toBe(2);
    expect(second.map(h => h.id)).not.toEqual(first.map(h => h.id));
    expect(index.ids().sort()).toEqual(second.map(h => h.id).sort());
    expect(articleEmbeddingCalls(provider)).toBe(3);
  });

  it('recomputes article embeddings on a forced refresh', async () => {
    const provider = topicProvider();
    const { registry } = harness({ provider });
    await run(registry);

    await run(registry, true);

    expect(articleEmbeddingCalls(provider)).toBe(6);
  });

  it('leaves the previous highlights visible when the store fails mid-run', async () => {
    const store = new FlakyStore();
    const { index, registry } = harness({ store });
    await run(registry);
    const before = (await store.listHighlights({ limit: 20 })).map(h => h.id);

    store.failReplace = true;
    const record = await run(registry);

    expect(record?.state).toBe('failed');
    expect(record?.error).toBe('database offline');
    expect((await store.listHighlights({ limit: 20 })).map(h => h.id)).toEqual(before);
    expect(index.ids().sort()).toEqual([...before].sort());
  });

  it('degrades to singletons and lexical entries without embeddings', async () => {
    const { store, index, registry } = harness({ provider: failingProvider() });

    const record = await run(registry);

    expect(record?.state).toBe('succeeded');
    expect(record?.degraded).toEqual(['embedding_fallback', 'index_fallback']);
    expect(record?.counts.clusters).toBe(3);
    expect(record?.counts.indexed).toBe(3);
    expect(await store.countHighlights('sports')).toBe(3);
    expect(index.ids().every(id => index.get(id)?.embedding === null)).toBe(true);
  });

  it('notes summary fallback only when generation is configured', async () => {
    const { registry } = harness({ summarizer: new StubSummarizer({}), config: { useGeneration: true } });

    const record = await run(registry);

    expect(record?.degraded).toEqual(['summary_fallback']);
  });
});
