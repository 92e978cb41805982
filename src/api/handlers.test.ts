import { beforeEach, describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import { InMemoryArticleStore } from '../store/memory-store';
import { SemanticIndex } from '../search/semantic-index';
import { ChatService } from '../agents/chat';
import { unavailableSummarizer } from '../agents/summarizer';
import { RunRegistry } from '../jobs/run-registry';
import { MetricsTracker } from '../jobs/metrics-tracker';
import { InvalidArgument } from '../utils/errors';
import { createApiHandlers } from './handlers';
import { makeHighlight, minutesAfter, topicProvider } from '../testing/fixtures';

const CATEGORIES = ['sports', 'finance'];

function setup() {
  const store = new InMemoryArticleStore();
  const index = new SemanticIndex(topicProvider());
  const metrics = new MetricsTracker();
  const registry = new RunRegistry(async () => undefined, { metrics });
  const chat = new ChatService({ index, store, summarizer: unavailableSummarizer, categories: CATEGORIES, topK: 3 });
  const handlers = createApiHandlers({ registry, store, chat, categories: CATEGORIES, metrics });
  return { store, registry, handlers };
}

describe('API handlers', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  describe('extract', () => {
    it('accepts a run per distinct category', async () => {
      const { handlers } = setup();

      const response = await handlers.extract({ categories: ['sports', 'sports'], force_refresh: true });

      expect(response.status).toBe(202);
      expect(response.body.status).toBe('accepted');
      expect(response.body.runs.map(r => [r.category, r.state, r.forceRefresh])).toEqual([
        ['sports', 'queued', true],
      ]);
    });

    it('runs every category when none are named', async () => {
      const { handlers } = setup();
      const response = await handlers.extract(undefined);
      expect(response.body.runs.map(r => r.category)).toEqual(['sports', 'finance']);
    });

    it('rejects unknown categories', async () => {
      const { handlers } = setup();
      await expect(handlers.extract({ categories: ['sports', 'weather'] })).rejects.toThrow(
        new InvalidArgument('Unknown categories: weather')
      );
    });

    it('rejects an empty category list', async () => {
      const { handlers } = setup();
      await expect(handlers.extract({ categories: [] })).rejects.toBeInstanceOf(ZodError);
    });
  });

  describe('highlights', () => {
    it('applies the limit and category filter', async () => {
      const { store, handlers } = setup();
      await store.replaceCategoryHighlights('sports', [
        makeHighlight({ id: 's1', rank: 1 }),
        makeHighlight({ id: 's2', rank: 2 }),
      ]);
      await store.replaceCategoryHighlights('finance', [
        makeHighlight({ id: 'f1', category: 'finance', createdAt: minutesAfter(5) }),
      ]);

      const limited = await handlers.highlights({ limit: '2' });
      const sports = await handlers.highlights({ category: 'sports' });

      expect(limited.body.highlights.map(h => h.id)).toEqual(['f1', 's1']);
      expect(sports.body.highlights.map(h => h.id)).toEqual(['s1', 's2']);
    });

    it('rejects an out-of-range limit and unknown categories', async () => {
      const { handlers } = setup();
      await expect(handlers.highlights({ limit: '0' })).rejects.toBeInstanceOf(ZodError);
      await expect(handlers.highlights({ category: 'weather' })).rejects.toBeInstanceOf(InvalidArgument);
    });
  });

  it('lists articles without their embeddings', async () => {
    const { store, handlers } = setup();
    const id = await store.upsertArticle({
      source: 'Wire A',
      category: 'sports',
      title: 'Rugby final',
      bodyText: 'Body.',
      author: null,
      publishedAt: minutesAfter(0),
      url: 'https://news.example.com/rugby',
    });
    await store.saveArticleEmbedding(id, [1, 0, 0], 'stub');

    const response = await handlers.articles({ category: 'sports' });

    expect(response.body.articles).toHaveLength(1);
    expect(response.body.articles[0].id).toBe(id);
    expect('embedding' in response.body.articles[0]).toBe(false);
  });

  it('answers chat messages and rejects missing ones', async () => {
    const { handlers } = setup();

    const response = await handlers.chat({ message: 'Any rugby news?' });
    expect(response.status).toBe(200);
    expect(response.body.mode).toBe('empty');

    await expect(handlers.chat({})).rejects.toBeInstanceOf(InvalidArgument);
  });

  it('reports counts, runs and metrics', async () => {
    const { store, registry, handlers } = setup();
    await store.replaceCategoryHighlights('sports', [makeHighlight({ id: 's1' })]);
    await handlers.extract({ categories: ['finance'] });
    await registry.whenIdle();

    const { status, body } = await handlers.status();

    expect(status).toBe(200);
    expect(body.status).toBe('operational');
    expect(body.run_state).toBe('idle');
    expect(body.counts).toEqual({
      articles: 0,
      highlights: 1,
      articles_by_category: { sports: 0, finance: 0 },
      highlights_by_category: { sports: 1, finance: 0 },
    });
    expect(body.categories).toEqual(CATEGORIES);
    expect(body.runs.map(r => [r.category, r.state])).toEqual([['finance', 'succeeded']]);
    expect(body.scheduler).toBeNull();
    expect(body.metrics.totalRuns).toBe(1);
    expect(body.metrics.successfulRuns).toBe(1);
  });
});
