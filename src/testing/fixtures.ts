import { Article, Cluster, Highlight } from '../types';
import { EmbeddingProvider } from '../agents/embedding-provider';
import { Summarizer } from '../agents/summarizer';
import { EmbeddingUnavailable, GenerationUnavailable } from '../utils/errors';
import { pickRepresentative } from '../highlights/clustering';

export const BASE_TIME = new Date('2026-03-01T12:00:00.000Z');

export function minutesAfter(minutes: number, base: Date = BASE_TIME): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

export function makeArticle(overrides: Partial<Article> & { id: string }): Article {
  return {
    source: 'Test Wire',
    category: 'sports',
    title: `Article ${overrides.id}`,
    bodyText: 'A body long enough to count as a sentence for summaries.',
    author: null,
    publishedAt: BASE_TIME,
    url: `https://news.example.com/${overrides.id}`,
    ...overrides,
  };
}

export function makeCluster(members: Article[]): Cluster {
  return {
    category: members[0]?.category ?? 'sports',
    members,
    memberArticleIds: new Set(members.map(m => m.id)),
    representativeArticleId: pickRepresentative(members).id,
  };
}

export function makeHighlight(overrides: Partial<Highlight> & { id: string }): Highlight {
  return {
    category: 'sports',
    title: `Highlight ${overrides.id}`,
    summary: 'Summary text.',
    frequency: 1,
    priorityFlag: false,
    score: 1,
    rank: 1,
    sourceList: ['Test Wire'],
    representativeArticleId: `article-${overrides.id}`,
    createdAt: BASE_TIME,
    urls: [`https://news.example.com/${overrides.id}`],
    authors: [],
    publishedDates: [BASE_TIME],
    matchedKeywords: [],
    summaryMode: 'extractive',
    ...overrides,
  };
}

/**
 * Provider whose vectors come from a lookup function. Returning undefined
 * makes the call fail with EmbeddingUnavailable. Every text it sees is kept in
 * `calls`.
 */
export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly vectorFor: (text: string) => number[] | undefined,
    readonly dimensions = 3,
    readonly name = 'stub'
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const vector = this.vectorFor(text);
    if (!vector) {
      throw new EmbeddingUnavailable(`No stub vector for "${text}"`);
    }
    return vector;
  }
}

/**
 * Three-topic provider: rugby, cricket and markets each own one axis.
 */
export function topicProvider(name = 'stub'): StubEmbeddingProvider {
  return new StubEmbeddingProvider(text => {
    const lower = text.toLowerCase();
    return [
      lower.includes('rugby') ? 1 : 0,
      lower.includes('cricket') ? 1 : 0,
      lower.includes('market') ? 1 : 0,
    ];
  }, 3, name);
}

export function failingProvider(): StubEmbeddingProvider {
  return new StubEmbeddingProvider(() => undefined);
}

export class StubSummarizer implements Summarizer {
  readonly summarizeCalls: string[] = [];
  readonly answerCalls: Array<{ question: string; snippets: string[] }> = [];

  constructor(
    private readonly replies: { summary?: string; answer?: string } = {},
    readonly available = true
  ) {}

  async summarize(text: string): Promise<string> {
    this.summarizeCalls.push(text);
    if (this.replies.summary === undefined) {
      throw new GenerationUnavailable('stub summarizer has no summary');
    }
    return this.replies.summary;
  }

  async answer(question: string, snippets: string[]): Promise<string> {
    this.answerCalls.push({ question, snippets });
    if (this.replies.answer === undefined) {
      throw new GenerationUnavailable('stub summarizer has no answer');
    }
    return this.replies.answer;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve: value => resolve(value) };
}
