import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { RSSSource } from '../types';
import { Feed, extractContent, fetchCategoryArticles, parseDate } from './rss-fetcher';
import { BASE_TIME } from '../testing/fixtures';

const WIRE_A: RSSSource = {
  name: 'Wire A',
  url: 'https://feeds.example.com/a.xml',
  contentField: 'description',
  category: 'sports',
};
const WIRE_B: RSSSource = { ...WIRE_A, name: 'Wire B', url: 'https://feeds.example.com/b.xml' };
const MIXED: RSSSource = { ...WIRE_A, name: 'Mixed', url: 'https://feeds.example.com/mixed.xml', category: 'auto' };

const FEED_A: Feed = {
  items: [
    {
      link: 'https://news.example.com/1',
      title: '<b>Rugby</b> final tonight',
      isoDate: '2026-03-01T10:00:00.000Z',
      description: '<p>The home side &amp; visitors meet in a sold-out final.</p>',
      creator: ' Sam Lee ',
    },
    { link: 'https://news.example.com/2', title: 'Too short', description: 'Brief.' },
    { title: 'No link', description: 'This description is comfortably longer than forty characters.' },
    {
      link: 'https://news.example.com/3',
      title: 'Bad date story',
      pubDate: 'not a date',
      description: 'This description is comfortably longer than forty characters.',
    },
  ],
};

const FEED_MIXED: Feed = {
  items: [
    {
      link: 'https://news.example.com/album',
      title: 'Album launch',
      description: 'The band played a sold-out concert at the arena last night.',
    },
    {
      link: 'https://news.example.com/cricket',
      title: 'Cricket match',
      description: 'The team won the match after a tense final over at the ground.',
    },
  ],
};

const KEYWORDS = { sports: ['cricket', 'match', 'team'], music: ['album', 'concert', 'band'] };

describe('fetchCategoryArticles', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(BASE_TIME);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('converts usable items and skips a source that keeps failing', async () => {
    const loadFeed = vi.fn(async (url: string): Promise<Feed> => {
      if (url === WIRE_B.url) throw new Error('ECONNRESET');
      return FEED_A;
    });

    const articles = await fetchCategoryArticles('sports', [WIRE_A, WIRE_B], {
      loadFeed,
      maxRetries: 2,
      retryBaseDelayMs: 0,
    });

    expect(articles).toEqual([
      {
        url: 'https://news.example.com/1',
        title: 'Rugby final tonight',
        content: 'The home side & visitors meet in a sold-out final.',
        publishedAt: new Date('2026-03-01T10:00:00.000Z'),
        source: 'Wire A',
        author: 'Sam Lee',
        category: 'sports',
      },
      {
        url: 'https://news.example.com/3',
        title: 'Bad date story',
        content: 'This description is comfortably longer than forty characters.',
        publishedAt: BASE_TIME,
        source: 'Wire A',
        author: null,
        category: 'sports',
      },
    ]);
    expect(loadFeed.mock.calls.filter(([url]) => url === WIRE_B.url)).toHaveLength(2);
  });

  it('retries a flaky source until it answers', async () => {
    const loadFeed = vi.fn<(url: string) => Promise<Feed>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(FEED_A);

    const articles = await fetchCategoryArticles('sports', [WIRE_A], { loadFeed, retryBaseDelayMs: 0 });

    expect(articles.map(a => a.url)).toEqual(['https://news.example.com/1', 'https://news.example.com/3']);
    expect(loadFeed).toHaveBeenCalledTimes(2);
  });

  it('returns an empty batch when every source fails', async () => {
    const loadFeed = vi.fn(async (): Promise<Feed> => {
      throw new Error('offline');
    });

    const articles = await fetchCategoryArticles('sports', [WIRE_A, WIRE_B], {
      loadFeed,
      maxRetries: 1,
      retryBaseDelayMs: 0,
    });

    expect(articles).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('keeps a syndicated story once per outlet', async () => {
    const story = (link: string): Feed => ({
      items: [{ link, title: 'Bridge reopens', description: 'The harbour bridge reopened to traffic after repairs.' }],
    });
    const loadFeed = async (url: string): Promise<Feed> =>
      story(url === WIRE_A.url ? 'https://a.example.com/bridge' : 'https://b.example.com/bridge');

    const articles = await fetchCategoryArticles('sports', [WIRE_A, WIRE_B], { loadFeed, retryBaseDelayMs: 0 });

    expect(articles.map(a => a.source)).toEqual(['Wire A', 'Wire B']);
  });

  it('keeps only the requested category from a mixed feed', async () => {
    const loadFeed = async (): Promise<Feed> => FEED_MIXED;

    const music = await fetchCategoryArticles('music', [MIXED], {
      loadFeed,
      categoryKeywords: KEYWORDS,
      fallbackCategory: 'lifestyle',
    });
    const sports = await fetchCategoryArticles('sports', [MIXED], {
      loadFeed,
      categoryKeywords: KEYWORDS,
      fallbackCategory: 'lifestyle',
    });

    expect(music.map(a => [a.title, a.category])).toEqual([['Album launch', 'music']]);
    expect(sports.map(a => [a.title, a.category])).toEqual([['Cricket match', 'sports']]);
  });
});

describe('extractContent', () => {
  it('uses the fallback field when the preferred one is missing', () => {
    const source: RSSSource = { ...WIRE_A, contentField: 'content:encoded', fallbackField: 'description' };
    expect(extractContent({ description: '<p>Plain <i>text</i></p>' }, source)).toBe('Plain text');
  });
});

describe('parseDate', () => {
  it('returns the fallback time for missing or invalid dates', () => {
    expect(parseDate(undefined, BASE_TIME)).toBe(BASE_TIME);
    expect(parseDate('garbage', BASE_TIME)).toBe(BASE_TIME);
    expect(parseDate('2026-02-28T08:30:00.000Z', BASE_TIME)).toEqual(new Date('2026-02-28T08:30:00.000Z'));
  });
});
