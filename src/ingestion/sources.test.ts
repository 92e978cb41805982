import { describe, it, expect } from 'vitest';
import { SourcesFile, SourcesFileSchema, buildSourceCatalog, loadSourceCatalog } from './sources';

const FILE: SourcesFile = {
  categories: {
    sports: [{ name: 'Sport Wire', url: 'https://feeds.example.com/sport.xml', contentField: 'description' }],
    finance: [],
  },
  autoSources: [{ name: 'Mixed Wire', url: 'https://feeds.example.com/all.xml', contentField: 'description' }],
  fallbackCategory: 'sports',
  categoryKeywords: { sports: ['rugby'] },
};

describe('buildSourceCatalog', () => {
  it('lists categories in file order', () => {
    const catalog = buildSourceCatalog(FILE);
    expect(catalog.categories).toEqual(['sports', 'finance']);
    expect(catalog.fallbackCategory).toBe('sports');
  });

  it('tags fixed sources with their category and mixed feeds as auto', () => {
    const catalog = buildSourceCatalog(FILE);

    expect(catalog.sourcesFor('sports')).toEqual([
      { name: 'Sport Wire', url: 'https://feeds.example.com/sport.xml', contentField: 'description', category: 'sports' },
      { name: 'Mixed Wire', url: 'https://feeds.example.com/all.xml', contentField: 'description', category: 'auto' },
    ]);
    expect(catalog.sourcesFor('finance').map(s => s.name)).toEqual(['Mixed Wire']);
    expect(catalog.sourcesFor('weather')).toEqual([]);
  });
});

describe('SourcesFileSchema', () => {
  it('applies defaults', () => {
    const parsed = SourcesFileSchema.parse({ categories: { sports: [] }, fallbackCategory: 'sports' });
    expect(parsed.autoSources).toEqual([]);
    expect(parsed.categoryKeywords).toEqual({});
  });

  it('rejects a fallback category that is not configured', () => {
    const result = SourcesFileSchema.safeParse({ categories: { sports: [] }, fallbackCategory: 'weather' });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('fallbackCategory "weather" is not a configured category');
  });

  it('rejects an empty category map', () => {
    expect(SourcesFileSchema.safeParse({ categories: {}, fallbackCategory: 'sports' }).success).toBe(false);
  });
});

describe('loadSourceCatalog', () => {
  it('reads the bundled sources file', () => {
    const catalog = loadSourceCatalog();
    expect(catalog.categories).toEqual(['sports', 'lifestyle', 'music', 'finance']);
    expect(catalog.fallbackCategory).toBe('lifestyle');
    expect(catalog.sourcesFor('music').at(-1)?.category).toBe('auto');
  });
});
