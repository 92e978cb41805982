import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { RSSSource } from '../types';

export const DEFAULT_SOURCES_FILE = path.resolve(__dirname, '../../config/sources.json');

const RSSSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  contentField: z.enum(['content:encoded', 'description']),
  fallbackField: z.string().optional(),
});

export const SourcesFileSchema = z.object({
  categories: z.record(z.string().min(1), z.array(RSSSourceSchema))
    .refine(categories => Object.keys(categories).length > 0, 'At least one category is required'),
  autoSources: z.array(RSSSourceSchema).default([]),
  fallbackCategory: z.string().min(1),
  categoryKeywords: z.record(z.string(), z.array(z.string().min(1))).default({}),
}).refine(
  file => file.fallbackCategory in file.categories,
  file => ({ message: `fallbackCategory "${file.fallbackCategory}" is not a configured category` })
);

export type SourcesFile = z.infer<typeof SourcesFileSchema>;

export interface SourceCatalog {
  categories: string[];
  fallbackCategory: string;
  categoryKeywords: Record<string, string[]>;
  /** Fixed-category sources first, then mixed feeds tagged `category: 'auto'` */
  sourcesFor(category: string): RSSSource[];
}

export function buildSourceCatalog(file: SourcesFile): SourceCatalog {
  const categories = Object.keys(file.categories);
  return {
    categories,
    fallbackCategory: file.fallbackCategory,
    categoryKeywords: file.categoryKeywords,
    sourcesFor(category: string): RSSSource[] {
      const fixed = file.categories[category];
      if (!fixed) return [];
      return [
        ...fixed.map(source => ({ ...source, category })),
        ...file.autoSources.map(source => ({ ...source, category: 'auto' })),
      ];
    },
  };
}

export function loadSourceCatalog(filePath: string = DEFAULT_SOURCES_FILE): SourceCatalog {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return buildSourceCatalog(SourcesFileSchema.parse(raw));
}
