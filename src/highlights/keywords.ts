import { escapeRegex } from '../utils/sanitize';

const patternCache = new Map<string, RegExp>();

export function normalizeKeywords(keywords: Iterable<string>): string[] {
  const normalized = new Set<string>();
  for (const keyword of keywords) {
    const value = keyword.trim().replace(/\s+/g, ' ').toLowerCase();
    if (value) normalized.add(value);
  }
  return Array.from(normalized);
}

/**
 * Whole-word, case-insensitive pattern. Word boundaries are Unicode-aware and
 * the words of a multi-word keyword may be separated by any whitespace.
 */
export function keywordPattern(keyword: string): RegExp {
  const cached = patternCache.get(keyword);
  if (cached) return cached;

  const body = keyword.trim().split(/\s+/).map(escapeRegex).join('\\s+');
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${body}(?![\\p{L}\\p{N}_])`, 'iu');
  patternCache.set(keyword, pattern);
  return pattern;
}

/**
 * Keywords (normalized) that occur in `text`, in keyword order.
 */
export function matchPriorityKeywords(text: string, keywords: Iterable<string>): string[] {
  if (!text) return [];
  return normalizeKeywords(keywords).filter(keyword => keywordPattern(keyword).test(text));
}
