const CATEGORIZE_BODY_CHARS = 500;

/**
 * Share of the category's keywords that occur in the text.
 */
export function scoreCategory(text: string, keywords: string[]): number {
  if (keywords.length === 0) return 0;
  const lower = text.toLowerCase();
  const hits = keywords.filter(keyword => lower.includes(keyword.toLowerCase())).length;
  return hits / keywords.length;
}

/**
 * Pick the best-scoring category for an article from a feed that mixes topics.
 * Ties go to the category listed first; no hits at all yields `fallback`.
 */
export function categorizeArticle(
  title: string,
  body: string,
  keywordsByCategory: Record<string, string[]>,
  fallback: string
): string {
  const text = `${title} ${body.substring(0, CATEGORIZE_BODY_CHARS)}`;
  let best = fallback;
  let bestScore = 0;

  for (const [category, keywords] of Object.entries(keywordsByCategory)) {
    const score = scoreCategory(text, keywords);
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }

  return best;
}
