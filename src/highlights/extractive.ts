import { Cluster } from '../types';

const MIN_SENTENCE_LENGTH = 20;
const DEFAULT_MAX_SENTENCES = 3;

export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .split(/(?<=[.!?])\s+/)
    .map(s => s.trim())
    .filter(s => s.length > MIN_SENTENCE_LENGTH);
}

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.substring(0, Math.max(0, maxLength));
  return text.substring(0, maxLength - 3).trimEnd() + '...';
}

function takeWithinBudget(sentences: string[], taken: string[], maxLength: number, maxSentences: number): void {
  const seen = new Set(taken.map(s => s.toLowerCase()));
  for (const sentence of sentences) {
    if (taken.length >= maxSentences) return;
    if (seen.has(sentence.toLowerCase())) continue;
    const length = taken.reduce((sum, s) => sum + s.length + 1, 0) + sentence.length;
    if (length > maxLength) return;
    taken.push(sentence);
    seen.add(sentence.toLowerCase());
  }
}

/**
 * Leading sentences of `text` that fit in `maxLength`. Never throws; falls back
 * to a truncated first sentence or the truncated raw text.
 */
export function extractiveSummary(
  text: string,
  maxLength: number,
  maxSentences = DEFAULT_MAX_SENTENCES
): string {
  const sentences = splitSentences(text);
  const taken: string[] = [];
  takeWithinBudget(sentences, taken, maxLength, maxSentences);

  if (taken.length > 0) return taken.join(' ');
  if (sentences.length > 0) return truncateText(sentences[0], maxLength);
  return truncateText(text.replace(/\s+/g, ' ').trim(), maxLength);
}

/**
 * Representative's leading sentences first, topped up with the first sentence
 * of each other member while the budget allows.
 */
export function extractiveClusterSummary(
  cluster: Cluster,
  maxLength: number,
  maxSentences = DEFAULT_MAX_SENTENCES
): string {
  const representative = cluster.members.find(m => m.id === cluster.representativeArticleId)
    ?? cluster.members[0];
  if (!representative) return '';

  const taken: string[] = [];
  takeWithinBudget(splitSentences(representative.bodyText), taken, maxLength, maxSentences);

  for (const member of cluster.members) {
    if (member.id === representative.id) continue;
    takeWithinBudget(splitSentences(member.bodyText).slice(0, 1), taken, maxLength, maxSentences);
  }

  if (taken.length > 0) return taken.join(' ');
  return extractiveSummary(representative.bodyText || representative.title, maxLength, maxSentences);
}
