import { randomUUID } from 'crypto';
import { Article, Cluster, Highlight, SummaryMode } from '../types';
import { Summarizer } from '../agents/summarizer';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';
import { matchPriorityKeywords } from './keywords';
import { extractiveClusterSummary } from './extractive';
import { pickRepresentative } from './clustering';

const SUMMARY_SOURCE_CHARS = 2000;

export interface RankingWeights {
  frequencyWeight: number;
  priorityWeight: number;
}

export interface RankOptions extends RankingWeights {
  categoryLimit: number;
  priorityKeywords: Iterable<string>;
  summaryMaxLength: number;
  now?: () => Date;
  newId?: () => string;
}

export interface ScoredCluster {
  cluster: Cluster;
  representative: Article;
  score: number;
  priorityFlag: boolean;
  matchedKeywords: string[];
}

function representativeOf(cluster: Cluster): Article {
  return cluster.members.find(m => m.id === cluster.representativeArticleId)
    ?? pickRepresentative(cluster.members);
}

export function scoreCluster(
  cluster: Cluster,
  weights: RankingWeights,
  priorityKeywords: Iterable<string>
): ScoredCluster {
  const keywords = Array.from(priorityKeywords);
  const matched = new Set<string>();
  for (const member of cluster.members) {
    for (const keyword of matchPriorityKeywords(`${member.title}\n${member.bodyText}`, keywords)) {
      matched.add(keyword);
    }
  }

  const priorityFlag = matched.size > 0;
  const score = weights.frequencyWeight * cluster.members.length
    + weights.priorityWeight * (priorityFlag ? 1 : 0);

  return {
    cluster,
    representative: representativeOf(cluster),
    score,
    priorityFlag,
    matchedKeywords: Array.from(matched),
  };
}

/**
 * Descending score; ties by more recent representative, then title, then id.
 */
export function compareScoredClusters(a: ScoredCluster, b: ScoredCluster): number {
  if (a.score !== b.score) return b.score - a.score;

  const byTime = b.representative.publishedAt.getTime() - a.representative.publishedAt.getTime();
  if (byTime !== 0) return byTime;

  if (a.representative.title !== b.representative.title) {
    return a.representative.title < b.representative.title ? -1 : 1;
  }
  return a.representative.id < b.representative.id ? -1 : a.representative.id > b.representative.id ? 1 : 0;
}

export function orderClusters(
  clusters: Cluster[],
  weights: RankingWeights,
  priorityKeywords: Iterable<string>
): ScoredCluster[] {
  const keywords = Array.from(priorityKeywords);
  return clusters
    .map(cluster => scoreCluster(cluster, weights, keywords))
    .sort(compareScoredClusters);
}

async function summarizeCluster(
  scored: ScoredCluster,
  summarizer: Summarizer | undefined,
  maxLength: number
): Promise<{ summary: string; mode: SummaryMode }> {
  if (summarizer?.available) {
    const { representative } = scored;
    const text = `${representative.title}\n\n${representative.bodyText.substring(0, SUMMARY_SOURCE_CHARS)}`;
    try {
      const summary = await summarizer.summarize(text, maxLength);
      if (summary.trim()) {
        return { summary: summary.trim(), mode: 'generated' };
      }
    } catch (error) {
      debugLogger.warn('RANK', 'Summarizer failed, using extractive summary', {
        representative: representative.id,
        error: errorMessage(error)
      });
    }
  }
  return { summary: extractiveClusterSummary(scored.cluster, maxLength), mode: 'extractive' };
}

function unique<T>(values: T[]): T[] {
  return Array.from(new Set(values));
}

/**
 * Turn one category's clusters into at most `categoryLimit` ranked highlights.
 * Summaries come from the summarizer when it is available and fall back to
 * extractive text otherwise.
 */
export async function rankClusters(
  clusters: Cluster[],
  options: RankOptions,
  summarizer?: Summarizer
): Promise<Highlight[]> {
  if (clusters.length === 0 || options.categoryLimit <= 0) {
    return [];
  }

  const stepId = debugLogger.stepStart('RANK', `Ranking ${clusters.length} clusters`, {
    categoryLimit: options.categoryLimit
  });

  const now = options.now ?? (() => new Date());
  const newId = options.newId ?? randomUUID;
  const top = orderClusters(clusters, options, options.priorityKeywords)
    .slice(0, Math.floor(options.categoryLimit));

  const highlights: Highlight[] = [];
  for (const [position, scored] of top.entries()) {
    const { cluster, representative } = scored;
    const { summary, mode } = await summarizeCluster(scored, summarizer, options.summaryMaxLength);

    highlights.push({
      id: newId(),
      category: cluster.category,
      title: representative.title,
      summary,
      frequency: cluster.members.length,
      priorityFlag: scored.priorityFlag,
      score: scored.score,
      rank: position + 1,
      sourceList: unique(cluster.members.map(m => m.source)),
      representativeArticleId: representative.id,
      createdAt: now(),
      urls: cluster.members.map(m => m.url),
      authors: unique(cluster.members.flatMap(m => (m.author ? [m.author] : []))),
      publishedDates: cluster.members.map(m => m.publishedAt),
      matchedKeywords: scored.matchedKeywords,
      summaryMode: mode,
    });
  }

  debugLogger.stepFinish(stepId, {
    highlights: highlights.length,
    priority: highlights.filter(h => h.priorityFlag).length,
    extractive: highlights.filter(h => h.summaryMode === 'extractive').length
  });

  return highlights;
}
