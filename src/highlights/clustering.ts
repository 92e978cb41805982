import { Article, Cluster } from '../types';
import { EmbeddingProvider } from '../agents/embedding-provider';
import { InvalidArgument } from '../utils/errors';
import { processConcurrently } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { clampSimilarity, cosineSimilarity } from './similarity';

const EMBEDDING_BODY_CHARS = 500;

/**
 * A cluster under construction. `vector` is the representative's embedding.
 */
export interface ClusterCandidate {
  readonly index: number;
  readonly vector: readonly number[];
}

/**
 * Finds the cluster an embedded article should join. The default is a linear
 * scan over representatives; an approximate nearest-neighbour index can be
 * swapped in for large batches.
 */
export interface ClusterMatcher {
  match(vector: readonly number[], candidates: readonly ClusterCandidate[], threshold: number): number | null;
}

export const linearMatcher: ClusterMatcher = {
  match(vector, candidates, threshold) {
    let best: number | null = null;
    let bestSimilarity = -1;
    for (const candidate of candidates) {
      const similarity = clampSimilarity(cosineSimilarity(vector, candidate.vector));
      // strict > keeps the earlier-created cluster on ties
      if (similarity >= threshold && similarity > bestSimilarity) {
        best = candidate.index;
        bestSimilarity = similarity;
      }
    }
    return best;
  },
};

export interface ClusterOptions {
  matcher?: ClusterMatcher;
  concurrency?: number;
  /** Called for each embedding computed in this run (not for cached ones) */
  onEmbedding?: (articleId: string, vector: number[]) => Promise<void> | void;
}

export interface ClusterResult {
  clusters: Cluster[];
  /** Ids of articles that fell back to singleton clusters */
  failedEmbeddings: string[];
}

/**
 * A cached vector is only comparable when the current provider produced it.
 */
function isReusable(
  article: Article,
  provider: EmbeddingProvider
): article is Article & { embedding: number[] } {
  return article.embedding !== undefined
    && article.embeddingModel === provider.name
    && article.embedding.length === provider.dimensions;
}

export function embeddingText(article: Article): string {
  return `${article.title} ${article.bodyText.substring(0, EMBEDDING_BODY_CHARS)}`;
}

/**
 * Deterministic processing order: oldest first, then by id.
 */
export function compareProcessingOrder(a: Article, b: Article): number {
  const byTime = a.publishedAt.getTime() - b.publishedAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Representative: earliest publishedAt, then longest body, then smallest id.
 */
export function pickRepresentative(members: readonly Article[]): Article {
  if (members.length === 0) {
    throw new InvalidArgument('Cannot pick a representative of an empty cluster');
  }
  return members.reduce((best, candidate) => {
    const byTime = candidate.publishedAt.getTime() - best.publishedAt.getTime();
    if (byTime !== 0) return byTime < 0 ? candidate : best;
    const byLength = candidate.bodyText.length - best.bodyText.length;
    if (byLength !== 0) return byLength > 0 ? candidate : best;
    return candidate.id < best.id ? candidate : best;
  });
}

export function validateThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 1) {
    throw new InvalidArgument(`Similarity threshold must be in (0, 1], got ${threshold}`);
  }
}

interface WorkingCluster {
  members: Article[];
  vectors: Map<string, readonly number[]>;
  representative: Article;
}

function toCluster(category: string, working: WorkingCluster): Cluster {
  return {
    category,
    members: working.members,
    memberArticleIds: new Set(working.members.map(m => m.id)),
    representativeArticleId: working.representative.id,
  };
}

/**
 * Partition a single-category batch into near-duplicate clusters.
 *
 * Each article, in processing order, joins the most similar existing cluster
 * whose representative it matches at `threshold` or above, or seeds a new one.
 * Articles without an embedding become singletons.
 */
export async function clusterArticles(
  articles: Article[],
  threshold: number,
  provider: EmbeddingProvider,
  options: ClusterOptions = {}
): Promise<ClusterResult> {
  validateThreshold(threshold);
  if (articles.length === 0) {
    return { clusters: [], failedEmbeddings: [] };
  }

  const category = articles[0].category;
  const foreign = articles.find(a => a.category !== category);
  if (foreign) {
    throw new InvalidArgument(
      `Cannot cluster across categories: ${category} and ${foreign.category}`
    );
  }

  const seen = new Set<string>();
  for (const article of articles) {
    if (seen.has(article.id)) {
      throw new InvalidArgument(`Duplicate article id in batch: ${article.id}`);
    }
    seen.add(article.id);
  }

  const { matcher = linearMatcher, concurrency = 10, onEmbedding } = options;
  const stepId = debugLogger.stepStart('CLUSTER', `Clustering ${articles.length} ${category} articles`, {
    threshold,
    provider: provider.name
  });

  const ordered = [...articles].sort(compareProcessingOrder);

  const embedded = await processConcurrently(
    ordered,
    async (article) => {
      if (isReusable(article, provider)) {
        return article.embedding;
      }
      const vector = await provider.embed(embeddingText(article));
      if (onEmbedding) {
        try {
          await onEmbedding(article.id, vector);
        } catch (error) {
          debugLogger.warn('CLUSTER', 'Embedding cache write failed', {
            articleId: article.id,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      }
      return vector;
    },
    { concurrency, label: 'Article Embeddings' }
  );

  const vectors = new Map<number, number[]>();
  for (const { value, index } of embedded.successful) {
    vectors.set(index, value);
  }

  const working: WorkingCluster[] = [];
  // clusters that may accept new members, in creation order
  const open: Array<{ clusterIndex: number; cluster: WorkingCluster }> = [];
  const failedEmbeddings: string[] = [];

  ordered.forEach((article, position) => {
    const vector = vectors.get(position);
    if (!vector) {
      failedEmbeddings.push(article.id);
      working.push({ members: [article], vectors: new Map(), representative: article });
      return;
    }

    const candidates: ClusterCandidate[] = open.map(({ clusterIndex, cluster }) => ({
      index: clusterIndex,
      vector: cluster.vectors.get(cluster.representative.id) ?? [],
    }));
    const target = matcher.match(vector, candidates, threshold);
    const cluster = target === null ? undefined : working[target];

    if (cluster) {
      cluster.members.push(article);
      cluster.vectors.set(article.id, vector);
      cluster.representative = pickRepresentative(cluster.members);
      return;
    }

    const seeded: WorkingCluster = {
      members: [article],
      vectors: new Map([[article.id, vector]]),
      representative: article,
    };
    open.push({ clusterIndex: working.length, cluster: seeded });
    working.push(seeded);
  });

  const clusters = working.map(w => toCluster(category, w));

  debugLogger.stepFinish(stepId, {
    articles: articles.length,
    clusters: clusters.length,
    failedEmbeddings: failedEmbeddings.length
  });

  return { clusters, failedEmbeddings };
}
