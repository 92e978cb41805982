export interface RSSSource {
  name: string;
  url: string;
  contentField: 'content:encoded' | 'description';
  fallbackField?: string;
  /** Fixed category, or 'auto' to categorize each item by keywords */
  category?: string;
}

export interface RawArticle {
  url: string;
  title: string;
  content: string;
  publishedAt: Date;
  source: string;
  author: string | null;
  category: string;
}

export interface Article {
  id: string;
  source: string;
  category: string;
  title: string;
  bodyText: string;
  author: string | null;
  publishedAt: Date;
  url: string;
  embedding?: number[];
  /** Provider that produced `embedding`; vectors from another provider are not comparable */
  embeddingModel?: string;
}

export interface Cluster {
  category: string;
  memberArticleIds: Set<string>;
  /** Members in processing order */
  members: Article[];
  representativeArticleId: string;
}

export type SummaryMode = 'generated' | 'extractive';

export interface Highlight {
  id: string;
  category: string;
  title: string;
  summary: string;
  frequency: number;
  priorityFlag: boolean;
  score: number;
  rank: number;
  sourceList: string[];
  representativeArticleId: string;
  createdAt: Date;
  urls: string[];
  authors: string[];
  publishedDates: Date[];
  matchedKeywords: string[];
  summaryMode: SummaryMode;
}

export interface IndexEntry {
  readonly highlightId: string;
  readonly embedding: readonly number[] | null;
  readonly textForRetrieval: string;
  readonly contentHash: string;
  readonly createdAt: Date;
}

export interface ScoredHighlight {
  highlightId: string;
  score: number;
}

export type RunState =
  | 'queued'
  | 'fetching'
  | 'clustering'
  | 'ranking'
  | 'persisting'
  | 'indexing'
  | 'succeeded'
  | 'failed';

export type DegradedReason = 'embedding_fallback' | 'summary_fallback' | 'index_fallback';

export interface RunCounts {
  fetched: number;
  articles: number;
  clusters: number;
  highlights: number;
  superseded: number;
  indexed: number;
}

export interface RunRecord {
  id: string;
  category: string;
  state: RunState;
  forceRefresh: boolean;
  submittedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  degraded: DegradedReason[];
  counts: RunCounts;
  error: string | null;
}

export interface ChatAnswer {
  message: string;
  answer: string;
  mode: 'generated' | 'extractive' | 'empty';
  sources: Array<{ highlightId: string; title: string; category: string; score: number }>;
  timestamp: string;
}
