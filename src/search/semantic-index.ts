import { createHash } from 'crypto';
import { Highlight, IndexEntry, ScoredHighlight } from '../types';
import { EmbeddingProvider, tokenize } from '../agents/embedding-provider';
import { clampSimilarity, cosineSimilarity } from '../highlights/similarity';
import { InvalidArgument, errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

/**
 * Durable storage for index entries, keyed by highlight id.
 */
export interface IndexPersistence {
  loadAll(): Promise<IndexEntry[]>;
  save(entry: IndexEntry): Promise<void>;
  delete(highlightId: string): Promise<void>;
}

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged' | 'degraded' | 'stale';

export function retrievalText(highlight: Pick<Highlight, 'title' | 'summary'>): string {
  return `${highlight.title}\n${highlight.summary}`;
}

/**
 * Changes with the text, the highlight's run, or the embedding model, so a
 * backend switch re-embeds on the next upsert.
 */
function contentHash(highlight: Highlight, text: string, provider: EmbeddingProvider): string {
  return createHash('sha256')
    .update(`${provider.name}:${provider.dimensions}\u0000${highlight.category}\u0000${highlight.createdAt.toISOString()}\u0000${text}`)
    .digest('hex');
}

function lexicalScore(queryTerms: Set<string>, text: string): number {
  if (queryTerms.size === 0) return 0;
  const terms = new Set(tokenize(text));
  let hits = 0;
  for (const term of queryTerms) {
    if (terms.has(term)) hits++;
  }
  return hits / queryTerms.size;
}

function freezeEntry(entry: IndexEntry): IndexEntry {
  return Object.freeze({
    ...entry,
    embedding: entry.embedding ? Object.freeze([...entry.embedding]) : null,
  });
}

/**
 * In-memory vector index over highlights.
 *
 * Entries are immutable and replaced with a single Map.set, so readers see
 * either the old or the new entry. Writes to one id commit in the order they
 * were issued: a write overtaken by a newer upsert or remove is dropped.
 */
export class SemanticIndex {
  private entries = new Map<string, IndexEntry>();
  private latestWrite = new Map<string, number>();
  private commitChains = new Map<string, Promise<void>>();
  private writeCounter = 0;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly persistence?: IndexPersistence
  ) {}

  get size(): number {
    return this.entries.size;
  }

  has(highlightId: string): boolean {
    return this.entries.has(highlightId);
  }

  get(highlightId: string): IndexEntry | undefined {
    return this.entries.get(highlightId);
  }

  ids(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Load persisted entries. Entries already written in memory win.
   */
  async hydrate(): Promise<number> {
    if (!this.persistence) return 0;
    const stored = await this.persistence.loadAll();
    let loaded = 0;
    for (const entry of stored) {
      if (!this.entries.has(entry.highlightId)) {
        this.entries.set(entry.highlightId, freezeEntry(entry));
        loaded++;
      }
    }
    debugLogger.info('INDEX', 'Hydrated semantic index', { loaded, total: this.entries.size });
    return loaded;
  }

  async upsert(highlight: Highlight): Promise<UpsertOutcome> {
    const id = highlight.id;
    const text = retrievalText(highlight);
    const hash = contentHash(highlight, text, this.provider);
    const pending = this.commitChains.has(id);
    const token = this.issueWrite(id);

    // Only trust the current entry when no earlier write can still replace it
    if (!pending && this.entries.get(id)?.contentHash === hash) {
      this.releaseWrite(id, token);
      return 'unchanged';
    }

    let embedding: number[] | null = null;
    try {
      embedding = await this.provider.embed(text);
    } catch (error) {
      debugLogger.warn('INDEX', 'Embedding failed, storing lexical-only entry', {
        highlightId: id,
        error: errorMessage(error)
      });
    }

    const entry = freezeEntry({
      highlightId: id,
      embedding,
      textForRetrieval: text,
      contentHash: hash,
      createdAt: highlight.createdAt,
    });

    let replaced = false;
    const committed = await this.commit(id, token, async () => {
      if (this.persistence) {
        await this.persistence.save(entry);
      }
      replaced = this.entries.has(id);
      this.entries.set(id, entry);
    });

    if (!committed) return 'stale';
    if (!embedding) return 'degraded';
    return replaced ? 'updated' : 'inserted';
  }

  async remove(highlightId: string): Promise<void> {
    const token = this.issueWrite(highlightId);
    await this.commit(highlightId, token, async () => {
      if (!this.entries.has(highlightId)) return;
      if (this.persistence) {
        await this.persistence.delete(highlightId);
      }
      this.entries.delete(highlightId);
    });
  }

  /**
   * Top `topK` highlights for `text` by descending similarity; ties go to the
   * more recently created highlight. Falls back to term overlap when the query
   * cannot be embedded.
   */
  async query(text: string, topK: number): Promise<ScoredHighlight[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidArgument(`top_k must be a positive integer, got ${topK}`);
    }

    const snapshot = Array.from(this.entries.values());
    if (snapshot.length === 0) return [];

    let queryVector: number[] | null = null;
    try {
      queryVector = await this.provider.embed(text);
    } catch (error) {
      debugLogger.warn('INDEX', 'Query embedding failed, using lexical scoring', {
        error: errorMessage(error)
      });
    }
    const queryTerms = new Set(tokenize(text));

    const scored = snapshot.map(entry => ({
      entry,
      score: queryVector && entry.embedding
        ? clampSimilarity(cosineSimilarity(queryVector, entry.embedding))
        : lexicalScore(queryTerms, entry.textForRetrieval),
    }));

    scored.sort((a, b) => {
      if (a.score !== b.score) return b.score - a.score;
      const byCreated = b.entry.createdAt.getTime() - a.entry.createdAt.getTime();
      if (byCreated !== 0) return byCreated;
      return a.entry.highlightId < b.entry.highlightId ? -1 : a.entry.highlightId > b.entry.highlightId ? 1 : 0;
    });

    return scored.slice(0, topK).map(({ entry, score }) => ({ highlightId: entry.highlightId, score }));
  }

  private issueWrite(id: string): number {
    const token = ++this.writeCounter;
    this.latestWrite.set(id, token);
    return token;
  }

  private releaseWrite(id: string, token: number): void {
    if (this.latestWrite.get(id) === token) {
      this.latestWrite.delete(id);
    }
  }

  /**
   * Run `apply` after earlier commits for the same id, unless a newer write was
   * issued in the meantime.
   */
  private async commit(id: string, token: number, apply: () => Promise<void>): Promise<boolean> {
    let committed = false;
    const previous = this.commitChains.get(id) ?? Promise.resolve();
    const next = previous.then(async () => {
      if (this.latestWrite.get(id) !== token) return;
      await apply();
      committed = true;
      this.releaseWrite(id, token);
    });
    const tail = next.then(
      () => undefined,
      () => undefined
    );
    this.commitChains.set(id, tail);

    try {
      await next;
    } finally {
      if (this.commitChains.get(id) === tail) {
        this.commitChains.delete(id);
      }
    }
    return committed;
  }
}
