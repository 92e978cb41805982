import { ArticleStore } from '../store/article-store';
import { processConcurrently } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { SemanticIndex, UpsertOutcome } from './semantic-index';

export interface ReindexReport {
  highlights: number;
  outcomes: Record<UpsertOutcome, number>;
  removed: number;
  failed: number;
}

/**
 * Make the index hold exactly the store's active highlights: upsert each one
 * (unchanged entries are skipped) and drop entries with no active highlight.
 */
export async function reindexHighlights(
  store: ArticleStore,
  index: SemanticIndex,
  options: { concurrency?: number } = {}
): Promise<ReindexReport> {
  const highlights = await store.listHighlights({ limit: Number.MAX_SAFE_INTEGER });
  const active = new Set(highlights.map(h => h.id));
  const concurrency = options.concurrency ?? 10;

  const upserts = await processConcurrently(highlights, h => index.upsert(h), {
    concurrency,
    label: 'Reindex Upserts'
  });
  const orphans = index.ids().filter(id => !active.has(id));
  const removals = await processConcurrently(orphans, id => index.remove(id), {
    concurrency,
    label: 'Reindex Removals'
  });

  const outcomes: Record<UpsertOutcome, number> = { inserted: 0, updated: 0, unchanged: 0, degraded: 0, stale: 0 };
  for (const { value } of upserts.successful) {
    outcomes[value]++;
  }

  return {
    highlights: highlights.length,
    outcomes,
    removed: removals.successful.length,
    failed: upserts.failed.length + removals.failed.length,
  };
}

/**
 * Load the persisted index and reconcile it with the store, covering runs that
 * stopped between writing highlights and indexing them.
 */
export async function restoreSemanticIndex(
  store: ArticleStore,
  index: SemanticIndex,
  options: { concurrency?: number } = {}
): Promise<ReindexReport> {
  const loaded = await index.hydrate();
  const report = await reindexHighlights(store, index, options);

  const indexed = report.outcomes.inserted + report.outcomes.updated + report.outcomes.degraded;
  if (indexed > 0 || report.removed > 0 || report.failed > 0) {
    console.log(
      `🔁 Semantic index reconciled: ${indexed} indexed, ${report.removed} orphans removed` +
      (report.failed > 0 ? `, ${report.failed} failed` : '')
    );
  }
  debugLogger.info('INDEX', 'Restored semantic index', { loaded, ...report.outcomes, removed: report.removed });
  return report;
}
