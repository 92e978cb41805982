/**
 * Rebuild the persisted semantic index from the active highlights
 *
 * Run after changing EMBEDDING_BACKEND or EMBEDDING_DIMENSIONS, or when the
 * index table was lost. Requires DATABASE_URL.
 *
 * Usage: npm run build && npm run reindex
 */

import '../instrumentation';
import { loadConfig } from '../config';
import { createServices } from '../app';
import { reindexHighlights } from '../search/reindex';

async function main() {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to reindex persisted highlights');
  }

  const services = await createServices({ ...config, extractionCron: null });
  const startTime = Date.now();
  console.log(`Reindexing highlights with ${services.provider.name} embeddings...\n`);

  try {
    const report = await reindexHighlights(services.store, services.index, {
      concurrency: config.embeddingConcurrency
    });

    const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log('========================================');
    console.log('Reindex complete!');
    console.log(`  Active highlights: ${report.highlights}`);
    console.log(`  Inserted: ${report.outcomes.inserted}, updated: ${report.outcomes.updated}, unchanged: ${report.outcomes.unchanged}`);
    console.log(`  Lexical only: ${report.outcomes.degraded}`);
    console.log(`  Removed orphans: ${report.removed}`);
    console.log(`  Failed: ${report.failed}`);
    console.log(`  Total time: ${totalTime}s`);
    console.log('========================================\n');
  } finally {
    await services.store.close();
  }
}

main().catch((err) => {
  console.error('Reindex failed:', err);
  process.exit(1);
});
