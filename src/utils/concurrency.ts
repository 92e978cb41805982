import { debugLogger } from './debug-logger';

export interface ConcurrencyOptions {
  /** Maximum number of concurrent operations. Default: 10 */
  concurrency?: number;
  /** Label for logging purposes */
  label?: string;
}

export interface ConcurrencyResult<R> {
  successful: Array<{ value: R; index: number }>;
  failed: Array<{ error: Error; index: number }>;
}

/**
 * Process items concurrently with a controlled concurrency limit.
 * Every item settles; failures are collected with their input index instead of
 * rejecting the whole batch.
 *
 * @example
 * const { successful, failed } = await processConcurrently(
 *   articles,
 *   async (article) => provider.embed(article.title),
 *   { concurrency: 10, label: 'Article Embeddings' }
 * );
 */
export async function processConcurrently<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyResult<R>> {
  const { concurrency = 10, label = 'Operation' } = options;

  if (items.length === 0) {
    return { successful: [], failed: [] };
  }

  const limit = Math.max(1, Math.floor(concurrency));
  const stepId = debugLogger.stepStart('CONCURRENCY', `${label} (${items.length} items, concurrency: ${limit})`, {
    itemCount: items.length,
    concurrency: limit
  });
  const startTime = Date.now();

  const successful: Array<{ value: R; index: number }> = [];
  const failed: Array<{ error: Error; index: number }> = [];
  const executing = new Set<Promise<void>>();

  for (let i = 0; i < items.length; i++) {
    const index = i;
    const promise: Promise<void> = fn(items[index], index)
      .then((value) => {
        successful.push({ value, index });
      })
      .catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        debugLogger.warn('CONCURRENCY', `${label}: Item ${index + 1}/${items.length} failed`, {
          error: err.message
        });
        failed.push({ error: err, index });
      })
      .finally(() => {
        executing.delete(promise);
      });

    executing.add(promise);

    if (executing.size >= limit) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);

  successful.sort((a, b) => a.index - b.index);
  failed.sort((a, b) => a.index - b.index);

  const duration = Date.now() - startTime;
  debugLogger.stepFinish(stepId, {
    successful: successful.length,
    failed: failed.length,
    avgTimePerItem: `${(duration / items.length).toFixed(0)}ms`,
  });

  return { successful, failed };
}

