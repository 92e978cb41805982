/**
 * Counters for extraction runs, overall and per category, surfaced on /api/status.
 */

export interface RunMetrics {
  category: string;
  durationMs: number;
  articlesStored: number;
  highlightsWritten: number;
  degraded: boolean;
}

export interface CategoryRunStats {
  succeeded: number;
  failed: number;
  lastOutcome: 'succeeded' | 'degraded' | 'failed';
  lastFinishedAt: Date;
}

export interface RunStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  degradedRuns: number;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  averageDurationMs: number;
  totalArticlesStored: number;
  totalHighlightsWritten: number;
  byCategory: Record<string, CategoryRunStats>;
}

const CRITICAL_FAILURE_STREAK = 3;

export class MetricsTracker {
  private totals = { runs: 0, succeeded: 0, failed: 0, degraded: 0, articles: 0, highlights: 0, durationMs: 0 };
  private failureStreak = 0;
  private lastRunAt: Date | null = null;
  private lastSuccessAt: Date | null = null;
  private lastError: string | null = null;
  private categories = new Map<string, CategoryRunStats>();

  recordRunStart(): void {
    this.totals.runs++;
    this.lastRunAt = new Date();
  }

  recordRunSuccess(metrics: RunMetrics): void {
    const now = new Date();
    this.totals.succeeded++;
    this.totals.articles += metrics.articlesStored;
    this.totals.highlights += metrics.highlightsWritten;
    this.totals.durationMs += metrics.durationMs;
    if (metrics.degraded) this.totals.degraded++;

    this.failureStreak = 0;
    this.lastSuccessAt = now;
    this.lastError = null;

    const entry = this.categoryEntry(metrics.category, now);
    entry.succeeded++;
    entry.lastOutcome = metrics.degraded ? 'degraded' : 'succeeded';
  }

  recordRunFailure(category: string, error: string): void {
    this.totals.failed++;
    this.failureStreak++;
    this.lastError = error;

    const entry = this.categoryEntry(category, new Date());
    entry.failed++;
    entry.lastOutcome = 'failed';
  }

  getStats(): RunStats {
    const byCategory: Record<string, CategoryRunStats> = {};
    for (const [category, entry] of this.categories) {
      byCategory[category] = { ...entry };
    }

    return {
      totalRuns: this.totals.runs,
      successfulRuns: this.totals.succeeded,
      failedRuns: this.totals.failed,
      degradedRuns: this.totals.degraded,
      lastRunAt: this.lastRunAt,
      lastSuccessAt: this.lastSuccessAt,
      lastError: this.lastError,
      consecutiveFailures: this.failureStreak,
      averageDurationMs: this.totals.succeeded > 0 ? this.totals.durationMs / this.totals.succeeded : 0,
      totalArticlesStored: this.totals.articles,
      totalHighlightsWritten: this.totals.highlights,
      byCategory,
    };
  }

  isCriticalFailureState(): boolean {
    return this.failureStreak >= CRITICAL_FAILURE_STREAK;
  }

  getConsecutiveFailures(): number {
    return this.failureStreak;
  }

  reset(): void {
    this.totals = { runs: 0, succeeded: 0, failed: 0, degraded: 0, articles: 0, highlights: 0, durationMs: 0 };
    this.failureStreak = 0;
    this.lastRunAt = null;
    this.lastSuccessAt = null;
    this.lastError = null;
    this.categories.clear();
  }

  private categoryEntry(category: string, finishedAt: Date): CategoryRunStats {
    let entry = this.categories.get(category);
    if (!entry) {
      entry = { succeeded: 0, failed: 0, lastOutcome: 'succeeded', lastFinishedAt: finishedAt };
      this.categories.set(category, entry);
    }
    entry.lastFinishedAt = finishedAt;
    return entry;
  }
}

export const metricsTracker = new MetricsTracker();
