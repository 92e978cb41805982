import { randomUUID } from 'crypto';
import { DegradedReason, RunCounts, RunRecord, RunState } from '../types';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';
import { MetricsTracker } from './metrics-tracker';

export type RunStage = 'fetching' | 'clustering' | 'ranking' | 'persisting' | 'indexing';

const STATE_ORDER: RunState[] = ['queued', 'fetching', 'clustering', 'ranking', 'persisting', 'indexing'];

/**
 * Handle given to the executor of one run. Stage transitions only move forward.
 */
export interface RunContext {
  readonly runId: string;
  readonly category: string;
  readonly forceRefresh: boolean;
  enter(stage: RunStage): void;
  degrade(reason: DegradedReason): void;
  count(counts: Partial<RunCounts>): void;
}

export type RunExecutor = (run: RunContext) => Promise<void>;

export interface RunRegistryOptions {
  metrics?: MetricsTracker;
  /** Completed runs kept for status polling */
  maxHistory?: number;
  now?: () => Date;
  newId?: () => string;
}

export type OverallRunState = 'idle' | 'queued' | 'running';

function emptyCounts(): RunCounts {
  return { fetched: 0, articles: 0, clusters: 0, highlights: 0, superseded: 0, indexed: 0 };
}

function snapshot(record: RunRecord): RunRecord {
  return { ...record, degraded: [...record.degraded], counts: { ...record.counts } };
}

function isFinished(record: RunRecord): boolean {
  return record.state === 'succeeded' || record.state === 'failed';
}

/**
 * Keyed registry of extraction runs. Runs of one category execute one after
 * another on a promise chain; different categories run in parallel.
 */
export class RunRegistry {
  private records = new Map<string, RunRecord>();
  private chains = new Map<string, Promise<void>>();
  private pending = new Map<string, RunRecord>();
  private completions = new Map<string, Promise<void>>();
  private readonly metrics?: MetricsTracker;
  private readonly maxHistory: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly executor: RunExecutor, options: RunRegistryOptions = {}) {
    this.metrics = options.metrics;
    this.maxHistory = options.maxHistory ?? 50;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * Queue a run and return its record immediately. Without `forceRefresh`, a
   * submit while the category already has a run waiting to start returns that run.
   */
  submit(category: string, options: { forceRefresh?: boolean } = {}): RunRecord {
    const forceRefresh = options.forceRefresh ?? false;
    const waiting = this.pending.get(category);
    if (waiting && !forceRefresh) {
      debugLogger.info('RUN_REGISTRY', 'Coalesced onto queued run', { category, runId: waiting.id });
      return snapshot(waiting);
    }

    const record: RunRecord = {
      id: this.newId(),
      category,
      state: 'queued',
      forceRefresh,
      submittedAt: this.now(),
      startedAt: null,
      completedAt: null,
      degraded: [],
      counts: emptyCounts(),
      error: null,
    };
    this.records.set(record.id, record);
    this.pending.set(category, record);

    const previous = this.chains.get(category) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => this.execute(record))
      .finally(() => {
        if (this.chains.get(category) === next) {
          this.chains.delete(category);
        }
        this.completions.delete(record.id);
        this.trimHistory();
      });
    this.chains.set(category, next);
    this.completions.set(record.id, next);

    debugLogger.info('RUN_REGISTRY', 'Run queued', { category, runId: record.id, forceRefresh });
    return snapshot(record);
  }

  get(runId: string): RunRecord | undefined {
    const record = this.records.get(runId);
    return record ? snapshot(record) : undefined;
  }

  /** Newest first */
  list(): RunRecord[] {
    return Array.from(this.records.values()).reverse().map(snapshot);
  }

  latest(category: string): RunRecord | undefined {
    return this.list().find(record => record.category === category);
  }

  state(): OverallRunState {
    const records = Array.from(this.records.values());
    const unfinished = records.filter(r => !isFinished(r));
    if (unfinished.some(r => r.startedAt !== null)) return 'running';
    if (unfinished.length > 0) return 'queued';
    return 'idle';
  }

  isBusy(): boolean {
    return this.chains.size > 0;
  }

  /**
   * Resolve once the run has finished; undefined for an unknown id.
   */
  async wait(runId: string): Promise<RunRecord | undefined> {
    await this.completions.get(runId);
    return this.get(runId);
  }

  async whenIdle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(Array.from(this.chains.values()));
    }
  }

  private async execute(record: RunRecord): Promise<void> {
    if (this.pending.get(record.category) === record) {
      this.pending.delete(record.category);
    }

    const startedAt = this.now();
    record.startedAt = startedAt;
    this.metrics?.recordRunStart();
    const stepId = debugLogger.stepStart('RUN_REGISTRY', `Run ${record.category}`, {
      runId: record.id,
      forceRefresh: record.forceRefresh
    });

    const context: RunContext = {
      runId: record.id,
      category: record.category,
      forceRefresh: record.forceRefresh,
      enter: stage => {
        if (STATE_ORDER.indexOf(stage) <= STATE_ORDER.indexOf(record.state)) {
          throw new Error(`Run ${record.id} cannot move from ${record.state} to ${stage}`);
        }
        record.state = stage;
        debugLogger.info('RUN_REGISTRY', `Stage ${stage}`, { category: record.category, runId: record.id });
      },
      degrade: reason => {
        if (!record.degraded.includes(reason)) {
          record.degraded.push(reason);
        }
      },
      count: counts => {
        record.counts = { ...record.counts, ...counts };
      },
    };

    try {
      await this.executor(context);
      const completedAt = this.now();
      record.state = 'succeeded';
      record.completedAt = completedAt;
      const durationMs = completedAt.getTime() - startedAt.getTime();

      this.metrics?.recordRunSuccess({
        category: record.category,
        durationMs,
        articlesStored: record.counts.articles,
        highlightsWritten: record.counts.highlights,
        degraded: record.degraded.length > 0,
      });
      debugLogger.stepFinish(stepId, { ...record.counts, degraded: record.degraded });

      const degradedNote = record.degraded.length > 0 ? ` [degraded: ${record.degraded.join(', ')}]` : '';
      console.log(
        `🎉 ${record.category}: ${record.counts.highlights} highlights from ` +
        `${record.counts.articles} articles (${durationMs}ms)${degradedNote}`
      );
    } catch (error) {
      record.state = 'failed';
      record.error = errorMessage(error);
      record.completedAt = this.now();

      this.metrics?.recordRunFailure(record.category, record.error);
      debugLogger.stepError(stepId, 'RUN_REGISTRY', `Run ${record.category} failed`, error);
      console.error(`❌ ${record.category} run failed: ${record.error}`);

      if (this.metrics?.isCriticalFailureState()) {
        console.error(`🚨 CRITICAL: extraction has failed ${this.metrics.getConsecutiveFailures()} times consecutively!`);
      }
    }
  }

  private trimHistory(): void {
    const finished = Array.from(this.records.values()).filter(isFinished);
    const excess = finished.length - this.maxHistory;
    for (const record of finished.slice(0, Math.max(0, excess))) {
      this.records.delete(record.id);
    }
  }
}
