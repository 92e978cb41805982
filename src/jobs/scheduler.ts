/**
 * Background extraction scheduler using node-cron
 */

import * as cron from 'node-cron';
import { RunRegistry } from './run-registry';
import { debugLogger } from '../utils/debug-logger';

export interface SchedulerStatus {
  isRunning: boolean;
  cronExpression: string | null;
  isJobCurrentlyExecuting: boolean;
}

export class ExtractionScheduler {
  private scheduledTask: cron.ScheduledTask | null = null;

  constructor(
    private readonly registry: RunRegistry,
    private readonly categories: string[],
    private readonly cronExpression: string | null
  ) {}

  /**
   * Submit a run for every category. Categories that already have a run
   * waiting to start are coalesced by the registry.
   */
  submitAll(): void {
    debugLogger.info('SCHEDULER', 'Submitting scheduled runs', { categories: this.categories });
    for (const category of this.categories) {
      this.registry.submit(category);
    }
  }

  start(options: { runImmediately?: boolean } = {}): void {
    if (this.scheduledTask) {
      console.warn('Extraction scheduler is already running');
      return;
    }
    if (!this.cronExpression) {
      console.log('⏸️  Scheduled extraction disabled (EXTRACTION_CRON=off)');
      return;
    }
    if (!cron.validate(this.cronExpression)) {
      throw new Error(`Invalid cron expression: ${this.cronExpression}`);
    }

    this.scheduledTask = cron.schedule(this.cronExpression, () => {
      this.submitAll();
    });

    console.log(`🤖 Extraction scheduler started (${this.cronExpression})`);

    // Don't wait for the first cron tick
    if (options.runImmediately ?? true) {
      this.submitAll();
    }
  }

  stop(): void {
    if (!this.scheduledTask) return;
    this.scheduledTask.stop();
    this.scheduledTask = null;
    console.log('Extraction scheduler stopped');
  }

  /**
   * Stop scheduling and wait for in-flight runs, up to `maxWaitMs`.
   */
  async gracefulShutdown(maxWaitMs = 30000): Promise<void> {
    console.log('Stopping extraction scheduler...');
    this.stop();

    const startWait = Date.now();
    while (this.registry.isBusy() && Date.now() - startWait < maxWaitMs) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    if (this.registry.isBusy()) {
      console.warn('Extraction runs did not finish within timeout period');
    } else {
      console.log('Extraction scheduler shut down gracefully');
    }
  }

  getStatus(): SchedulerStatus {
    return {
      isRunning: this.scheduledTask !== null,
      cronExpression: this.cronExpression,
      isJobCurrentlyExecuting: this.registry.isBusy(),
    };
  }
}
