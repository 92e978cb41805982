/**
 * Debug Logger - colored, step-timed pipeline logging
 *
 * Enabled by DEBUG=true (or DEBUG=1), or by `setEnabled` from config.
 * A stage is bracketed by `stepStart` and `stepFinish`/`stepError` so a run
 * can be followed from fetch to index.
 */

import chalk from 'chalk';

type LogData = Record<string, unknown>;

export type LogCategory =
  | 'CHAT'
  | 'PIPELINE'
  | 'RUN_REGISTRY'
  | 'CLUSTER'
  | 'RANK'
  | 'INDEX'
  | 'RSS'
  | 'INGESTION_FILTER'
  | 'EMBED'
  | 'STORE'
  | 'LLM'
  | 'SCHEDULER'
  | 'CONFIG'
  | 'CONCURRENCY';

const labelStyles: Record<LogCategory, chalk.Chalk> = {
  CHAT: chalk.bgGreen.black.bold,
  PIPELINE: chalk.bgMagenta.white.bold,
  RUN_REGISTRY: chalk.bgMagenta.white.bold,
  CLUSTER: chalk.bgBlue.white.bold,
  RANK: chalk.bgCyan.black.bold,
  INDEX: chalk.bgYellow.black.bold,
  RSS: chalk.bgCyan.black.bold,
  INGESTION_FILTER: chalk.bgCyan.black.bold,
  EMBED: chalk.bgBlue.white.bold,
  STORE: chalk.bgGreen.black.bold,
  LLM: chalk.bgRed.white.bold,
  SCHEDULER: chalk.bgWhite.black.bold,
  CONFIG: chalk.bgWhite.black.bold,
  CONCURRENCY: chalk.bgWhite.black.bold,
};

interface OpenStep {
  category: LogCategory;
  description: string;
  startedAt: number;
}

function label(category: LogCategory): string {
  return labelStyles[category](` ${category} `);
}

function details(data: LogData | undefined): string {
  if (!data || Object.keys(data).length === 0) return '';
  return chalk.dim(` │ ${JSON.stringify(data)}`);
}

function elapsed(ms: number): string {
  const color = ms > 1000 ? chalk.yellow : ms > 500 ? chalk.cyan : chalk.green;
  return color(`(${ms}ms)`);
}

class DebugLogger {
  private enabled = process.env.DEBUG === 'true' || process.env.DEBUG === '1';
  private readonly open = new Map<string, OpenStep>();
  private sequence = 0;

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * @returns id to close the step with, empty when debug is off
   */
  stepStart(category: LogCategory, description: string, metadata?: LogData): string {
    if (!this.enabled) return '';

    const stepId = `${category}_${++this.sequence}`;
    this.open.set(stepId, { category, description, startedAt: Date.now() });
    this.emit(chalk.cyan('▶'), category, chalk.white(description), metadata);
    return stepId;
  }

  stepFinish(stepId: string, result?: LogData): void {
    if (!this.enabled || !stepId) return;

    const step = this.close(stepId);
    if (!step) {
      console.warn(chalk.yellow(`⚠ Unknown step: ${stepId}`));
      return;
    }
    this.emit(chalk.green('✓'), step.category, `${chalk.white(step.description)} ${elapsed(Date.now() - step.startedAt)}`, result);
  }

  stepError(stepId: string, category: LogCategory, description: string, error: unknown): void {
    if (!this.enabled) return;

    const step = stepId ? this.close(stepId) : undefined;
    const duration = step ? chalk.dim(` (${Date.now() - step.startedAt}ms)`) : '';
    const message = error instanceof Error ? error.message : String(error);
    this.emit(chalk.red('✗'), step?.category ?? category, `${chalk.white(description)}${duration} ${chalk.red('│')} ${chalk.red(message)}`);

    const frame = error instanceof Error ? error.stack?.split('\n')[1]?.trim() : undefined;
    if (frame) {
      console.log(chalk.dim(`  └─ ${frame}`));
    }
  }

  info(category: LogCategory, message: string, data?: LogData): void {
    if (this.enabled) this.emit(chalk.blue('ℹ'), category, chalk.white(message), data);
  }

  warn(category: LogCategory, message: string, data?: LogData): void {
    if (this.enabled) this.emit(chalk.yellow('⚠'), category, chalk.yellow(message), data);
  }

  private close(stepId: string): OpenStep | undefined {
    const step = this.open.get(stepId);
    this.open.delete(stepId);
    return step;
  }

  private emit(marker: string, category: LogCategory, text: string, data?: LogData): void {
    console.log(`${marker} ${label(category)} ${text}${details(data)}`);
  }
}

export const debugLogger = new DebugLogger();
