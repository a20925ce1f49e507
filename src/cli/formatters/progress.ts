/**
 * Progress Formatters
 *
 * CLI progress display utilities:
 * - Spinner for long-running operations
 * - Stage progress display with checkmarks
 *
 * Uses the ora library for terminal spinners. Outside a TTY every stage
 * transition is one plain status line.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { VALID_STAGE_NUMBERS, getStageId } from '../../pipeline/dependencies.js';
import type { StageNumber } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export type StageStatus = 'pending' | 'running' | 'completed' | 'cached' | 'failed' | 'skipped';

export interface StageDisplay {
  number: StageNumber;
  /** Stage ID (e.g., "02_dependencies") */
  id: string;
  status: StageStatus;
  durationMs?: number;
  error?: string;
}

export interface SpinnerOptions {
  text?: string;
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
}

// ============================================================================
// Stage Labels
// ============================================================================

export const STAGE_LABELS: Record<StageNumber, string> = {
  0: 'Base image',
  1: 'OS packages',
  2: 'Dependencies',
  3: 'Source',
  4: 'Runtime config',
};

// ============================================================================
// Status Icons
// ============================================================================

const STATUS_ICONS: Record<StageStatus, string> = {
  pending: chalk.dim('○'),
  running: chalk.cyan('●'),
  completed: chalk.green('✔'),
  cached: chalk.blue('↺'),
  failed: chalk.red('✘'),
  skipped: chalk.yellow('−'),
};

const STATUS_ICONS_PLAIN: Record<StageStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
  cached: '[=]',
  failed: '[X]',
  skipped: '[-]',
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Clearing layer cache...').start();
 * const removed = await cache.clear();
 * spinner.succeed(`Removed ${removed} layers`);
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  info(text?: string): this {
    this.spinner.info(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display pipeline stage progress with checkmarks.
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay();
 * progress.startStage(0);
 * progress.cacheStage(0);
 * progress.startStage(1);
 * progress.failStage(1, 'No such OS package: gdal-bin');
 * ```
 */
export class StageProgressDisplay {
  private stages: Map<StageNumber, StageDisplay> = new Map();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor(options: { tty?: boolean } = {}) {
    this.isTTY = options.tty ?? process.stdout.isTTY === true;

    for (const num of VALID_STAGE_NUMBERS) {
      this.stages.set(num, { number: num, id: getStageId(num), status: 'pending' });
    }
  }

  startStage(stageNumber: StageNumber): void {
    const stage = this.stages.get(stageNumber);
    if (!stage) return;
    stage.status = 'running';

    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(`${STAGE_LABELS[stageNumber]}...`).start();
    } else {
      console.log(`[*] ${stage.id}: ${STAGE_LABELS[stageNumber]}...`);
    }
  }

  completeStage(stageNumber: StageNumber, durationMs: number): void {
    const stage = this.stages.get(stageNumber);
    if (!stage) return;
    stage.status = 'completed';
    stage.durationMs = durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${STAGE_LABELS[stageNumber]} complete`);
      this.currentSpinner = null;
    } else {
      console.log(`[+] ${stage.id}: ${STAGE_LABELS[stageNumber]} (${formatDuration(durationMs)})`);
    }
  }

  /**
   * Mark a stage as served from the layer cache.
   */
  cacheStage(stageNumber: StageNumber): void {
    const stage = this.stages.get(stageNumber);
    if (!stage) return;
    stage.status = 'cached';

    if (this.currentSpinner) {
      this.currentSpinner.info(`${STAGE_LABELS[stageNumber]} (cached)`);
      this.currentSpinner = null;
    } else {
      console.log(`[=] ${stage.id}: ${STAGE_LABELS[stageNumber]} (cached)`);
    }
  }

  failStage(stageNumber: StageNumber, error: string): void {
    const stage = this.stages.get(stageNumber);
    if (!stage) return;
    stage.status = 'failed';
    stage.error = error;

    if (this.currentSpinner) {
      this.currentSpinner.fail(`${STAGE_LABELS[stageNumber]} failed`);
      this.currentSpinner = null;
    } else {
      console.log(`[X] ${stage.id}: ${STAGE_LABELS[stageNumber]} - ${error}`);
    }
  }

  /**
   * Mark every stage still pending as skipped (after a failure or the stop
   * point).
   */
  skipRemaining(): void {
    for (const stage of this.stages.values()) {
      if (stage.status === 'pending') {
        stage.status = 'skipped';
      }
    }
  }

  getStageDisplay(stageNumber: StageNumber): StageDisplay | undefined {
    return this.stages.get(stageNumber);
  }

  getAllStages(): StageDisplay[] {
    return Array.from(this.stages.values());
  }

  formatStageLine(stage: StageDisplay): string {
    const icon = this.isTTY ? STATUS_ICONS[stage.status] : STATUS_ICONS_PLAIN[stage.status];
    let line = `${icon} ${stage.id}`;

    if (stage.durationMs !== undefined) {
      line += chalk.dim(` (${formatDuration(stage.durationMs)})`);
    }
    if (stage.error) {
      line += chalk.red(` - ${stage.error}`);
    }
    return line;
  }

  getCounts(): Record<StageStatus, number> {
    const counts: Record<StageStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      cached: 0,
      failed: 0,
      skipped: 0,
    };

    for (const stage of this.stages.values()) {
      counts[stage.status]++;
    }
    return counts;
  }

  isSuccess(): boolean {
    return !this.getAllStages().some((stage) => stage.status === 'failed');
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds.
 *
 * @example
 * formatDuration(850);    // '850ms'
 * formatDuration(12_340); // '12.3s'
 * formatDuration(95_000); // '1m 35s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}

export function createStageProgress(options?: { tty?: boolean }): StageProgressDisplay {
  return new StageProgressDisplay(options);
}
