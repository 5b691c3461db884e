/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running engine invocations
 * - Stage progress display with checkmarks
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { isValidStageName, type StageName } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Stage display status for progress tracking.
 */
export type StageStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

/**
 * Stage display information.
 */
export interface StageDisplay {
  /** Stage ID, e.g. "03_realign" */
  id: string;
  /** Current status */
  status: StageStatus;
  /** Duration in milliseconds (if completed) */
  durationMs?: number;
  /** Error message (if failed) */
  error?: string;
  /** Checkpoint artifact that caused a skip */
  artifactPath?: string;
}

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Override TTY detection */
  isTTY?: boolean;
}

export interface StageProgressOptions {
  /** Override TTY detection */
  isTTY?: boolean;
}

// ============================================================================
// Stage Labels
// ============================================================================

const STAGE_LABELS: Record<StageName, string> = {
  candidate_intervals: 'Candidate intervals',
  insert_size: 'Insert size',
  realign: 'Realign',
  coverage: 'Coverage',
  merge: 'Merge',
};

/**
 * Human-readable label for a stage ID. Unknown IDs are returned unchanged.
 * @example getStageLabel('02_insert_size') // "Insert size"
 */
export function getStageLabel(stageId: string): string {
  const name = stageId.replace(/^\d+_/, '');
  return isValidStageName(name) ? STAGE_LABELS[name] : stageId;
}

// ============================================================================
// Status Icons
// ============================================================================

const STATUS_ICONS: Record<StageStatus, string> = {
  pending: chalk.dim('\u25CB'), // ○
  running: chalk.cyan('\u25CF'), // ●
  completed: chalk.green('\u2714'), // ✔
  failed: chalk.red('\u2718'), // ✘
  skipped: chalk.yellow('\u2212'), // −
};

/**
 * Plain text icons for non-TTY output.
 */
const STATUS_ICONS_PLAIN: Record<StageStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
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
 * const spinner = new ProgressSpinner('Realigning...');
 * spinner.start();
 *
 * try {
 *   await runner.run(invocation);
 *   spinner.succeed('Realign complete');
 * } catch (err) {
 *   spinner.fail('Realign failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.isTTY ?? process.stdout.isTTY === true,
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

  stop(): this {
    this.spinner.stop();
    return this;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display pipeline stage progress with checkmarks.
 *
 * Stages are listed in the order they are first reported. The methods
 * line up with the controller callbacks, so a display can be wired in
 * directly:
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay();
 * controller.setCallbacks({
 *   onStageStart: (id) => progress.startStage(id),
 *   onStageComplete: (id, ms) => progress.completeStage(id, ms),
 *   onStageError: (id, err) => progress.failStage(id, err.message),
 *   onStageSkip: (id, artifact) => progress.skipStage(id, artifact),
 * });
 * ```
 */
export class StageProgressDisplay {
  private stages: Map<string, StageDisplay> = new Map();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor(options: StageProgressOptions = {}) {
    this.isTTY = options.isTTY ?? process.stdout.isTTY === true;
  }

  startStage(stageId: string): void {
    const stage = this.track(stageId);
    stage.status = 'running';

    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(`${getStageLabel(stageId)}...`, { isTTY: true });
      this.currentSpinner.start();
    } else {
      console.log(`[*] ${stageId}: ${getStageLabel(stageId)}...`);
    }
  }

  completeStage(stageId: string, durationMs: number): void {
    const stage = this.track(stageId);
    stage.status = 'completed';
    stage.durationMs = durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${getStageLabel(stageId)} complete`);
      this.currentSpinner = null;
    } else {
      console.log(`[+] ${stageId}: ${getStageLabel(stageId)} (${formatDuration(durationMs)})`);
    }
  }

  failStage(stageId: string, error: string): void {
    const stage = this.track(stageId);
    stage.status = 'failed';
    stage.error = error;

    if (this.currentSpinner) {
      this.currentSpinner.fail(`${getStageLabel(stageId)} failed`);
      this.currentSpinner = null;
    } else {
      console.log(`[X] ${stageId}: ${getStageLabel(stageId)} - ${error}`);
    }
  }

  skipStage(stageId: string, artifactPath?: string): void {
    const stage = this.track(stageId);
    stage.status = 'skipped';
    stage.artifactPath = artifactPath;

    if (!this.isTTY) {
      console.log(`[-] ${stageId}: ${getStageLabel(stageId)} (skipped)`);
    }
  }

  getAllStages(): StageDisplay[] {
    return Array.from(this.stages.values());
  }

  formatStageLine(stage: StageDisplay): string {
    const icon = this.isTTY ? STATUS_ICONS[stage.status] : STATUS_ICONS_PLAIN[stage.status];
    let line = `${icon} ${stage.id} ${getStageLabel(stage.id)}`;

    if (stage.durationMs !== undefined) {
      line += chalk.dim(` (${formatDuration(stage.durationMs)})`);
    }
    if (stage.artifactPath) {
      line += chalk.dim(` [checkpoint ${stage.artifactPath}]`);
    }
    if (stage.error) {
      line += chalk.red(` - ${stage.error}`);
    }

    return line;
  }

  printSummary(): void {
    console.log();
    console.log(chalk.bold('Pipeline Progress'));
    console.log(chalk.dim('─'.repeat(40)));

    for (const stage of this.getAllStages()) {
      console.log(this.formatStageLine(stage));
    }

    console.log();
  }

  private track(stageId: string): StageDisplay {
    let stage = this.stages.get(stageId);
    if (!stage) {
      stage = { id: stageId, status: 'pending' };
      this.stages.set(stageId, stage);
    }
    return stage;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
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

export function createStageProgress(options?: StageProgressOptions): StageProgressDisplay {
  return new StageProgressDisplay(options);
}
