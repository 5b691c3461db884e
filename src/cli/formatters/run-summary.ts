/**
 * Run Summary Formatters
 *
 * Terminal output for a finished realign run and for a failed one.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { InsertSizeStats } from '../../insert-size/estimator.js';
import { StageExecutionError } from '../../pipeline/controller.js';
import type { RealignWorkflowResult } from '../../workflows/realign.js';
import { formatDuration, getStageLabel } from './progress.js';

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Run Complete ===
 * Pipeline: SUCCESS
 * Duration: 2m 34s
 * Stages:   3 executed, 2 skipped
 *
 * Insert size: mean 312.40, std 41.87 (100000 pairs)
 * Working directory: /data/run1 (kept)
 * ```
 */
export function formatRunSummary(result: RealignWorkflowResult): string {
  const lines: string[] = [];
  const dryRun = result.stagesPlanned.length > 0;

  lines.push(chalk.bold(dryRun ? '=== Dry Run ===' : '=== Run Complete ==='));
  lines.push(`Pipeline: ${dryRun ? chalk.cyan('PLANNED') : chalk.green('SUCCESS')}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);

  const parts = [`${result.stagesExecuted.length} executed`, `${result.stagesSkipped.length} skipped`];
  if (dryRun) {
    parts.push(`${result.stagesPlanned.length} planned`);
  }
  lines.push(`Stages:   ${parts.join(', ')}`);
  lines.push('');

  if (result.state.insertSize) {
    lines.push(formatInsertSizeLine(result.state.insertSize));
  }
  lines.push(
    `Working directory: ${result.workingDir} (${result.workingDirRemoved ? 'removed' : 'kept'})`
  );

  return lines.join('\n');
}

/**
 * One-line description of an insert size estimate.
 * @example "Insert size: mean 320.00, std 16.33 (3 pairs)"
 */
export function formatInsertSizeLine(stats: InsertSizeStats): string {
  return `Insert size: mean ${stats.mean.toFixed(2)}, std ${stats.std.toFixed(2)} (${stats.sampleCount} pairs)`;
}

/**
 * Format per-stage timings, slowest stage first.
 */
export function formatTimingBreakdown(perStage: Record<string, number>): string {
  const entries = Object.entries(perStage).sort(([, a], [, b]) => b - a);
  if (entries.length === 0) {
    return chalk.dim('No stages executed');
  }

  const width = Math.max(...entries.map(([id]) => getStageLabel(id).length));
  return entries
    .map(([id, ms]) => `  ${getStageLabel(id).padEnd(width)}  ${formatDuration(ms)}`)
    .join('\n');
}

/**
 * Format an error raised by a run, naming the failed stage and where the
 * run's checkpoints were left.
 */
export function formatErrorSummary(error: Error, workingDir?: string): string {
  const lines: string[] = [];
  lines.push(chalk.bold(chalk.red('=== Run Failed ===')));

  if (error instanceof StageExecutionError) {
    lines.push(`Stage:   ${error.stageId} (${getStageLabel(error.stageId)})`);
    const cause = error.cause instanceof Error ? error.cause.message : error.message;
    lines.push(`Error:   ${cause}`);
  } else {
    lines.push(`Error:   ${error.message}`);
  }

  if (workingDir) {
    lines.push('');
    lines.push(chalk.dim(`Checkpoints kept in ${workingDir}; rerun with --working-dir to resume.`));
  }

  return lines.join('\n');
}
