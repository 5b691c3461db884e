/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  createSpinner,
  createStageProgress,
  formatDuration,
  getStageLabel,
  type StageStatus,
  type StageDisplay,
  type SpinnerOptions,
  type StageProgressOptions,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatInsertSizeLine,
  formatTimingBreakdown,
  formatErrorSummary,
} from './run-summary.js';
