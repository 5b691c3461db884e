/**
 * Pipeline Type Definitions
 *
 * Core interfaces for the checkpointed stage pipeline: stage descriptors,
 * the execution context, the in-memory run state threaded between stages,
 * and checkpoint status.
 *
 * @module pipeline/types
 */

import type { EngineRunner } from '../engines/types.js';
import type { InsertSizeStats } from '../insert-size/estimator.js';

// ============================================================================
// Stage Numbers and Names
// ============================================================================

/**
 * Stage numbering:
 * - 01: Candidate intervals
 * - 02: Insert size
 * - 03: Realign
 * - 04: Coverage
 * - 05: Merge
 */
export type StageNumber = 1 | 2 | 3 | 4 | 5;

export type StageName = 'candidate_intervals' | 'insert_size' | 'realign' | 'coverage' | 'merge';

export const STAGE_NUMBERS: Record<StageName, StageNumber> = {
  candidate_intervals: 1,
  insert_size: 2,
  realign: 3,
  coverage: 4,
  merge: 5,
} as const;

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Context and Run State
// ============================================================================

/**
 * Runtime context passed to each stage.
 */
export interface StageContext {
  /** Absolute path of the run's working directory */
  workingDir: string;

  /** Runs external engines */
  runner: EngineRunner;

  /** Optional logger for stage output */
  logger?: Logger;
}

/**
 * Values produced by one stage for a later one. Held in controller memory
 * for a single run and never written to disk.
 */
export interface RunState {
  /** Insert size distribution, consumed by the realign stage */
  insertSize?: InsertSizeStats;
}

// ============================================================================
// Stage Interface
// ============================================================================

/**
 * A unit of pipeline work.
 *
 * When `checkpointArtifactPath` is set and something exists at that path,
 * the stage counts as done and is skipped. A stage without an artifact
 * always runs.
 */
export interface PipelineStage {
  /**
   * Stage identifier in format NN_stage_name.
   * @example "03_realign"
   */
  id: string;

  /** Human-readable stage name */
  name: StageName;

  /** Artifact whose existence marks the stage as complete */
  checkpointArtifactPath?: string;

  /**
   * Perform the stage.
   *
   * @param context - Working directory, engine runner, logger
   * @param state - Values produced by earlier stages of this run
   * @returns Values to merge into the run state
   */
  run(context: StageContext, state: Readonly<RunState>): Promise<Partial<RunState>>;
}

// ============================================================================
// Checkpoint Status
// ============================================================================

/**
 * Completion status of a stage as read from disk.
 */
export type CheckpointStatus =
  | { readonly kind: 'not_started' }
  | { readonly kind: 'completed'; readonly artifactPath: string };

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a stage number as a two-digit string with leading zero.
 * @example formatStageNumber(3) // "03"
 */
export function formatStageNumber(num: number): string {
  return num.toString().padStart(2, '0');
}

/**
 * Build a stage ID from its name.
 * @example buildStageId('realign') // "03_realign"
 */
export function buildStageId(name: StageName): string {
  return `${formatStageNumber(STAGE_NUMBERS[name])}_${name}`;
}

/**
 * Type guard for stage names.
 */
export function isValidStageName(value: string): value is StageName {
  return Object.prototype.hasOwnProperty.call(STAGE_NUMBERS, value);
}
