/**
 * Pipeline Infrastructure
 *
 * Stage execution framework for the checkpointed realign pipeline.
 * Provides stage interfaces, execution context, checkpoint checks and the
 * controller.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  // Stage number and name types
  type StageNumber,
  type StageName,
  STAGE_NUMBERS,

  // Core interfaces
  type Logger,
  type StageContext,
  type RunState,
  type PipelineStage,
  type CheckpointStatus,

  // Helper functions
  formatStageNumber,
  buildStageId,
  isValidStageName,
} from './types.js';

// Checkpoint checks
export { getCheckpointStatus } from './checkpoint.js';

// Controller
export {
  PipelineController,
  StageExecutionError,
  createPipelineController,
  type PipelineResult,
  type PipelineTiming,
  type RunOptions,
  type ControllerCallbacks,
} from './controller.js';
