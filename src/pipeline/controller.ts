/**
 * Pipeline Controller
 *
 * Runs an ordered list of stages strictly one after another. A stage whose
 * checkpoint artifact already exists is skipped without running its
 * action; every other stage runs and its output is merged into the run
 * state that later stages read.
 *
 * Key features:
 * - Checkpoint skip by artifact existence
 * - Run state threaded between stages in memory
 * - Dry-run mode
 * - Per-stage timing tracking
 * - Stop on first failure
 *
 * @module pipeline/controller
 */

import { getCheckpointStatus } from './checkpoint.js';
import type { PipelineStage, RunState, StageContext } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Timing information for a pipeline run
 */
export interface PipelineTiming {
  /** ISO8601 timestamp when the run started */
  startedAt: string;
  /** ISO8601 timestamp when the run completed */
  completedAt: string;
  /** Total duration in milliseconds */
  durationMs: number;
  /** Duration per executed stage in milliseconds */
  perStage: Record<string, number>;
}

/**
 * Result of a pipeline run that reached the end
 */
export interface PipelineResult {
  /** Stage IDs whose action ran */
  stagesExecuted: string[];
  /** Stage IDs skipped because their checkpoint artifact exists */
  stagesSkipped: string[];
  /** Stage IDs that would have run (dry-run only) */
  stagesPlanned: string[];
  /** The last stage ID handled */
  finalStage: string;
  /** Run state after the last stage */
  state: RunState;
  /** Timing information */
  timing: PipelineTiming;
}

/**
 * Options for a single run
 */
export interface RunOptions {
  /**
   * If true, report what would run without running any stage action.
   * Checkpoint checks still happen.
   */
  dryRun?: boolean;
}

/**
 * Callbacks for stage lifecycle events
 */
export interface ControllerCallbacks {
  /** Called when a stage starts */
  onStageStart?: (stageId: string) => void;
  /** Called when a stage completes */
  onStageComplete?: (stageId: string, durationMs: number) => void;
  /** Called when a stage fails, before the run is aborted */
  onStageError?: (stageId: string, error: Error) => void;
  /** Called when a stage is skipped because its checkpoint exists */
  onStageSkip?: (stageId: string, artifactPath: string) => void;
  /** Called for each stage that would run in dry-run mode */
  onStagePlanned?: (stageId: string) => void;
}

/**
 * A stage action failed. The run stopped at this stage.
 */
export class StageExecutionError extends Error {
  constructor(
    public readonly stageId: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Stage ${stageId} failed: ${detail}`, { cause });
    this.name = 'StageExecutionError';
  }
}

// ============================================================================
// Pipeline Controller Class
// ============================================================================

/**
 * Controller that executes stages in order with checkpoint skipping.
 *
 * @example
 * ```typescript
 * const controller = new PipelineController();
 * controller.setCallbacks({
 *   onStageSkip: (id, artifact) => console.log(`${id}: found ${artifact}`),
 * });
 *
 * const result = await controller.run(stages, {
 *   workingDir: session.path,
 *   runner: new ProcessEngineRunner(),
 * });
 * ```
 */
export class PipelineController {
  private callbacks: ControllerCallbacks = {};

  /**
   * Set event callbacks for stage lifecycle.
   *
   * @param callbacks - Callback functions for stage events
   */
  setCallbacks(callbacks: ControllerCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Run the stages in the given order.
   *
   * @param stages - Ordered stage list
   * @param context - Working directory, engine runner, logger
   * @param options - Run options (dryRun)
   * @returns Result describing what ran and what was skipped
   * @throws Error if two stages share an ID
   * @throws StageExecutionError when a stage action fails; later stages
   *   are not run
   */
  async run(
    stages: readonly PipelineStage[],
    context: StageContext,
    options?: RunOptions
  ): Promise<PipelineResult> {
    this.validateStages(stages);

    const startedAt = new Date().toISOString();
    const startMs = Date.now();
    const perStage: Record<string, number> = {};
    const executed: string[] = [];
    const skipped: string[] = [];
    const planned: string[] = [];
    const state: RunState = {};
    const logger = context.logger;

    let finalStage = '';

    for (const stage of stages) {
      const status = await getCheckpointStatus(stage);

      if (status.kind === 'completed') {
        logger?.info(`Skipping ${stage.id}: checkpoint ${status.artifactPath} exists`);
        skipped.push(stage.id);
        finalStage = stage.id;
        this.callbacks.onStageSkip?.(stage.id, status.artifactPath);
        continue;
      }

      // Dry run - just record what would happen
      if (options?.dryRun) {
        logger?.info(`Would run ${stage.id}`);
        planned.push(stage.id);
        finalStage = stage.id;
        this.callbacks.onStagePlanned?.(stage.id);
        continue;
      }

      const stageStart = Date.now();
      logger?.debug(`Starting ${stage.id}`);
      this.callbacks.onStageStart?.(stage.id);

      try {
        const output = await stage.run(context, state);
        Object.assign(state, output);
      } catch (error) {
        perStage[stage.id] = Date.now() - stageStart;
        const err = error instanceof Error ? error : new Error(String(error));
        logger?.error(`${stage.id} failed: ${err.message}`);
        this.callbacks.onStageError?.(stage.id, err);
        throw new StageExecutionError(stage.id, error);
      }

      const durationMs = Date.now() - stageStart;
      perStage[stage.id] = durationMs;
      executed.push(stage.id);
      finalStage = stage.id;
      this.callbacks.onStageComplete?.(stage.id, durationMs);
    }

    return {
      stagesExecuted: executed,
      stagesSkipped: skipped,
      stagesPlanned: planned,
      finalStage,
      state,
      timing: {
        startedAt,
        completedAt: new Date().toISOString(),
        durationMs: Date.now() - startMs,
        perStage,
      },
    };
  }

  /**
   * Reject stage lists with duplicate IDs.
   *
   * @throws Error naming the duplicated ID
   */
  private validateStages(stages: readonly PipelineStage[]): void {
    const seen = new Set<string>();
    for (const stage of stages) {
      if (seen.has(stage.id)) {
        throw new Error(`Stage ${stage.id} appears more than once in the pipeline`);
      }
      seen.add(stage.id);
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new PipelineController instance.
 */
export function createPipelineController(): PipelineController {
  return new PipelineController();
}
