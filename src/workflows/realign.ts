/**
 * Realign Workflow
 *
 * End-to-end realign run: open the working directory, run the five
 * stages through the controller, and tear the directory down after a
 * successful run. A failed run leaves the directory and its checkpoint
 * artifacts in place so the same command can resume it.
 *
 * @module workflows/realign
 */

import type { AlignmentRecordSource } from '../alignment/types.js';
import type { EngineBinaries } from '../engines/commands.js';
import type { EngineRunner } from '../engines/types.js';
import { createPipelineController, type PipelineController, type PipelineResult } from '../pipeline/controller.js';
import type { Logger } from '../pipeline/types.js';
import type { RealignRunOptions } from '../schemas/run-options.js';
import { buildRealignStages } from '../stages/index.js';
import { openWorkingDirectory, type OpenWorkingDirectoryOptions } from '../storage/workdir.js';

export interface RealignWorkflowDependencies {
  runner: EngineRunner;
  binaries: EngineBinaries;
  openSource: (filePath: string) => AlignmentRecordSource;
  logger?: Logger;
  /** Controller to run the stages with; callbacks set on it are kept */
  controller?: PipelineController;
  /** Where the implicit working directory is derived from */
  workdir?: OpenWorkingDirectoryOptions;
}

export interface RealignWorkflowResult extends PipelineResult {
  workingDir: string;
  /** True if the working directory was deleted at the end of the run */
  workingDirRemoved: boolean;
}

/**
 * Run the realign pipeline.
 *
 * @throws StageExecutionError when a stage fails
 * @throws WorkingDirectoryError when the directory cannot be created or removed
 */
export async function runRealignPipeline(
  options: RealignRunOptions,
  deps: RealignWorkflowDependencies
): Promise<RealignWorkflowResult> {
  const session = await openWorkingDirectory(options.inputs.workingDir, deps.workdir);
  deps.logger?.debug(
    `Working directory ${session.path} (${session.ownsDirectory ? 'temporary' : 'kept after the run'})`
  );

  const stages = buildRealignStages(options, session.path, {
    binaries: deps.binaries,
    openSource: deps.openSource,
  });
  const controller = deps.controller ?? createPipelineController();

  const result = await controller.run(
    stages,
    { workingDir: session.path, runner: deps.runner, logger: deps.logger },
    { dryRun: options.dryRun }
  );

  const workingDirRemoved = await session.close();
  return { ...result, workingDir: session.path, workingDirRemoved };
}
