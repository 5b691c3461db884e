/**
 * Merge Stage (Stage 05)
 *
 * Merges realigned evidence into the final report at the user's output
 * path. Without a coverage table the engine is asked for its
 * coverage-free variant.
 *
 * **Checkpoint Contract**: none; the merge is fast and always reruns.
 *
 * @module stages/merge
 */

import { buildMergeInvocation, type EngineBinaries } from '../engines/commands.js';
import { buildStageId, type PipelineStage } from '../pipeline/types.js';
import type { MergeThresholds } from '../schemas/run-options.js';

export interface MergeStageParams {
  binaries: EngineBinaries;
  realignedPath: string;
  genome: string;
  /** Coverage table; omit to merge without coverage */
  coveragePath?: string;
  thresholds: MergeThresholds;
  output: string;
}

export function createMergeStage(params: MergeStageParams): PipelineStage {
  return {
    id: buildStageId('merge'),
    name: 'merge',

    async run(context) {
      context.logger?.info(
        `[merge] Writing report to ${params.output}${params.coveragePath ? '' : ' (coverage skipped)'}`
      );
      await context.runner.run(
        buildMergeInvocation(params.binaries, {
          realigned: params.realignedPath,
          genome: params.genome,
          coverage: params.coveragePath,
          thresholds: params.thresholds,
          output: params.output,
        })
      );
      return {};
    },
  };
}
