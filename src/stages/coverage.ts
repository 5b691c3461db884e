/**
 * Coverage Stage (Stage 04)
 *
 * Writes a per-base coverage table of the coordinate-sorted alignments.
 *
 * **Checkpoint Contract**: `coverage.txt` in the working directory.
 *
 * @module stages/coverage
 */

import { buildCoverageInvocation, type EngineBinaries } from '../engines/commands.js';
import { buildStageId, type PipelineStage } from '../pipeline/types.js';

export interface CoverageStageParams {
  binaries: EngineBinaries;
  sortedBam: string;
  /** Coverage table to produce (the checkpoint artifact) */
  coveragePath: string;
}

export function createCoverageStage(params: CoverageStageParams): PipelineStage {
  return {
    id: buildStageId('coverage'),
    name: 'coverage',
    checkpointArtifactPath: params.coveragePath,

    async run(context) {
      context.logger?.info('[coverage] Computing per-base coverage');
      await context.runner.run(
        buildCoverageInvocation(params.binaries, {
          sortedBam: params.sortedBam,
          output: params.coveragePath,
        })
      );
      return {};
    },
  };
}
