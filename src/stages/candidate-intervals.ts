/**
 * Candidate Intervals Stage (Stage 01)
 *
 * Calls candidate circular DNA intervals from the coordinate-sorted
 * alignments with the interval-calling engine.
 *
 * **Checkpoint Contract**: `peaks.bed` in the working directory. When it
 * exists the stage is skipped.
 *
 * @module stages/candidate-intervals
 */

import { buildIntervalCallInvocation, type EngineBinaries } from '../engines/commands.js';
import { buildStageId, type PipelineStage } from '../pipeline/types.js';

export interface CandidateIntervalsStageParams {
  binaries: EngineBinaries;
  sortedBam: string;
  genome: string;
  threads: number;
  /** Interval file to produce (the checkpoint artifact) */
  intervalsPath: string;
}

export function createCandidateIntervalsStage(params: CandidateIntervalsStageParams): PipelineStage {
  return {
    id: buildStageId('candidate_intervals'),
    name: 'candidate_intervals',
    checkpointArtifactPath: params.intervalsPath,

    async run(context) {
      context.logger?.info('[intervals] Calling candidate intervals');
      await context.runner.run(
        buildIntervalCallInvocation(params.binaries, {
          sortedBam: params.sortedBam,
          genome: params.genome,
          output: params.intervalsPath,
          threads: params.threads,
        })
      );
      return {};
    },
  };
}
