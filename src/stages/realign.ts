/**
 * Realign Stage (Stage 03)
 *
 * Realigns candidate reads over the called intervals. Needs the insert
 * size distribution produced earlier in the same run.
 *
 * **Checkpoint Contract**: `ecctemp.txt` in the working directory.
 *
 * @module stages/realign
 */

import { buildRealignInvocation, type EngineBinaries } from '../engines/commands.js';
import { buildStageId, type PipelineStage } from '../pipeline/types.js';
import type { RealignTuning } from '../schemas/run-options.js';

export interface RealignStageParams {
  binaries: EngineBinaries;
  intervalsPath: string;
  candidatesBam: string;
  sortedBam: string;
  genome: string;
  tuning: RealignTuning;
  threads: number;
  /** Realignment result to produce (the checkpoint artifact) */
  realignedPath: string;
}

export function createRealignStage(params: RealignStageParams): PipelineStage {
  return {
    id: buildStageId('realign'),
    name: 'realign',
    checkpointArtifactPath: params.realignedPath,

    async run(context, state) {
      const insertSize = state.insertSize;
      if (!insertSize) {
        throw new Error('Insert size distribution is not available; the insert_size stage must run first');
      }

      context.logger?.info(
        `[realign] Realigning candidate reads (insert size ${insertSize.mean.toFixed(2)} ± ${insertSize.std.toFixed(2)})`
      );
      await context.runner.run(
        buildRealignInvocation(params.binaries, {
          intervals: params.intervalsPath,
          candidatesBam: params.candidatesBam,
          sortedBam: params.sortedBam,
          genome: params.genome,
          insertSize: { mean: insertSize.mean, std: insertSize.std },
          tuning: params.tuning,
          threads: params.threads,
          output: params.realignedPath,
        })
      );
      return {};
    },
  };
}
