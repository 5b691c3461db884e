/**
 * Realign Pipeline Stages
 *
 * Builds the fixed stage sequence of the realign workflow:
 *
 * | Stage                  | Checkpoint artifact |
 * |------------------------|---------------------|
 * | 01_candidate_intervals | peaks.bed           |
 * | 02_insert_size         | (none, always runs) |
 * | 03_realign             | ecctemp.txt         |
 * | 04_coverage            | coverage.txt        |
 * | 05_merge               | (none, always runs) |
 *
 * The coverage stage is left out when coverage is skipped, and the merge
 * stage then runs without a coverage table.
 *
 * @module stages
 */

import type { AlignmentRecordSource } from '../alignment/types.js';
import type { EngineBinaries } from '../engines/commands.js';
import type { PipelineStage } from '../pipeline/types.js';
import type { RealignRunOptions } from '../schemas/run-options.js';
import { getArtifactPath } from '../storage/paths.js';
import { createCandidateIntervalsStage } from './candidate-intervals.js';
import { createCoverageStage } from './coverage.js';
import { createInsertSizeStage } from './insert-size.js';
import { createMergeStage } from './merge.js';
import { createRealignStage } from './realign.js';

export interface RealignStageDependencies {
  binaries: EngineBinaries;
  openSource: (filePath: string) => AlignmentRecordSource;
}

/**
 * Build the realign pipeline's stages for one working directory.
 */
export function buildRealignStages(
  options: RealignRunOptions,
  workingDir: string,
  deps: RealignStageDependencies
): PipelineStage[] {
  const { inputs } = options;
  const { binaries } = deps;
  const intervalsPath = getArtifactPath(workingDir, 'intervals');
  const realignedPath = getArtifactPath(workingDir, 'realigned');
  const coveragePath = options.skipCoverage ? undefined : getArtifactPath(workingDir, 'coverage');

  const stages: PipelineStage[] = [
    createCandidateIntervalsStage({
      binaries,
      sortedBam: inputs.sortedBam,
      genome: inputs.genome,
      threads: options.threads,
      intervalsPath,
    }),
    createInsertSizeStage({
      queryNameBam: inputs.queryNameBam,
      sampleSize: options.insertSize.sampleSize,
      mapqCutoff: options.insertSize.mapqCutoff,
      openSource: deps.openSource,
    }),
    createRealignStage({
      binaries,
      intervalsPath,
      candidatesBam: inputs.candidatesBam,
      sortedBam: inputs.sortedBam,
      genome: inputs.genome,
      tuning: options.realign,
      threads: options.threads,
      realignedPath,
    }),
  ];

  if (coveragePath !== undefined) {
    stages.push(
      createCoverageStage({
        binaries,
        sortedBam: inputs.sortedBam,
        coveragePath,
      })
    );
  }

  stages.push(
    createMergeStage({
      binaries,
      realignedPath,
      genome: inputs.genome,
      coveragePath,
      thresholds: options.merge,
      output: inputs.output,
    })
  );

  return stages;
}

export { createCandidateIntervalsStage, type CandidateIntervalsStageParams } from './candidate-intervals.js';
export { createInsertSizeStage, type InsertSizeStageParams } from './insert-size.js';
export { createRealignStage, type RealignStageParams } from './realign.js';
export { createCoverageStage, type CoverageStageParams } from './coverage.js';
export { createMergeStage, type MergeStageParams } from './merge.js';
