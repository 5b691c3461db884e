/**
 * Engine Command Builders
 *
 * Pure functions from typed parameters to engine invocations. Values are
 * passed through to the engines untouched; the engines own their meaning.
 *
 * @module engines/commands
 */

import type { InsertSizeStats } from '../insert-size/estimator.js';
import type { MergeThresholds, RealignTuning } from '../schemas/run-options.js';
import type { EngineInvocation, EngineName } from './types.js';

// ============================================================================
// Parameter Types
// ============================================================================

/**
 * Executable per engine
 */
export type EngineBinaries = Record<EngineName, string>;

export interface IntervalCallParams {
  sortedBam: string;
  genome: string;
  output: string;
  threads: number;
}

export interface RealignParams {
  intervals: string;
  candidatesBam: string;
  sortedBam: string;
  genome: string;
  insertSize: Pick<InsertSizeStats, 'mean' | 'std'>;
  tuning: RealignTuning;
  threads: number;
  output: string;
}

export interface CoverageParams {
  sortedBam: string;
  output: string;
}

export interface MergeParams {
  realigned: string;
  genome: string;
  /** Coverage table; absent when coverage was skipped */
  coverage?: string;
  thresholds: MergeThresholds;
  output: string;
}

export interface ExtractParams {
  input: string;
  output: string;
  mappingQuality: number;
  includeDiscordants: boolean;
  includeSoftClipped: boolean;
  includeHardClipped: boolean;
  cwd?: string;
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Candidate interval calling: coordinate-sorted BAM + reference -> BED.
 */
export function buildIntervalCallInvocation(
  binaries: EngineBinaries,
  params: IntervalCallParams
): EngineInvocation {
  return {
    engine: 'intervals',
    command: binaries.intervals,
    args: [
      'call',
      '--bam', params.sortedBam,
      '--genome', params.genome,
      '--output', params.output,
      '--threads', String(params.threads),
    ],
  };
}

/**
 * Realignment of candidate reads over the called intervals.
 */
export function buildRealignInvocation(
  binaries: EngineBinaries,
  params: RealignParams
): EngineInvocation {
  const { tuning } = params;
  return {
    engine: 'realign',
    command: binaries.realign,
    args: [
      'realign',
      '--intervals', params.intervals,
      '--candidates', params.candidatesBam,
      '--bam', params.sortedBam,
      '--genome', params.genome,
      '--insert-mean', String(params.insertSize.mean),
      '--insert-std', String(params.insertSize.std),
      '--std-multiplier', String(tuning.stdMultiplier),
      '--mapq', String(tuning.mappingQuality),
      '--interval-probability', String(tuning.intervalProbability),
      '--edit-distance-fraction', String(tuning.editDistanceFraction),
      '--min-soft-clip', String(tuning.minSoftClipLength),
      '--max-alignments', String(tuning.maxAlignments),
      '--gap-open', String(tuning.gapOpen),
      '--gap-extend', String(tuning.gapExtend),
      '--alignment-probability', String(tuning.alignmentProbability),
      '--threads', String(params.threads),
      '--output', params.output,
    ],
  };
}

/**
 * Per-base coverage table (`samtools depth -a` by default), written from
 * the engine's stdout.
 */
export function buildCoverageInvocation(
  binaries: EngineBinaries,
  params: CoverageParams
): EngineInvocation {
  return {
    engine: 'coverage',
    command: binaries.coverage,
    args: ['depth', '-a', params.sortedBam],
    stdoutPath: params.output,
  };
}

/**
 * Final merge and report.
 */
export function buildMergeInvocation(
  binaries: EngineBinaries,
  params: MergeParams
): EngineInvocation {
  const { thresholds } = params;
  const coverageArgs = params.coverage ? ['--coverage', params.coverage] : ['--no-coverage'];

  return {
    engine: 'merge',
    command: binaries.merge,
    args: [
      'merge',
      '--realigned', params.realigned,
      '--genome', params.genome,
      ...coverageArgs,
      '--allele-frequency', String(thresholds.alleleFrequency),
      '--discordant-reads', String(thresholds.discordantReads),
      '--split-reads', String(thresholds.splitReads),
      '--split-quality', String(thresholds.splitQuality),
      '--merge-fraction', String(thresholds.mergeFraction),
      '--extension', String(thresholds.extension),
      '--bases', String(thresholds.bases),
      '--coverage-ratio', String(thresholds.coverageRatio),
      '--output', params.output,
    ],
  };
}

/**
 * Candidate read classification and extraction.
 */
export function buildExtractInvocation(
  binaries: EngineBinaries,
  params: ExtractParams
): EngineInvocation {
  const args = [
    'extract',
    '--bam', params.input,
    '--output', params.output,
    '--mapq', String(params.mappingQuality),
  ];
  if (!params.includeDiscordants) args.push('--no-discordants');
  if (!params.includeSoftClipped) args.push('--no-soft-clipped');
  if (!params.includeHardClipped) args.push('--no-hard-clipped');

  return {
    engine: 'extract',
    command: binaries.extract,
    args,
    cwd: params.cwd,
  };
}
