/**
 * Realign Command
 *
 * Runs the full pipeline: candidate intervals, insert size estimation,
 * realignment, coverage and merge. Stages whose checkpoint artifact
 * already exists in the working directory are skipped, so rerunning the
 * command with the same --working-dir resumes a failed run.
 *
 * @module cli/commands/realign
 */

import { Command } from 'commander';
import { openAlignmentSource } from '../../alignment/source.js';
import { config } from '../../config/index.js';
import { createPipelineController } from '../../pipeline/controller.js';
import {
  RealignRunOptionsSchema,
  type RealignRunOptions,
  type RealignRunOptionsInput,
} from '../../schemas/run-options.js';
import { getImplicitWorkingDir } from '../../storage/paths.js';
import {
  runRealignPipeline,
  type RealignWorkflowDependencies,
  type RealignWorkflowResult,
} from '../../workflows/realign.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand } from '../base-command.js';
import { createStageProgress } from '../formatters/progress.js';
import { formatErrorSummary, formatRunSummary, formatTimingBreakdown } from '../formatters/run-summary.js';
import { createCommandRunner, describeError, exitCodeFor, parseInteger, parseNumber } from './shared.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the realign command, as commander hands them over.
 */
export interface RealignCommandOptions {
  sortedBam: string;
  qnameBam: string;
  candidates: string;
  genome: string;
  output: string;
  workingDir?: string;
  threads?: number;
  sampleSize?: number;
  insertMapq?: number;
  stdMultiplier?: number;
  mapq?: number;
  intervalProbability?: number;
  editDistanceFraction?: number;
  minSoftClip?: number;
  maxAlignments?: number;
  gapOpen?: number;
  gapExtend?: number;
  alignmentProbability?: number;
  alleleFrequency?: number;
  discordantReads?: number;
  splitReads?: number;
  splitQuality?: number;
  mergeFraction?: number;
  extension?: number;
  bases?: number;
  coverageRatio?: number;
  /** commander inverts --no-coverage to coverage: false */
  coverage: boolean;
  ignoreEngineStatus?: boolean;
  dryRun?: boolean;
}

// ============================================================================
// Option Mapping
// ============================================================================

/**
 * Map command options onto the run options schema input. Unset numeric
 * options stay undefined and take their schema defaults.
 */
export function toRealignRunOptionsInput(options: RealignCommandOptions): RealignRunOptionsInput {
  return {
    inputs: {
      sortedBam: options.sortedBam,
      queryNameBam: options.qnameBam,
      candidatesBam: options.candidates,
      genome: options.genome,
      output: options.output,
      workingDir: options.workingDir,
    },
    threads: options.threads,
    insertSize: {
      sampleSize: options.sampleSize,
      mapqCutoff: options.insertMapq,
    },
    realign: {
      stdMultiplier: options.stdMultiplier,
      mappingQuality: options.mapq,
      intervalProbability: options.intervalProbability,
      editDistanceFraction: options.editDistanceFraction,
      minSoftClipLength: options.minSoftClip,
      maxAlignments: options.maxAlignments,
      gapOpen: options.gapOpen,
      gapExtend: options.gapExtend,
      alignmentProbability: options.alignmentProbability,
    },
    merge: {
      alleleFrequency: options.alleleFrequency,
      discordantReads: options.discordantReads,
      splitReads: options.splitReads,
      splitQuality: options.splitQuality,
      mergeFraction: options.mergeFraction,
      extension: options.extension,
      bases: options.bases,
      coverageRatio: options.coverageRatio,
    },
    skipCoverage: !options.coverage,
    ignoreEngineStatus: options.ignoreEngineStatus ?? false,
    dryRun: options.dryRun ?? false,
  };
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the realign command.
 *
 * @param program - Root program
 */
export function registerRealignCommand(program: Command): void {
  program
    .command('realign')
    .description('Detect circular DNA candidates by realigning reads over called intervals')
    .requiredOption('-s, --sorted-bam <path>', 'Coordinate-sorted alignments')
    .requiredOption('-n, --qname-bam <path>', 'Query-name-sorted alignments')
    .requiredOption('-c, --candidates <path>', 'Candidate reads from extract')
    .requiredOption('-g, --genome <path>', 'Reference genome FASTA')
    .requiredOption('-o, --output <path>', 'Output report path')
    .option('-w, --working-dir <path>', 'Working directory (kept after the run; enables resume)')
    .option('-t, --threads <count>', 'Threads passed to the engines', parseInteger)
    .option('--sample-size <count>', 'Read pairs sampled for the insert size', parseInteger)
    .option('--insert-mapq <quality>', 'Minimum mapping quality for insert size pairs', parseNumber)
    .option('--std-multiplier <n>', 'Insert size standard deviations allowed', parseNumber)
    .option('--mapq <quality>', 'Minimum mapping quality for realignment', parseInteger)
    .option('--interval-probability <p>', 'Interval probability cutoff', parseNumber)
    .option('--edit-distance-fraction <f>', 'Maximum edit distance fraction', parseNumber)
    .option('--min-soft-clip <length>', 'Minimum soft-clip length', parseInteger)
    .option('--max-alignments <count>', 'Maximum alternative alignments', parseInteger)
    .option('--gap-open <penalty>', 'Gap open penalty', parseNumber)
    .option('--gap-extend <penalty>', 'Gap extension penalty', parseNumber)
    .option('--alignment-probability <p>', 'Alignment probability cutoff', parseNumber)
    .option('--allele-frequency <f>', 'Minimum allele frequency', parseNumber)
    .option('--discordant-reads <count>', 'Minimum discordant reads', parseInteger)
    .option('--split-reads <count>', 'Minimum split reads', parseInteger)
    .option('--split-quality <quality>', 'Minimum split read quality', parseNumber)
    .option('--merge-fraction <f>', 'Overlap fraction for merging', parseNumber)
    .option('--extension <bases>', 'Interval extension in bases', parseInteger)
    .option('--bases <count>', 'Bases used for coverage ratios', parseInteger)
    .option('--coverage-ratio <ratio>', 'Minimum coverage ratio', parseNumber)
    .option('--no-coverage', 'Skip the coverage stage and merge without coverage')
    .option('--ignore-engine-status', 'Treat a failing engine exit status as success')
    .option('--dry-run', 'Show which stages would run without running them')
    .action(async (options: RealignCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        await handleRealign(options, base);
      } catch (error) {
        const workingDir = options.workingDir ?? getImplicitWorkingDir();
        if (error instanceof Error && exitCodeFor(error) !== EXIT_CODES.USAGE_ERROR) {
          console.error(formatErrorSummary(error, workingDir));
        }
        base.fatal(describeError(error), exitCodeFor(error), error);
      }
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Default dependencies of a command-line run.
 */
export function createRealignDependencies(
  options: RealignRunOptions,
  base: BaseCommand
): RealignWorkflowDependencies {
  return {
    runner: createCommandRunner(base, options.ignoreEngineStatus),
    binaries: config.engines,
    openSource: (filePath) => openAlignmentSource(filePath, { samtoolsBin: config.samtoolsBin }),
    logger: base,
  };
}

/**
 * Validate the options and run the pipeline with progress output.
 *
 * @param overrides - Replacement dependencies (tests inject fakes)
 * @throws ZodError when the options are invalid
 * @throws StageExecutionError when a stage fails
 */
export async function handleRealign(
  options: RealignCommandOptions,
  base: BaseCommand,
  overrides: Partial<RealignWorkflowDependencies> = {}
): Promise<RealignWorkflowResult> {
  const runOptions = RealignRunOptionsSchema.parse(toRealignRunOptionsInput(options));
  base.debug('Run options:', runOptions);

  const progress = createStageProgress();
  const controller = overrides.controller ?? createPipelineController();
  controller.setCallbacks({
    onStageStart: (id) => progress.startStage(id),
    onStageComplete: (id, durationMs) => progress.completeStage(id, durationMs),
    onStageError: (id, error) => progress.failStage(id, error.message),
    onStageSkip: (id, artifactPath) => progress.skipStage(id, artifactPath),
  });

  const result = await runRealignPipeline(runOptions, {
    ...createRealignDependencies(runOptions, base),
    ...overrides,
    controller,
  });

  if (!base.isQuiet()) {
    progress.printSummary();
    console.log(formatRunSummary(result));
    if (base.isVerbose()) {
      console.log(formatTimingBreakdown(result.timing.perStage));
    }
  }
  if (!runOptions.dryRun) {
    base.success(`Report written to ${runOptions.inputs.output}`);
  }
  return result;
}
