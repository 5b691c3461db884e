/**
 * Run Options Schemas
 *
 * Validated inputs of the two CLI workflows: the full realign pipeline and
 * the standalone read extraction. Numeric tuning values default to
 * src/config/defaults.ts.
 */

import { z } from 'zod';
import {
  DEFAULT_THREADS,
  EXTRACT_DEFAULTS,
  INSERT_SIZE_DEFAULTS,
  MERGE_DEFAULTS,
  REALIGN_DEFAULTS,
} from '../config/defaults.js';
import {
  CountSchema,
  FilePathSchema,
  FractionSchema,
  MappingQualitySchema,
  ThreadCountSchema,
} from './common.js';

// ============================================================================
// Realign Pipeline Options
// ============================================================================

/**
 * Input files of the realign pipeline
 */
export const RealignInputsSchema = z.object({
  /** Coordinate-sorted alignments of all reads */
  sortedBam: FilePathSchema,
  /** Query-name-sorted alignments of all reads (insert size scan) */
  queryNameBam: FilePathSchema,
  /** Candidate reads produced by read extraction */
  candidatesBam: FilePathSchema,
  /** Reference genome FASTA */
  genome: FilePathSchema,
  /** Final report path */
  output: FilePathSchema,
  /** Working directory; a process-scoped one is created when absent */
  workingDir: FilePathSchema.optional(),
});

export type RealignInputs = z.infer<typeof RealignInputsSchema>;

export const InsertSizeOptionsSchema = z.object({
  sampleSize: z.number().int().positive().default(INSERT_SIZE_DEFAULTS.sampleSize),
  mapqCutoff: z.number().nonnegative().default(INSERT_SIZE_DEFAULTS.mapqCutoff),
});

export type InsertSizeOptions = z.infer<typeof InsertSizeOptionsSchema>;

export const RealignTuningSchema = z.object({
  stdMultiplier: z.number().positive().default(REALIGN_DEFAULTS.stdMultiplier),
  mappingQuality: MappingQualitySchema.default(REALIGN_DEFAULTS.mappingQuality),
  intervalProbability: FractionSchema.default(REALIGN_DEFAULTS.intervalProbability),
  editDistanceFraction: FractionSchema.default(REALIGN_DEFAULTS.editDistanceFraction),
  minSoftClipLength: CountSchema.default(REALIGN_DEFAULTS.minSoftClipLength),
  maxAlignments: z.number().int().positive().default(REALIGN_DEFAULTS.maxAlignments),
  gapOpen: z.number().nonnegative().default(REALIGN_DEFAULTS.gapOpen),
  gapExtend: z.number().nonnegative().default(REALIGN_DEFAULTS.gapExtend),
  alignmentProbability: FractionSchema.default(REALIGN_DEFAULTS.alignmentProbability),
});

export type RealignTuning = z.infer<typeof RealignTuningSchema>;

export const MergeThresholdsSchema = z.object({
  alleleFrequency: FractionSchema.default(MERGE_DEFAULTS.alleleFrequency),
  discordantReads: CountSchema.default(MERGE_DEFAULTS.discordantReads),
  splitReads: CountSchema.default(MERGE_DEFAULTS.splitReads),
  splitQuality: z.number().nonnegative().default(MERGE_DEFAULTS.splitQuality),
  mergeFraction: FractionSchema.default(MERGE_DEFAULTS.mergeFraction),
  extension: CountSchema.default(MERGE_DEFAULTS.extension),
  bases: CountSchema.default(MERGE_DEFAULTS.bases),
  coverageRatio: z.number().nonnegative().default(MERGE_DEFAULTS.coverageRatio),
});

export type MergeThresholds = z.infer<typeof MergeThresholdsSchema>;

/**
 * Complete realign pipeline configuration
 */
export const RealignRunOptionsSchema = z.object({
  inputs: RealignInputsSchema,
  threads: ThreadCountSchema.default(DEFAULT_THREADS),
  insertSize: InsertSizeOptionsSchema.default({}),
  realign: RealignTuningSchema.default({}),
  merge: MergeThresholdsSchema.default({}),
  /** Skip the coverage stage and merge without coverage */
  skipCoverage: z.boolean().default(false),
  /** Treat a non-zero engine exit status as success */
  ignoreEngineStatus: z.boolean().default(false),
  /** Plan the run without invoking any engine */
  dryRun: z.boolean().default(false),
});

export type RealignRunOptions = z.infer<typeof RealignRunOptionsSchema>;
export type RealignRunOptionsInput = z.input<typeof RealignRunOptionsSchema>;

// ============================================================================
// Extract Options
// ============================================================================

export const ExtractRunOptionsSchema = z.object({
  /** Query-name-sorted alignments */
  input: FilePathSchema,
  /** Output alignment file of candidate reads */
  output: FilePathSchema,
  /** Directory the engine runs in */
  workingDir: FilePathSchema.optional(),
  mappingQuality: MappingQualitySchema.default(EXTRACT_DEFAULTS.mappingQuality),
  includeDiscordants: z.boolean().default(true),
  includeSoftClipped: z.boolean().default(true),
  includeHardClipped: z.boolean().default(true),
  ignoreEngineStatus: z.boolean().default(false),
});

export type ExtractRunOptions = z.infer<typeof ExtractRunOptionsSchema>;
export type ExtractRunOptionsInput = z.input<typeof ExtractRunOptionsSchema>;
