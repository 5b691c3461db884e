/**
 * Pipeline Defaults
 *
 * Default tuning values for the insert size scan and the realignment,
 * merge and extraction engines. CLI options fall back to these.
 *
 * @module config/defaults
 */

/**
 * Insert size scan defaults
 */
export const INSERT_SIZE_DEFAULTS = {
  /** Accepted pairs to sample before stopping */
  sampleSize: 100000,
  /** Minimum MAPQ of both mates */
  mapqCutoff: 60,
} as const;

/**
 * Realignment engine defaults
 */
export const REALIGN_DEFAULTS = {
  /** Insert size standard deviations around the mean accepted as concordant */
  stdMultiplier: 4,
  /** Minimum MAPQ of a candidate read */
  mappingQuality: 20,
  /** Minimum probability of a candidate interval */
  intervalProbability: 0.01,
  /** Maximum edit distance as a fraction of read length */
  editDistanceFraction: 0.05,
  /** Minimum soft-clip length considered for realignment */
  minSoftClipLength: 8,
  /** Maximum alignments reported per read */
  maxAlignments: 200,
  gapOpen: 5,
  gapExtend: 1,
  /** Minimum posterior probability of a realignment */
  alignmentProbability: 0.99,
} as const;

/**
 * Merge engine (reporting) defaults
 */
export const MERGE_DEFAULTS = {
  /** Minimum circular allele frequency */
  alleleFrequency: 0.1,
  /** Minimum discordant reads supporting a call */
  discordantReads: 3,
  /** Minimum split reads supporting a call */
  splitReads: 0,
  /** Minimum split read quality */
  splitQuality: 0,
  /** Reciprocal overlap fraction for merging intervals */
  mergeFraction: 0.99,
  /** Bases added to each interval side when computing coverage */
  extension: 100,
  /** Bases at the interval edges used for the coverage ratio */
  bases: 200,
  /** Minimum inside/outside coverage ratio */
  coverageRatio: 0.0,
} as const;

/**
 * Read extraction engine defaults
 */
export const EXTRACT_DEFAULTS = {
  /** Minimum MAPQ of extracted reads */
  mappingQuality: 10,
} as const;

/**
 * Thread count passed through to engines
 */
export const DEFAULT_THREADS = 1;

/**
 * Artifact names inside the working directory
 */
export const ARTIFACT_NAMES = {
  intervals: 'peaks.bed',
  realigned: 'ecctemp.txt',
  coverage: 'coverage.txt',
} as const;

/**
 * Prefix of the working directory created when none is given
 */
export const IMPLICIT_WORKDIR_PREFIX = 'temp_files_';
