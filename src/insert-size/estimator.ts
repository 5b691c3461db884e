/**
 * Insert Size Estimator
 *
 * One sequential pass over a name-sorted alignment stream. Mates are paired
 * with a single-slot buffer, filtered, and the first mate's template length
 * of each accepted pair is sampled until the sample is full or the stream
 * ends. The realignment engine consumes the resulting mean and standard
 * deviation.
 *
 * @module insert-size/estimator
 */

import type { AlignmentRecordSource } from '../alignment/types.js';
import { EmptySampleError } from './errors.js';
import {
  classifyRecord,
  createRejectionCounts,
  evaluatePair,
  type PairRejectionReason,
} from './filter.js';
import { MatePairer } from './pairing.js';
import { summarizeSample } from './statistics.js';

// ============================================================================
// Types
// ============================================================================

export interface EstimateOptions {
  /** Number of accepted pairs after which scanning stops */
  sampleSize: number;
  /** Minimum mapping quality for both mates */
  mapqCutoff: number;
}

/**
 * Insert size distribution summary plus scan counters.
 */
export interface InsertSizeStats {
  /** Arithmetic mean of the sampled template lengths */
  mean: number;
  /** Population standard deviation of the sampled template lengths */
  std: number;
  /** Number of template lengths in the sample */
  sampleCount: number;
  /** Requested sample size */
  sampleSize: number;
  /** Whether the sample reached the requested size */
  saturated: boolean;
  /** Records pulled from the source */
  recordsScanned: number;
  /** Records skipped because their CIGAR did not parse */
  malformedRecords: number;
  /** Mate pairs evaluated against the filter */
  pairsEvaluated: number;
  /** First mates replaced before their partner appeared */
  unmatchedFirstMates: number;
  /** Rejected pairs by reason */
  rejections: Record<PairRejectionReason, number>;
}

// ============================================================================
// Validation
// ============================================================================

function validateOptions(options: EstimateOptions): void {
  if (!Number.isInteger(options.sampleSize) || options.sampleSize <= 0) {
    throw new RangeError(`sampleSize must be a positive integer, got ${options.sampleSize}`);
  }
  if (!Number.isFinite(options.mapqCutoff) || options.mapqCutoff < 0) {
    throw new RangeError(`mapqCutoff must be a non-negative number, got ${options.mapqCutoff}`);
  }
}

// ============================================================================
// Estimation
// ============================================================================

/**
 * Estimate the insert size distribution of a name-sorted alignment stream.
 *
 * @throws EmptySampleError when no pair passes the filter
 * @throws RangeError for a non-positive sample size or negative MAPQ cutoff
 *
 * @example
 * const stats = await estimateInsertSize(openAlignmentSource('sample.qname.bam'), {
 *   sampleSize: 100000,
 *   mapqCutoff: 60,
 * });
 * console.log(stats.mean, stats.std);
 */
export async function estimateInsertSize(
  source: AlignmentRecordSource,
  options: EstimateOptions
): Promise<InsertSizeStats> {
  validateOptions(options);

  const { sampleSize, mapqCutoff } = options;
  const sample: number[] = [];
  const rejections = createRejectionCounts();
  const pairer = new MatePairer();

  let recordsScanned = 0;
  let malformedRecords = 0;
  let pairsEvaluated = 0;
  let unmatchedFirstMates = 0;

  for await (const record of source) {
    recordsScanned++;

    const mate = classifyRecord(record);
    if (!mate) {
      malformedRecords++;
      continue;
    }

    const event = pairer.push(mate);
    if (event.kind === 'buffered') {
      if (event.discarded) {
        unmatchedFirstMates++;
      }
      continue;
    }
    if (event.kind === 'ignored') {
      continue;
    }

    pairsEvaluated++;
    const verdict = evaluatePair(event.pair.first, event.pair.second, mapqCutoff);
    if (!verdict.accepted) {
      rejections[verdict.reason]++;
      continue;
    }

    sample.push(verdict.templateLength);
    if (sample.length >= sampleSize) {
      break;
    }
  }

  if (sample.length === 0) {
    throw new EmptySampleError(recordsScanned, pairsEvaluated, malformedRecords);
  }

  const { mean, std } = summarizeSample(sample);

  return {
    mean,
    std,
    sampleCount: sample.length,
    sampleSize,
    saturated: sample.length >= sampleSize,
    recordsScanned,
    malformedRecords,
    pairsEvaluated,
    unmatchedFirstMates,
    rejections,
  };
}
