/**
 * Read Pair Acceptance Filter
 *
 * A pair contributes to the insert size sample only when both mates are
 * confidently and cleanly aligned in forward/reverse orientation with the
 * first mate anchoring the left end of the fragment.
 *
 * Conditions are checked in a fixed order; the first one that fails names
 * the rejection reason.
 *
 * @module insert-size/filter
 */

import { isHardClipped, isSoftClipped, parseCigar } from '../alignment/cigar.js';
import type { AlignmentRecord } from '../alignment/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A record whose CIGAR parsed, with its clipping classification.
 */
export interface MateView {
  readonly record: AlignmentRecord;
  readonly softClipped: boolean;
  readonly hardClipped: boolean;
}

export const PAIR_REJECTION_REASONS = [
  'low_mapq',
  'not_proper_pair',
  'hard_clipped',
  'soft_clipped',
  'orientation',
  'non_positive_template_length',
] as const;

export type PairRejectionReason = (typeof PAIR_REJECTION_REASONS)[number];

export type PairVerdict =
  | { readonly accepted: true; readonly templateLength: number }
  | { readonly accepted: false; readonly reason: PairRejectionReason };

// ============================================================================
// Classification
// ============================================================================

/**
 * Parse a record's CIGAR and classify its clipping.
 *
 * @returns null when the CIGAR does not parse
 */
export function classifyRecord(record: AlignmentRecord): MateView | null {
  const parsed = parseCigar(record.cigar);
  if (!parsed.success) {
    return null;
  }
  return {
    record,
    softClipped: isSoftClipped(parsed.ops),
    hardClipped: isHardClipped(parsed.ops),
  };
}

/**
 * Zeroed counter per rejection reason.
 */
export function createRejectionCounts(): Record<PairRejectionReason, number> {
  return {
    low_mapq: 0,
    not_proper_pair: 0,
    hard_clipped: 0,
    soft_clipped: 0,
    orientation: 0,
    non_positive_template_length: 0,
  };
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Evaluate a mate pair against the acceptance filter.
 *
 * @param first - Mate carrying the first-in-pair flag
 * @param second - Mate carrying the second-in-pair flag
 * @param mapqCutoff - Minimum mapping quality for both mates
 */
export function evaluatePair(first: MateView, second: MateView, mapqCutoff: number): PairVerdict {
  const r1 = first.record;
  const r2 = second.record;

  if (r1.mappingQuality < mapqCutoff || r2.mappingQuality < mapqCutoff) {
    return { accepted: false, reason: 'low_mapq' };
  }
  if (!r1.isProperlyPaired) {
    return { accepted: false, reason: 'not_proper_pair' };
  }
  if (first.hardClipped || second.hardClipped) {
    return { accepted: false, reason: 'hard_clipped' };
  }
  if (first.softClipped || second.softClipped) {
    return { accepted: false, reason: 'soft_clipped' };
  }
  if (r1.isReverseStrand || !r2.isReverseStrand) {
    return { accepted: false, reason: 'orientation' };
  }
  if (r1.templateLength <= 0) {
    return { accepted: false, reason: 'non_positive_template_length' };
  }

  return { accepted: true, templateLength: r1.templateLength };
}
