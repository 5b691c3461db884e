/**
 * Insert Size Estimation
 *
 * @module insert-size
 */

export {
  estimateInsertSize,
  type EstimateOptions,
  type InsertSizeStats,
} from './estimator.js';

export {
  evaluatePair,
  classifyRecord,
  createRejectionCounts,
  PAIR_REJECTION_REASONS,
  type MateView,
  type PairRejectionReason,
  type PairVerdict,
} from './filter.js';

export { MatePairer, type PairingState, type PairingEvent } from './pairing.js';

export { computeMean, computePopulationStd, summarizeSample } from './statistics.js';

export { EmptySampleError } from './errors.js';
