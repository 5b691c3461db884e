/**
 * circlescan
 *
 * Checkpointed circular DNA detection pipeline and streaming insert size
 * estimator.
 *
 * @example
 * ```typescript
 * import { estimateInsertSize, openAlignmentSource } from 'circlescan';
 *
 * const stats = await estimateInsertSize(openAlignmentSource('sample.qname.bam'), {
 *   sampleSize: 100000,
 *   mapqCutoff: 60,
 * });
 * ```
 *
 * @module circlescan
 */

export * from './alignment/index.js';
export * from './engines/index.js';
export * from './insert-size/index.js';
export * from './pipeline/index.js';
export * from './schemas/index.js';
export * from './stages/index.js';
export * from './storage/index.js';
export * from './workflows/index.js';
