/**
 * Insert Size Stage (Stage 02)
 *
 * Scans the query-name-sorted alignments once and estimates the insert
 * size distribution. The result stays in memory and is handed to the
 * realign stage.
 *
 * **Checkpoint Contract**: none. The stage runs on every invocation,
 * restarts included.
 *
 * @module stages/insert-size
 */

import type { AlignmentRecordSource } from '../alignment/types.js';
import { estimateInsertSize } from '../insert-size/estimator.js';
import { buildStageId, type PipelineStage } from '../pipeline/types.js';

export interface InsertSizeStageParams {
  /** Query-name-sorted alignment file */
  queryNameBam: string;
  sampleSize: number;
  mapqCutoff: number;
  /** Opens the alignment file as a record stream */
  openSource: (filePath: string) => AlignmentRecordSource;
}

export function createInsertSizeStage(params: InsertSizeStageParams): PipelineStage {
  return {
    id: buildStageId('insert_size'),
    name: 'insert_size',

    async run(context) {
      const logger = context.logger;
      logger?.info(`[insert-size] Sampling up to ${params.sampleSize} read pairs from ${params.queryNameBam}`);

      const insertSize = await estimateInsertSize(params.openSource(params.queryNameBam), {
        sampleSize: params.sampleSize,
        mapqCutoff: params.mapqCutoff,
      });

      logger?.info(
        `[insert-size] mean=${insertSize.mean.toFixed(2)} std=${insertSize.std.toFixed(2)} ` +
          `from ${insertSize.sampleCount} pairs (${insertSize.recordsScanned} records scanned)`
      );
      if (!insertSize.saturated) {
        logger?.warn(
          `Only ${insertSize.sampleCount} of ${insertSize.sampleSize} requested read pairs passed the filter`
        );
      }
      if (insertSize.malformedRecords > 0) {
        logger?.warn(`${insertSize.malformedRecords} records with an unparseable CIGAR were skipped`);
      }
      logger?.debug('[insert-size] rejections', insertSize.rejections);

      return { insertSize };
    },
  };
}
