/**
 * Insert Size Errors
 *
 * @module insert-size/errors
 */

/**
 * No read pair in the scanned stream passed the acceptance filter, so the
 * insert size distribution has no mean or standard deviation.
 */
export class EmptySampleError extends Error {
  constructor(
    public readonly recordsScanned: number,
    public readonly pairsEvaluated: number,
    public readonly malformedRecords: number
  ) {
    super(
      `No read pair passed the insert size filter ` +
        `(${recordsScanned} records scanned, ${pairsEvaluated} pairs evaluated, ` +
        `${malformedRecords} malformed records skipped)`
    );
    this.name = 'EmptySampleError';
  }
}
