/**
 * SAM Text Reader
 *
 * Streams alignment records out of SAM text, one line at a time. Header
 * lines (starting with "@") are skipped. Lines that do not carry the 11
 * mandatory fields, or whose numeric fields do not parse, are skipped and
 * counted rather than failing the stream.
 *
 * The CIGAR column is passed through untouched; deciding what to do with an
 * unparseable CIGAR is the consumer's business.
 *
 * @module alignment/sam-reader
 */

import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import { decodeFlag, mateRoleFromFlag } from './flags.js';
import type { AlignmentRecord } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of parsing one SAM line.
 */
export type SamLineResult =
  | { readonly kind: 'header' }
  | { readonly kind: 'record'; readonly record: AlignmentRecord }
  | { readonly kind: 'invalid'; readonly error: string };

/**
 * Counters filled in while a stream is read. Pass an object in and inspect
 * it after iteration ends.
 */
export interface SamReadStats {
  linesRead: number;
  headerLines: number;
  records: number;
  invalidLines: number;
}

export interface SamReaderOptions {
  /** Counters to update while reading */
  stats?: SamReadStats;
  /** Called for each skipped line */
  onInvalidLine?: (lineNumber: number, error: string) => void;
}

// ============================================================================
// Line Parsing
// ============================================================================

const MANDATORY_FIELD_COUNT = 11;
const INTEGER_PATTERN = /^-?\d+$/;

function parseInteger(value: string): number | undefined {
  return INTEGER_PATTERN.test(value) ? parseInt(value, 10) : undefined;
}

/**
 * Create an empty stats object.
 */
export function createSamReadStats(): SamReadStats {
  return { linesRead: 0, headerLines: 0, records: 0, invalidLines: 0 };
}

/**
 * Parse a single SAM line.
 *
 * @example
 * parseSamLine('r1\t99\tchr1\t100\t60\t100M\t=\t300\t300\t*\t*');
 * // { kind: 'record', record: { queryName: 'r1', mateRole: 'first', ... } }
 */
export function parseSamLine(line: string): SamLineResult {
  if (line.startsWith('@')) {
    return { kind: 'header' };
  }

  const fields = line.split('\t');
  if (fields.length < MANDATORY_FIELD_COUNT) {
    return {
      kind: 'invalid',
      error: `Expected at least ${MANDATORY_FIELD_COUNT} fields, found ${fields.length}`,
    };
  }

  const [qname, flagStr, rname, posStr, mapqStr, cigar, , , tlenStr] = fields;

  const flag = parseInteger(flagStr);
  if (flag === undefined || flag < 0) {
    return { kind: 'invalid', error: `Invalid FLAG "${flagStr}"` };
  }

  const position = parseInteger(posStr);
  if (position === undefined || position < 0) {
    return { kind: 'invalid', error: `Invalid POS "${posStr}"` };
  }

  const mapq = parseInteger(mapqStr);
  if (mapq === undefined || mapq < 0 || mapq > 255) {
    return { kind: 'invalid', error: `Invalid MAPQ "${mapqStr}"` };
  }

  const tlen = parseInteger(tlenStr);
  if (tlen === undefined) {
    return { kind: 'invalid', error: `Invalid TLEN "${tlenStr}"` };
  }

  const decoded = decodeFlag(flag);

  return {
    kind: 'record',
    record: {
      queryName: qname,
      mateRole: mateRoleFromFlag(flag),
      mappingQuality: mapq,
      cigar,
      isReverseStrand: decoded.isReverse,
      isProperlyPaired: decoded.isProperPair,
      templateLength: tlen,
      flag,
      referenceName: rname,
      position,
    },
  };
}

// ============================================================================
// Stream Reading
// ============================================================================

/**
 * Read alignment records from a SAM text stream in file order.
 *
 * Breaking out of the iteration closes the line reader; the caller owns
 * the underlying stream.
 */
export async function* readSamRecords(
  input: Readable,
  options: SamReaderOptions = {}
): AsyncGenerator<AlignmentRecord, void, undefined> {
  const stats = options.stats ?? createSamReadStats();
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      stats.linesRead++;
      if (line.length === 0) {
        continue;
      }

      const result = parseSamLine(line);
      switch (result.kind) {
        case 'header':
          stats.headerLines++;
          break;
        case 'invalid':
          stats.invalidLines++;
          options.onInvalidLine?.(stats.linesRead, result.error);
          break;
        case 'record':
          stats.records++;
          yield result.record;
          break;
      }
    }
  } finally {
    lines.close();
  }
}
