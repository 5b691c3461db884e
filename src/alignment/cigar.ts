/**
 * CIGAR Parsing
 *
 * Turns CIGAR text into ordered operations and answers the two clipping
 * questions the insert-size filter asks.
 *
 * @module alignment/cigar
 */

import { CIGAR_OP_CODES, type CigarOp, type CigarOpCode } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of parsing a CIGAR string.
 */
export type CigarParseResult =
  | { readonly success: true; readonly ops: readonly CigarOp[] }
  | { readonly success: false; readonly error: string };

// ============================================================================
// Constants
// ============================================================================

const CIGAR_PATTERN = /^(\d+[MIDNSHP=X])+$/;
const CIGAR_TOKEN = /(\d+)([MIDNSHP=X])/g;

function isCigarOpCode(value: string): value is CigarOpCode {
  return (CIGAR_OP_CODES as readonly string[]).includes(value);
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a CIGAR string into its operations.
 *
 * "*" (CIGAR unavailable) parses to an empty list. Zero-length operations
 * and anything outside the SAM alphabet are rejected.
 *
 * @example
 * parseCigar('5S90M5H');
 * // { success: true, ops: [{ op: 'S', length: 5 }, { op: 'M', length: 90 }, { op: 'H', length: 5 }] }
 */
export function parseCigar(cigar: string): CigarParseResult {
  if (cigar === '*') {
    return { success: true, ops: [] };
  }

  if (!CIGAR_PATTERN.test(cigar)) {
    return { success: false, error: `Invalid CIGAR: "${cigar}"` };
  }

  const ops: CigarOp[] = [];
  for (const match of cigar.matchAll(CIGAR_TOKEN)) {
    const length = parseInt(match[1], 10);
    const op = match[2];
    if (length === 0 || !isCigarOpCode(op)) {
      return { success: false, error: `Invalid CIGAR operation "${match[0]}" in "${cigar}"` };
    }
    ops.push({ op, length });
  }

  return { success: true, ops };
}

/**
 * Render operations back to CIGAR text ("*" for an empty list).
 */
export function formatCigar(ops: readonly CigarOp[]): string {
  if (ops.length === 0) {
    return '*';
  }
  return ops.map(({ op, length }) => `${length}${op}`).join('');
}

// ============================================================================
// Clipping Predicates
// ============================================================================

/**
 * True iff any operation is a soft clip (S).
 */
export function isSoftClipped(ops: readonly CigarOp[]): boolean {
  return ops.some(({ op }) => op === 'S');
}

/**
 * True iff any operation is a hard clip (H).
 */
export function isHardClipped(ops: readonly CigarOp[]): boolean {
  return ops.some(({ op }) => op === 'H');
}
