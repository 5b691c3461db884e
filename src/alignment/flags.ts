/**
 * SAM Flag Decoding
 *
 * @module alignment/flags
 */

import type { MateRole } from './types.js';

/**
 * SAM FLAG bits.
 */
export const SAM_FLAGS = {
  PAIRED: 0x1,
  PROPER_PAIR: 0x2,
  UNMAPPED: 0x4,
  MATE_UNMAPPED: 0x8,
  REVERSE: 0x10,
  MATE_REVERSE: 0x20,
  FIRST_IN_PAIR: 0x40,
  SECOND_IN_PAIR: 0x80,
  SECONDARY: 0x100,
  QC_FAIL: 0x200,
  DUPLICATE: 0x400,
  SUPPLEMENTARY: 0x800,
} as const;

/**
 * Decoded view of a SAM flag.
 */
export interface DecodedFlag {
  isPaired: boolean;
  isProperPair: boolean;
  isUnmapped: boolean;
  isMateUnmapped: boolean;
  isReverse: boolean;
  isMateReverse: boolean;
  isFirstInPair: boolean;
  isSecondInPair: boolean;
  isSecondary: boolean;
  isQCFail: boolean;
  isDuplicate: boolean;
  isSupplementary: boolean;
}

export function decodeFlag(flag: number): DecodedFlag {
  return {
    isPaired: (flag & SAM_FLAGS.PAIRED) !== 0,
    isProperPair: (flag & SAM_FLAGS.PROPER_PAIR) !== 0,
    isUnmapped: (flag & SAM_FLAGS.UNMAPPED) !== 0,
    isMateUnmapped: (flag & SAM_FLAGS.MATE_UNMAPPED) !== 0,
    isReverse: (flag & SAM_FLAGS.REVERSE) !== 0,
    isMateReverse: (flag & SAM_FLAGS.MATE_REVERSE) !== 0,
    isFirstInPair: (flag & SAM_FLAGS.FIRST_IN_PAIR) !== 0,
    isSecondInPair: (flag & SAM_FLAGS.SECOND_IN_PAIR) !== 0,
    isSecondary: (flag & SAM_FLAGS.SECONDARY) !== 0,
    isQCFail: (flag & SAM_FLAGS.QC_FAIL) !== 0,
    isDuplicate: (flag & SAM_FLAGS.DUPLICATE) !== 0,
    isSupplementary: (flag & SAM_FLAGS.SUPPLEMENTARY) !== 0,
  };
}

/**
 * Mate role from the first/second-in-pair bits. A record carrying the
 * first-in-pair bit is "first" even if the second bit is also set.
 */
export function mateRoleFromFlag(flag: number): MateRole {
  if ((flag & SAM_FLAGS.FIRST_IN_PAIR) !== 0) {
    return 'first';
  }
  if ((flag & SAM_FLAGS.SECOND_IN_PAIR) !== 0) {
    return 'second';
  }
  return 'unpaired';
}
