/**
 * Alignment Record Types
 *
 * The minimal view of one aligned read that the insert-size estimator and
 * the SAM reader exchange. Decoding of the binary alignment formats is left
 * to the record-stream reader; everything here is plain data.
 *
 * @module alignment/types
 */

// ============================================================================
// Mate Role
// ============================================================================

/**
 * Position of a read within its template.
 *
 * - first: carries the first-in-pair flag (0x40)
 * - second: carries the second-in-pair flag (0x80)
 * - unpaired: carries neither; never takes part in mate pairing
 */
export type MateRole = 'first' | 'second' | 'unpaired';

// ============================================================================
// CIGAR Operations
// ============================================================================

/**
 * CIGAR operation codes as defined by the SAM format.
 */
export const CIGAR_OP_CODES = ['M', 'I', 'D', 'N', 'S', 'H', 'P', '=', 'X'] as const;

export type CigarOpCode = (typeof CIGAR_OP_CODES)[number];

/**
 * One (operation, length) pair of a CIGAR string.
 */
export interface CigarOp {
  readonly op: CigarOpCode;
  readonly length: number;
}

// ============================================================================
// Alignment Record
// ============================================================================

/**
 * One alignment of one sequencing read.
 *
 * `cigar` is kept as text so that a record with an unparseable CIGAR can
 * still travel through a stream and be skipped by its consumer.
 */
export interface AlignmentRecord {
  /** Template (fragment) name shared by both mates */
  queryName: string;

  /** Which end of the template this read is */
  mateRole: MateRole;

  /** Phred-scaled mapping quality (0-255) */
  mappingQuality: number;

  /** Raw CIGAR text; "*" when unavailable */
  cigar: string;

  /** Read aligned to the reverse strand (flag 0x10) */
  isReverseStrand: boolean;

  /** Aligner considered the pair properly aligned (flag 0x2) */
  isProperlyPaired: boolean;

  /** Signed observed template length; positive for the leftmost mate */
  templateLength: number;

  /** Raw SAM flag, when the record came from a SAM stream */
  flag?: number;

  /** Reference sequence name, when known */
  referenceName?: string;

  /** 1-based leftmost mapping position, when known */
  position?: number;
}

/**
 * Transient pairing of two records sharing a query name. `T` is the record
 * or a view derived from it.
 */
export interface ReadPair<T = AlignmentRecord> {
  readonly first: T;
  readonly second: T;
}

/**
 * Anything the estimator can scan: a sync or async one-pass stream of
 * records in file order.
 */
export type AlignmentRecordSource = AsyncIterable<AlignmentRecord> | Iterable<AlignmentRecord>;
