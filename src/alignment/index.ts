/**
 * Alignment Records
 *
 * Record types, CIGAR and flag helpers, and one-pass record sources.
 *
 * @module alignment
 */

export {
  CIGAR_OP_CODES,
  type AlignmentRecord,
  type AlignmentRecordSource,
  type CigarOp,
  type CigarOpCode,
  type MateRole,
  type ReadPair,
} from './types.js';

export {
  parseCigar,
  formatCigar,
  isSoftClipped,
  isHardClipped,
  type CigarParseResult,
} from './cigar.js';

export { SAM_FLAGS, decodeFlag, mateRoleFromFlag, type DecodedFlag } from './flags.js';

export {
  parseSamLine,
  readSamRecords,
  createSamReadStats,
  type SamLineResult,
  type SamReadStats,
  type SamReaderOptions,
} from './sam-reader.js';

export {
  openAlignmentSource,
  isSamPath,
  AlignmentSourceError,
  type AlignmentSourceOptions,
} from './source.js';
