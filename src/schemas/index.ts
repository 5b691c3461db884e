/**
 * Schemas
 *
 * Zod schemas for validated run options.
 */

export {
  FilePathSchema,
  FractionSchema,
  CountSchema,
  MappingQualitySchema,
  ThreadCountSchema,
  formatIssues,
} from './common.js';

export {
  RealignInputsSchema,
  InsertSizeOptionsSchema,
  RealignTuningSchema,
  MergeThresholdsSchema,
  RealignRunOptionsSchema,
  ExtractRunOptionsSchema,
  type RealignInputs,
  type InsertSizeOptions,
  type RealignTuning,
  type MergeThresholds,
  type RealignRunOptions,
  type RealignRunOptionsInput,
  type ExtractRunOptions,
  type ExtractRunOptionsInput,
} from './run-options.js';
