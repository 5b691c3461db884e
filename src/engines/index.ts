/**
 * External Engines
 *
 * Invocation types, argument builders and the process-backed runner.
 *
 * @module engines
 */

export {
  formatInvocation,
  type EngineInvocation,
  type EngineName,
  type EngineResult,
  type EngineRunner,
} from './types.js';

export {
  buildIntervalCallInvocation,
  buildRealignInvocation,
  buildCoverageInvocation,
  buildMergeInvocation,
  buildExtractInvocation,
  type EngineBinaries,
  type IntervalCallParams,
  type RealignParams,
  type CoverageParams,
  type MergeParams,
  type ExtractParams,
} from './commands.js';

export { ProcessEngineRunner, type ProcessEngineRunnerOptions } from './runner.js';

export { EngineFailureError } from './errors.js';

export {
  defaultSpawn,
  waitForExit,
  describeExit,
  isSuccessfulExit,
  type SpawnFunction,
  type SpawnedProcess,
  type ProcessExit,
} from './process.js';
