/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the working directory and the
 * checkpoint artifacts the pipeline stages leave in it.
 *
 * Directory Structure:
 * ```
 * <working dir>/            # given with --working-dir, or ./temp_files_<pid>
 * ├── peaks.bed             # candidate intervals (checkpoint of 01)
 * ├── ecctemp.txt           # realignment result (checkpoint of 03)
 * └── coverage.txt          # per-base coverage (checkpoint of 04)
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import { ARTIFACT_NAMES, IMPLICIT_WORKDIR_PREFIX } from '../config/defaults.js';

export type ArtifactName = keyof typeof ARTIFACT_NAMES;

/**
 * Gets the working directory used when the caller supplies none.
 *
 * Deterministic for a given process: the current directory joined with a
 * name carrying the process id.
 *
 * @example
 * ```typescript
 * getImplicitWorkingDir('/data/run', 4242); // '/data/run/temp_files_4242'
 * ```
 */
export function getImplicitWorkingDir(cwd: string = process.cwd(), pid: number = process.pid): string {
  return path.join(path.resolve(cwd), `${IMPLICIT_WORKDIR_PREFIX}${pid}`);
}

/**
 * Gets the path of a checkpoint artifact inside a working directory.
 *
 * @example
 * ```typescript
 * getArtifactPath('/data/run/temp_files_4242', 'intervals');
 * // '/data/run/temp_files_4242/peaks.bed'
 * ```
 */
export function getArtifactPath(workingDir: string, artifact: ArtifactName): string {
  if (!workingDir || workingDir.trim() === '') {
    throw new Error('workingDir is required');
  }
  return path.join(workingDir, ARTIFACT_NAMES[artifact]);
}
