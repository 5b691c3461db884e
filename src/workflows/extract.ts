/**
 * Extract Workflow
 *
 * Runs the read extraction engine once. When a working directory is given
 * it is created if missing and the engine runs inside it; it is never
 * removed. Input and output paths are resolved before the engine changes
 * directory.
 *
 * @module workflows/extract
 */

import * as path from 'node:path';
import { buildExtractInvocation, type EngineBinaries } from '../engines/commands.js';
import type { EngineResult, EngineRunner } from '../engines/types.js';
import type { Logger } from '../pipeline/types.js';
import type { ExtractRunOptions } from '../schemas/run-options.js';
import { openWorkingDirectory, type OpenWorkingDirectoryOptions } from '../storage/workdir.js';

export interface ExtractWorkflowDependencies {
  runner: EngineRunner;
  binaries: EngineBinaries;
  logger?: Logger;
  workdir?: Pick<OpenWorkingDirectoryOptions, 'cwd'>;
}

/**
 * @throws EngineFailureError when the engine fails
 * @throws WorkingDirectoryError when the working directory cannot be created
 */
export async function runExtraction(
  options: ExtractRunOptions,
  deps: ExtractWorkflowDependencies
): Promise<EngineResult> {
  const base = deps.workdir?.cwd ?? process.cwd();
  let cwd: string | undefined;
  if (options.workingDir !== undefined) {
    const session = await openWorkingDirectory(options.workingDir, deps.workdir);
    cwd = session.path;
  }

  deps.logger?.info(`Extracting candidate reads from ${options.input}`);
  return deps.runner.run(
    buildExtractInvocation(deps.binaries, {
      input: cwd ? path.resolve(base, options.input) : options.input,
      output: cwd ? path.resolve(base, options.output) : options.output,
      mappingQuality: options.mappingQuality,
      includeDiscordants: options.includeDiscordants,
      includeSoftClipped: options.includeSoftClipped,
      includeHardClipped: options.includeHardClipped,
      cwd,
    })
  );
}
