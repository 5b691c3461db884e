/**
 * Process Engine Runner
 *
 * Runs an engine invocation as a child process and waits for it to exit.
 * No shell is involved; stdout is inherited or redirected to a file, and
 * stderr is passed through to the terminal. A redirected file only appears
 * at its final path when the engine succeeds.
 *
 * @module engines/runner
 */

import { createWriteStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { EngineFailureError } from './errors.js';
import {
  defaultSpawn,
  describeExit,
  isSuccessfulExit,
  waitForExit,
  type SpawnFunction,
} from './process.js';
import { formatInvocation, type EngineInvocation, type EngineResult, type EngineRunner } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ProcessEngineRunnerOptions {
  /**
   * Accept a non-zero exit status or signal as success.
   * A process that cannot be started is still an error.
   * @default false
   */
  ignoreExitStatus?: boolean;
  /** Spawn implementation (tests inject a fake) */
  spawn?: SpawnFunction;
  /** Called with the command line before each run */
  onInvoke?: (commandLine: string, invocation: EngineInvocation) => void;
}

// ============================================================================
// Runner
// ============================================================================

export class ProcessEngineRunner implements EngineRunner {
  private readonly spawnFn: SpawnFunction;
  private readonly ignoreExitStatus: boolean;
  private readonly onInvoke?: ProcessEngineRunnerOptions['onInvoke'];

  constructor(options: ProcessEngineRunnerOptions = {}) {
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.ignoreExitStatus = options.ignoreExitStatus ?? false;
    this.onInvoke = options.onInvoke;
  }

  /**
   * Run one engine invocation to completion.
   *
   * @throws EngineFailureError when the engine cannot start, or (unless
   *   exit status is ignored) exits non-zero or is killed by a signal
   */
  async run(invocation: EngineInvocation): Promise<EngineResult> {
    this.onInvoke?.(formatInvocation(invocation), invocation);

    const startedAt = Date.now();
    const redirect = invocation.stdoutPath !== undefined;

    const child = this.spawnFn(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      stdio: ['ignore', redirect ? 'pipe' : 'inherit', 'inherit'],
    });
    const exited = waitForExit(child);

    // Output lands in <stdoutPath>.partial and is renamed into place only
    // after a successful run; the final path is a checkpoint artifact.
    const partialPath = invocation.stdoutPath !== undefined ? `${invocation.stdoutPath}.partial` : undefined;
    let written: Promise<unknown> = Promise.resolve(undefined);
    if (partialPath !== undefined && child.stdout) {
      written = pipeline(child.stdout, createWriteStream(partialPath)).then(
        () => undefined,
        (error: unknown) => error ?? new Error('output stream failed')
      );
    }

    const exit = await exited;
    if (exit.error) {
      child.stdout?.destroy();
    }
    const writeError = await written;

    const discardPartial = async (): Promise<void> => {
      if (partialPath !== undefined) {
        await fs.rm(partialPath, { force: true });
      }
    };

    if (exit.error) {
      await discardPartial();
      throw new EngineFailureError(
        `Engine "${invocation.engine}" (${invocation.command}) ${describeExit(exit)}`,
        invocation.engine,
        null,
        null,
        { cause: exit.error }
      );
    }

    if (writeError !== undefined) {
      await discardPartial();
      const message = writeError instanceof Error ? writeError.message : String(writeError);
      throw new EngineFailureError(
        `Failed to write ${invocation.engine} output to ${invocation.stdoutPath}: ${message}`,
        invocation.engine,
        exit.code,
        exit.signal,
        { cause: writeError }
      );
    }

    if (!this.ignoreExitStatus && !isSuccessfulExit(exit)) {
      await discardPartial();
      throw new EngineFailureError(
        `Engine "${invocation.engine}" (${invocation.command}) ${describeExit(exit)}`,
        invocation.engine,
        exit.code,
        exit.signal
      );
    }

    if (partialPath !== undefined && invocation.stdoutPath !== undefined) {
      await fs.rename(partialPath, invocation.stdoutPath);
    }

    return {
      engine: invocation.engine,
      exitCode: exit.code,
      signal: exit.signal,
      durationMs: Date.now() - startedAt,
    };
  }
}
