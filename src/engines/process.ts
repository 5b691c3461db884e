/**
 * Child Process Plumbing
 *
 * The narrow slice of `node:child_process` the engine runner and the
 * samtools-backed alignment source rely on. Both take a `SpawnFunction` so
 * tests can hand in an in-process fake instead of starting a binary.
 *
 * @module engines/process
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';

// ============================================================================
// Types
// ============================================================================

/**
 * What we need from a spawned child. `ChildProcess` satisfies it.
 */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

/**
 * Signature compatible with `child_process.spawn(command, args, options)`.
 */
export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SpawnedProcess;

/**
 * How a child process ended. `error` is set when the process could not be
 * started at all (e.g. ENOENT).
 */
export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Default spawn implementation.
 */
export const defaultSpawn: SpawnFunction = (command, args, options) =>
  spawn(command, args, options);

/**
 * Resolve once the child has exited and its stdio streams are closed.
 * Never rejects: a start-up failure is reported through `error`.
 */
export function waitForExit(child: SpawnedProcess): Promise<ProcessExit> {
  return new Promise((resolve) => {
    let settled = false;

    child.once('error', (error) => {
      if (!settled) {
        settled = true;
        resolve({ code: null, signal: null, error });
      }
    });

    child.once('close', (code, signal) => {
      if (!settled) {
        settled = true;
        resolve({ code, signal });
      }
    });
  });
}

/**
 * Keep the last `limit` characters written to a stream, for error messages.
 */
export function captureTail(stream: Readable | null, limit = 4096): () => string {
  let buffer = '';
  stream?.on('data', (chunk: Buffer | string) => {
    buffer = (buffer + chunk.toString()).slice(-limit);
  });
  return () => buffer.trim();
}

/**
 * Human-readable description of a process exit.
 */
export function describeExit(exit: ProcessExit): string {
  if (exit.error) {
    return `failed to start (${exit.error.message})`;
  }
  if (exit.signal) {
    return `terminated by signal ${exit.signal}`;
  }
  return `exited with status ${exit.code ?? 'unknown'}`;
}

/**
 * True when the process started and exited with status 0.
 */
export function isSuccessfulExit(exit: ProcessExit): boolean {
  return !exit.error && exit.signal === null && exit.code === 0;
}
