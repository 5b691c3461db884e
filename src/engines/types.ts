/**
 * Engine Invocation Types
 *
 * Every external engine is reached through one narrow seam: an invocation
 * goes in, an exit result comes out. The pipeline never sees processes.
 *
 * @module engines/types
 */

import type { EngineName } from '../config/index.js';

export type { EngineName };

/**
 * One call of an external engine.
 */
export interface EngineInvocation {
  /** Which engine this is (for logging and error context) */
  engine: EngineName;
  /** Executable name or path */
  command: string;
  /** Arguments, passed verbatim (no shell) */
  args: string[];
  /** Directory to run in */
  cwd?: string;
  /** Redirect the engine's stdout to this file */
  stdoutPath?: string;
}

/**
 * How an engine call ended.
 */
export interface EngineResult {
  engine: EngineName;
  /** Exit status; null when terminated by a signal */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: NodeJS.Signals | null;
  /** Wall-clock duration in milliseconds */
  durationMs: number;
}

/**
 * Runs engine invocations to completion, one at a time.
 */
export interface EngineRunner {
  run(invocation: EngineInvocation): Promise<EngineResult>;
}

/**
 * Render an invocation as a shell-like command line, for logs and dry runs.
 */
export function formatInvocation(invocation: EngineInvocation): string {
  const quote = (value: string): string =>
    /^[\w@%+=:,./-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
  const line = [invocation.command, ...invocation.args].map(quote).join(' ');
  return invocation.stdoutPath ? `${line} > ${quote(invocation.stdoutPath)}` : line;
}
