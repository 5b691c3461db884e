/**
 * Working Directory Session
 *
 * Owns the scratch directory of one pipeline run. A directory the session
 * derived itself is removed on close; a directory the caller named is
 * never removed, even when this session had to create it.
 *
 * Close is only called after a successful run, so a failed run leaves its
 * directory behind for inspection.
 *
 * @module storage/workdir
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { getImplicitWorkingDir } from './paths.js';

// ============================================================================
// Types
// ============================================================================

export interface OpenWorkingDirectoryOptions {
  /** Base for the implicit directory (default: process.cwd()) */
  cwd?: string;
  /** Process id used in the implicit directory name (default: process.pid) */
  pid?: number;
}

/**
 * Creating or removing the working directory failed.
 */
export class WorkingDirectoryError extends Error {
  constructor(
    message: string,
    public readonly directory: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WorkingDirectoryError';
  }
}

// ============================================================================
// Session
// ============================================================================

export class WorkingDirectorySession {
  private closed = false;

  constructor(
    /** Absolute path of the directory */
    readonly path: string,
    /** True iff this session derived and created the directory */
    readonly ownsDirectory: boolean
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * End the session. Removes the directory and everything in it when the
   * session owns it; otherwise does nothing. Later calls are no-ops.
   *
   * @returns true if the directory was removed
   * @throws WorkingDirectoryError when removal fails
   */
  async close(): Promise<boolean> {
    if (this.closed) {
      return false;
    }
    this.closed = true;

    if (!this.ownsDirectory) {
      return false;
    }

    try {
      await fs.rm(this.path, { recursive: true, force: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new WorkingDirectoryError(
        `Failed to remove working directory ${this.path}: ${message}`,
        this.path,
        { cause: error }
      );
    }
    return true;
  }
}

/**
 * Open a working directory session.
 *
 * @param requestedPath - Caller-supplied directory; used as-is (resolved)
 *   and created if missing. When absent, `<cwd>/temp_files_<pid>` is
 *   created and owned by the session.
 * @throws WorkingDirectoryError when the directory cannot be created
 *
 * @example
 * const session = await openWorkingDirectory(options.workingDir);
 * await controller.run(stages, context);
 * await session.close();
 */
export async function openWorkingDirectory(
  requestedPath?: string,
  options: OpenWorkingDirectoryOptions = {}
): Promise<WorkingDirectorySession> {
  const ownsDirectory = requestedPath === undefined;
  const directory = ownsDirectory
    ? getImplicitWorkingDir(options.cwd, options.pid)
    : path.resolve(options.cwd ?? process.cwd(), requestedPath);

  try {
    await fs.mkdir(directory, { recursive: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new WorkingDirectoryError(
      `Failed to create working directory ${directory}: ${message}`,
      directory,
      { cause: error }
    );
  }

  return new WorkingDirectorySession(directory, ownsDirectory);
}
