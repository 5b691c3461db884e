/**
 * Alignment Sources
 *
 * Opens a one-pass record stream over an alignment file. SAM text is read
 * straight from disk; any other file (BAM, CRAM) is decoded by
 * `samtools view -h` and its stdout parsed as SAM.
 *
 * @module alignment/source
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  captureTail,
  defaultSpawn,
  describeExit,
  isSuccessfulExit,
  waitForExit,
  type SpawnFunction,
} from '../engines/process.js';
import { readSamRecords, type SamReaderOptions } from './sam-reader.js';
import type { AlignmentRecord } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface AlignmentSourceOptions extends SamReaderOptions {
  /** samtools executable used for non-SAM inputs */
  samtoolsBin?: string;
  /** Spawn implementation (tests inject a fake) */
  spawn?: SpawnFunction;
}

/**
 * The decoder behind a source failed.
 */
export class AlignmentSourceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'AlignmentSourceError';
  }
}

// ============================================================================
// Sources
// ============================================================================

/**
 * True if the path names SAM text (by extension).
 */
export function isSamPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.sam';
}

/**
 * Open an alignment file as a record stream in file order.
 *
 * Breaking out of the iteration early releases the file or terminates the
 * samtools child.
 *
 * @example
 * for await (const record of openAlignmentSource('sample.qname.bam')) {
 *   console.log(record.queryName);
 * }
 */
export function openAlignmentSource(
  filePath: string,
  options: AlignmentSourceOptions = {}
): AsyncGenerator<AlignmentRecord, void, undefined> {
  return isSamPath(filePath) ? readSamFile(filePath, options) : readViaSamtools(filePath, options);
}

async function* readSamFile(
  filePath: string,
  options: AlignmentSourceOptions
): AsyncGenerator<AlignmentRecord, void, undefined> {
  const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
  try {
    yield* readSamRecords(input, options);
  } finally {
    input.destroy();
  }
}

async function* readViaSamtools(
  filePath: string,
  options: AlignmentSourceOptions
): AsyncGenerator<AlignmentRecord, void, undefined> {
  const spawnFn = options.spawn ?? defaultSpawn;
  const command = options.samtoolsBin ?? 'samtools';

  const child = spawnFn(command, ['view', '-h', filePath], {
    stdio: ['ignore', 'pipe', 'pipe'],
  });
  const exited = waitForExit(child);
  const stderrTail = captureTail(child.stderr);

  if (!child.stdout) {
    child.kill();
    throw new AlignmentSourceError(`${command} view produced no output stream`, filePath);
  }

  let drained = false;
  try {
    yield* readSamRecords(child.stdout, options);
    drained = true;
  } finally {
    if (!drained) {
      child.kill();
      await exited;
    }
  }

  const exit = await exited;
  if (!isSuccessfulExit(exit)) {
    const detail = stderrTail();
    throw new AlignmentSourceError(
      `${command} view ${describeExit(exit)} while reading ${filePath}${detail ? `: ${detail}` : ''}`,
      filePath
    );
  }
}
