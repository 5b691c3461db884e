/**
 * Engine Errors
 *
 * @module engines/errors
 */

import type { EngineName } from './types.js';

/**
 * An external engine could not be started, exited with a non-zero status,
 * or was killed by a signal.
 */
export class EngineFailureError extends Error {
  constructor(
    message: string,
    public readonly engine: EngineName,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EngineFailureError';
  }
}
