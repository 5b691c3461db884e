/**
 * Shared helpers for the pipeline commands: numeric option parsing, the
 * engine runner wired to the command's logger, and error-to-exit-code
 * mapping.
 *
 * @module cli/commands/shared
 */

import { InvalidArgumentError } from 'commander';
import { ZodError } from 'zod';
import { ProcessEngineRunner } from '../../engines/runner.js';
import { formatIssues } from '../../schemas/common.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';

/**
 * Commander argument parser for a finite number.
 */
export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

/**
 * Commander argument parser for an integer.
 */
export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

/**
 * Engine runner that echoes each command line in verbose mode.
 */
export function createCommandRunner(base: BaseCommand, ignoreExitStatus: boolean): ProcessEngineRunner {
  return new ProcessEngineRunner({
    ignoreExitStatus,
    onInvoke: (commandLine) => base.debug(`$ ${commandLine}`),
  });
}

/**
 * Exit code for an error raised by a command handler.
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ZodError ? EXIT_CODES.USAGE_ERROR : EXIT_CODES.ERROR;
}

/**
 * Message for an error raised by a command handler. Validation errors list
 * every offending option.
 */
export function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return ['Invalid options:', ...formatIssues(error).map((line) => `  ${line}`)].join('\n');
  }
  return error instanceof Error ? error.message : String(error);
}
