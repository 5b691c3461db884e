/**
 * Base Command
 *
 * Shared by the extract and realign commands: applies the global
 * --verbose, --quiet and --no-color options, and maps failures to exit
 * codes.
 *
 * BaseCommand is also the pipeline's Logger, so stage messages follow the
 * same verbosity rules as command output.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Print debug messages and engine command lines */
  verbose?: boolean;
  /** Print only warnings, errors and progress */
  quiet?: boolean;
  /** commander inverts --no-color to color: false */
  color?: boolean;
}

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Engine, stage, estimator or filesystem failure */
  ERROR: 1,
  /** Invalid arguments or option values */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Output and exit handling for one command invocation.
 *
 * @example
 * ```typescript
 * .action(async (options: ExtractCommandOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *   try {
 *     await handleExtract(options, base);
 *   } catch (error) {
 *     base.fatal(describeError(error), exitCodeFor(error), error);
 *   }
 * });
 * ```
 */
export class BaseCommand implements Logger {
  readonly options: GlobalOptions;

  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Logger
  // ==========================================================================

  /**
   * Verbose mode only.
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Hidden in quiet mode.
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error. Does not exit; see {@link fatal}.
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  // ==========================================================================
  // Command Output
  // ==========================================================================

  /**
   * Print an error and exit. The stack of `cause` is printed in verbose
   * mode.
   */
  fatal(message: string, code: ExitCode = EXIT_CODES.ERROR, cause?: unknown): never {
    this.error(message);
    if (cause instanceof Error && this.options.verbose) {
      console.error(chalk.dim(cause.stack ?? cause.message));
    }
    process.exit(code);
  }

  /**
   * Report a finished command, e.g. where its output was written.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '\u2714' : '[OK]'} ${message}`));
    }
  }

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

/**
 * The BaseCommand the preAction hook stored on the program, or a default
 * one when the handler runs outside the program.
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  return base instanceof BaseCommand ? base : new BaseCommand({});
}
