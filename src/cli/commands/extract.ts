/**
 * Extract Command
 *
 * Pulls candidate reads (discordant, soft-clipped, hard-clipped) out of a
 * query-name-sorted alignment file. Its output is the --candidates input
 * of the realign command.
 *
 * @module cli/commands/extract
 */

import { Command } from 'commander';
import { config } from '../../config/index.js';
import type { EngineResult } from '../../engines/types.js';
import { ExtractRunOptionsSchema, type ExtractRunOptionsInput } from '../../schemas/run-options.js';
import { runExtraction, type ExtractWorkflowDependencies } from '../../workflows/extract.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { createCommandRunner, describeError, exitCodeFor, parseInteger } from './shared.js';

export interface ExtractCommandOptions {
  input: string;
  output: string;
  workingDir?: string;
  mapq?: number;
  /** commander inverts the --no-* flags below */
  discordants: boolean;
  softClipped: boolean;
  hardClipped: boolean;
  ignoreEngineStatus?: boolean;
}

export function toExtractRunOptionsInput(options: ExtractCommandOptions): ExtractRunOptionsInput {
  return {
    input: options.input,
    output: options.output,
    workingDir: options.workingDir,
    mappingQuality: options.mapq,
    includeDiscordants: options.discordants,
    includeSoftClipped: options.softClipped,
    includeHardClipped: options.hardClipped,
    ignoreEngineStatus: options.ignoreEngineStatus ?? false,
  };
}

/**
 * Register the extract command.
 *
 * @param program - Root program
 */
export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Extract candidate reads for circular DNA detection')
    .requiredOption('-i, --input <path>', 'Query-name-sorted alignments')
    .requiredOption('-o, --output <path>', 'Output alignment file of candidate reads')
    .option('-w, --working-dir <path>', 'Directory the engine runs in')
    .option('--mapq <quality>', 'Minimum mapping quality', parseInteger)
    .option('--no-discordants', 'Leave out discordant read pairs')
    .option('--no-soft-clipped', 'Leave out soft-clipped reads')
    .option('--no-hard-clipped', 'Leave out hard-clipped reads')
    .option('--ignore-engine-status', 'Treat a failing engine exit status as success')
    .action(async (options: ExtractCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        await handleExtract(options, base);
      } catch (error) {
        base.fatal(describeError(error), exitCodeFor(error), error);
      }
    });
}

/**
 * Validate the options and run the extraction engine.
 *
 * @param overrides - Replacement dependencies (tests inject fakes)
 * @throws ZodError when the options are invalid
 * @throws EngineFailureError when the engine fails
 */
export async function handleExtract(
  options: ExtractCommandOptions,
  base: BaseCommand,
  overrides: Partial<ExtractWorkflowDependencies> = {}
): Promise<EngineResult> {
  const runOptions = ExtractRunOptionsSchema.parse(toExtractRunOptionsInput(options));

  const spinner = createSpinner('Extracting candidate reads...');
  if (!base.isQuiet()) {
    spinner.start();
  }

  try {
    const result = await runExtraction(runOptions, {
      runner: createCommandRunner(base, runOptions.ignoreEngineStatus),
      binaries: config.engines,
      logger: base,
      ...overrides,
    });
    spinner.stop();
    base.success(`Candidate reads written to ${runOptions.output}`);
    return result;
  } catch (error) {
    spinner.stop();
    throw error;
  }
}
