/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 *
 * Available commands:
 * - extract: Extract candidate reads from query-name-sorted alignments
 * - realign: Run the checkpointed detection pipeline
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerExtractCommand } from './extract.js';
import { registerRealignCommand } from './realign.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerExtractCommand(program);
  registerRealignCommand(program);
}

