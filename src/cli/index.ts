/**
 * Provisioner CLI
 *
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   provision --help
 *   provision build examples/geo-app
 *   provision plan --from-stage 3
 *   provision builds verify latest
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

export function createProgram(): Command {
  const program = new Command();

  program
    .name('provision')
    .description('Build reproducible application images from a declarative recipe')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.provisioner)');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.fatal('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);

  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}
