/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * BaseCommand is also the pipeline's Logger: stages log through it.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { ConfigError, RecipeError } from '../errors/index.js';
import type { Logger } from '../pipeline/types.js';
import { getDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export type GlobalOptions = {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** A stage failed, or any unexpected error */
  ERROR: 1,
  /** Invalid usage, arguments, recipe or configuration */
  USAGE_ERROR: 2,
  /** Build, image or bundle not found */
  NOT_FOUND: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that escaped a command handler.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof RecipeError || error instanceof ConfigError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * async function handleBuild(recipe: string | undefined, options: BuildCommandOptions, base: BaseCommand) {
 *   base.info(`Building ${recipe}`);
 *   const { result } = await runBuild({ recipe, logger: base });
 *   return result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
 * }
 * ```
 */
export class BaseCommand implements Logger {
  readonly options: GlobalOptions;

  private readonly useColor: boolean;

  /** Resolved data directory path */
  readonly dataDir: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    // Storage resolves the data directory from the environment on every call
    if (options.dataDir) {
      process.env.PROVISIONER_DATA_DIR = options.dataDir;
    }
    this.dataDir = getDataDir();

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message (always visible).
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  /**
   * Log an error and exit.
   */
  fatal(message: string, errorOrCode?: Error | ExitCode): never {
    this.error(message);

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(exitCodeForError(errorOrCode));
    }
    process.exit(errorOrCode ?? EXIT_CODES.ERROR);
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON (visible in quiet mode).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print command output that quiet mode must not hide.
   */
  print(text: string): void {
    console.log(text);
  }

  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }

  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Get the base command the root program stored in its preAction hook.
 * Walks up from any subcommand.
 */
export function getBaseCommand(cmd: Command): BaseCommand {
  let root = cmd;
  while (root.parent) {
    root = root.parent;
  }

  const base = root.getOptionValue('_baseCommand');
  if (!(base instanceof BaseCommand)) {
    // Handlers registered on a bare Command in tests
    return new BaseCommand({});
  }
  return base;
}

/**
 * Run a command handler and exit with its code. Errors become an error
 * message and the matching exit code.
 */
export async function runHandler(cmd: Command, handler: (base: BaseCommand) => Promise<ExitCode>): Promise<void> {
  const base = getBaseCommand(cmd);

  let code: ExitCode;
  try {
    code = await handler(base);
  } catch (error) {
    if (error instanceof Error) {
      base.fatal(error.message, error);
    }
    throw error;
  }

  if (code !== EXIT_CODES.SUCCESS) {
    base.exitWith(code);
  }
}
