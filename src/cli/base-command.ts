/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A pipeline logger that honours the global options
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid configuration, usage or arguments */
  USAGE_ERROR: 2,
  /** User cancelled an interactive prompt */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers should receive a BaseCommand instance
 * to access consistent logging, error handling, and options.
 *
 * @example
 * ```typescript
 * .action(async (options: RunCommandOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   base.info('Starting triage');
 *   await runTriage({ ...ctx, logger: base.logger });
 * });
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /**
   * Logger handed to the pipeline. Unlike {@link BaseCommand.error},
   * its error level never exits.
   */
  readonly logger: Logger;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   */
  constructor(options: GlobalOptions) {
    this.options = options;

    // Configure chalk based on color preference
    if (options.color === false) {
      chalk.level = 0;
    }

    this.logger = {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => {
        console.error(chalk.red(`Error: ${message}`), ...args);
      },
    };
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   *
   * @param message - Warning message
   * @param args - Additional arguments to log
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      return process.exit(EXIT_CODES.ERROR);
    }
    return process.exit(errorOrCode ?? EXIT_CODES.ERROR);
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print data as formatted JSON.
   *
   * @param data - Data to print
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Check if verbose mode is enabled.
   */
  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  /**
   * Exit with specific code.
   *
   * @param code - Exit code
   */
  exitWith(code: ExitCode): never {
    return process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command stored on the root program by the preAction hook.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance (any depth)
 * @returns BaseCommand, or a default one when none is stored (for testing)
 */
export function getBaseCommand(cmd: Command): BaseCommand {
  let current: Command | null = cmd;
  while (current) {
    const base: unknown = current.opts()['_baseCommand'];
    if (base instanceof BaseCommand) {
      return base;
    }
    current = current.parent;
  }
  return new BaseCommand({});
}
