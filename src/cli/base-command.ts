/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir)
 * - Consistent error handling and exit codes
 * - Console output that doubles as the pipeline's base logger
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { loadConfig, type AppConfig } from '../config/index.js';
import type { Logger } from '../logging/collector.js';

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
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Playlist empty or unavailable */
  NOT_FOUND: 3,
  /** API or network error */
  API_ERROR: 4,
  /** Missing or invalid configuration */
  CONFIG_ERROR: 5,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access consistent
 * logging, error handling and options. It implements {@link Logger}, so a
 * verbose run can forward the pipeline's invocation log to the console.
 *
 * @example
 * ```typescript
 * async function handlePlaylists(service: string, options: PlaylistsOptions, base: BaseCommand) {
 *   const config = base.loadConfig();
 *   base.debug(`Listing ${service} playlists`);
 *   const playlists = await listPlaylists(source);
 *   base.success(`Found ${playlists.length} playlists`);
 * }
 * ```
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /**
   * Load configuration from the environment, applying `--data-dir`.
   *
   * @throws ConfigurationError when the environment is invalid
   */
  loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return loadConfig(this.options.dataDir ? { ...env, SETLIST_DATA_DIR: this.options.dataDir } : env);
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
   *
   * @param message - Error message
   * @param errorOrCode - Error object (stack shown in verbose mode) or exit code
   */
  exitWithError(message: string, errorOrCode?: Error | ExitCode): never {
    this.error(message);

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
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

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
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

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance
 * @returns The stored BaseCommand, or a default one when none is set
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
