#!/usr/bin/env node
/**
 * setlist-scout CLI
 *
 * Main entry point for the setlist CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   setlist --help
 *   setlist recommend spotify https://open.spotify.com/playlist/<id>
 *   setlist recommend youtube "https://www.youtube.com/playlist?list=<id>" --language french
 *   setlist playlists youtube --json
 *
 * @module cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { VERSION } from './version.js';
import { BaseCommand, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('setlist')
    .description('setlist-scout - Recommend one new song for a Spotify or YouTube playlist')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.setlist-scout)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.exitWithError('Cannot use both --verbose and --quiet flags');
    }
  });

  // Register all subcommands
  registerCommands(program);

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(0);
    }
    process.exit(1);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Loads `.env`, parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  loadDotenv();
  const program = createProgram();
  await program.parseAsync(argv);
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
