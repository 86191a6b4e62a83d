/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 *
 * Available commands:
 * - recommend: Recommend one new song for a playlist
 * - playlists: List the authenticated user's playlists
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRecommendCommand } from './recommend.js';
import { registerPlaylistsCommand } from './playlists.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRecommendCommand(program);
  registerPlaylistsCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'recommend <service> <playlist>', description: 'Recommend one new song for a playlist' },
    { name: 'playlists <service>', description: "List the authenticated user's playlists" },
  ];
}
