/**
 * Playlists Command
 *
 * `setlist playlists <service>`: lists the authenticated user's playlists
 * so an ID can be passed to `recommend`.
 *
 * @module cli/commands/playlists
 */

import { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { createPlaylistSource, parseService, resolveAccessToken } from '../clients.js';
import { formatPlaylistTable } from '../formatters/recommendation.js';
import { ConfigurationError } from '../../config/index.js';
import { errorMessage } from '../../logging/collector.js';
import type { PlaylistSummary } from '../../schemas/track.js';
import { listPlaylists, type PlaylistSource } from '../../sources/index.js';

/**
 * Options for the playlists command.
 */
export interface PlaylistsOptions {
  token?: string;
  json?: boolean;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the playlists command.
 */
export function registerPlaylistsCommand(program: Command): void {
  program
    .command('playlists <service>')
    .description("List the authenticated user's playlists")
    .option('-t, --token <token>', 'Access token for the playlist service')
    .option('--json', 'Print the playlists as JSON')
    .action(async (service: string, options: PlaylistsOptions, cmd: Command) => {
      const base: BaseCommand = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handlePlaylists(service, options, base);
      } catch (error) {
        base.exitWithError(
          errorMessage(error),
          error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.API_ERROR
        );
      }
    });
}

/**
 * Handle the playlists command.
 */
export async function handlePlaylists(
  serviceArg: string,
  options: PlaylistsOptions,
  base: BaseCommand,
  list: (source: PlaylistSource) => Promise<PlaylistSummary[]> = listPlaylists
): Promise<void> {
  const service = parseService(serviceArg);
  const config = base.loadConfig();
  const source = createPlaylistSource(service, resolveAccessToken(service, config, options.token));

  base.debug(`Listing ${service} playlists`);
  const playlists = await list(source);

  if (options.json) {
    base.json(playlists);
    return;
  }

  if (playlists.length === 0) {
    base.info('No playlists found.');
    return;
  }

  base.section(service === 'spotify' ? 'Spotify playlists' : 'YouTube playlists');
  for (const line of formatPlaylistTable(playlists)) {
    console.log(line);
  }
  base.blank();
  base.info(`Total: ${playlists.length} playlist${playlists.length === 1 ? '' : 's'}`);
}
