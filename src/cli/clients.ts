/**
 * CLI Client Handles
 *
 * Builds the authenticated playlist client for a service from an access
 * token given on the command line or in the environment.
 *
 * @module cli/clients
 */

import { ConfigurationError, type AppConfig } from '../config/index.js';
import { ProvenanceSchema, type Provenance } from '../schemas/track.js';
import type { PlaylistSource } from '../sources/index.js';
import { SpotifyWebApiClient } from '../sources/spotify-client.js';
import { YouTubeClient } from '../sources/youtube-client.js';

/**
 * Parse a service argument.
 *
 * @throws Error when the value is not a supported service
 */
export function parseService(value: string): Provenance {
  const parsed = ProvenanceSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(`Unknown service "${value}". Use spotify or youtube.`);
  }
  return parsed.data;
}

/**
 * Pick the access token for a service: the explicit one, else the configured one.
 *
 * @throws ConfigurationError when neither is set
 */
export function resolveAccessToken(service: Provenance, config: AppConfig, explicit?: string): string {
  const token = explicit?.trim() || config.accessTokens[service];
  if (!token) {
    throw new ConfigurationError(
      `Missing access token: set ${service.toUpperCase()}_ACCESS_TOKEN or pass --token`
    );
  }
  return token;
}

/**
 * Create the playlist source for a service.
 */
export function createPlaylistSource(service: Provenance, accessToken: string): PlaylistSource {
  return service === 'spotify'
    ? { provenance: 'spotify', client: new SpotifyWebApiClient(accessToken) }
    : { provenance: 'youtube', client: new YouTubeClient({ accessToken }) };
}
