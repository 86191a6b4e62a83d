/**
 * Source Normalizer
 *
 * Turns a playlist identifier plus an authenticated client handle into a
 * {@link PlaylistSnapshot} of uniform track records.
 *
 * @module sources
 */

import type { PlaylistSnapshot, PlaylistSummary, TrackRecord } from '../schemas/track.js';
import { NOOP_LOGGER, type Logger } from '../logging/collector.js';
import { extractPlaylistId } from './playlist-id.js';
import { fetchSpotifyTracks, listSpotifyPlaylists } from './spotify.js';
import { fetchYouTubeVideos, listYouTubePlaylists } from './youtube.js';
import type { SpotifyCatalogClient, YouTubePlaylistClient } from './types.js';

/**
 * A provenance paired with its client handle
 */
export type PlaylistSource =
  | { provenance: 'spotify'; client: SpotifyCatalogClient }
  | { provenance: 'youtube'; client: YouTubePlaylistClient };

/**
 * Raised when a playlist yields no usable records.
 */
export class EmptyPlaylistError extends Error {
  constructor(public readonly playlistId: string) {
    super(`Playlist ${playlistId} has no usable tracks`);
    this.name = 'EmptyPlaylistError';
  }
}

/**
 * Fetch and normalize a playlist.
 *
 * @param source - Provenance and client handle
 * @param playlist - Playlist URL, URI or bare ID
 * @param logger - Invocation logger
 */
export async function fetchSnapshot(
  source: PlaylistSource,
  playlist: string,
  logger: Logger = NOOP_LOGGER
): Promise<PlaylistSnapshot> {
  const playlistId = extractPlaylistId(source.provenance, playlist);

  const records: TrackRecord[] =
    source.provenance === 'spotify'
      ? await fetchSpotifyTracks(source.client, playlistId, logger)
      : await fetchYouTubeVideos(source.client, playlistId, logger);

  return { provenance: source.provenance, playlistId, records };
}

/**
 * Assert a snapshot has records.
 *
 * @throws EmptyPlaylistError when the snapshot is empty
 */
export function requireRecords(snapshot: PlaylistSnapshot): TrackRecord[] {
  if (snapshot.records.length === 0) {
    throw new EmptyPlaylistError(snapshot.playlistId);
  }
  return snapshot.records;
}

/**
 * List the current user's playlists for a provenance.
 */
export async function listPlaylists(source: PlaylistSource): Promise<PlaylistSummary[]> {
  return source.provenance === 'spotify'
    ? listSpotifyPlaylists(source.client)
    : listYouTubePlaylists(source.client);
}

export { extractPlaylistId, extractSpotifyPlaylistId, extractYouTubePlaylistId } from './playlist-id.js';
export { fetchSpotifyTracks, fetchAudioFeatures, listSpotifyPlaylists } from './spotify.js';
export { fetchYouTubeVideos, fetchEnrichment, listYouTubePlaylists, topicLabel } from './youtube.js';
export { SpotifyWebApiClient, SpotifyApiError } from './spotify-client.js';
export {
  YouTubeClient,
  YouTubeApiError,
  isQuotaExceededError,
  type YouTubeAuth,
  type QuotaUsage,
} from './youtube-client.js';
export type {
  OffsetPage,
  OffsetPageRequest,
  TokenPage,
  SpotifyPlaylistEntry,
  SpotifyAudioFeatureEntry,
  SpotifyCatalogClient,
  YouTubePlaylistEntry,
  YouTubeVideoEnrichment,
  YouTubePlaylistClient,
} from './types.js';
