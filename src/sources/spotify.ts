/**
 * Spotify Playlist Normalizer
 *
 * Pages through a playlist, fetches audio features in batches of 100 and
 * inner-joins them onto the track metadata. Tracks without features are
 * left out of the snapshot.
 *
 * @module sources/spotify
 */

import {
  PlaylistSummarySchema,
  SpotifyTrackRecordSchema,
  type PlaylistSummary,
  type SpotifyTrackRecord,
} from '../schemas/track.js';
import { NOOP_LOGGER, type Logger } from '../logging/collector.js';
import { chunk, collectOffsetPages, uniqueBy } from './paging.js';
import type { SpotifyAudioFeatureEntry, SpotifyCatalogClient } from './types.js';

/** Playlist entries requested per page */
export const SPOTIFY_PAGE_SIZE = 100;

/** Maximum IDs per audio-features request */
export const AUDIO_FEATURES_BATCH_SIZE = 100;

/** User playlists requested per page */
export const SPOTIFY_PLAYLISTS_PAGE_SIZE = 50;

/**
 * Fetch audio features for every ID, in batches, dropping empty entries.
 */
export async function fetchAudioFeatures(
  client: SpotifyCatalogClient,
  trackIds: string[]
): Promise<SpotifyAudioFeatureEntry[]> {
  const features: SpotifyAudioFeatureEntry[] = [];
  for (const batch of chunk(trackIds, AUDIO_FEATURES_BATCH_SIZE)) {
    const result = await client.getAudioFeatures(batch);
    for (const entry of result) {
      if (entry) features.push(entry);
    }
  }
  return features;
}

/**
 * Fetch a playlist and normalize it into Spotify track records.
 *
 * @param client - Authenticated Spotify client handle
 * @param playlistId - Bare playlist ID
 * @param logger - Invocation logger
 * @returns Records with audio features, in playlist order
 */
export async function fetchSpotifyTracks(
  client: SpotifyCatalogClient,
  playlistId: string,
  logger: Logger = NOOP_LOGGER
): Promise<SpotifyTrackRecord[]> {
  const entries = await collectOffsetPages(
    (page) => client.getPlaylistEntries(playlistId, page),
    SPOTIFY_PAGE_SIZE
  );

  const tracks = uniqueBy(
    entries.flatMap((entry) =>
      entry.id && entry.name.trim()
        ? [{ id: entry.id, name: entry.name, artist: entry.artists[0] ?? '', album: entry.album }]
        : []
    ),
    (track) => track.id
  );

  logger.debug(`Spotify playlist ${playlistId}: ${entries.length} entries, ${tracks.length} usable tracks`);

  if (tracks.length === 0) {
    return [];
  }

  const features = await fetchAudioFeatures(
    client,
    tracks.map((track) => track.id)
  );
  const featuresById = new Map(features.map((feature) => [feature.id, feature]));

  const records: SpotifyTrackRecord[] = [];
  for (const track of tracks) {
    const feature = featuresById.get(track.id);
    if (!feature) continue;
    records.push(
      SpotifyTrackRecordSchema.parse({
        provenance: 'spotify',
        ...track,
        features: {
          danceability: feature.danceability,
          energy: feature.energy,
          tempo: feature.tempo,
          valence: feature.valence,
        },
      })
    );
  }

  if (records.length < tracks.length) {
    logger.debug(`Dropped ${tracks.length - records.length} tracks without audio features`);
  }

  return records;
}

/**
 * List the current user's Spotify playlists.
 */
export async function listSpotifyPlaylists(client: SpotifyCatalogClient): Promise<PlaylistSummary[]> {
  const playlists = await collectOffsetPages((page) => client.getUserPlaylists(page), SPOTIFY_PLAYLISTS_PAGE_SIZE);
  return playlists.map((playlist) => PlaylistSummarySchema.parse(playlist));
}
