/**
 * Playlist ID Extraction
 *
 * Accepts whatever the user pasted (web link, short link, URI, bare ID)
 * and returns the provenance's playlist identifier.
 *
 * @module sources/playlist-id
 */

import type { Provenance } from '../schemas/track.js';

/**
 * Spotify URI forms: `spotify:playlist:<id>` and `spotify:user:<user>:playlist:<id>`
 */
const SPOTIFY_URI_PATTERN = /^spotify:(?:user:[^:]+:)?playlist:([A-Za-z0-9]+)$/;

/**
 * Spotify web links, including `/user/<u>/playlist/<id>` and locale prefixes
 * such as `/intl-de/playlist/<id>`.
 */
const SPOTIFY_PATH_PATTERN = /\/playlist\/([A-Za-z0-9]+)/;

/**
 * YouTube playlist IDs embedded as a `list=` query parameter
 */
const YOUTUBE_LIST_PATTERN = /[?&]list=([A-Za-z0-9_-]+)/;

/**
 * Extract a Spotify playlist ID.
 *
 * @example
 * ```typescript
 * extractSpotifyPlaylistId('https://open.spotify.com/playlist/37i9dQZF1DXcBWIGoYBM5M?si=abc');
 * // '37i9dQZF1DXcBWIGoYBM5M'
 * extractSpotifyPlaylistId('spotify:playlist:37i9dQZF1DXcBWIGoYBM5M');
 * // '37i9dQZF1DXcBWIGoYBM5M'
 * ```
 */
export function extractSpotifyPlaylistId(input: string): string {
  const trimmed = input.trim();

  const uriMatch = trimmed.match(SPOTIFY_URI_PATTERN);
  if (uriMatch) {
    return uriMatch[1];
  }

  if (/^https?:\/\//i.test(trimmed) || trimmed.includes('spotify.com')) {
    const pathMatch = trimmed.match(SPOTIFY_PATH_PATTERN);
    if (pathMatch) {
      return pathMatch[1];
    }
  }

  return trimmed;
}

/**
 * Extract a YouTube playlist ID.
 *
 * @example
 * ```typescript
 * extractYouTubePlaylistId('https://www.youtube.com/playlist?list=PLabc123');
 * // 'PLabc123'
 * extractYouTubePlaylistId('https://youtu.be/dQw4w9WgXcQ?list=PLabc123&t=10');
 * // 'PLabc123'
 * ```
 */
export function extractYouTubePlaylistId(input: string): string {
  const trimmed = input.trim();
  const listMatch = trimmed.match(YOUTUBE_LIST_PATTERN);
  return listMatch ? listMatch[1] : trimmed;
}

/**
 * Extract a playlist ID for the given provenance, falling back to the
 * trimmed input when no known URL shape matches.
 */
export function extractPlaylistId(provenance: Provenance, input: string): string {
  return provenance === 'spotify'
    ? extractSpotifyPlaylistId(input)
    : extractYouTubePlaylistId(input);
}
