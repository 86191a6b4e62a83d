/**
 * Playlist Source Types
 *
 * Client handle contracts the normalizer depends on. Each provenance's
 * authenticated client (created by the login flow, outside this package)
 * implements one of these; tests implement them in memory.
 *
 * @module sources/types
 */

import type { AudioFeatures, PlaylistSummary } from '../schemas/track.js';

// ============================================================================
// Paging
// ============================================================================

/**
 * Offset-based page request (Spotify)
 */
export interface OffsetPageRequest {
  limit: number;
  offset: number;
}

/**
 * One page of an offset-paginated listing
 */
export interface OffsetPage<T> {
  items: T[];
  /** Whether another page follows */
  hasNext: boolean;
}

/**
 * One page of a token-paginated listing (YouTube)
 */
export interface TokenPage<T> {
  items: T[];
  nextPageToken?: string;
}

// ============================================================================
// Spotify
// ============================================================================

/**
 * A playlist entry as listed by the catalog.
 * `id` is null for local files and removed tracks.
 */
export interface SpotifyPlaylistEntry {
  id: string | null;
  name: string;
  artists: string[];
  album: string;
}

/**
 * Audio features for one track
 */
export interface SpotifyAudioFeatureEntry extends AudioFeatures {
  id: string;
}

/**
 * Authenticated Spotify client handle.
 */
export interface SpotifyCatalogClient {
  /** One page of playlist entries (max 100 per page) */
  getPlaylistEntries(playlistId: string, page: OffsetPageRequest): Promise<OffsetPage<SpotifyPlaylistEntry>>;

  /** Audio features for up to 100 track IDs; missing tracks come back as null */
  getAudioFeatures(trackIds: string[]): Promise<Array<SpotifyAudioFeatureEntry | null>>;

  /** One page of the current user's playlists (max 50 per page) */
  getUserPlaylists(page: OffsetPageRequest): Promise<OffsetPage<PlaylistSummary>>;
}

// ============================================================================
// YouTube
// ============================================================================

/**
 * A playlist item as listed by the video service.
 * `videoId` is absent for deleted or private placeholders.
 */
export interface YouTubePlaylistEntry {
  videoId?: string;
  title: string;
  channelTitle: string;
  description: string;
  publishedAt?: string;
}

/**
 * Enrichment data for one video
 */
export interface YouTubeVideoEnrichment {
  videoId: string;
  tags: string[];
  topicCategories: string[];
}

/**
 * Authenticated YouTube client handle.
 */
export interface YouTubePlaylistClient {
  /** One page of playlist items (max 50 per page) */
  listPlaylistItems(playlistId: string, pageToken?: string): Promise<TokenPage<YouTubePlaylistEntry>>;

  /** Tags and topic categories for up to 50 video IDs */
  getVideoEnrichment(videoIds: string[]): Promise<YouTubeVideoEnrichment[]>;

  /** One page of the current user's playlists (max 50 per page) */
  listMyPlaylists(pageToken?: string): Promise<TokenPage<PlaylistSummary>>;
}
