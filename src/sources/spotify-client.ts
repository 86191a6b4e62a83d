/**
 * Spotify Web API Client
 *
 * Adapts `spotify-web-api-node` to the {@link SpotifyCatalogClient} handle.
 * Every call goes through the shared retry helper, keyed on the status code
 * the SDK attaches to its errors.
 *
 * @module sources/spotify-client
 */

import SpotifyWebApi from 'spotify-web-api-node';
import {
  DEFAULT_RETRY_POLICY,
  TransportError,
  isNetworkError,
  withRetry,
  type RetryPolicy,
} from '../http/transport.js';
import type { PlaylistSummary } from '../schemas/track.js';
import type {
  OffsetPage,
  OffsetPageRequest,
  SpotifyAudioFeatureEntry,
  SpotifyCatalogClient,
  SpotifyPlaylistEntry,
} from './types.js';

/**
 * Spotify Web API error with status context
 */
export class SpotifyApiError extends TransportError {
  constructor(message: string, statusCode: number, isRetryable: boolean) {
    super(message, statusCode, isRetryable);
    this.name = 'SpotifyApiError';
  }
}

/**
 * Client construction options
 */
export interface SpotifyWebApiClientOptions {
  /** Retry policy override */
  policy?: RetryPolicy;
  /** Retry delay implementation */
  wait?: (ms: number) => Promise<void>;
  /** Pre-built SDK instance (the access token is set on it) */
  api?: SpotifyWebApi;
}

/** Only the fields the normalizer reads */
const PLAYLIST_TRACK_FIELDS = 'items(is_local,track(id,name,type,artists(name),album(name))),next';

/**
 * Read the HTTP status the SDK attaches to its errors.
 */
export function spotifyStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * Spotify Web API handle for one access token.
 *
 * @example
 * ```typescript
 * const client = new SpotifyWebApiClient(accessToken);
 * const records = await fetchSpotifyTracks(client, '37i9dQZF1DXcBWIGoYBM5M');
 * ```
 */
export class SpotifyWebApiClient implements SpotifyCatalogClient {
  private readonly api: SpotifyWebApi;
  private readonly policy: RetryPolicy;

  constructor(
    accessToken: string,
    private readonly options: SpotifyWebApiClientOptions = {}
  ) {
    if (!accessToken.trim()) {
      throw new Error('SpotifyWebApiClient requires a non-empty access token');
    }
    this.api = options.api ?? new SpotifyWebApi();
    this.api.setAccessToken(accessToken);
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
  }

  async getPlaylistEntries(
    playlistId: string,
    page: OffsetPageRequest
  ): Promise<OffsetPage<SpotifyPlaylistEntry>> {
    const { body } = await this.call('getPlaylistTracks', () =>
      this.api.getPlaylistTracks(playlistId, {
        limit: page.limit,
        offset: page.offset,
        fields: PLAYLIST_TRACK_FIELDS,
      })
    );

    const items = body.items.map((item): SpotifyPlaylistEntry => {
      const track = item.track;
      if (!track || item.is_local || track.type !== 'track') {
        return { id: null, name: track?.name ?? '', artists: [], album: '' };
      }
      return {
        id: track.id,
        name: track.name,
        artists: track.artists.map((artist) => artist.name),
        album: track.album.name,
      };
    });

    return { items, hasNext: body.next !== null };
  }

  async getAudioFeatures(trackIds: string[]): Promise<Array<SpotifyAudioFeatureEntry | null>> {
    if (trackIds.length === 0) {
      return [];
    }

    const { body } = await this.call('getAudioFeaturesForTracks', () =>
      this.api.getAudioFeaturesForTracks(trackIds)
    );

    // The API returns null in place of tracks it has no analysis for
    const entries: Array<SpotifyApi.AudioFeaturesObject | null> = body.audio_features;
    return entries.map((features) =>
      features
        ? {
            id: features.id,
            danceability: features.danceability ?? null,
            energy: features.energy ?? null,
            tempo: features.tempo ?? null,
            valence: features.valence ?? null,
          }
        : null
    );
  }

  async getUserPlaylists(page: OffsetPageRequest): Promise<OffsetPage<PlaylistSummary>> {
    const { body } = await this.call('getUserPlaylists', () =>
      this.api.getUserPlaylists({ limit: page.limit, offset: page.offset })
    );

    return {
      items: body.items.map((playlist) => ({ id: playlist.id, name: playlist.name })),
      hasNext: body.next !== null,
    };
  }

  /**
   * Run an SDK call with retry, converting failures to SpotifyApiError.
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const retryStatuses = this.policy.retryStatuses;
    try {
      return await withRetry(
        () => fn(),
        (error) => {
          const status = spotifyStatusOf(error);
          return status !== undefined ? retryStatuses.includes(status) : isNetworkError(error);
        },
        this.policy,
        this.options.wait
      );
    } catch (error) {
      const status = spotifyStatusOf(error) ?? 0;
      const message = error instanceof Error ? error.message : String(error);
      throw new SpotifyApiError(
        `Spotify ${operation} failed: ${message}`,
        status,
        status === 0 || retryStatuses.includes(status)
      );
    }
  }
}
