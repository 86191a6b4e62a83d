/**
 * YouTube Playlist Normalizer
 *
 * Builds video records from playlist items, then unions in tags and topic
 * categories fetched in batches of 50.
 *
 * @module sources/youtube
 */

import {
  PlaylistSummarySchema,
  YouTubeVideoRecordSchema,
  type PlaylistSummary,
  type YouTubeVideoRecord,
} from '../schemas/track.js';
import { NOOP_LOGGER, type Logger } from '../logging/collector.js';
import { chunk, collectTokenPages, uniqueBy } from './paging.js';
import type { YouTubePlaylistClient, YouTubeVideoEnrichment } from './types.js';

/** Maximum IDs per enrichment request */
export const ENRICHMENT_BATCH_SIZE = 50;

/** Titles the API substitutes for items the user can no longer see */
const PLACEHOLDER_TITLES = new Set(['Deleted video', 'Private video']);

/**
 * Reduce a topic category URL to its readable label.
 *
 * @example
 * ```typescript
 * topicLabel('https://en.wikipedia.org/wiki/Pop_music'); // 'Pop music'
 * topicLabel('Rock'); // 'Rock'
 * ```
 */
export function topicLabel(topic: string): string {
  const slash = topic.lastIndexOf('/');
  if (slash === -1) {
    return topic;
  }
  return decodeSlug(topic.slice(slash + 1)).replace(/_/g, ' ').trim() || topic;
}

function decodeSlug(slug: string): string {
  try {
    return decodeURIComponent(slug);
  } catch {
    return slug;
  }
}

/**
 * Fetch tags and topics for every video, in batches.
 */
export async function fetchEnrichment(
  client: YouTubePlaylistClient,
  videoIds: string[]
): Promise<Map<string, YouTubeVideoEnrichment>> {
  const byId = new Map<string, YouTubeVideoEnrichment>();
  for (const batch of chunk(videoIds, ENRICHMENT_BATCH_SIZE)) {
    for (const enrichment of await client.getVideoEnrichment(batch)) {
      byId.set(enrichment.videoId, enrichment);
    }
  }
  return byId;
}

/**
 * Fetch a playlist and normalize it into YouTube video records.
 *
 * @param client - Authenticated YouTube client handle
 * @param playlistId - Bare playlist ID
 * @param logger - Invocation logger
 * @returns Records in playlist order
 */
export async function fetchYouTubeVideos(
  client: YouTubePlaylistClient,
  playlistId: string,
  logger: Logger = NOOP_LOGGER
): Promise<YouTubeVideoRecord[]> {
  const entries = await collectTokenPages((pageToken) =>
    client.listPlaylistItems(playlistId, pageToken)
  );

  const base = uniqueBy(
    entries.flatMap((entry) => {
      const title = entry.title.trim();
      if (!entry.videoId || !title || PLACEHOLDER_TITLES.has(title)) {
        return [];
      }
      return [{ ...entry, videoId: entry.videoId }];
    }),
    (entry) => entry.videoId
  );

  logger.debug(`YouTube playlist ${playlistId}: ${entries.length} items, ${base.length} usable videos`);

  if (base.length === 0) {
    return [];
  }

  const enrichment = await fetchEnrichment(
    client,
    base.map((entry) => entry.videoId)
  );

  return base.map((entry) => {
    const extra = enrichment.get(entry.videoId);
    return YouTubeVideoRecordSchema.parse({
      provenance: 'youtube',
      id: entry.videoId,
      name: entry.title,
      artist: entry.channelTitle,
      album: '',
      tags: extra?.tags ?? [],
      topicCategories: (extra?.topicCategories ?? []).map(topicLabel),
      publishedAt: entry.publishedAt,
      description: entry.description,
    });
  });
}

/**
 * List the authenticated user's YouTube playlists.
 */
export async function listYouTubePlaylists(client: YouTubePlaylistClient): Promise<PlaylistSummary[]> {
  const playlists = await collectTokenPages((pageToken) => client.listMyPlaylists(pageToken));
  return playlists.map((playlist) => PlaylistSummarySchema.parse(playlist));
}
