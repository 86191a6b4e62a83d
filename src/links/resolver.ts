/**
 * Link Resolver
 *
 * Best-effort lookup of a watchable video for the recommended song. Any
 * failure is logged and yields `null`; the recommendation still succeeds.
 *
 * @module links/resolver
 */

import { NOOP_LOGGER, type Logger } from '../logging/collector.js';
import { EnrichmentError } from '../pipeline/errors.js';
import { VideoLinkSchema, type VideoLink } from '../schemas/recommendation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Search options
 */
export interface VideoSearchOptions {
  /** Maximum results (default 1) */
  maxResults?: number;
}

/**
 * One video search hit
 */
export interface VideoSearchResult {
  videoId: string;
  title: string;
  channelTitle: string;
  description: string;
  publishedAt?: string;
}

/**
 * Video search capability
 */
export interface VideoSearchClient {
  search(query: string, options?: VideoSearchOptions): Promise<VideoSearchResult[]>;
}

// ============================================================================
// Resolver
// ============================================================================

/**
 * Short watch URL for a video id.
 */
export function videoUrl(videoId: string): string {
  return `https://youtu.be/${videoId}`;
}

/**
 * Resolve the top video match for a query.
 *
 * @returns The match, or null when nothing was found or the search failed
 *
 * @example
 * ```typescript
 * const link = await resolveVideoLink(youtube, 'Harbor Lights - Tidewater - Low Tide', log);
 * // { videoId: 'abc123', title: 'Harbor Lights', channel: 'Tidewater', url: 'https://youtu.be/abc123' }
 * ```
 */
export async function resolveVideoLink(
  client: VideoSearchClient,
  query: string,
  logger: Logger = NOOP_LOGGER
): Promise<VideoLink | null> {
  try {
    const [top] = await client.search(query, { maxResults: 1 });
    if (!top) {
      logger.info(`No video found for "${query}"`);
      return null;
    }

    return VideoLinkSchema.parse({
      videoId: top.videoId,
      title: top.title,
      channel: top.channelTitle,
      url: videoUrl(top.videoId),
    });
  } catch (error) {
    logger.warn(new EnrichmentError('video-search', error).message);
    return null;
  }
}
