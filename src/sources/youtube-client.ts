/**
 * YouTube Data API Client
 *
 * Low-level client for the YouTube Data API v3 over the shared retrying
 * transport. Lists playlist items and the user's playlists, looks up tags
 * and topic categories for videos, and searches for videos. Tracks quota
 * usage and flags quota-exceeded errors.
 *
 * @module sources/youtube-client
 */

import { z } from 'zod';
import { fetchWithRetry, TransportError, type RetryPolicy } from '../http/transport.js';
import type { VideoSearchClient, VideoSearchOptions, VideoSearchResult } from '../links/resolver.js';
import type { PlaylistSummary } from '../schemas/track.js';
import type {
  TokenPage,
  YouTubePlaylistClient,
  YouTubePlaylistEntry,
  YouTubeVideoEnrichment,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Credentials: an OAuth access token for the user's own data, or an API key
 * for public data and search.
 */
export type YouTubeAuth = { accessToken: string } | { apiKey: string };

/**
 * Client construction options
 */
export interface YouTubeClientOptions {
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Retry policy override */
  policy?: RetryPolicy;
  /** fetch implementation (tests inject a fake) */
  fetch?: typeof fetch;
  /** Retry delay implementation */
  wait?: (ms: number) => Promise<void>;
}

/**
 * Quota usage tracking
 */
export interface QuotaUsage {
  /** Total units consumed */
  totalUnits: number;
  /** Search calls made (100 units each) */
  searchCalls: number;
  /** List calls made (1 unit each) */
  listCalls: number;
}

/**
 * YouTube API error with additional context
 */
export class YouTubeApiError extends TransportError {
  constructor(
    message: string,
    statusCode: number,
    isRetryable: boolean,
    public readonly isQuotaExceeded: boolean = false
  ) {
    super(message, statusCode, isRetryable);
    this.name = 'YouTubeApiError';
  }
}

// ============================================================================
// API Response Schemas (Internal)
// ============================================================================

const PlaylistItemsResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        snippet: z
          .object({
            title: z.string().default(''),
            description: z.string().default(''),
            channelTitle: z.string().default(''),
            videoOwnerChannelTitle: z.string().optional(),
            publishedAt: z.string().optional(),
            resourceId: z.object({ videoId: z.string().optional() }).optional(),
          })
          .default({}),
        contentDetails: z
          .object({
            videoId: z.string().optional(),
            videoPublishedAt: z.string().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

const VideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({ tags: z.array(z.string()).optional() }).optional(),
        topicDetails: z.object({ topicCategories: z.array(z.string()).optional() }).optional(),
      })
    )
    .default([]),
});

const PlaylistsResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({ title: z.string().default('') }).default({}),
      })
    )
    .default([]),
});

const SearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }),
        snippet: z
          .object({
            title: z.string().default(''),
            description: z.string().default(''),
            channelTitle: z.string().default(''),
            publishedAt: z.string().optional(),
          })
          .default({}),
      })
    )
    .default([]),
});

const ErrorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      errors: z.array(z.object({ reason: z.string().optional() })).optional(),
    })
    .optional(),
});

// ============================================================================
// Constants
// ============================================================================

const BASE_URL = 'https://www.googleapis.com/youtube/v3';

/** Maximum page size and ID batch size accepted by the API */
export const YOUTUBE_MAX_RESULTS = 50;

const DEFAULT_TIMEOUT_MS = 10000;

/** Quota costs per operation */
const QUOTA_COSTS = {
  search: 100,
  list: 1,
} as const;

const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded', 'rateLimitExceeded']);

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * YouTubeClient provides access to the YouTube Data API v3.
 *
 * @example
 * ```typescript
 * const client = new YouTubeClient({ accessToken: token });
 * const page = await client.listPlaylistItems('PLabc123');
 *
 * const search = new YouTubeClient({ apiKey: key });
 * const [top] = await search.search('Harbor Lights - The Tidewater Band', { maxResults: 1 });
 * console.log(`Quota used: ${search.getQuotaUsage().totalUnits} units`);
 * ```
 */
export class YouTubeClient implements YouTubePlaylistClient, VideoSearchClient {
  private quotaUsage: QuotaUsage = { totalUnits: 0, searchCalls: 0, listCalls: 0 };

  constructor(
    private readonly auth: YouTubeAuth,
    private readonly options: YouTubeClientOptions = {}
  ) {
    const credential = 'accessToken' in auth ? auth.accessToken : auth.apiKey;
    if (!credential.trim()) {
      throw new Error('YouTubeClient requires a non-empty access token or API key');
    }
  }

  /**
   * One page of playlist items (50 per page). Costs 1 quota unit.
   */
  async listPlaylistItems(
    playlistId: string,
    pageToken?: string
  ): Promise<TokenPage<YouTubePlaylistEntry>> {
    const params = new URLSearchParams({
      part: 'snippet,contentDetails',
      playlistId,
      maxResults: String(YOUTUBE_MAX_RESULTS),
    });
    if (pageToken) params.set('pageToken', pageToken);

    const data = await this.get('playlistItems', params, PlaylistItemsResponseSchema, 'list');

    return {
      items: data.items.map((item) => ({
        videoId: item.contentDetails?.videoId ?? item.snippet.resourceId?.videoId,
        title: item.snippet.title,
        channelTitle: item.snippet.videoOwnerChannelTitle ?? item.snippet.channelTitle,
        description: item.snippet.description,
        publishedAt: item.contentDetails?.videoPublishedAt ?? item.snippet.publishedAt,
      })),
      nextPageToken: data.nextPageToken,
    };
  }

  /**
   * Tags and topic categories for up to 50 videos. Costs 1 quota unit.
   */
  async getVideoEnrichment(videoIds: string[]): Promise<YouTubeVideoEnrichment[]> {
    if (videoIds.length === 0) {
      return [];
    }

    const params = new URLSearchParams({
      part: 'snippet,topicDetails',
      id: videoIds.slice(0, YOUTUBE_MAX_RESULTS).join(','),
      maxResults: String(YOUTUBE_MAX_RESULTS),
    });

    const data = await this.get('videos', params, VideosResponseSchema, 'list');

    return data.items.map((item) => ({
      videoId: item.id,
      tags: item.snippet?.tags ?? [],
      topicCategories: item.topicDetails?.topicCategories ?? [],
    }));
  }

  /**
   * One page of the authenticated user's playlists. Costs 1 quota unit.
   */
  async listMyPlaylists(pageToken?: string): Promise<TokenPage<PlaylistSummary>> {
    const params = new URLSearchParams({
      part: 'snippet',
      mine: 'true',
      maxResults: String(YOUTUBE_MAX_RESULTS),
    });
    if (pageToken) params.set('pageToken', pageToken);

    const data = await this.get('playlists', params, PlaylistsResponseSchema, 'list');

    return {
      items: data.items.map((item) => ({ id: item.id, name: item.snippet.title })),
      nextPageToken: data.nextPageToken,
    };
  }

  /**
   * Search for videos matching a query. Costs 100 quota units.
   */
  async search(query: string, options: VideoSearchOptions = {}): Promise<VideoSearchResult[]> {
    const params = new URLSearchParams({
      part: 'snippet',
      q: query,
      type: 'video',
      maxResults: String(Math.min(options.maxResults ?? 1, YOUTUBE_MAX_RESULTS)),
    });

    const data = await this.get('search', params, SearchResponseSchema, 'search');

    return data.items.flatMap((item) =>
      item.id.videoId
        ? [
            {
              videoId: item.id.videoId,
              title: item.snippet.title,
              channelTitle: item.snippet.channelTitle,
              description: item.snippet.description,
              publishedAt: item.snippet.publishedAt,
            },
          ]
        : []
    );
  }

  /**
   * Get current quota usage.
   */
  getQuotaUsage(): QuotaUsage {
    return { ...this.quotaUsage };
  }

  /**
   * Reset quota usage tracking.
   */
  resetQuotaUsage(): void {
    this.quotaUsage = { totalUnits: 0, searchCalls: 0, listCalls: 0 };
  }

  /**
   * Issue a GET request, validate the body and record quota.
   */
  private async get<T>(
    resource: string,
    params: URLSearchParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    operation: keyof typeof QUOTA_COSTS
  ): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if ('accessToken' in this.auth) {
      headers.Authorization = `Bearer ${this.auth.accessToken}`;
    } else {
      params.set('key', this.auth.apiKey);
    }

    const response = await fetchWithRetry(
      `${BASE_URL}/${resource}?${params.toString()}`,
      { method: 'GET', headers },
      {
        timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        policy: this.options.policy,
        fetch: this.options.fetch,
        wait: this.options.wait,
      }
    );

    if (!response.ok) {
      await this.handleError(response);
    }

    this.recordQuota(operation);

    const body: unknown = await response.json();
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new YouTubeApiError(
        `Unexpected ${resource} response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        response.status,
        false
      );
    }
    return parsed.data;
  }

  private recordQuota(operation: keyof typeof QUOTA_COSTS): void {
    if (operation === 'search') {
      this.quotaUsage.searchCalls++;
    } else {
      this.quotaUsage.listCalls++;
    }
    this.quotaUsage.totalUnits += QUOTA_COSTS[operation];
  }

  /**
   * Handle API error responses.
   *
   * Detects quota exceeded (403) errors and marks them appropriately.
   */
  private async handleError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    let errorMessage = text;
    let isQuotaExceeded = false;

    const parsed = ErrorBodySchema.safeParse(safeJsonParse(text));
    if (parsed.success && parsed.data.error) {
      if (parsed.data.error.message) {
        errorMessage = parsed.data.error.message;
      }
      const reasons = parsed.data.error.errors?.map((e) => e.reason) ?? [];
      isQuotaExceeded = reasons.some((r) => r !== undefined && QUOTA_REASONS.has(r));
    }

    if (response.status === 403) {
      const lowerMessage = errorMessage.toLowerCase();
      if (
        lowerMessage.includes('quota') ||
        lowerMessage.includes('limit exceeded') ||
        lowerMessage.includes('daily limit')
      ) {
        isQuotaExceeded = true;
      }
    }

    const isRetryable = !isQuotaExceeded && (response.status === 429 || response.status >= 500);

    let message: string;
    if (isQuotaExceeded) {
      message = `YouTube API quota exceeded: ${errorMessage}`;
    } else if (response.status === 429) {
      message = `Rate limit exceeded: ${errorMessage}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${errorMessage}`;
    } else if (response.status === 401) {
      message = 'Authentication failed: invalid or expired credentials';
    } else if (response.status === 403) {
      message = `Access forbidden: ${errorMessage}`;
    } else if (response.status === 404) {
      message = `Not found: ${errorMessage}`;
    } else {
      message = `API error (${response.status}): ${errorMessage}`;
    }

    throw new YouTubeApiError(message, response.status, isRetryable, isQuotaExceeded);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Check if an error indicates quota exceeded
 */
export function isQuotaExceededError(error: unknown): boolean {
  return error instanceof YouTubeApiError && error.isQuotaExceeded;
}
