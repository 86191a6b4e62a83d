/**
 * setlist-scout
 *
 * Recommends one new song for a Spotify or YouTube playlist. The
 * {@link RecommendationPipeline} is the entry point; the modules below are
 * exported for callers that want to assemble their own.
 *
 * @example
 * ```typescript
 * import { createRecommendationPipeline, loadConfig, SpotifyWebApiClient } from 'setlist-scout';
 *
 * const pipeline = createRecommendationPipeline(loadConfig());
 * const result = await pipeline.recommend({
 *   service: 'spotify',
 *   playlist: 'https://open.spotify.com/playlist/37i9dQZF1DXcBWIGoYBM5M',
 *   client: new SpotifyWebApiClient(process.env.SPOTIFY_ACCESS_TOKEN ?? ''),
 * });
 * ```
 *
 * @module setlist-scout
 */

export * from './config/index.js';
export * from './schemas/index.js';
export * from './logging/index.js';
export * from './sources/index.js';
export * from './sanitizer/index.js';
export * from './prompt/index.js';
export * from './dedupe/index.js';
export * from './llm/client.js';
export * from './recommender/index.js';
export * from './links/index.js';
export * from './analytics/index.js';
export * from './pipeline/index.js';
