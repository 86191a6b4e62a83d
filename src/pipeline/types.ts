/**
 * Pipeline Types
 *
 * Request, options and collaborator contracts for the recommendation
 * pipeline.
 *
 * @module pipeline/types
 */

import { z } from 'zod';
import type { ModelPricing } from '../config/costs.js';
import type { AnalyticsSink } from '../analytics/sink.js';
import type { VideoSearchClient } from '../links/resolver.js';
import type { CompletionClient } from '../llm/client.js';
import type { Logger } from '../logging/collector.js';
import type { DescriptionSanitizer } from '../sanitizer/sanitizer.js';
import type { SpotifyCatalogClient, YouTubePlaylistClient } from '../sources/types.js';

// ============================================================================
// States
// ============================================================================

/**
 * Pipeline states, in the only order they may be entered.
 */
export const PIPELINE_STATES = ['FETCHING', 'PROMPTING', 'QUERYING', 'ENRICHING', 'DONE'] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

// ============================================================================
// Request
// ============================================================================

/**
 * One recommendation request. The client handle must match the service.
 */
export type RecommendRequest = (
  | { service: 'spotify'; client: SpotifyCatalogClient }
  | { service: 'youtube'; client: YouTubePlaylistClient }
) & {
  /** Playlist URL, URI or bare ID */
  playlist: string;
  /** Language the recommendation should be in (default 'english') */
  language?: string;
  /** Caller's session identifier, recorded in analytics */
  sessionId?: string;
};

export const DEFAULT_LANGUAGE = 'english';

// ============================================================================
// Options
// ============================================================================

export const PipelineOptionsSchema = z.object({
  /** Models in fallback order */
  models: z.array(z.string().trim().min(1)).min(1, 'At least one model is required'),
  similarityThreshold: z.number().min(0).max(100),
  sampleSize: z.number().int().positive(),
  maxAttempts: z.number().int().min(1),
  sampleSeed: z.number().int(),
});

export type PipelineOptions = z.infer<typeof PipelineOptionsSchema>;

/**
 * Collaborators handed to the pipeline constructor.
 */
export interface PipelineDependencies {
  completionClient: CompletionClient;
  /** Video search for the link step; skipped when absent */
  videoSearch?: VideoSearchClient;
  /** Receives one event per invocation */
  analyticsSink?: AnalyticsSink;
  /** Description cleaner (default: one over the completion client) */
  sanitizer?: DescriptionSanitizer;
  /** Base logger every invocation log forwards to */
  logger?: Logger;
  /** Price table for cost calculation */
  pricing?: Readonly<Record<string, ModelPricing>>;
  /** Clock for log and event timestamps */
  clock?: () => Date;
  options?: Partial<PipelineOptions>;
}
