/**
 * Recommendation Schemas
 *
 * Result returned from the pipeline entry point and the analytics event
 * handed to the sink once per invocation.
 *
 * @module schemas/recommendation
 */

import { z } from 'zod';
import { ProvenanceSchema } from './track.js';

// ============================================
// Video Link
// ============================================

/**
 * Top video match for a recommendation
 */
export const VideoLinkSchema = z.object({
  videoId: z.string().min(1),
  title: z.string(),
  channel: z.string(),
  url: z.string().url(),
});

export type VideoLink = z.infer<typeof VideoLinkSchema>;

// ============================================
// Result
// ============================================

export const RecommendationDetailsSchema = z.object({
  /** Model that produced the recommendation */
  model: z.string().optional(),
  /** Cost of the winning completion in USD */
  costUsd: z.number().nonnegative().optional(),
  /** Best-effort video match */
  videoLink: VideoLinkSchema.nullable().optional(),
  /** Timestamped log entries for this invocation */
  logs: z.array(z.string()),
  /** Human-readable failure reason */
  error: z.string().optional(),
});

export type RecommendationDetails = z.infer<typeof RecommendationDetailsSchema>;

/**
 * What `recommend` hands back to the caller
 */
export interface RecommendationResult {
  /** HTML-escaped "Title - Artist - Album" line, or null on failure */
  recommendation: string | null;
  details: RecommendationDetails;
}

// ============================================
// Analytics Event
// ============================================

export const OutcomeSchema = z.enum(['success', 'failure', 'no_data']);

export type Outcome = z.infer<typeof OutcomeSchema>;

export const RecommendationEventSchema = z.object({
  sessionId: z.string().nullable(),
  service: ProvenanceSchema,
  playlistId: z.string(),
  /** Raw (unescaped) recommendation text */
  recommendationText: z.string().nullable(),
  details: RecommendationDetailsSchema,
  language: z.string(),
  outcome: OutcomeSchema,
  errorMessage: z.string().optional(),
  /** ISO8601 timestamp */
  timestamp: z.string().datetime(),
});

export type RecommendationEvent = z.infer<typeof RecommendationEventSchema>;
