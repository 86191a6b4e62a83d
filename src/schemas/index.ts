/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the schema definitions used in the pipeline.
 */

// ============================================================================
// Track Records
// ============================================================================

export {
  ProvenanceSchema,
  AudioFeaturesSchema,
  AUDIO_FEATURE_KEYS,
  SpotifyTrackRecordSchema,
  YouTubeVideoRecordSchema,
  PlaylistSummarySchema,
  isYouTubeRecord,
} from './track.js';

export type {
  Provenance,
  AudioFeatures,
  AudioFeatureKey,
  SpotifyTrackRecord,
  YouTubeVideoRecord,
  TrackRecord,
  PlaylistSnapshot,
  PlaylistSummary,
} from './track.js';

// ============================================================================
// Recommendation Result and Event
// ============================================================================

export {
  VideoLinkSchema,
  RecommendationDetailsSchema,
  OutcomeSchema,
  RecommendationEventSchema,
} from './recommendation.js';

export type {
  VideoLink,
  RecommendationDetails,
  RecommendationResult,
  Outcome,
  RecommendationEvent,
} from './recommendation.js';
