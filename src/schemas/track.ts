/**
 * Track Schemas
 *
 * The canonical record shape every playlist source normalizes into.
 * Records are a discriminated union on `provenance`: audio features only
 * exist on Spotify tracks, tags/topics/descriptions only on YouTube videos.
 *
 * @module schemas/track
 */

import { z } from 'zod';

// ============================================
// Provenance
// ============================================

/**
 * Originating platform of playlist data
 */
export const ProvenanceSchema = z.enum(['spotify', 'youtube']);

export type Provenance = z.infer<typeof ProvenanceSchema>;

// ============================================
// Audio Features
// ============================================

/**
 * Audio features used in the prompt. Each value may be null when the
 * catalog has no measurement for it.
 */
export const AudioFeaturesSchema = z.object({
  danceability: z.number().nullable(),
  energy: z.number().nullable(),
  tempo: z.number().nullable(),
  valence: z.number().nullable(),
});

export type AudioFeatures = z.infer<typeof AudioFeaturesSchema>;

/** Feature keys in prompt rendering order */
export const AUDIO_FEATURE_KEYS = ['danceability', 'energy', 'tempo', 'valence'] as const;

export type AudioFeatureKey = (typeof AUDIO_FEATURE_KEYS)[number];

// ============================================
// Track Records
// ============================================

const BaseRecordSchema = z.object({
  /** Unique within one playlist fetch */
  id: z.string().min(1),
  /** Track or video title */
  name: z.string().min(1),
  /** First credited artist, or the uploading channel */
  artist: z.string(),
  /** Album name ('' when unknown) */
  album: z.string(),
});

export const SpotifyTrackRecordSchema = BaseRecordSchema.extend({
  provenance: z.literal('spotify'),
  features: AudioFeaturesSchema,
});

export type SpotifyTrackRecord = z.infer<typeof SpotifyTrackRecordSchema>;

export const YouTubeVideoRecordSchema = BaseRecordSchema.extend({
  provenance: z.literal('youtube'),
  tags: z.array(z.string()),
  topicCategories: z.array(z.string()),
  /** ISO8601 publication timestamp */
  publishedAt: z.string().optional(),
  /** Raw description ('' when absent) */
  description: z.string(),
  /** Description after sanitizing, set during prompt preparation */
  transformedDescription: z.string().optional(),
});

export type YouTubeVideoRecord = z.infer<typeof YouTubeVideoRecordSchema>;

export type TrackRecord = SpotifyTrackRecord | YouTubeVideoRecord;

// ============================================
// Playlist Snapshot
// ============================================

/**
 * Normalized playlist contents for one pipeline run.
 */
export interface PlaylistSnapshot {
  provenance: Provenance;
  playlistId: string;
  records: TrackRecord[];
}

/**
 * Summary of one of the user's playlists
 */
export const PlaylistSummarySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
});

export type PlaylistSummary = z.infer<typeof PlaylistSummarySchema>;

/**
 * Type guard for YouTube records
 */
export function isYouTubeRecord(record: TrackRecord): record is YouTubeVideoRecord {
  return record.provenance === 'youtube';
}
