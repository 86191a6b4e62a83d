/**
 * Prompt Builder
 *
 * Renders a sampled set of track records into the curator prompt and the
 * exclusion list the duplicate filter checks against.
 *
 * @module prompt/builder
 */

import {
  AUDIO_FEATURE_KEYS,
  type AudioFeatures,
  type PlaylistSnapshot,
  type TrackRecord,
} from '../schemas/track.js';
import { escapeHtml } from './escape.js';
import { truncateCodePoints } from './truncate.js';
import { sampleRecords, type SampleOptions } from './sampling.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A rendered prompt
 */
export interface Prompt {
  /** Full user message sent to the model */
  text: string;
  /** Lower-cased names of every sampled record, in sampling order */
  exclusions: string[];
  /** Number of records rendered */
  sampleSize: number;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_TAGS = 5;
const MAX_TOPICS = 3;
const MAX_CONTEXT_CHARS = 100;

/** Single-line answer format requested from the model */
export const OUTPUT_INSTRUCTION = 'Provide ONLY: Title - Artist - Album';

// ============================================================================
// Line Rendering
// ============================================================================

function formatFeatures(features: AudioFeatures): string | undefined {
  const parts: string[] = [];
  for (const key of AUDIO_FEATURE_KEYS) {
    const value = features[key];
    if (value === null || !Number.isFinite(value)) continue;
    parts.push(`${key}=${value.toFixed(key === 'tempo' ? 1 : 2)}`);
  }
  return parts.length > 0 ? `[${parts.join(', ')}]` : undefined;
}

function formatContext(description: string): string | undefined {
  const collapsed = description.replace(/\s+/g, ' ').trim();
  if (!collapsed) return undefined;
  const truncated = truncateCodePoints(collapsed, MAX_CONTEXT_CHARS);
  return truncated === collapsed ? collapsed : `${truncated}...`;
}

function nonEmpty(values: readonly string[]): string[] {
  return values.map((v) => v.trim()).filter((v) => v.length > 0);
}

/**
 * Render one record as a prompt line.
 *
 * @example
 * ```typescript
 * renderTrackLine(spotifyRecord);
 * // "- 'Harbor Lights' by The Tidewater Band | Album: Low Tide | [danceability=0.50, energy=0.80, tempo=120.0, valence=0.30]"
 * ```
 */
export function renderTrackLine(record: TrackRecord): string {
  const segments = [`- '${record.name}' by ${record.artist}`];

  if (record.album.trim()) {
    segments.push(`Album: ${record.album.trim()}`);
  }

  if (record.provenance === 'spotify') {
    const features = formatFeatures(record.features);
    if (features) segments.push(features);
    return segments.join(' | ');
  }

  const tags = nonEmpty(record.tags).slice(0, MAX_TAGS);
  if (tags.length > 0) {
    segments.push(`Tags: ${tags.join(', ')}`);
  }

  const topics = nonEmpty(record.topicCategories).slice(0, MAX_TOPICS);
  if (topics.length > 0) {
    segments.push(`Topics: ${topics.join(', ')}`);
  }

  const published = record.publishedAt?.split('T')[0]?.trim();
  if (published) {
    segments.push(`Published: ${published}`);
  }

  const context = formatContext(record.transformedDescription ?? record.description);
  if (context) {
    segments.push(`Context: ${context}`);
  }

  return segments.join(' | ');
}

// ============================================================================
// Prompt Rendering
// ============================================================================

/**
 * Render the curator prompt for an already-sampled set of records.
 *
 * @param sample - Records to show the model, in order
 * @param language - Requested language for the answer (HTML-escaped)
 */
export function renderPrompt(sample: readonly TrackRecord[], language: string): Prompt {
  const lines = sample.map(renderTrackLine);
  const exclusions = sample.map((record) => record.name.toLowerCase());

  const text =
    `You are a music curator. Analyze these songs and recommend one new song not listed, in ${escapeHtml(language)}.\n\n` +
    lines.join('\n') +
    '\n\nExclude: ' +
    exclusions.map((name) => `"${name}"`).join(', ') +
    `\n${OUTPUT_INSTRUCTION}`;

  return { text, exclusions, sampleSize: sample.length };
}

/**
 * Sample a snapshot and render its prompt.
 */
export function buildPrompt(
  snapshot: PlaylistSnapshot,
  language: string,
  options: SampleOptions = {}
): Prompt {
  return renderPrompt(sampleRecords(snapshot.records, options), language);
}
