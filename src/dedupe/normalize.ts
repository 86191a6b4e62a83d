/**
 * Title Normalization for Duplicate Detection
 *
 * @module dedupe/normalize
 */

/**
 * Leading/trailing double quotes, straight or typographic
 */
const SURROUNDING_QUOTES = /^["“”]+|["“”]+$/g;

/**
 * Normalize a title for comparison.
 *
 * Lowercases and removes every character outside `[a-z0-9]`, so spacing,
 * punctuation and accents never affect the similarity score.
 *
 * @example
 * ```typescript
 * normalizeTitle('Harbor Lights (Live)'); // 'harborlightslive'
 * normalizeTitle('  '); // ''
 * ```
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Extract the comparable title from a raw `Title - Artist - Album` line.
 *
 * Takes the segment before the first `" - "`, trims it, lowercases it and
 * strips surrounding double quotes.
 *
 * @example
 * ```typescript
 * cleanCandidateTitle('"Harbor Lights" - The Tidewater Band - Low Tide');
 * // 'harbor lights'
 * ```
 */
export function cleanCandidateTitle(raw: string): string {
  const [title = ''] = raw.split(' - ');
  return title.trim().toLowerCase().replace(SURROUNDING_QUOTES, '');
}
