/**
 * Candidate Parsing
 *
 * @module recommender/parser
 */

/**
 * A model answer split into its display parts.
 */
export interface CandidateRecommendation {
  /** Trimmed model output */
  raw: string;
  title: string;
  artist: string;
  album: string;
}

const DELIMITER = ' - ';
const SURROUNDING_QUOTES = /^["“”]+|["“”]+$/g;

/**
 * Parse a `Title - Artist - Album` line.
 *
 * Missing parts are empty strings. Anything after the second delimiter
 * belongs to the album.
 *
 * @example
 * ```typescript
 * parseCandidate('"Harbor Lights" - Tidewater - Low Tide');
 * // { raw: '"Harbor Lights" - Tidewater - Low Tide', title: 'Harbor Lights', artist: 'Tidewater', album: 'Low Tide' }
 * ```
 */
export function parseCandidate(output: string): CandidateRecommendation {
  const raw = output.trim();
  const [title = '', artist = '', ...album] = raw.split(DELIMITER);

  return {
    raw,
    title: title.trim().replace(SURROUNDING_QUOTES, ''),
    artist: artist.trim(),
    album: album.join(DELIMITER).trim(),
  };
}
