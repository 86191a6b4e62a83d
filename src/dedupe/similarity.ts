/**
 * Fuzzy Title Similarity
 *
 * Edit-distance ratio used to reject recommendations that are near
 * duplicates of titles already in the playlist.
 *
 * @module dedupe/similarity
 */

import { normalizeTitle } from './normalize.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Ratio above which a candidate counts as a duplicate (strictly greater).
 */
export const DEFAULT_SIMILARITY_THRESHOLD = 85;

// ============================================================================
// Edit Distance
// ============================================================================

/**
 * Length of the longest common subsequence of two strings.
 */
function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Insertion/deletion edit distance (a substitution costs 2).
 *
 * @example
 * ```typescript
 * indelDistance('abc', 'abd'); // 2
 * ```
 */
export function indelDistance(a: string, b: string): number {
  return a.length + b.length - 2 * longestCommonSubsequence(a, b);
}

// ============================================================================
// Ratio
// ============================================================================

/**
 * Similarity ratio between two strings on a 0-100 scale.
 *
 * `round(100 × (|a| + |b| − d) / (|a| + |b|))` where `d` is the indel
 * distance. Returns 0 when either string is empty.
 *
 * @example
 * ```typescript
 * similarityRatio('harborlights', 'harborlights'); // 100
 * similarityRatio('harborlights', 'harborlight'); // 96
 * similarityRatio('', 'abc'); // 0
 * ```
 */
export function similarityRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  const total = a.length + b.length;
  return Math.round((100 * (total - indelDistance(a, b))) / total);
}

/**
 * Similarity ratio of two titles after normalization.
 */
export function titleSimilarity(a: string, b: string): number {
  return similarityRatio(normalizeTitle(a), normalizeTitle(b));
}

/**
 * Find the first exclusion the candidate duplicates.
 *
 * @returns The matching exclusion, or undefined when the candidate is new
 */
export function findDuplicate(
  candidate: string,
  exclusions: readonly string[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): string | undefined {
  const normalized = normalizeTitle(candidate);
  return exclusions.find((exclusion) => similarityRatio(normalized, normalizeTitle(exclusion)) > threshold);
}

/**
 * Whether the candidate is a near duplicate of any excluded title.
 *
 * @param candidate - Candidate title
 * @param exclusions - Titles already in the playlist sample
 * @param threshold - Ratio that must be exceeded (default 85)
 */
export function isDuplicateTitle(
  candidate: string,
  exclusions: readonly string[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): boolean {
  return findDuplicate(candidate, exclusions, threshold) !== undefined;
}
