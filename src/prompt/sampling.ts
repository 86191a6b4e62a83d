/**
 * Seeded Sampling
 *
 * Deterministic uniform sampling so the same playlist always yields the
 * same prompt.
 *
 * @module prompt/sampling
 */

/** Maximum records rendered into a prompt */
export const DEFAULT_SAMPLE_SIZE = 200;

/** Seed used when none is given */
export const DEFAULT_SAMPLE_SEED = 42;

/**
 * Sampling options
 */
export interface SampleOptions {
  /** Upper bound on the sample (default 200) */
  sampleSize?: number;
  /** Generator seed (default 42) */
  seed?: number;
}

/**
 * Linear congruential generator returning floats in [0, 1).
 */
export function createSeededRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle driven by a seeded generator. Returns a new array.
 */
export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const shuffled = [...items];
  const rng = createSeededRng(seed);
  for (let i = shuffled.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Choose `min(n, sampleSize)` records uniformly at random.
 *
 * @throws Error when sampleSize is not a positive integer
 */
export function sampleRecords<T>(records: readonly T[], options: SampleOptions = {}): T[] {
  const sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  if (!Number.isInteger(sampleSize) || sampleSize < 1) {
    throw new Error(`Sample size must be a positive integer, got ${sampleSize}`);
  }
  return seededShuffle(records, options.seed ?? DEFAULT_SAMPLE_SEED).slice(0, sampleSize);
}
