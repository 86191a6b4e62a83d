/**
 * Duplicate Filter Exports
 *
 * @module dedupe
 */

export { normalizeTitle, cleanCandidateTitle } from './normalize.js';

export {
  indelDistance,
  similarityRatio,
  titleSimilarity,
  findDuplicate,
  isDuplicateTitle,
  DEFAULT_SIMILARITY_THRESHOLD,
} from './similarity.js';
