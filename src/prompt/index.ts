/**
 * Prompt Builder Exports
 *
 * @module prompt
 */

export { buildPrompt, renderPrompt, renderTrackLine, OUTPUT_INSTRUCTION, type Prompt } from './builder.js';
export {
  sampleRecords,
  seededShuffle,
  createSeededRng,
  DEFAULT_SAMPLE_SIZE,
  DEFAULT_SAMPLE_SEED,
  type SampleOptions,
} from './sampling.js';
export { escapeHtml } from './escape.js';
export { truncateCodePoints } from './truncate.js';
