/**
 * Description Sanitizer Exports
 *
 * @module sanitizer
 */

export {
  DescriptionSanitizer,
  DEFAULT_SANITIZER_BATCH_SIZE,
  DEFAULT_MAX_DESCRIPTION_CHARS,
  type DescriptionSanitizerOptions,
} from './sanitizer.js';
export { cleanDescriptionRules } from './rules.js';
export { END_MARKER, SANITIZER_SYSTEM_PROMPT, buildSanitizerPrompt, parseSanitizerResponse } from './prompts.js';
