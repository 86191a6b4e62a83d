/**
 * Link Resolver Exports
 *
 * @module links
 */

export {
  resolveVideoLink,
  videoUrl,
  type VideoSearchClient,
  type VideoSearchOptions,
  type VideoSearchResult,
} from './resolver.js';
