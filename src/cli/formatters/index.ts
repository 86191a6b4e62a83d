/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export { ProgressSpinner, createSpinner, formatDuration, type SpinnerOptions } from './progress.js';

// Result formatters
export { formatRecommendationDetails, formatPlaylistTable, truncate, padRight } from './recommendation.js';
