/**
 * Enrichment Errors
 *
 * @module pipeline/errors
 */

import { errorMessage } from '../logging/collector.js';

/**
 * Best-effort enrichment step failed (video search, description cleaning).
 * Always caught and logged; the pipeline degrades to absent or fallback data.
 */
export class EnrichmentError extends Error {
  constructor(
    public readonly step: 'video-search' | 'description-cleaning',
    public readonly cause: unknown
  ) {
    super(`${step} failed: ${errorMessage(cause)}`);
    this.name = 'EnrichmentError';
  }
}
