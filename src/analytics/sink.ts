/**
 * Analytics Sink
 *
 * Append-only store for recommendation events. The JSON Lines
 * implementation writes one event per line under the data directory.
 *
 * Directory Structure:
 * ```
 * ~/.setlist-scout/
 * └── analytics/
 *     └── recommendations.jsonl
 * ```
 *
 * @module analytics/sink
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { RecommendationEventSchema, type RecommendationEvent } from '../schemas/recommendation.js';

/**
 * Receives exactly one event per pipeline invocation.
 */
export interface AnalyticsSink {
  record(event: RecommendationEvent): Promise<void>;
}

/**
 * Path of the analytics log under a data directory.
 */
export function analyticsPath(dataDir: string): string {
  return path.join(dataDir, 'analytics', 'recommendations.jsonl');
}

/**
 * Appends validated events to `<dataDir>/analytics/recommendations.jsonl`.
 *
 * @example
 * ```typescript
 * const sink = new JsonlAnalyticsSink(config.dataDir);
 * await sink.record(event);
 * ```
 */
export class JsonlAnalyticsSink implements AnalyticsSink {
  readonly filePath: string;

  constructor(dataDir: string) {
    this.filePath = analyticsPath(dataDir);
  }

  /**
   * @throws ZodError when the event does not match the schema
   */
  async record(event: RecommendationEvent): Promise<void> {
    const line = JSON.stringify(RecommendationEventSchema.parse(event));
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${line}\n`, 'utf-8');
  }
}
