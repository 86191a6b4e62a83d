/**
 * Description Sanitizer
 *
 * Cleans free-text video descriptions in batches through a completion
 * model, falling back to the rule-based cleaner for any batch the model
 * cannot handle. Output is always aligned with the input: same length,
 * same order, empty in gives empty out.
 *
 * @module sanitizer/sanitizer
 */

import { getModelConfig } from '../config/models.js';
import type { CompletionClient } from '../llm/client.js';
import { NOOP_LOGGER, type Logger } from '../logging/collector.js';
import { EnrichmentError } from '../pipeline/errors.js';
import type { YouTubeVideoRecord } from '../schemas/track.js';
import { truncateCodePoints } from '../prompt/truncate.js';
import { chunk } from '../sources/paging.js';
import { buildSanitizerPrompt, parseSanitizerResponse, SANITIZER_SYSTEM_PROMPT } from './prompts.js';
import { cleanDescriptionRules } from './rules.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Sanitizer options
 */
export interface DescriptionSanitizerOptions {
  /** Model used for the cleaning pass (default: sanitizer task model) */
  model?: string;
  /** Descriptions per model call (default 50) */
  batchSize?: number;
  /** Characters kept per description before submission (default 500) */
  maxChars?: number;
  /** Default logger when a call passes none */
  logger?: Logger;
}

export const DEFAULT_SANITIZER_BATCH_SIZE = 50;
export const DEFAULT_MAX_DESCRIPTION_CHARS = 500;

// ============================================================================
// Sanitizer
// ============================================================================

/**
 * Batch description cleaner.
 *
 * Without a completion client only the rule-based cleaner runs.
 *
 * @example
 * ```typescript
 * const sanitizer = new DescriptionSanitizer(completionClient);
 * const cleaned = await sanitizer.sanitize(['Live at the pier https://example.test', '']);
 * // ['Live at the pier', '']
 * ```
 */
export class DescriptionSanitizer {
  private readonly model: string;
  private readonly batchSize: number;
  private readonly maxChars: number;
  private readonly logger: Logger;

  constructor(
    private readonly client?: CompletionClient,
    options: DescriptionSanitizerOptions = {}
  ) {
    this.model = options.model ?? getModelConfig('sanitizer').modelId;
    this.batchSize = options.batchSize ?? DEFAULT_SANITIZER_BATCH_SIZE;
    this.maxChars = options.maxChars ?? DEFAULT_MAX_DESCRIPTION_CHARS;
    this.logger = options.logger ?? NOOP_LOGGER;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new Error(`Sanitizer batch size must be a positive integer, got ${this.batchSize}`);
    }
    if (!Number.isInteger(this.maxChars) || this.maxChars < 1) {
      throw new Error(`Sanitizer character limit must be a positive integer, got ${this.maxChars}`);
    }
  }

  /**
   * Clean descriptions, preserving length and order.
   */
  async sanitize(descriptions: readonly string[], logger: Logger = this.logger): Promise<string[]> {
    const output = descriptions.map(() => '');
    const positions = descriptions.flatMap((d, i) => (d.trim() ? [i] : []));

    if (positions.length === 0) {
      return output;
    }

    for (const batch of chunk(positions, this.batchSize)) {
      const inputs = batch.map((i) => truncateCodePoints(descriptions[i], this.maxChars));
      const cleaned = await this.cleanBatch(inputs, logger);
      batch.forEach((position, k) => {
        output[position] = cleaned[k];
      });
    }

    return output;
  }

  /**
   * Clean the descriptions of YouTube records, returning copies with
   * `transformedDescription` set.
   */
  async sanitizeRecords(
    records: readonly YouTubeVideoRecord[],
    logger: Logger = this.logger
  ): Promise<YouTubeVideoRecord[]> {
    const cleaned = await this.sanitize(
      records.map((record) => record.description),
      logger
    );
    return records.map((record, i) => ({ ...record, transformedDescription: cleaned[i] }));
  }

  /**
   * One batch through the model; any failure or misalignment falls back to
   * the rules for the whole batch.
   */
  private async cleanBatch(inputs: string[], logger: Logger): Promise<string[]> {
    if (!this.client) {
      return inputs.map(cleanDescriptionRules);
    }

    const config = getModelConfig('sanitizer', this.model);

    try {
      const response = await this.client.complete({
        model: config.modelId,
        messages: [
          { role: 'system', content: SANITIZER_SYSTEM_PROMPT },
          { role: 'user', content: buildSanitizerPrompt(inputs) },
        ],
        temperature: config.temperature,
        maxTokens: config.maxOutputTokens,
        timeoutMs: config.timeoutMs,
      });

      const parts = parseSanitizerResponse(response.content, inputs.length);
      if (parts) {
        return parts;
      }
      logger.warn(
        `Description cleaning returned a misaligned batch of ${inputs.length}; using rule-based cleaner`
      );
    } catch (error) {
      logger.warn(`${new EnrichmentError('description-cleaning', error).message}; using rule-based cleaner`);
    }

    return inputs.map(cleanDescriptionRules);
  }
}
