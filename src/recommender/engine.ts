/**
 * Model Query Engine
 *
 * Queries one model up to a fixed number of attempts, rejecting empty
 * answers and near duplicates of the prompt's exclusion set, then folds
 * over an ordered list of model strategies until one succeeds.
 *
 * @module recommender/engine
 */

import {
  getModelConfig,
  temperatureForAttempt,
  RECOMMENDATION_SYSTEM_PROMPT,
} from '../config/models.js';
import { calculateTokenCost, MODEL_PRICING, type ModelPricing, type TokenUsage } from '../config/costs.js';
import { cleanCandidateTitle } from '../dedupe/normalize.js';
import { DEFAULT_SIMILARITY_THRESHOLD, isDuplicateTitle } from '../dedupe/similarity.js';
import type { CompletionClient } from '../llm/client.js';
import { errorMessage, NOOP_LOGGER, type Logger } from '../logging/collector.js';
import type { Prompt } from '../prompt/builder.js';
import { AllModelsExhaustedError, DuplicateExhaustedError, type ModelFailure } from './errors.js';
import { parseCandidate, type CandidateRecommendation } from './parser.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators and tuning for a model query.
 */
export interface QueryDependencies {
  client: CompletionClient;
  /** Attempts per model (default 3) */
  maxAttempts?: number;
  /** Duplicate threshold, 0..100 (default 85) */
  similarityThreshold?: number;
  /** Price table used for the cost of the winning call */
  pricing?: Readonly<Record<string, ModelPricing>>;
}

/**
 * Outcome of a successful model query.
 */
export interface ModelAttemptResult {
  model: string;
  usage: TokenUsage;
  costUsd: number;
  /** 1-based attempt that produced the answer */
  attempts: number;
  temperature: number;
  /** Trimmed model output */
  text: string;
  candidate: CandidateRecommendation;
}

/**
 * Uniform result of trying one model.
 */
export type StrategyOutcome =
  | { ok: true; result: ModelAttemptResult }
  | { ok: false; model: string; error: Error };

/**
 * One entry in the fallback order.
 */
export interface ModelStrategy {
  readonly model: string;
  attempt(prompt: Prompt, logger?: Logger): Promise<StrategyOutcome>;
}

export const DEFAULT_MAX_ATTEMPTS = 3;

// ============================================================================
// Single Model
// ============================================================================

/**
 * Query one model until it returns a non-duplicate answer.
 *
 * Attempt `k` runs at temperature `0.6 + 0.1k`. Transport errors propagate.
 *
 * @throws DuplicateExhaustedError when every attempt was empty or a duplicate
 */
export async function queryModel(
  prompt: Prompt,
  model: string,
  deps: QueryDependencies,
  logger: Logger = NOOP_LOGGER
): Promise<ModelAttemptResult> {
  const config = getModelConfig('recommendation', model);
  const maxAttempts = deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const threshold = deps.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const temperature = temperatureForAttempt(attempt, config.temperature);
    logger.info(`Querying ${model}, attempt ${attempt}, temperature=${temperature}`);

    const response = await deps.client.complete({
      model,
      messages: [
        { role: 'system', content: RECOMMENDATION_SYSTEM_PROMPT },
        { role: 'user', content: prompt.text },
      ],
      temperature,
      maxTokens: config.maxOutputTokens,
      timeoutMs: config.timeoutMs,
    });

    const text = response.content.trim();
    if (!text) {
      logger.warn(`Empty response from ${model}, retrying...`);
      continue;
    }

    const title = cleanCandidateTitle(text);
    if (isDuplicateTitle(title, prompt.exclusions, threshold)) {
      logger.info(`Duplicate detected (${title}), retrying...`);
      continue;
    }

    const costUsd = calculateTokenCost(model, response.usage, deps.pricing ?? MODEL_PRICING);
    logger.info(`Success with ${model}, cost=$${costUsd.toFixed(6)}`);

    return {
      model,
      usage: response.usage,
      costUsd,
      attempts: attempt,
      temperature,
      text,
      candidate: parseCandidate(text),
    };
  }

  logger.warn(`No unique recommendation after ${maxAttempts} attempts with ${model}`);
  throw new DuplicateExhaustedError(model, maxAttempts);
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * Strategy that queries one completion model.
 */
export class CompletionModelStrategy implements ModelStrategy {
  constructor(
    public readonly model: string,
    private readonly deps: QueryDependencies
  ) {}

  async attempt(prompt: Prompt, logger: Logger = NOOP_LOGGER): Promise<StrategyOutcome> {
    try {
      return { ok: true, result: await queryModel(prompt, this.model, this.deps, logger) };
    } catch (error) {
      if (!(error instanceof DuplicateExhaustedError)) {
        logger.error(`Error with ${this.model}: ${errorMessage(error)}`);
      }
      return {
        ok: false,
        model: this.model,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }
}

/**
 * Build one strategy per model, in order.
 */
export function createModelStrategies(models: readonly string[], deps: QueryDependencies): ModelStrategy[] {
  return models.map((model) => new CompletionModelStrategy(model, deps));
}

/**
 * Try each strategy in order; the first success wins.
 *
 * @throws AllModelsExhaustedError when every strategy fails
 *
 * @example
 * ```typescript
 * const strategies = createModelStrategies(['gpt-4', 'gpt-3.5-turbo'], { client });
 * const result = await recommendWithFallback(strategies, prompt, log);
 * console.log(result.model, result.text);
 * ```
 */
export async function recommendWithFallback(
  strategies: readonly ModelStrategy[],
  prompt: Prompt,
  logger: Logger = NOOP_LOGGER
): Promise<ModelAttemptResult> {
  const failures: ModelFailure[] = [];

  for (const strategy of strategies) {
    const outcome = await strategy.attempt(prompt, logger);
    if (outcome.ok) {
      return outcome.result;
    }
    failures.push({ model: outcome.model, error: outcome.error.message });
  }

  throw new AllModelsExhaustedError(failures);
}
