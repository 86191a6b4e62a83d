/**
 * Model Configuration
 *
 * Defines the LLM call settings for each task type and the ordered list of
 * models the recommender falls back through.
 *
 * @module config/models
 */


/**
 * Task types that use LLM models
 */
export type TaskType = 'recommendation' | 'sanitizer';

/**
 * Model call settings for a task
 */
export interface ModelConfig {
  /** Model identifier */
  modelId: string;
  /** Base temperature (recommendation attempts add a per-attempt step) */
  temperature: number;
  /** Maximum output tokens */
  maxOutputTokens: number;
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Default settings per task
 */
const DEFAULT_MODELS: Record<TaskType, ModelConfig> = {
  recommendation: {
    modelId: 'gpt-4',
    temperature: 0.6,
    maxOutputTokens: 150,
    timeoutMs: 30000,
  },
  sanitizer: {
    modelId: 'gpt-3.5-turbo',
    temperature: 0.2,
    maxOutputTokens: 4000,
    timeoutMs: 60000,
  },
};

/** Secondary model tried after the primary one */
export const DEFAULT_FALLBACK_MODEL = 'gpt-3.5-turbo';

/** Temperature added per recommendation attempt (attempt k uses base + step * k) */
export const TEMPERATURE_STEP = 0.1;

/** System message sent with every recommendation request */
export const RECOMMENDATION_SYSTEM_PROMPT = 'You are a refined music recommendation assistant.';

/**
 * Get model configuration for a task, optionally overriding the model id
 */
export function getModelConfig(task: TaskType, modelId?: string): ModelConfig {
  const defaults = DEFAULT_MODELS[task];
  return modelId ? { ...defaults, modelId } : { ...defaults };
}

/**
 * Build the ordered list of models to try.
 *
 * The primary model comes first, then the fallback. Blank entries and
 * repeats are dropped so a primary equal to the fallback is only tried once.
 *
 * @example
 * ```typescript
 * buildModelOrder('gpt-4', 'gpt-3.5-turbo'); // ['gpt-4', 'gpt-3.5-turbo']
 * buildModelOrder('gpt-3.5-turbo', 'gpt-3.5-turbo'); // ['gpt-3.5-turbo']
 * ```
 */
export function buildModelOrder(primary: string, fallback: string = DEFAULT_FALLBACK_MODEL): string[] {
  const order: string[] = [];
  for (const model of [primary, fallback]) {
    const trimmed = model.trim();
    if (trimmed && !order.includes(trimmed)) {
      order.push(trimmed);
    }
  }
  return order;
}

/**
 * Temperature for a 1-based attempt number, rounded to two decimals.
 *
 * @example
 * ```typescript
 * temperatureForAttempt(1); // 0.7
 * temperatureForAttempt(3); // 0.9
 * ```
 */
export function temperatureForAttempt(
  attempt: number,
  base: number = DEFAULT_MODELS.recommendation.temperature
): number {
  return Math.round((base + TEMPERATURE_STEP * attempt) * 100) / 100;
}
