/**
 * Recommender Errors
 *
 * @module recommender/errors
 */

/**
 * Every attempt against one model produced an empty answer or a near
 * duplicate of an excluded title. The fallback fold moves to the next model.
 */
export class DuplicateExhaustedError extends Error {
  constructor(
    public readonly model: string,
    public readonly attempts: number
  ) {
    super(`No unique recommendation after ${attempts} attempts with ${model}`);
    this.name = 'DuplicateExhaustedError';
  }
}

/**
 * Why one model in the fallback order gave up.
 */
export interface ModelFailure {
  model: string;
  error: string;
}

/**
 * No model in the fallback order produced a recommendation.
 */
export class AllModelsExhaustedError extends Error {
  constructor(public readonly failures: ModelFailure[]) {
    super('Failed to generate recommendation with all models.');
    this.name = 'AllModelsExhaustedError';
  }
}
