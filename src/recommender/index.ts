/**
 * Recommender Exports
 *
 * @module recommender
 */

export {
  queryModel,
  recommendWithFallback,
  createModelStrategies,
  CompletionModelStrategy,
  DEFAULT_MAX_ATTEMPTS,
  type QueryDependencies,
  type ModelAttemptResult,
  type ModelStrategy,
  type StrategyOutcome,
} from './engine.js';
export { parseCandidate, type CandidateRecommendation } from './parser.js';
export { DuplicateExhaustedError, AllModelsExhaustedError, type ModelFailure } from './errors.js';
