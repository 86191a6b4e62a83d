/**
 * Pipeline Module Exports
 *
 * @module pipeline
 */

export {
  RecommendationPipeline,
  createRecommendationPipeline,
  DEFAULT_PIPELINE_OPTIONS,
  NO_DATA_MESSAGE,
  ALL_MODELS_FAILED_MESSAGE,
  FETCH_FAILED_PREFIX,
  type PipelineFactoryOverrides,
} from './recommend.js';
export { PipelineStateMachine, InvalidTransitionError } from './state-machine.js';
export { EnrichmentError } from './errors.js';
export {
  PIPELINE_STATES,
  DEFAULT_LANGUAGE,
  PipelineOptionsSchema,
  type PipelineState,
  type PipelineOptions,
  type PipelineDependencies,
  type RecommendRequest,
} from './types.js';
