/**
 * Recommendation Pipeline
 *
 * Fetches a playlist, builds the curator prompt, queries the model
 * fallback order, resolves a video link and records one analytics event.
 * Every path returns a structured result; `recommend` never throws.
 *
 * @module pipeline/recommend
 */

import { JsonlAnalyticsSink, type AnalyticsSink } from '../analytics/sink.js';
import { ConfigurationError, requireApiKey, type AppConfig } from '../config/index.js';
import { buildModelOrder } from '../config/models.js';
import type { ModelPricing } from '../config/costs.js';
import { resolveVideoLink, type VideoSearchClient } from '../links/resolver.js';
import { OpenAICompletionClient, type CompletionClient } from '../llm/client.js';
import { errorMessage, LogCollector, NOOP_LOGGER, type Logger } from '../logging/collector.js';
import { escapeHtml } from '../prompt/escape.js';
import { renderPrompt } from '../prompt/builder.js';
import { DEFAULT_SAMPLE_SEED, DEFAULT_SAMPLE_SIZE, sampleRecords } from '../prompt/sampling.js';
import {
  createModelStrategies,
  DEFAULT_MAX_ATTEMPTS,
  recommendWithFallback,
  type ModelAttemptResult,
} from '../recommender/engine.js';
import { AllModelsExhaustedError } from '../recommender/errors.js';
import { DescriptionSanitizer } from '../sanitizer/sanitizer.js';
import type { Outcome, RecommendationEvent, RecommendationResult, VideoLink } from '../schemas/recommendation.js';
import { isYouTubeRecord, type PlaylistSnapshot, type TrackRecord } from '../schemas/track.js';
import { DEFAULT_SIMILARITY_THRESHOLD } from '../dedupe/similarity.js';
import { EmptyPlaylistError, fetchSnapshot, requireRecords, type PlaylistSource } from '../sources/index.js';
import { extractPlaylistId } from '../sources/playlist-id.js';
import { YouTubeClient } from '../sources/youtube-client.js';
import { PipelineStateMachine } from './state-machine.js';
import {
  DEFAULT_LANGUAGE,
  PipelineOptionsSchema,
  type PipelineDependencies,
  type PipelineOptions,
  type RecommendRequest,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const NO_DATA_MESSAGE = 'Playlist data unavailable or empty.';
export const ALL_MODELS_FAILED_MESSAGE = 'Failed to generate recommendation with all models.';
export const FETCH_FAILED_PREFIX = 'Failed to fetch playlist data: ';

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  models: buildModelOrder('gpt-4'),
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
  sampleSize: DEFAULT_SAMPLE_SIZE,
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  sampleSeed: DEFAULT_SAMPLE_SEED,
};

/**
 * How an invocation ended, before logs are attached.
 */
interface RunOutcome {
  outcome: Outcome;
  /** Raw recommendation text */
  text: string | null;
  error?: string;
  model?: string;
  costUsd?: number;
  videoLink?: VideoLink | null;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Recommendation pipeline over explicit collaborators.
 *
 * @example
 * ```typescript
 * const pipeline = new RecommendationPipeline({ completionClient, videoSearch, analyticsSink });
 * const result = await pipeline.recommend({
 *   service: 'spotify',
 *   playlist: 'https://open.spotify.com/playlist/37i9dQZF1DXcBWIGoYBM5M',
 *   client: spotify,
 * });
 * console.log(result.recommendation ?? result.details.error);
 * ```
 */
export class RecommendationPipeline {
  private readonly completionClient: CompletionClient;
  private readonly videoSearch?: VideoSearchClient;
  private readonly analyticsSink?: AnalyticsSink;
  private readonly sanitizer: DescriptionSanitizer;
  private readonly logger: Logger;
  private readonly pricing?: Readonly<Record<string, ModelPricing>>;
  private readonly clock: () => Date;
  readonly options: PipelineOptions;

  /**
   * @throws ConfigurationError when the options are invalid
   */
  constructor(deps: PipelineDependencies) {
    const overrides = Object.fromEntries(
      Object.entries(deps.options ?? {}).filter(([, value]) => value !== undefined)
    );
    const parsed = PipelineOptionsSchema.safeParse({ ...DEFAULT_PIPELINE_OPTIONS, ...overrides });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid pipeline options: ${issues.join('; ')}`, issues);
    }

    this.options = parsed.data;
    this.completionClient = deps.completionClient;
    this.videoSearch = deps.videoSearch;
    this.analyticsSink = deps.analyticsSink;
    this.sanitizer = deps.sanitizer ?? new DescriptionSanitizer(deps.completionClient);
    this.logger = deps.logger ?? NOOP_LOGGER;
    this.pricing = deps.pricing;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Produce one recommendation for a playlist.
   */
  async recommend(request: RecommendRequest): Promise<RecommendationResult> {
    const log = new LogCollector(this.logger, this.clock);
    const machine = new PipelineStateMachine();
    const language = request.language?.trim().toLowerCase() || DEFAULT_LANGUAGE;
    const playlistId = extractPlaylistId(request.service, request.playlist);

    let run: RunOutcome;
    try {
      run = await this.execute(request, playlistId, language, machine, log);
    } catch (error) {
      log.error(`Unexpected pipeline error: ${errorMessage(error)}`);
      run = { outcome: 'failure', text: null, error: errorMessage(error) };
    }

    if (!machine.isDone) {
      machine.transition('DONE');
    }

    return this.finish(request, playlistId, language, run, log);
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async execute(
    request: RecommendRequest,
    playlistId: string,
    language: string,
    machine: PipelineStateMachine,
    log: LogCollector
  ): Promise<RunOutcome> {
    // FETCHING
    const source: PlaylistSource =
      request.service === 'spotify'
        ? { provenance: 'spotify', client: request.client }
        : { provenance: 'youtube', client: request.client };

    log.info(`Fetching ${request.service} playlist ${playlistId}`);

    let snapshot: PlaylistSnapshot;
    try {
      snapshot = await fetchSnapshot(source, request.playlist, log);
    } catch (error) {
      const message = `${FETCH_FAILED_PREFIX}${errorMessage(error)}`;
      log.error(message);
      return { outcome: 'failure', text: null, error: message };
    }

    let records: TrackRecord[];
    try {
      records = requireRecords(snapshot);
    } catch (error) {
      if (error instanceof EmptyPlaylistError) {
        log.warn(NO_DATA_MESSAGE);
        return { outcome: 'no_data', text: null, error: NO_DATA_MESSAGE };
      }
      throw error;
    }
    log.info(`Fetched ${records.length} tracks`);

    // PROMPTING
    machine.transition('PROMPTING');
    const sample = sampleRecords(records, {
      sampleSize: this.options.sampleSize,
      seed: this.options.sampleSeed,
    });
    const prompt = renderPrompt(await this.cleanDescriptions(sample, log), language);
    log.info(`Prompt built from ${prompt.sampleSize} of ${records.length} tracks`);

    // QUERYING
    machine.transition('QUERYING');
    const strategies = createModelStrategies(this.options.models, {
      client: this.completionClient,
      maxAttempts: this.options.maxAttempts,
      similarityThreshold: this.options.similarityThreshold,
      pricing: this.pricing,
    });

    let result: ModelAttemptResult;
    try {
      result = await recommendWithFallback(strategies, prompt, log);
    } catch (error) {
      if (error instanceof AllModelsExhaustedError) {
        log.error(ALL_MODELS_FAILED_MESSAGE);
        return { outcome: 'failure', text: null, error: ALL_MODELS_FAILED_MESSAGE };
      }
      throw error;
    }

    // ENRICHING
    machine.transition('ENRICHING');
    const videoLink = this.videoSearch ? await resolveVideoLink(this.videoSearch, result.text, log) : null;
    if (videoLink) {
      log.info(`Video link: ${videoLink.url}`);
    }

    machine.transition('DONE');
    return {
      outcome: 'success',
      text: result.text,
      model: result.model,
      costUsd: result.costUsd,
      videoLink,
    };
  }

  /**
   * Replace the descriptions of sampled YouTube records with cleaned ones.
   */
  private async cleanDescriptions(sample: TrackRecord[], log: LogCollector): Promise<TrackRecord[]> {
    const videos = sample.filter(isYouTubeRecord);
    if (videos.length === 0) {
      return sample;
    }

    const cleaned = await this.sanitizer.sanitizeRecords(videos, log);
    const byId = new Map(cleaned.map((record) => [record.id, record]));
    return sample.map((record) => byId.get(record.id) ?? record);
  }

  // ==========================================================================
  // Completion
  // ==========================================================================

  /**
   * Record the analytics event and build the caller's result.
   */
  private async finish(
    request: RecommendRequest,
    playlistId: string,
    language: string,
    run: RunOutcome,
    log: LogCollector
  ): Promise<RecommendationResult> {
    const details = {
      model: run.model,
      costUsd: run.costUsd,
      videoLink: run.videoLink,
      error: run.error,
    };

    if (this.analyticsSink) {
      const event: RecommendationEvent = {
        sessionId: request.sessionId ?? null,
        service: request.service,
        playlistId,
        recommendationText: run.text,
        details: { ...details, logs: log.lines() },
        language,
        outcome: run.outcome,
        errorMessage: run.error,
        timestamp: this.clock().toISOString(),
      };

      try {
        await this.analyticsSink.record(event);
      } catch (error) {
        log.error(`Failed to record analytics event: ${errorMessage(error)}`);
      }
    }

    return {
      recommendation: run.text === null ? null : escapeHtml(run.text),
      details: { ...details, logs: log.lines() },
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Optional overrides for {@link createRecommendationPipeline}.
 */
export interface PipelineFactoryOverrides {
  logger?: Logger;
  analyticsSink?: AnalyticsSink;
}

/**
 * Build a pipeline from application configuration.
 *
 * @throws ConfigurationError when OPENAI_API_KEY or YOUTUBE_API_KEY is missing
 */
export function createRecommendationPipeline(
  config: AppConfig,
  overrides: PipelineFactoryOverrides = {}
): RecommendationPipeline {
  const openaiKey = requireApiKey(config, 'openai');
  const youtubeKey = requireApiKey(config, 'youtube');

  const completionClient = new OpenAICompletionClient({ apiKey: openaiKey });

  return new RecommendationPipeline({
    completionClient,
    videoSearch: new YouTubeClient({ apiKey: youtubeKey }),
    analyticsSink: overrides.analyticsSink ?? new JsonlAnalyticsSink(config.dataDir),
    sanitizer: new DescriptionSanitizer(completionClient, {
      model: config.models.sanitizer,
      logger: overrides.logger,
    }),
    logger: overrides.logger,
    options: {
      models: buildModelOrder(config.models.primary, config.models.fallback),
      similarityThreshold: config.recommendation.similarityThreshold,
      sampleSize: config.recommendation.sampleSize,
      maxAttempts: config.recommendation.maxAttempts,
    },
  });
}
