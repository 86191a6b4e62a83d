/**
 * Recommend Command
 *
 * `setlist recommend <service> <playlist>`: runs the recommendation
 * pipeline for one playlist and prints the result.
 *
 * @module cli/commands/recommend
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { createPlaylistSource, parseService, resolveAccessToken } from '../clients.js';
import { createSpinner } from '../formatters/progress.js';
import { formatRecommendationDetails } from '../formatters/recommendation.js';
import { ConfigurationError, type AppConfig } from '../../config/index.js';
import { errorMessage } from '../../logging/collector.js';
import {
  createRecommendationPipeline,
  NO_DATA_MESSAGE,
  type PipelineFactoryOverrides,
  type RecommendationPipeline,
} from '../../pipeline/recommend.js';
import { DEFAULT_LANGUAGE, type RecommendRequest } from '../../pipeline/types.js';
import type { RecommendationResult } from '../../schemas/recommendation.js';
import type { PlaylistSource } from '../../sources/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the recommend command.
 */
export interface RecommendOptions {
  /** Language of the recommendation */
  language: string;
  /** Session identifier recorded with the analytics event */
  session?: string;
  /** Access token for the playlist service */
  token?: string;
  /** Print the full result as JSON */
  json?: boolean;
}

/**
 * Builds the pipeline; replaced in tests.
 */
export type PipelineFactory = (
  config: AppConfig,
  overrides?: PipelineFactoryOverrides
) => Pick<RecommendationPipeline, 'recommend'>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Pair a playlist source with the request fields.
 */
export function buildRequest(source: PlaylistSource, playlist: string, options: RecommendOptions): RecommendRequest {
  const common = { playlist, language: options.language, sessionId: options.session };
  return source.provenance === 'spotify'
    ? { service: 'spotify', client: source.client, ...common }
    : { service: 'youtube', client: source.client, ...common };
}

/**
 * Exit code for a finished result.
 */
export function exitCodeFor(result: RecommendationResult): ExitCode {
  if (result.recommendation !== null) {
    return EXIT_CODES.SUCCESS;
  }
  return result.details.error === NO_DATA_MESSAGE ? EXIT_CODES.NOT_FOUND : EXIT_CODES.ERROR;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the recommend command.
 */
export function registerRecommendCommand(program: Command): void {
  program
    .command('recommend <service> <playlist>')
    .description('Recommend one new song for a Spotify or YouTube playlist')
    .option('-l, --language <lang>', 'Language of the recommendation', DEFAULT_LANGUAGE)
    .option('-s, --session <id>', 'Session identifier recorded with the analytics event')
    .option('-t, --token <token>', 'Access token for the playlist service')
    .option('--json', 'Print the full result as JSON')
    .action(async (service: string, playlist: string, options: RecommendOptions, cmd: Command) => {
      const base: BaseCommand = getBaseCommand(cmd.parent ?? cmd);

      let code: ExitCode;
      try {
        code = await handleRecommend(service, playlist, options, base);
      } catch (error) {
        base.exitWithError(
          errorMessage(error),
          error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.USAGE_ERROR
        );
      }

      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });
}

/**
 * Handle the recommend command.
 *
 * @returns Exit code for the outcome
 * @throws ConfigurationError when keys or tokens are missing
 */
export async function handleRecommend(
  serviceArg: string,
  playlist: string,
  options: RecommendOptions,
  base: BaseCommand,
  createPipeline: PipelineFactory = createRecommendationPipeline
): Promise<ExitCode> {
  const service = parseService(serviceArg);
  const config = base.loadConfig();
  const source = createPlaylistSource(service, resolveAccessToken(service, config, options.token));
  const pipeline = createPipeline(config, { logger: base.isVerbose() ? base : undefined });

  base.debug(`Models: ${config.models.primary}, ${config.models.fallback}`);

  const spinner =
    options.json || base.isQuiet() ? undefined : createSpinner(`Finding a new song for ${playlist}...`);
  spinner?.start();

  const result = await pipeline.recommend(buildRequest(source, playlist, options));
  const code = exitCodeFor(result);

  if (options.json) {
    base.json(result);
    return code;
  }

  if (result.recommendation === null) {
    const message = result.details.error ?? 'No recommendation';
    if (spinner) {
      spinner.fail(message);
    } else {
      base.fail(message);
    }
    return code;
  }

  spinner?.succeed('Recommendation ready');
  console.log(`  ${chalk.bold(result.recommendation)}`);
  for (const line of formatRecommendationDetails(result)) {
    base.info(`  ${line}`);
  }

  return code;
}
