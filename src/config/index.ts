/**
 * Configuration Module
 *
 * Loads and validates environment variables for setlist-scout.
 * Uses Zod for runtime validation with sensible defaults. Nothing is read
 * at import time: callers invoke {@link loadConfig} once at startup and pass
 * the result down.
 *
 * @module config
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when the environment is invalid or a required key is missing.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Environment Schema
// ============================================================================

/** Parses an optional numeric env var, keeping the default when unset or blank */
const numberFromEnv = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : undefined),
    z.number().finite().default(fallback)
  );

const envSchema = z.object({
  // API Keys (optional here, required by the factories that need them)
  OPENAI_API_KEY: z.string().min(1).optional(),
  YOUTUBE_API_KEY: z.string().min(1).optional(),

  // Client handles for the CLI (OAuth itself happens elsewhere)
  SPOTIFY_ACCESS_TOKEN: z.string().min(1).optional(),
  YOUTUBE_ACCESS_TOKEN: z.string().min(1).optional(),

  // Model selection
  OPENAI_MODEL: z.string().min(1).default('gpt-4'),
  FALLBACK_MODEL: z.string().min(1).default('gpt-3.5-turbo'),
  SANITIZER_MODEL: z.string().min(1).default('gpt-3.5-turbo'),

  // Recommendation tuning
  SIMILARITY_THRESHOLD: numberFromEnv(85).pipe(z.number().min(0).max(100)),
  PROMPT_SAMPLE_SIZE: numberFromEnv(200).pipe(z.number().int().positive()),
  MAX_ATTEMPTS: numberFromEnv(3).pipe(z.number().int().min(1).max(10)),

  // Data directory
  SETLIST_DATA_DIR: z.string().optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

// ============================================================================
// Config Shape
// ============================================================================

/**
 * Resolved application configuration
 */
export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  isProduction: boolean;
  isTest: boolean;

  apiKeys: {
    openai?: string;
    youtube?: string;
  };

  accessTokens: {
    spotify?: string;
    youtube?: string;
  };

  models: {
    /** Primary recommendation model */
    primary: string;
    /** Tried when the primary exhausts its attempts */
    fallback: string;
    /** Used for batch description cleaning */
    sanitizer: string;
  };

  recommendation: {
    similarityThreshold: number;
    sampleSize: number;
    maxAttempts: number;
  };

  /** Root directory for local state (analytics log) */
  dataDir: string;
}

export type ApiKeyName = keyof AppConfig['apiKeys'];

/**
 * Resolve the data directory, expanding `~` and relative paths.
 */
function resolveDataDir(raw: string | undefined): string {
  if (!raw) {
    return join(homedir(), '.setlist-scout');
  }
  if (raw.startsWith('~')) {
    return join(homedir(), raw.slice(1));
  }
  return resolve(raw);
}

/**
 * Parse and validate configuration from an environment map.
 *
 * @param env - Environment variables (defaults to `process.env`)
 * @returns Frozen configuration object
 * @throws ConfigurationError when any variable fails validation
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * console.log(config.models.primary); // 'gpt-4'
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment variables: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;

  return Object.freeze({
    nodeEnv: data.NODE_ENV,
    isProduction: data.NODE_ENV === 'production',
    isTest: data.NODE_ENV === 'test',
    apiKeys: {
      openai: data.OPENAI_API_KEY,
      youtube: data.YOUTUBE_API_KEY,
    },
    accessTokens: {
      spotify: data.SPOTIFY_ACCESS_TOKEN,
      youtube: data.YOUTUBE_ACCESS_TOKEN,
    },
    models: {
      primary: data.OPENAI_MODEL,
      fallback: data.FALLBACK_MODEL,
      sanitizer: data.SANITIZER_MODEL,
    },
    recommendation: {
      similarityThreshold: data.SIMILARITY_THRESHOLD,
      sampleSize: data.PROMPT_SAMPLE_SIZE,
      maxAttempts: data.MAX_ATTEMPTS,
    },
    dataDir: resolveDataDir(data.SETLIST_DATA_DIR),
  });
}

/**
 * Check if a specific API is configured
 */
export function hasApiKey(config: AppConfig, api: ApiKeyName): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(config: AppConfig, api: ApiKeyName): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new ConfigurationError(
      `Missing required API key: ${api.toUpperCase()}_API_KEY. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}

// Re-export model and cost configuration
export * from './models.js';
export * from './costs.js';
