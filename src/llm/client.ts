/**
 * Text Completion Client
 *
 * The completion capability the recommender and the description sanitizer
 * depend on, plus its OpenAI implementation with timeout and error
 * classification.
 *
 * @module llm/client
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { TransportError } from '../http/transport.js';
import type { TokenUsage } from '../config/costs.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Message in the chat conversation.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * One completion request.
 */
export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Completion result.
 */
export interface CompletionResponse {
  /** Generated text ('' when the model returned nothing) */
  content: string;
  usage: TokenUsage;
  /** Model that served the request */
  model: string;
  finishReason: string;
}

/**
 * Text completion capability.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Completion API error with additional context.
 */
export class CompletionApiError extends TransportError {
  constructor(message: string, statusCode: number, isRetryable: boolean) {
    super(message, statusCode, isRetryable);
    this.name = 'CompletionApiError';
  }
}

/**
 * The slice of the OpenAI SDK this client calls.
 */
export interface ChatCompletionsApi {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<ChatCompletion>;
}

/**
 * OpenAI client options.
 */
export interface OpenAICompletionClientOptions {
  apiKey: string;
  /** Default request timeout (default: 30000) */
  timeoutMs?: number;
  /** SDK-level retries for transient failures (default: 2) */
  maxRetries?: number;
  /** Pre-built completions API (tests inject a fake) */
  completions?: ChatCompletionsApi;
}

const DEFAULT_TIMEOUT_MS = 30000;

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * CompletionClient backed by the OpenAI chat completions API.
 *
 * @example
 * ```typescript
 * const client = new OpenAICompletionClient({ apiKey: config.apiKeys.openai });
 * const response = await client.complete({
 *   model: 'gpt-4',
 *   messages: [{ role: 'user', content: prompt }],
 *   temperature: 0.7,
 *   maxTokens: 150,
 * });
 * ```
 */
export class OpenAICompletionClient implements CompletionClient {
  private readonly completions: ChatCompletionsApi;
  private readonly timeoutMs: number;

  constructor(options: OpenAICompletionClientOptions) {
    if (!options.completions && !options.apiKey) {
      throw new Error('OpenAICompletionClient requires an API key');
    }
    this.completions =
      options.completions ??
      new OpenAI({ apiKey: options.apiKey, maxRetries: options.maxRetries ?? 2 }).chat.completions;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Send a chat completion request.
   *
   * @throws CompletionApiError on API errors or timeout
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.completions.create(
        {
          model: request.model,
          messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal: controller.signal }
      );

      const choice = response.choices[0];

      return {
        content: choice?.message?.content ?? '',
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0,
        },
        model: response.model || request.model,
        finishReason: choice?.finish_reason ?? 'unknown',
      };
    } catch (error) {
      throw classifyError(error, controller.signal.aborted, timeoutMs);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Map SDK and runtime failures onto CompletionApiError.
 */
function classifyError(error: unknown, timedOut: boolean, timeoutMs: number): CompletionApiError {
  if (error instanceof CompletionApiError) {
    return error;
  }

  if (timedOut) {
    return new CompletionApiError(`Request timed out after ${timeoutMs}ms`, 408, true);
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 500;
    return new CompletionApiError(error.message, status, RETRYABLE_STATUSES.has(status));
  }

  return new CompletionApiError(error instanceof Error ? error.message : 'Unknown error', 500, true);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a completion API error.
 */
export function isCompletionApiError(error: unknown): error is CompletionApiError {
  return error instanceof CompletionApiError;
}
