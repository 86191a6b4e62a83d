/**
 * Shared HTTP Transport
 *
 * Bounded automatic retry for transient upstream failures, shared by every
 * outbound client (YouTube Data API, Spotify Web API). A request is retried
 * when the response status is in the policy's retryable set or the request
 * fails at the network level; other responses are returned as-is for the
 * caller to interpret.
 *
 * @module http/transport
 */

// ============================================================================
// Errors
// ============================================================================

/**
 * Network or upstream failure talking to an external service.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

// ============================================================================
// Retry Policy
// ============================================================================

/**
 * Retry configuration
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Base delay; attempt n waits baseDelayMs * 2^(n-1) before retrying */
  baseDelayMs: number;
  /** Upper bound for a single delay */
  maxDelayMs: number;
  /** HTTP status codes eligible for retry */
  retryStatuses: readonly number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  retryStatuses: [429, 500, 502, 503, 504],
};

/**
 * Sleep helper for retry delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay with jitter
 *
 * @param attempt - Attempt that just failed (1-based)
 * @param policy - Retry policy
 * @returns Delay in milliseconds with up to 30% jitter
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  const jitter = Math.random() * 0.3 * exponential;
  return exponential + jitter;
}

/**
 * Execute a function with retry logic
 *
 * @param fn - Async function to execute; receives the 1-based attempt number
 * @param shouldRetry - Decides whether a thrown error is transient
 * @param policy - Retry policy
 * @returns Result of the function
 * @throws Last error if all attempts are exhausted or the error is not retryable
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= policy.maxAttempts) {
        break;
      }

      await wait(calculateDelay(attempt, policy));
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}

// ============================================================================
// Fetch
// ============================================================================

/**
 * Options for a single transport request
 */
export interface TransportOptions {
  /** Per-attempt timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Retry policy override */
  policy?: RetryPolicy;
  /** fetch implementation (defaults to the global one) */
  fetch?: typeof fetch;
  /** Delay implementation (tests pass a no-op) */
  wait?: (ms: number) => Promise<void>;
}

const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Marker thrown internally so retryable statuses flow through withRetry.
 */
class RetryableStatus extends Error {
  constructor(public readonly response: Response) {
    super(`Retryable status ${response.status}`);
    this.name = 'RetryableStatus';
  }
}

/**
 * Determine if a thrown fetch error is a transient network failure.
 */
export function isNetworkError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return error.isRetryable;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      error.name === 'TypeError' ||
      message.includes('fetch failed') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('socket hang up')
    );
  }
  return false;
}

/**
 * Fetch with per-attempt timeout and bounded retry.
 *
 * The final response is returned even when its status is retryable, so the
 * caller can build a descriptive error from the body.
 *
 * @throws TransportError on timeout or persistent network failure
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: TransportOptions = {}
): Promise<Response> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const doFetch = options.fetch ?? fetch;

  try {
    return await withRetry(
      async (attempt) => {
        const response = await fetchWithTimeout(doFetch, url, init, timeoutMs);
        if (policy.retryStatuses.includes(response.status) && attempt < policy.maxAttempts) {
          throw new RetryableStatus(response);
        }
        return response;
      },
      (error) => error instanceof RetryableStatus || isNetworkError(error),
      policy,
      options.wait
    );
  } catch (error) {
    if (error instanceof TransportError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Request to ${redactUrl(url)} failed: ${message}`, 0, true);
  }
}

/**
 * Execute fetch with timeout using AbortController.
 */
async function fetchWithTimeout(
  doFetch: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await doFetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TransportError(`Request timed out after ${timeoutMs}ms`, 408, true);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Strip query parameters (which may carry API keys) from a URL for messages.
 */
export function redactUrl(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}
