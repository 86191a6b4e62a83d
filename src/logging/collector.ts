/**
 * Invocation-Scoped Log Collection
 *
 * Every pipeline invocation creates its own {@link LogCollector}. Entries are
 * timestamped, buffered for the result's `details.logs`, and forwarded to an
 * optional base logger (the CLI console, a test spy). Nothing is shared
 * between concurrent invocations.
 *
 * @module logging/collector
 */

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline components.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = keyof Logger;

/**
 * Logger that discards everything.
 */
export const NOOP_LOGGER: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// LogCollector
// ============================================================================

/**
 * A single buffered entry
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
}

/**
 * Buffers `[timestamp] message` lines for one invocation.
 *
 * @example
 * ```typescript
 * const log = new LogCollector(consoleLogger);
 * log.info('Querying gpt-4, attempt 1, temperature=0.7');
 * log.lines(); // ['[2026-01-01T00:00:00.000Z] Querying gpt-4, attempt 1, temperature=0.7']
 * ```
 */
export class LogCollector implements Logger {
  private readonly entries: LogEntry[] = [];

  constructor(
    private readonly base: Logger = NOOP_LOGGER,
    private readonly clock: () => Date = () => new Date()
  ) {}

  debug(message: string, ...args: unknown[]): void {
    this.append('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.append('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.append('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.append('error', message, args);
  }

  /**
   * Formatted entries, oldest first. Returns a copy.
   */
  lines(): string[] {
    return this.entries.map((entry) => `[${entry.timestamp}] ${entry.message}`);
  }

  get size(): number {
    return this.entries.length;
  }

  private append(level: LogLevel, message: string, args: unknown[]): void {
    const timestamp = this.clock().toISOString();
    this.entries.push({ timestamp, level, message });
    this.base[level](`[${timestamp}] ${message}`, ...args);
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
