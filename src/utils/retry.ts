/**
 * Retry with linear backoff
 *
 * Attempt n (1-based) that fails waits `baseDelayMs * n` before attempt n + 1,
 * capped at `maxDelayMs`. The last error is rethrown once the budget is spent.
 */

import type { Logger } from 'pino';

export interface RetryOptions {
  /** Delay unit in milliseconds (default 1500) */
  baseDelayMs?: number;
  /** Upper bound for a single wait */
  maxDelayMs?: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  logger?: Logger;
}

export const DEFAULT_BACKOFF_BASE_MS = 1500;

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt after `attempt` failed
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs?: number): number {
  const delay = baseDelayMs * attempt;
  return maxDelayMs === undefined ? delay : Math.min(delay, maxDelayMs);
}

/**
 * Run `operation` up to `attempts` times.
 * @param label - Identifies the operation in logs
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  attempts: number,
  label: string,
  options: RetryOptions = {}
): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BACKOFF_BASE_MS;
  const budget = Math.max(1, attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= budget; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (attempt === budget || (options.shouldRetry && !options.shouldRetry(error, attempt))) {
        break;
      }

      const delayMs = backoffDelay(attempt, baseDelayMs, options.maxDelayMs);
      options.logger?.warn(
        {
          label,
          attempt,
          attempts: budget,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        },
        `${label} failed, retrying`
      );
      options.onRetry?.(error, attempt, delayMs);

      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }

  options.logger?.error(
    { label, attempts: budget, error: lastError instanceof Error ? lastError.message : String(lastError) },
    `${label} failed after all attempts`
  );
  throw lastError;
}
