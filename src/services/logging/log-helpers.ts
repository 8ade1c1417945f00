/**
 * Structured logging helpers for common event types
 * Provides consistent logging patterns across the application
 */

import { logger } from './logger.js';

/**
 * Category-based logging helpers
 * Each helper logs a specific type of event with consistent structure
 */
export const loggers = {
  /**
   * Log state machine transitions
   * @param debateId - Unique identifier for the debate
   * @param from - Current stage
   * @param to - Target stage
   * @param duration - Optional time spent in the previous stage
   */
  stateTransition(debateId: string, from: string, to: string, duration?: number) {
    logger.info({
      category: 'state_machine',
      debateId,
      from,
      to,
      duration_ms: duration,
      event: 'transition',
    }, `State transition: ${from} -> ${to}`);
  },

  /**
   * Log agent completion calls with latency
   */
  agentCall(params: {
    debateId: string;
    agent: string;
    round: number | 'verdict';
    latency_ms: number;
    wordCount?: number;
    success: boolean;
    error?: string;
  }) {
    const level = params.success ? 'info' : 'error';
    logger[level]({
      category: 'agent_call',
      event: 'llm_request',
      ...params,
    }, `Agent ${params.agent} ${params.success ? 'completed' : 'failed'} in ${params.latency_ms}ms`);
  },

  /**
   * Log how a verdict was obtained. Heuristic extraction is a degraded result.
   * @param debateId - Unique identifier for the debate
   * @param kind - 'parsed' or 'heuristic'
   * @param issues - Quality defects found while normalizing
   */
  verdictExtraction(debateId: string, kind: 'parsed' | 'heuristic' | 'repaired', issues: string[]) {
    if (kind === 'heuristic') {
      logger.warn({
        category: 'verdict_extraction',
        event: 'verdict_heuristic',
        debateId,
        degraded: true,
        issues,
      }, 'Verdict recovered heuristically from non-JSON output');
    } else {
      logger.info({
        category: 'verdict_extraction',
        event: `verdict_${kind}`,
        debateId,
        degraded: false,
        issues,
        issue_count: issues.length,
      }, `Verdict ${kind}`);
    }
  },

  /**
   * Log persistence operations with timing
   * @param operation - e.g. load_debates, save_statistics
   * @param driver - Storage driver name
   * @param latency_ms - Operation duration in milliseconds
   * @param success - Whether the operation succeeded
   */
  storeOperation(operation: string, driver: string, latency_ms: number, success: boolean) {
    logger.debug({
      category: 'storage',
      event: 'store_operation',
      operation,
      driver,
      latency_ms,
      success,
    }, `Store ${operation} via ${driver} (${latency_ms}ms)`);
  },

  /**
   * Log a finished HTTP request at a level chosen by its status
   */
  httpRequest(params: {
    requestId: string;
    method: string;
    path: string;
    statusCode: number;
    duration_ms: number;
  }) {
    const level = params.statusCode >= 500 ? 'error' : params.statusCode >= 400 ? 'warn' : 'info';
    logger[level]({
      category: 'http',
      event: 'request_completed',
      ...params,
    }, `${params.method} ${params.path} ${params.statusCode} (${params.duration_ms}ms)`);
  },

  /**
   * Log errors with full context and stack traces
   */
  error(message: string, error: Error, context?: Record<string, unknown>) {
    logger.error({
      category: 'error',
      event: 'error_occurred',
      error: {
        message: error.message,
        stack: error.stack,
        name: error.name,
      },
      ...context,
    }, message);
  },

  /**
   * Log debate lifecycle events
   */
  debateLifecycle(
    debateId: string,
    event: 'scheduled' | 'started' | 'completed' | 'failed',
    metadata?: Record<string, unknown>
  ) {
    const level = event === 'failed' ? 'error' : 'info';
    logger[level]({
      category: 'debate_lifecycle',
      event: `debate_${event}`,
      debateId,
      ...metadata,
    }, `Debate ${event}`);
  },
};

/**
 * Performance timing helper
 * Returns a function that logs the duration when called
 *
 * @example
 * const endTimer = startTimer();
 * await someOperation();
 * endTimer('operation_name', { debateId: '123' });
 */
export function startTimer() {
  const start = Date.now();
  return (operation: string, context?: Record<string, unknown>) => {
    const duration = Date.now() - start;
    logger.debug({
      category: 'performance',
      event: 'operation_timed',
      operation,
      duration_ms: duration,
      ...context,
    }, `${operation} completed in ${duration}ms`);
    return duration;
  };
}

/**
 * Async operation wrapper with automatic timing and error logging
 * @param operation - Name of the operation
 * @param fn - Async function to execute
 * @param context - Additional context for logging
 */
export async function loggedOperation<T>(
  operation: string,
  fn: () => Promise<T>,
  context?: Record<string, unknown>
): Promise<T> {
  const timer = startTimer();
  try {
    const result = await fn();
    timer(operation, { ...context, success: true });
    return result;
  } catch (error) {
    timer(operation, { ...context, success: false });
    const err = error instanceof Error ? error : new Error(String(error));
    loggers.error(`Operation failed: ${operation}`, err, context);
    throw error;
  }
}
