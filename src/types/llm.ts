/**
 * Completion Service Types
 *
 * Type definitions for the completion client abstraction supporting
 * OpenAI-compatible endpoints (including local model servers) and Anthropic,
 * with typed failure classification.
 */

/**
 * Supported LLM providers
 */
export type LLMProviderName = 'openai' | 'anthropic';

/**
 * Per-call options beyond the sampling parameters
 */
export interface GenerateOptions {
  /** Ask the provider for a JSON object response where supported */
  jsonMode?: boolean;
  /** Override the configured wall-clock timeout */
  timeoutMs?: number;
}

/**
 * A single completion request
 */
export interface GenerateRequest {
  prompt: string;
  systemPrompt: string;
  /** Sampling temperature (0 for deterministic output) */
  temperature: number;
  maxTokens: number;
  options?: GenerateOptions;
}

/**
 * Anything that can turn a prompt into text.
 * Agents depend on this instead of a concrete client so tests can script replies.
 */
export interface CompletionClient {
  generate(request: GenerateRequest): Promise<string>;
}

/**
 * LLM error codes
 */
export type LLMErrorCode =
  | 'timeout'             // Wall-clock budget exceeded
  | 'unavailable'         // Service unreachable
  | 'not_found'           // Model not installed / unknown
  | 'resource_exhausted'  // Out of memory on the serving side
  | 'malformed'           // Reply too short to be usable
  | 'rate_limit'          // Rate limit exceeded
  | 'authentication'      // Authentication failed
  | 'invalid_request'     // Invalid request parameters
  | 'server_error'        // Server-side error
  | 'unknown';            // Unknown error

/**
 * Custom error class for LLM operations
 */
export class LLMError extends Error {
  /** Error code categorizing the error type */
  public readonly code: LLMErrorCode;
  /** Whether the error is retryable */
  public readonly retryable: boolean;
  /** HTTP status code if applicable */
  public readonly statusCode?: number;
  /** Original error that caused this error */
  public readonly cause?: Error;

  constructor(
    message: string,
    code: LLMErrorCode,
    retryable: boolean,
    statusCode?: number,
    cause?: Error
  ) {
    super(message);
    this.name = 'LLMError';
    this.code = code;
    this.retryable = retryable;
    this.statusCode = statusCode;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  /**
   * Create an LLMError from an unknown error
   */
  static fromError(error: unknown, defaultCode: LLMErrorCode = 'unknown'): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (error.name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
        return new LLMError(error.message, 'timeout', true, undefined, error);
      }

      if (
        message.includes('econnrefused') ||
        message.includes('connection error') ||
        message.includes('enotfound') ||
        message.includes('fetch failed')
      ) {
        return new LLMError(error.message, 'unavailable', true, undefined, error);
      }

      if (message.includes('out of memory') || message.includes('vram') || message.includes('oom')) {
        return new LLMError(error.message, 'resource_exhausted', true, undefined, error);
      }

      if (message.includes('rate limit') || message.includes('429')) {
        return new LLMError(error.message, 'rate_limit', true, 429, error);
      }

      if (message.includes('authentication') || message.includes('unauthorized') || message.includes('401')) {
        return new LLMError(error.message, 'authentication', false, 401, error);
      }

      if (message.includes('not found') || message.includes('404')) {
        return new LLMError(error.message, 'not_found', true, 404, error);
      }

      if (message.includes('invalid') || message.includes('bad request') || message.includes('400')) {
        return new LLMError(error.message, 'invalid_request', false, 400, error);
      }

      if (message.includes('server error') || message.includes('500') || message.includes('503')) {
        return new LLMError(error.message, 'server_error', true, 500, error);
      }

      return new LLMError(error.message, defaultCode, false, undefined, error);
    }

    return new LLMError(String(error), defaultCode, false);
  }
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Total attempts, including the first */
  maxRetries: number;
  /** Base delay in milliseconds */
  baseDelay: number;
  /** Maximum delay in milliseconds */
  maxDelay: number;
}
