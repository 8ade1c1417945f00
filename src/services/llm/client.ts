/**
 * LLM Client Implementation
 *
 * Completion client for OpenAI-compatible endpoints (hosted or a local model
 * server) and Anthropic. Each attempt runs under a hard wall-clock timeout,
 * failures are classified into LLMError codes, and retryable failures are
 * retried with linear backoff. A Bottleneck limiter caps concurrent requests.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import Bottleneck from 'bottleneck';
import pino from 'pino';
import type { CompletionClient, GenerateRequest, LLMProviderName, RetryConfig } from '../../types/llm.js';
import { LLMError } from '../../types/llm.js';
import { llmConfig, type LLMConfig } from '../../config/llm.js';
import { withRetry } from '../../utils/retry.js';
import { countWords } from '../debate/response-normalizer.js';

/**
 * Logger instance for LLM operations
 */
const logger = pino({
  name: 'llm-client',
  level: process.env.LOG_LEVEL || 'info',
});

/** Replies shorter than this are treated as malformed */
export const MIN_USABLE_WORDS = 10;

export interface LLMClientOptions {
  provider?: LLMProviderName;
  model?: string;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  maxConcurrent?: number;
}

/**
 * LLM Client for unified provider access
 */
export class LLMClient implements CompletionClient {
  private openaiClient: OpenAI | null = null;
  private anthropicClient: Anthropic | null = null;
  private readonly provider: LLMProviderName;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly retryConfig: RetryConfig;
  private readonly limiter: Bottleneck;

  constructor(options: LLMClientOptions = {}, config: LLMConfig = llmConfig) {
    this.provider = options.provider ?? config.provider;
    this.model = options.model ?? config.model;
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
    this.retryConfig = {
      maxRetries: options.retry?.maxRetries ?? config.retry.maxRetries,
      baseDelay: options.retry?.baseDelay ?? config.retry.baseDelay,
      maxDelay: options.retry?.maxDelay ?? config.retry.maxDelay,
    };
    this.limiter = new Bottleneck({
      maxConcurrent: options.maxConcurrent ?? config.maxConcurrent,
    });

    if (this.provider === 'openai') {
      this.openaiClient = new OpenAI({
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseURL,
        maxRetries: 0,
      });
    } else {
      this.anthropicClient = new Anthropic({
        apiKey: config.anthropic.apiKey,
        baseURL: config.anthropic.baseURL,
        maxRetries: 0,
      });
    }

    logger.info({ provider: this.provider, model: this.model, timeoutMs: this.timeoutMs }, 'LLM client initialized');
  }

  /**
   * Generate a completion, retrying retryable failures
   */
  async generate(request: GenerateRequest): Promise<string> {
    const startTime = Date.now();

    logger.debug({
      provider: this.provider,
      model: this.model,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
      jsonMode: request.options?.jsonMode ?? false,
    }, 'Starting LLM completion request');

    try {
      const content = await withRetry(
        () => this.limiter.schedule(() => this.executeRequest(request)),
        this.retryConfig.maxRetries,
        'llm.generate',
        {
          baseDelayMs: this.retryConfig.baseDelay,
          maxDelayMs: this.retryConfig.maxDelay,
          shouldRetry: (error) => LLMError.fromError(error).retryable,
          logger,
        }
      );

      logger.info({
        provider: this.provider,
        model: this.model,
        duration: Date.now() - startTime,
        words: countWords(content),
      }, 'LLM completion successful');

      return content;
    } catch (error) {
      const llmError = LLMError.fromError(error);

      logger.error({
        provider: this.provider,
        model: this.model,
        duration: Date.now() - startTime,
        error: {
          code: llmError.code,
          message: llmError.message,
          retryable: llmError.retryable,
          statusCode: llmError.statusCode,
        },
      }, 'LLM completion failed');

      throw llmError;
    }
  }

  /**
   * One attempt under the wall-clock timeout
   */
  private async executeRequest(request: GenerateRequest): Promise<string> {
    const timeout = request.options?.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout);

    try {
      const content = this.provider === 'openai'
        ? await this.executeOpenAIRequest(request, controller.signal)
        : await this.executeAnthropicRequest(request, controller.signal);

      const words = countWords(content);
      if (words < MIN_USABLE_WORDS) {
        throw new LLMError(
          `Malformed response: ${words} word(s), expected at least ${MIN_USABLE_WORDS}`,
          'malformed',
          true
        );
      }

      return content;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new LLMError(
          `Request timeout after ${timeout}ms`,
          'timeout',
          true,
          undefined,
          error instanceof Error ? error : undefined
        );
      }
      throw LLMError.fromError(error);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute OpenAI-compatible chat completion
   */
  private async executeOpenAIRequest(request: GenerateRequest, signal: AbortSignal): Promise<string> {
    if (!this.openaiClient) {
      throw new LLMError('OpenAI client not initialized', 'invalid_request', false);
    }

    try {
      const completion = await this.openaiClient.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.prompt },
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          ...(request.options?.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
        },
        { signal }
      );

      const choice = completion.choices[0];
      if (!choice) {
        throw new LLMError('No completion choices returned', 'malformed', true);
      }

      return choice.message.content ?? '';
    } catch (error: unknown) {
      throw this.handleOpenAIError(error);
    }
  }

  /**
   * Execute Anthropic messages request
   */
  private async executeAnthropicRequest(request: GenerateRequest, signal: AbortSignal): Promise<string> {
    if (!this.anthropicClient) {
      throw new LLMError('Anthropic client not initialized', 'invalid_request', false);
    }

    try {
      const response = await this.anthropicClient.messages.create(
        {
          model: this.model,
          system: request.systemPrompt,
          messages: [{ role: 'user', content: request.prompt }],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal }
      );

      return response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('\n');
    } catch (error: unknown) {
      throw this.handleAnthropicError(error);
    }
  }

  /**
   * Handle OpenAI-specific errors
   */
  private handleOpenAIError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new LLMError(error.message, 'timeout', true, undefined, error);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new LLMError(error.message, 'unavailable', true, undefined, error);
    }
    if (error instanceof OpenAI.APIError) {
      return classifyStatus(error.status, error.message, error);
    }
    return LLMError.fromError(error);
  }

  /**
   * Handle Anthropic-specific errors
   */
  private handleAnthropicError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new LLMError(error.message, 'timeout', true, undefined, error);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new LLMError(error.message, 'unavailable', true, undefined, error);
    }
    if (error instanceof Anthropic.APIError) {
      return classifyStatus(error.status, error.message, error);
    }
    return LLMError.fromError(error);
  }
}

/**
 * Map an HTTP status from a provider into an LLMError
 */
export function classifyStatus(status: number | undefined, message: string, cause: Error): LLMError {
  const lower = message.toLowerCase();

  if (lower.includes('out of memory') || lower.includes('vram') || lower.includes('insufficient memory')) {
    return new LLMError(message, 'resource_exhausted', true, status, cause);
  }

  switch (status) {
    case 404:
      return new LLMError(message, 'not_found', true, status, cause);
    case 429:
      return new LLMError(message, 'rate_limit', true, status, cause);
    case 401:
    case 403:
      return new LLMError(message, 'authentication', false, status, cause);
    case 400:
      return new LLMError(message, 'invalid_request', false, status, cause);
    default:
      break;
  }

  if (status !== undefined && status >= 500) {
    return new LLMError(message, 'server_error', true, status, cause);
  }

  return LLMError.fromError(cause);
}

/**
 * Build the completion client from configuration
 */
export function createCompletionClient(options: LLMClientOptions = {}): LLMClient {
  return new LLMClient(options);
}
