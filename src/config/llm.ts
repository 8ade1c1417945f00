/**
 * LLM Configuration
 *
 * Configuration for the completion service loaded from environment variables.
 * The default provider targets an OpenAI-compatible endpoint, which covers
 * local model servers such as Ollama as well as hosted APIs.
 */

import { config } from 'dotenv';
import type { LLMProviderName, RetryConfig } from '../types/llm.js';
import { getEnvVar, getEnvInt } from './env.js';

config();

/**
 * LLM configuration interface
 */
export interface LLMConfig {
  provider: LLMProviderName;
  /** Model identifier sent with every request */
  model: string;
  openai: {
    apiKey: string;
    baseURL?: string;
  };
  anthropic: {
    apiKey: string;
    baseURL?: string;
  };
  /** Hard wall-clock timeout per request in milliseconds */
  timeoutMs: number;
  retry: RetryConfig;
  /** Simultaneous requests allowed against the service */
  maxConcurrent: number;
  /** Token ceiling override for verdict generation (0 = derive from word band) */
  maxTokensVerdict: number;
}

/**
 * Validate provider name
 */
function validateProvider(provider: string): LLMProviderName {
  if (provider !== 'openai' && provider !== 'anthropic') {
    throw new Error(`Invalid LLM provider: ${provider}. Must be 'openai' or 'anthropic'`);
  }
  return provider;
}

/**
 * LLM configuration loaded from environment variables
 *
 * Environment variables:
 * - LLM_PROVIDER: 'openai' | 'anthropic' (default: 'openai')
 * - LLM_MODEL: model identifier (default: 'llama3:8b')
 * - OPENAI_BASE_URL: OpenAI-compatible endpoint (default: local Ollama)
 * - OPENAI_API_KEY: key for the endpoint (local servers accept any value)
 * - ANTHROPIC_API_KEY / ANTHROPIC_BASE_URL: Anthropic provider
 * - LLM_TIMEOUT_MS: request timeout in milliseconds (default: 120000)
 * - LLM_MAX_RETRIES: attempts per request (default: 3)
 * - LLM_RETRY_BASE_DELAY / LLM_RETRY_MAX_DELAY: linear backoff bounds
 * - LLM_MAX_CONCURRENT: concurrent requests (default: 2)
 * - LLM_MAX_TOKENS_VERDICT: verdict token ceiling override
 */
export const llmConfig: LLMConfig = {
  provider: validateProvider(getEnvVar('LLM_PROVIDER', false, 'openai')),
  model: getEnvVar('LLM_MODEL', false, 'llama3:8b'),
  openai: {
    apiKey: getEnvVar('OPENAI_API_KEY', false, 'ollama'),
    baseURL: getEnvVar('OPENAI_BASE_URL', false, 'http://localhost:11434/v1'),
  },
  anthropic: {
    apiKey: getEnvVar('ANTHROPIC_API_KEY'),
    baseURL: getEnvVar('ANTHROPIC_BASE_URL') || undefined,
  },
  timeoutMs: getEnvInt('LLM_TIMEOUT_MS', 120000),
  retry: {
    maxRetries: getEnvInt('LLM_MAX_RETRIES', 3),
    baseDelay: getEnvInt('LLM_RETRY_BASE_DELAY', 1500),
    maxDelay: getEnvInt('LLM_RETRY_MAX_DELAY', 10000),
  },
  maxConcurrent: getEnvInt('LLM_MAX_CONCURRENT', 2),
  maxTokensVerdict: getEnvInt('LLM_MAX_TOKENS_VERDICT', 0),
};

/**
 * Validate configuration at startup
 */
export function validateLLMConfig(cfg: LLMConfig = llmConfig): void {
  const errors: string[] = [];

  if (!cfg.model) {
    errors.push('LLM_MODEL must not be empty');
  }

  if (cfg.provider === 'anthropic' && !cfg.anthropic.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER is set to "anthropic"');
  }

  if (cfg.provider === 'openai' && !cfg.openai.baseURL) {
    errors.push('OPENAI_BASE_URL is required when LLM_PROVIDER is set to "openai"');
  }

  if (cfg.retry.maxRetries < 1) {
    errors.push('LLM_MAX_RETRIES must be >= 1');
  }

  if (cfg.retry.baseDelay < 0) {
    errors.push('LLM_RETRY_BASE_DELAY must be >= 0');
  }

  if (cfg.retry.maxDelay < cfg.retry.baseDelay) {
    errors.push('LLM_RETRY_MAX_DELAY must be >= LLM_RETRY_BASE_DELAY');
  }

  if (cfg.timeoutMs < 1000) {
    errors.push('LLM_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (cfg.maxConcurrent < 1) {
    errors.push('LLM_MAX_CONCURRENT must be >= 1');
  }

  if (errors.length > 0) {
    throw new Error(`LLM configuration validation failed:\n${errors.join('\n')}`);
  }
}
