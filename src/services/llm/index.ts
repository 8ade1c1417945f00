/**
 * LLM Service Barrel Export
 *
 * Centralized exports for the completion client and related functionality
 */

export { LLMClient, classifyStatus, createCompletionClient, MIN_USABLE_WORDS } from './client.js';
export type { LLMClientOptions } from './client.js';
export type {
  CompletionClient,
  GenerateOptions,
  GenerateRequest,
  LLMProviderName,
  RetryConfig,
  LLMErrorCode,
} from '../../types/llm.js';
export { LLMError } from '../../types/llm.js';
export { llmConfig, validateLLMConfig } from '../../config/llm.js';
export type { LLMConfig } from '../../config/llm.js';
