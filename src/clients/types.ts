import type { Message, CompletionOptions, CompletionResult, ModelProvider } from '../types.js';

/**
 * Base interface for LLM clients.
 * All provider-specific clients must implement this interface.
 */
export interface LLMClient {
  /** Provider name (e.g., 'openai', 'anthropic') */
  readonly provider: string;

  /** Model identifier */
  readonly model: string;

  /**
   * Generate a completion for the given messages.
   * One request, one response: implementations never retry.
   */
  completion(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;
}

/**
 * Configuration for creating an LLM client.
 */
export interface LLMClientConfig {
  apiKey?: string;
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Detect provider from model name.
 */
export function detectProvider(model: string): ModelProvider {
  if (model.startsWith('claude')) {
    return 'anthropic';
  }
  return 'openai';
}
