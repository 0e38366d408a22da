import type { Message, CompletionOptions, CompletionResult, ModelProvider } from '../types.js';
import type { LLMClient, LLMClientConfig } from './types.js';

/**
 * Abstract base class for LLM clients.
 * Holds the shared connection settings; provider SDK retries stay disabled.
 */
export abstract class BaseLLMClient implements LLMClient {
  abstract readonly provider: ModelProvider;
  abstract readonly model: string;

  protected config: Required<Omit<LLMClientConfig, 'baseUrl'>> & { baseUrl?: string };

  constructor(config: LLMClientConfig = {}) {
    this.config = {
      apiKey: config.apiKey ?? '',
      baseUrl: config.baseUrl,
      timeout: config.timeout ?? 60000,
    };
  }

  abstract completion(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;

  /**
   * Split the leading system message from the conversation.
   */
  protected splitSystemMessage(messages: Message[]): { system?: string; rest: Message[] } {
    const systemMessage = messages.find((m) => m.role === 'system');
    const rest = messages.filter((m) => m.role !== 'system');
    return { system: systemMessage?.content, rest };
  }
}
