import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming, MessageParam } from '@anthropic-ai/sdk/resources/messages/index';
import type { Message, CompletionOptions, CompletionResult, AnthropicModel } from '../types.js';
import { BaseLLMClient } from './base.js';
import type { LLMClientConfig } from './types.js';
import { missingCredentialError } from '../utils/errors.js';

/**
 * Anthropic client implementation over the messages API.
 */
export class AnthropicClient extends BaseLLMClient {
  readonly provider = 'anthropic' as const;
  readonly model: AnthropicModel;

  private client: Anthropic;

  constructor(model: AnthropicModel, config: LLMClientConfig = {}) {
    super(config);
    this.model = model;

    if (!this.config.apiKey) {
      throw missingCredentialError('anthropic', 'ANTHROPIC_API_KEY');
    }

    this.client = new Anthropic({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      maxRetries: 0, // Failures surface to the caller
    });
  }

  /**
   * Generate a completion using Anthropic's messages API.
   */
  async completion(messages: Message[], options: CompletionOptions = {}): Promise<CompletionResult> {
    const { system, rest } = this.splitSystemMessage(messages);

    // max_tokens is mandatory for this API
    const requestParams: MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: options.maxTokens ?? 4096,
      messages: rest.map((m): MessageParam => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content,
      })),
    };

    if (system) {
      requestParams.system = system;
    }

    if (options.temperature !== undefined) {
      requestParams.temperature = options.temperature;
    }

    const response = await this.client.messages.create(requestParams);

    const content = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    if (!response.content.some((block) => block.type === 'text')) {
      throw new Error(`Anthropic returned no text content (stop reason: ${response.stop_reason})`);
    }

    return {
      content,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      finishReason: this.mapStopReason(response.stop_reason),
    };
  }

  /**
   * Map Anthropic stop reason to our standard format.
   */
  private mapStopReason(reason: string | null): CompletionResult['finishReason'] {
    switch (reason) {
      case 'end_turn':
      case 'stop_sequence':
        return 'stop';
      case 'max_tokens':
        return 'length';
      case 'tool_use':
        return 'tool_calls';
      default:
        return 'unknown';
    }
  }
}
