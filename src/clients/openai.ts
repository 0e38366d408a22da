import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { Message, CompletionOptions, CompletionResult, OpenAIModel } from '../types.js';
import { BaseLLMClient } from './base.js';
import type { LLMClientConfig } from './types.js';
import { missingCredentialError } from '../utils/errors.js';

/**
 * Check if a model is a reasoning model that doesn't support temperature.
 */
function isReasoningModel(model: string): boolean {
  return model.startsWith('o1') || model.startsWith('o3') || model.startsWith('o4') || model.startsWith('gpt-5');
}

/**
 * OpenAI client implementation over the chat completions API.
 */
export class OpenAIClient extends BaseLLMClient {
  readonly provider = 'openai' as const;
  readonly model: OpenAIModel;

  private client: OpenAI;

  constructor(model: OpenAIModel, config: LLMClientConfig = {}) {
    super(config);
    this.model = model;

    if (!this.config.apiKey) {
      throw missingCredentialError('openai', 'OPENAI_API_KEY');
    }

    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      maxRetries: 0, // Failures surface to the caller
    });
  }

  /**
   * Generate a completion using OpenAI's chat API.
   */
  async completion(messages: Message[], options: CompletionOptions = {}): Promise<CompletionResult> {
    const requestParams: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map((m): ChatCompletionMessageParam => {
        switch (m.role) {
          case 'system':
            return { role: 'system', content: m.content };
          case 'user':
            return { role: 'user', content: m.content };
          case 'assistant':
            return { role: 'assistant', content: m.content };
        }
      }),
    };

    if (options.maxTokens !== undefined) {
      requestParams.max_tokens = options.maxTokens;
    }

    if (options.temperature !== undefined && !isReasoningModel(this.model)) {
      requestParams.temperature = options.temperature;
    }

    const response = await this.client.chat.completions.create(requestParams);

    const choice = response.choices[0];
    if (!choice) {
      throw new Error('No completion choice returned from OpenAI');
    }

    const content = choice.message.content;
    if (content === null) {
      throw new Error(`OpenAI returned no message content (finish reason: ${choice.finish_reason})`);
    }

    return {
      content,
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  /**
   * Map OpenAI finish reason to our standard format.
   */
  private mapFinishReason(reason: string | null): CompletionResult['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'tool_calls':
      case 'function_call':
        return 'tool_calls';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'unknown';
    }
  }
}
