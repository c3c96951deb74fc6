/**
 * Anthropic Client Wrapper
 *
 * A thin layer over the Anthropic SDK that handles:
 * - API key configuration with clear error messages
 * - Per-request system prompts and config overrides
 * - Text extraction from content blocks
 * - Mapping SDK errors onto typed LLMErrors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const response = await client.complete('Hello!', { system: 'Be brief.' });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  CompletionClient,
  CompletionRequest,
} from './types';
import { LLMError, type LLMErrorType } from './types';

// Default model to use for all requests (Claude Sonnet 4.5)
const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

// Default maximum tokens for responses
const DEFAULT_MAX_TOKENS = 4096;

// Default temperature for response generation
const DEFAULT_TEMPERATURE = 0.7;

export interface AnthropicClientOptions extends LLMConfig {
  /** Anthropic API key. Required. */
  apiKey: string | undefined;
}

export class AnthropicClient implements CompletionClient {
  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: Required<LLMConfig>;

  /**
   * @throws LLMError if no API key is given
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({
   *   apiKey: config.anthropic.apiKey,
   *   model: config.anthropic.model,
   *   maxTokens: config.anthropic.maxTokens,
   * });
   * ```
   */
  constructor(options: AnthropicClientOptions) {
    if (!options.apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Get your API key at: https://console.anthropic.com/\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey: options.apiKey });

    this.defaultConfig = {
      model: options.model ?? DEFAULT_MODEL,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param messages - Either a single string (treated as user message) or an array of messages
   * @param request - System prompt and per-request overrides
   * @throws LLMError on API errors
   */
  async complete(
    messages: string | LLMMessage[],
    request: CompletionRequest = {}
  ): Promise<LLMResponse> {
    const formattedMessages = this.formatMessages(this.normalizeMessages(messages));
    const mergedConfig = this.mergeConfig(request);

    try {
      const response = await this.client.messages.create({
        model: mergedConfig.model,
        max_tokens: mergedConfig.maxTokens,
        temperature: mergedConfig.temperature,
        system: request.system,
        messages: formattedMessages,
      });

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Normalizes input to always return an array of messages.
   */
  private normalizeMessages(input: string | LLMMessage[]): LLMMessage[] {
    if (typeof input === 'string') {
      return [{ role: 'user', content: input }];
    }
    return input;
  }

  /**
   * Converts our LLMMessage format to the SDK's MessageParam format.
   */
  private formatMessages(messages: LLMMessage[]): Anthropic.Messages.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private mergeConfig(config: LLMConfig): Required<LLMConfig> {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Concatenates the text of all text blocks in a response.
   */
  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    // Timeout must be checked before APIConnectionError since it extends it
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError(
        'Request to Anthropic API timed out. Please try again.',
        'timeout',
        error
      );
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
