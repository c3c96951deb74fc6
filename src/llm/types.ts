/**
 * LLM Types and Interfaces
 *
 * Types for the LLM client wrapper. Application code depends on these
 * rather than on Anthropic SDK types, so the content generator can be
 * driven by a fake client in tests.
 */

/**
 * Represents a single message in a conversation.
 * Messages alternate between 'user' and 'assistant' roles.
 */
export interface LLMMessage {
  /** The role of who sent this message */
  role: 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Configuration options for LLM API calls.
 * All fields are optional and have sensible defaults.
 */
export interface LLMConfig {
  /**
   * The model to use for completions.
   * Defaults to 'claude-sonnet-4-5-20250929' (Claude Sonnet 4.5).
   */
  model?: string;

  /**
   * Maximum number of tokens to generate in the response.
   * Defaults to 4096.
   */
  maxTokens?: number;

  /**
   * Controls randomness in the response (0.0 to 1.0).
   * Lower values = more deterministic, higher = more creative.
   * Defaults to 0.7.
   */
  temperature?: number;
}

/**
 * Result of a complete (non-streaming) API call.
 * Contains the response text and usage information.
 */
export interface LLMResponse {
  /** The generated response text */
  text: string;

  /**
   * Token usage information for billing/tracking.
   * Null if usage data is not available.
   */
  usage: {
    /** Number of tokens in the input (prompt) */
    inputTokens: number;
    /** Number of tokens in the output (response) */
    outputTokens: number;
  } | null;

  /** The reason the model stopped generating ('end_turn', 'max_tokens', ...) */
  stopReason: string | null;
}

/**
 * Options for a single completion request.
 */
export interface CompletionRequest extends LLMConfig {
  /** System prompt for this request only */
  system?: string;
}

/**
 * Anything that can turn messages into a completion. Implemented by
 * AnthropicClient; tests pass a fake.
 */
export interface CompletionClient {
  complete(messages: string | LLMMessage[], request?: CompletionRequest): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 * These help distinguish between different failure modes.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Anthropic server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'invalid_response' // Reply could not be parsed into the expected shape
  | 'unknown';         // Unexpected error

/**
 * Custom error class for LLM-related errors.
 * Includes the error type for easier handling.
 */
export class LLMError extends Error {
  /** The type of error that occurred */
  type: LLMErrorType;
  /** The original error that was caught, if any */
  cause?: Error;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message);
    this.name = 'LLMError';
    this.type = type;
    this.cause = cause;
  }
}
