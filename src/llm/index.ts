/**
 * LLM Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { AnthropicClient, LLMContentGenerator } from '@/llm';
 *
 * const client = new AnthropicClient({ apiKey: config.anthropic.apiKey });
 * const generator = new LLMContentGenerator(client);
 * const cards = await generator.generateFlashcards('Photosynthesis', 10);
 * ```
 */

export { AnthropicClient, type AnthropicClientOptions } from './client';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMErrorType,
  CompletionClient,
  CompletionRequest,
} from './types';

// Value export: the error class is used with instanceof
export { LLMError } from './types';

export {
  LLMContentGenerator,
  UnconfiguredContentGenerator,
  type ContentGenerator,
} from './content-generator';

export {
  buildFlashcardPrompt,
  parseFlashcardResponse,
  buildQuizPrompt,
  parseQuizResponse,
  DEFAULT_FLASHCARD_COUNT,
  DEFAULT_QUESTION_COUNT,
  type GeneratedFlashcard,
} from './prompts';
