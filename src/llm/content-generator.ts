/**
 * Content Generator
 *
 * Turns a topic into flashcards or quiz questions. The API and services
 * depend on the ContentGenerator interface only; LLMContentGenerator is the
 * production implementation backed by a CompletionClient.
 */

import type { QuizQuestion } from '@/core/models';
import { LLMError, type CompletionClient } from './types';
import {
  buildFlashcardPrompt,
  parseFlashcardResponse,
  FLASHCARD_SYSTEM_PROMPT,
  type GeneratedFlashcard,
} from './prompts/flashcard-generator';
import {
  buildQuizPrompt,
  parseQuizResponse,
  QUIZ_SYSTEM_PROMPT,
  DEFAULT_QUESTION_COUNT,
} from './prompts/quiz-generator';

export interface ContentGenerator {
  /** At most `count` cards; fewer if the model produced fewer usable ones. */
  generateFlashcards(topic: string, count: number): Promise<GeneratedFlashcard[]>;

  generateQuizQuestions(topic: string, topicDescription: string): Promise<QuizQuestion[]>;
}

export class LLMContentGenerator implements ContentGenerator {
  constructor(
    private readonly client: CompletionClient,
    private readonly questionCount: number = DEFAULT_QUESTION_COUNT
  ) {}

  async generateFlashcards(topic: string, count: number): Promise<GeneratedFlashcard[]> {
    const response = await this.client.complete(buildFlashcardPrompt(topic, count), {
      system: FLASHCARD_SYSTEM_PROMPT,
    });
    return parseFlashcardResponse(response.text).slice(0, count);
  }

  async generateQuizQuestions(topic: string, topicDescription: string): Promise<QuizQuestion[]> {
    const response = await this.client.complete(
      buildQuizPrompt(topic, topicDescription, this.questionCount),
      { system: QUIZ_SYSTEM_PROMPT, temperature: 0.5 }
    );
    return parseQuizResponse(response.text);
  }
}

/**
 * Stand-in used when no API key is configured. Every call fails with an
 * authentication LLMError; everything else in the app keeps working.
 */
export class UnconfiguredContentGenerator implements ContentGenerator {
  async generateFlashcards(_topic: string, _count: number): Promise<GeneratedFlashcard[]> {
    throw this.notConfigured();
  }

  async generateQuizQuestions(_topic: string, _topicDescription: string): Promise<QuizQuestion[]> {
    throw this.notConfigured();
  }

  private notConfigured(): LLMError {
    return new LLMError(
      'Content generation is not configured: set ANTHROPIC_API_KEY',
      'authentication'
    );
  }
}
