/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt builders and reply parsers for flashcard and quiz generation.
 */

export { extractJson } from './json';

export {
  buildFlashcardPrompt,
  parseFlashcardResponse,
  FLASHCARD_SYSTEM_PROMPT,
  DEFAULT_FLASHCARD_COUNT,
  type GeneratedFlashcard,
} from './flashcard-generator';

export {
  buildQuizPrompt,
  parseQuizResponse,
  QUIZ_SYSTEM_PROMPT,
  DEFAULT_QUESTION_COUNT,
  OPTIONS_PER_QUESTION,
} from './quiz-generator';
