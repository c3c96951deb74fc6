/**
 * Flashcard Generation Prompt
 *
 * Asks the model for a JSON array of front/back cards on a topic, then
 * validates the reply. Cards without a front or back are dropped; an
 * unknown difficulty becomes 'medium'.
 */

import { z } from 'zod';
import type { FlashcardDifficulty } from '@/core/models';
import { LLMError } from '../types';
import { extractJson } from './json';

export const DEFAULT_FLASHCARD_COUNT = 10;

/** A card as produced by the generator, before it is stored. */
export interface GeneratedFlashcard {
  front: string;
  back: string;
  difficulty: FlashcardDifficulty;
  explanation: string | null;
}

const rawFlashcardSchema = z.object({
  front: z.string().trim().min(1),
  back: z.string().trim().min(1),
  difficulty: z.string().optional(),
  explanation: z.string().nullable().optional(),
});

export const FLASHCARD_SYSTEM_PROMPT =
  'You are an expert educational content creator. You reply with JSON only.';

/**
 * Builds the user message for flashcard generation.
 */
export function buildFlashcardPrompt(topic: string, count: number = DEFAULT_FLASHCARD_COUNT): string {
  return `Generate ${count} high-quality flashcards for the following topic:

Topic: ${topic.trim()}

Create flashcards that:
1. Cover key concepts, definitions, formulas, and applications
2. Vary in difficulty (easy, medium, hard)
3. Are clear, concise, and educational
4. Include practical examples where relevant

Return ONLY a valid JSON array with this exact structure (no markdown, no extra text):
[
  {
    "front": "Clear, concise question or term",
    "back": "Comprehensive answer or definition (2-4 sentences)",
    "difficulty": "easy|medium|hard",
    "explanation": "Brief context, mnemonic, or tip to help remember (1-2 sentences)"
  }
]

Guidelines:
- Front side: ask specific questions or state terms clearly
- Back side: provide accurate, complete answers
- Difficulty: roughly 40% easy, 40% medium, 20% hard
- Explanation: add helpful tips, mnemonics, or real-world connections

Generate ${count} flashcards now:`;
}

function normalizeDifficulty(value: string | undefined): FlashcardDifficulty {
  switch ((value ?? 'medium').trim().toLowerCase()) {
    case 'easy':
      return 'easy';
    case 'hard':
      return 'hard';
    default:
      return 'medium';
  }
}

/**
 * Parses a flashcard generation reply.
 *
 * @throws LLMError ('invalid_response') if the reply is not a JSON array or
 *   contains no usable card
 */
export function parseFlashcardResponse(response: string): GeneratedFlashcard[] {
  const parsed = extractJson(response, '[');
  if (!Array.isArray(parsed)) {
    throw new LLMError('Flashcard reply is not a JSON array', 'invalid_response');
  }

  const cards: GeneratedFlashcard[] = [];
  for (const item of parsed) {
    const result = rawFlashcardSchema.safeParse(item);
    if (!result.success) {
      continue;
    }
    const explanation = result.data.explanation?.trim();
    cards.push({
      front: result.data.front,
      back: result.data.back,
      difficulty: normalizeDifficulty(result.data.difficulty),
      explanation: explanation ? explanation : null,
    });
  }

  if (cards.length === 0) {
    throw new LLMError('No valid flashcards in model reply', 'invalid_response');
  }
  return cards;
}
