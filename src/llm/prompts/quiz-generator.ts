/**
 * Quiz Generation Prompt
 *
 * Produces a balanced multiple-choice quiz (easy → medium → hard, four
 * options per question) and validates the model's JSON. Unlike flashcards,
 * a single malformed question rejects the whole reply.
 */

import { z } from 'zod';
import type { QuizQuestion } from '@/core/models';
import { LLMError } from '../types';
import { extractJson } from './json';

export const DEFAULT_QUESTION_COUNT = 8;
export const OPTIONS_PER_QUESTION = 4;

const rawQuestionSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).optional(),
  question: z.string().trim().min(1),
  options: z.array(z.string()).length(OPTIONS_PER_QUESTION),
  correctAnswer: z.number().int().min(0).max(OPTIONS_PER_QUESTION - 1),
  difficulty: z.string().optional(),
  explanation: z.object({
    correct: z.string(),
    incorrect: z.record(z.string()).optional(),
  }),
});

const rawQuizSchema = z.object({
  questions: z.array(rawQuestionSchema).min(1),
});

type RawQuestion = z.infer<typeof rawQuestionSchema>;

export const QUIZ_SYSTEM_PROMPT =
  'You write accurate, balanced multiple-choice quizzes. You reply with a single JSON object only.';

/**
 * Builds the user message for quiz generation.
 */
export function buildQuizPrompt(
  topic: string,
  topicDescription: string,
  numQuestions: number = DEFAULT_QUESTION_COUNT
): string {
  const hard = Math.max(1, Math.floor(numQuestions / 4));
  const easy = Math.ceil((numQuestions - hard) / 2);
  const medium = numQuestions - hard - easy;

  return `Generate a JSON object for a balanced multiple-choice quiz based on the given input.

Inputs:
- Topic: ${topic.trim()}
- Topic Description: ${topicDescription.trim()}

Quiz Structure:
- The quiz should contain ${numQuestions} questions, distributed as follows:
  - ${easy} Easy: basic recall questions
  - ${medium} Medium: questions requiring understanding and application
  - ${hard} Hard: analytical, multi-step, or problem-solving questions
- The order of questions must be: Easy → Medium → Hard.

Output Format:
{
  "questions": [
    {
      "id": "1",
      "question": "Question text",
      "options": ["Option A", "Option B", "Option C", "Option D"],
      "correctAnswer": 0,
      "difficulty": "easy",
      "explanation": {
        "correct": "Why the correct answer is right (50-100 words)",
        "incorrect": {
          "1": "Why Option B is incorrect",
          "2": "Why Option C is incorrect",
          "3": "Why Option D is incorrect"
        }
      }
    }
  ]
}

Rules:
- Each question must have exactly ${OPTIONS_PER_QUESTION} options
- correctAnswer is the 0-based index of the right option (0 to ${OPTIONS_PER_QUESTION - 1})
- Explain every incorrect option
- Return only the JSON object with no additional text.`;
}

/**
 * Fills in an explanation for every option: the correct one repeats the
 * correct explanation, missing incorrect ones get a generic sentence.
 */
function completeExplanations(question: RawQuestion): QuizQuestion['explanation'] {
  const incorrect: Record<string, string> = {};
  for (let i = 0; i < question.options.length; i++) {
    const key = String(i);
    incorrect[key] =
      i === question.correctAnswer
        ? question.explanation.correct
        : (question.explanation.incorrect?.[key] ??
          `This option is incorrect. ${question.explanation.correct}`);
  }
  return { correct: question.explanation.correct, incorrect };
}

/**
 * Parses a quiz generation reply into stored question form. Question ids are
 * taken from the reply when present and unique, otherwise numbered from 1.
 *
 * @throws LLMError ('invalid_response') if the reply does not match the format
 */
export function parseQuizResponse(response: string): QuizQuestion[] {
  const result = rawQuizSchema.safeParse(extractJson(response, '{'));
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new LLMError(
      `Quiz reply has an invalid structure at '${issue.path.join('.')}': ${issue.message}`,
      'invalid_response'
    );
  }

  const rawIds = result.data.questions.map((q) => (q.id === undefined ? '' : String(q.id)));
  const idsUsable = rawIds.every((id) => id !== '') && new Set(rawIds).size === rawIds.length;

  return result.data.questions.map((question, index) => ({
    id: idsUsable ? rawIds[index] : String(index + 1),
    question: question.question,
    options: question.options,
    correctAnswerIndex: question.correctAnswer,
    difficulty: (question.difficulty ?? 'medium').toLowerCase(),
    explanation: completeExplanations(question),
  }));
}
