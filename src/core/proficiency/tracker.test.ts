/**
 * Proficiency Tracker Unit Tests
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  scoreSubmission,
  updateTopicProficiency,
  difficultyWeight,
  type ScorableQuestion,
} from './tracker';
import { InvalidInputError } from '../errors';

const mixedQuiz: ScorableQuestion[] = [
  { id: 'q1', correctAnswerIndex: 0, difficulty: 'easy' },
  { id: 'q2', correctAnswerIndex: 1, difficulty: 'medium' },
  { id: 'q3', correctAnswerIndex: 2, difficulty: 'medium' },
  { id: 'q4', correctAnswerIndex: 3, difficulty: 'hard' },
];

describe('scoreSubmission', () => {
  it('weights correct answers by difficulty', () => {
    const result = scoreSubmission(mixedQuiz, { q1: 0, q2: 0, q3: 0, q4: 3 });

    expect(result.percentScore).toBe(50);
    expect(result.attemptProficiency).toBe(0.5);
    expect(result.passed).toBe(false);
    expect(result.correctCount).toBe(2);
    expect(result.wrongCount).toBe(2);
    expect(result.unansweredCount).toBe(0);
    expect(result.totalQuestions).toBe(4);
  });

  it('treats a missing answer as incorrect without raising', () => {
    const result = scoreSubmission(mixedQuiz, { q1: 0, q2: 1, q4: 3 });

    expect(result.correctCount).toBe(3);
    expect(result.unansweredCount).toBe(1);
    expect(result.wrongCount).toBe(0);
    expect(result.percentScore).toBe(75);
    expect(result.passed).toBe(true);
    expect(result.questions[2]).toEqual({
      questionId: 'q3',
      submittedAnswer: null,
      correctAnswerIndex: 2,
      isCorrect: false,
      weight: 1,
    });
  });

  it('passes at exactly 70 percent', () => {
    const questions = Array.from({ length: 10 }, (_, i) => ({
      id: `q${i}`,
      correctAnswerIndex: 1,
    }));
    const answers = Object.fromEntries(questions.map((q, i) => [q.id, i < 7 ? 1 : 0]));

    const result = scoreSubmission(questions, answers);

    expect(result.percentScore).toBe(70);
    expect(result.passed).toBe(true);
  });

  it('returns zeros for an empty quiz', () => {
    const result = scoreSubmission([], {});

    expect(result.percentScore).toBe(0);
    expect(result.attemptProficiency).toBe(0);
    expect(result.passed).toBe(false);
    expect(result.totalQuestions).toBe(0);
  });

  it('defaults unknown and missing difficulties to weight 1.0', () => {
    const questions: ScorableQuestion[] = [
      { id: 'a', correctAnswerIndex: 0, difficulty: 'expert' },
      { id: 'b', correctAnswerIndex: 0 },
      { id: 'c', correctAnswerIndex: 0, difficulty: 'HARD' },
    ];

    const result = scoreSubmission(questions, { b: 0, c: 0 });

    expect(result.questions.map((q) => q.weight)).toEqual([1, 1, 1.5]);
    expect(result.attemptProficiency).toBeCloseTo(2.5 / 3.5, 12);
  });

  it('ignores answers to questions that are not in the quiz', () => {
    const result = scoreSubmission(mixedQuiz.slice(0, 1), { q1: 0, extra: 2 });
    expect(result.correctCount).toBe(1);
    expect(result.totalQuestions).toBe(1);
  });

  it('accepts custom weights', () => {
    const result = scoreSubmission(mixedQuiz, { q4: 3 }, { easy: 1, medium: 1, hard: 2 });
    expect(result.attemptProficiency).toBe(0.4);
  });

  it('returns identical results for identical inputs', () => {
    const answers = { q1: 0, q3: 2 };
    expect(scoreSubmission(mixedQuiz, answers)).toEqual(scoreSubmission(mixedQuiz, answers));
  });

  describe('validation', () => {
    it('rejects a negative correct answer index', () => {
      expect(() => scoreSubmission([{ id: 'q1', correctAnswerIndex: -1 }], {})).toThrow(
        InvalidInputError
      );
    });

    it('rejects a fractional correct answer index', () => {
      expect(() => scoreSubmission([{ id: 'q1', correctAnswerIndex: 1.5 }], {})).toThrow(
        "Question 'q1' has an invalid correct answer index: 1.5"
      );
    });

    it('rejects an index past the last option', () => {
      expect(() =>
        scoreSubmission([{ id: 'q1', correctAnswerIndex: 4, optionCount: 4 }], { q1: 4 })
      ).toThrow("Question 'q1' correct answer index 4 is out of range for 4 options");
    });

    it('rejects a question without an id', () => {
      expect(() => scoreSubmission([{ id: '', correctAnswerIndex: 0 }], {})).toThrow(
        'Question at position 0 has no id'
      );
    });
  });
});

describe('updateTopicProficiency', () => {
  it('uses the attempt as the baseline for a new topic', () => {
    expect(updateTopicProficiency(null, 0.73)).toBe(0.73);
    expect(updateTopicProficiency(undefined, 0.73, 'Algebra')).toBe(0.73);
  });

  it('blends 70 percent history with 30 percent attempt', () => {
    expect(updateTopicProficiency(0.6, 0.9)).toBe(0.69);
    expect(updateTopicProficiency(0.5, 1)).toBe(0.65);
    expect(updateTopicProficiency(0.8, 0.25)).toBe(0.635);
  });

  it('rounds to four decimal places', () => {
    expect(updateTopicProficiency(null, 0.12345)).toBe(0.1235);
    expect(updateTopicProficiency(0.6667, 0.3333)).toBe(0.5667);
  });

  it('rounds an exact half at the fifth place to the even digit', () => {
    expect(updateTopicProficiency(null, 0.03125)).toBe(0.0312);
    expect(updateTopicProficiency(null, 0.09375)).toBe(0.0938);
  });

  it('rejects inputs outside [0, 1]', () => {
    expect(() => updateTopicProficiency(null, 1.2)).toThrow(InvalidInputError);
    expect(() => updateTopicProficiency(-0.1, 0.5, 'Algebra')).toThrow(
      "existing proficiency for topic 'Algebra' must be between 0 and 1, received -0.1"
    );
    expect(() => updateTopicProficiency(0.5, Number.NaN)).toThrow(InvalidInputError);
  });

  it('stays within [0, 1] for all inputs in range', () => {
    fc.assert(
      fc.property(
        fc.option(fc.double({ min: 0, max: 1, noNaN: true }), { nil: null }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (existing, attempt) => {
          const value = updateTopicProficiency(existing, attempt);
          return value >= 0 && value <= 1;
        }
      )
    );
  });
});

describe('difficultyWeight', () => {
  it('maps the three known labels', () => {
    expect(difficultyWeight('easy')).toBe(0.5);
    expect(difficultyWeight('Medium')).toBe(1);
    expect(difficultyWeight('hard')).toBe(1.5);
    expect(difficultyWeight('unknown')).toBe(1);
  });
});
