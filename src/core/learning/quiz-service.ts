/**
 * Quiz Service
 *
 * Stores quizzes, scores submissions and keeps per-topic proficiency current.
 *
 * A submission is scored first (pure, no I/O), then the read-blend-write of
 * the learner's topic proficiency runs under the `proficiency:<learner>:<topic>`
 * lock so concurrent submissions in this process each see the previous
 * result. The proficiency row is a plain upsert: across processes two
 * submissions blended from the same read both succeed and the later write
 * wins. The attempt record keeps both values, so that loss is visible. The
 * upsert and the attempt record are written in one transaction.
 */

import type { Quiz, QuizAttempt, QuizQuestion, QuizSummary } from '../models';
import { InvalidInputError, NotFoundError } from '../errors';
import {
  scoreSubmission,
  updateTopicProficiency,
  type QuizSubmissionResult,
  type SubmittedAnswers,
} from '../proficiency';
import type {
  PageOptions,
  QuizAttemptRepository,
  QuizRepository,
  TopicProficiencyRepository,
} from '../../storage/repositories';
import type { ContentGenerator } from '../../llm/content-generator';
import { KeyedLock } from './key-lock';
import { generateId } from './ids';

export interface QuizServiceDependencies {
  quizRepo: QuizRepository;
  attemptRepo: QuizAttemptRepository;
  topicProficiencyRepo: TopicProficiencyRepository;
  contentGenerator: ContentGenerator;
  lock?: KeyedLock;
}

/** A question as submitted by a caller; `id` is assigned when missing. */
export interface NewQuizQuestion {
  id?: string;
  question: string;
  options: string[];
  correctAnswerIndex: number;
  difficulty?: string;
  explanation?: QuizQuestion['explanation'];
}

export interface NewQuiz {
  topic: string;
  topicDescription: string;
  lessonId?: string | null;
  questions: NewQuizQuestion[];
}

export interface QuizSubmission {
  answers: SubmittedAnswers;
  timeTakenSeconds: number;
}

export interface QuizSubmissionOutcome extends QuizSubmissionResult {
  quizId: string;
  attemptId: string;
  topic: string;
  timeTakenSeconds: number;
  /** Topic proficiency before this attempt; null on the first attempt. */
  previousProficiency: number | null;
  topicProficiency: number;
  completedAt: Date;
}

export class QuizService {
  private readonly quizRepo: QuizRepository;
  private readonly attemptRepo: QuizAttemptRepository;
  private readonly proficiencyRepo: TopicProficiencyRepository;
  private readonly generator: ContentGenerator;
  private readonly lock: KeyedLock;

  constructor(deps: QuizServiceDependencies) {
    this.quizRepo = deps.quizRepo;
    this.attemptRepo = deps.attemptRepo;
    this.proficiencyRepo = deps.topicProficiencyRepo;
    this.generator = deps.contentGenerator;
    this.lock = deps.lock ?? new KeyedLock();
  }

  /**
   * @throws {InvalidInputError} For a blank topic, duplicate question ids,
   *   fewer than two options, or an out-of-range correct answer
   */
  async createQuiz(learnerId: string, input: NewQuiz, now: Date = new Date()): Promise<Quiz> {
    const topic = input.topic.trim();
    if (topic.length === 0) {
      throw new InvalidInputError('Quiz topic must not be blank', 'topic');
    }

    return this.quizRepo.create({
      id: generateId('qz'),
      learnerId,
      topic,
      topicDescription: input.topicDescription.trim(),
      lessonId: input.lessonId ?? null,
      questions: normalizeQuestions(input.questions),
      createdAt: now,
    });
  }

  async generateQuiz(
    learnerId: string,
    input: Omit<NewQuiz, 'questions'>,
    now: Date = new Date()
  ): Promise<Quiz> {
    const questions = await this.generator.generateQuizQuestions(
      input.topic,
      input.topicDescription
    );
    return this.createQuiz(learnerId, { ...input, questions }, now);
  }

  /**
   * @throws {NotFoundError} If the quiz does not exist or belongs to another learner
   */
  async getQuiz(learnerId: string, quizId: string): Promise<Quiz> {
    const quiz = await this.quizRepo.findById(quizId);
    if (!quiz || quiz.learnerId !== learnerId) {
      throw new NotFoundError('Quiz', quizId);
    }
    return quiz;
  }

  async listQuizzes(learnerId: string, page: PageOptions = {}): Promise<QuizSummary[]> {
    return this.quizRepo.findSummariesByLearner(learnerId, page);
  }

  async listAttempts(learnerId: string, page: PageOptions = {}): Promise<QuizAttempt[]> {
    return this.attemptRepo.findByLearner(learnerId, page);
  }

  /**
   * Scores a submission, blends it into the topic proficiency and records
   * the attempt.
   *
   * @throws {NotFoundError} If the quiz is not the learner's
   * @throws {InvalidInputError} If timeTakenSeconds is not a non-negative integer
   */
  async submitAttempt(
    learnerId: string,
    quizId: string,
    submission: QuizSubmission,
    now: Date = new Date()
  ): Promise<QuizSubmissionOutcome> {
    const quiz = await this.getQuiz(learnerId, quizId);

    const { timeTakenSeconds } = submission;
    if (!Number.isInteger(timeTakenSeconds) || timeTakenSeconds < 0) {
      throw new InvalidInputError(
        `timeTakenSeconds must be a non-negative integer, received ${timeTakenSeconds}`,
        'timeTakenSeconds'
      );
    }

    const result = scoreSubmission(
      quiz.questions.map((question) => ({
        id: question.id,
        correctAnswerIndex: question.correctAnswerIndex,
        difficulty: question.difficulty,
        optionCount: question.options.length,
      })),
      submission.answers
    );

    return this.lock.run(`proficiency:${learnerId}:${quiz.topic}`, async () => {
      const existing = await this.proficiencyRepo.find(learnerId, quiz.topic);
      const previousProficiency = existing?.proficiency ?? null;
      const topicProficiency = updateTopicProficiency(
        previousProficiency,
        result.attemptProficiency,
        quiz.topic
      );

      const attempt = await this.attemptRepo.recordWithProficiency(
        {
          id: generateId('qa'),
          quizId: quiz.id,
          learnerId,
          topic: quiz.topic,
          answers: { ...submission.answers },
          percentScore: result.percentScore,
          attemptProficiency: result.attemptProficiency,
          correctCount: result.correctCount,
          wrongCount: result.wrongCount,
          totalQuestions: result.totalQuestions,
          timeTakenSeconds,
          passed: result.passed,
          topicProficiencyBefore: previousProficiency,
          topicProficiencyAfter: topicProficiency,
          completedAt: now,
        },
        { proficiency: topicProficiency, updatedAt: now }
      );

      return {
        ...result,
        quizId: quiz.id,
        attemptId: attempt.id,
        topic: quiz.topic,
        timeTakenSeconds,
        previousProficiency,
        topicProficiency,
        completedAt: now,
      };
    });
  }
}

function normalizeQuestions(questions: NewQuizQuestion[]): QuizQuestion[] {
  const seen = new Set<string>();

  return questions.map((question, index) => {
    const id = question.id?.trim() || `q${index + 1}`;
    if (seen.has(id)) {
      throw new InvalidInputError(`Duplicate question id '${id}'`, 'questions');
    }
    seen.add(id);

    if (question.options.length < 2) {
      throw new InvalidInputError(`Question '${id}' needs at least 2 options`, 'options');
    }
    const answer = question.correctAnswerIndex;
    if (!Number.isInteger(answer) || answer < 0 || answer >= question.options.length) {
      throw new InvalidInputError(
        `Question '${id}' correct answer index ${answer} is out of range for ${question.options.length} options`,
        'correctAnswerIndex'
      );
    }

    return {
      id,
      question: question.question,
      options: [...question.options],
      correctAnswerIndex: answer,
      difficulty: question.difficulty ?? 'medium',
      explanation: question.explanation ?? null,
    };
  });
}
