import { logger } from '../config/logger.js';
import type { QuestionSetConfig } from '../config/question-set.config.js';
import { createQuestionSet, getPublishStatus, questionIdsOf } from '../domain/question-set.js';
import { endTimeFor, nextPublishTime } from '../domain/schedule.js';
import { QuestionLackError, ValidationError } from '../errors/domain-errors.js';
import type { QuestionRepository } from '../repositories/question.repository.js';
import type { QuestionSetRepository } from '../repositories/question-set.repository.js';
import type { PublishStatus, QuestionId, QuestionSet, QuestionSetId } from '../types/models.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { defaultRandom, shuffle, type RandomSource } from '../utils/random.js';

export interface CreateQuestionSetOptions {
  /**
   * Open the new window at the next daily slot after now instead of at the
   * latest set's endAt. The latest set's questions are still excluded.
   */
  scheduleFromNow?: boolean;
}

export interface QuestionSetServiceDeps {
  questionRepository: QuestionRepository;
  questionSetRepository: QuestionSetRepository;
  config: QuestionSetConfig;
  random?: RandomSource;
  clock?: Clock;
}

/**
 * Builds question sets for upcoming publish windows and answers which set is
 * current, next, or latest.
 */
export class QuestionSetService {
  private readonly questionRepository: QuestionRepository;
  private readonly questionSetRepository: QuestionSetRepository;
  private readonly config: QuestionSetConfig;
  private readonly random: RandomSource;
  private readonly clock: Clock;

  constructor(deps: QuestionSetServiceDeps) {
    this.questionRepository = deps.questionRepository;
    this.questionSetRepository = deps.questionSetRepository;
    this.config = deps.config;
    this.random = deps.random ?? defaultRandom;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Number of FRIEND and ACCOMPANY questions in a set of the configured size
   */
  typeCounts(): { friend: number; accompany: number } {
    const friend = Math.floor(this.config.size * this.config.friendRatio);
    return { friend, accompany: this.config.size - friend };
  }

  /**
   * Build and store the set that follows `latestQuestionSet`.
   *
   * None of the latest set's questions are reused. With a latest set the new
   * window opens exactly at its endAt, unless `scheduleFromNow` is set; without
   * one it opens at the next daily slot after now. Throws QuestionLackError
   * when the catalog cannot fill the set.
   */
  async createQuestionSet(
    latestQuestionSet?: QuestionSet | null,
    options: CreateQuestionSetOptions = {}
  ): Promise<QuestionSetId> {
    const { friend: friendCount, accompany: accompanyCount } = this.typeCounts();
    const excludedQuestionIds = latestQuestionSet ? questionIdsOf(latestQuestionSet) : [];

    const friendQuestions = await this.questionRepository.findRandomQuestions(
      'FRIEND',
      excludedQuestionIds,
      friendCount
    );
    const accompanyQuestions = await this.questionRepository.findRandomQuestions(
      'ACCOMPANY',
      excludedQuestionIds,
      accompanyCount
    );

    const questionList = shuffle([...friendQuestions, ...accompanyQuestions], this.random);

    if (questionList.length !== this.config.size) {
      const error = new QuestionLackError({
        requestedSize: this.config.size,
        friendRequested: friendCount,
        friendFound: friendQuestions.length,
        accompanyRequested: accompanyCount,
        accompanyFound: accompanyQuestions.length,
        excludedQuestionIds,
        previousQuestionSetId: latestQuestionSet?.id ?? null,
      });
      logger.error('Not enough questions left to create a question set', error.context);
      throw error;
    }

    const publishedAt =
      latestQuestionSet && !options.scheduleFromNow
        ? new Date(latestQuestionSet.endAt.getTime())
        : nextPublishTime(this.clock(), this.config);
    const endAt = endTimeFor(publishedAt, this.config);

    const questionSet = createQuestionSet(
      questionList.map((question) => question.id),
      publishedAt,
      endAt
    );

    const saved = await this.questionSetRepository.save(questionSet);
    logger.info('Question set created', {
      questionSetId: saved.id,
      publishedAt: saved.publishedAt.toISOString(),
      endAt: saved.endAt.toISOString(),
      previousQuestionSetId: latestQuestionSet?.id ?? null,
    });

    return saved.id;
  }

  /**
   * Store a set made of the given questions for an explicit window
   */
  async createQuestionSetWithQuestions(
    questionIds: readonly QuestionId[],
    publishedAt: Date,
    endAt: Date
  ): Promise<QuestionSet> {
    if (questionIds.length !== this.config.size) {
      throw new ValidationError(`questions size for QuestionSet must be ${this.config.size}`, {
        received: questionIds.length,
      });
    }
    if (publishedAt.getTime() <= this.clock().getTime()) {
      throw new ValidationError('publishedAt must be in the future', {
        publishedAt: publishedAt.toISOString(),
      });
    }

    const questionSet = createQuestionSet(questionIds, publishedAt, endAt);
    const saved = await this.questionSetRepository.save(questionSet);

    logger.info('Question set created with explicit questions', {
      questionSetId: saved.id,
      publishedAt: saved.publishedAt.toISOString(),
      endAt: saved.endAt.toISOString(),
    });

    return saved;
  }

  /**
   * The set members are answering right now
   */
  async getOperatingQuestionSet(): Promise<QuestionSet | null> {
    const questionSet = await this.questionSetRepository.findOperating(this.clock());
    if (!questionSet) {
      logger.warn('No operating question set found');
    }
    return questionSet;
  }

  /**
   * The next set waiting to be published
   */
  async getNextOperatingQuestionSet(): Promise<QuestionSet | null> {
    const questionSet = await this.questionSetRepository.findFirstPublishedAfter(this.clock());
    if (!questionSet) {
      logger.warn('No upcoming question set found');
    }
    return questionSet;
  }

  async getLatestPublishedQuestionSet(): Promise<QuestionSet | null> {
    return this.questionSetRepository.findLatestPublished();
  }

  async getQuestionSetById(questionSetId: QuestionSetId): Promise<QuestionSet | null> {
    return this.questionSetRepository.findById(questionSetId);
  }

  getQuestionSetStatus(questionSet: QuestionSet): PublishStatus {
    return getPublishStatus(questionSet, this.clock());
  }
}
