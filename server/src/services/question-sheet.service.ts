import { logger } from '../config/logger.js';
import { questionIdsOf } from '../domain/question-set.js';
import { createQuestionSheet } from '../domain/question-sheet.js';
import type { QuestionRepository } from '../repositories/question.repository.js';
import type { QuestionSheetRepository } from '../repositories/question-sheet.repository.js';
import type { MemberId, QuestionSet, QuestionSetId, QuestionSheet } from '../types/models.js';

export class QuestionSheetService {
  constructor(
    private readonly questionRepository: QuestionRepository,
    private readonly questionSheetRepository: QuestionSheetRepository
  ) {}

  /**
   * One sheet per question of the set for `resolver`. FRIEND questions get the
   * friend pool, ACCOMPANY questions the accompany pool; friend sheets come
   * first and each group keeps the set's order. Questions the catalog cannot
   * type are skipped. Nothing is stored.
   */
  async createQuestionSheetsForMember(
    questionSet: QuestionSet,
    candidatesOfFriend: readonly MemberId[],
    candidatesOfAccompany: readonly MemberId[],
    resolver: MemberId
  ): Promise<QuestionSheet[]> {
    const questionIds = questionIdsOf(questionSet);
    const friendQuestionIds = await this.questionRepository.findFriendQuestionsByIds(questionIds);
    const accompanyQuestionIds = await this.questionRepository.findAccompanyQuestionsByIds(questionIds);

    const friendQuestionSheets = friendQuestionIds.map((questionId) =>
      createQuestionSheet({
        questionSetId: questionSet.id,
        questionId,
        resolverId: resolver,
        candidates: candidatesOfFriend,
      })
    );

    const accompanyQuestionSheets = accompanyQuestionIds.map((questionId) =>
      createQuestionSheet({
        questionSetId: questionSet.id,
        questionId,
        resolverId: resolver,
        candidates: candidatesOfAccompany,
      })
    );

    const untyped = questionIds.length - friendQuestionIds.length - accompanyQuestionIds.length;
    if (untyped > 0) {
      logger.warn('Skipped questions with no catalog entry while building sheets', {
        questionSetId: questionSet.id,
        resolver,
        skipped: untyped,
      });
    }

    return [...friendQuestionSheets, ...accompanyQuestionSheets];
  }

  /**
   * Store sheets in one statement. Sheets already stored for the same
   * (set, question, resolver) are left untouched and not returned.
   */
  async saveQuestionSheets(allMemberQuestionSheets: readonly QuestionSheet[]): Promise<QuestionSheet[]> {
    try {
      const saved = await this.questionSheetRepository.saveAll(allMemberQuestionSheets);
      logger.debug('Question sheets saved', {
        requested: allMemberQuestionSheets.length,
        saved: saved.length,
      });
      return saved;
    } catch (error) {
      logger.error('Error saving question sheets', { error, count: allMemberQuestionSheets.length });
      throw error;
    }
  }

  async getQuestionSheets(resolverId: MemberId, questionSetId: QuestionSetId): Promise<QuestionSheet[]> {
    return this.questionSheetRepository.findAllByQuestionSetIdAndResolverId(questionSetId, resolverId);
  }
}
