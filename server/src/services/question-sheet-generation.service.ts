import { logger } from '../config/logger.js';
import { MemberNotFoundError, QuestionSetNotFoundError } from '../errors/domain-errors.js';
import type { MemberId, QuestionSet, QuestionSetId, QuestionSheet } from '../types/models.js';
import type { MemberRelationService } from './member-relation.service.js';
import type { MemberService } from './member.service.js';
import type { QuestionSetService } from './question-set.service.js';
import type { QuestionSheetService } from './question-sheet.service.js';

export interface QuestionSheetGenerationDeps {
  questionSetService: QuestionSetService;
  questionSheetService: QuestionSheetService;
  memberRelationService: MemberRelationService;
  memberService: MemberService;
  candidatePoolSize: number;
}

export interface GenerationSummary {
  questionSetId: QuestionSetId;
  created: number;
  skipped: number;
  failed: number;
}

/**
 * Per-member sheet pipeline: sample candidate pools from the member's
 * relations, fan the set out, store the sheets.
 *
 * Generation for a (set, member) pair that already has sheets returns the
 * stored sheets and writes nothing.
 */
export class QuestionSheetGenerationService {
  constructor(private readonly deps: QuestionSheetGenerationDeps) {}

  async generateForMember(questionSetId: QuestionSetId, memberId: MemberId): Promise<QuestionSheet[]> {
    const questionSet = await this.loadQuestionSet(questionSetId);
    if (!(await this.deps.memberService.exists(memberId))) {
      throw new MemberNotFoundError(memberId);
    }
    const { sheets } = await this.generate(questionSet, memberId);
    return sheets;
  }

  /**
   * Run generation for every member. One member failing is logged and counted;
   * the rest still run.
   */
  async generateForAllMembers(questionSetId: QuestionSetId): Promise<GenerationSummary> {
    const questionSet = await this.loadQuestionSet(questionSetId);
    const memberIds = await this.deps.memberService.getAllMemberIds();
    const summary: GenerationSummary = { questionSetId, created: 0, skipped: 0, failed: 0 };

    for (const memberId of memberIds) {
      try {
        const { created } = await this.generate(questionSet, memberId);
        if (created) {
          summary.created++;
        } else {
          summary.skipped++;
        }
      } catch (error) {
        summary.failed++;
        logger.error('Failed to generate question sheets for member', { error, questionSetId, memberId });
      }
    }

    logger.info('Question sheet generation completed', { ...summary, members: memberIds.length });
    return summary;
  }

  private async loadQuestionSet(questionSetId: QuestionSetId): Promise<QuestionSet> {
    const questionSet = await this.deps.questionSetService.getQuestionSetById(questionSetId);
    if (!questionSet) {
      throw new QuestionSetNotFoundError(questionSetId);
    }
    return questionSet;
  }

  private async generate(
    questionSet: QuestionSet,
    memberId: MemberId
  ): Promise<{ sheets: QuestionSheet[]; created: boolean }> {
    const { questionSheetService, memberRelationService, candidatePoolSize } = this.deps;

    const existing = await questionSheetService.getQuestionSheets(memberId, questionSet.id);
    if (existing.length > 0) {
      logger.debug('Question sheets already exist for member', {
        questionSetId: questionSet.id,
        memberId,
        count: existing.length,
      });
      return { sheets: existing, created: false };
    }

    const candidatesOfFriend = await memberRelationService.findRandomOfFriend(memberId, candidatePoolSize);
    const candidatesOfAccompany = await memberRelationService.findRandomOfAccompany(memberId, candidatePoolSize);

    const sheets = await questionSheetService.createQuestionSheetsForMember(
      questionSet,
      candidatesOfFriend,
      candidatesOfAccompany,
      memberId
    );
    const saved = await questionSheetService.saveQuestionSheets(sheets);

    // A concurrent run may have stored them first; answer with what is stored
    if (saved.length < sheets.length) {
      const stored = await questionSheetService.getQuestionSheets(memberId, questionSet.id);
      return { sheets: stored, created: saved.length > 0 };
    }
    return { sheets: saved, created: true };
  }
}
