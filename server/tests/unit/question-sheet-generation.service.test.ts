import { parseTimeOfDay, type QuestionSetConfig } from '../../src/config/question-set.config';
import { createQuestionSet } from '../../src/domain/question-set';
import { MemberNotFoundError, QuestionSetNotFoundError } from '../../src/errors/domain-errors';
import { MemberRelationService } from '../../src/services/member-relation.service';
import { MemberService } from '../../src/services/member.service';
import { QuestionSetService } from '../../src/services/question-set.service';
import { QuestionSheetGenerationService } from '../../src/services/question-sheet-generation.service';
import { QuestionSheetService } from '../../src/services/question-sheet.service';
import type { QuestionSet } from '../../src/types/models';
import {
  InMemoryMemberRelationRepository,
  InMemoryMemberRepository,
  InMemoryQuestionRepository,
  InMemoryQuestionSetRepository,
  InMemoryQuestionSheetRepository,
  makeQuestions,
} from '../helpers/in-memory-repositories';

const config: QuestionSetConfig = {
  size: 4,
  friendRatio: 0.5,
  openTime1: parseTimeOfDay('09:00'),
  openTime2: parseTimeOfDay('21:00'),
  candidatePoolSize: 2,
};

describe('QuestionSheetGenerationService', () => {
  let relations: InMemoryMemberRelationRepository;
  let members: InMemoryMemberRepository;
  let sheets: InMemoryQuestionSheetRepository;
  let questionSet: QuestionSet;
  let service: QuestionSheetGenerationService;

  beforeEach(async () => {
    const questionRepository = new InMemoryQuestionRepository([
      ...makeQuestions('f', 'FRIEND', 2),
      ...makeQuestions('a', 'ACCOMPANY', 2),
    ]);
    const questionSetRepository = new InMemoryQuestionSetRepository();
    relations = new InMemoryMemberRelationRepository();
    members = new InMemoryMemberRepository(['m1', 'm2', 'm3', 'm4']);
    sheets = new InMemoryQuestionSheetRepository();

    const memberRelationService = new MemberRelationService(relations, members);
    service = new QuestionSheetGenerationService({
      questionSetService: new QuestionSetService({ questionRepository, questionSetRepository, config }),
      questionSheetService: new QuestionSheetService(questionRepository, sheets),
      memberRelationService,
      memberService: new MemberService(members, memberRelationService),
      candidatePoolSize: config.candidatePoolSize,
    });

    questionSet = await questionSetRepository.save(
      createQuestionSet(['f1', 'a1', 'f2', 'a2'], new Date(2024, 0, 15, 9), new Date(2024, 0, 15, 21))
    );

    relations.add('m1', 'm2', 'FRIEND');
    relations.add('m1', 'm3', 'ACCOMPANY');
    relations.add('m1', 'm4', 'ACCOMPANY');
  });

  describe('generateForMember', () => {
    it('should build sheets from the member relation pools', async () => {
      const result = await service.generateForMember(questionSet.id, 'm1');

      expect(result.map((s) => s.questionId)).toEqual(['f1', 'f2', 'a1', 'a2']);
      expect(result[0].candidates).toEqual(['m2']);
      expect([...result[2].candidates].sort()).toEqual(['m3', 'm4']);
      expect(sheets.sheets).toHaveLength(4);
    });

    it('should cap each pool at the candidate pool size', async () => {
      relations.add('m1', 'x1', 'ACCOMPANY');
      relations.add('m1', 'x2', 'ACCOMPANY');

      const result = await service.generateForMember(questionSet.id, 'm1');

      expect(result[2].candidates).toHaveLength(2);
    });

    it('should return the stored sheets and write nothing when run twice', async () => {
      const first = await service.generateForMember(questionSet.id, 'm1');
      const second = await service.generateForMember(questionSet.id, 'm1');

      expect(second.map((s) => s.questionSheetId)).toEqual(first.map((s) => s.questionSheetId));
      expect(sheets.sheets).toHaveLength(4);
    });

    it('should fail for an unknown set', async () => {
      await expect(service.generateForMember('missing', 'm1')).rejects.toBeInstanceOf(QuestionSetNotFoundError);
    });

    it('should fail for an unknown member', async () => {
      await expect(service.generateForMember(questionSet.id, 'ghost')).rejects.toBeInstanceOf(MemberNotFoundError);
    });

    it('should give empty pools to a member without relations', async () => {
      const result = await service.generateForMember(questionSet.id, 'm4');

      expect(result).toHaveLength(4);
      result.forEach((sheet) => expect(sheet.candidates).toEqual([]));
    });
  });

  describe('generateForAllMembers', () => {
    it('should generate for every member and skip members already done', async () => {
      await service.generateForMember(questionSet.id, 'm1');

      const summary = await service.generateForAllMembers(questionSet.id);

      expect(summary).toEqual({ questionSetId: questionSet.id, created: 3, skipped: 1, failed: 0 });
      expect(sheets.sheets).toHaveLength(16);
    });

    it('should count a failing member and carry on', async () => {
      const saveAll = sheets.saveAll.bind(sheets);
      jest.spyOn(sheets, 'saveAll').mockImplementation(async (batch) => {
        if (batch.some((s) => s.resolverId === 'm2')) {
          throw new Error('connection reset');
        }
        return saveAll(batch);
      });

      const summary = await service.generateForAllMembers(questionSet.id);

      expect(summary).toEqual({ questionSetId: questionSet.id, created: 3, skipped: 0, failed: 1 });
      expect(sheets.sheets.filter((s) => s.resolverId === 'm2')).toEqual([]);
    });
  });
});
