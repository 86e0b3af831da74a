import { createQuestionSet } from '../../src/domain/question-set';
import { QuestionSheetService } from '../../src/services/question-sheet.service';
import type { QuestionSet, QuestionSheet } from '../../src/types/models';
import {
  InMemoryQuestionRepository,
  InMemoryQuestionSheetRepository,
  makeQuestions,
} from '../helpers/in-memory-repositories';

describe('QuestionSheetService', () => {
  const friendQuestions = makeQuestions('f', 'FRIEND', 7);
  const accompanyQuestions = makeQuestions('a', 'ACCOMPANY', 5);

  let questionRepository: InMemoryQuestionRepository;
  let questionSheetRepository: InMemoryQuestionSheetRepository;
  let service: QuestionSheetService;
  let questionSet: QuestionSet;

  const candidatesOfFriend = ['m2', 'm3', 'm4'];
  const candidatesOfAccompany = ['m5', 'm6', 'm7', 'm8'];

  beforeEach(() => {
    questionRepository = new InMemoryQuestionRepository([...friendQuestions, ...accompanyQuestions]);
    questionSheetRepository = new InMemoryQuestionSheetRepository();
    service = new QuestionSheetService(questionRepository, questionSheetRepository);
    // Interleaved so grouping by type is visible
    questionSet = createQuestionSet(
      ['a1', 'f1', 'f2', 'a2', 'f3', 'a3', 'f4', 'f5', 'a4', 'f6', 'a5', 'f7'],
      new Date(2024, 0, 15, 9),
      new Date(2024, 0, 15, 21)
    );
  });

  describe('createQuestionSheetsForMember', () => {
    let sheets: QuestionSheet[];

    beforeEach(async () => {
      sheets = await service.createQuestionSheetsForMember(
        questionSet,
        candidatesOfFriend,
        candidatesOfAccompany,
        'm1'
      );
    });

    it('should create one sheet per question', () => {
      expect(sheets).toHaveLength(12);
      expect(new Set(sheets.map((s) => s.questionSheetId)).size).toBe(12);
    });

    it('should give friend questions the friend pool and accompany questions the accompany pool', () => {
      const friendSheets = sheets.filter((s) => s.questionId.startsWith('f'));
      const accompanySheets = sheets.filter((s) => s.questionId.startsWith('a'));

      expect(friendSheets).toHaveLength(7);
      expect(accompanySheets).toHaveLength(5);
      friendSheets.forEach((s) => expect(s.candidates).toEqual(candidatesOfFriend));
      accompanySheets.forEach((s) => expect(s.candidates).toEqual(candidatesOfAccompany));
    });

    it('should put friend sheets first, each group in set order', () => {
      expect(sheets.map((s) => s.questionId)).toEqual([
        'f1', 'f2', 'f3', 'f4', 'f5', 'f6', 'f7',
        'a1', 'a2', 'a3', 'a4', 'a5',
      ]);
    });

    it('should bind every sheet to the set and the resolver', () => {
      sheets.forEach((s) => {
        expect(s.questionSetId).toBe(questionSet.id);
        expect(s.resolverId).toBe('m1');
      });
    });

    it('should not store anything', () => {
      expect(questionSheetRepository.sheets).toHaveLength(0);
    });
  });

  it('should drop the resolver from the candidate pools', async () => {
    const sheets = await service.createQuestionSheetsForMember(questionSet, ['m1', 'm2'], ['m3', 'm1'], 'm1');

    expect(sheets[0].candidates).toEqual(['m2']);
    expect(sheets[11].candidates).toEqual(['m3']);
  });

  it('should skip questions the catalog does not know', async () => {
    questionRepository.questions.delete('f3');
    questionRepository.questions.delete('a5');

    const sheets = await service.createQuestionSheetsForMember(
      questionSet,
      candidatesOfFriend,
      candidatesOfAccompany,
      'm1'
    );

    expect(sheets).toHaveLength(10);
    expect(sheets.map((s) => s.questionId)).not.toContain('f3');
    expect(sheets.map((s) => s.questionId)).not.toContain('a5');
  });

  describe('saveQuestionSheets', () => {
    it('should store the sheets and return them', async () => {
      const sheets = await service.createQuestionSheetsForMember(
        questionSet,
        candidatesOfFriend,
        candidatesOfAccompany,
        'm1'
      );

      const saved = await service.saveQuestionSheets(sheets);

      expect(saved).toEqual(sheets);
      expect(await service.getQuestionSheets('m1', questionSet.id)).toHaveLength(12);
    });

    it('should not store a second sheet for the same set, question and resolver', async () => {
      const first = await service.createQuestionSheetsForMember(questionSet, candidatesOfFriend, candidatesOfAccompany, 'm1');
      const second = await service.createQuestionSheetsForMember(questionSet, candidatesOfFriend, candidatesOfAccompany, 'm1');

      await service.saveQuestionSheets(first);
      const savedAgain = await service.saveQuestionSheets(second);

      expect(savedAgain).toEqual([]);
      expect(questionSheetRepository.sheets).toHaveLength(12);
      expect(questionSheetRepository.sheets.map((s) => s.questionSheetId)).toEqual(first.map((s) => s.questionSheetId));
    });
  });
});
