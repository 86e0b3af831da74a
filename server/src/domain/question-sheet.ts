import { randomUUID } from 'crypto';
import type { MemberId, QuestionId, QuestionSetId, QuestionSheet } from '../types/models.js';

export function createQuestionSheet(input: {
  questionSetId: QuestionSetId;
  questionId: QuestionId;
  resolverId: MemberId;
  candidates: readonly MemberId[];
}): QuestionSheet {
  return {
    questionSheetId: randomUUID(),
    questionSetId: input.questionSetId,
    questionId: input.questionId,
    resolverId: input.resolverId,
    // The resolver never answers about themselves
    candidates: input.candidates.filter((candidate) => candidate !== input.resolverId),
  };
}
