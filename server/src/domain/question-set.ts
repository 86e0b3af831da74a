import { randomUUID } from 'crypto';
import { ValidationError } from '../errors/domain-errors.js';
import type { PublishStatus, QuestionId, QuestionOrder, QuestionSet } from '../types/models.js';

/**
 * Build a set from questions in display order. Orders are 0-based positions.
 * Throws ValidationError when the window is empty or a question repeats.
 */
export function createQuestionSet(
  questionIds: readonly QuestionId[],
  publishedAt: Date,
  endAt: Date
): QuestionSet {
  if (endAt.getTime() <= publishedAt.getTime()) {
    throw new ValidationError('endAt must be later than publishedAt', {
      publishedAt: publishedAt.toISOString(),
      endAt: endAt.toISOString(),
    });
  }

  const duplicates = findDuplicates(questionIds);
  if (duplicates.length > 0) {
    throw new ValidationError('A question set cannot contain the same question twice', { duplicates });
  }

  const questionOrders: QuestionOrder[] = questionIds.map((questionId, index) => ({
    questionId,
    order: index,
  }));

  return {
    id: randomUUID(),
    questionIds: questionOrders,
    publishedAt,
    endAt,
  };
}

export function getPublishStatus(questionSet: QuestionSet, now: Date): PublishStatus {
  const time = now.getTime();
  if (time < questionSet.publishedAt.getTime()) return 'UPCOMING';
  if (time < questionSet.endAt.getTime()) return 'ACTIVE';
  return 'TERMINATED';
}

export function questionIdsOf(questionSet: QuestionSet): QuestionId[] {
  return [...questionSet.questionIds]
    .sort((a, b) => a.order - b.order)
    .map((questionOrder) => questionOrder.questionId);
}

function findDuplicates(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}
