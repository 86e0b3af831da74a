import { randomUUID } from 'crypto';
import { ValidationError } from '../errors/domain-errors.js';
import type { ImageId, Question, QuestionCategory, QuestionType } from '../types/models.js';

export interface CreateQuestionInput {
  content: string;
  type: QuestionType;
  category: QuestionCategory;
  emojiImageId: ImageId;
}

export function createQuestion(input: CreateQuestionInput): Question {
  const content = input.content.trim();
  if (content === '') {
    throw new ValidationError('Question content must not be empty');
  }

  return Object.freeze({
    id: randomUUID(),
    content,
    type: input.type,
    category: input.category,
    emojiImageId: input.emojiImageId,
  });
}
