// Domain model types

export type MemberId = string;
export type QuestionId = string;
export type QuestionSetId = string;
export type QuestionSheetId = string;
export type MemberRelationId = string;
export type ImageId = string;

export const QUESTION_TYPES = ['FRIEND', 'ACCOMPANY'] as const;
export type QuestionType = (typeof QUESTION_TYPES)[number];

// Relation tiers share the question-type vocabulary
export type RelationType = QuestionType;

export const QUESTION_CATEGORIES = [
  'DATING',
  'FRIENDSHIP',
  'PERSONALITY',
  'ENTERTAINMENT',
  'FITNESS',
  'APPEARANCE',
  'WORK',
  'HUMOR',
  'OTHER',
] as const;
export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

export interface Member {
  id: MemberId;
  fullName: string;
  createdAt: Date;
}

export interface Question {
  readonly id: QuestionId;
  readonly content: string;
  readonly type: QuestionType;
  readonly category: QuestionCategory;
  readonly emojiImageId: ImageId;
}

export interface QuestionOrder {
  questionId: QuestionId;
  order: number; // 0-based position inside the set
}

export type PublishStatus = 'UPCOMING' | 'ACTIVE' | 'TERMINATED';

export interface QuestionSet {
  id: QuestionSetId;
  questionIds: QuestionOrder[];
  publishedAt: Date;
  endAt: Date;
}

export interface QuestionSheet {
  questionSheetId: QuestionSheetId;
  questionSetId: QuestionSetId;
  questionId: QuestionId;
  resolverId: MemberId;
  candidates: MemberId[];
}

export interface MemberRelation {
  id: MemberRelationId;
  fromId: MemberId;
  toId: MemberId;
  relation: RelationType;
  lastUpdatedAt: Date;
}
