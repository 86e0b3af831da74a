export type DomainErrorCode =
  | 'QUESTION_LACK_FOR_CREATE_QUESTION_SET'
  | 'VALIDATION_ERROR'
  | 'FRIEND_NOT_FOUND'
  | 'ALREADY_FRIEND'
  | 'MEMBER_NOT_FOUND'
  | 'QUESTION_NOT_FOUND'
  | 'QUESTION_SET_NOT_FOUND'
  | 'SELF_RELATION'
  | 'RELATION_ALREADY_EXISTS'
  | 'QUESTION_SET_CONFLICT';

/**
 * Failure surfaced to the caller as-is. `status` is the HTTP status the API
 * layer answers with; `context` is structured detail for logs.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly status: number;
  readonly context?: Record<string, unknown>;

  constructor(code: DomainErrorCode, status: number, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export interface QuestionLackContext {
  requestedSize: number;
  friendRequested: number;
  friendFound: number;
  accompanyRequested: number;
  accompanyFound: number;
  excludedQuestionIds: string[];
  previousQuestionSetId: string | null;
}

export class QuestionLackError extends DomainError {
  constructor(context: QuestionLackContext) {
    super(
      'QUESTION_LACK_FOR_CREATE_QUESTION_SET',
      409,
      `Not enough questions to build a set of ${context.requestedSize} ` +
        `(friend ${context.friendFound}/${context.friendRequested}, ` +
        `accompany ${context.accompanyFound}/${context.accompanyRequested})`,
      { ...context }
    );
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('VALIDATION_ERROR', 400, message, context);
  }
}

export class FriendNotFoundError extends DomainError {
  constructor(fromId: string, toId: string) {
    super('FRIEND_NOT_FOUND', 404, `No relation from ${fromId} to ${toId}`, { fromId, toId });
  }
}

export class AlreadyFriendError extends DomainError {
  constructor(fromId: string, toId: string) {
    super('ALREADY_FRIEND', 409, `${fromId} is already a friend of ${toId}`, { fromId, toId });
  }
}

export class MemberNotFoundError extends DomainError {
  constructor(memberId: string) {
    super('MEMBER_NOT_FOUND', 404, `Member ${memberId} not found`, { memberId });
  }
}

export class QuestionNotFoundError extends DomainError {
  constructor(questionId: string) {
    super('QUESTION_NOT_FOUND', 404, `Question ${questionId} not found`, { questionId });
  }
}

export class QuestionSetNotFoundError extends DomainError {
  constructor(questionSetId: string) {
    super('QUESTION_SET_NOT_FOUND', 404, `Question set ${questionSetId} not found`, { questionSetId });
  }
}

export class SelfRelationError extends DomainError {
  constructor(memberId: string) {
    super('SELF_RELATION', 400, `Member ${memberId} cannot relate to itself`, { memberId });
  }
}

export class RelationAlreadyExistsError extends DomainError {
  constructor(fromId: string, toId: string) {
    super('RELATION_ALREADY_EXISTS', 409, `Relation from ${fromId} to ${toId} already exists`, {
      fromId,
      toId,
    });
  }
}

export class QuestionSetConflictError extends DomainError {
  constructor(publishedAt: Date) {
    super(
      'QUESTION_SET_CONFLICT',
      409,
      `A question set is already scheduled at ${publishedAt.toISOString()}`,
      { publishedAt: publishedAt.toISOString() }
    );
  }
}
