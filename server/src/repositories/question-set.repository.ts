import type { Queryable } from '../db/types.js';
import { isUniqueViolation } from '../db/types.js';
import { QuestionSetConflictError } from '../errors/domain-errors.js';
import type { QuestionSet, QuestionSetId } from '../types/models.js';

export interface QuestionSetRepository {
  save(questionSet: QuestionSet): Promise<QuestionSet>;
  /** The set whose window contains `now`: publishedAt <= now < endAt */
  findOperating(now: Date): Promise<QuestionSet | null>;
  /** The earliest set with publishedAt > now */
  findFirstPublishedAfter(now: Date): Promise<QuestionSet | null>;
  /** The set with the greatest publishedAt, upcoming ones included */
  findLatestPublished(): Promise<QuestionSet | null>;
  findById(id: QuestionSetId): Promise<QuestionSet | null>;
}

interface QuestionSetRow {
  id: string;
  question_ids: string[];
  published_at: Date;
  end_at: Date;
}

const QUESTION_SET_COLUMNS = 'id, question_ids, published_at, end_at';

export class PgQuestionSetRepository implements QuestionSetRepository {
  constructor(private readonly db: Queryable) {}

  async save(questionSet: QuestionSet): Promise<QuestionSet> {
    const questionIds = [...questionSet.questionIds]
      .sort((a, b) => a.order - b.order)
      .map((questionOrder) => questionOrder.questionId);

    try {
      const result = await this.db.query<QuestionSetRow>(
        `INSERT INTO question_sets (${QUESTION_SET_COLUMNS})
         VALUES ($1, $2, $3, $4)
         RETURNING ${QUESTION_SET_COLUMNS}`,
        [questionSet.id, questionIds, questionSet.publishedAt, questionSet.endAt]
      );
      return this.mapRowToQuestionSet(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error, 'question_sets_published_at_key')) {
        throw new QuestionSetConflictError(questionSet.publishedAt);
      }
      throw error;
    }
  }

  findOperating(now: Date): Promise<QuestionSet | null> {
    return this.findOne(
      `SELECT ${QUESTION_SET_COLUMNS} FROM question_sets
       WHERE published_at <= $1 AND end_at > $1
       ORDER BY published_at ASC
       LIMIT 1`,
      [now]
    );
  }

  findFirstPublishedAfter(now: Date): Promise<QuestionSet | null> {
    return this.findOne(
      `SELECT ${QUESTION_SET_COLUMNS} FROM question_sets
       WHERE published_at > $1
       ORDER BY published_at ASC
       LIMIT 1`,
      [now]
    );
  }

  findLatestPublished(): Promise<QuestionSet | null> {
    return this.findOne(
      `SELECT ${QUESTION_SET_COLUMNS} FROM question_sets
       ORDER BY published_at DESC
       LIMIT 1`,
      []
    );
  }

  findById(id: QuestionSetId): Promise<QuestionSet | null> {
    return this.findOne(`SELECT ${QUESTION_SET_COLUMNS} FROM question_sets WHERE id = $1`, [id]);
  }

  private async findOne(sql: string, params: unknown[]): Promise<QuestionSet | null> {
    const result = await this.db.query<QuestionSetRow>(sql, params);
    if (result.rows.length === 0) {
      return null;
    }
    return this.mapRowToQuestionSet(result.rows[0]);
  }

  private mapRowToQuestionSet(row: QuestionSetRow): QuestionSet {
    return {
      id: row.id,
      questionIds: row.question_ids.map((questionId, index) => ({ questionId, order: index })),
      publishedAt: row.published_at,
      endAt: row.end_at,
    };
  }
}
