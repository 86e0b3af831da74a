import type { Queryable } from '../db/types.js';
import type { Question, QuestionCategory, QuestionId, QuestionType } from '../types/models.js';

/** The question catalog */
export interface QuestionRepository {
  save(question: Question): Promise<Question>;
  findById(id: QuestionId): Promise<Question | null>;
  /** Up to `limit` questions of `type`, in random order, skipping `excludedIds` */
  findRandomQuestions(type: QuestionType, excludedIds: readonly QuestionId[], limit: number): Promise<Question[]>;
  /** Ids among `ids` typed FRIEND, in the order given */
  findFriendQuestionsByIds(ids: readonly QuestionId[]): Promise<QuestionId[]>;
  /** Ids among `ids` typed ACCOMPANY, in the order given */
  findAccompanyQuestionsByIds(ids: readonly QuestionId[]): Promise<QuestionId[]>;
}

interface QuestionRow {
  id: string;
  content: string;
  type: QuestionType;
  category: QuestionCategory;
  emoji_image_id: string;
}

const QUESTION_COLUMNS = 'id, content, type, category, emoji_image_id';

export class PgQuestionRepository implements QuestionRepository {
  constructor(private readonly db: Queryable) {}

  async save(question: Question): Promise<Question> {
    const result = await this.db.query<QuestionRow>(
      `INSERT INTO questions (${QUESTION_COLUMNS})
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${QUESTION_COLUMNS}`,
      [question.id, question.content, question.type, question.category, question.emojiImageId]
    );
    return this.mapRowToQuestion(result.rows[0]);
  }

  async findById(id: QuestionId): Promise<Question | null> {
    const result = await this.db.query<QuestionRow>(`SELECT ${QUESTION_COLUMNS} FROM questions WHERE id = $1`, [id]);
    if (result.rows.length === 0) {
      return null;
    }
    return this.mapRowToQuestion(result.rows[0]);
  }

  async findRandomQuestions(
    type: QuestionType,
    excludedIds: readonly QuestionId[],
    limit: number
  ): Promise<Question[]> {
    if (limit <= 0) {
      return [];
    }
    const result = await this.db.query<QuestionRow>(
      `SELECT ${QUESTION_COLUMNS} FROM questions
       WHERE type = $1 AND NOT (id = ANY($2::text[]))
       ORDER BY random()
       LIMIT $3`,
      [type, [...excludedIds], limit]
    );
    return result.rows.map((row) => this.mapRowToQuestion(row));
  }

  findFriendQuestionsByIds(ids: readonly QuestionId[]): Promise<QuestionId[]> {
    return this.findIdsByType(ids, 'FRIEND');
  }

  findAccompanyQuestionsByIds(ids: readonly QuestionId[]): Promise<QuestionId[]> {
    return this.findIdsByType(ids, 'ACCOMPANY');
  }

  private async findIdsByType(ids: readonly QuestionId[], type: QuestionType): Promise<QuestionId[]> {
    if (ids.length === 0) {
      return [];
    }
    const result = await this.db.query<{ id: string }>(
      `SELECT id FROM questions
       WHERE id = ANY($1::text[]) AND type = $2
       ORDER BY array_position($1::text[], id::text)`,
      [[...ids], type]
    );
    return result.rows.map((row) => row.id);
  }

  private mapRowToQuestion(row: QuestionRow): Question {
    return {
      id: row.id,
      content: row.content,
      type: row.type,
      category: row.category,
      emojiImageId: row.emoji_image_id,
    };
  }
}
