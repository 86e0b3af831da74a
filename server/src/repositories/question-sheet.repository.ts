import type { Queryable } from '../db/types.js';
import type { MemberId, QuestionSetId, QuestionSheet } from '../types/models.js';

export interface QuestionSheetRepository {
  findAllByQuestionSetIdAndResolverId(questionSetId: QuestionSetId, resolverId: MemberId): Promise<QuestionSheet[]>;
  /**
   * Stores every sheet in one statement, keeping the array order as the read
   * order. A sheet whose (questionSetId, questionId, resolverId) is already
   * stored is skipped; only the rows actually written are returned.
   */
  saveAll(sheets: readonly QuestionSheet[]): Promise<QuestionSheet[]>;
}

interface QuestionSheetRow {
  id: string;
  question_set_id: string;
  question_id: string;
  resolver_id: string;
  candidates: string[];
}

const QUESTION_SHEET_COLUMNS = 'id, question_set_id, question_id, resolver_id, candidates';

export class PgQuestionSheetRepository implements QuestionSheetRepository {
  constructor(private readonly db: Queryable) {}

  async findAllByQuestionSetIdAndResolverId(
    questionSetId: QuestionSetId,
    resolverId: MemberId
  ): Promise<QuestionSheet[]> {
    const result = await this.db.query<QuestionSheetRow>(
      `SELECT ${QUESTION_SHEET_COLUMNS} FROM question_sheets
       WHERE question_set_id = $1 AND resolver_id = $2
       ORDER BY position ASC, id ASC`,
      [questionSetId, resolverId]
    );
    return result.rows.map((row) => this.mapRowToQuestionSheet(row));
  }

  async saveAll(sheets: readonly QuestionSheet[]): Promise<QuestionSheet[]> {
    if (sheets.length === 0) {
      return [];
    }

    const values: unknown[] = [];
    const tuples = sheets.map((sheet, index) => {
      const base = index * 6;
      values.push(
        sheet.questionSheetId,
        sheet.questionSetId,
        sheet.questionId,
        sheet.resolverId,
        sheet.candidates,
        index
      );
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6})`;
    });

    const result = await this.db.query<QuestionSheetRow>(
      `INSERT INTO question_sheets (${QUESTION_SHEET_COLUMNS}, position)
       VALUES ${tuples.join(', ')}
       ON CONFLICT (question_set_id, question_id, resolver_id) DO NOTHING
       RETURNING ${QUESTION_SHEET_COLUMNS}`,
      values
    );
    return result.rows.map((row) => this.mapRowToQuestionSheet(row));
  }

  private mapRowToQuestionSheet(row: QuestionSheetRow): QuestionSheet {
    return {
      questionSheetId: row.id,
      questionSetId: row.question_set_id,
      questionId: row.question_id,
      resolverId: row.resolver_id,
      candidates: row.candidates,
    };
  }
}
