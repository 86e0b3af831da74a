import { logger } from '../config/logger.js';
import { createQuestion, type CreateQuestionInput } from '../domain/question.js';
import type { QuestionRepository } from '../repositories/question.repository.js';
import type { Question, QuestionId } from '../types/models.js';

export class QuestionService {
  constructor(private readonly questionRepository: QuestionRepository) {}

  /**
   * Add a question to the catalog and return its id
   */
  async createQuestion(input: CreateQuestionInput): Promise<QuestionId> {
    const question = createQuestion(input);

    try {
      const saved = await this.questionRepository.save(question);
      logger.info('Question created', { questionId: saved.id, type: saved.type, category: saved.category });
      return saved.id;
    } catch (error) {
      logger.error('Error creating question', { error, type: input.type, category: input.category });
      throw error;
    }
  }

  async getQuestionById(id: QuestionId): Promise<Question | null> {
    return this.questionRepository.findById(id);
  }
}
